/**
 * @module frontend
 *
 * 编译器前端模块：源码加载与词法分析。
 *
 * 包含：
 * - 源码行分类 (source)
 * - 逐行词法分析器 (lexer)
 * - 字符串插值展开 (string-parts)
 * - Token 段存储与生成 token 缓冲区 (token-store)
 */

export { classifyLine, loadSourceLines } from './source.js';
export { createLexState, lexLine, lexText } from './lexer.js';
export type { LexOutput, LexState } from './lexer.js';
export { AddsSequences, StringParts, expandRawStringLiteral, expandStringLiteral } from './string-parts.js';
export type { StringPart } from './string-parts.js';
export { GeneratedTokenBuffer, TokenStore } from './token-store.js';
export { TokenKind, isKeyword, isFixedType, matchOperator } from './tokens.js';
