/**
 * @module cpp2-front
 *
 * cpp2 语法前端：把 cpp2 源码转换成带诊断的语法树。
 *
 * **处理流程**：
 * ```
 * 源码 → loadSourceLines → TokenStore.lex → Parser.parse（类型解析完毕时应用元函数）→ TranslationUnit
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { parseSource, printSource } from 'cpp2-front';
 *
 * const result = parseSource('color: @enum type = { red; green; blue; }');
 * if (result.success) {
 *   console.log(printSource(result.unit));
 * } else {
 *   for (const d of result.diagnostics) console.error(d.message);
 * }
 * ```
 */

// 前端
export { classifyLine, loadSourceLines } from './frontend/source.js';
export { createLexState, lexLine, lexText } from './frontend/lexer.js';
export { GeneratedTokenBuffer, TokenStore } from './frontend/token-store.js';
export { AddsSequences, StringParts } from './frontend/string-parts.js';

// 语法树与解析器
export { Parser } from './parser.js';
export type { MetafunctionApplier, MetafunctionEnvironment, ParserOptions } from './parser.js';
export { Node } from './ast/ast.js';
export { CaptureGroup } from './ast/capture-group.js';
export { visitTree } from './ast/ast_visitor.js';
export type { AstVisitor } from './ast/ast_visitor.js';
export { ParseTreePrinter, printDeclaration, printSource } from './ast/printer.js';
export * from './ast/queries.js';

// 反射与元函数
export * from './reflect/index.js';

// 诊断
export {
  DiagnosticCode,
  DiagnosticError,
  DiagnosticSeverity,
  Diagnostics,
  formatDiagnostic,
} from './diagnostics/diagnostics.js';
export type { Diagnostic } from './diagnostics/diagnostics.js';
export { ErrorList } from './diagnostics/error-list.js';

// 核心类型
export { TokenKind, comparePositions, tokenEquals } from './types.js';
export type * from './types.js';

// ============================================================================
// 高层 API
// ============================================================================

import type { Diagnostic } from './diagnostics/diagnostics.js';
import { ErrorList } from './diagnostics/error-list.js';
import { loadSourceLines } from './frontend/source.js';
import { GeneratedTokenBuffer, TokenStore } from './frontend/token-store.js';
import { Parser } from './parser.js';
import type { TranslationUnitNode } from './types.js';
import { createMetafunctionApplier } from './reflect/apply.js';
import type { MetafunctionApplierOptions } from './reflect/apply.js';

/**
 * 解析选项
 */
export interface ParseSourceOptions extends MetafunctionApplierOptions {
  /** 为 false 时带元函数的类型保持原样（默认 true） */
  readonly applyMetafunctions?: boolean;
}

/**
 * 解析结果
 */
export interface ParseSourceResult {
  /** 没有任何诊断 */
  readonly success: boolean;
  readonly unit: TranslationUnitNode;
  /** 应展示的诊断（存在主诊断时隐藏 fallback 诊断） */
  readonly diagnostics: Diagnostic[];
  readonly errors: ErrorList;
  readonly tokens: TokenStore;
  readonly generated: GeneratedTokenBuffer;
  readonly parser: Parser;
}

/**
 * 对一份完整源码做词法分析与语法分析。
 *
 * 每个连续的 cpp2 区域是一个 token 段，依次解析进同一个翻译单元；
 * 元函数失败时不再解析后续的段。
 */
export function parseSource(text: string, options: ParseSourceOptions = {}): ParseSourceResult {
  const errors = new ErrorList();
  const tokens = new TokenStore(errors);
  tokens.lex(loadSourceLines(text, errors));

  const generated = new GeneratedTokenBuffer();
  const parser = new Parser(
    errors,
    options.applyMetafunctions === false ? {} : { applyMetafunctions: createMetafunctionApplier(options) }
  );
  for (const section of tokens.getSections().values()) {
    parser.parse(section, generated);
    if (parser.hasAborted()) break;
  }

  return {
    success: !errors.hasErrors(),
    unit: parser.getTranslationUnit(),
    diagnostics: errors.visible(),
    errors,
    tokens,
    generated,
    parser,
  };
}
