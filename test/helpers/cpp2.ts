import assert from 'node:assert/strict';
import { parseSource } from '../../src/index.js';
import type { ParseSourceOptions, ParseSourceResult } from '../../src/index.js';
import type { Diagnostic } from '../../src/diagnostics/diagnostics.js';
import { ErrorList } from '../../src/diagnostics/error-list.js';
import { lexText } from '../../src/frontend/lexer.js';
import { declarationName, getTypeScopeDeclarations } from '../../src/ast/declaration-ops.js';
import { CompilerServices } from '../../src/reflect/compiler-services.js';
import { TypeDeclaration } from '../../src/reflect/declarations.js';
import type { Comment, DeclarationNode, Token } from '../../src/types.js';

export interface LexResult {
  readonly tokens: Token[];
  readonly comments: Comment[];
  readonly errors: ErrorList;
}

export function lexSource(source: string): LexResult {
  const errors = new ErrorList();
  const { tokens, comments } = lexText(source, errors);
  return { tokens, comments, errors };
}

/** 解析源码；`@print` 的输出默认丢弃 */
export function parse(source: string, options: ParseSourceOptions = {}): ParseSourceResult {
  return parseSource(source, { output: () => undefined, ...options });
}

export function topLevel(result: ParseSourceResult, name: string): DeclarationNode {
  const decl = result.unit.declarations.find(d => declarationName(d) === name);
  assert.ok(decl, `缺少顶层声明 ${name}`);
  return decl;
}

export function firstDecl(result: ParseSourceResult): DeclarationNode {
  const decl = result.unit.declarations[0];
  assert.ok(decl, '翻译单元为空');
  return decl;
}

export function memberNames(decl: DeclarationNode): string[] {
  return getTypeScopeDeclarations(decl).map(declarationName);
}

export function topLevelNames(result: ParseSourceResult): string[] {
  return result.unit.declarations.map(declarationName);
}

export function codes(diagnostics: readonly Diagnostic[]): string[] {
  return diagnostics.map(d => d.code);
}

/** 为已解析的类型创建元函数视图，共享解析结果的错误列表 */
export function reflectType(result: ParseSourceResult, node: DeclarationNode): TypeDeclaration {
  const services = new CompilerServices({
    errors: result.errors,
    generated: result.generated,
    generatedDeclarations: [],
    parser: result.parser,
    position: node.span.start,
  });
  return new TypeDeclaration(node, services);
}
