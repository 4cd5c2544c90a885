/**
 * @module reflect/compiler-services
 *
 * 元函数可用的编译器服务：报告错误、读取模板实参，以及把生成的 cpp2 文本
 * 词法分析并解析为语句。
 *
 * 生成代码通过父解析器的克隆解析，克隆与父解析器共享错误列表与生成声明列表，
 * 生成的 token 与源码行存入共享的 GeneratedTokenBuffer。
 */

import type { DeclarationNode, Position, StatementNode, Token } from '../types.js';
import { DiagnosticCode, Diagnostics } from '../diagnostics/diagnostics.js';
import type { ErrorList } from '../diagnostics/error-list.js';
import type { GeneratedTokenBuffer } from '../frontend/token-store.js';
import { lexText } from '../frontend/lexer.js';
import type { Parser } from '../parser.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('reflect');

/**
 * `require` 条件不成立：错误已经记录，抛出以终止正在运行的元函数。
 */
export class MetafunctionRequireError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetafunctionRequireError';
  }
}

export interface CompilerServicesInit {
  readonly errors: ErrorList;
  readonly generated: GeneratedTokenBuffer;
  readonly generatedDeclarations: DeclarationNode[];
  /** 正在解析目标类型的解析器；服务持有它的一个克隆 */
  readonly parser: Parser;
  /** 没有更具体位置时报告错误的位置 */
  readonly position: Position;
}

export class CompilerServices {
  private readonly errors: ErrorList;
  private readonly errorsAtStart: number;
  private readonly generated: GeneratedTokenBuffer;
  private readonly generatedDeclarations: DeclarationNode[];
  private readonly parser: Parser;
  private readonly defaultPosition: Position;
  private metafunctionName = '';
  private metafunctionArgs: string[] = [];
  private argumentsUsed = false;

  constructor(init: CompilerServicesInit) {
    this.errors = init.errors;
    this.errorsAtStart = init.errors.size;
    this.generated = init.generated;
    this.generatedDeclarations = init.generatedDeclarations;
    this.parser = init.parser.clone();
    this.defaultPosition = init.position;
  }

  setMetafunctionName(name: string, args: readonly string[]): void {
    this.metafunctionName = name;
    this.metafunctionArgs = [...args];
    this.argumentsUsed = false;
  }

  getMetafunctionName(): string {
    return this.metafunctionName;
  }

  /**
   * 读取第 index 个模板实参并记为已使用。
   *
   * @returns 实参不存在时返回空字符串
   */
  getArgument(index: number): string {
    this.argumentsUsed = true;
    return this.metafunctionArgs[index] ?? '';
  }

  argumentsWereUsed(): boolean {
    return this.argumentsUsed;
  }

  /** 自服务创建以来是否记录过新的错误 */
  hasNewErrors(): boolean {
    return this.errors.size > this.errorsAtStart;
  }

  position(): Position {
    return this.defaultPosition;
  }

  /**
   * 对生成的文本做词法分析。token 的行号从目标类型所在行开始，
   * 源码行与 token 都追加到共享的生成缓冲区。
   */
  tokenize(source: string): Token[] {
    const firstLine = this.defaultPosition.line;
    const lines = source.split(/\r?\n/);
    const { tokens } = lexText(source, this.errors, firstLine);
    this.generated.appendLines(lines);
    this.generated.append(tokens);
    logger.debug('Tokenized generated source', { lines: lines.length, tokens: tokens.length });
    return tokens;
  }

  /** @returns 解析失败时返回 null，错误已记录 */
  parseStatement(source: string): StatementNode | null {
    const before = this.errors.size;
    const tokens = this.tokenize(source);
    if (this.errors.size > before) return null;
    return this.parser.parseOneDeclaration(tokens, this.generated);
  }

  /**
   * 解析一条声明，并排入翻译单元顶层（追加在当前顶层声明之后）。
   */
  parseAndAddDeclaration(source: string): boolean {
    const stmt = this.parseStatement(source);
    if (stmt === null || stmt.statement.kind !== 'Declaration') {
      this.snippetFailed('error attempting to add a declaration', source);
      return false;
    }
    stmt.statement.parent = null;
    this.generatedDeclarations.push(stmt.statement);
    return true;
  }

  /**
   * 条件不成立时记录错误并终止当前元函数。
   *
   * @throws {MetafunctionRequireError}
   */
  require(condition: boolean, message: string, pos: Position = this.position()): void {
    if (condition) return;
    this.error(message, pos, DiagnosticCode.R001_MetafunctionRequirement);
    throw new MetafunctionRequireError(message);
  }

  /** 只记录错误，元函数继续运行 */
  error(message: string, pos: Position = this.position(), code = DiagnosticCode.R002_MetafunctionError): void {
    const prefix = this.metafunctionName === '' ? '' : `while applying @${this.metafunctionName} - `;
    this.errors.add(Diagnostics.metafunction(code, prefix + message, pos).build());
  }

  /** 生成代码无法解析或无法拼接 */
  snippetFailed(what: string, source: string, pos: Position = this.position()): void {
    this.error(`${what}:\n${source}`, pos, DiagnosticCode.R006_SnippetParseFailed);
  }
}
