/**
 * cpp2 Parser - 主入口
 * 负责协调各个子模块，把 token 段解析为共享的翻译单元
 *
 * **可重入**：类型声明的元函数在解析过程中运行，它们通过 `clone()` 得到的
 * 子解析器解析新生成的代码片段；子解析器与父解析器共享错误列表与生成声明列表。
 */

import { Node } from './ast/ast.js';
import { visitTree } from './ast/ast_visitor.js';
import type { AstVisitor } from './ast/ast_visitor.js';
import type { DeclarationNode, Position, StatementNode, Token, TranslationUnitNode } from './types.js';
import { comparePositions } from './types.js';
import { Diagnostics, toDiagnostic } from './diagnostics/diagnostics.js';
import type { ErrorList } from './diagnostics/error-list.js';
import type { GeneratedTokenBuffer } from './frontend/token-store.js';
import { createParserContext } from './parser/context.js';
import type { ParserContext } from './parser/context.js';
import { MetafunctionFailure, collectTopLevelDecls } from './parser/decl-parser.js';
import { parseStatement } from './parser/stmt-parser.js';
import { spanFromSources } from './parser/span-utils.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('parser');

/**
 * 元函数运行时可用的解析环境
 */
export interface MetafunctionEnvironment {
  /** 正在解析该类型的解析器；需要解析片段时用它的 clone() */
  readonly parser: Parser;
  readonly errors: ErrorList;
  readonly generated: GeneratedTokenBuffer;
  /** 需要放到翻译单元顶层的生成声明，在当前顶层声明之后依次追加 */
  readonly generatedDeclarations: DeclarationNode[];
}

/**
 * 对一个解析完毕的类型声明依次应用它的元函数。
 *
 * @returns 任一元函数失败时返回 false
 */
export type MetafunctionApplier = (decl: DeclarationNode, env: MetafunctionEnvironment) => boolean;

export interface ParserOptions {
  /** 缺省时带元函数的类型保持原样 */
  readonly applyMetafunctions?: MetafunctionApplier;
}

export class Parser {
  private readonly unit: TranslationUnitNode = Node.TranslationUnit();
  private readonly functionBodyExtents: Array<{ first: number; last: number }> = [];
  private aborted = false;

  constructor(
    private readonly errors: ErrorList,
    private readonly options: ParserOptions = {},
    private readonly generatedDeclarations: DeclarationNode[] = []
  ) {}

  /**
   * 解析一个 token 段，把其中的声明追加到翻译单元。
   *
   * @returns 本次调用没有新增任何错误时返回 true
   */
  parse(tokens: readonly Token[], generated: GeneratedTokenBuffer): boolean {
    const before = this.errors.size;
    const ctx = this.createContext(tokens, generated);
    logger.debug('Parsing token section', { tokens: tokens.length });

    const completed = collectTopLevelDecls(ctx, decl => {
      this.unit.declarations.push(decl);
      this.drainGeneratedDeclarations();
    });
    this.recordFunctionBodies(ctx);
    this.updateUnitSpan();

    if (!completed) {
      this.aborted = true;
      logger.debug('Parsing stopped after a metafunction failure');
    }
    return completed && this.errors.size === before;
  }

  /**
   * 把 token 序列解析为单条语句（通常是一条声明），供元函数拼接生成的代码。
   *
   * @returns 出错时记录错误并返回 null
   */
  parseOneDeclaration(tokens: readonly Token[], generated: GeneratedTokenBuffer): StatementNode | null {
    const ctx = this.createContext(tokens, generated);
    try {
      const stmt = parseStatement(ctx, { semicolonRequired: true });
      if (!ctx.done()) {
        this.errors.add(Diagnostics.unexpectedEndOfSection(ctx.curr().start).build());
        return null;
      }
      return stmt;
    } catch (e) {
      if (e instanceof MetafunctionFailure) return null;
      this.errors.add(toDiagnostic(e, ctx.curr().start));
      return null;
    } finally {
      this.recordFunctionBodies(ctx);
    }
  }

  /** 某次 parse 因元函数失败而中止；此后不应再解析同一翻译单元的其余部分 */
  hasAborted(): boolean {
    return this.aborted;
  }

  getTranslationUnit(): TranslationUnitNode {
    return this.unit;
  }

  /** 起始位置落在 token 范围内的顶层声明 */
  getParseTreeDeclarationsInRange(tokenRange: readonly Token[]): DeclarationNode[] {
    const first = tokenRange[0];
    const last = tokenRange[tokenRange.length - 1];
    if (first === undefined || last === undefined) return [];
    return this.unit.declarations.filter(
      decl => comparePositions(decl.span.start, first.start) >= 0 && comparePositions(decl.span.start, last.end) <= 0
    );
  }

  visit(visitor: AstVisitor): void {
    visitTree(this.unit, visitor);
  }

  isWithinFunctionBody(pos: Position): boolean {
    return this.functionBodyExtents.some(extent => extent.first <= pos.line && pos.line <= extent.last);
  }

  /** 共享错误列表与生成声明列表，但拥有自己的翻译单元 */
  clone(): Parser {
    return new Parser(this.errors, this.options, this.generatedDeclarations);
  }

  private createContext(tokens: readonly Token[], generated: GeneratedTokenBuffer): ParserContext {
    const ctx = createParserContext(tokens, this.errors, generated);
    const applier = this.options.applyMetafunctions;
    if (applier) {
      ctx.applyMetafunctions = decl =>
        applier(decl, {
          parser: this,
          errors: this.errors,
          generated,
          generatedDeclarations: this.generatedDeclarations,
        });
    }
    return ctx;
  }

  private drainGeneratedDeclarations(): void {
    const pending = this.generatedDeclarations.splice(0);
    this.unit.declarations.push(...pending);
  }

  private recordFunctionBodies(ctx: ParserContext): void {
    this.functionBodyExtents.push(...ctx.functionBodyExtents);
  }

  private updateUnitSpan(): void {
    const [first, ...rest] = this.unit.declarations;
    if (first !== undefined) {
      this.unit.span = spanFromSources(first, ...rest);
    }
  }
}
