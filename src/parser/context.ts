import type { DeclarationNode, Position, Token } from '../types.js';
import { TokenKind } from '../frontend/tokens.js';
import { ConfigService } from '../config/config-service.js';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import type { ErrorList } from '../diagnostics/error-list.js';
import type { GeneratedTokenBuffer } from '../frontend/token-store.js';
import type { CaptureGroup } from '../ast/capture-group.js';
import { createLogger } from '../utils/logger.js';

/**
 * Parser 上下文接口
 * 包含当前 token 段、游标以及两个受保护的栈（捕获组、正在解析的声明）
 */
export interface ParserContext {
  /** 当前段 token 的副本；关闭模板实参列表时会把 `>>` 拆成两个 `>` */
  readonly tokens: Token[];
  index: number;
  readonly errors: ErrorList;
  readonly generated: GeneratedTokenBuffer;
  /** 当前打开的捕获组，最内层在末尾 */
  readonly captureGroups: CaptureGroup[];
  /** 正在解析的声明，最内层在末尾 */
  readonly currentDeclarations: DeclarationNode[];
  /** 已解析的函数体所覆盖的行区间 */
  readonly functionBodyExtents: Array<{ first: number; last: number }>;
  /** 类型声明解析完毕后应用其元函数；返回 false 表示失败 */
  applyMetafunctions: ((decl: DeclarationNode) => boolean) | null;
  debug: { enabled: boolean; depth: number; log(message: string): void };
  /** 当前 token；段已结束时返回位于段末尾的 None 哨兵 */
  curr(): Token;
  /** 查看相对当前位置第 offset 个 token */
  peek(offset?: number): Token;
  /** 消费当前 token 并前进 */
  next(): Token;
  done(): boolean;
  at(kind: TokenKind, value?: string): boolean;
  /** 当前 token 是给定文本的标识符或关键字 */
  atWord(value: string): boolean;
  expect(kind: TokenKind, what: string): Token;
  /** 上一个被消费的 token */
  previous(): Token | null;
  withCaptureGroup<T>(group: CaptureGroup, body: () => T): T;
  withDeclaration<T>(decl: DeclarationNode, body: () => T): T;
  /**
   * 试探性解析：body 抛出 DiagnosticError 时恢复游标、token 拆分与已打开的捕获组，并返回 null
   */
  attempt<T>(body: () => T): T | null;
  /** 把当前的 `>>` 拆成两个 `>`，新 token 存入生成缓冲区 */
  splitRightShift(): void;
  /** 在 pos 处生成一个新 token 并存入生成缓冲区 */
  generateToken(kind: TokenKind, value: string, pos: Position): Token;
}

interface SplitRecord {
  readonly index: number;
  readonly original: Token;
}

const parserLogger = createLogger('parser');

export function createParserContext(
  tokens: readonly Token[],
  errors: ErrorList,
  generated: GeneratedTokenBuffer
): ParserContext {
  const splits: SplitRecord[] = [];

  const sentinel = (): Token => {
    const last = ctx.tokens[ctx.tokens.length - 1];
    const pos = last ? last.end : { line: 1, col: 1 };
    return { kind: TokenKind.None, value: '', start: pos, end: pos };
  };

  const ctx: ParserContext = {
    tokens: [...tokens],
    index: 0,
    errors,
    generated,
    captureGroups: [],
    currentDeclarations: [],
    functionBodyExtents: [],
    applyMetafunctions: null,
    debug: {
      enabled: ConfigService.getInstance().debugParser,
      depth: 0,
      log: (message: string): void => {
        if (!ctx.debug.enabled) return;
        parserLogger.debug(`[parse] ${message}`, { depth: ctx.debug.depth, at: ctx.index });
      },
    },
    curr: (): Token => ctx.peek(0),
    peek: (offset = 0): Token => ctx.tokens[ctx.index + offset] ?? sentinel(),
    next: (): Token => {
      const tok = ctx.curr();
      if (ctx.index < ctx.tokens.length) ctx.index++;
      return tok;
    },
    done: (): boolean => ctx.index >= ctx.tokens.length,
    at: (kind: TokenKind, value?: string): boolean => {
      const t = ctx.curr();
      if (t.kind !== kind) return false;
      if (value === undefined) return true;
      return t.value === value;
    },
    atWord: (value: string): boolean => {
      const t = ctx.curr();
      return (t.kind === TokenKind.Identifier || t.kind === TokenKind.Keyword) && t.value === value;
    },
    expect: (kind: TokenKind, what: string): Token => {
      const tok = ctx.curr();
      if (tok.kind !== kind) {
        Diagnostics.expectedToken(what, tok.value, tok.start).throw();
      }
      return ctx.next();
    },
    previous: (): Token | null => ctx.tokens[ctx.index - 1] ?? null,
    withCaptureGroup: <T>(group: CaptureGroup, body: () => T): T => {
      ctx.captureGroups.push(group);
      try {
        return body();
      } finally {
        ctx.captureGroups.pop();
      }
    },
    withDeclaration: <T>(decl: DeclarationNode, body: () => T): T => {
      ctx.currentDeclarations.push(decl);
      ctx.debug.depth++;
      try {
        return body();
      } finally {
        ctx.debug.depth--;
        ctx.currentDeclarations.pop();
      }
    },
    attempt: <T>(body: () => T): T | null => {
      const savedIndex = ctx.index;
      const savedSplits = splits.length;
      const savedCaptures = ctx.captureGroups.map(group => ({ group, snapshot: group.snapshot() }));
      try {
        return body();
      } catch (e) {
        if (!(e instanceof DiagnosticError)) throw e;
        for (const { group, snapshot } of savedCaptures) group.restore(snapshot);
        while (splits.length > savedSplits) {
          const record = splits.pop();
          if (record) ctx.tokens.splice(record.index, 2, record.original);
        }
        ctx.index = savedIndex;
        return null;
      }
    },
    splitRightShift: (): void => {
      const original = ctx.curr();
      const second: Position = { line: original.start.line, col: original.start.col + 1 };
      const first = ctx.generateToken(TokenKind.Greater, '>', original.start);
      const rest: Token = { kind: TokenKind.Greater, value: '>', start: second, end: original.end };
      ctx.generated.push(rest);
      ctx.tokens.splice(ctx.index, 1, first, rest);
      splits.push({ index: ctx.index, original });
    },
    generateToken: (kind: TokenKind, value: string, pos: Position): Token => {
      const tok: Token = { kind, value, start: pos, end: { line: pos.line, col: pos.col + value.length } };
      return ctx.generated.push(tok);
    },
  };

  return ctx;
}
