/**
 * 解析器工具函数集合
 * 提供错误报告与常用的 token 判断
 */

import { TokenKind } from '../frontend/tokens.js';
import type { Position, Token } from '../types.js';
import { DiagnosticCode, Diagnostics } from '../diagnostics/diagnostics.js';
import type { ParserContext } from './context.js';

export interface ErrorOptions {
  /** 在消息后附加 `(at '当前 token')`，默认 true */
  readonly includeCurrentToken?: boolean;
  readonly pos?: Position;
  readonly code?: DiagnosticCode;
}

function describeToken(tok: Token): string {
  return tok.kind === TokenKind.None ? 'end of section' : tok.value;
}

function buildMessage(ctx: ParserContext, msg: string, options: ErrorOptions): string {
  if (options.includeCurrentToken === false) return msg;
  return `${msg} (at '${describeToken(ctx.curr())}')`;
}

/**
 * 报告解析错误并中止当前声明
 */
export function fail(ctx: ParserContext, msg: string, options: ErrorOptions = {}): never {
  const pos = options.pos ?? ctx.curr().start;
  return Diagnostics.syntax(options.code ?? DiagnosticCode.P004_UnexpectedToken, buildMessage(ctx, msg, options), pos).throw();
}

/**
 * 记录一条错误但继续解析
 */
export function report(ctx: ParserContext, msg: string, options: ErrorOptions = {}): void {
  const pos = options.pos ?? ctx.curr().start;
  ctx.errors.add(
    Diagnostics.syntax(options.code ?? DiagnosticCode.P004_UnexpectedToken, buildMessage(ctx, msg, options), pos).build()
  );
}

/** 消费给定文本的标识符或关键字，否则报错 */
export function expectWord(ctx: ParserContext, word: string): Token {
  if (!ctx.atWord(word)) {
    fail(ctx, `expected '${word}'`, { code: DiagnosticCode.P003_ExpectedToken });
  }
  return ctx.next();
}

/** 消费给定类型的 token，否则以 `expected <what>` 报错 */
export function expectToken(ctx: ParserContext, kind: TokenKind, what: string): Token {
  if (!ctx.at(kind)) {
    fail(ctx, `expected ${what}`, { code: DiagnosticCode.P003_ExpectedToken });
  }
  return ctx.next();
}

export function isIdentifierLike(tok: Token): boolean {
  return tok.kind === TokenKind.Identifier || tok.kind === TokenKind.Keyword;
}

/** 两个 token 在源码中紧挨着（中间没有空白） */
export function isAdjacent(prev: Token, tok: Token): boolean {
  return prev.end.line === tok.start.line && prev.end.col === tok.start.col;
}
