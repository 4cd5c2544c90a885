import type { ParserContext } from './context.js';
import type { Position, Span, Token } from '../types.js';
import { comparePositions } from '../types.js';

type SpanSource = Token | { span: Span };

function clonePosition(pos: Position): Position {
  return { line: pos.line, col: pos.col };
}

export function spanFromTokens(start: Token, end: Token): Span {
  return {
    start: clonePosition(start.start),
    end: clonePosition(end.end),
  };
}

function toSpan(source: SpanSource): Span {
  if ('span' in source) {
    return source.span;
  }
  return {
    start: source.start,
    end: source.end,
  };
}

export function spanFromSources(first: SpanSource, ...rest: SpanSource[]): Span {
  let { start, end } = toSpan(first);
  for (const source of rest) {
    const span = toSpan(source);
    if (comparePositions(span.start, start) < 0) start = span.start;
    if (comparePositions(span.end, end) > 0) end = span.end;
  }
  return { start: clonePosition(start), end: clonePosition(end) };
}

/** 最近一次消费的 token；尚未消费任何 token 时返回当前 token */
export function lastConsumedToken(ctx: ParserContext): Token {
  return ctx.previous() ?? ctx.curr();
}

export function assignSpan<T extends { span: Span }>(node: T, span: Span): T {
  node.span = span;
  return node;
}

/** 节点范围：从 startTok 到最近一次消费的 token */
export function finishSpan<T extends { span: Span }>(ctx: ParserContext, node: T, startTok: Token): T {
  return assignSpan(node, spanFromTokens(startTok, lastConsumedToken(ctx)));
}
