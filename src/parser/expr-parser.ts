/**
 * @module parser/expr-parser
 *
 * 表达式解析：从 primary 到 assignment 的优先级阶梯，以及标识、类型标识与模板实参。
 *
 * 所有二元层级共用 parseBinary：最左项加上扁平的 `(运算符, 项)` 列表，左结合。
 * 在模板实参列表中禁止 `<`/`>`/`<<`/`>>` 等尖括号运算符（直到再次进入圆括号），
 * 在别名的 requires 子句中禁止 `==`/`!=`。
 */

import type {
  AdditiveExpressionNode,
  AssignmentExpressionNode,
  BinaryExpressionNode,
  BinaryLevel,
  BitAndExpressionNode,
  BitOrExpressionNode,
  BitXorExpressionNode,
  CompareExpressionNode,
  EqualityExpressionNode,
  ExpressionListNode,
  ExpressionNode,
  IdExpressionNode,
  InspectExpressionNode,
  IsAsExpressionNode,
  LogicalAndExpressionNode,
  LogicalOrExpressionNode,
  MultiplicativeExpressionNode,
  PassingStyle,
  PostfixExpressionNode,
  PrefixExpressionNode,
  PrimaryExpressionNode,
  QualifiedIdTerm,
  RelationalExpressionNode,
  ShiftExpressionNode,
  Span,
  TemplateArgument,
  Token,
  TypeIdNode,
  UnqualifiedIdNode,
} from '../types.js';
import { TokenKind, isAssignmentOperator, isLiteralKind, isPostfixOperator, isPrefixOperator } from '../frontend/tokens.js';
import { DiagnosticCode } from '../diagnostics/diagnostics.js';
import { Node } from '../ast/ast.js';
import type { ParserContext } from './context.js';
import { expectToken, fail, isAdjacent, report } from './parser-tools.js';
import { assignSpan, finishSpan, spanFromSources, spanFromTokens } from './span-utils.js';
import { parseUnnamedDeclaration } from './decl-parser.js';
import { parseStatement } from './stmt-parser.js';

export interface ExpressionOptions {
  /** 允许 `<` `>` `<=` `>=` `<<` `>>` `<<=` `>>=` */
  readonly allowAngle: boolean;
  /** 允许 `==` `!=` */
  readonly allowEquality: boolean;
}

export const DEFAULT_EXPRESSION_OPTIONS: ExpressionOptions = { allowAngle: true, allowEquality: true };

/** 不能作为 id-expression 出现在表达式开头的关键字 */
const NON_PRIMARY_KEYWORDS = new Set([
  'is',
  'as',
  'if',
  'else',
  'return',
  'while',
  'do',
  'for',
  'break',
  'continue',
  'using',
  'inspect',
  'throws',
  'const',
  'virtual',
  'public',
  'private',
  'protected',
  'namespace',
  'operator',
]);

const ARGUMENT_PASSES: ReadonlySet<string> = new Set(['out', 'move', 'forward']);

/** 可以作为标识使用的 token */
export function isIdToken(tok: Token): boolean {
  switch (tok.kind) {
    case TokenKind.Identifier:
    case TokenKind.Cpp2FixedType:
    case TokenKind.Cpp1MultiKeyword:
      return true;
    case TokenKind.Keyword:
      return !NON_PRIMARY_KEYWORDS.has(tok.value);
    default:
      return false;
  }
}

function startsExpression(tok: Token): boolean {
  return (
    tok.kind === TokenKind.Identifier ||
    tok.kind === TokenKind.Keyword ||
    tok.kind === TokenKind.LeftParen ||
    isLiteralKind(tok.kind)
  );
}

// ============================================================
// 标识与类型
// ============================================================

function parseTemplateArgument(ctx: ParserContext): TemplateArgument {
  if (ctx.at(TokenKind.Multiply) || ctx.atWord('const')) {
    return parseTypeId(ctx);
  }
  const expr = ctx.attempt(() => parseExpression(ctx, { allowAngle: false, allowEquality: true }));
  return expr ?? parseTypeId(ctx);
}

function atTemplateClose(ctx: ParserContext): boolean {
  return ctx.at(TokenKind.Greater) || ctx.at(TokenKind.RightShift);
}

/**
 * 试探解析紧跟在标识之后的模板实参列表；失败时游标不动。
 */
function parseTemplateArgs(ctx: ParserContext, node: UnqualifiedIdNode): void {
  const parsed = ctx.attempt(() => {
    const open = ctx.expect(TokenKind.Less, '<');
    const args: TemplateArgument[] = [];
    while (!atTemplateClose(ctx)) {
      args.push(parseTemplateArgument(ctx));
      if (!ctx.at(TokenKind.Comma)) break;
      ctx.next();
    }
    if (ctx.at(TokenKind.RightShift)) ctx.splitRightShift();
    const close = ctx.expect(TokenKind.Greater, '>');
    return { open, close, args };
  });
  if (parsed === null) return;
  node.openAngle = parsed.open;
  node.closeAngle = parsed.close;
  node.templateArgs.push(...parsed.args);
  assignSpan(node, spanFromTokens(node.identifier, parsed.close));
}

export function parseUnqualifiedId(ctx: ParserContext): UnqualifiedIdNode {
  const tok = ctx.curr();
  if (!isIdToken(tok) && tok.kind !== TokenKind.Ellipsis) {
    fail(ctx, 'expected identifier', { code: DiagnosticCode.P001_ExpectedIdentifier });
  }
  ctx.next();
  const node = Node.UnqualifiedId(tok);
  if ((tok.kind === TokenKind.Identifier || tok.kind === TokenKind.Keyword) && ctx.at(TokenKind.Less)) {
    parseTemplateArgs(ctx, node);
  }
  return node;
}

const FORBIDDEN_STD_NAMES: ReadonlyMap<string, string> = new Map([
  ['move', "std::move is not needed in Cpp2 - use 'move' parameters/arguments instead"],
  ['forward', "std::forward is not needed in Cpp2 - use 'forward' parameters/arguments instead"],
]);

export function parseIdExpression(ctx: ParserContext): IdExpressionNode {
  const startTok = ctx.curr();
  const leading = ctx.at(TokenKind.Scope) ? ctx.next() : null;
  const first = parseUnqualifiedId(ctx);
  if (leading === null && !ctx.at(TokenKind.Scope)) {
    return Node.IdExpression(first);
  }

  const ids: QualifiedIdTerm[] = [{ scopeOp: leading, id: first }];
  while (ctx.at(TokenKind.Scope)) {
    const scopeOp = ctx.next();
    ids.push({ scopeOp, id: parseUnqualifiedId(ctx) });
  }

  const second = ids[1];
  if (ids.length === 2 && leading === null && first.identifier.value === 'std' && second) {
    const message = FORBIDDEN_STD_NAMES.get(second.id.identifier.value);
    if (message) {
      report(ctx, message, { includeCurrentToken: false, pos: startTok.start, code: DiagnosticCode.P009_InvalidQualifiedId });
    }
  }

  const qualified = finishSpan(ctx, Node.QualifiedId(ids), startTok);
  return Node.IdExpression(qualified);
}

/**
 * type-id：`*`/`const` 限定符序列加上（限定的）标识。
 */
export function parseTypeId(ctx: ParserContext): TypeIdNode {
  const startTok = ctx.curr();
  const qualifiers: Token[] = [];
  while (ctx.at(TokenKind.Multiply) || ctx.atWord('const')) {
    qualifiers.push(ctx.next());
  }
  if (!ctx.at(TokenKind.Scope) && !isIdToken(ctx.curr())) {
    fail(ctx, 'expected type-id', { code: DiagnosticCode.P002_ExpectedTypeId });
  }
  const id = parseIdExpression(ctx).id;
  const node = Node.TypeId(qualifiers, id);

  const prev = ctx.previous();
  if (prev && ctx.at(TokenKind.Ampersand) && isAdjacent(prev, ctx.curr())) {
    node.addressOf = ctx.next();
  } else {
    while (ctx.at(TokenKind.Multiply)) {
      const last = ctx.previous();
      if (!last || !isAdjacent(last, ctx.curr())) break;
      node.dereferenceOf = ctx.next();
      node.dereferenceCount++;
    }
  }
  return finishSpan(ctx, node, startTok);
}

// ============================================================
// primary / postfix / prefix
// ============================================================

/**
 * expression-list，直到 close（不含）。每一项前面可以有 out/move/forward。
 */
export function parseExpressionList(
  ctx: ParserContext,
  open: Token | null,
  close: TokenKind,
  closeText: string
): ExpressionListNode {
  const list = Node.ExpressionList(open);
  while (!ctx.at(close)) {
    let pass: PassingStyle = 'in';
    const word = ctx.curr();
    if (word.kind === TokenKind.Identifier && ARGUMENT_PASSES.has(word.value) && startsExpression(ctx.peek(1))) {
      pass = word.value === 'out' ? 'out' : word.value === 'move' ? 'move' : 'forward';
      ctx.next();
    }
    list.expressions.push({ pass, expr: parseExpression(ctx, DEFAULT_EXPRESSION_OPTIONS) });
    if (!ctx.at(TokenKind.Comma)) break;
    ctx.next();
  }
  list.closeParen = expectToken(ctx, close, `'${closeText}'`);
  return assignSpan(list, spanFromTokens(open ?? list.closeParen, list.closeParen));
}

function parseLiteral(ctx: ParserContext): PrimaryExpressionNode {
  const tok = ctx.next();
  const suffixTok = ctx.curr();
  const suffix = suffixTok.kind === TokenKind.UserDefinedLiteralSuffix && isAdjacent(tok, suffixTok) ? ctx.next() : null;
  return Node.PrimaryExpression(Node.Literal(tok, suffix));
}

export function atInspect(ctx: ParserContext): boolean {
  if (!ctx.atWord('inspect')) return false;
  switch (ctx.peek(1).kind) {
    case TokenKind.Colon:
    case TokenKind.Assignment:
    case TokenKind.Semicolon:
    case TokenKind.Dot:
    case TokenKind.Comma:
    case TokenKind.RightParen:
    case TokenKind.None:
      return false;
    default:
      return true;
  }
}

function parsePrimary(ctx: ParserContext): PrimaryExpressionNode {
  const tok = ctx.curr();

  if (tok.kind === TokenKind.LeftParen) {
    ctx.next();
    const list = parseExpressionList(ctx, tok, TokenKind.RightParen, ')');
    return Node.PrimaryExpression(list);
  }

  if (isLiteralKind(tok.kind)) {
    return parseLiteral(ctx);
  }

  if (tok.kind === TokenKind.Colon) {
    const decl = parseUnnamedDeclaration(ctx, { identifier: null, startTok: tok, semicolonRequired: false });
    return Node.PrimaryExpression(decl);
  }

  if (atInspect(ctx)) {
    return Node.PrimaryExpression(parseInspect(ctx, true));
  }

  if (tok.kind === TokenKind.Ellipsis) {
    ctx.next();
    return Node.PrimaryExpression(Node.IdExpression(Node.UnqualifiedId(tok)));
  }

  if (isIdToken(tok) || tok.kind === TokenKind.Scope) {
    return Node.PrimaryExpression(parseIdExpression(ctx));
  }

  return fail(ctx, 'expected expression', { code: DiagnosticCode.P005_ExpectedExpression });
}

function isDisallowedAfterDereference(tok: Token): boolean {
  return tok.kind === TokenKind.LeftParen || tok.kind === TokenKind.Identifier || isLiteralKind(tok.kind);
}

export function parsePostfix(ctx: ParserContext): PostfixExpressionNode {
  const startTok = ctx.curr();
  const node = Node.PostfixExpression(parsePrimary(ctx));

  for (;;) {
    const tok = ctx.curr();
    const prev = ctx.previous();

    if (tok.kind === TokenKind.LeftParen || tok.kind === TokenKind.LeftBracket) {
      ctx.next();
      const close = tok.kind === TokenKind.LeftParen ? TokenKind.RightParen : TokenKind.RightBracket;
      const list = parseExpressionList(ctx, tok, close, close === TokenKind.RightParen ? ')' : ']');
      node.ops.push({ op: tok, idExpr: null, exprList: list, opClose: list.closeParen });
      continue;
    }

    if (tok.kind === TokenKind.Dot) {
      ctx.next();
      node.ops.push({ op: tok, idExpr: parseIdExpression(ctx), exprList: null, opClose: null });
      continue;
    }

    if (!isPostfixOperator(tok.kind) || prev === null || !isAdjacent(prev, tok)) break;

    if (
      (tok.kind === TokenKind.Multiply || tok.kind === TokenKind.Ampersand) &&
      isDisallowedAfterDereference(ctx.peek(1))
    ) {
      fail(
        ctx,
        `postfix unary ${tok.value} cannot be immediately followed by a (, identifier, or literal - add whitespace before ${tok.value} here if you meant binary ${tok.value}`,
        { includeCurrentToken: false }
      );
    }

    if (tok.kind === TokenKind.Dollar) {
      const group = ctx.captureGroups[ctx.captureGroups.length - 1];
      if (group === undefined) {
        fail(
          ctx,
          '$ (capture) can appear only in an anonymous expression function, a postcondition, or an interpolated string literal',
          { code: DiagnosticCode.P008_InvalidCapture }
        );
      }
      if (node.capGrp !== null) {
        fail(ctx, '$ (capture) can appear at most once in a single postfix-expression', {
          code: DiagnosticCode.P008_InvalidCapture,
        });
      }
      ctx.next();
      node.ops.push({ op: tok, idExpr: null, exprList: null, opClose: null });
      node.capGrp = group;
      group.add(node);
      continue;
    }

    ctx.next();
    node.ops.push({ op: tok, idExpr: null, exprList: null, opClose: null });
  }

  return finishSpan(ctx, node, startTok);
}

function parsePrefix(ctx: ParserContext): PrefixExpressionNode {
  const startTok = ctx.curr();
  const ops: Token[] = [];
  while (isPrefixOperator(ctx.curr().kind)) {
    ops.push(ctx.next());
  }
  const node = Node.PrefixExpression(ops, parsePostfix(ctx));
  return finishSpan(ctx, node, startTok);
}

function parseIsAs(ctx: ParserContext): IsAsExpressionNode {
  const startTok = ctx.curr();
  const node = Node.IsAsExpression(parsePrefix(ctx));
  while (ctx.at(TokenKind.Keyword, 'is') || ctx.at(TokenKind.Keyword, 'as')) {
    const op = ctx.next();
    const type = ctx.attempt(() => parseTypeId(ctx));
    if (type) {
      node.ops.push({ op, type, expr: null });
    } else {
      node.ops.push({ op, type: null, expr: parsePrefix(ctx) });
    }
  }
  return finishSpan(ctx, node, startTok);
}

// ============================================================
// 二元层级
// ============================================================

function parseBinary<L extends BinaryLevel, T extends { span: Span }>(
  ctx: ParserContext,
  level: L,
  isOperator: (tok: Token) => boolean,
  term: () => T
): BinaryExpressionNode<L, T> {
  const first = term();
  const node = Node.BinaryExpression(level, first, first.span);
  let last: T = first;
  while (isOperator(ctx.curr())) {
    const op = ctx.next();
    last = term();
    node.terms.push({ op, expr: last });
  }
  return assignSpan(node, spanFromSources(first, last));
}

const kindIs =
  (...kinds: TokenKind[]) =>
  (tok: Token): boolean =>
    kinds.includes(tok.kind);

function parseMultiplicative(ctx: ParserContext): MultiplicativeExpressionNode {
  return parseBinary(ctx, 'multiplicative', kindIs(TokenKind.Multiply, TokenKind.Slash, TokenKind.Modulo), () =>
    parseIsAs(ctx)
  );
}

function parseAdditive(ctx: ParserContext): AdditiveExpressionNode {
  return parseBinary(ctx, 'additive', kindIs(TokenKind.Plus, TokenKind.Minus), () => parseMultiplicative(ctx));
}

function parseShift(ctx: ParserContext, opts: ExpressionOptions): ShiftExpressionNode {
  const isOp = opts.allowAngle ? kindIs(TokenKind.LeftShift, TokenKind.RightShift) : (): boolean => false;
  return parseBinary(ctx, 'shift', isOp, () => parseAdditive(ctx));
}

function parseCompare(ctx: ParserContext, opts: ExpressionOptions): CompareExpressionNode {
  return parseBinary(ctx, 'compare', kindIs(TokenKind.Spaceship), () => parseShift(ctx, opts));
}

function parseRelational(ctx: ParserContext, opts: ExpressionOptions): RelationalExpressionNode {
  const isOp = opts.allowAngle
    ? kindIs(TokenKind.Less, TokenKind.Greater, TokenKind.LessEq, TokenKind.GreaterEq)
    : (): boolean => false;
  return parseBinary(ctx, 'relational', isOp, () => parseCompare(ctx, opts));
}

function parseEquality(ctx: ParserContext, opts: ExpressionOptions): EqualityExpressionNode {
  const isOp = opts.allowEquality
    ? kindIs(TokenKind.EqualComparison, TokenKind.NotEqualComparison)
    : (): boolean => false;
  return parseBinary(ctx, 'equality', isOp, () => parseRelational(ctx, opts));
}

function parseBitAnd(ctx: ParserContext, opts: ExpressionOptions): BitAndExpressionNode {
  return parseBinary(ctx, 'bitand', kindIs(TokenKind.Ampersand), () => parseEquality(ctx, opts));
}

function parseBitXor(ctx: ParserContext, opts: ExpressionOptions): BitXorExpressionNode {
  return parseBinary(ctx, 'bitxor', kindIs(TokenKind.Caret), () => parseBitAnd(ctx, opts));
}

function parseBitOr(ctx: ParserContext, opts: ExpressionOptions): BitOrExpressionNode {
  return parseBinary(ctx, 'bitor', kindIs(TokenKind.Pipe), () => parseBitXor(ctx, opts));
}

function parseLogicalAnd(ctx: ParserContext, opts: ExpressionOptions): LogicalAndExpressionNode {
  return parseBinary(ctx, 'logicaland', kindIs(TokenKind.LogicalAnd), () => parseBitOr(ctx, opts));
}

export function parseLogicalOr(
  ctx: ParserContext,
  opts: ExpressionOptions = DEFAULT_EXPRESSION_OPTIONS
): LogicalOrExpressionNode {
  return parseBinary(ctx, 'logicalor', kindIs(TokenKind.LogicalOr), () => parseLogicalAnd(ctx, opts));
}

export function parseAssignment(
  ctx: ParserContext,
  opts: ExpressionOptions = DEFAULT_EXPRESSION_OPTIONS
): AssignmentExpressionNode {
  const isOp = (tok: Token): boolean =>
    isAssignmentOperator(tok.kind) &&
    (opts.allowAngle || (tok.kind !== TokenKind.LeftShiftEq && tok.kind !== TokenKind.RightShiftEq));
  return parseBinary(ctx, 'assignment', isOp, () => parseLogicalOr(ctx, opts));
}

export function parseExpression(
  ctx: ParserContext,
  opts: ExpressionOptions = DEFAULT_EXPRESSION_OPTIONS
): ExpressionNode {
  return Node.Expression(parseAssignment(ctx, opts));
}

// ============================================================
// inspect
// ============================================================

function parseAlternative(ctx: ParserContext): InspectExpressionNode['alternatives'][number] {
  const startTok = ctx.curr();
  let name: UnqualifiedIdNode | null = null;
  if (isIdToken(ctx.curr()) && ctx.peek(1).kind === TokenKind.Colon) {
    name = parseUnqualifiedId(ctx);
    ctx.next();
  }
  if (!ctx.at(TokenKind.Keyword, 'is') && !ctx.at(TokenKind.Keyword, 'as')) {
    fail(ctx, "expected 'is' or 'as' at start of inspect alternative");
  }
  const isAs = ctx.next();
  const typeId = ctx.attempt(() => {
    const t = parseTypeId(ctx);
    if (!ctx.at(TokenKind.Assignment)) fail(ctx, "expected '='");
    return t;
  });
  const value = typeId === null ? parsePostfix(ctx) : null;
  const equalSign = expectToken(ctx, TokenKind.Assignment, "'=' after inspect alternative pattern");
  const statement = parseStatement(ctx, { semicolonRequired: true });
  return finishSpan(ctx, Node.Alternative(name, isAs, typeId, value, equalSign, statement), startTok);
}

/**
 * `inspect constexpr? expression (-> type-id)? { alternative* }`
 *
 * @param isExpression - 作为表达式使用时必须带 `-> type-id`
 */
export function parseInspect(ctx: ParserContext, isExpression: boolean): InspectExpressionNode {
  const identifier = ctx.next();
  let isConstexpr = false;
  if (ctx.atWord('constexpr')) {
    ctx.next();
    isConstexpr = true;
  }
  const expression = parseExpression(ctx);
  let resultType: TypeIdNode | null = null;
  if (ctx.at(TokenKind.Arrow)) {
    ctx.next();
    resultType = parseTypeId(ctx);
  } else if (isExpression) {
    fail(ctx, "an inspect expression must have an '-> result_type' specification");
  }
  const openBrace = expectToken(ctx, TokenKind.LeftBrace, "'{' to start inspect alternatives");
  const node = Node.InspectExpression(isConstexpr, identifier, expression, resultType, openBrace);
  while (!ctx.at(TokenKind.RightBrace)) {
    if (ctx.done()) fail(ctx, "expected '}' at end of inspect");
    node.alternatives.push(parseAlternative(ctx));
  }
  node.closeBrace = ctx.next();
  if (node.alternatives.length === 0) {
    report(ctx, 'an inspect expression must have at least one alternative', { includeCurrentToken: false, pos: openBrace.start });
  }
  return finishSpan(ctx, node, identifier);
}
