/**
 * @module parser/stmt-parser
 *
 * 语句解析：复合、选择、返回、循环、using、跳转、契约、inspect、声明与表达式语句。
 */

import type {
  CompoundStatementNode,
  ContractKind,
  ContractNode,
  IterationStatementNode,
  ParameterDeclarationListNode,
  StatementKindNode,
  StatementNode,
  Token,
} from '../types.js';
import { TokenKind } from '../frontend/tokens.js';
import { DiagnosticCode } from '../diagnostics/diagnostics.js';
import { Node } from '../ast/ast.js';
import { CaptureGroup } from '../ast/capture-group.js';
import type { ParserContext } from './context.js';
import { expectToken, fail, isIdentifierLike } from './parser-tools.js';
import { finishSpan } from './span-utils.js';
import { atInspect, parseAssignment, parseExpression, parseIdExpression, parseInspect, parseLogicalOr } from './expr-parser.js';
import { looksLikeDeclaration, parseDeclaration, parseParameter, parseParameterList } from './decl-parser.js';

export interface StatementOptions {
  /** 表达式语句是否必须以 `;` 结尾，默认 true */
  readonly semicolonRequired?: boolean;
  /** 复合语句内只允许声明（类型体、命名空间体） */
  readonly declarationsOnly?: boolean;
  /** 类型体内 `name;` 视为 `name: _;` */
  readonly inTypeScope?: boolean;
}

const PASS_WORDS: ReadonlySet<string> = new Set(['in', 'copy', 'inout', 'out', 'move', 'forward']);

const LOOP_WORDS: ReadonlySet<string> = new Set(['while', 'do', 'for']);

/** `(` 之后是参数形式（`copy i`、`i:`）时视为语句参数列表 */
function atStatementParameters(ctx: ParserContext): boolean {
  if (!ctx.at(TokenKind.LeftParen)) return false;
  const first = ctx.peek(1);
  const second = ctx.peek(2);
  if (first.kind === TokenKind.Identifier && PASS_WORDS.has(first.value) && isIdentifierLike(second)) return true;
  return isIdentifierLike(first) && second.kind === TokenKind.Colon;
}

function atLoopLabel(ctx: ParserContext): boolean {
  const label = ctx.curr();
  const loop = ctx.peek(2);
  return (
    label.kind === TokenKind.Identifier &&
    ctx.peek(1).kind === TokenKind.Colon &&
    loop.kind === TokenKind.Keyword &&
    LOOP_WORDS.has(loop.value)
  );
}

export function atContract(ctx: ParserContext): boolean {
  return ctx.at(TokenKind.LeftBracket) && ctx.peek(1).kind === TokenKind.LeftBracket;
}

// ============================================================
// 各类语句
// ============================================================

export function parseCompound(ctx: ParserContext, opts: StatementOptions = {}): CompoundStatementNode {
  const open = expectToken(ctx, TokenKind.LeftBrace, "'{'");
  return parseCompoundBody(ctx, Node.CompoundStatement(open), opts);
}

/** 从 `{` 之后解析到 `}`。compound 可以在解析前就挂到树上 */
export function parseCompoundBody(
  ctx: ParserContext,
  compound: CompoundStatementNode,
  opts: StatementOptions = {}
): CompoundStatementNode {
  while (!ctx.at(TokenKind.RightBrace)) {
    if (ctx.done()) {
      fail(ctx, "expected '}' at end of compound statement", { code: DiagnosticCode.P010_UnexpectedEndOfSection });
    }
    const stmt = parseStatement(ctx, {
      semicolonRequired: true,
      declarationsOnly: opts.declarationsOnly,
      inTypeScope: opts.inTypeScope,
    });
    stmt.compoundParent = compound;
    compound.statements.push(stmt);
  }
  compound.closeBrace = ctx.next();
  return finishSpan(ctx, compound, compound.openBrace);
}

function parseSelection(ctx: ParserContext): StatementKindNode {
  const keyword = ctx.next();
  let isConstexpr = false;
  if (ctx.atWord('constexpr')) {
    ctx.next();
    isConstexpr = true;
  }
  const condition = parseLogicalOr(ctx);
  if (!ctx.at(TokenKind.LeftBrace)) {
    fail(ctx, "invalid if branch body - an if branch must be a compound statement { }", {
      code: DiagnosticCode.P007_InvalidStatement,
    });
  }
  const trueBranch = parseCompound(ctx);
  let falseBranch: StatementNode | null = null;
  if (ctx.atWord('else')) {
    ctx.next();
    if (ctx.atWord('if')) {
      const startTok = ctx.curr();
      falseBranch = finishSpan(ctx, Node.Statement(parseSelection(ctx)), startTok);
    } else if (ctx.at(TokenKind.LeftBrace)) {
      const startTok = ctx.curr();
      falseBranch = finishSpan(ctx, Node.Statement(parseCompound(ctx)), startTok);
    } else {
      fail(ctx, "invalid else branch body - an else branch must be a compound statement { } or another if", {
        code: DiagnosticCode.P007_InvalidStatement,
      });
    }
  }
  return finishSpan(ctx, Node.SelectionStatement(isConstexpr, keyword, condition, trueBranch, falseBranch), keyword);
}

function parseReturn(ctx: ParserContext): StatementKindNode {
  const keyword = ctx.next();
  const expression = ctx.at(TokenKind.Semicolon) ? null : parseExpression(ctx);
  expectToken(ctx, TokenKind.Semicolon, "';' at end of return statement");
  return finishSpan(ctx, Node.ReturnStatement(keyword, expression), keyword);
}

function parseJump(ctx: ParserContext): StatementKindNode {
  const keyword = ctx.next();
  const label = ctx.at(TokenKind.Identifier) ? ctx.next() : null;
  expectToken(ctx, TokenKind.Semicolon, `';' at end of ${keyword.value} statement`);
  return finishSpan(ctx, Node.JumpStatement(keyword, label), keyword);
}

function parseUsing(ctx: ParserContext): StatementKindNode {
  const keyword = ctx.next();
  let forNamespace = false;
  if (ctx.atWord('namespace')) {
    ctx.next();
    forNamespace = true;
  }
  const id = parseIdExpression(ctx);
  expectToken(ctx, TokenKind.Semicolon, "';' at end of using statement");
  return finishSpan(ctx, Node.UsingStatement(keyword, forNamespace, id), keyword);
}

function parseNextClause(ctx: ParserContext): IterationStatementNode['nextExpression'] {
  if (!ctx.atWord('next')) return null;
  ctx.next();
  return parseAssignment(ctx);
}

function parseIteration(ctx: ParserContext): StatementKindNode {
  const startTok = ctx.curr();
  let label: Token | null = null;
  if (atLoopLabel(ctx)) {
    label = ctx.next();
    ctx.next();
  }
  const keyword = ctx.next();
  const empty = {
    label,
    identifier: keyword,
    condition: null,
    nextExpression: null,
    statements: null,
    range: null,
    parameter: null,
    body: null,
  };

  switch (keyword.value) {
    case 'while': {
      const condition = parseLogicalOr(ctx);
      const nextExpression = parseNextClause(ctx);
      const statements = parseCompound(ctx);
      return finishSpan(
        ctx,
        Node.IterationStatement({ ...empty, loopKind: 'while', condition, nextExpression, statements }),
        startTok
      );
    }
    case 'do': {
      const statements = parseCompound(ctx);
      if (!ctx.atWord('while')) fail(ctx, "expected 'while' after do loop body");
      ctx.next();
      const condition = parseLogicalOr(ctx);
      const nextExpression = parseNextClause(ctx);
      expectToken(ctx, TokenKind.Semicolon, "';' at end of do-while loop");
      return finishSpan(
        ctx,
        Node.IterationStatement({ ...empty, loopKind: 'do', condition, nextExpression, statements }),
        startTok
      );
    }
    default: {
      const range = parseExpression(ctx);
      const nextExpression = parseNextClause(ctx);
      if (!ctx.atWord('do')) fail(ctx, "expected 'do' after for range");
      ctx.next();
      expectToken(ctx, TokenKind.LeftParen, "'(' to start for loop parameter");
      const parameter = parseParameter(ctx, 'function', 1);
      expectToken(ctx, TokenKind.RightParen, "')' to end for loop parameter");
      const body = parseStatement(ctx);
      return finishSpan(
        ctx,
        Node.IterationStatement({ ...empty, loopKind: 'for', range, nextExpression, parameter, body }),
        startTok
      );
    }
  }
}

const CONTRACT_KINDS: ReadonlySet<string> = new Set(['pre', 'post', 'assert']);

function toContractKind(word: string): ContractKind {
  return word === 'pre' ? 'pre' : word === 'post' ? 'post' : 'assert';
}

/**
 * `[[kind group? : condition (, "message")?]]`
 *
 * 后置条件打开自己的捕获组，条件中的 `x$` 在函数入口处求值。
 */
export function parseContract(ctx: ParserContext): ContractNode {
  const open = ctx.next();
  ctx.next();
  const kindTok = ctx.curr();
  if (!isIdentifierLike(kindTok) || !CONTRACT_KINDS.has(kindTok.value)) {
    fail(ctx, "expected contract kind 'pre', 'post', or 'assert'");
  }
  ctx.next();
  const group = ctx.at(TokenKind.Colon) ? null : parseIdExpression(ctx);
  expectToken(ctx, TokenKind.Colon, "':' after contract kind");

  const captures = new CaptureGroup();
  const condition =
    kindTok.value === 'post'
      ? ctx.withCaptureGroup(captures, () => parseLogicalOr(ctx))
      : parseLogicalOr(ctx);

  let message: Token | null = null;
  if (ctx.at(TokenKind.Comma)) {
    ctx.next();
    message = expectToken(ctx, TokenKind.StringLiteral, 'string literal contract message');
  }
  expectToken(ctx, TokenKind.RightBracket, "']]' at end of contract");
  expectToken(ctx, TokenKind.RightBracket, "']]' at end of contract");
  return finishSpan(
    ctx,
    Node.Contract(open, toContractKind(kindTok.value), group, condition, message, captures),
    open
  );
}

function parseExpressionStatement(ctx: ParserContext, semicolonRequired: boolean): StatementKindNode {
  const startTok = ctx.curr();
  const expr = parseExpression(ctx);
  if (!semicolonRequired) {
    // 嵌在表达式里的初始化器：分号留给外层语句
    return finishSpan(ctx, Node.ExpressionStatement(expr, false), startTok);
  }
  if (!ctx.at(TokenKind.Semicolon)) {
    fail(ctx, "expected ';' at end of statement", { code: DiagnosticCode.P003_ExpectedToken });
  }
  ctx.next();
  return finishSpan(ctx, Node.ExpressionStatement(expr, true), startTok);
}

// ============================================================
// 分派
// ============================================================

function parseStatementKind(ctx: ParserContext, opts: StatementOptions): StatementKindNode {
  const semicolonRequired = opts.semicolonRequired ?? true;

  if (opts.declarationsOnly || opts.inTypeScope) {
    if (!looksLikeDeclaration(ctx, opts.inTypeScope ?? false)) {
      fail(
        ctx,
        opts.inTypeScope
          ? 'a user-defined type body must contain only declarations, not other code'
          : 'a namespace body must contain only declarations',
        { code: DiagnosticCode.P007_InvalidStatement }
      );
    }
    return parseDeclaration(ctx, { semicolonRequired: true, inTypeScope: opts.inTypeScope ?? false });
  }

  const tok = ctx.curr();
  if (tok.kind === TokenKind.LeftBrace) return parseCompound(ctx);
  if (atContract(ctx)) {
    const contract = parseContract(ctx);
    if (ctx.at(TokenKind.Semicolon)) ctx.next();
    return contract;
  }
  if (atInspect(ctx)) return parseInspect(ctx, false);
  if (atLoopLabel(ctx)) return parseIteration(ctx);

  if (tok.kind === TokenKind.Keyword) {
    switch (tok.value) {
      case 'if':
        return parseSelection(ctx);
      case 'return':
        return parseReturn(ctx);
      case 'break':
      case 'continue':
        return parseJump(ctx);
      case 'using':
        return parseUsing(ctx);
      case 'while':
      case 'do':
      case 'for':
        return parseIteration(ctx);
      default:
        break;
    }
  }

  if (looksLikeDeclaration(ctx, false)) {
    return parseDeclaration(ctx, { semicolonRequired, inTypeScope: false });
  }

  if (tok.kind === TokenKind.None) {
    fail(ctx, 'expected statement', { code: DiagnosticCode.P010_UnexpectedEndOfSection });
  }
  return parseExpressionStatement(ctx, semicolonRequired);
}

/**
 * 解析一条语句。语句若是声明，会把声明的 myStatement 指回这条语句。
 */
export function parseStatement(ctx: ParserContext, opts: StatementOptions = {}): StatementNode {
  const startTok = ctx.curr();
  let parameters: ParameterDeclarationListNode | null = null;
  if (!opts.inTypeScope && !opts.declarationsOnly && atStatementParameters(ctx)) {
    parameters = parseParameterList(ctx, 'statement');
  }

  const kind = parseStatementKind(ctx, opts);
  const stmt = Node.Statement(kind);
  stmt.parameters = parameters;
  if (kind.kind === 'Declaration') {
    kind.myStatement = stmt;
  }
  return finishSpan(ctx, stmt, startTok);
}
