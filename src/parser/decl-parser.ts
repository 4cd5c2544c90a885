/**
 * 声明解析器
 * 负责具名/无名声明、参数列表、函数类型以及声明完成后的元函数应用
 */

import type {
  Accessibility,
  DeclarationNode,
  FunctionReturns,
  ParameterDeclarationListNode,
  ParameterDeclarationNode,
  ParameterModifier,
  PassingStyle,
  StatementNode,
  Token,
  TypeIdNode,
  UnqualifiedIdNode,
} from '../types.js';
import { TokenKind } from '../frontend/tokens.js';
import { DiagnosticCode, Diagnostics, toDiagnostic } from '../diagnostics/diagnostics.js';
import { Node } from '../ast/ast.js';
import { getPostfixExpression } from '../ast/queries.js';
import { isType, removeMarkedMembers } from '../ast/declaration-ops.js';
import type { ParserContext } from './context.js';
import { expectToken, fail, isIdentifierLike, report } from './parser-tools.js';
import { assignSpan, finishSpan, spanFromTokens } from './span-utils.js';
import { isIdToken, parseExpression, parseIdExpression, parseLogicalOr, parseTypeId } from './expr-parser.js';
import { atContract, parseCompound, parseCompoundBody, parseContract, parseStatement } from './stmt-parser.js';

/**
 * 元函数应用失败。与普通语法错误不同，它终止整个 parse 调用而不是只跳过当前声明。
 */
export class MetafunctionFailure extends Error {
  constructor(public readonly declaration: DeclarationNode) {
    super('error encountered while applying type metafunctions');
    this.name = 'MetafunctionFailure';
  }
}

export type ParameterListKind = 'function' | 'template' | 'statement' | 'returns';

export interface DeclarationOptions {
  readonly semicolonRequired: boolean;
  /** 类型体内允许 `name;` 简写 */
  readonly inTypeScope: boolean;
}

export interface UnnamedDeclarationOptions {
  readonly identifier: UnqualifiedIdNode | null;
  /** 声明范围的起点（访问修饰符或名字） */
  readonly startTok: Token;
  readonly semicolonRequired: boolean;
  readonly access?: Accessibility;
  readonly isVariadic?: boolean;
  readonly isParameter?: boolean;
  readonly isTemplateParameter?: boolean;
}

const ACCESS_WORDS: ReadonlySet<string> = new Set(['public', 'protected', 'private']);
const PASS_WORDS: ReadonlySet<string> = new Set(['in', 'copy', 'inout', 'out', 'move', 'forward']);
const MODIFIER_WORDS: ReadonlySet<string> = new Set(['implicit', 'virtual', 'override', 'final']);

function toAccess(word: string): Accessibility {
  switch (word) {
    case 'public':
      return 'public';
    case 'protected':
      return 'protected';
    default:
      return 'private';
  }
}

function toPass(word: string): PassingStyle {
  switch (word) {
    case 'copy':
      return 'copy';
    case 'inout':
      return 'inout';
    case 'out':
      return 'out';
    case 'move':
      return 'move';
    case 'forward':
      return 'forward';
    default:
      return 'in';
  }
}

function toModifier(word: string): ParameterModifier {
  switch (word) {
    case 'implicit':
      return 'implicit';
    case 'virtual':
      return 'virtual';
    case 'override':
      return 'override';
    default:
      return 'final';
  }
}

/** 可以作为被声明名字的 token：标识符（含 `operator=` 之类）与 `this` */
function isDeclarationName(tok: Token): boolean {
  return tok.kind === TokenKind.Identifier || (tok.kind === TokenKind.Keyword && tok.value === 'this');
}

function isAccessToken(tok: Token): boolean {
  return tok.kind === TokenKind.Keyword && ACCESS_WORDS.has(tok.value);
}

/**
 * 当前位置是否开始一个具名声明：`access? name ...? :`，类型体内还包括 `name;`
 */
export function looksLikeDeclaration(ctx: ParserContext, inTypeScope: boolean): boolean {
  let offset = isAccessToken(ctx.peek(0)) ? 1 : 0;
  if (!isDeclarationName(ctx.peek(offset))) return false;
  offset++;
  if (ctx.peek(offset).kind === TokenKind.Ellipsis) offset++;
  const after = ctx.peek(offset).kind;
  return after === TokenKind.Colon || (inTypeScope && after === TokenKind.Semicolon);
}

function currentParent(ctx: ParserContext): DeclarationNode | null {
  return ctx.currentDeclarations[ctx.currentDeclarations.length - 1] ?? null;
}

/** 生成通配类型 `_` */
function wildcardType(ctx: ParserContext, tok: Token): TypeIdNode {
  const underscore = ctx.generateToken(TokenKind.Identifier, '_', tok.start);
  return assignSpan(Node.TypeId([], Node.UnqualifiedId(underscore)), spanFromTokens(underscore, underscore));
}

function atTypeStart(ctx: ParserContext): boolean {
  const tok = ctx.curr();
  if (ctx.atWord('requires')) return false;
  return ctx.at(TokenKind.Multiply) || ctx.at(TokenKind.Scope) || isIdToken(tok);
}

function atTypeKeyword(ctx: ParserContext): boolean {
  if (ctx.atWord('final')) {
    const next = ctx.peek(1);
    return next.kind === TokenKind.Identifier && next.value === 'type';
  }
  if (!ctx.atWord('type')) return false;
  const next = ctx.peek(1).kind;
  return next !== TokenKind.Scope && next !== TokenKind.Less && next !== TokenKind.Dot;
}

function parseRequires(ctx: ParserContext, decl: DeclarationNode, allowEquality: boolean): void {
  if (!ctx.atWord('requires')) return;
  ctx.next();
  decl.requiresClause = parseLogicalOr(ctx, { allowAngle: true, allowEquality });
}

/** 声明结尾：不要求分号时分号属于外层语句，保持不动 */
function endDeclaration(ctx: ParserContext, opts: UnnamedDeclarationOptions): void {
  if (!opts.semicolonRequired) return;
  if (ctx.at(TokenKind.Semicolon)) {
    ctx.next();
    return;
  }
  fail(ctx, "missing ';' at end of declaration or '=' at start of initializer", {
    code: DiagnosticCode.P006_InvalidDeclaration,
  });
}

function wrapStatement(ctx: ParserContext, startTok: Token, parse: () => StatementNode['statement']): StatementNode {
  return finishSpan(ctx, Node.Statement(parse()), startTok);
}

// ============================================================
// 参数
// ============================================================

/**
 * 单个参数：`modifier? pass? name ...? (: declaration)?`
 *
 * 模板参数省略类型时表示 `: type`，其余参数省略类型时表示 `: _`。
 */
export function parseParameter(ctx: ParserContext, kind: ParameterListKind, ordinal: number): ParameterDeclarationNode {
  const startTok = ctx.curr();

  let modifier: ParameterModifier = 'none';
  if (isIdentifierLike(ctx.curr()) && MODIFIER_WORDS.has(ctx.curr().value) && isIdentifierLike(ctx.peek(1))) {
    modifier = toModifier(ctx.next().value);
  }

  let pass: PassingStyle = kind === 'returns' ? 'out' : 'in';
  const passTok = ctx.curr();
  if (passTok.kind === TokenKind.Identifier && PASS_WORDS.has(passTok.value) && isIdentifierLike(ctx.peek(1))) {
    pass = toPass(ctx.next().value);
  }

  const nameTok = ctx.curr();
  if (!isDeclarationName(nameTok)) {
    fail(ctx, 'expected parameter name', { code: DiagnosticCode.P001_ExpectedIdentifier });
  }
  ctx.next();
  const identifier = Node.UnqualifiedId(nameTok);
  let isVariadic = false;
  if (ctx.at(TokenKind.Ellipsis)) {
    ctx.next();
    isVariadic = true;
  }

  let declaration: DeclarationNode;
  if (ctx.at(TokenKind.Colon)) {
    declaration = parseUnnamedDeclaration(ctx, {
      identifier,
      startTok: nameTok,
      semicolonRequired: false,
      isVariadic,
      isParameter: true,
      isTemplateParameter: kind === 'template',
    });
  } else {
    declaration = Node.Declaration(identifier, currentParent(ctx));
    declaration.isVariadic = isVariadic;
    declaration.isAParameter = true;
    declaration.isATemplateParameter = kind === 'template';
    if (kind === 'template') {
      const typeTok = ctx.generateToken(TokenKind.Identifier, 'type', nameTok.start);
      declaration.type = Node.Type(typeTok, false);
    } else {
      declaration.type = wildcardType(ctx, nameTok);
    }
    finishSpan(ctx, declaration, nameTok);
  }

  return finishSpan(ctx, Node.ParameterDeclaration(pass, ordinal, modifier, declaration), startTok);
}

export function parseParameterList(ctx: ParserContext, kind: ParameterListKind): ParameterDeclarationListNode {
  const isTemplate = kind === 'template';
  const open = isTemplate
    ? expectToken(ctx, TokenKind.Less, "'<' to start template parameter list")
    : expectToken(ctx, TokenKind.LeftParen, "'(' to start parameter list");
  const close = isTemplate ? TokenKind.Greater : TokenKind.RightParen;
  const list = Node.ParameterDeclarationList(open);

  let ordinal = 1;
  while (!ctx.at(close) && !(isTemplate && ctx.at(TokenKind.RightShift))) {
    list.parameters.push(parseParameter(ctx, kind, ordinal++));
    if (!ctx.at(TokenKind.Comma)) break;
    ctx.next();
  }
  if (isTemplate && ctx.at(TokenKind.RightShift)) ctx.splitRightShift();
  list.closeParen = expectToken(ctx, close, isTemplate ? "'>' to end template parameter list" : "')' to end parameter list");
  return finishSpan(ctx, list, open);
}

// ============================================================
// 各类声明
// ============================================================

function parseReturns(ctx: ParserContext): FunctionReturns {
  if (ctx.at(TokenKind.LeftParen)) {
    return { kind: 'list', list: parseParameterList(ctx, 'returns') };
  }
  let pass: PassingStyle = 'in';
  if ((ctx.atWord('forward') || ctx.atWord('move')) && (isIdToken(ctx.peek(1)) || ctx.peek(1).kind === TokenKind.Scope)) {
    pass = toPass(ctx.next().value);
  }
  return { kind: 'single', type: parseTypeId(ctx), pass };
}

function recordFunctionBody(ctx: ParserContext, body: StatementNode): void {
  if (body.statement.kind !== 'CompoundStatement') return;
  ctx.functionBodyExtents.push({ first: body.span.start.line, last: body.span.end.line });
}

function parseFunctionDeclaration(ctx: ParserContext, decl: DeclarationNode, opts: UnnamedDeclarationOptions): void {
  const startTok = ctx.curr();
  const fn = Node.FunctionType(decl, parseParameterList(ctx, 'function'));
  decl.type = fn;
  if (ctx.atWord('throws')) {
    ctx.next();
    fn.throws = true;
  }
  if (ctx.at(TokenKind.Arrow)) {
    ctx.next();
    fn.returns = parseReturns(ctx);
  }
  while (atContract(ctx)) {
    fn.contracts.push(parseContract(ctx));
  }
  finishSpan(ctx, fn, startTok);
  parseRequires(ctx, decl, true);

  if (ctx.at(TokenKind.EqualComparison) || ctx.at(TokenKind.Assignment)) {
    decl.isConstexpr = ctx.next().kind === TokenKind.EqualComparison;
    decl.initializer = parseStatement(ctx, { semicolonRequired: opts.semicolonRequired });
  } else if (ctx.at(TokenKind.LeftBrace)) {
    decl.initializer = parseStatement(ctx);
  } else {
    endDeclaration(ctx, opts);
  }
  if (decl.initializer) recordFunctionBody(ctx, decl.initializer);
}

function parseTypeDeclaration(ctx: ParserContext, decl: DeclarationNode, opts: UnnamedDeclarationOptions): void {
  let final = false;
  if (ctx.atWord('final')) {
    ctx.next();
    final = true;
  }
  const typeNode = Node.Type(ctx.next(), final);
  parseRequires(ctx, decl, false);

  if (ctx.at(TokenKind.EqualComparison)) {
    const equalOp = ctx.next();
    const target = parseTypeId(ctx);
    decl.type = finishSpan(ctx, Node.Alias(equalOp, { kind: 'type', type: target }), typeNode.typeKeyword);
    endDeclaration(ctx, opts);
    return;
  }

  decl.type = typeNode;
  if (!ctx.at(TokenKind.Assignment)) {
    endDeclaration(ctx, opts);
    return;
  }
  ctx.next();
  if (!ctx.at(TokenKind.LeftBrace)) {
    fail(ctx, 'a user-defined type initializer must be a compound-expression consisting of declarations', {
      code: DiagnosticCode.P006_InvalidDeclaration,
    });
  }
  decl.initializer = wrapStatement(ctx, ctx.curr(), () => parseCompound(ctx, { inTypeScope: true }));
}

function parseNamespaceDeclaration(ctx: ParserContext, decl: DeclarationNode, opts: UnnamedDeclarationOptions): void {
  const keyword = ctx.next();
  if (ctx.at(TokenKind.EqualComparison)) {
    const equalOp = ctx.next();
    const id = parseIdExpression(ctx);
    decl.type = finishSpan(ctx, Node.Alias(equalOp, { kind: 'namespace', id }), keyword);
    endDeclaration(ctx, opts);
    return;
  }
  decl.type = Node.Namespace(keyword);
  expectToken(ctx, TokenKind.Assignment, "'=' after 'namespace'");
  if (!ctx.at(TokenKind.LeftBrace)) {
    fail(ctx, 'a namespace initializer must be a compound-expression consisting of declarations', {
      code: DiagnosticCode.P006_InvalidDeclaration,
    });
  }
  const open = ctx.next();
  const compound = Node.CompoundStatement(open);
  const body = Node.Statement(compound);
  // 成员上的元函数会向这里追加声明，函数体要先挂上
  decl.initializer = body;
  parseCompoundBody(ctx, compound, { declarationsOnly: true });
  finishSpan(ctx, body, open);
}

const OBJECT_INITIALIZER_MESSAGE = 'an object initializer must be an expression';

/** `(a, b)` 形式的对象初始化器标记为 insideInitializer */
function markInitializerList(stmt: StatementNode): void {
  if (stmt.statement.kind !== 'ExpressionStatement') return;
  const postfix = getPostfixExpression(stmt.statement.expr);
  if (postfix !== null && postfix.ops.length === 0 && postfix.expr.expr.kind === 'ExpressionList') {
    postfix.expr.expr.insideInitializer = true;
  }
}

function parseObjectDeclaration(ctx: ParserContext, decl: DeclarationNode, opts: UnnamedDeclarationOptions): void {
  const startTok = ctx.curr();
  const type = atTypeStart(ctx) ? parseTypeId(ctx) : null;
  parseRequires(ctx, decl, false);

  if (ctx.at(TokenKind.EqualComparison)) {
    const equalOp = ctx.next();
    const expr = parseExpression(ctx);
    decl.type = finishSpan(ctx, Node.Alias(equalOp, { kind: 'object', type, expr }), startTok);
    endDeclaration(ctx, opts);
    return;
  }

  decl.type = type ?? wildcardType(ctx, startTok);
  if (ctx.at(TokenKind.Assignment)) {
    ctx.next();
    const initStart = ctx.curr().start;
    // 先于 parseStatement 拒绝声明，避免嵌套声明的元函数先行生效
    if (looksLikeDeclaration(ctx, false)) {
      fail(ctx, OBJECT_INITIALIZER_MESSAGE, { code: DiagnosticCode.P006_InvalidDeclaration, includeCurrentToken: false });
    }
    const init = parseStatement(ctx, { semicolonRequired: opts.semicolonRequired });
    if (init.statement.kind !== 'ExpressionStatement') {
      fail(ctx, OBJECT_INITIALIZER_MESSAGE, {
        code: DiagnosticCode.P006_InvalidDeclaration,
        includeCurrentToken: false,
        pos: initStart,
      });
    }
    markInitializerList(init);
    decl.initializer = init;
    return;
  }
  endDeclaration(ctx, opts);
}

function parseDeclarationBody(ctx: ParserContext, decl: DeclarationNode, opts: UnnamedDeclarationOptions): void {
  while (ctx.at(TokenKind.At)) {
    ctx.next();
    decl.metafunctions.push(parseIdExpression(ctx));
  }
  if (ctx.at(TokenKind.Less)) {
    decl.templateParameters = parseParameterList(ctx, 'template');
  }

  if (ctx.at(TokenKind.LeftParen)) {
    parseFunctionDeclaration(ctx, decl, opts);
  } else if (atTypeKeyword(ctx)) {
    parseTypeDeclaration(ctx, decl, opts);
  } else if (ctx.atWord('namespace')) {
    parseNamespaceDeclaration(ctx, decl, opts);
  } else {
    parseObjectDeclaration(ctx, decl, opts);
  }
}

/**
 * 类型解析完毕后按顺序应用它的元函数，再清扫仍被标记删除的成员。
 */
function applyMetafunctions(ctx: ParserContext, decl: DeclarationNode): void {
  const first = decl.metafunctions[0];
  if (first === undefined) return;
  if (!isType(decl)) {
    report(ctx, 'metafunctions are currently supported only on types', {
      includeCurrentToken: false,
      pos: first.span.start,
      code: DiagnosticCode.P006_InvalidDeclaration,
    });
    return;
  }
  if (ctx.applyMetafunctions === null) return;

  ctx.debug.log(`applying ${decl.metafunctions.length} metafunction(s) to ${decl.identifier?.identifier.value ?? '<unnamed>'}`);
  if (!ctx.applyMetafunctions(decl)) {
    ctx.errors.add(
      Diagnostics.metafunction(
        DiagnosticCode.R007_MetafunctionsFailed,
        'error encountered while applying type metafunctions',
        decl.span.start
      )
        .asFallback()
        .build()
    );
    throw new MetafunctionFailure(decl);
  }
  removeMarkedMembers(decl);
}

/**
 * 从 `:` 开始解析声明的其余部分。具名声明由 parseDeclaration 先读出名字；
 * 表达式中的 `:` 开头的是无名声明（函数表达式或临时对象）。
 */
export function parseUnnamedDeclaration(ctx: ParserContext, opts: UnnamedDeclarationOptions): DeclarationNode {
  const decl = Node.Declaration(opts.identifier, currentParent(ctx));
  decl.access = opts.access ?? 'default';
  decl.isVariadic = opts.isVariadic ?? false;
  decl.isAParameter = opts.isParameter ?? false;
  decl.isATemplateParameter = opts.isTemplateParameter ?? false;

  expectToken(ctx, TokenKind.Colon, "':'");
  ctx.debug.log(`declaration ${opts.identifier?.identifier.value ?? '<unnamed>'}`);

  ctx.withDeclaration(decl, () => {
    if (opts.identifier === null) {
      ctx.withCaptureGroup(decl.captures, () => parseDeclarationBody(ctx, decl, opts));
    } else {
      parseDeclarationBody(ctx, decl, opts);
    }
  });
  finishSpan(ctx, decl, opts.startTok);

  applyMetafunctions(ctx, decl);
  return decl;
}

/**
 * 具名声明：`access? name ...? : ...`；类型体内 `name;` 等价于 `name: _;`
 */
export function parseDeclaration(ctx: ParserContext, opts: DeclarationOptions): DeclarationNode {
  const startTok = ctx.curr();
  const access = isAccessToken(startTok) ? toAccess(ctx.next().value) : 'default';

  const nameTok = ctx.curr();
  if (!isDeclarationName(nameTok)) {
    fail(ctx, 'expected declaration name', { code: DiagnosticCode.P001_ExpectedIdentifier });
  }
  ctx.next();
  const identifier = Node.UnqualifiedId(nameTok);
  let isVariadic = false;
  if (ctx.at(TokenKind.Ellipsis)) {
    ctx.next();
    isVariadic = true;
  }

  if (opts.inTypeScope && ctx.at(TokenKind.Semicolon)) {
    const decl = Node.Declaration(identifier, currentParent(ctx));
    decl.access = access;
    decl.isVariadic = isVariadic;
    decl.type = wildcardType(ctx, ctx.curr());
    ctx.next();
    return finishSpan(ctx, decl, startTok);
  }

  return parseUnnamedDeclaration(ctx, {
    identifier,
    startTok,
    semicolonRequired: opts.semicolonRequired,
    access,
    isVariadic,
  });
}

// ============================================================
// 错误恢复
// ============================================================

function startsLine(ctx: ParserContext, index: number): boolean {
  const tok = ctx.tokens[index];
  const prev = ctx.tokens[index - 1];
  return tok !== undefined && (prev === undefined || prev.end.line < tok.start.line);
}

/**
 * 声明失败后跳到下一个恢复点：位于行首、看起来开始一个声明、
 * 且列号不大于失败声明起始列的 token。找不到时跳到段末尾。
 */
function syncToNextDecl(ctx: ParserContext, failedStart: number): void {
  const failed = ctx.tokens[failedStart];
  const column = failed?.start.col ?? 1;
  for (let i = failedStart + 1; i < ctx.tokens.length; i++) {
    const tok = ctx.tokens[i];
    if (tok === undefined || !startsLine(ctx, i) || tok.start.col > column) continue;
    ctx.index = i;
    if (looksLikeDeclaration(ctx, false)) return;
  }
  ctx.index = ctx.tokens.length;
}

/**
 * 解析一个 token 段中的全部顶层声明。
 *
 * 语法错误记入错误列表后跳到下一个声明继续；元函数失败则立即停止。
 *
 * @param emit - 每个成功解析的顶层声明按顺序交给它
 * @returns 元函数失败导致中止时返回 false
 */
export function collectTopLevelDecls(ctx: ParserContext, emit: (decl: DeclarationNode) => void): boolean {
  while (!ctx.done()) {
    const start = ctx.index;
    try {
      if (!looksLikeDeclaration(ctx, false)) {
        fail(ctx, 'expected a declaration at namespace scope', { code: DiagnosticCode.P006_InvalidDeclaration });
      }
      emit(parseDeclaration(ctx, { semicolonRequired: true, inTypeScope: false }));
    } catch (e) {
      if (e instanceof MetafunctionFailure) return false;
      ctx.errors.add(toDiagnostic(e, ctx.curr().start));
      syncToNextDecl(ctx, start);
    }
  }
  return true;
}
