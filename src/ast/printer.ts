/**
 * @module ast/printer
 *
 * 语法树到文本的两种输出：
 * - printSource / printDeclaration 等：重新生成 cpp2 源码（反射查询与 `@print` 使用）
 * - ParseTreePrinter：带缩进的节点转储（CLI 的 `parse --format tree` 使用）
 *
 * 重新生成的源码在运算符两侧留空格，后缀运算符紧贴操作数，
 * 因此输出可以再次被解析。
 */

import type {
  AliasNode,
  AlternativeNode,
  AnyBinaryExpressionNode,
  AstNode,
  CompoundStatementNode,
  ContractNode,
  DeclarationNode,
  ExpressionListNode,
  ExpressionNode,
  FunctionTypeNode,
  IdExpressionNode,
  InspectExpressionNode,
  IsAsExpressionNode,
  IterationStatementNode,
  ParameterDeclarationListNode,
  ParameterDeclarationNode,
  PostfixExpressionNode,
  PrefixExpressionNode,
  PrimaryExpressionNode,
  QualifiedIdNode,
  SelectionStatementNode,
  StatementKindNode,
  StatementNode,
  TemplateArgument,
  TranslationUnitNode,
  TypeIdNode,
  UnqualifiedIdNode,
} from '../types.js';
import { TokenKind } from '../types.js';
import { isWildcard } from './queries.js';
import type { AstVisitor } from './ast_visitor.js';
import { visitTree } from './ast_visitor.js';

const INDENT = '    ';

export interface PrintOptions {
  /** 打印后缀表达式时省略 `$` 捕获标记 */
  readonly omitCapture?: boolean;
}

// ============================================================
// 标识与类型
// ============================================================

export function printTemplateArgument(arg: TemplateArgument): string {
  return arg.kind === 'TypeId' ? printTypeId(arg) : printExpression(arg);
}

export function printUnqualifiedId(id: UnqualifiedIdNode): string {
  if (!id.openAngle) return id.identifier.value;
  return `${id.identifier.value}<${id.templateArgs.map(printTemplateArgument).join(', ')}>`;
}

export function printQualifiedId(id: QualifiedIdNode): string {
  return id.ids.map(term => (term.scopeOp ? term.scopeOp.value : '') + printUnqualifiedId(term.id)).join('');
}

export function printIdExpression(id: IdExpressionNode): string {
  return id.id.kind === 'UnqualifiedId' ? printUnqualifiedId(id.id) : printQualifiedId(id.id);
}

export function printTypeId(type: TypeIdNode): string {
  let text = type.pcQualifiers.map(q => (q.kind === TokenKind.Multiply ? '*' : `${q.value} `)).join('');
  text += type.id.kind === 'UnqualifiedId' ? printUnqualifiedId(type.id) : printQualifiedId(type.id);
  if (type.addressOf) text += '&';
  if (type.dereferenceOf) text += '*'.repeat(type.dereferenceCount);
  return text;
}

// ============================================================
// 表达式
// ============================================================

function printExpressionListBody(list: ExpressionListNode): string {
  return list.expressions
    .map(term => (term.pass === 'in' ? '' : `${term.pass} `) + printExpression(term.expr))
    .join(', ');
}

export function printExpressionList(list: ExpressionListNode): string {
  return `(${printExpressionListBody(list)})`;
}

function printPrimary(node: PrimaryExpressionNode, options: PrintOptions): string {
  const expr = node.expr;
  switch (expr.kind) {
    case 'IdExpression':
      return printIdExpression(expr);
    case 'ExpressionList':
      return printExpressionList(expr);
    case 'Literal':
      return expr.token.value + (expr.userDefinedSuffix?.value ?? '');
    case 'Declaration':
      return printDeclaration(expr, '', options);
    case 'InspectExpression':
      return printInspect(expr, '');
  }
}

export function printPostfixExpression(node: PostfixExpressionNode, options: PrintOptions = {}): string {
  let text = printPrimary(node.expr, options);
  for (const op of node.ops) {
    if (op.op.kind === TokenKind.Dollar && options.omitCapture) continue;
    if (op.idExpr) {
      text += `${op.op.value}${printIdExpression(op.idExpr)}`;
    } else if (op.exprList) {
      text += `${op.op.value}${printExpressionListBody(op.exprList)}${op.opClose?.value ?? ''}`;
    } else {
      text += op.op.value;
    }
  }
  return text;
}

function printPrefix(node: PrefixExpressionNode, options: PrintOptions): string {
  return node.ops.map(op => op.value).join('') + printPostfixExpression(node.expr, options);
}

function printIsAs(node: IsAsExpressionNode, options: PrintOptions): string {
  let text = printPrefix(node.expr, options);
  for (const term of node.ops) {
    if (term.type) text += ` ${term.op.value} ${printTypeId(term.type)}`;
    else if (term.expr) text += ` ${term.op.value} ${printPrefix(term.expr, options)}`;
  }
  return text;
}

export function printBinaryExpression(
  node: AnyBinaryExpressionNode | IsAsExpressionNode,
  options: PrintOptions = {}
): string {
  if (node.kind === 'IsAsExpression') return printIsAs(node, options);
  let text = printBinaryExpression(node.expr, options);
  for (const term of node.terms) {
    text += ` ${term.op.value} ${printBinaryExpression(term.expr, options)}`;
  }
  return text;
}

export function printExpression(node: ExpressionNode, options: PrintOptions = {}): string {
  return printBinaryExpression(node.expr, options);
}

function printAlternative(node: AlternativeNode, indent: string): string {
  const name = node.name ? `${printUnqualifiedId(node.name)}: ` : '';
  const target = node.typeId ? printTypeId(node.typeId) : node.value ? printPostfixExpression(node.value) : '';
  return `${indent}${name}${node.isAs.value} ${target} = ${printStatement(node.statement, indent)}`;
}

function printInspect(node: InspectExpressionNode, indent: string): string {
  const constexpr = node.isConstexpr ? ' constexpr' : '';
  const result = node.resultType ? ` -> ${printTypeId(node.resultType)}` : '';
  const alternatives = node.alternatives.map(alt => printAlternative(alt, indent + INDENT)).join('\n');
  return `inspect${constexpr} ${printExpression(node.expression)}${result} {\n${alternatives}\n${indent}}`;
}

// ============================================================
// 语句
// ============================================================

function printCompound(node: CompoundStatementNode, indent: string): string {
  if (node.statements.length === 0) return '{ }';
  const body = node.statements.map(stmt => indent + INDENT + printStatement(stmt, indent + INDENT)).join('\n');
  return `{\n${body}\n${indent}}`;
}

function printContract(node: ContractNode): string {
  const group = node.group ? ` ${printIdExpression(node.group)}` : '';
  const message = node.message ? `, ${node.message.value}` : '';
  return `[[${node.contractKind}${group}: ${printBinaryExpression(node.condition)}${message}]]`;
}

function printSelection(node: SelectionStatementNode, indent: string): string {
  const constexpr = node.isConstexpr ? ' constexpr' : '';
  let text = `if${constexpr} ${printBinaryExpression(node.expression)} ${printCompound(node.trueBranch, indent)}`;
  if (node.falseBranch) {
    text += ` else ${printStatement(node.falseBranch, indent)}`;
  }
  return text;
}

function printIteration(node: IterationStatementNode, indent: string): string {
  const label = node.label ? `${node.label.value}: ` : '';
  const next = node.nextExpression ? ` next ${printBinaryExpression(node.nextExpression)}` : '';
  const condition = node.condition ? printBinaryExpression(node.condition) : '';
  switch (node.loopKind) {
    case 'while':
      return `${label}while ${condition}${next} ${node.statements ? printCompound(node.statements, indent) : '{ }'}`;
    case 'do':
      return `${label}do ${node.statements ? printCompound(node.statements, indent) : '{ }'} while ${condition}${next};`;
    case 'for': {
      const range = node.range ? printExpression(node.range) : '';
      const param = node.parameter ? `(${printParameter(node.parameter)})` : '()';
      const body = node.body ? printStatement(node.body, indent) : '{ }';
      return `${label}for ${range}${next} do ${param} ${body}`;
    }
  }
}

function printStatementKind(node: StatementKindNode, indent: string): string {
  switch (node.kind) {
    case 'ExpressionStatement':
      return printExpression(node.expr) + (node.hasSemicolon ? ';' : '');
    case 'CompoundStatement':
      return printCompound(node, indent);
    case 'SelectionStatement':
      return printSelection(node, indent);
    case 'Declaration':
      return printDeclaration(node, indent);
    case 'ReturnStatement':
      return node.expression ? `return ${printExpression(node.expression)};` : 'return;';
    case 'IterationStatement':
      return printIteration(node, indent);
    case 'UsingStatement':
      return `using ${node.forNamespace ? 'namespace ' : ''}${printIdExpression(node.id)};`;
    case 'Contract':
      return printContract(node);
    case 'InspectExpression':
      return printInspect(node, indent);
    case 'JumpStatement':
      return node.label ? `${node.keyword.value} ${node.label.value};` : `${node.keyword.value};`;
  }
}

export function printStatement(node: StatementNode, indent = ''): string {
  const params = node.parameters ? `${printParameterList(node.parameters)} ` : '';
  return params + printStatementKind(node.statement, indent);
}

// ============================================================
// 声明
// ============================================================

function printParameter(param: ParameterDeclarationNode): string {
  const modifier = param.modifier === 'none' ? '' : `${param.modifier} `;
  const pass = param.pass === 'in' ? '' : `${param.pass} `;
  const decl = param.declaration;
  const name = decl.identifier ? printUnqualifiedId(decl.identifier) : '_';
  const variadic = decl.isVariadic ? '...' : '';
  let type = '';
  if (decl.type?.kind === 'TypeId' && !isWildcard(decl.type)) {
    type = `: ${printTypeId(decl.type)}`;
  } else if (decl.type?.kind === 'Type') {
    type = ': type';
  }
  const init = decl.initializer ? ` = ${initializerText(decl)}` : '';
  return `${modifier}${pass}${name}${variadic}${type}${init}`;
}

export function printParameterList(list: ParameterDeclarationListNode): string {
  const close = list.openParen.kind === TokenKind.Less ? '>' : ')';
  return `${list.openParen.value}${list.parameters.map(printParameter).join(', ')}${close}`;
}

function printFunctionSignature(type: FunctionTypeNode): string {
  let text = printParameterList(type.parameters);
  if (type.throws) text += ' throws';
  const returns = type.returns;
  if (returns.kind === 'single') {
    const pass = returns.pass === 'in' ? '' : `${returns.pass} `;
    text += ` -> ${pass}${printTypeId(returns.type)}`;
  } else if (returns.kind === 'list') {
    text += ` -> ${printParameterList(returns.list)}`;
  }
  for (const contract of type.contracts) {
    text += ` ${printContract(contract)}`;
  }
  return text;
}

function printAlias(alias: AliasNode): string {
  const init = alias.initializer;
  switch (init.kind) {
    case 'type':
      return `type == ${printTypeId(init.type)}`;
    case 'namespace':
      return `namespace == ${printIdExpression(init.id)}`;
    case 'object':
      return init.type ? `${printTypeId(init.type)} == ${printExpression(init.expr)}` : `== ${printExpression(init.expr)}`;
  }
}

/**
 * 初始化器的文本：表达式语句只取表达式本身（不含分号），其余按语句打印。
 *
 * @returns 没有初始化器时返回空字符串
 */
export function initializerText(decl: DeclarationNode, indent = ''): string {
  const init = decl.initializer;
  if (!init) return '';
  if (init.statement.kind === 'ExpressionStatement') return printExpression(init.statement.expr);
  return printStatement(init, indent);
}

export function printDeclaration(decl: DeclarationNode, indent = '', options: PrintOptions = {}): string {
  const access = decl.access === 'default' ? '' : `${decl.access} `;
  const name = decl.identifier ? printUnqualifiedId(decl.identifier) : '';
  const variadic = decl.isVariadic ? '...' : '';
  let text = `${access}${name}${variadic}:`;

  for (const meta of decl.metafunctions) {
    text += ` @${printIdExpression(meta)}`;
  }
  if (decl.templateParameters) {
    text += ` ${printParameterList(decl.templateParameters)}`;
  }

  const type = decl.type;
  if (type?.kind === 'Alias') {
    return `${text} ${printAlias(type)};`;
  }
  switch (type?.kind) {
    case 'FunctionType':
      text += ` ${printFunctionSignature(type)}`;
      break;
    case 'TypeId':
      text += ` ${printTypeId(type)}`;
      break;
    case 'Type':
      text += type.final ? ' final type' : ' type';
      break;
    case 'Namespace':
      text += ' namespace';
      break;
    default:
      break;
  }
  if (decl.requiresClause) {
    text += ` requires ${printBinaryExpression(decl.requiresClause)}`;
  }

  const init = decl.initializer;
  if (!init) {
    return decl.identifier ? `${text};` : text;
  }
  const eq = decl.isConstexpr ? '==' : '=';
  const body =
    init.statement.kind === 'ExpressionStatement'
      ? printExpression(init.statement.expr, options) + (init.statement.hasSemicolon ? ';' : '')
      : printStatement(init, indent);
  return `${text} ${eq} ${body}`;
}

/** 重新生成整个翻译单元的 cpp2 源码 */
export function printSource(unit: TranslationUnitNode): string {
  return unit.declarations.map(decl => printDeclaration(decl)).join('\n\n') + '\n';
}

// ============================================================
// 节点转储
// ============================================================

function describe(node: AstNode): string {
  switch (node.kind) {
    case 'Declaration':
      return `Declaration ${node.identifier ? printUnqualifiedId(node.identifier) : '(unnamed)'} [${node.type?.kind ?? '?'}]${
        node.access === 'default' ? '' : ` ${node.access}`
      }`;
    case 'BinaryExpression':
      return `BinaryExpression(${node.level}) ${node.terms.map(term => term.op.value).join(' ')}`.trimEnd();
    case 'PrefixExpression':
      return `PrefixExpression ${node.ops.map(op => op.value).join('')}`;
    case 'PostfixExpression':
      return `PostfixExpression ${node.ops.map(op => op.op.value).join(' ')}`.trimEnd();
    case 'IsAsExpression':
      return `IsAsExpression ${node.ops.map(term => term.op.value).join(' ')}`.trimEnd();
    case 'UnqualifiedId':
      return `UnqualifiedId ${node.identifier.value}`;
    case 'TypeId':
      return `TypeId ${printTypeId(node)}`;
    case 'Literal':
      return `Literal ${node.token.value}`;
    case 'ParameterDeclaration':
      return `ParameterDeclaration ${node.pass}${node.modifier === 'none' ? '' : ` ${node.modifier}`}`;
    case 'FunctionType':
      return `FunctionType${node.throws ? ' throws' : ''}`;
    case 'Type':
      return node.final ? 'Type final' : 'Type';
    case 'Contract':
      return `Contract ${node.contractKind}`;
    case 'IterationStatement':
      return `IterationStatement ${node.loopKind}`;
    case 'JumpStatement':
      return `JumpStatement ${node.keyword.value}`;
    case 'ExpressionList':
      return `ExpressionList (${node.expressions.length})`;
    default:
      return node.kind;
  }
}

/** 以两个空格为一级缩进，逐行转储节点 */
export class ParseTreePrinter implements AstVisitor {
  private readonly lines: string[] = [];

  start(node: AstNode, depth: number): void {
    this.lines.push('  '.repeat(depth) + describe(node));
  }

  print(root: AstNode): string {
    this.lines.length = 0;
    visitTree(root, this);
    return this.lines.join('\n');
  }
}
