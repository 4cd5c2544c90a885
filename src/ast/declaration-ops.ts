/**
 * @module ast/declaration-ops
 *
 * 声明节点上的查询与结构性修改。
 *
 * 反射层的包装类型与解析器（元函数应用后的清理）共用这里的实现；
 * 这里只依赖语法树本身，不知道元函数或错误列表的存在。
 */

import type {
  CompoundStatementNode,
  DeclarationNode,
  FunctionTypeNode,
  ParameterDeclarationNode,
  PassingStyle,
  StatementNode,
} from '../types.js';
import { printTypeId } from './printer.js';

/** getTypeScopeDeclarations 的成员类别掩码 */
export const MemberMask = {
  functions: 1,
  objects: 2,
  types: 4,
  aliases: 8,
  all: 15,
} as const;

// ============================================================
// 声明类别
// ============================================================

export function isFunction(decl: DeclarationNode): boolean {
  return decl.type?.kind === 'FunctionType';
}

export function isObject(decl: DeclarationNode): boolean {
  return decl.type?.kind === 'TypeId';
}

export function isType(decl: DeclarationNode): boolean {
  return decl.type?.kind === 'Type';
}

export function isNamespace(decl: DeclarationNode): boolean {
  return decl.type?.kind === 'Namespace';
}

export function isAlias(decl: DeclarationNode): boolean {
  return decl.type?.kind === 'Alias';
}

export function isTypeAlias(decl: DeclarationNode): boolean {
  return decl.type?.kind === 'Alias' && decl.type.initializer.kind === 'type';
}

export function isNamespaceAlias(decl: DeclarationNode): boolean {
  return decl.type?.kind === 'Alias' && decl.type.initializer.kind === 'namespace';
}

export function isObjectAlias(decl: DeclarationNode): boolean {
  return decl.type?.kind === 'Alias' && decl.type.initializer.kind === 'object';
}

/** 无名函数，即函数表达式 */
export function isFunctionExpression(decl: DeclarationNode): boolean {
  return isFunction(decl) && decl.identifier === null;
}

export function declarationName(decl: DeclarationNode): string {
  return decl.identifier?.identifier.value ?? '';
}

export function hasName(decl: DeclarationNode, name?: string): boolean {
  if (decl.identifier === null) return false;
  return name === undefined || decl.identifier.identifier.value === name;
}

export function isGlobal(decl: DeclarationNode): boolean {
  return decl.parent === null;
}

export function parentIsType(decl: DeclarationNode): boolean {
  return decl.parent !== null && isType(decl.parent);
}

/** 名为 `this` 的成员对象表示基类子对象 */
export function isBaseObject(decl: DeclarationNode): boolean {
  return isObject(decl) && hasName(decl, 'this');
}

export function isMemberObject(decl: DeclarationNode): boolean {
  return isObject(decl) && parentIsType(decl) && !isBaseObject(decl);
}

// ============================================================
// 函数查询
// ============================================================

export function functionTypeOf(decl: DeclarationNode): FunctionTypeNode | null {
  return decl.type?.kind === 'FunctionType' ? decl.type : null;
}

export function parametersOf(decl: DeclarationNode): readonly ParameterDeclarationNode[] {
  return functionTypeOf(decl)?.parameters.parameters ?? [];
}

/** @returns 参数下标，没有该名字时返回 -1 */
export function indexOfParameterNamed(decl: DeclarationNode, name: string): number {
  return parametersOf(decl).findIndex(param => hasName(param.declaration, name));
}

export function hasParameterWithNameAndPass(decl: DeclarationNode, name: string, pass: PassingStyle): boolean {
  const param = parametersOf(decl).find(p => hasName(p.declaration, name));
  return param !== undefined && param.pass === pass;
}

export function thisParameter(decl: DeclarationNode): ParameterDeclarationNode | null {
  const first = parametersOf(decl)[0];
  return first !== undefined && hasName(first.declaration, 'this') ? first : null;
}

export function isFunctionWithThis(decl: DeclarationNode): boolean {
  return thisParameter(decl) !== null;
}

export function isVirtualFunction(decl: DeclarationNode): boolean {
  const modifier = thisParameter(decl)?.modifier;
  return modifier === 'virtual' || modifier === 'override' || modifier === 'final';
}

/** 可以 `= default` 的比较函数 */
export function isDefaultable(decl: DeclarationNode): boolean {
  return hasName(decl, 'operator==') || hasName(decl, 'operator<=>');
}

function isSpecialMember(decl: DeclarationNode, thisPass: PassingStyle): boolean {
  return isFunction(decl) && hasName(decl, 'operator=') && thisParameter(decl)?.pass === thisPass;
}

function secondIsThat(decl: DeclarationNode, pass?: PassingStyle): boolean {
  const params = parametersOf(decl);
  const that = params[1];
  if (params.length !== 2 || that === undefined || !hasName(that.declaration, 'that')) return false;
  return pass === undefined || that.pass === pass;
}

export function isConstructor(decl: DeclarationNode): boolean {
  return isSpecialMember(decl, 'out');
}

export function isDefaultConstructor(decl: DeclarationNode): boolean {
  return isConstructor(decl) && parametersOf(decl).length === 1;
}

export function isConstructorWithThat(decl: DeclarationNode): boolean {
  return isConstructor(decl) && secondIsThat(decl);
}

export function isConstructorWithInThat(decl: DeclarationNode): boolean {
  return isConstructor(decl) && secondIsThat(decl, 'in');
}

export function isConstructorWithMoveThat(decl: DeclarationNode): boolean {
  return isConstructor(decl) && secondIsThat(decl, 'move');
}

export function isAssignment(decl: DeclarationNode): boolean {
  return isSpecialMember(decl, 'inout');
}

export function isAssignmentWithThat(decl: DeclarationNode): boolean {
  return isAssignment(decl) && secondIsThat(decl);
}

export function isAssignmentWithInThat(decl: DeclarationNode): boolean {
  return isAssignment(decl) && secondIsThat(decl, 'in');
}

export function isAssignmentWithMoveThat(decl: DeclarationNode): boolean {
  return isAssignment(decl) && secondIsThat(decl, 'move');
}

/** 析构函数写作 `operator=: (move this)` */
export function isDestructor(decl: DeclarationNode): boolean {
  return isSpecialMember(decl, 'move') && parametersOf(decl).length === 1;
}

export function isMove(decl: DeclarationNode): boolean {
  return isConstructorWithMoveThat(decl) || isAssignmentWithMoveThat(decl);
}

export function isSwap(decl: DeclarationNode): boolean {
  const params = parametersOf(decl);
  return (
    hasName(decl, 'swap') &&
    params.length === 2 &&
    thisParameter(decl)?.pass === 'inout' &&
    hasParameterWithNameAndPass(decl, 'that', 'inout')
  );
}

export function isCopyOrMove(decl: DeclarationNode): boolean {
  return isConstructorWithThat(decl) || isAssignmentWithThat(decl);
}

export function hasDeclaredReturnType(decl: DeclarationNode): boolean {
  const fn = functionTypeOf(decl);
  return fn !== null && fn.returns.kind !== 'none';
}

/** 单个返回类型的文本；没有返回类型或返回参数列表时为空字符串 */
export function unnamedReturnType(decl: DeclarationNode): string {
  const fn = functionTypeOf(decl);
  return fn?.returns.kind === 'single' ? printTypeId(fn.returns.type) : '';
}

export function hasBoolReturnType(decl: DeclarationNode): boolean {
  return unnamedReturnType(decl) === 'bool';
}

export function hasNonVoidReturnType(decl: DeclarationNode): boolean {
  const fn = functionTypeOf(decl);
  if (fn === null || fn.returns.kind === 'none') return false;
  return fn.returns.kind === 'list' || unnamedReturnType(decl) !== 'void';
}

const COMPARISON_NAMES = new Set([
  'operator==',
  'operator!=',
  'operator<',
  'operator<=',
  'operator>',
  'operator>=',
  'operator<=>',
]);

export function isBinaryComparisonFunction(decl: DeclarationNode): boolean {
  return isFunction(decl) && COMPARISON_NAMES.has(declarationName(decl));
}

/**
 * 把成员函数的 `this` 参数标为 virtual。
 *
 * @returns 函数没有 `this` 参数时返回 false
 */
export function makeVirtual(decl: DeclarationNode): boolean {
  const param = thisParameter(decl);
  if (param === null) return false;
  if (param.modifier === 'none' || param.modifier === 'implicit') {
    param.modifier = 'virtual';
  }
  return true;
}

// ============================================================
// 类型成员
// ============================================================

/** 类型体（`= { ... }`）；没有类型体时为 null */
export function typeBody(decl: DeclarationNode): CompoundStatementNode | null {
  const stmt = decl.initializer?.statement;
  return stmt?.kind === 'CompoundStatement' ? stmt : null;
}

function memberOf(stmt: StatementNode): DeclarationNode | null {
  return stmt.statement.kind === 'Declaration' ? stmt.statement : null;
}

function matchesMask(decl: DeclarationNode, mask: number): boolean {
  return (
    ((mask & MemberMask.functions) !== 0 && isFunction(decl)) ||
    ((mask & MemberMask.objects) !== 0 && isObject(decl)) ||
    ((mask & MemberMask.types) !== 0 && isType(decl)) ||
    ((mask & MemberMask.aliases) !== 0 && isAlias(decl))
  );
}

/** 按源码顺序返回类型体中属于 mask 类别的成员声明 */
export function getTypeScopeDeclarations(decl: DeclarationNode, mask: number = MemberMask.all): DeclarationNode[] {
  const body = typeBody(decl);
  if (body === null) return [];
  const members: DeclarationNode[] = [];
  for (const stmt of body.statements) {
    const member = memberOf(stmt);
    if (member && matchesMask(member, mask)) members.push(member);
  }
  return members;
}

/** 任一成员函数是虚函数 */
export function isPolymorphic(decl: DeclarationNode): boolean {
  return getTypeScopeDeclarations(decl, MemberMask.functions).some(isVirtualFunction);
}

/**
 * 把一条声明语句追加为类型成员，并接好父链接。
 *
 * @returns 类型没有类型体或语句不是声明时返回 false
 */
export function addTypeMember(decl: DeclarationNode, stmt: StatementNode): boolean {
  const body = typeBody(decl);
  const member = memberOf(stmt);
  if (body === null || member === null) return false;
  stmt.compoundParent = body;
  member.parent = decl;
  member.myStatement = stmt;
  body.statements.push(stmt);
  return true;
}

export function markForRemovalFromEnclosingType(decl: DeclarationNode): boolean {
  if (!parentIsType(decl) || decl.myStatement === null) return false;
  decl.myStatement.markedForRemoval = true;
  return true;
}

/**
 * 删除所有被标记的成员，其余成员保持原有相对顺序。
 *
 * @returns 删除的成员数
 */
export function removeMarkedMembers(decl: DeclarationNode): number {
  const body = typeBody(decl);
  if (body === null) return 0;
  const before = body.statements.length;
  body.statements = body.statements.filter(stmt => !stmt.markedForRemoval);
  return before - body.statements.length;
}

export function removeAllMembers(decl: DeclarationNode): void {
  const body = typeBody(decl);
  if (body !== null) body.statements = [];
}

export function hasMarkedMembers(decl: DeclarationNode): boolean {
  return typeBody(decl)?.statements.some(stmt => stmt.markedForRemoval) ?? false;
}
