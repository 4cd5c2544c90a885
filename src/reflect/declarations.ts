/**
 * @module reflect/declarations
 *
 * 元函数看到的声明视图。包装对象不拥有节点，只把查询与修改转发到
 * ast/declaration-ops，并通过 CompilerServices 报告错误、解析生成的代码。
 *
 * 收窄（asFunction 等）在声明类别不符时抛出 R005 DiagnosticError。
 */

import type { Accessibility, DeclarationNode, PassingStyle, Position, TypeIdNode } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import * as ops from '../ast/declaration-ops.js';
import { MemberMask } from '../ast/declaration-ops.js';
import { initializerText, printDeclaration, printTypeId } from '../ast/printer.js';
import { isWildcard } from '../ast/queries.js';
import type { CompilerServices } from './compiler-services.js';

export class Declaration {
  constructor(
    readonly node: DeclarationNode,
    protected readonly services: CompilerServices
  ) {}

  position(): Position {
    return this.node.span.start;
  }

  print(): string {
    return printDeclaration(this.node);
  }

  // ---- 服务转发：错误报告在本声明的位置 ----

  require(condition: boolean, message: string): void {
    this.services.require(condition, message, this.position());
  }

  error(message: string): void {
    this.services.error(message, this.position());
  }

  getMetafunctionName(): string {
    return this.services.getMetafunctionName();
  }

  getArgument(index: number): string {
    return this.services.getArgument(index);
  }

  argumentsWereUsed(): boolean {
    return this.services.argumentsWereUsed();
  }

  // ---- 访问控制 ----

  isPublic(): boolean {
    return this.node.access === 'public';
  }

  isProtected(): boolean {
    return this.node.access === 'protected';
  }

  isPrivate(): boolean {
    return this.node.access === 'private';
  }

  isDefaultAccess(): boolean {
    return this.node.access === 'default';
  }

  defaultToPublic(): void {
    this.defaultTo('public');
  }

  defaultToProtected(): void {
    this.defaultTo('protected');
  }

  defaultToPrivate(): void {
    this.defaultTo('private');
  }

  /** @returns 已显式写成其他访问级别时返回 false，且不做修改 */
  makePublic(): boolean {
    return this.makeAccess('public');
  }

  makeProtected(): boolean {
    return this.makeAccess('protected');
  }

  makePrivate(): boolean {
    return this.makeAccess('private');
  }

  private defaultTo(access: Accessibility): void {
    if (this.node.access === 'default') this.node.access = access;
  }

  private makeAccess(access: Accessibility): boolean {
    if (this.node.access !== 'default' && this.node.access !== access) return false;
    this.node.access = access;
    return true;
  }

  // ---- 名字与类别 ----

  hasName(name?: string): boolean {
    return ops.hasName(this.node, name);
  }

  /** 无名声明返回空字符串 */
  name(): string {
    return ops.declarationName(this.node);
  }

  hasInitializer(): boolean {
    return this.node.initializer !== null;
  }

  isGlobal(): boolean {
    return ops.isGlobal(this.node);
  }

  isFunction(): boolean {
    return ops.isFunction(this.node);
  }

  isObject(): boolean {
    return ops.isObject(this.node);
  }

  isBaseObject(): boolean {
    return ops.isBaseObject(this.node);
  }

  isMemberObject(): boolean {
    return ops.isMemberObject(this.node);
  }

  isType(): boolean {
    return ops.isType(this.node);
  }

  isNamespace(): boolean {
    return ops.isNamespace(this.node);
  }

  isAlias(): boolean {
    return ops.isAlias(this.node);
  }

  isTypeAlias(): boolean {
    return ops.isTypeAlias(this.node);
  }

  isNamespaceAlias(): boolean {
    return ops.isNamespaceAlias(this.node);
  }

  isObjectAlias(): boolean {
    return ops.isObjectAlias(this.node);
  }

  isFunctionExpression(): boolean {
    return ops.isFunctionExpression(this.node);
  }

  // ---- 收窄 ----

  asFunction(): FunctionDeclaration {
    if (!this.isFunction()) Diagnostics.invalidNarrowing('a function', this.position()).throw();
    return new FunctionDeclaration(this.node, this.services);
  }

  asObject(): ObjectDeclaration {
    if (!this.isObject()) Diagnostics.invalidNarrowing('an object', this.position()).throw();
    return new ObjectDeclaration(this.node, this.services);
  }

  asType(): TypeDeclaration {
    if (!this.isType()) Diagnostics.invalidNarrowing('a type', this.position()).throw();
    return new TypeDeclaration(this.node, this.services);
  }

  asAlias(): AliasDeclaration {
    if (!this.isAlias()) Diagnostics.invalidNarrowing('an alias', this.position()).throw();
    return new AliasDeclaration(this.node, this.services);
  }

  // ---- 父声明 ----

  /** 翻译单元的直接成员返回 null */
  getParent(): Declaration | null {
    return this.node.parent === null ? null : new Declaration(this.node.parent, this.services);
  }

  parentIsFunction(): boolean {
    return this.node.parent !== null && ops.isFunction(this.node.parent);
  }

  parentIsObject(): boolean {
    return this.node.parent !== null && ops.isObject(this.node.parent);
  }

  parentIsType(): boolean {
    return ops.parentIsType(this.node);
  }

  parentIsNamespace(): boolean {
    return this.node.parent !== null && ops.isNamespace(this.node.parent);
  }

  parentIsAlias(): boolean {
    return this.node.parent !== null && ops.isAlias(this.node.parent);
  }

  parentIsPolymorphic(): boolean {
    return this.node.parent !== null && ops.isType(this.node.parent) && ops.isPolymorphic(this.node.parent);
  }

  /** 只做标记；成员在 removeMarkedMembers 之前仍然可见 */
  markForRemovalFromEnclosingType(): void {
    this.require(
      ops.markForRemovalFromEnclosingType(this.node),
      'only a member of a type can be marked for removal from its enclosing type'
    );
  }
}

export class FunctionDeclaration extends Declaration {
  indexOfParameterNamed(name: string): number {
    return ops.indexOfParameterNamed(this.node, name);
  }

  hasParameterNamed(name: string): boolean {
    return this.indexOfParameterNamed(name) !== -1;
  }

  hasInParameterNamed(name: string): boolean {
    return this.hasParameterWithNameAndPass(name, 'in');
  }

  hasOutParameterNamed(name: string): boolean {
    return this.hasParameterWithNameAndPass(name, 'out');
  }

  hasMoveParameterNamed(name: string): boolean {
    return this.hasParameterWithNameAndPass(name, 'move');
  }

  hasParameterWithNameAndPass(name: string, pass: PassingStyle): boolean {
    return ops.hasParameterWithNameAndPass(this.node, name, pass);
  }

  isFunctionWithThis(): boolean {
    return ops.isFunctionWithThis(this.node);
  }

  isVirtual(): boolean {
    return ops.isVirtualFunction(this.node);
  }

  isDefaultable(): boolean {
    return ops.isDefaultable(this.node);
  }

  isConstructor(): boolean {
    return ops.isConstructor(this.node);
  }

  isDefaultConstructor(): boolean {
    return ops.isDefaultConstructor(this.node);
  }

  isMove(): boolean {
    return ops.isMove(this.node);
  }

  isSwap(): boolean {
    return ops.isSwap(this.node);
  }

  isConstructorWithThat(): boolean {
    return ops.isConstructorWithThat(this.node);
  }

  isConstructorWithInThat(): boolean {
    return ops.isConstructorWithInThat(this.node);
  }

  isConstructorWithMoveThat(): boolean {
    return ops.isConstructorWithMoveThat(this.node);
  }

  isAssignment(): boolean {
    return ops.isAssignment(this.node);
  }

  isAssignmentWithThat(): boolean {
    return ops.isAssignmentWithThat(this.node);
  }

  isAssignmentWithInThat(): boolean {
    return ops.isAssignmentWithInThat(this.node);
  }

  isAssignmentWithMoveThat(): boolean {
    return ops.isAssignmentWithMoveThat(this.node);
  }

  isDestructor(): boolean {
    return ops.isDestructor(this.node);
  }

  isCopyOrMove(): boolean {
    return ops.isCopyOrMove(this.node);
  }

  hasDeclaredReturnType(): boolean {
    return ops.hasDeclaredReturnType(this.node);
  }

  hasBoolReturnType(): boolean {
    return ops.hasBoolReturnType(this.node);
  }

  hasNonVoidReturnType(): boolean {
    return ops.hasNonVoidReturnType(this.node);
  }

  unnamedReturnType(): string {
    return ops.unnamedReturnType(this.node);
  }

  isBinaryComparisonFunction(): boolean {
    return ops.isBinaryComparisonFunction(this.node);
  }

  defaultToVirtual(): void {
    ops.makeVirtual(this.node);
  }

  makeVirtual(): boolean {
    return ops.makeVirtual(this.node);
  }
}

export class ObjectDeclaration extends Declaration {
  /** 对象本身是 const（`const T`），指向 const 的指针不算 */
  isConst(): boolean {
    return this.typeId()?.pcQualifiers[0]?.value === 'const';
  }

  hasWildcardType(): boolean {
    const type = this.typeId();
    return type !== null && isWildcard(type);
  }

  type(): string {
    const type = this.typeId();
    return type === null ? '' : printTypeId(type);
  }

  /** 初始化器的源码文本；没有初始化器时为空字符串 */
  initializer(): string {
    return initializerText(this.node);
  }

  private typeId(): TypeIdNode | null {
    return this.node.type?.kind === 'TypeId' ? this.node.type : null;
  }
}

/** queryDeclaredValueSetFunctions 的结果 */
export interface ValueSetFunctions {
  readonly outThisInThat: boolean;
  readonly outThisMoveThat: boolean;
  readonly inoutThisInThat: boolean;
  readonly inoutThisMoveThat: boolean;
}

export class TypeDeclaration extends Declaration {
  /**
   * 声明这些名字由当前元函数的实现占用，用户已经写了同名成员时报错。
   */
  reserveNames(...names: string[]): void {
    const metaName = this.getMetafunctionName();
    for (const member of this.getMembers()) {
      for (const name of names) {
        member.require(
          !member.hasName(name),
          `in a '${metaName}' type, the name '${name}' is reserved for use by the '${metaName}' implementation`
        );
      }
    }
  }

  isPolymorphic(): boolean {
    return ops.isPolymorphic(this.node);
  }

  isFinal(): boolean {
    return this.node.type?.kind === 'Type' && this.node.type.final;
  }

  makeFinal(): boolean {
    if (this.node.type?.kind !== 'Type') return false;
    this.node.type.final = true;
    return true;
  }

  getMemberFunctions(): FunctionDeclaration[] {
    return ops
      .getTypeScopeDeclarations(this.node, MemberMask.functions)
      .map(member => new FunctionDeclaration(member, this.services));
  }

  getMemberObjects(): ObjectDeclaration[] {
    return ops
      .getTypeScopeDeclarations(this.node, MemberMask.objects)
      .map(member => new ObjectDeclaration(member, this.services));
  }

  getMemberTypes(): TypeDeclaration[] {
    return ops
      .getTypeScopeDeclarations(this.node, MemberMask.types)
      .map(member => new TypeDeclaration(member, this.services));
  }

  getMemberAliases(): AliasDeclaration[] {
    return ops
      .getTypeScopeDeclarations(this.node, MemberMask.aliases)
      .map(member => new AliasDeclaration(member, this.services));
  }

  getMembers(): Declaration[] {
    return ops.getTypeScopeDeclarations(this.node).map(member => new Declaration(member, this.services));
  }

  queryDeclaredValueSetFunctions(): ValueSetFunctions {
    const functions = this.getMemberFunctions();
    return {
      outThisInThat: functions.some(f => f.isConstructorWithInThat()),
      outThisMoveThat: functions.some(f => f.isConstructorWithMoveThat()),
      inoutThisInThat: functions.some(f => f.isAssignmentWithInThat()),
      inoutThisMoveThat: functions.some(f => f.isAssignmentWithMoveThat()),
    };
  }

  /** 解析一条成员声明并追加到类型体末尾 */
  addMember(source: string): void {
    const stmt = this.services.parseStatement(source);
    if (stmt === null) {
      this.services.snippetFailed('error attempting to add member', source, this.position());
      return;
    }
    if (!ops.addTypeMember(this.node, stmt)) {
      this.services.snippetFailed('unexpected error while attempting to add member', source, this.position());
    }
  }

  /**
   * 把一条声明加到类型所在的命名空间：全局类型的声明排入翻译单元顶层，
   * 命名空间中的类型则追加到该命名空间体内。
   */
  addDeclarationToParentNamespace(source: string): void {
    const parent = this.node.parent;
    if (parent === null) {
      this.services.parseAndAddDeclaration(source);
      return;
    }
    this.require(ops.isNamespace(parent), 'a declaration can be added only to a parent namespace');
    const stmt = this.services.parseStatement(source);
    if (stmt === null || !ops.addTypeMember(parent, stmt)) {
      this.services.snippetFailed('error attempting to add a declaration to the parent namespace', source, this.position());
    }
  }

  removeMarkedMembers(): void {
    ops.removeMarkedMembers(this.node);
  }

  removeAllMembers(): void {
    ops.removeAllMembers(this.node);
  }

  disableMemberFunctionGeneration(): void {
    this.node.memberFunctionGenerationEnabled = false;
  }
}

export class AliasDeclaration extends Declaration {}
