/**
 * @module types/ast
 *
 * cpp2 语法树节点定义。
 *
 * **约定**：
 * - 每个节点带有 `kind` 判别字段与 `span`
 * - 子节点直接持有；父链接（`parent`、`myDecl`、`compoundParent`）只是普通引用，不表示所有权
 * - 二元表达式的每一层都是"最左项 + 扁平的 (运算符, 项) 列表"，不构造嵌套二叉树
 */

import type { Span, Token } from '../types.js';
import type { CaptureGroup } from '../ast/capture-group.js';

/** 参数与实参的传递方式 */
export type PassingStyle = 'in' | 'copy' | 'inout' | 'out' | 'move' | 'forward';

export type Accessibility = 'default' | 'public' | 'protected' | 'private';

/** 参数修饰符，`this` 参数上的 virtual/override/final 决定成员函数是否为虚函数 */
export type ParameterModifier = 'none' | 'implicit' | 'virtual' | 'override' | 'final';

// ============================================================
// 标识符与类型
// ============================================================

export type TemplateArgument = ExpressionNode | TypeIdNode;

export interface UnqualifiedIdNode {
  readonly kind: 'UnqualifiedId';
  readonly identifier: Token;
  openAngle: Token | null;
  closeAngle: Token | null;
  readonly templateArgs: TemplateArgument[];
  span: Span;
}

export interface QualifiedIdTerm {
  /** `::`；首段没有前导 `::` 时为 null */
  readonly scopeOp: Token | null;
  readonly id: UnqualifiedIdNode;
}

export interface QualifiedIdNode {
  readonly kind: 'QualifiedId';
  readonly ids: QualifiedIdTerm[];
  span: Span;
}

export interface IdExpressionNode {
  readonly kind: 'IdExpression';
  readonly id: UnqualifiedIdNode | QualifiedIdNode;
  span: Span;
}

export interface TypeIdNode {
  readonly kind: 'TypeId';
  /** 前置的 `*` 与 `const` */
  readonly pcQualifiers: Token[];
  addressOf: Token | null;
  dereferenceOf: Token | null;
  dereferenceCount: number;
  readonly id: UnqualifiedIdNode | QualifiedIdNode;
  span: Span;
}

// ============================================================
// 表达式
// ============================================================

export interface LiteralNode {
  readonly kind: 'Literal';
  readonly token: Token;
  readonly userDefinedSuffix: Token | null;
  span: Span;
}

export interface ExpressionListTerm {
  readonly pass: PassingStyle;
  readonly expr: ExpressionNode;
}

export interface ExpressionListNode {
  readonly kind: 'ExpressionList';
  readonly openParen: Token | null;
  closeParen: Token | null;
  insideInitializer: boolean;
  readonly expressions: ExpressionListTerm[];
  span: Span;
}

export interface AlternativeNode {
  readonly kind: 'Alternative';
  readonly name: UnqualifiedIdNode | null;
  /** `is` 或 `as` */
  readonly isAs: Token;
  readonly typeId: TypeIdNode | null;
  readonly value: PostfixExpressionNode | null;
  readonly equalSign: Token;
  readonly statement: StatementNode;
  span: Span;
}

export interface InspectExpressionNode {
  readonly kind: 'InspectExpression';
  readonly isConstexpr: boolean;
  readonly identifier: Token;
  readonly expression: ExpressionNode;
  readonly resultType: TypeIdNode | null;
  readonly openBrace: Token;
  closeBrace: Token | null;
  readonly alternatives: AlternativeNode[];
  span: Span;
}

export type PrimaryTerm =
  | IdExpressionNode
  | ExpressionListNode
  | LiteralNode
  | DeclarationNode
  | InspectExpressionNode;

export interface PrimaryExpressionNode {
  readonly kind: 'PrimaryExpression';
  readonly expr: PrimaryTerm;
  span: Span;
}

export interface PostfixOp {
  readonly op: Token;
  /** `.` 之后的成员名 */
  readonly idExpr: IdExpressionNode | null;
  /** `(` 或 `[` 之内的实参 */
  readonly exprList: ExpressionListNode | null;
  readonly opClose: Token | null;
}

export interface PostfixExpressionNode {
  readonly kind: 'PostfixExpression';
  readonly expr: PrimaryExpressionNode;
  readonly ops: PostfixOp[];
  /** 带 `$` 时登记到的捕获组 */
  capGrp: CaptureGroup | null;
  span: Span;
}

export interface PrefixExpressionNode {
  readonly kind: 'PrefixExpression';
  readonly ops: Token[];
  readonly expr: PostfixExpressionNode;
  span: Span;
}

export interface IsAsTerm {
  readonly op: Token;
  readonly type: TypeIdNode | null;
  readonly expr: PrefixExpressionNode | null;
}

export interface IsAsExpressionNode {
  readonly kind: 'IsAsExpression';
  readonly expr: PrefixExpressionNode;
  readonly ops: IsAsTerm[];
  span: Span;
}

export type BinaryLevel =
  | 'multiplicative'
  | 'additive'
  | 'shift'
  | 'compare'
  | 'relational'
  | 'equality'
  | 'bitand'
  | 'bitxor'
  | 'bitor'
  | 'logicaland'
  | 'logicalor'
  | 'assignment';

export interface BinaryTerm<T> {
  readonly op: Token;
  readonly expr: T;
}

export interface BinaryExpressionNode<L extends BinaryLevel, T> {
  readonly kind: 'BinaryExpression';
  readonly level: L;
  readonly expr: T;
  readonly terms: BinaryTerm<T>[];
  span: Span;
}

export type MultiplicativeExpressionNode = BinaryExpressionNode<'multiplicative', IsAsExpressionNode>;
export type AdditiveExpressionNode = BinaryExpressionNode<'additive', MultiplicativeExpressionNode>;
export type ShiftExpressionNode = BinaryExpressionNode<'shift', AdditiveExpressionNode>;
export type CompareExpressionNode = BinaryExpressionNode<'compare', ShiftExpressionNode>;
export type RelationalExpressionNode = BinaryExpressionNode<'relational', CompareExpressionNode>;
export type EqualityExpressionNode = BinaryExpressionNode<'equality', RelationalExpressionNode>;
export type BitAndExpressionNode = BinaryExpressionNode<'bitand', EqualityExpressionNode>;
export type BitXorExpressionNode = BinaryExpressionNode<'bitxor', BitAndExpressionNode>;
export type BitOrExpressionNode = BinaryExpressionNode<'bitor', BitXorExpressionNode>;
export type LogicalAndExpressionNode = BinaryExpressionNode<'logicaland', BitOrExpressionNode>;
export type LogicalOrExpressionNode = BinaryExpressionNode<'logicalor', LogicalAndExpressionNode>;
export type AssignmentExpressionNode = BinaryExpressionNode<'assignment', LogicalOrExpressionNode>;

export type AnyBinaryExpressionNode =
  | MultiplicativeExpressionNode
  | AdditiveExpressionNode
  | ShiftExpressionNode
  | CompareExpressionNode
  | RelationalExpressionNode
  | EqualityExpressionNode
  | BitAndExpressionNode
  | BitXorExpressionNode
  | BitOrExpressionNode
  | LogicalAndExpressionNode
  | LogicalOrExpressionNode
  | AssignmentExpressionNode;

export interface ExpressionNode {
  readonly kind: 'Expression';
  readonly expr: AssignmentExpressionNode;
  span: Span;
}

// ============================================================
// 语句
// ============================================================

export interface ExpressionStatementNode {
  readonly kind: 'ExpressionStatement';
  readonly expr: ExpressionNode;
  readonly hasSemicolon: boolean;
  span: Span;
}

export interface CompoundStatementNode {
  readonly kind: 'CompoundStatement';
  readonly openBrace: Token;
  closeBrace: Token | null;
  statements: StatementNode[];
  span: Span;
}

export interface SelectionStatementNode {
  readonly kind: 'SelectionStatement';
  readonly isConstexpr: boolean;
  readonly identifier: Token;
  readonly expression: LogicalOrExpressionNode;
  readonly trueBranch: CompoundStatementNode;
  /** `else { }` 为复合语句，`else if` 为嵌套的选择语句 */
  readonly falseBranch: StatementNode | null;
  span: Span;
}

export interface ReturnStatementNode {
  readonly kind: 'ReturnStatement';
  readonly identifier: Token;
  readonly expression: ExpressionNode | null;
  span: Span;
}

export type IterationKind = 'while' | 'do' | 'for';

export interface IterationStatementNode {
  readonly kind: 'IterationStatement';
  readonly loopKind: IterationKind;
  readonly label: Token | null;
  readonly identifier: Token;
  /** while/do 的条件 */
  readonly condition: LogicalOrExpressionNode | null;
  readonly nextExpression: AssignmentExpressionNode | null;
  /** while/do 的循环体 */
  readonly statements: CompoundStatementNode | null;
  /** for 的范围表达式 */
  readonly range: ExpressionNode | null;
  /** for 的循环变量 */
  readonly parameter: ParameterDeclarationNode | null;
  /** for 的循环体 */
  readonly body: StatementNode | null;
  span: Span;
}

export interface UsingStatementNode {
  readonly kind: 'UsingStatement';
  readonly keyword: Token;
  readonly forNamespace: boolean;
  readonly id: IdExpressionNode;
  span: Span;
}

export type ContractKind = 'pre' | 'post' | 'assert';

export interface ContractNode {
  readonly kind: 'Contract';
  readonly openBracket: Token;
  readonly contractKind: ContractKind;
  readonly group: IdExpressionNode | null;
  readonly condition: LogicalOrExpressionNode;
  readonly message: Token | null;
  /** 后置条件中 `x$` 捕获的入口值 */
  readonly captures: CaptureGroup;
  span: Span;
}

export interface JumpStatementNode {
  readonly kind: 'JumpStatement';
  readonly keyword: Token;
  readonly label: Token | null;
  span: Span;
}

export type StatementKindNode =
  | ExpressionStatementNode
  | CompoundStatementNode
  | SelectionStatementNode
  | DeclarationNode
  | ReturnStatementNode
  | IterationStatementNode
  | UsingStatementNode
  | ContractNode
  | InspectExpressionNode
  | JumpStatementNode;

export interface StatementNode {
  readonly kind: 'Statement';
  statement: StatementKindNode;
  /** 语句前的参数列表，如 `(copy i := 0) while i < 3 next i++ { }` */
  parameters: ParameterDeclarationListNode | null;
  compoundParent: CompoundStatementNode | null;
  emitted: boolean;
  markedForRemoval: boolean;
  span: Span;
}

// ============================================================
// 声明
// ============================================================

export interface ParameterDeclarationNode {
  readonly kind: 'ParameterDeclaration';
  pass: PassingStyle;
  readonly ordinal: number;
  modifier: ParameterModifier;
  readonly declaration: DeclarationNode;
  span: Span;
}

export interface ParameterDeclarationListNode {
  readonly kind: 'ParameterDeclarationList';
  readonly openParen: Token;
  closeParen: Token | null;
  readonly parameters: ParameterDeclarationNode[];
  span: Span;
}

export type FunctionReturns =
  | { readonly kind: 'none' }
  | { readonly kind: 'single'; readonly type: TypeIdNode; readonly pass: PassingStyle }
  | { readonly kind: 'list'; readonly list: ParameterDeclarationListNode };

export interface FunctionTypeNode {
  readonly kind: 'FunctionType';
  readonly myDecl: DeclarationNode;
  readonly parameters: ParameterDeclarationListNode;
  throws: boolean;
  returns: FunctionReturns;
  readonly contracts: ContractNode[];
  span: Span;
}

export interface TypeNode {
  readonly kind: 'Type';
  readonly typeKeyword: Token;
  final: boolean;
  span: Span;
}

export interface NamespaceNode {
  readonly kind: 'Namespace';
  readonly namespaceKeyword: Token;
  span: Span;
}

export type AliasInitializer =
  | { readonly kind: 'type'; readonly type: TypeIdNode }
  | { readonly kind: 'namespace'; readonly id: IdExpressionNode }
  | { readonly kind: 'object'; readonly type: TypeIdNode | null; readonly expr: ExpressionNode };

export interface AliasNode {
  readonly kind: 'Alias';
  readonly equalOp: Token;
  readonly initializer: AliasInitializer;
  span: Span;
}

export type DeclarationTypeNode = FunctionTypeNode | TypeIdNode | TypeNode | NamespaceNode | AliasNode;

export interface DeclarationNode {
  readonly kind: 'Declaration';
  /** 无名声明（函数表达式、无名对象）为 null */
  readonly identifier: UnqualifiedIdNode | null;
  access: Accessibility;
  /** 解析完成前为 null */
  type: DeclarationTypeNode | null;
  readonly metafunctions: IdExpressionNode[];
  templateParameters: ParameterDeclarationListNode | null;
  requiresClause: LogicalOrExpressionNode | null;
  initializer: StatementNode | null;
  /** 翻译单元的直接成员为 null */
  parent: DeclarationNode | null;
  myStatement: StatementNode | null;
  /** 使用 `==` 引入初始化 */
  isConstexpr: boolean;
  isVariadic: boolean;
  memberFunctionGenerationEnabled: boolean;
  isAParameter: boolean;
  isATemplateParameter: boolean;
  readonly captures: CaptureGroup;
  span: Span;
}

export interface TranslationUnitNode {
  readonly kind: 'TranslationUnit';
  readonly declarations: DeclarationNode[];
  span: Span;
}

/** 所有语法树节点，供访问者与打印器使用 */
export type AstNode =
  | TranslationUnitNode
  | DeclarationNode
  | FunctionTypeNode
  | TypeNode
  | NamespaceNode
  | AliasNode
  | ParameterDeclarationListNode
  | ParameterDeclarationNode
  | StatementNode
  | ExpressionStatementNode
  | CompoundStatementNode
  | SelectionStatementNode
  | ReturnStatementNode
  | IterationStatementNode
  | UsingStatementNode
  | ContractNode
  | JumpStatementNode
  | InspectExpressionNode
  | AlternativeNode
  | ExpressionNode
  | AnyBinaryExpressionNode
  | IsAsExpressionNode
  | PrefixExpressionNode
  | PostfixExpressionNode
  | PrimaryExpressionNode
  | ExpressionListNode
  | LiteralNode
  | IdExpressionNode
  | QualifiedIdNode
  | UnqualifiedIdNode
  | TypeIdNode;
