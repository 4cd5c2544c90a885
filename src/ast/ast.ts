// Simple AST node constructors
import type * as AST from '../types.js';
import { CaptureGroup } from './capture-group.js';

function createEmptySpan(): AST.Span {
  return {
    start: { line: 0, col: 0 },
    end: { line: 0, col: 0 },
  };
}

export const Node = {
  TranslationUnit: (): AST.TranslationUnitNode => ({
    kind: 'TranslationUnit',
    declarations: [],
    span: createEmptySpan(),
  }),
  UnqualifiedId: (identifier: AST.Token): AST.UnqualifiedIdNode => ({
    kind: 'UnqualifiedId',
    identifier,
    openAngle: null,
    closeAngle: null,
    templateArgs: [],
    span: { start: identifier.start, end: identifier.end },
  }),
  QualifiedId: (ids: AST.QualifiedIdTerm[]): AST.QualifiedIdNode => ({
    kind: 'QualifiedId',
    ids,
    span: createEmptySpan(),
  }),
  IdExpression: (id: AST.UnqualifiedIdNode | AST.QualifiedIdNode): AST.IdExpressionNode => ({
    kind: 'IdExpression',
    id,
    span: id.span,
  }),
  TypeId: (pcQualifiers: AST.Token[], id: AST.UnqualifiedIdNode | AST.QualifiedIdNode): AST.TypeIdNode => ({
    kind: 'TypeId',
    pcQualifiers,
    addressOf: null,
    dereferenceOf: null,
    dereferenceCount: 0,
    id,
    span: createEmptySpan(),
  }),
  Literal: (token: AST.Token, userDefinedSuffix: AST.Token | null): AST.LiteralNode => ({
    kind: 'Literal',
    token,
    userDefinedSuffix,
    span: { start: token.start, end: (userDefinedSuffix ?? token).end },
  }),
  ExpressionList: (openParen: AST.Token | null, insideInitializer = false): AST.ExpressionListNode => ({
    kind: 'ExpressionList',
    openParen,
    closeParen: null,
    insideInitializer,
    expressions: [],
    span: createEmptySpan(),
  }),
  PrimaryExpression: (expr: AST.PrimaryTerm): AST.PrimaryExpressionNode => ({
    kind: 'PrimaryExpression',
    expr,
    span: expr.span,
  }),
  PostfixExpression: (expr: AST.PrimaryExpressionNode): AST.PostfixExpressionNode => ({
    kind: 'PostfixExpression',
    expr,
    ops: [],
    capGrp: null,
    span: expr.span,
  }),
  PrefixExpression: (ops: AST.Token[], expr: AST.PostfixExpressionNode): AST.PrefixExpressionNode => ({
    kind: 'PrefixExpression',
    ops,
    expr,
    span: createEmptySpan(),
  }),
  IsAsExpression: (expr: AST.PrefixExpressionNode): AST.IsAsExpressionNode => ({
    kind: 'IsAsExpression',
    expr,
    ops: [],
    span: expr.span,
  }),
  BinaryExpression: <L extends AST.BinaryLevel, T>(level: L, expr: T, span: AST.Span): AST.BinaryExpressionNode<L, T> => ({
    kind: 'BinaryExpression',
    level,
    expr,
    terms: [],
    span,
  }),
  Expression: (expr: AST.AssignmentExpressionNode): AST.ExpressionNode => ({
    kind: 'Expression',
    expr,
    span: expr.span,
  }),
  InspectExpression: (
    isConstexpr: boolean,
    identifier: AST.Token,
    expression: AST.ExpressionNode,
    resultType: AST.TypeIdNode | null,
    openBrace: AST.Token
  ): AST.InspectExpressionNode => ({
    kind: 'InspectExpression',
    isConstexpr,
    identifier,
    expression,
    resultType,
    openBrace,
    closeBrace: null,
    alternatives: [],
    span: createEmptySpan(),
  }),
  Alternative: (
    name: AST.UnqualifiedIdNode | null,
    isAs: AST.Token,
    typeId: AST.TypeIdNode | null,
    value: AST.PostfixExpressionNode | null,
    equalSign: AST.Token,
    statement: AST.StatementNode
  ): AST.AlternativeNode => ({
    kind: 'Alternative',
    name,
    isAs,
    typeId,
    value,
    equalSign,
    statement,
    span: createEmptySpan(),
  }),
  ExpressionStatement: (expr: AST.ExpressionNode, hasSemicolon: boolean): AST.ExpressionStatementNode => ({
    kind: 'ExpressionStatement',
    expr,
    hasSemicolon,
    span: expr.span,
  }),
  CompoundStatement: (openBrace: AST.Token): AST.CompoundStatementNode => ({
    kind: 'CompoundStatement',
    openBrace,
    closeBrace: null,
    statements: [],
    span: createEmptySpan(),
  }),
  SelectionStatement: (
    isConstexpr: boolean,
    identifier: AST.Token,
    expression: AST.LogicalOrExpressionNode,
    trueBranch: AST.CompoundStatementNode,
    falseBranch: AST.StatementNode | null
  ): AST.SelectionStatementNode => ({
    kind: 'SelectionStatement',
    isConstexpr,
    identifier,
    expression,
    trueBranch,
    falseBranch,
    span: createEmptySpan(),
  }),
  ReturnStatement: (identifier: AST.Token, expression: AST.ExpressionNode | null): AST.ReturnStatementNode => ({
    kind: 'ReturnStatement',
    identifier,
    expression,
    span: createEmptySpan(),
  }),
  IterationStatement: (
    fields: Omit<AST.IterationStatementNode, 'kind' | 'span'>
  ): AST.IterationStatementNode => ({
    kind: 'IterationStatement',
    ...fields,
    span: createEmptySpan(),
  }),
  UsingStatement: (keyword: AST.Token, forNamespace: boolean, id: AST.IdExpressionNode): AST.UsingStatementNode => ({
    kind: 'UsingStatement',
    keyword,
    forNamespace,
    id,
    span: createEmptySpan(),
  }),
  Contract: (
    openBracket: AST.Token,
    contractKind: AST.ContractKind,
    group: AST.IdExpressionNode | null,
    condition: AST.LogicalOrExpressionNode,
    message: AST.Token | null,
    captures: CaptureGroup
  ): AST.ContractNode => ({
    kind: 'Contract',
    openBracket,
    contractKind,
    group,
    condition,
    message,
    captures,
    span: createEmptySpan(),
  }),
  JumpStatement: (keyword: AST.Token, label: AST.Token | null): AST.JumpStatementNode => ({
    kind: 'JumpStatement',
    keyword,
    label,
    span: createEmptySpan(),
  }),
  Statement: (statement: AST.StatementKindNode): AST.StatementNode => ({
    kind: 'Statement',
    statement,
    parameters: null,
    compoundParent: null,
    emitted: false,
    markedForRemoval: false,
    span: statement.span,
  }),
  ParameterDeclaration: (
    pass: AST.PassingStyle,
    ordinal: number,
    modifier: AST.ParameterModifier,
    declaration: AST.DeclarationNode
  ): AST.ParameterDeclarationNode => ({
    kind: 'ParameterDeclaration',
    pass,
    ordinal,
    modifier,
    declaration,
    span: createEmptySpan(),
  }),
  ParameterDeclarationList: (openParen: AST.Token): AST.ParameterDeclarationListNode => ({
    kind: 'ParameterDeclarationList',
    openParen,
    closeParen: null,
    parameters: [],
    span: createEmptySpan(),
  }),
  FunctionType: (myDecl: AST.DeclarationNode, parameters: AST.ParameterDeclarationListNode): AST.FunctionTypeNode => ({
    kind: 'FunctionType',
    myDecl,
    parameters,
    throws: false,
    returns: { kind: 'none' },
    contracts: [],
    span: createEmptySpan(),
  }),
  Type: (typeKeyword: AST.Token, final: boolean): AST.TypeNode => ({
    kind: 'Type',
    typeKeyword,
    final,
    span: { start: typeKeyword.start, end: typeKeyword.end },
  }),
  Namespace: (namespaceKeyword: AST.Token): AST.NamespaceNode => ({
    kind: 'Namespace',
    namespaceKeyword,
    span: { start: namespaceKeyword.start, end: namespaceKeyword.end },
  }),
  Alias: (equalOp: AST.Token, initializer: AST.AliasInitializer): AST.AliasNode => ({
    kind: 'Alias',
    equalOp,
    initializer,
    span: createEmptySpan(),
  }),
  Declaration: (
    identifier: AST.UnqualifiedIdNode | null,
    parent: AST.DeclarationNode | null
  ): AST.DeclarationNode => ({
    kind: 'Declaration',
    identifier,
    access: 'default',
    type: null,
    metafunctions: [],
    templateParameters: null,
    requiresClause: null,
    initializer: null,
    parent,
    myStatement: null,
    isConstexpr: false,
    isVariadic: false,
    memberFunctionGenerationEnabled: true,
    isAParameter: false,
    isATemplateParameter: false,
    captures: new CaptureGroup(),
    span: createEmptySpan(),
  }),
};
