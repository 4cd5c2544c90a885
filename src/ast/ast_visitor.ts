import type { AliasNode, AstNode, StatementNode } from '../types.js';

/**
 * 语法树遍历器接口（只读遍历）。
 *
 * - start：进入节点时调用，depth 为从遍历起点算起的深度
 * - end：离开节点（其全部子节点都已访问）时调用，可选
 *
 * 父链接（parent、myDecl、compoundParent）不参与遍历。
 */
export interface AstVisitor {
  start(node: AstNode, depth: number): void;
  end?(node: AstNode, depth: number): void;
}

function statementChildren(node: StatementNode): AstNode[] {
  return node.parameters ? [node.parameters, node.statement] : [node.statement];
}

function aliasChildren(node: AliasNode): AstNode[] {
  const init = node.initializer;
  switch (init.kind) {
    case 'type':
      return [init.type];
    case 'namespace':
      return [init.id];
    case 'object':
      return init.type ? [init.type, init.expr] : [init.expr];
  }
}

/** 按源码顺序返回节点的直接子节点 */
export function childrenOf(node: AstNode): AstNode[] {
  switch (node.kind) {
    case 'TranslationUnit':
      return [...node.declarations];
    case 'Declaration': {
      const children: AstNode[] = [];
      if (node.identifier) children.push(node.identifier);
      children.push(...node.metafunctions);
      if (node.templateParameters) children.push(node.templateParameters);
      if (node.type) children.push(node.type);
      if (node.requiresClause) children.push(node.requiresClause);
      if (node.initializer) children.push(node.initializer);
      return children;
    }
    case 'FunctionType': {
      const children: AstNode[] = [node.parameters];
      if (node.returns.kind === 'single') children.push(node.returns.type);
      if (node.returns.kind === 'list') children.push(node.returns.list);
      children.push(...node.contracts);
      return children;
    }
    case 'Type':
    case 'Namespace':
      return [];
    case 'Alias':
      return aliasChildren(node);
    case 'ParameterDeclarationList':
      return [...node.parameters];
    case 'ParameterDeclaration':
      return [node.declaration];
    case 'Statement':
      return statementChildren(node);
    case 'ExpressionStatement':
      return [node.expr];
    case 'CompoundStatement':
      return [...node.statements];
    case 'SelectionStatement':
      return node.falseBranch
        ? [node.expression, node.trueBranch, node.falseBranch]
        : [node.expression, node.trueBranch];
    case 'ReturnStatement':
      return node.expression ? [node.expression] : [];
    case 'IterationStatement': {
      const children: AstNode[] = [];
      if (node.range) children.push(node.range);
      if (node.condition && node.loopKind === 'while') children.push(node.condition);
      if (node.nextExpression && node.loopKind !== 'do') children.push(node.nextExpression);
      if (node.parameter) children.push(node.parameter);
      if (node.statements) children.push(node.statements);
      if (node.body) children.push(node.body);
      if (node.condition && node.loopKind === 'do') children.push(node.condition);
      if (node.nextExpression && node.loopKind === 'do') children.push(node.nextExpression);
      return children;
    }
    case 'UsingStatement':
      return [node.id];
    case 'Contract':
      return node.group ? [node.group, node.condition] : [node.condition];
    case 'JumpStatement':
      return [];
    case 'InspectExpression':
      return node.resultType
        ? [node.expression, node.resultType, ...node.alternatives]
        : [node.expression, ...node.alternatives];
    case 'Alternative': {
      const children: AstNode[] = [];
      if (node.name) children.push(node.name);
      if (node.typeId) children.push(node.typeId);
      if (node.value) children.push(node.value);
      children.push(node.statement);
      return children;
    }
    case 'Expression':
      return [node.expr];
    case 'BinaryExpression': {
      const children: AstNode[] = [node.expr];
      for (const term of node.terms) children.push(term.expr);
      return children;
    }
    case 'IsAsExpression': {
      const children: AstNode[] = [node.expr];
      for (const term of node.ops) {
        if (term.type) children.push(term.type);
        if (term.expr) children.push(term.expr);
      }
      return children;
    }
    case 'PrefixExpression':
      return [node.expr];
    case 'PostfixExpression': {
      const children: AstNode[] = [node.expr];
      for (const op of node.ops) {
        if (op.idExpr) children.push(op.idExpr);
        if (op.exprList) children.push(op.exprList);
      }
      return children;
    }
    case 'PrimaryExpression':
      return [node.expr];
    case 'ExpressionList':
      return node.expressions.map(term => term.expr);
    case 'Literal':
      return [];
    case 'IdExpression':
      return [node.id];
    case 'QualifiedId':
      return node.ids.map(term => term.id);
    case 'UnqualifiedId':
      return [...node.templateArgs];
    case 'TypeId':
      return [node.id];
  }
}

/** 深度优先遍历，从 node 开始 */
export function visitTree(node: AstNode, visitor: AstVisitor, depth = 0): void {
  visitor.start(node, depth);
  for (const child of childrenOf(node)) {
    visitTree(child, visitor, depth + 1);
  }
  visitor.end?.(node, depth);
}
