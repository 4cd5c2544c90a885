/**
 * @module ast/queries
 *
 * 表达式与类型标识的身份查询。后续各阶段大量使用这些查询来识别
 * "其实只是一个标识符/字面量/括号列表"的表达式。
 */

import type {
  AnyBinaryExpressionNode,
  ExpressionNode,
  IsAsExpressionNode,
  PostfixExpressionNode,
  PrimaryTerm,
  TypeIdNode,
  UnqualifiedIdNode,
} from '../types.js';
import { TokenKind } from '../types.js';

/**
 * 沿优先级阶梯向下，直到遇到第一个真正带运算符的层级。
 *
 * @returns 表达式只是单个后缀表达式时返回它，否则返回 null
 */
export function getPostfixExpression(node: ExpressionNode): PostfixExpressionNode | null {
  let current: AnyBinaryExpressionNode | IsAsExpressionNode = node.expr;
  while (current.kind === 'BinaryExpression') {
    if (current.terms.length > 0) return null;
    current = current.expr;
  }
  if (current.ops.length > 0) return null;
  const prefix = current.expr;
  if (prefix.ops.length > 0) return null;
  return prefix.expr;
}

function primaryOf(node: ExpressionNode): PrimaryTerm | null {
  const postfix = getPostfixExpression(node);
  if (!postfix || postfix.ops.length > 0) return null;
  return postfix.expr.expr;
}

export function isIdExpression(node: ExpressionNode): boolean {
  return primaryOf(node)?.kind === 'IdExpression';
}

export function isIdentifier(node: ExpressionNode): boolean {
  const primary = primaryOf(node);
  if (primary?.kind !== 'IdExpression' || primary.id.kind !== 'UnqualifiedId') return false;
  return primary.id.templateArgs.length === 0 && primary.id.identifier.kind === TokenKind.Identifier;
}

export function isExpressionList(node: ExpressionNode): boolean {
  return primaryOf(node)?.kind === 'ExpressionList';
}

export function isLiteral(node: ExpressionNode): boolean {
  return primaryOf(node)?.kind === 'Literal';
}

function isEllipsisTerm(node: IsAsExpressionNode): boolean {
  const primary = node.expr.expr.expr.expr;
  return (
    primary.kind === 'IdExpression' &&
    primary.id.kind === 'UnqualifiedId' &&
    primary.id.identifier.kind === TokenKind.Ellipsis
  );
}

function containsFoldEllipsis(node: AnyBinaryExpressionNode | IsAsExpressionNode): boolean {
  if (node.kind === 'IsAsExpression') return isEllipsisTerm(node);
  if (containsFoldEllipsis(node.expr)) return true;
  for (const term of node.terms) {
    if (containsFoldEllipsis(term.expr)) return true;
  }
  return false;
}

/** 折叠表达式：某个二元运算的操作数是单独的 `...`，如 `(args + ...)` */
export function isFoldExpression(node: ExpressionNode): boolean {
  return containsFoldEllipsis(node.expr);
}

/** 只有名字没有模板实参的单个标识 */
export function unqualifiedName(id: UnqualifiedIdNode): string {
  return id.identifier.value;
}

/** 类型为单独的 `_`，且没有任何限定符 */
export function isWildcard(type: TypeIdNode): boolean {
  return (
    type.pcQualifiers.length === 0 &&
    type.id.kind === 'UnqualifiedId' &&
    type.id.templateArgs.length === 0 &&
    type.id.identifier.value === '_'
  );
}

export function isPointerQualified(type: TypeIdNode): boolean {
  return type.pcQualifiers.some(q => q.kind === TokenKind.Multiply);
}
