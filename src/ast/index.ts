/**
 * @module ast
 *
 * AST（抽象语法树）模块。
 *
 * 包含：
 * - AST 节点构造器 (Node)
 * - 捕获组 (CaptureGroup)
 * - 访问者与深度优先遍历 (AstVisitor, visitTree)
 * - 声明查询与结构性修改 (declaration-ops)
 * - 源码重建与节点转储 (printer)
 */

export { Node } from './ast.js';
export { CaptureGroup } from './capture-group.js';
export type { Capture } from './capture-group.js';
export { childrenOf, visitTree } from './ast_visitor.js';
export type { AstVisitor } from './ast_visitor.js';
export * from './declaration-ops.js';
export * from './queries.js';
export { ParseTreePrinter, printDeclaration, printExpression, printSource, printStatement, printTypeId } from './printer.js';
export type { PrintOptions } from './printer.js';
