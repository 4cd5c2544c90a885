/**
 * 反射层：元函数看到的声明视图、编译器服务与内置元函数目录
 */

export { CompilerServices, MetafunctionRequireError } from './compiler-services.js';
export type { CompilerServicesInit } from './compiler-services.js';
export { AliasDeclaration, Declaration, FunctionDeclaration, ObjectDeclaration, TypeDeclaration } from './declarations.js';
export type { ValueSetFunctions } from './declarations.js';
export { applyMetafunctions, createMetafunctionApplier, pluginSymbol } from './apply.js';
export type { MetafunctionApplierOptions, MetafunctionLookup } from './apply.js';
export {
  addVirtualDestructor,
  basicEnum,
  basicValue,
  copyable,
  cpp2Enum,
  cpp2Interface,
  cpp2Struct,
  cpp2Union,
  createBuiltinCatalogue,
  flagEnum,
  ordered,
  parseIntegerLiteral,
  partiallyOrdered,
  partiallyOrderedValue,
  polymorphicBase,
  value,
  weaklyOrdered,
  weaklyOrderedValue,
} from './metafunctions.js';
export type { Metafunction, MetafunctionOutput, Ordering } from './metafunctions.js';
