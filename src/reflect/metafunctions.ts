/**
 * @module reflect/metafunctions
 *
 * 内置元函数目录。每个元函数接收目标类型的 TypeDeclaration 视图，
 * 检查成员并通过 addMember 拼接新生成的成员。
 *
 * 生成的代码本身是 cpp2 文本，会被再次词法分析与解析；这里只负责拼出文本。
 */

import type { TypeDeclaration } from './declarations.js';

export type Metafunction = (t: TypeDeclaration) => void;

/** `@print` 的输出目的地 */
export type MetafunctionOutput = (text: string) => void;

// ============================================================
// 多态与接口
// ============================================================

export function addVirtualDestructor(t: TypeDeclaration): void {
  t.addMember('operator=: (virtual move this) = { }');
}

/**
 * 纯抽象接口：没有数据成员，所有函数都是没有函数体的公有虚函数。
 */
export function cpp2Interface(t: TypeDeclaration): void {
  let hasDestructor = false;
  for (const m of t.getMembers()) {
    m.require(!m.isObject(), 'interfaces may not contain data objects');
    if (!m.isFunction()) continue;
    const mf = m.asFunction();
    mf.require(!mf.isCopyOrMove(), 'interfaces may not copy or move; consider a virtual clone() instead');
    mf.require(!mf.hasInitializer(), "interface functions must not have a function body; remove the '=' initializer");
    mf.require(mf.makePublic(), 'interface functions must be public');
    mf.defaultToVirtual();
    hasDestructor ||= mf.isDestructor();
  }
  if (!hasDestructor) addVirtualDestructor(t);
}

/**
 * 多态基类：不能复制或移动，析构函数要么公有且虚，要么受保护且非虚。
 * 未写访问级别的成员函数同 interface 一样定为公有。
 */
export function polymorphicBase(t: TypeDeclaration): void {
  let hasDestructor = false;
  for (const mf of t.getMemberFunctions()) {
    mf.defaultToPublic();
    if (!mf.hasName('operator=')) continue;
    mf.require(!mf.isCopyOrMove(), 'polymorphic_base types may not copy or move; consider a virtual clone() instead');
    if (!mf.isDestructor()) continue;
    hasDestructor = true;
    const publicVirtual = mf.isPublic() && mf.isVirtual();
    const protectedNonvirtual = mf.isProtected() && !mf.isVirtual();
    mf.require(
      publicVirtual || protectedNonvirtual,
      'a polymorphic base type destructor must be public and virtual, or protected and nonvirtual'
    );
  }
  if (!hasDestructor) addVirtualDestructor(t);
}

// ============================================================
// 比较
// ============================================================

export type Ordering = 'strong_ordering' | 'weak_ordering' | 'partial_ordering';

/** 已有的 `operator<=>` 必须返回该 ordering；没有时生成声明 */
export function orderedImpl(t: TypeDeclaration, ordering: Ordering): void {
  let hasSpaceship = false;
  for (const mf of t.getMemberFunctions()) {
    if (!mf.hasName('operator<=>')) continue;
    hasSpaceship = true;
    if (!mf.unnamedReturnType().includes(ordering)) {
      mf.error(`operator<=> must return std::${ordering}`);
    }
  }
  if (!hasSpaceship) {
    t.addMember(`operator<=>: (this, that) -> std::${ordering};`);
  }
}

export function ordered(t: TypeDeclaration): void {
  orderedImpl(t, 'strong_ordering');
}

export function weaklyOrdered(t: TypeDeclaration): void {
  orderedImpl(t, 'weak_ordering');
}

export function partiallyOrdered(t: TypeDeclaration): void {
  orderedImpl(t, 'partial_ordering');
}

// ============================================================
// 值语义
// ============================================================

/**
 * 复制/移动构造与赋值。只写了某个特化形式却没写 `(out this, that)` 时报错；
 * 否则补齐缺少的全部形式。
 */
export function copyable(t: TypeDeclaration): void {
  const declared = t.queryDeclaredValueSetFunctions();
  const anySpecific = declared.outThisMoveThat || declared.inoutThisInThat || declared.inoutThisMoveThat;
  if (!declared.outThisInThat && anySpecific) {
    t.error(
      'this type is partially copyable/movable - when you provide any of the more-specific operator= signatures, ' +
        'you must also provide the one with the general signature (out this, that); alternatively, consider removing ' +
        'all the operator= functions and let them all be generated for you with default memberwise semantics'
    );
    return;
  }
  if (!declared.outThisInThat) t.addMember('operator=: (out this, that) = { }');
  if (!declared.outThisMoveThat) t.addMember('operator=: (out this, move that) = { }');
  if (!declared.inoutThisInThat) t.addMember('operator=: (inout this, that) = { }');
  if (!declared.inoutThisMoveThat) t.addMember('operator=: (inout this, move that) = { }');
}

export function basicValue(t: TypeDeclaration): void {
  copyable(t);
  let hasDefaultConstructor = false;
  for (const mf of t.getMemberFunctions()) {
    hasDefaultConstructor ||= mf.isDefaultConstructor();
    mf.require(!mf.isProtected() && !mf.isVirtual(), 'a value type may not have a protected or virtual function');
    mf.require(
      !mf.isDestructor() || mf.isPublic() || mf.isDefaultAccess(),
      'a value type may not have a non-public destructor'
    );
  }
  if (!hasDefaultConstructor) t.addMember('operator=: (out this) = { }');
}

export function value(t: TypeDeclaration): void {
  ordered(t);
  basicValue(t);
}

export function weaklyOrderedValue(t: TypeDeclaration): void {
  weaklyOrdered(t);
  basicValue(t);
}

export function partiallyOrderedValue(t: TypeDeclaration): void {
  partiallyOrdered(t);
  basicValue(t);
}

/**
 * 所有成员公有，没有虚函数和用户定义的 `operator=`（包括析构函数），不生成成员函数。
 */
export function cpp2Struct(t: TypeDeclaration): void {
  for (const m of t.getMembers()) {
    m.require(m.makePublic(), 'all struct members must be public');
    if (!m.isFunction()) continue;
    const mf = m.asFunction();
    t.require(!mf.isVirtual(), 'a struct may not have a virtual function');
    t.require(!mf.hasName('operator='), 'a struct may not have a user-defined operator=');
  }
  t.disableMemberFunctionGeneration();
}

// ============================================================
// 枚举
// ============================================================

interface ValueMemberInfo {
  readonly name: string;
  readonly type: string;
  readonly value: string;
}

const SIGNED_TYPES: ReadonlyArray<readonly [string, bigint, bigint]> = [
  ['i8', -(2n ** 7n), 2n ** 7n - 1n],
  ['i16', -(2n ** 15n), 2n ** 15n - 1n],
  ['i32', -(2n ** 31n), 2n ** 31n - 1n],
  ['i64', -(2n ** 63n), 2n ** 63n - 1n],
];

const UNSIGNED_TYPES: ReadonlyArray<readonly [string, bigint]> = [
  ['u8', 2n ** 8n - 1n],
  ['u16', 2n ** 16n - 1n],
  ['u32', 2n ** 32n - 1n],
  ['u64', 2n ** 64n - 1n],
];

const INTEGER_LITERAL = /^(-?)\s*(0[xX][0-9a-fA-F']+|0[bB][01']+|[0-9][0-9']*)$/;

/**
 * 把整数字面量文本（可带负号与 `'` 分隔符）转为 BigInt。
 *
 * @returns 不是整数字面量时返回 null
 */
export function parseIntegerLiteral(text: string): bigint | null {
  const match = INTEGER_LITERAL.exec(text.trim());
  if (match === null) return null;
  const [, sign, digits = ''] = match;
  const magnitude = BigInt(digits.replace(/'/g, ''));
  return sign === '-' ? -magnitude : magnitude;
}

function isPowerOfTwo(v: bigint): boolean {
  return v > 0n && (v & (v - 1n)) === 0n;
}

/** 能表示 [min, max] 的最小有符号类型；超出 i64 时返回 null */
function smallestSignedType(min: bigint, max: bigint): string | null {
  return SIGNED_TYPES.find(([, lo, hi]) => min >= lo && max <= hi)?.[0] ?? null;
}

function smallestUnsignedType(max: bigint): string | null {
  return UNSIGNED_TYPES.find(([, hi]) => max <= hi)?.[0] ?? null;
}

function nextEnumValue(previous: string): string {
  const v = parseIntegerLiteral(previous);
  return v === null ? `(${previous}) + 1` : (v + 1n).toString();
}

function nextFlagValue(previous: string): string {
  const v = parseIntegerLiteral(previous);
  if (v === null) return `(${previous}) * 2`;
  return v < 1n ? '1' : (v * 2n).toString();
}

function enumToString(typeName: string, enumerators: readonly ValueMemberInfo[], bitwise: boolean): string {
  const lines = ['to_string: (this) -> std::string = {'];
  if (bitwise) {
    lines.push('    _ret: std::string = "(";', '    _comma: std::string = ();', '    if this == none { return "(none)"; }');
  }
  for (const e of enumerators) {
    if (e.name === '_' || (bitwise && e.name === 'none')) continue;
    lines.push(
      bitwise
        ? `    if (this & ${e.name}) == ${e.name} { _ret += _comma + "${e.name}"; _comma = ", "; }`
        : `    if this == ${e.name} { return "${e.name}"; }`
    );
  }
  lines.push(bitwise ? '    return _ret + ")";' : `    return "invalid ${typeName} value";`, '}');
  return lines.join('\n');
}

/**
 * 枚举的公共实现：收集枚举项并算出值，求最小的底层类型，删除原成员后生成
 * 存储、构造、常量、比较与 to_string。
 *
 * @param nextValue - 由上一个值求下一个隐式值，第一项的“上一个值”为 -1
 * @param bitwise - 生成 none 与位运算（flag_enum）
 */
export function basicEnum(t: TypeDeclaration, nextValue: (previous: string) => string, bitwise: boolean): void {
  t.reserveNames('operator=', 'operator<=>');
  if (bitwise) {
    t.reserveNames('has', 'set', 'clear', 'to_string', 'get_raw_value', 'none');
  }

  const enumerators: ValueMemberInfo[] = [];
  let minValue = 0n;
  let maxValue = 0n;
  let foundNonNumeric = false;
  let underlyingType = t.getArgument(0);
  let current = '-1';

  for (const m of t.getMembers()) {
    if (!m.isMemberObject()) continue;
    m.require(m.isPublic() || m.isDefaultAccess(), 'an enumerator cannot be protected or private');
    const mo = m.asObject();
    if (!mo.hasWildcardType()) {
      mo.error(
        "an explicit underlying type should be specified as a compile-time argument to the metafunction - try 'enum<u16>' or 'flag_enum<u64>'"
      );
    }

    const init = mo.initializer();
    current = init === '' ? nextValue(current) : init;
    const numeric = parseIntegerLiteral(current);
    if (numeric === null) {
      foundNonNumeric = true;
    } else {
      if (bitwise) mo.require(isPowerOfTwo(numeric), 'a flag_enum enumerator value must be a power of two');
      if (numeric < minValue) minValue = numeric;
      if (numeric > maxValue) maxValue = numeric;
    }
    enumerators.push({ name: mo.name(), type: '', value: current });
    mo.markForRemovalFromEnclosingType();
  }

  const first = enumerators[0];
  t.require(first !== undefined, 'an enumeration must declare at least one enumerator');
  if (first === undefined) return;

  if (underlyingType === '') {
    t.require(
      !foundNonNumeric,
      "if you write an enumerator with a non-literal-integer initializer, you must specify the enumeration's underlying type"
    );
    const computed = bitwise ? smallestUnsignedType(maxValue) : smallestSignedType(minValue, maxValue);
    t.require(
      computed !== null,
      'values are outside the range representable by the largest supported underlying type (i64 or u64)'
    );
    underlyingType = computed ?? '';
  }

  t.removeMarkedMembers();

  const typeName = t.name();
  let defaultValue = first.name;
  if (bitwise) {
    defaultValue = 'none';
    enumerators.push({ name: 'none', type: '', value: '0' });
  }

  t.addMember(`_value: ${underlyingType};`);
  t.addMember(
    `private operator=: (implicit out this, _val: i64) == _value = cpp2::unsafe_narrow<${underlyingType}>(_val);`
  );

  if (bitwise) {
    t.addMember('operator|=: (inout this, that) == _value |= that._value;');
    t.addMember('operator&=: (inout this, that) == _value &= that._value;');
    t.addMember('operator^=: (inout this, that) == _value ^= that._value;');
    t.addMember(`operator|: (this, that) -> ${typeName} == _value | that._value;`);
    t.addMember(`operator&: (this, that) -> ${typeName} == _value & that._value;`);
    t.addMember(`operator^: (this, that) -> ${typeName} == _value ^ that._value;`);
    t.addMember('has: (inout this, that) -> bool == _value & that._value;');
    t.addMember('set: (inout this, that) == _value |= that._value;');
    t.addMember('clear: (inout this, that) == _value &= that._value~;');
  }

  for (const e of enumerators) {
    t.addMember(`${e.name}: ${typeName} == ${e.value};`);
  }

  t.addMember(`get_raw_value: (this) -> ${underlyingType} == _value;`);
  t.addMember(`operator=: (out this) == { _value = ${defaultValue}._value; }`);
  t.addMember('operator=: (out this, that) == { }');
  t.addMember('operator<=>: (this, that) -> std::strong_ordering;');
  t.addMember(enumToString(typeName, enumerators, bitwise));
}

export function cpp2Enum(t: TypeDeclaration): void {
  basicEnum(t, nextEnumValue, false);
}

export function flagEnum(t: TypeDeclaration): void {
  basicEnum(t, nextFlagValue, true);
}

// ============================================================
// 带判别式的联合
// ============================================================

function alternativeMembers(a: ValueMemberInfo): string[] {
  const storage = `reinterpret_cast<*${a.type}>(_storage&)`;
  return [
    `is_${a.name}: (this) -> bool = _discriminator == ${a.value};`,
    `${a.name}: (this) -> forward ${a.type} [[pre: is_${a.name}()]] = reinterpret_cast<* const ${a.type}>(_storage&)*;`,
    `${a.name}: (inout this) -> forward ${a.type} [[pre: is_${a.name}()]] = ${storage}*;`,
    `set_${a.name}: (inout this, _value: ${a.type}) = {
    if !is_${a.name}() { _destroy(); std::construct_at(${storage}, _value); }
    else { ${storage}* = _value; }
    _discriminator = ${a.value};
}`,
    `set_${a.name}: (inout this, forward _args...: _) = {
    if !is_${a.name}() { _destroy(); std::construct_at(${storage}, _args...); }
    else { ${storage}* = :${a.type} = (_args...); }
    _discriminator = ${a.value};
}`,
  ];
}

/**
 * 把数据成员变成带判别式的联合的各个选项：生成对齐存储、判别式，
 * 以及每个选项的 `is_`、访问器与 `set_`。
 */
export function cpp2Union(t: TypeDeclaration): void {
  const alternatives: ValueMemberInfo[] = [];
  for (const m of t.getMembers()) {
    if (!m.isMemberObject()) continue;
    m.require(m.isPublic() || m.isDefaultAccess(), 'a union alternative cannot be protected or private');
    m.require(
      !m.name().startsWith('is_') && !m.name().startsWith('set_'),
      "a union alternative's name cannot start with 'is_' or 'set_' - that could cause user confusion with the " +
        "'is_alternative' and 'set_alternative' generated functions"
    );
    const mo = m.asObject();
    mo.require(mo.initializer() === '', 'a union alternative cannot have an initializer');
    alternatives.push({ name: mo.name(), type: mo.type(), value: String(alternatives.length) });
    mo.markForRemovalFromEnclosingType();
  }

  const count = BigInt(alternatives.length);
  const discriminatorType = smallestSignedType(-1n, count) ?? 'i64';

  t.removeMarkedMembers();

  const sizes = alternatives.map(a => `sizeof(${a.type})`).join(', ');
  const aligns = alternatives.map(a => `alignof(${a.type})`).join(', ');
  t.addMember(`_storage: cpp2::aligned_storage<cpp2::max(${sizes}), cpp2::max(${aligns})> = ();`);
  t.addMember(`_discriminator: ${discriminatorType} = -1;`);

  for (const a of alternatives) {
    for (const source of alternativeMembers(a)) t.addMember(source);
  }

  const destroy = alternatives.map(
    a => `    if _discriminator == ${a.value} { std::destroy_at(reinterpret_cast<*${a.type}>(_storage&)); }`
  );
  t.addMember(['private _destroy: (inout this) = {', ...destroy, '    _discriminator = -1;', '}'].join('\n'));
  t.addMember('operator=: (move this) = { _destroy(); }');
  t.addMember('operator=: (out this) = { }');

  const copies = alternatives.map(a => `    if that.is_${a.name}() { set_${a.name}(that.${a.name}()); }`);
  t.addMember(
    ['operator=: (out this, that) = {', '    _storage = ();', '    _discriminator = -1;', ...copies, '}'].join('\n')
  );
  t.addMember(['operator=: (inout this, that) = {', '    _destroy();', ...copies, '}'].join('\n'));
}

// ============================================================
// 目录
// ============================================================

/** 把类型的当前源码形式写到 output */
export function createPrintMetafunction(output: MetafunctionOutput): Metafunction {
  return t => output(t.print());
}

/**
 * 内置元函数目录，以 `@name` 中的名字为键。
 */
export function createBuiltinCatalogue(output: MetafunctionOutput): ReadonlyMap<string, Metafunction> {
  return new Map<string, Metafunction>([
    ['interface', cpp2Interface],
    ['polymorphic_base', polymorphicBase],
    ['ordered', ordered],
    ['weakly_ordered', weaklyOrdered],
    ['partially_ordered', partiallyOrdered],
    ['copyable', copyable],
    ['basic_value', basicValue],
    ['value', value],
    ['weakly_ordered_value', weaklyOrderedValue],
    ['partially_ordered_value', partiallyOrderedValue],
    ['struct', cpp2Struct],
    ['enum', cpp2Enum],
    ['flag_enum', flagEnum],
    ['union', cpp2Union],
    ['print', createPrintMetafunction(output)],
  ]);
}
