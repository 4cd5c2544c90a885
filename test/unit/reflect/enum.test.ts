import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { printDeclaration } from '../../../src/ast/printer.js';
import { declarationName, getTypeScopeDeclarations } from '../../../src/ast/declaration-ops.js';
import { parseIntegerLiteral } from '../../../src/reflect/metafunctions.js';
import type { DeclarationNode } from '../../../src/types.js';
import { firstDecl, memberNames, parse } from '../../helpers/cpp2.js';

function member(decl: DeclarationNode, name: string): string {
  const found = getTypeScopeDeclarations(decl).find(d => declarationName(d) === name);
  assert.ok(found, `缺少成员 ${name}`);
  return printDeclaration(found);
}

describe('parseIntegerLiteral', () => {
  test('十进制、十六进制、二进制与负数', () => {
    assert.equal(parseIntegerLiteral('42'), 42n);
    assert.equal(parseIntegerLiteral('-2'), -2n);
    assert.equal(parseIntegerLiteral('0x1F'), 31n);
    assert.equal(parseIntegerLiteral('0b101'), 5n);
    assert.equal(parseIntegerLiteral("1'000"), 1000n);
  });

  test('不是整数字面量时返回 null', () => {
    assert.equal(parseIntegerLiteral('K'), null);
    assert.equal(parseIntegerLiteral('(K) + 1'), null);
    assert.equal(parseIntegerLiteral('1.5'), null);
  });
});

describe('@enum', () => {
  test('枚举项变为常量，并生成存储与成员函数', () => {
    const result = parse('color: @enum type = { red; green; blue; }');
    const decl = firstDecl(result);

    assert.equal(result.success, true);
    assert.deepEqual(memberNames(decl), [
      '_value',
      'operator=',
      'red',
      'green',
      'blue',
      'get_raw_value',
      'operator=',
      'operator=',
      'operator<=>',
      'to_string',
    ]);
    assert.equal(member(decl, '_value'), '_value: i8;');
    assert.equal(member(decl, 'red'), 'red: color == 0;');
    assert.equal(member(decl, 'blue'), 'blue: color == 2;');
    assert.equal(member(decl, 'get_raw_value'), 'get_raw_value: (this) -> i8 == _value;');
  });

  test('隐式值接着上一个值递增', () => {
    const decl = firstDecl(parse('e: @enum type = { a := 5; b; c := -2; }'));

    assert.equal(member(decl, 'a'), 'a: e == 5;');
    assert.equal(member(decl, 'b'), 'b: e == 6;');
    assert.equal(member(decl, 'c'), 'c: e == -2;');
    assert.equal(member(decl, '_value'), '_value: i8;');
  });

  test('取值范围决定底层类型', () => {
    const decl = firstDecl(parse('e: @enum type = { small := 1; big := 40000; }'));
    assert.equal(member(decl, '_value'), '_value: i32;');
  });

  test('显式的底层类型与非字面量初始化器', () => {
    const result = parse('e: @enum<u16> type = { a := K; b; }');
    const decl = firstDecl(result);

    assert.equal(result.success, true);
    assert.equal(member(decl, '_value'), '_value: u16;');
    assert.equal(member(decl, 'b'), 'b: e == (K) + 1;');
  });

  test('非字面量初始化器需要显式底层类型', () => {
    const [diag] = parse('e: @enum type = { a := K; }').diagnostics;
    assert.equal(diag?.code, DiagnosticCode.R001_MetafunctionRequirement);
    assert.equal(
      diag?.message,
      "while applying @enum - if you write an enumerator with a non-literal-integer initializer, you must specify the enumeration's underlying type"
    );
  });

  test('空枚举报告 R001', () => {
    const [diag] = parse('e: @enum type = { }').diagnostics;

    assert.equal(diag?.code, DiagnosticCode.R001_MetafunctionRequirement);
    assert.equal(diag?.message, 'while applying @enum - an enumeration must declare at least one enumerator');
    assert.deepEqual(diag?.span.start, { line: 1, col: 1 });
  });

  test('用户不能声明保留名', () => {
    const [diag] = parse('e: @enum type = { operator=: (out this) = { } a; }').diagnostics;

    assert.equal(
      diag?.message,
      "while applying @enum - in a 'enum' type, the name 'operator=' is reserved for use by the 'enum' implementation"
    );
    assert.deepEqual(diag?.span.start, { line: 1, col: 19 });
  });

  test('枚举项写了类型时报告 R002', () => {
    const [diag] = parse('e: @enum type = { a: int = 1; }').diagnostics;

    assert.equal(diag?.code, DiagnosticCode.R002_MetafunctionError);
    assert.equal(
      diag?.message,
      "while applying @enum - an explicit underlying type should be specified as a compile-time argument to the metafunction - try 'enum<u16>' or 'flag_enum<u64>'"
    );
  });
});

describe('@flag_enum', () => {
  test('值为 2 的幂，并生成 none 与位运算', () => {
    const result = parse('perms: @flag_enum<u8> type = { read; write; exec; }');
    const decl = firstDecl(result);

    assert.equal(result.success, true);
    assert.deepEqual(memberNames(decl), [
      '_value',
      'operator=',
      'operator|=',
      'operator&=',
      'operator^=',
      'operator|',
      'operator&',
      'operator^',
      'has',
      'set',
      'clear',
      'read',
      'write',
      'exec',
      'none',
      'get_raw_value',
      'operator=',
      'operator=',
      'operator<=>',
      'to_string',
    ]);
    assert.equal(member(decl, 'read'), 'read: perms == 1;');
    assert.equal(member(decl, 'write'), 'write: perms == 2;');
    assert.equal(member(decl, 'exec'), 'exec: perms == 4;');
    assert.equal(member(decl, 'none'), 'none: perms == 0;');
  });

  test('没有模板实参时取最小的无符号类型', () => {
    const decl = firstDecl(parse('perms: @flag_enum type = { read; write; exec; }'));
    assert.equal(member(decl, '_value'), '_value: u8;');
  });

  test('不是 2 的幂的值报告 R001', () => {
    const [diag] = parse('f: @flag_enum type = { a := 3; }').diagnostics;

    assert.equal(diag?.code, DiagnosticCode.R001_MetafunctionRequirement);
    assert.equal(diag?.message, 'while applying @flag_enum - a flag_enum enumerator value must be a power of two');
    assert.deepEqual(diag?.span.start, { line: 1, col: 24 });
  });
});
