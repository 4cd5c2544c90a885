import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { Node } from '../../../src/ast/ast.js';
import {
  MemberMask,
  addTypeMember,
  declarationName,
  getTypeScopeDeclarations,
  hasBoolReturnType,
  hasDeclaredReturnType,
  hasMarkedMembers,
  indexOfParameterNamed,
  isConstructorWithInThat,
  isConstructorWithThat,
  isDefaultConstructor,
  isDestructor,
  isGlobal,
  isMemberObject,
  isMove,
  isPolymorphic,
  isSwap,
  isTypeAlias,
  isVirtualFunction,
  makeVirtual,
  markForRemovalFromEnclosingType,
  removeAllMembers,
  removeMarkedMembers,
  thisParameter,
  unnamedReturnType,
} from '../../../src/ast/declaration-ops.js';
import type { DeclarationNode } from '../../../src/types.js';
import { firstDecl, memberNames, parse, topLevel } from '../../helpers/cpp2.js';

const SOURCE = [
  't: type = {',
  '    operator=: (out this) = { }',
  '    operator=: (out this, that) = { }',
  '    operator=: (inout this, move that) = { }',
  '    operator=: (move this) = { }',
  '    f: (virtual this) -> bool = true;',
  '    swap: (inout this, inout that) = { }',
  '    x: int = 0;',
  '    N: type == int;',
  '    inner: type = { }',
  '}',
].join('\n');

function members(): DeclarationNode[] {
  const result = parse(SOURCE);
  assert.equal(result.errors.size, 0);
  return getTypeScopeDeclarations(firstDecl(result));
}

function member(name: string, index = 0): DeclarationNode {
  const found = members().filter(m => declarationName(m) === name)[index];
  assert.ok(found, `缺少成员 ${name}`);
  return found;
}

describe('声明查询', () => {
  test('按类别掩码列出类型成员', () => {
    const t = firstDecl(parse(SOURCE));

    assert.deepEqual(memberNames(t), [
      'operator=',
      'operator=',
      'operator=',
      'operator=',
      'f',
      'swap',
      'x',
      'N',
      'inner',
    ]);
    assert.equal(getTypeScopeDeclarations(t, MemberMask.functions).length, 6);
    assert.deepEqual(getTypeScopeDeclarations(t, MemberMask.objects).map(declarationName), ['x']);
    assert.deepEqual(getTypeScopeDeclarations(t, MemberMask.types).map(declarationName), ['inner']);
    assert.deepEqual(getTypeScopeDeclarations(t, MemberMask.aliases).map(declarationName), ['N']);
  });

  test('识别构造、赋值与析构', () => {
    const [ctor, copy, moveAssign, dtor] = members();
    assert.ok(ctor && copy && moveAssign && dtor);

    assert.equal(isDefaultConstructor(ctor), true);
    assert.equal(isConstructorWithThat(ctor), false);
    assert.equal(isConstructorWithThat(copy), true);
    assert.equal(isConstructorWithInThat(copy), true);
    assert.equal(isMove(moveAssign), true);
    assert.equal(isMove(copy), false);
    assert.equal(isDestructor(dtor), true);
    assert.equal(indexOfParameterNamed(copy, 'that'), 1);
    assert.equal(indexOfParameterNamed(copy, 'other'), -1);
  });

  test('虚函数、返回类型与 swap', () => {
    const f = member('f');

    assert.equal(isVirtualFunction(f), true);
    assert.equal(thisParameter(f)?.modifier, 'virtual');
    assert.equal(unnamedReturnType(f), 'bool');
    assert.equal(hasBoolReturnType(f), true);
    assert.equal(hasDeclaredReturnType(member('operator=')), false);
    assert.equal(isSwap(member('swap')), true);
    assert.equal(isPolymorphic(firstDecl(parse(SOURCE))), true);
  });

  test('成员对象与别名', () => {
    assert.equal(isMemberObject(member('x')), true);
    assert.equal(isTypeAlias(member('N')), true);
    assert.equal(isGlobal(member('x')), false);
    assert.equal(isGlobal(firstDecl(parse(SOURCE))), true);
  });

  test('makeVirtual 只作用于带 this 的函数', () => {
    const result = parse('g: () = { }\nu: type = {\n    h: (this) = { }\n}');
    const [h] = getTypeScopeDeclarations(topLevel(result, 'u'));
    assert.ok(h);

    assert.equal(makeVirtual(topLevel(result, 'g')), false);
    assert.equal(isVirtualFunction(h), false);
    assert.equal(makeVirtual(h), true);
    assert.equal(isVirtualFunction(h), true);
  });
});

describe('类型成员的修改', () => {
  test('追加成员时接好父链接', () => {
    const t = firstDecl(parse('t: type = { a: int = 1; }'));
    const extra = firstDecl(parse('b: int = 2;'));

    assert.equal(addTypeMember(t, Node.Statement(extra)), true);
    assert.deepEqual(memberNames(t), ['a', 'b']);
    assert.equal(extra.parent, t);
    assert.equal(extra.myStatement?.statement, extra);
  });

  test('标记删除的成员在清扫时移除，其余保持顺序', () => {
    const t = firstDecl(parse('t: type = { f: () = { } g: () = { } h: () = { } }'));
    const [, g] = getTypeScopeDeclarations(t);
    assert.ok(g);

    assert.equal(markForRemovalFromEnclosingType(g), true);
    assert.equal(hasMarkedMembers(t), true);
    assert.deepEqual(memberNames(t), ['f', 'g', 'h']);

    assert.equal(removeMarkedMembers(t), 1);
    assert.deepEqual(memberNames(t), ['f', 'h']);
    assert.equal(removeMarkedMembers(t), 0);
  });

  test('顶层声明不能被标记删除', () => {
    const t = firstDecl(parse('t: type = { }'));
    assert.equal(markForRemovalFromEnclosingType(t), false);
  });

  test('removeAllMembers 清空类型体', () => {
    const t = firstDecl(parse('t: type = { a: int = 1; b: int = 2; }'));
    removeAllMembers(t);
    assert.deepEqual(memberNames(t), []);
  });
});
