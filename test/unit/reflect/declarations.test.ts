import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { DiagnosticError, DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { MetafunctionRequireError } from '../../../src/reflect/compiler-services.js';
import { codes, firstDecl, memberNames, parse, reflectType } from '../../helpers/cpp2.js';

const SOURCE = [
  't: type = {',
  '    x: int = 1;',
  '    f: (this, n: int) -> bool = true;',
  '    N: type == int;',
  '    private y: _ = 0;',
  '}',
].join('\n');

function reflect(source = SOURCE) {
  const result = parse(source);
  const t = reflectType(result, firstDecl(result));
  return { result, t };
}

describe('声明视图', () => {
  test('按类别列出成员', () => {
    const { t } = reflect();

    assert.deepEqual(
      t.getMembers().map(m => m.name()),
      ['x', 'f', 'N', 'y']
    );
    assert.deepEqual(
      t.getMemberFunctions().map(m => m.name()),
      ['f']
    );
    assert.deepEqual(
      t.getMemberObjects().map(m => m.name()),
      ['x', 'y']
    );
    assert.deepEqual(
      t.getMemberAliases().map(m => m.name()),
      ['N']
    );
    assert.equal(t.getMemberTypes().length, 0);
  });

  test('对象视图给出类型与初始化器文本', () => {
    const { t } = reflect();
    const [x, y] = t.getMemberObjects();

    assert.equal(x?.type(), 'int');
    assert.equal(x?.initializer(), '1');
    assert.equal(x?.hasWildcardType(), false);
    assert.equal(y?.hasWildcardType(), true);
    assert.equal(y?.isPrivate(), true);
  });

  test('函数视图查询参数与返回类型', () => {
    const { t } = reflect();
    const [f] = t.getMemberFunctions();

    assert.equal(f?.isFunctionWithThis(), true);
    assert.equal(f?.hasParameterNamed('n'), true);
    assert.equal(f?.hasInParameterNamed('n'), true);
    assert.equal(f?.hasOutParameterNamed('n'), false);
    assert.equal(f?.hasBoolReturnType(), true);
    assert.equal(f?.unnamedReturnType(), 'bool');
    assert.equal(f?.isConstructor(), false);
  });

  test('父声明查询', () => {
    const { t } = reflect();
    const [x] = t.getMembers();

    assert.equal(x?.parentIsType(), true);
    assert.equal(x?.parentIsNamespace(), false);
    assert.equal(x?.getParent()?.name(), 't');
    assert.equal(t.getParent(), null);
    assert.equal(t.isGlobal(), true);
  });

  describe('访问控制', () => {
    test('默认访问可以改为任意访问级别', () => {
      const { t } = reflect();
      const [x] = t.getMembers();

      assert.equal(x?.isDefaultAccess(), true);
      assert.equal(x?.makePublic(), true);
      assert.equal(x?.isPublic(), true);
      assert.equal(x?.makePrivate(), false);
    });

    test('default* 只修改默认访问的成员', () => {
      const { t } = reflect();
      const members = t.getMembers();
      for (const m of members) m.defaultToProtected();

      assert.deepEqual(
        members.map(m => m.isProtected()),
        [true, true, true, false]
      );
    });
  });

  describe('收窄', () => {
    test('类别不符时抛出 R005', () => {
      const { t } = reflect();
      const [x, f, N] = t.getMembers();

      assert.throws(
        () => x?.asFunction(),
        (e: unknown) =>
          e instanceof DiagnosticError &&
          e.diagnostic.code === DiagnosticCode.R005_InvalidNarrowing &&
          e.diagnostic.message === 'declaration is not a function'
      );
      assert.throws(
        () => f?.asObject(),
        (e: unknown) => e instanceof DiagnosticError && e.diagnostic.message === 'declaration is not an object'
      );
      assert.throws(
        () => N?.asType(),
        (e: unknown) => e instanceof DiagnosticError && e.diagnostic.message === 'declaration is not a type'
      );
      assert.throws(
        () => x?.asAlias(),
        (e: unknown) => e instanceof DiagnosticError && e.diagnostic.message === 'declaration is not an alias'
      );
    });

    test('类别相符时返回对应视图', () => {
      const { t } = reflect();
      const [, f, N] = t.getMembers();

      assert.equal(f?.asFunction().isVirtual(), false);
      assert.equal(N?.asAlias().isTypeAlias(), true);
    });
  });

  describe('修改', () => {
    test('addMember 把解析后的成员追加到类型体末尾', () => {
      const { result, t } = reflect('t: type = { x: int = 1; }');
      t.addMember('g: (this) = { }');

      assert.deepEqual(memberNames(firstDecl(result)), ['x', 'g']);
      assert.equal(t.getMemberFunctions()[0]?.getParent()?.name(), 't');
    });

    test('无法解析的成员报告 R006', () => {
      const { result, t } = reflect('t: type = { }');
      t.addMember('g: (this) = {');

      assert.deepEqual(codes(result.errors.all()), [
        DiagnosticCode.P010_UnexpectedEndOfSection,
        DiagnosticCode.R006_SnippetParseFailed,
      ]);
      assert.equal(result.errors.all()[1]?.message, 'error attempting to add member:\ng: (this) = {');
    });

    test('标记后删除成员', () => {
      const { result, t } = reflect('t: type = { a: int = 1; b: int = 2; }');
      t.getMembers()[0]?.markForRemovalFromEnclosingType();

      assert.deepEqual(memberNames(firstDecl(result)), ['a', 'b']);
      t.removeMarkedMembers();
      assert.deepEqual(memberNames(firstDecl(result)), ['b']);
    });

    test('全局声明不能标记删除', () => {
      const { result, t } = reflect('t: type = { }');

      assert.throws(() => t.markForRemovalFromEnclosingType(), MetafunctionRequireError);
      const [diag] = result.errors.all();
      assert.equal(diag?.code, DiagnosticCode.R001_MetafunctionRequirement);
      assert.equal(diag?.message, 'only a member of a type can be marked for removal from its enclosing type');
    });

    test('makeFinal 设置 final', () => {
      const { t } = reflect('t: type = { }');

      assert.equal(t.isFinal(), false);
      assert.equal(t.makeFinal(), true);
      assert.equal(t.isFinal(), true);
      assert.equal(t.print(), 't: final type = { }');
    });

    test('queryDeclaredValueSetFunctions 识别四种 operator=', () => {
      const { t } = reflect(
        't: type = {\n    operator=: (out this, that) = { }\n    operator=: (inout this, move that) = { }\n}'
      );

      assert.deepEqual(t.queryDeclaredValueSetFunctions(), {
        outThisInThat: true,
        outThisMoveThat: false,
        inoutThisInThat: false,
        inoutThisMoveThat: true,
      });
    });
  });
});
