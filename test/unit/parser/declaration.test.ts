import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { getTypeScopeDeclarations, isNamespace } from '../../../src/ast/declaration-ops.js';
import { printDeclaration } from '../../../src/ast/printer.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { firstDecl, memberNames, parse, topLevel, topLevelNames } from '../../helpers/cpp2.js';

describe('声明解析', () => {
  test('访问修饰符与类型体内的简写成员', () => {
    const t = firstDecl(parse('t: type = {\n    private secret: int = 0;\n    shorthand;\n}'));
    const [secret, shorthand] = getTypeScopeDeclarations(t);

    assert.equal(secret?.access, 'private');
    assert.equal(shorthand?.type?.kind, 'TypeId');
    assert.equal(shorthand && printDeclaration(shorthand), 'shorthand: _;');
  });

  test('参数的传递方式与修饰符', () => {
    const f = firstDecl(parse('f: (inout a: int, out b: int, move c, forward d: std::string) = { }'));
    assert.ok(f.type?.kind === 'FunctionType');

    assert.deepEqual(
      f.type.parameters.parameters.map(p => [p.pass, p.ordinal]),
      [
        ['inout', 1],
        ['out', 2],
        ['move', 3],
        ['forward', 4],
      ]
    );
  });

  test('throws 与命名返回值列表', () => {
    const f = firstDecl(parse('f: () throws -> (x: int, y: int) = { x = 1; y = 2; }'));
    assert.ok(f.type?.kind === 'FunctionType');

    assert.equal(f.type.throws, true);
    assert.equal(f.type.returns.kind, 'list');
    assert.equal(printDeclaration(f).split('\n')[0], 'f: () throws -> (out x: int, out y: int) = {');
  });

  test('可变参数模板', () => {
    const f = firstDecl(parse('f: <Ts...: type> (args...: Ts) = { }'));
    const param = f.templateParameters?.parameters[0];

    assert.equal(param?.declaration.isVariadic, true);
    assert.equal(param?.declaration.isATemplateParameter, true);
  });

  test('requires 子句', () => {
    const f = firstDecl(parse('f: <T> (x: T) requires std::integral<T> = { }'));
    assert.notEqual(f.requiresClause, null);
  });

  test('final 类型', () => {
    const t = firstDecl(parse('t: final type = { }'));
    assert.ok(t.type?.kind === 'Type');
    assert.equal(t.type.final, true);
  });

  test('命名空间只能包含声明', () => {
    const ok = parse('n: namespace = { a: int = 1; f: () = { } }');
    assert.equal(isNamespace(topLevel(ok, 'n')), true);
    assert.deepEqual(ok.diagnostics, []);

    const [diag] = parse('n: namespace = { a = 1; }').diagnostics;
    assert.equal(diag?.code, DiagnosticCode.P007_InvalidStatement);
    assert.equal(diag?.message, "a namespace body must contain only declarations (at 'a')");
  });

  test('类型体中不能有语句', () => {
    const [diag] = parse('t: type = { x = 1; }').diagnostics;
    assert.equal(diag?.code, DiagnosticCode.P007_InvalidStatement);
    assert.equal(diag?.message, "a user-defined type body must contain only declarations, not other code (at 'x')");
  });

  test('元函数只能用于类型', () => {
    const result = parse('f: @value () = { }');
    const [diag] = result.diagnostics;

    assert.equal(diag?.code, DiagnosticCode.P006_InvalidDeclaration);
    assert.equal(diag?.message, 'metafunctions are currently supported only on types');
    assert.deepEqual(diag?.span.start, { line: 1, col: 5 });
    assert.deepEqual(topLevelNames(result), ['f']);
  });

  test('不应用元函数时类型保持原样', () => {
    const result = parse('p: @value type = { x: int = 0; }', { applyMetafunctions: false });
    assert.deepEqual(memberNames(firstDecl(result)), ['x']);
    assert.deepEqual(result.diagnostics, []);
  });

  test('缺少分号', () => {
    const [diag] = parse('x: int').diagnostics;
    assert.equal(diag?.code, DiagnosticCode.P006_InvalidDeclaration);
    assert.equal(
      diag?.message,
      "missing ';' at end of declaration or '=' at start of initializer (at 'end of section')"
    );
  });
});
