import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { typeBody } from '../../../src/ast/declaration-ops.js';
import type { DeclarationNode, StatementNode } from '../../../src/types.js';
import { firstDecl, parse } from '../../helpers/cpp2.js';

/** 函数体中的语句 */
function bodyStatements(source: string): StatementNode[] {
  const result = parse(source);
  assert.deepEqual(result.diagnostics, []);
  const body = typeBody(firstDecl(result));
  assert.ok(body, '函数没有复合语句体');
  return body.statements;
}

function onlyStatement(source: string): StatementNode {
  const [stmt] = bodyStatements(source);
  assert.ok(stmt);
  return stmt;
}

describe('语句解析', () => {
  test('带语句参数的 while 循环', () => {
    const stmt = onlyStatement('f: () = {\n    (copy i := 0) while i < 3 next i++ { }\n}');

    assert.equal(stmt.parameters?.parameters[0]?.pass, 'copy');
    assert.ok(stmt.statement.kind === 'IterationStatement');
    assert.equal(stmt.statement.loopKind, 'while');
    assert.notEqual(stmt.statement.nextExpression, null);
  });

  test('do-while 循环以分号结束', () => {
    const stmt = onlyStatement('f: () = { do { x++; } while x < 3; }');
    assert.ok(stmt.statement.kind === 'IterationStatement');
    assert.equal(stmt.statement.loopKind, 'do');
  });

  test('for 循环的循环变量省略类型', () => {
    const stmt = onlyStatement('f: () = { for items do (x) { } }');

    assert.ok(stmt.statement.kind === 'IterationStatement');
    assert.equal(stmt.statement.loopKind, 'for');
    assert.equal(stmt.statement.parameter?.declaration.identifier?.identifier.value, 'x');
  });

  test('带标签的循环与 break', () => {
    const [loop] = bodyStatements('f: () = { outer: while true { break outer; } }');
    assert.ok(loop && loop.statement.kind === 'IterationStatement');
    assert.equal(loop.statement.label?.value, 'outer');

    const inner = loop.statement.statements?.statements[0]?.statement;
    assert.ok(inner?.kind === 'JumpStatement');
    assert.equal(inner.label?.value, 'outer');
  });

  test('if / else if / else', () => {
    const stmt = onlyStatement('f: () = { if a { } else if b { } else { } }');

    assert.ok(stmt.statement.kind === 'SelectionStatement');
    const elseIf = stmt.statement.falseBranch?.statement;
    assert.ok(elseIf?.kind === 'SelectionStatement');
    assert.equal(elseIf.falseBranch?.statement.kind, 'CompoundStatement');
  });

  test('inspect 的值分支与通配分支', () => {
    const [ret] = bodyStatements('f: (x: int) -> int = {\n    return inspect x -> int { is 0 = 1; is _ = 2; };\n}');
    assert.ok(ret && ret.statement.kind === 'ReturnStatement');
    assert.ok(ret.statement.expression);
  });

  test('inspect 语句', () => {
    const stmt = onlyStatement('f: (x: int) = { inspect x { is int = g(); } }');
    assert.ok(stmt.statement.kind === 'InspectExpression');
    assert.equal(stmt.statement.alternatives.length, 1);
    assert.notEqual(stmt.statement.alternatives[0]?.typeId, null);
  });

  test('using 语句', () => {
    const [a, b] = bodyStatements('f: () = { using std::cout; using namespace std; }');
    assert.ok(a?.statement.kind === 'UsingStatement' && b?.statement.kind === 'UsingStatement');
    assert.equal(a.statement.forNamespace, false);
    assert.equal(b.statement.forNamespace, true);
  });

  test('函数体中的 assert 契约', () => {
    const stmt = onlyStatement('f: (x: int) = { [[assert: x > 0, "positive"]] }');
    assert.ok(stmt.statement.kind === 'Contract');
    assert.equal(stmt.statement.contractKind, 'assert');
    assert.equal(stmt.statement.message?.value, '"positive"');
  });

  test('局部声明的 myStatement 指回所在语句', () => {
    const stmt = onlyStatement('f: () = { x: int = 1; }');
    const decl: DeclarationNode | null = stmt.statement.kind === 'Declaration' ? stmt.statement : null;

    assert.ok(decl);
    assert.equal(decl.myStatement, stmt);
    assert.equal(decl.parent?.identifier?.identifier.value, 'f');
  });
});
