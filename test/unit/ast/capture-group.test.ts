import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { Node } from '../../../src/ast/ast.js';
import { CaptureGroup } from '../../../src/ast/capture-group.js';
import { TokenKind } from '../../../src/types.js';
import type { PostfixExpressionNode } from '../../../src/types.js';

function capturedName(name: string, col: number): PostfixExpressionNode {
  const start = { line: 1, col };
  const id = { kind: TokenKind.Identifier, value: name, start, end: { line: 1, col: col + name.length } };
  const dollar = { kind: TokenKind.Dollar, value: '$', start: id.end, end: { line: 1, col: col + name.length + 1 } };
  const node = Node.PostfixExpression(Node.PrimaryExpression(Node.IdExpression(Node.UnqualifiedId(id))));
  node.ops.push({ op: dollar, idExpr: null, exprList: null, opClose: null });
  return node;
}

describe('CaptureGroup', () => {
  test('按登记顺序分配合成名字，文本不含 $', () => {
    const group = new CaptureGroup();
    const a = group.add(capturedName('a', 1));
    const b = group.add(capturedName('b', 5));

    assert.equal(a.capName, '_0_');
    assert.equal(a.str, 'a');
    assert.equal(b.capName, '_1_');
    assert.equal(b.str, 'b');
  });

  test('同一个表达式节点只登记一次', () => {
    const group = new CaptureGroup();
    const expr = capturedName('x', 1);

    const first = group.add(expr);
    const second = group.add(expr);

    assert.equal(first, second);
    assert.equal(group.members.length, 1);
  });

  test('按名字查找与按节点删除', () => {
    const group = new CaptureGroup();
    const x = capturedName('x', 1);
    const y = capturedName('y', 5);
    group.add(x);
    group.add(y);

    assert.equal(group.find('_1_')?.capturedExpr, y);
    assert.equal(group.remove(x), true);
    assert.equal(group.remove(x), false);
    assert.deepEqual(
      group.members.map(c => c.capName),
      ['_1_']
    );
    assert.equal(group.find('_0_'), undefined);
  });

  test('删除后新登记的名字不与已有名字重复', () => {
    const group = new CaptureGroup();
    const x = capturedName('x', 1);
    group.add(x);
    group.remove(x);

    assert.equal(group.add(capturedName('z', 9)).capName, '_1_');
  });

  test('恢复快照丢弃之后的登记并回退编号', () => {
    const group = new CaptureGroup();
    group.add(capturedName('a', 1));
    const snapshot = group.snapshot();
    group.add(capturedName('b', 5));
    group.add(capturedName('c', 9));

    group.restore(snapshot);

    assert.deepEqual(
      group.members.map(c => c.str),
      ['a']
    );
    assert.equal(group.add(capturedName('d', 13)).capName, '_1_');
  });
});
