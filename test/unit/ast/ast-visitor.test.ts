import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { childrenOf, visitTree } from '../../../src/ast/ast_visitor.js';
import type { AstNode } from '../../../src/types.js';
import { firstDecl, parse } from '../../helpers/cpp2.js';

describe('visitTree', () => {
  test('深度优先，先进入父节点', () => {
    const entered: string[] = [];
    visitTree(parse('x: int = 5;').unit, {
      start: (node, depth) => entered.push(`${depth}:${node.kind}`),
    });

    assert.deepEqual(entered.slice(0, 4), ['0:TranslationUnit', '1:Declaration', '2:UnqualifiedId', '2:TypeId']);
    assert.equal(entered.filter(e => e.endsWith(':Literal')).length, 1);
  });

  test('end 在全部子节点之后调用', () => {
    const events: string[] = [];
    visitTree(parse('a: int = 1;\nb: int = 2;').unit, {
      start: node => events.push(`+${node.kind}`),
      end: node => events.push(`-${node.kind}`),
    });

    assert.equal(events[0], '+TranslationUnit');
    assert.equal(events[events.length - 1], '-TranslationUnit');
    assert.equal(
      events.filter(e => e.startsWith('+')).length,
      events.filter(e => e.startsWith('-')).length
    );
    assert.equal(events.filter(e => e === '+Declaration').length, 2);
  });

  test('Parser.visit 遍历整个翻译单元', () => {
    const result = parse('f: () = { g: int = 0; }');
    const declarations: AstNode[] = [];
    result.parser.visit({
      start: node => {
        if (node.kind === 'Declaration') declarations.push(node);
      },
    });

    assert.equal(declarations.length, 2);
    assert.equal(declarations[0], firstDecl(result));
  });

  test('childrenOf 按源码顺序返回直接子节点', () => {
    const decl = firstDecl(parse('x: int = 5;'));
    assert.deepEqual(
      childrenOf(decl).map(child => child.kind),
      ['UnqualifiedId', 'TypeId', 'Statement']
    );
  });
});
