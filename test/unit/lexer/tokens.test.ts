import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { isFixedType, isKeyword, matchOperator, parseLexicon } from '../../../src/frontend/tokens.js';
import { TokenKind } from '../../../src/types.js';

const base = { keywords: ['if'], multiKeywordParts: ['long'], fixedTypes: ['i32'] };

describe('cpp2 词汇表', () => {
  test('运算符按文本长度降序排列，长度相同保持原顺序', () => {
    const lexicon = parseLexicon({
      ...base,
      operators: [
        { text: '<', kind: 'Less' },
        { text: '<<=', kind: 'LeftShiftEq' },
        { text: '>', kind: 'Greater' },
        { text: '<<', kind: 'LeftShift' },
      ],
    });

    assert.deepEqual(
      lexicon.operators.map(op => op.text),
      ['<<=', '<<', '<', '>']
    );
    assert.equal(lexicon.keywords.has('if'), true);
  });

  test('未知的 token 种类被拒绝', () => {
    assert.throws(
      () => parseLexicon({ ...base, operators: [{ text: '%%', kind: 'Percent' }] }),
      { message: "cpp2-keywords.json: unknown token kind 'Percent' for '%%'" }
    );
  });

  test('缺少字段时报告 schema 错误', () => {
    assert.throws(
      () => parseLexicon({ keywords: [] }),
      (e: unknown) => e instanceof Error && /^cpp2-keywords\.json: .*required property 'operators'/.test(e.message)
    );
  });

  test('空运算符文本违反 schema', () => {
    assert.throws(() => parseLexicon({ ...base, operators: [{ text: '', kind: 'Less' }] }), /cpp2-keywords\.json/);
  });

  test('内置词汇表', () => {
    assert.equal(isKeyword('sizeof'), true);
    assert.equal(isKeyword('type'), false);
    assert.equal(isFixedType('u16'), true);
    assert.equal(isFixedType('int'), false);
    assert.equal(matchOperator('a <=> b', 2)?.kind, TokenKind.Spaceship);
    assert.equal(matchOperator('a', 0), null);
  });
});
