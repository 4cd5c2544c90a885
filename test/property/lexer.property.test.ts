import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';
import { lexText } from '../../src/frontend/lexer.js';
import { ErrorList } from '../../src/diagnostics/error-list.js';
import { printSource } from '../../src/ast/printer.js';
import { TokenKind, comparePositions } from '../../src/types.js';
import { parse } from '../helpers/cpp2.js';

const identifier = fc.stringMatching(/^[a-z_][a-z0-9_]{0,8}$/);

const expression: fc.Arbitrary<string> = fc.letrec<{ expr: string }>(tie => ({
  expr: fc.oneof(
    { maxDepth: 4 },
    fc.nat({ max: 999 }).map(String),
    fc.constantFrom('a', 'b', 'c'),
    fc
      .tuple(tie('expr'), fc.constantFrom('+', '-', '*', '/', '<', '==', '&&'), tie('expr'))
      .map(([l, op, r]) => `${l} ${op} ${r}`),
    tie('expr').map(e => `(${e})`)
  ),
})).expr;

const OPERATORS = [
  '<<=', '>>=', '<=>', '...', '||=', '&&=', '/=', '<<', '<=', '>>', '>=', '++', '+=', '--', '-=', '->',
  '||', '|=', '&&', '*=', '%=', '&=', '^=', '~=', '==', '!=', '::', '/', '<', '>', '+', '-', '|', '*',
  '%', '&', '^', '~', '=', '!', '{', '}', '(', ')', '[', ']', ':', ';', ',', '.', '?', '@', '$',
];

const LITERALS = [
  '0x1F', '0xFFull', '0b1010', "1'000", '42u', '3.14f', '1e10', '.5', '2.5',
  "'a'", "'\\n'", '"abc"', '"a\\"b"', '""', 'R"(a "q" b)"', 'R"x(a)"b)x"',
];

const WORDS = [
  'operator', 'this', 'if', 'return', 'namespace', 'type', 'long', 'unsigned', 'int', 'char', 'double',
  'short', 'signed', 'u64', 'i8', '_uchar', 'f32', 'std',
];

/** 由运算符、字面量、关键字与标识符拼成的一行，各项之间以空格分隔 */
const lexiconLine = fc
  .array(fc.oneof(fc.constantFrom(...OPERATORS, ...LITERALS, ...WORDS), identifier, fc.nat().map(String)), {
    minLength: 1,
    maxLength: 8,
  })
  .map(items => items.join(' '));

describe('词法分析性质', () => {
  test('每个 token 的文本单独重新分析后得到同类型同文本的一个 token', () => {
    fc.assert(
      fc.property(lexiconLine, line => {
        const { tokens } = lexText(line, new ErrorList());
        for (const tok of tokens) {
          const again = lexText(tok.value, new ErrorList()).tokens;
          assert.equal(again.length, 1, `${JSON.stringify(tok.value)} in ${JSON.stringify(line)}`);
          assert.equal(again[0]?.kind, tok.kind);
          assert.equal(again[0]?.value, tok.value);
        }
      }),
      { numRuns: 300 }
    );
  });

  test('operator 合并与多词关键字重新分析后不变', () => {
    for (const text of ['operator=', 'operator<=>', 'operator()', 'operator[]', 'unsigned long int', 'long double']) {
      const [tok] = lexText(text, new ErrorList()).tokens;
      assert.equal(tok?.value, text);
    }
  });

  test('任意单行输入都不会抛出，token 位置单调且非空', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 60 }), input => {
        const { tokens } = lexText(input, new ErrorList());
        for (let i = 0; i < tokens.length; i++) {
          const tok = tokens[i];
          assert.ok(tok);
          assert.ok(comparePositions(tok.start, tok.end) < 0);
          const prev = tokens[i - 1];
          if (prev) assert.ok(comparePositions(prev.start, tok.start) < 0);
        }
      }),
      { numRuns: 200 }
    );
  });

  test('单个单词恰好产生一个同文本的 token', () => {
    fc.assert(
      fc.property(identifier, word => {
        const { tokens } = lexText(word, new ErrorList());
        assert.equal(tokens.length, 1);
        assert.equal(tokens[0]?.value, word);
      }),
      { numRuns: 200 }
    );
  });

  test('十进制整数产生一个 DecimalLiteral', () => {
    fc.assert(
      fc.property(fc.nat(), n => {
        const { tokens } = lexText(String(n), new ErrorList());
        assert.equal(tokens.length, 1);
        assert.equal(tokens[0]?.kind, TokenKind.DecimalLiteral);
      })
    );
  });
});

describe('解析性质', () => {
  test('重建的源码再次解析后打印结果不变', () => {
    fc.assert(
      fc.property(fc.array(expression, { minLength: 1, maxLength: 5 }), inits => {
        const source = inits.map((init, i) => `v${i}: int = ${init};`).join('\n');
        const first = parse(source);
        assert.deepEqual(first.diagnostics, []);

        const printed = printSource(first.unit);
        const second = parse(printed);
        assert.deepEqual(second.diagnostics, []);
        assert.equal(printSource(second.unit), printed);
        assert.equal(second.unit.declarations.length, inits.length);
      }),
      { numRuns: 100 }
    );
  });
});
