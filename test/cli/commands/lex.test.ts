import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { renderTokens } from '../../../src/cli/commands/lex.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';

describe('lex 命令', () => {
  it('每个 token 一行，段首标出起始行号', () => {
    const { text, errors } = renderTokens('x: i32;');

    assert.equal(errors.size, 0);
    assert.equal(text, '-- section 1 --\n1:1\tIdentifier\tx\n1:2\tColon\t:\n1:4\tCpp2FixedType\ti32\n1:7\tSemicolon\t;');
  });

  it('预处理行把源码分成多个段', () => {
    const { text } = renderTokens('#include <vector>\na: int = 1;\n#define X\nb: int;');
    const headers = text.split('\n').filter(line => line.startsWith('--'));

    assert.deepEqual(headers, ['-- section 2 --', '-- section 4 --']);
  });

  it('--json 输出段与 token 数组', () => {
    const { text } = renderTokens('x: i32;', { json: true });
    const sections: unknown = JSON.parse(text);

    assert.ok(Array.isArray(sections));
    assert.equal(sections.length, 1);
    assert.deepEqual(sections[0], {
      line: 1,
      tokens: [
        { kind: 'Identifier', value: 'x', start: { line: 1, col: 1 }, end: { line: 1, col: 2 } },
        { kind: 'Colon', value: ':', start: { line: 1, col: 2 }, end: { line: 1, col: 3 } },
        { kind: 'Cpp2FixedType', value: 'i32', start: { line: 1, col: 4 }, end: { line: 1, col: 7 } },
        { kind: 'Semicolon', value: ';', start: { line: 1, col: 7 }, end: { line: 1, col: 8 } },
      ],
    });
  });

  it('词法错误随结果一起返回', () => {
    const { text, errors } = renderTokens('a ` b');

    assert.equal(text, '-- section 1 --\n1:1\tIdentifier\ta\n1:5\tIdentifier\tb');
    assert.equal(errors.all()[0]?.code, DiagnosticCode.L001_UnexpectedCharacter);
  });
});
