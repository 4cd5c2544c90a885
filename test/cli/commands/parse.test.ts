import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isParseFormat, renderParse } from '../../../src/cli/commands/parse.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';

describe('parse 命令', () => {
  it('source 格式重建 cpp2 源码', () => {
    const { text, diagnostics } = renderParse('x: int = 5;', { format: 'source' });

    assert.equal(text, 'x: int = 5;\n');
    assert.deepEqual(diagnostics, []);
  });

  it('默认输出语法树', () => {
    const { text } = renderParse('x: int = 5;');
    assert.deepEqual(text.split('\n').slice(0, 2), ['TranslationUnit', '  Declaration x [TypeId]']);
  });

  it('@print 的输出排在结果之前', () => {
    const { text } = renderParse('p: @print type = { }', { format: 'source' });
    assert.equal(text, 'p: @print type = { }\np: @print type = { }\n');
  });

  it('可以不应用元函数', () => {
    const { text } = renderParse('v: @value type = { }', { format: 'source', metafunctions: false });
    assert.equal(text, 'v: @value type = { }\n');
  });

  it('返回可见的诊断', () => {
    const { diagnostics } = renderParse('t: @nosuch type = { }', { format: 'source' });
    assert.deepEqual(
      diagnostics.map(d => d.code),
      [DiagnosticCode.R003_UnknownMetafunction, DiagnosticCode.R003_UnknownMetafunction]
    );
  });

  it('isParseFormat 只接受 tree 与 source', () => {
    assert.equal(isParseFormat('tree'), true);
    assert.equal(isParseFormat('source'), true);
    assert.equal(isParseFormat('json'), false);
  });
});
