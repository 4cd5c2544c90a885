import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { lexCommand } from '../../src/cli/commands/lex.js';
import { parseCommand } from '../../src/cli/commands/parse.js';

describe('CLI 集成测试', { concurrency: false }, () => {
  let workspace: string;
  let originalLog: typeof console.log;
  let output: string[];

  beforeEach(() => {
    workspace = mkdtempSync(join(tmpdir(), 'cpp2-cli-integration-'));
    output = [];
    originalLog = console.log;
    console.log = (...args: unknown[]) => {
      output.push(args.map(String).join(' '));
    };
  });

  afterEach(() => {
    console.log = originalLog;
    rmSync(workspace, { recursive: true, force: true });
  });

  function writeSource(name: string, source: string): string {
    const file = join(workspace, name);
    writeFileSync(file, source, 'utf8');
    return file;
  }

  it('parse 读取文件并把结果写到 stdout', () => {
    const file = writeSource('ok.cpp2', 'main: () -> int = {\n    return 0;\n}\n');

    parseCommand(file, { format: 'source' });
    assert.deepEqual(output, ['main: () -> int = {\n    return 0;\n}\n']);
  });

  it('有诊断时先输出结果再抛出诊断 carrier', () => {
    const file = writeSource('bad.cpp2', 'a: int = ;\nb: int = 2;\n');

    assert.throws(
      () => parseCommand(file, { format: 'source' }),
      (error: unknown) =>
        error instanceof Error &&
        error.message === 'CLI_DIAGNOSTIC_ERROR' &&
        'diagnostics' in error &&
        Array.isArray(error.diagnostics) &&
        error.diagnostics.length === 1
    );
    assert.deepEqual(output, ['b: int = 2;\n']);
  });

  it('lex 读取文件', () => {
    const file = writeSource('tokens.cpp2', 'x: i32;\n');

    lexCommand(file);
    assert.equal(output[0]?.split('\n')[0], '-- section 1 --');
  });

  it('文件不存在时抛出文件系统错误', () => {
    assert.throws(
      () => lexCommand(join(workspace, 'missing.cpp2')),
      (error: unknown) => error instanceof Error && 'code' in error && error.code === 'ENOENT'
    );
  });
});
