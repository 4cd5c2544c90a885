import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { ErrorList } from '../../../src/diagnostics/error-list.js';
import {
  DiagnosticBuilder,
  DiagnosticCode,
  DiagnosticError,
  Diagnostics,
  formatDiagnostic,
  toDiagnostic,
} from '../../../src/diagnostics/diagnostics.js';

const pos = { line: 3, col: 7 };

describe('ErrorList', () => {
  test('位置、消息与标志相同的诊断只保留一条', () => {
    const errors = new ErrorList();

    assert.equal(errors.add(Diagnostics.unexpectedCharacter('#', pos).build()), true);
    assert.equal(errors.add(Diagnostics.unexpectedCharacter('#', pos).build()), false);
    assert.equal(errors.add(Diagnostics.unexpectedCharacter('#', { line: 3, col: 8 }).build()), true);
    assert.equal(errors.size, 2);
  });

  test('存在主诊断时隐藏 fallback 诊断', () => {
    const errors = new ErrorList();
    errors.add(Diagnostics.unexpectedEndOfSection(pos).build());
    assert.equal(errors.visible().length, 1, '只有 fallback 时仍然展示');

    errors.add(Diagnostics.expectedIdentifier(pos).build());
    assert.deepEqual(
      errors.visible().map(d => d.code),
      [DiagnosticCode.P001_ExpectedIdentifier]
    );
    assert.equal(errors.all().length, 2);
  });

  test('since 返回某个时刻之后追加的记录', () => {
    const errors = new ErrorList();
    errors.add(Diagnostics.expectedIdentifier(pos).build());
    const mark = errors.size;
    errors.add(Diagnostics.unterminatedString(pos).build());

    assert.deepEqual(
      errors.since(mark).map(d => d.code),
      [DiagnosticCode.L002_UnterminatedString]
    );
  });
});

describe('诊断工具', () => {
  test('DiagnosticBuilder.throw 抛出携带诊断的 DiagnosticError', () => {
    assert.throws(
      () => DiagnosticBuilder.error(DiagnosticCode.P005_ExpectedExpression).withMessage('boom').withPosition(pos).throw(),
      (e: unknown) => e instanceof DiagnosticError && e.diagnostic.code === DiagnosticCode.P005_ExpectedExpression
    );
  });

  test('toDiagnostic 把普通异常转换为内部错误', () => {
    const diag = toDiagnostic(new Error('unexpected state'), pos);

    assert.equal(diag.code, DiagnosticCode.I001_InternalError);
    assert.equal(diag.internal, true);
    assert.equal(diag.message, 'unexpected state');
    assert.deepEqual(diag.span.start, pos);
  });

  test('toDiagnostic 原样取出 DiagnosticError 的诊断', () => {
    const original = Diagnostics.expectedIdentifier(pos).build();
    assert.equal(toDiagnostic(new DiagnosticError(original), { line: 1, col: 1 }), original);
  });

  test('formatDiagnostic 包含代码与位置', () => {
    const text = formatDiagnostic(Diagnostics.expectedIdentifier(pos).build());
    assert.match(text, /P001/);
    assert.match(text, /3:7/);
  });
});
