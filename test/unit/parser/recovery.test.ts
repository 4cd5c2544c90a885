import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { Parser } from '../../../src/parser.js';
import { ErrorList } from '../../../src/diagnostics/error-list.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { GeneratedTokenBuffer } from '../../../src/frontend/token-store.js';
import { lexText } from '../../../src/frontend/lexer.js';
import { codes, parse, topLevelNames } from '../../helpers/cpp2.js';

describe('错误恢复', () => {
  test('出错的声明被跳过，后续声明照常解析', () => {
    const result = parse('a: int = 1;\nb: int = ;\nc: int = 3;');

    assert.deepEqual(topLevelNames(result), ['a', 'c']);
    assert.equal(result.errors.size, 1);
    const [diag] = result.diagnostics;
    assert.equal(diag?.code, DiagnosticCode.P005_ExpectedExpression);
    assert.equal(diag?.message, "expected expression (at ';')");
    assert.deepEqual(diag?.span.start, { line: 2, col: 10 });
    assert.equal(result.success, false);
  });

  test('命名空间作用域中的表达式', () => {
    const [diag] = parse('42;').diagnostics;
    assert.equal(diag?.code, DiagnosticCode.P006_InvalidDeclaration);
    assert.equal(diag?.message, "expected a declaration at namespace scope (at '42')");
  });

  test('段末尾缺少分号时指向最后一个 token 之后', () => {
    const [diag] = parse('x: int = 5').diagnostics;
    assert.equal(diag?.code, DiagnosticCode.P003_ExpectedToken);
    assert.equal(diag?.message, "expected ';' at end of statement (at 'end of section')");
    assert.deepEqual(diag?.span.start, { line: 1, col: 11 });
  });

  test('缩进更深的行不作为恢复点', () => {
    const result = parse('f: () = {\n    x: int = ;\n    y: int = 2;\n}\ng: () = { }');
    assert.deepEqual(topLevelNames(result), ['g']);
  });

  test('未闭合的原始字符串之后从下一个顶层声明恢复', () => {
    const source = ['f: () = {', '    s := R"x(never closed', '}', 'a: int = 1;', 'b: int = 2;'].join('\n');
    const result = parse(source);

    assert.deepEqual(codes(result.diagnostics), [
      DiagnosticCode.L005_UnterminatedRawString,
      DiagnosticCode.P005_ExpectedExpression,
    ]);
    const parseError = result.diagnostics[1];
    assert.equal(parseError?.message, "expected expression (at '}')");
    assert.deepEqual(parseError?.span.start, { line: 3, col: 1 });
    assert.deepEqual(topLevelNames(result), ['a', 'b']);
  });

  test('命名空间作用域中未闭合的原始字符串不会吞掉下一个声明', () => {
    const result = parse('s: std::string = R"x(never closed\na: int = 1;\nb: int = 2;');

    assert.deepEqual(codes(result.diagnostics), [
      DiagnosticCode.L005_UnterminatedRawString,
      DiagnosticCode.P006_InvalidDeclaration,
    ]);
    const parseError = result.diagnostics[1];
    assert.equal(parseError?.message, 'an object initializer must be an expression');
    assert.deepEqual(parseError?.span.start, { line: 2, col: 1 });
    assert.deepEqual(topLevelNames(result), ['a', 'b']);
  });

  test('对象的初始化器不能是声明', () => {
    const result = parse('x: int = y: int = 5;');

    assert.deepEqual(codes(result.diagnostics), [DiagnosticCode.P006_InvalidDeclaration]);
    assert.deepEqual(result.diagnostics[0]?.span.start, { line: 1, col: 10 });
    assert.deepEqual(topLevelNames(result), []);
  });

  test('对象的初始化器不能是复合语句', () => {
    const result = parse('x: int = { }\nz: int = 3;');

    const [diag] = result.diagnostics;
    assert.equal(diag?.code, DiagnosticCode.P006_InvalidDeclaration);
    assert.equal(diag?.message, 'an object initializer must be an expression');
    assert.deepEqual(diag?.span.start, { line: 1, col: 10 });
    assert.deepEqual(topLevelNames(result), ['z']);
  });

  test('预处理行分隔的各段依次解析进同一个翻译单元', () => {
    const result = parse('a: int = 1;\n#include <vector>\nb: int = 2;');
    assert.deepEqual(topLevelNames(result), ['a', 'b']);
    assert.equal(result.success, true);
  });
});

describe('Parser', () => {
  test('parseOneDeclaration 解析单条声明语句', () => {
    const errors = new ErrorList();
    const parser = new Parser(errors);
    const stmt = parser.parseOneDeclaration(lexText('h: () = { }', errors).tokens, new GeneratedTokenBuffer());

    assert.equal(stmt?.statement.kind, 'Declaration');
    assert.equal(errors.size, 0);
    assert.deepEqual(parser.getTranslationUnit().declarations, []);
  });

  test('parseOneDeclaration 遇到多余的 token 时返回 null', () => {
    const errors = new ErrorList();
    const parser = new Parser(errors);
    const stmt = parser.parseOneDeclaration(lexText('h: int = 1; extra', errors).tokens, new GeneratedTokenBuffer());

    assert.equal(stmt, null);
    assert.deepEqual(codes(errors.all()), [DiagnosticCode.P010_UnexpectedEndOfSection]);
  });

  test('记录函数体覆盖的行', () => {
    const { parser } = parse('f: () = {\n    x := 1;\n}\ny: int = 2;');

    assert.equal(parser.isWithinFunctionBody({ line: 2, col: 5 }), true);
    assert.equal(parser.isWithinFunctionBody({ line: 4, col: 1 }), false);
  });

  test('按 token 范围查询顶层声明', () => {
    const result = parse('a: int = 1;\nb: int = 2;');
    const section = result.tokens.getSections().get(1) ?? [];

    assert.equal(result.parser.getParseTreeDeclarationsInRange(section.slice(0, 6)).length, 1);
    assert.equal(result.parser.getParseTreeDeclarationsInRange(section).length, 2);
    assert.deepEqual(result.parser.getParseTreeDeclarationsInRange([]), []);
  });

  test('clone 共享错误列表但拥有独立的翻译单元', () => {
    const errors = new ErrorList();
    const parser = new Parser(errors);
    const child = parser.clone();

    child.parse(lexText('bad', errors).tokens, new GeneratedTokenBuffer());

    assert.equal(errors.size, 1);
    assert.deepEqual(parser.getTranslationUnit().declarations, []);
  });
});
