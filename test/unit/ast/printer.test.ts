import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { ParseTreePrinter, initializerText, printDeclaration, printSource } from '../../../src/ast/printer.js';
import { firstDecl, parse } from '../../helpers/cpp2.js';

function roundTrip(source: string): string {
  const result = parse(source);
  assert.deepEqual(result.diagnostics, []);
  return printDeclaration(firstDecl(result));
}

describe('源码打印', () => {
  test('printSource 以空行分隔顶层声明', () => {
    assert.equal(printSource(parse('x: int = 5;').unit), 'x: int = 5;\n');
    assert.equal(printSource(parse('a: int = 1;\nb: int = 2;').unit), 'a: int = 1;\n\nb: int = 2;\n');
  });

  test('函数体按四个空格缩进', () => {
    assert.equal(
      roundTrip('f: (x: int) -> int = { return x + 1; }'),
      'f: (x: int) -> int = {\n    return x + 1;\n}'
    );
  });

  test('三种别名', () => {
    assert.equal(roundTrip('V: type == std::vector<int>;'), 'V: type == std::vector<int>;');
    assert.equal(roundTrip('M: namespace == std::ranges;'), 'M: namespace == std::ranges;');
    assert.equal(roundTrip('pi: double == 3.14;'), 'pi: double == 3.14;');
  });

  test('模板参数列表', () => {
    assert.equal(roundTrip('id: <T: type> (x: T) -> T = x;'), 'id: <T: type> (x: T) -> T = x;');
  });

  test('嵌套模板实参中的 >> 被拆开', () => {
    assert.equal(roundTrip('m: std::map<int, std::vector<int>>;'), 'm: std::map<int, std::vector<int>>;');
    assert.equal(roundTrip('v: std::array<int, 3>;'), 'v: std::array<int, 3>;');
  });

  test('类型限定符', () => {
    assert.equal(roundTrip('p: *const int = nullptr;'), 'p: *const int = nullptr;');
  });

  test('省略类型的对象打印为通配类型', () => {
    assert.equal(roundTrip('y := x*;'), 'y: _ = x*;');
    assert.equal(roundTrip('call := f(a, out b);'), 'call: _ = f(a, out b);');
    assert.equal(roundTrip('n := v.size();'), 'n: _ = v.size();');
  });

  test('initializerText 不含分号', () => {
    const decl = firstDecl(parse('x: int = 2 * (a + b);'));
    assert.equal(initializerText(decl), '2 * (a + b)');
  });
});

describe('ParseTreePrinter', () => {
  test('每一层缩进两个空格', () => {
    const lines = new ParseTreePrinter().print(parse('x: int = 5;').unit).split('\n');

    assert.deepEqual(lines.slice(0, 4), [
      'TranslationUnit',
      '  Declaration x [TypeId]',
      '    UnqualifiedId x',
      '    TypeId int',
    ]);
    assert.equal(lines.some(line => line.trim() === 'Literal 5'), true);
  });
});
