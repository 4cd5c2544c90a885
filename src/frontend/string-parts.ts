/**
 * @module string-parts
 *
 * 字符串插值展开：把 `"a(x)$b"` 这样的字面量拆成文本段与代码段，
 * 再按分隔符策略重新生成为 `"a" + cpp2::to_string(x) + "b"`。
 *
 * 原始字符串可能跨越多行，每一行单独展开：只有与字面量边界相邻的片段才带分隔符。
 */

import type { Position } from '../types.js';
import type { ErrorList } from '../diagnostics/error-list.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';

/** 生成时在哪一端补上 begin/end 分隔符（位标志） */
export enum AddsSequences {
  NoEnds = 0,
  OnTheBeginning = 1,
  OnTheEnd = 2,
  OnBothEnds = 3,
}

export type StringPart = { readonly kind: 'raw'; readonly text: string } | { readonly kind: 'code'; readonly text: string };

export class StringParts {
  private parts: StringPart[] = [];

  constructor(
    readonly beginSeq: string,
    readonly endSeq: string,
    readonly strategy: AddsSequences
  ) {
    if (!(strategy & AddsSequences.OnTheBeginning)) {
      this.parts.push({ kind: 'raw', text: '' });
    }
  }

  addCode(text: string): void {
    this.parts.push({ kind: 'code', text });
  }

  addString(text: string): void {
    this.parts.push({ kind: 'raw', text });
  }

  clear(): void {
    this.parts = [];
  }

  getParts(): readonly StringPart[] {
    return this.parts;
  }

  /** 是否包含至少一个代码段（即确实发生了插值） */
  isExpanded(): boolean {
    return this.parts.some(part => part.kind === 'code');
  }

  generate(): string {
    const begin = this.strategy & AddsSequences.OnTheBeginning ? this.beginSeq : '';
    const end = this.strategy & AddsSequences.OnTheEnd ? this.endSeq : '';
    const first = this.parts[0];
    const last = this.parts[this.parts.length - 1];
    if (first === undefined || last === undefined) {
      return begin + end;
    }

    let result = first.kind === 'raw' ? begin + first.text : first.text;
    for (let i = 1; i < this.parts.length; i++) {
      const prev = this.parts[i - 1];
      const part = this.parts[i];
      if (prev !== undefined && part !== undefined) {
        result += this.join(prev, part);
      }
    }
    if (!(this.strategy & AddsSequences.OnTheEnd)) {
      result += this.join(last, { kind: 'raw', text: '' });
    }
    if (last.kind === 'raw') {
      result += end;
    }
    return result;
  }

  private join(prev: StringPart, part: StringPart): string {
    if (prev.kind === 'raw') {
      return part.kind === 'code' ? `${this.endSeq} + ${part.text}` : part.text;
    }
    return part.kind === 'code' ? ` + ${part.text}` : ` + ${this.beginSeq}${part.text}`;
  }
}

/**
 * 在 text 中 pos 处的 `)$` 之前向回查找匹配的 `(`。
 *
 * @returns `(` 的下标；找不到时返回 -1
 */
function findInterpolationOpen(text: string, pos: number, lowerBound: number): number {
  let depth = 1;
  for (let open = pos - 2; open >= lowerBound; open--) {
    const ch = text[open];
    if (ch === ')') {
      depth++;
    } else if (ch === '(') {
      depth--;
      if (depth === 0) return open;
    }
  }
  return -1;
}

/** 去掉插值表达式中的转义反斜杠（字符字面量内的除外） */
function unescapeChunk(chunk: string): string {
  let result = '';
  let escape = false;
  let prev = ' ';
  for (const ch of chunk) {
    escape = !escape && prev !== "'" && ch === '\\';
    prev = ch;
    if (!escape) result += ch;
  }
  return result;
}

/** `(x:02)` 形式的格式说明转为 `(x,"{:02}")`；`::` 作用域运算符不算格式说明 */
function applyFormatter(chunk: string): string {
  const colon = chunk.lastIndexOf(':');
  if (colon <= 0 || chunk[colon - 1] === ':' || chunk[colon + 1] === ':') {
    return chunk;
  }
  const spec = chunk.slice(colon + 1, chunk.length - 1);
  return `${chunk.slice(0, colon)},"{:${spec}}")`;
}

/**
 * 展开普通字符串字面量中的 `(expr)$` 插值。
 *
 * @param text - 完整字面量文本（含前缀与引号）
 * @param errors - 出错时追加诊断
 * @param pos - 字面量起始位置
 * @returns 展开后的文本；出错时返回 null
 */
export function expandStringLiteral(text: string, errors: ErrorList, pos: Position): string | null {
  if (text.length < 2 || !text.endsWith('"')) {
    errors.add(Diagnostics.invalidInterpolation('not a legal string literal', pos).asFallback().build());
    return null;
  }
  const quote = text.indexOf('"');
  const bodyStart = quote + 1;
  const bodyEnd = text.length - 1;
  const parts = new StringParts(text.slice(0, bodyStart), '"', AddsSequences.OnBothEnds);

  let currentStart = bodyStart;
  for (let i = bodyStart; i < bodyEnd; i++) {
    if (text[i] !== '$' || text[i - 1] !== ')') continue;
    const open = findInterpolationOpen(text, i, bodyStart);
    const at = { line: pos.line, col: pos.col + i };
    if (open < 0) {
      errors.add(Diagnostics.invalidInterpolation('no matching ( for string interpolation ending in )$', at).build());
      return null;
    }
    if (open !== currentStart) {
      parts.addString(text.slice(currentStart, open));
    }
    const chunk = unescapeChunk(text.slice(open, i));
    if (chunk === '()') {
      errors.add(Diagnostics.invalidInterpolation('string interpolation must not be empty', at).build());
      return null;
    }
    if (chunk.endsWith(':)')) {
      errors.add(
        Diagnostics.invalidInterpolation("string interpolation ':' must be followed by a std::formatter specifier", at).build()
      );
      return null;
    }
    parts.addCode(`cpp2::to_string${applyFormatter(chunk)}`);
    currentStart = i + 1;
  }

  if (currentStart < bodyEnd) {
    parts.addString(text.slice(currentStart, bodyEnd));
  }
  return parts.generate();
}

/**
 * 展开原始字符串（`$R"..."`）中一行内容的插值。
 *
 * @param strategy - 该行是否与字面量的开头/结尾相邻
 */
export function expandRawStringLiteral(
  openingSeq: string,
  closingSeq: string,
  strategy: AddsSequences,
  text: string,
  errors: ErrorList,
  pos: Position
): StringParts {
  const parts = new StringParts(openingSeq, closingSeq, strategy);
  let currentStart = 0;
  for (let i = 1; i < text.length; i++) {
    if (text[i] !== '$' || text[i - 1] !== ')') continue;
    const open = findInterpolationOpen(text, i, currentStart);
    if (open < 0) {
      errors.add(
        Diagnostics.invalidInterpolation('no matching ( for string interpolation ending in )$', {
          line: pos.line,
          col: pos.col + i,
        }).build()
      );
      return parts;
    }
    if (open !== currentStart) {
      parts.addString(text.slice(currentStart, open));
    }
    parts.addCode(`cpp2::to_string${text.slice(open, i)}`);
    currentStart = i + 1;
  }
  if (currentStart < text.length) {
    parts.addString(text.slice(currentStart));
  }
  return parts;
}
