/**
 * @module lexer
 *
 * 按行进行的 cpp2 词法分析器。
 *
 * **功能**：
 * - 最长匹配的运算符与标点（`<<=` 优先于 `<<` 优先于 `<`）
 * - 十进制、二进制、十六进制与浮点字面量，支持 `'` 数字分隔符
 * - 字符与字符串字面量，字符串支持 `(expr)$` 插值展开
 * - 原始字符串 `R"delim(...)delim"`（可跨行，`$R"..."` 支持插值）
 * - 行注释与块注释（块注释可跨行）
 * - `operator` 与其后的运算符合并为一个标识符，如 `operator=`
 * - 多词关键字（`unsigned long`）与固定宽度类型名（`i32`）
 *
 * **跨行状态**：未闭合的块注释与原始字符串保存在 LexState 中，由调用方在行之间传递。
 *
 * **出错策略**：格式错误的字面量或未闭合的结构在出错位置记录一条诊断，
 * 该行剩余内容视为惰性文本，不再产生 token。
 */

import type { Comment, Position, RawString, Token } from '../types.js';
import { TokenKind } from '../types.js';
import type { ErrorList } from '../diagnostics/error-list.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import {
  isFixedType,
  isKeyword,
  isMultiKeywordPart,
  isOverloadableOperator,
  matchOperator,
} from './tokens.js';
import { AddsSequences, expandRawStringLiteral, expandStringLiteral } from './string-parts.js';

/** 在行与行之间传递的词法状态 */
export interface LexState {
  inComment: boolean;
  currentComment: string;
  currentCommentStart: Position;
  rawStringMultiline: RawString | null;
}

export interface LexOutput {
  readonly tokens: Token[];
  readonly comments: Comment[];
  readonly errors: ErrorList;
}

export function createLexState(): LexState {
  return {
    inComment: false,
    currentComment: '',
    currentCommentStart: { line: 0, col: 0 },
    rawStringMultiline: null,
  };
}

const RAW_STRING_PREFIX = /^(\$?)(u8|u|U|L)?R"/;
const STRING_PREFIX = /^(u8|u|U|L)?"/;
const CHAR_PREFIX = /^(u8|u|U|L)?'/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*/;
const INTEGER_SUFFIX = /^(?:[uU](?:ll|LL|l|L|z|Z)?|(?:ll|LL|l|L|z|Z)[uU]?)/;
const FLOAT_SUFFIX = /^[fFlL]/;
const RAW_DELIMITER = /^[^\s()\\]{0,16}\(/;

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isHexDigit(ch: string | undefined): boolean {
  return ch !== undefined && /^[0-9a-fA-F]$/.test(ch);
}

function isSpace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\v' || ch === '\f';
}

/**
 * 展开一个（可能跨行的）`$R"..."` 原始字符串：每一行单独展开，
 * 只有首行带开头分隔符、末行带结尾分隔符。
 */
function expandInterpolatedRawString(raw: RawString, fullText: string, errors: ErrorList): string {
  const body = fullText.slice(fullText.indexOf(raw.openingSeq) + raw.openingSeq.length, fullText.length - raw.closingSeq.length);
  const lines = body.split('\n');
  return lines
    .map((lineText, idx) => {
      let strategy = AddsSequences.NoEnds;
      if (idx === 0) strategy |= AddsSequences.OnTheBeginning;
      if (idx === lines.length - 1) strategy |= AddsSequences.OnTheEnd;
      const pos = { line: raw.start.line + idx, col: idx === 0 ? raw.start.col : 1 };
      return expandRawStringLiteral(raw.openingSeq, raw.closingSeq, strategy, lineText, errors, pos).generate();
    })
    .join('\n');
}

/**
 * 对一行 cpp2 源码进行词法分析。
 *
 * @param line - 行文本（不含换行符）
 * @param lineno - 从 1 开始的行号
 * @param state - 跨行状态，调用结束时更新
 * @param out - token、注释与错误的输出位置
 */
export function lexLine(line: string, lineno: number, state: LexState, out: LexOutput): void {
  let i = 0;

  const posAt = (idx: number): Position => ({ line: lineno, col: idx + 1 });

  const push = (kind: TokenKind, value: string, startIdx: number, endIdx: number): void => {
    out.tokens.push({ kind, value, start: posAt(startIdx), end: posAt(endIdx) });
  };

  const pushComment = (kind: Comment['kind'], start: Position, endIdx: number, text: string): void => {
    out.comments.push({ kind, start, end: posAt(endIdx), text, dbgWasPrinted: false });
  };

  // 继续跨行的原始字符串
  const pending = state.rawStringMultiline;
  if (pending) {
    const close = line.indexOf(pending.closingSeq);
    if (close < 0) {
      pending.text += `\n${line}`;
      return;
    }
    i = close + pending.closingSeq.length;
    const fullText = `${pending.text}\n${line.slice(0, i)}`;
    const value = pending.shouldInterpolate ? expandInterpolatedRawString(pending, fullText, out.errors) : fullText;
    out.tokens.push({ kind: TokenKind.StringLiteral, value, start: pending.start, end: posAt(i) });
    state.rawStringMultiline = null;
  }

  // 继续跨行的块注释
  if (state.inComment) {
    const close = line.indexOf('*/', i);
    if (close < 0) {
      state.currentComment += `${line.slice(i)}\n`;
      return;
    }
    i = close + 2;
    pushComment('stream', state.currentCommentStart, i, state.currentComment + line.slice(0, i));
    state.inComment = false;
    state.currentComment = '';
  }

  while (i < line.length) {
    const ch = line[i];
    const rest = line.slice(i);

    if (isSpace(ch)) {
      i++;
      continue;
    }

    if (rest.startsWith('//')) {
      pushComment('line', posAt(i), line.length, rest);
      return;
    }

    if (rest.startsWith('/*')) {
      const close = line.indexOf('*/', i + 2);
      if (close >= 0) {
        pushComment('stream', posAt(i), close + 2, line.slice(i, close + 2));
        i = close + 2;
        continue;
      }
      state.inComment = true;
      state.currentComment = `${rest}\n`;
      state.currentCommentStart = posAt(i);
      return;
    }

    const rawMatch = RAW_STRING_PREFIX.exec(rest);
    if (rawMatch) {
      const prefixLength = rawMatch[0].length;
      const delimMatch = RAW_DELIMITER.exec(rest.slice(prefixLength));
      if (!delimMatch) {
        out.errors.add(Diagnostics.invalidRawStringDelimiter(posAt(i)).build());
        return;
      }
      const delimiter = delimMatch[0].slice(0, -1);
      const shouldInterpolate = rawMatch[1] === '$';
      const openingSeq = rest.slice(shouldInterpolate ? 1 : 0, prefixLength) + delimiter + '(';
      const closingSeq = `)${delimiter}"`;
      const bodyStart = i + prefixLength + delimMatch[0].length;
      const close = line.indexOf(closingSeq, bodyStart);
      const raw: RawString = { start: posAt(i), text: line.slice(i), openingSeq, closingSeq, shouldInterpolate };
      if (close < 0) {
        state.rawStringMultiline = raw;
        return;
      }
      const end = close + closingSeq.length;
      const fullText = line.slice(i, end);
      const value = shouldInterpolate ? expandInterpolatedRawString(raw, fullText, out.errors) : fullText;
      push(TokenKind.StringLiteral, value, i, end);
      i = end;
      continue;
    }

    const stringMatch = STRING_PREFIX.exec(rest);
    if (stringMatch) {
      const end = scanQuoted(line, i + stringMatch[0].length, '"');
      if (end < 0) {
        out.errors.add(Diagnostics.unterminatedString(posAt(i)).build());
        return;
      }
      const text = line.slice(i, end);
      let value = text;
      if (text.includes(')$')) {
        value = expandStringLiteral(text, out.errors, posAt(i)) ?? text;
      }
      push(TokenKind.StringLiteral, value, i, end);
      i = lexUserDefinedSuffix(line, end, push);
      continue;
    }

    const charMatch = CHAR_PREFIX.exec(rest);
    if (charMatch) {
      const bodyStart = i + charMatch[0].length;
      const end = scanQuoted(line, bodyStart, "'");
      if (end < 0 || end === bodyStart + 1) {
        out.errors.add(Diagnostics.unterminatedCharacter(posAt(i)).build());
        return;
      }
      push(TokenKind.CharacterLiteral, line.slice(i, end), i, end);
      i = lexUserDefinedSuffix(line, end, push);
      continue;
    }

    if (isDigit(ch) || (ch === '.' && isDigit(line[i + 1]))) {
      const scanned = scanNumber(line, i);
      if (scanned.error) {
        out.errors.add(Diagnostics.malformedNumber(scanned.error, posAt(scanned.errorAt)).build());
        return;
      }
      push(scanned.kind, line.slice(i, scanned.end), i, scanned.end);
      i = lexUserDefinedSuffix(line, scanned.end, push);
      continue;
    }

    const identMatch = IDENTIFIER.exec(rest);
    if (identMatch) {
      i = lexWord(line, i, identMatch[0], push);
      continue;
    }

    const op = matchOperator(line, i);
    if (op) {
      push(op.kind, op.text, i, i + op.text.length);
      i += op.text.length;
      continue;
    }

    out.errors.add(Diagnostics.unexpectedCharacter(ch ?? '', posAt(i)).build());
    i++;
  }
}

/**
 * 扫描带引号的字面量主体。
 *
 * @returns 闭合引号之后的下标；未闭合时返回 -1
 */
function scanQuoted(line: string, from: number, quote: string): number {
  for (let j = from; j < line.length; j++) {
    const c = line[j];
    if (c === '\\') {
      j++;
      continue;
    }
    if (c === quote) return j + 1;
  }
  return -1;
}

type PushFn = (kind: TokenKind, value: string, startIdx: number, endIdx: number) => void;

/** 紧跟在字面量之后的 `_suffix` 作为用户定义字面量后缀 */
function lexUserDefinedSuffix(line: string, from: number, push: PushFn): number {
  const match = /^_[A-Za-z0-9_]*/.exec(line.slice(from));
  if (!match) return from;
  push(TokenKind.UserDefinedLiteralSuffix, match[0], from, from + match[0].length);
  return from + match[0].length;
}

interface ScannedNumber {
  kind: TokenKind;
  end: number;
  error?: string;
  errorAt: number;
}

function scanDigits(line: string, from: number, accept: (ch: string | undefined) => boolean): { end: number; badSeparator: number } {
  let j = from;
  while (j < line.length) {
    const c = line[j];
    if (accept(c)) {
      j++;
    } else if (c === "'" && j > from && accept(line[j + 1])) {
      j++;
    } else if (c === "'") {
      return { end: j, badSeparator: j };
    } else {
      break;
    }
  }
  return { end: j, badSeparator: -1 };
}

function scanNumber(line: string, start: number): ScannedNumber {
  const prefix = line.slice(start, start + 2).toLowerCase();

  if (prefix === '0b' || prefix === '0x') {
    const binary = prefix === '0b';
    const accept = binary ? (c: string | undefined) => c === '0' || c === '1' : isHexDigit;
    const { end, badSeparator } = scanDigits(line, start + 2, accept);
    if (badSeparator >= 0) {
      return { kind: TokenKind.None, end, error: "a digit separator ' must be followed by a digit", errorAt: badSeparator };
    }
    if (end === start + 2) {
      const what = binary ? 'binary' : 'hexadecimal';
      return { kind: TokenKind.None, end, error: `${what} literal must have at least one digit`, errorAt: start };
    }
    const suffix = INTEGER_SUFFIX.exec(line.slice(end));
    return {
      kind: binary ? TokenKind.BinaryLiteral : TokenKind.HexadecimalLiteral,
      end: end + (suffix ? suffix[0].length : 0),
      errorAt: start,
    };
  }

  let { end, badSeparator } = scanDigits(line, start, isDigit);
  let isFloat = false;
  if (line[end] === '.' && isDigit(line[end + 1])) {
    isFloat = true;
    const frac = scanDigits(line, end + 1, isDigit);
    end = frac.end;
    badSeparator = badSeparator >= 0 ? badSeparator : frac.badSeparator;
  } else if (line[end] === '.' && end > start && !isDigit(line[end + 1]) && line[end + 1] !== '.' && !/[A-Za-z_]/.test(line[end + 1] ?? '')) {
    // `1.` 形式
    isFloat = true;
    end++;
  }
  if (badSeparator >= 0) {
    return { kind: TokenKind.None, end, error: "a digit separator ' must be followed by a digit", errorAt: badSeparator };
  }
  const exponent = /^[eE][+-]?[0-9]+/.exec(line.slice(end));
  if (exponent) {
    isFloat = true;
    end += exponent[0].length;
  } else if (/^[eE][+-]?(?![0-9])/.test(line.slice(end)) && !/^[eE][A-Za-z0-9_]/.test(line.slice(end))) {
    return { kind: TokenKind.None, end, error: 'floating point exponent must have at least one digit', errorAt: end };
  }
  if (isFloat) {
    const suffix = FLOAT_SUFFIX.exec(line.slice(end));
    return { kind: TokenKind.FloatLiteral, end: end + (suffix ? suffix[0].length : 0), errorAt: start };
  }
  const suffix = INTEGER_SUFFIX.exec(line.slice(end));
  return { kind: TokenKind.DecimalLiteral, end: end + (suffix ? suffix[0].length : 0), errorAt: start };
}

/**
 * 识别一个单词：`operator` 合并、多词关键字、固定宽度类型、关键字或标识符。
 *
 * @returns 该单词之后的下标
 */
function lexWord(line: string, start: number, word: string, push: PushFn): number {
  let end = start + word.length;

  if (word === 'operator') {
    let j = end;
    while (isSpace(line[j])) j++;
    const rest = line.slice(j);
    let symbol: string | null = null;
    if (/^\(\s*\)/.test(rest)) {
      symbol = '()';
      j += (/^\(\s*\)/.exec(rest)?.[0].length ?? 0);
    } else if (/^\[\s*\]/.test(rest)) {
      symbol = '[]';
      j += (/^\[\s*\]/.exec(rest)?.[0].length ?? 0);
    } else {
      const op = matchOperator(line, j);
      if (op && isOverloadableOperator(op.kind) && op.kind !== TokenKind.LeftParen && op.kind !== TokenKind.LeftBracket) {
        symbol = op.text;
        j += op.text.length;
      }
    }
    if (symbol !== null) {
      push(TokenKind.Identifier, `operator${symbol}`, start, j);
      return j;
    }
    push(TokenKind.Keyword, word, start, end);
    return end;
  }

  if (isMultiKeywordPart(word)) {
    const parts = [word];
    let j = end;
    for (;;) {
      let k = j;
      while (isSpace(line[k])) k++;
      const next = IDENTIFIER.exec(line.slice(k));
      if (!next || !isMultiKeywordPart(next[0]) || k === j) break;
      parts.push(next[0]);
      j = k + next[0].length;
    }
    if (parts.length > 1) {
      push(TokenKind.Cpp1MultiKeyword, parts.join(' '), start, j);
      return j;
    }
  }

  if (isFixedType(word)) {
    push(TokenKind.Cpp2FixedType, word, start, end);
  } else if (isKeyword(word)) {
    push(TokenKind.Keyword, word, start, end);
  } else {
    push(TokenKind.Identifier, word, start, end);
  }
  return end;
}

/**
 * 便捷入口：对多行文本逐行词法分析（不区分源码行类别）。
 *
 * 用于测试与代码片段；完整的源文件请使用 TokenStore.lex。
 */
export function lexText(text: string, errors: ErrorList, firstLine = 1): { tokens: Token[]; comments: Comment[] } {
  const out: LexOutput = { tokens: [], comments: [], errors };
  const state = createLexState();
  text.split(/\r?\n/).forEach((line, idx) => lexLine(line, firstLine + idx, state, out));
  return { tokens: out.tokens, comments: out.comments };
}
