/**
 * @module tokens
 *
 * Token kinds 与 cpp2 词汇表（关键字、多词关键字、固定宽度类型、运算符）。
 *
 * 词汇表数据保存在 config/cpp2-keywords.json 中，模块加载时读取并用 JSON Schema 校验。
 */

import { readFileSync } from 'node:fs';
import AjvModule, { type ErrorObject, type JSONSchemaType, type ValidateFunction } from 'ajv';
import { TokenKind } from '../types.js';

export { TokenKind };

const Ajv = AjvModule.default;

export interface OperatorEntry {
  readonly text: string;
  readonly kind: TokenKind;
}

interface Cpp2Lexicon {
  readonly keywords: ReadonlySet<string>;
  readonly multiKeywordParts: ReadonlySet<string>;
  readonly fixedTypes: ReadonlySet<string>;
  /** 按文本长度降序排列，保证最长匹配 */
  readonly operators: readonly OperatorEntry[];
}

function toTokenKind(name: unknown): TokenKind | undefined {
  return Object.values(TokenKind).find(kind => kind === name);
}

interface RawLexicon {
  keywords: string[];
  multiKeywordParts: string[];
  fixedTypes: string[];
  operators: { text: string; kind: string }[];
}

const stringList = { type: 'array', items: { type: 'string' } } as const;

const schema: JSONSchemaType<RawLexicon> = {
  type: 'object',
  properties: {
    keywords: stringList,
    multiKeywordParts: stringList,
    fixedTypes: stringList,
    operators: {
      type: 'array',
      items: {
        type: 'object',
        properties: { text: { type: 'string', minLength: 1 }, kind: { type: 'string' } },
        required: ['text', 'kind'],
        additionalProperties: false,
      },
    },
  },
  required: ['keywords', 'multiKeywordParts', 'fixedTypes', 'operators'],
  additionalProperties: false,
};

const ajv = new Ajv({ strict: true, allErrors: true });
const validateLexicon: ValidateFunction<RawLexicon> = ajv.compile(schema);

function describeErrors(errors: readonly ErrorObject[] | null | undefined): string {
  return (errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ');
}

/** 校验词汇表数据；运算符按文本长度降序排列 */
export function parseLexicon(raw: unknown): Cpp2Lexicon {
  if (!validateLexicon(raw)) {
    throw new Error(`cpp2-keywords.json: ${describeErrors(validateLexicon.errors)}`);
  }
  const operators: OperatorEntry[] = raw.operators.map(item => {
    const kind = toTokenKind(item.kind);
    if (kind === undefined) {
      throw new Error(`cpp2-keywords.json: unknown token kind '${item.kind}' for '${item.text}'`);
    }
    return { text: item.text, kind };
  });
  return {
    keywords: new Set(raw.keywords),
    multiKeywordParts: new Set(raw.multiKeywordParts),
    fixedTypes: new Set(raw.fixedTypes),
    operators: operators.sort((a, b) => b.text.length - a.text.length),
  };
}

const LEXICON: Cpp2Lexicon = parseLexicon(
  JSON.parse(readFileSync(new URL('../config/cpp2-keywords.json', import.meta.url), 'utf8'))
);

export function isKeyword(text: string): boolean {
  return LEXICON.keywords.has(text);
}

export function isMultiKeywordPart(text: string): boolean {
  return LEXICON.multiKeywordParts.has(text);
}

export function isFixedType(text: string): boolean {
  return LEXICON.fixedTypes.has(text);
}

/** 在 line 的 pos 处做最长匹配，返回运算符或标点 */
export function matchOperator(line: string, pos: number): OperatorEntry | null {
  for (const entry of LEXICON.operators) {
    if (line.startsWith(entry.text, pos)) return entry;
  }
  return null;
}

/** 可以跟在 `operator` 之后组成运算符函数名的符号 */
export function isOverloadableOperator(kind: TokenKind): boolean {
  switch (kind) {
    case TokenKind.Scope:
    case TokenKind.Colon:
    case TokenKind.Semicolon:
    case TokenKind.Comma:
    case TokenKind.Dot:
    case TokenKind.Ellipsis:
    case TokenKind.QuestionMark:
    case TokenKind.At:
    case TokenKind.Dollar:
    case TokenKind.LeftBrace:
    case TokenKind.RightBrace:
    case TokenKind.RightParen:
    case TokenKind.RightBracket:
      return false;
    default:
      return isOperatorKind(kind);
  }
}

export function isOperatorKind(kind: TokenKind): boolean {
  return LEXICON.operators.some(entry => entry.kind === kind);
}

export function isLiteralKind(kind: TokenKind): boolean {
  switch (kind) {
    case TokenKind.FloatLiteral:
    case TokenKind.BinaryLiteral:
    case TokenKind.DecimalLiteral:
    case TokenKind.HexadecimalLiteral:
    case TokenKind.StringLiteral:
    case TokenKind.CharacterLiteral:
      return true;
    default:
      return false;
  }
}

export function isPostfixOperator(kind: TokenKind): boolean {
  switch (kind) {
    case TokenKind.PlusPlus:
    case TokenKind.MinusMinus:
    case TokenKind.Caret:
    case TokenKind.Multiply:
    case TokenKind.Ampersand:
    case TokenKind.Tilde:
    case TokenKind.Dollar:
    case TokenKind.Ellipsis:
      return true;
    default:
      return false;
  }
}

export function isPrefixOperator(kind: TokenKind): boolean {
  return kind === TokenKind.Not || kind === TokenKind.Minus || kind === TokenKind.Plus;
}

export function isAssignmentOperator(kind: TokenKind): boolean {
  switch (kind) {
    case TokenKind.Assignment:
    case TokenKind.MultiplyEq:
    case TokenKind.SlashEq:
    case TokenKind.ModuloEq:
    case TokenKind.PlusEq:
    case TokenKind.MinusEq:
    case TokenKind.RightShiftEq:
    case TokenKind.LeftShiftEq:
    case TokenKind.AmpersandEq:
    case TokenKind.CaretEq:
    case TokenKind.PipeEq:
      return true;
    default:
      return false;
  }
}
