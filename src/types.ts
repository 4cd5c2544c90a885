// Core lexical type definitions for the cpp2 front end

export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

/**
 * 比较两个源码位置。
 *
 * @returns 负数表示 a 在 b 之前，0 表示相同，正数表示 a 在 b 之后
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.col - b.col;
}

export enum TokenKind {
  SlashEq = 'SlashEq',
  Slash = 'Slash',
  LeftShiftEq = 'LeftShiftEq',
  LeftShift = 'LeftShift',
  Spaceship = 'Spaceship',
  LessEq = 'LessEq',
  Less = 'Less',
  RightShiftEq = 'RightShiftEq',
  RightShift = 'RightShift',
  GreaterEq = 'GreaterEq',
  Greater = 'Greater',
  PlusPlus = 'PlusPlus',
  PlusEq = 'PlusEq',
  Plus = 'Plus',
  MinusMinus = 'MinusMinus',
  MinusEq = 'MinusEq',
  Arrow = 'Arrow',
  Minus = 'Minus',
  LogicalOrEq = 'LogicalOrEq',
  LogicalOr = 'LogicalOr',
  PipeEq = 'PipeEq',
  Pipe = 'Pipe',
  LogicalAndEq = 'LogicalAndEq',
  LogicalAnd = 'LogicalAnd',
  MultiplyEq = 'MultiplyEq',
  Multiply = 'Multiply',
  ModuloEq = 'ModuloEq',
  Modulo = 'Modulo',
  AmpersandEq = 'AmpersandEq',
  Ampersand = 'Ampersand',
  CaretEq = 'CaretEq',
  Caret = 'Caret',
  TildeEq = 'TildeEq',
  Tilde = 'Tilde',
  EqualComparison = 'EqualComparison',
  Assignment = 'Assignment',
  NotEqualComparison = 'NotEqualComparison',
  Not = 'Not',
  LeftBrace = 'LeftBrace',
  RightBrace = 'RightBrace',
  LeftParen = 'LeftParen',
  RightParen = 'RightParen',
  LeftBracket = 'LeftBracket',
  RightBracket = 'RightBracket',
  Scope = 'Scope',
  Colon = 'Colon',
  Semicolon = 'Semicolon',
  Comma = 'Comma',
  Dot = 'Dot',
  Ellipsis = 'Ellipsis',
  QuestionMark = 'QuestionMark',
  At = 'At',
  Dollar = 'Dollar',
  FloatLiteral = 'FloatLiteral',
  BinaryLiteral = 'BinaryLiteral',
  DecimalLiteral = 'DecimalLiteral',
  HexadecimalLiteral = 'HexadecimalLiteral',
  StringLiteral = 'StringLiteral',
  CharacterLiteral = 'CharacterLiteral',
  UserDefinedLiteralSuffix = 'UserDefinedLiteralSuffix',
  Keyword = 'Keyword',
  Cpp1MultiKeyword = 'Cpp1MultiKeyword',
  Cpp2FixedType = 'Cpp2FixedType',
  Identifier = 'Identifier',
  None = 'None',
}

/**
 * 词法标记。
 *
 * kind 在构造后仍可修改（用于上下文重新分类，例如标识符转为关键字）。
 */
export interface Token {
  kind: TokenKind;
  readonly value: string;
  readonly start: Position;
  readonly end: Position;
}

/** 按文本内容比较两个 token */
export function tokenEquals(a: Token, b: Token): boolean {
  return a.value === b.value;
}

export type CommentKind = 'line' | 'stream';

export interface Comment {
  readonly kind: CommentKind;
  readonly start: Position;
  readonly end: Position;
  readonly text: string;
  dbgWasPrinted: boolean;
}

export enum SourceLineCategory {
  Empty = 'empty',
  Preprocessor = 'preprocessor',
  Comment = 'comment',
  Import = 'import',
  Cpp1 = 'cpp1',
  Cpp2 = 'cpp2',
  RawString = 'rawstring',
}

export interface SourceLine {
  readonly text: string;
  readonly category: SourceLineCategory;
}

export interface RawString {
  readonly start: Position;
  text: string;
  readonly openingSeq: string;
  readonly closingSeq: string;
  readonly shouldInterpolate: boolean;
}

export type * from './types/ast.js';
