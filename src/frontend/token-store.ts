/**
 * @module token-store
 *
 * 对整份已分类的源码驱动 lexLine，按连续的 cpp2 区域切分 token 段。
 *
 * 另外提供 GeneratedTokenBuffer：解析期间（`>>` 拆分、通配类型、元函数生成的代码片段）
 * 新产生的 token 与源码行只追加到这里，已有条目的下标永不改变。
 */

import type { Comment, SourceLine, Token } from '../types.js';
import { SourceLineCategory } from '../types.js';
import type { ErrorList } from '../diagnostics/error-list.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { createLogger } from '../utils/logger.js';
import { createLexState, lexLine } from './lexer.js';
import type { LexOutput } from './lexer.js';

const lexerLogger = createLogger('lexer');

/** 会结束当前 cpp2 区域的行类别；空行与注释行不打断区域 */
function endsSection(category: SourceLineCategory): boolean {
  return (
    category === SourceLineCategory.Preprocessor ||
    category === SourceLineCategory.Import ||
    category === SourceLineCategory.Cpp1
  );
}

export class TokenStore {
  private readonly sections = new Map<number, Token[]>();
  private readonly comments: Comment[] = [];

  constructor(private readonly errors: ErrorList) {}

  /**
   * 词法分析一份已分类的源码。
   *
   * 每段连续的 cpp2 行产生一个 token 段，以段首行号（从 1 开始）为键。
   * 文件结束时仍未闭合的原始字符串只在其起始处报告一次错误，
   * 然后从起始行的下一行起重新按普通代码分析。
   *
   * @param isGenerated - 是否为元函数生成的代码片段（只影响日志）
   */
  lex(lines: readonly SourceLine[], isGenerated = false): void {
    let state = createLexState();
    let current: Token[] | null = null;
    let lineIdx = 0;

    while (lineIdx < lines.length) {
      const line = lines[lineIdx];
      const lineno = lineIdx + 1;

      if (endsSection(line.category) && state.rawStringMultiline === null) {
        current = null;
      } else {
        if (current === null) {
          current = [];
          this.sections.set(lineno, current);
        }
        const out: LexOutput = { tokens: current, comments: this.comments, errors: this.errors };
        lexLine(line.text, lineno, state, out);
      }
      lineIdx++;

      const pending = state.rawStringMultiline;
      if (lineIdx === lines.length && pending !== null) {
        this.errors.add(Diagnostics.unterminatedRawString(pending.closingSeq, pending.start).build());
        lineIdx = pending.start.line;
        state = createLexState();
      }
    }

    if (state.inComment) {
      this.errors.add(Diagnostics.unterminatedComment(state.currentCommentStart).build());
    }

    lexerLogger.debug('lexed source', {
      lines: lines.length,
      sections: this.sections.size,
      generated: isGenerated,
    });
  }

  getSections(): ReadonlyMap<number, readonly Token[]> {
    return this.sections;
  }

  getComments(): readonly Comment[] {
    return this.comments;
  }

  numUnprintedComments(): number {
    return this.comments.filter(comment => !comment.dbgWasPrinted).length;
  }
}

/**
 * 解析期间生成的 token 与代码行。
 *
 * 只追加；通过下标访问的条目在之后的追加中保持不变。
 */
export class GeneratedTokenBuffer {
  private readonly tokens: Token[] = [];
  private readonly lines: string[][] = [];

  push(token: Token): Token {
    this.tokens.push(token);
    return token;
  }

  /** @returns 第一个追加 token 的下标 */
  append(tokens: readonly Token[]): number {
    const start = this.tokens.length;
    this.tokens.push(...tokens);
    return start;
  }

  /** 保存一个生成代码片段的全部行，返回其编号 */
  appendLines(lines: readonly string[]): number {
    this.lines.push([...lines]);
    return this.lines.length - 1;
  }

  tokenAt(index: number): Token | undefined {
    return this.tokens[index];
  }

  linesAt(index: number): readonly string[] | undefined {
    return this.lines[index];
  }

  get size(): number {
    return this.tokens.length;
  }

  get snippetCount(): number {
    return this.lines.length;
  }
}
