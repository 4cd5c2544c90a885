import { readFileSync } from 'node:fs';
import type { Token } from '../../types.js';
import { ErrorList } from '../../diagnostics/error-list.js';
import { loadSourceLines } from '../../frontend/source.js';
import { TokenStore } from '../../frontend/token-store.js';
import { createDiagnosticsError } from '../utils/error-handler.js';
import { output } from '../utils/logger.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('cli');

export interface LexOptions {
  json?: boolean;
}

function formatToken(tok: Token): string {
  return `${tok.start.line}:${tok.start.col}\t${tok.kind}\t${tok.value}`;
}

/**
 * 把源码的全部 token 段渲染为文本，每个 token 一行：`行:列<TAB>类别<TAB>文本`。
 * 段之间以 `-- section N --` 分隔，N 为段首行号。
 */
export function renderTokens(source: string, options: LexOptions = {}): { text: string; errors: ErrorList } {
  const errors = new ErrorList();
  const store = new TokenStore(errors);
  store.lex(loadSourceLines(source, errors));

  if (options.json) {
    const sections = [...store.getSections()].map(([line, tokens]) => ({ line, tokens }));
    return { text: JSON.stringify(sections, null, 2), errors };
  }
  const lines: string[] = [];
  for (const [line, tokens] of store.getSections()) {
    lines.push(`-- section ${line} --`);
    lines.push(...tokens.map(formatToken));
  }
  return { text: lines.join('\n'), errors };
}

export function lexCommand(file: string, options: LexOptions = {}): void {
  const { text, errors } = renderTokens(readFileSync(file, 'utf8'), options);
  logger.debug('Lexed source file', { file, errors: errors.size });
  output(text);
  if (errors.hasErrors()) {
    throw createDiagnosticsError(errors.visible());
  }
}
