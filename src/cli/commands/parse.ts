import { readFileSync } from 'node:fs';
import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { ParseTreePrinter, printSource } from '../../ast/printer.js';
import { parseSource } from '../../index.js';
import { createDiagnosticsError } from '../utils/error-handler.js';
import { output } from '../utils/logger.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('cli');

export type ParseFormat = 'tree' | 'source';

export interface ParseOptions {
  format?: ParseFormat;
  /** 为 false 时不应用元函数 */
  metafunctions?: boolean;
}

export function isParseFormat(value: unknown): value is ParseFormat {
  return value === 'tree' || value === 'source';
}

/**
 * 解析源码并按 format 渲染翻译单元：`tree` 为缩进的节点转储，`source` 为重建的 cpp2 源码。
 * `@print` 的输出追加在结果之前。
 */
export function renderParse(source: string, options: ParseOptions = {}): { text: string; diagnostics: Diagnostic[] } {
  const printed: string[] = [];
  const result = parseSource(source, {
    applyMetafunctions: options.metafunctions ?? true,
    output: text => printed.push(text),
  });
  const rendered =
    (options.format ?? 'tree') === 'source' ? printSource(result.unit) : new ParseTreePrinter().print(result.unit);
  return { text: [...printed, rendered].join('\n'), diagnostics: result.diagnostics };
}

export function parseCommand(file: string, options: ParseOptions = {}): void {
  const { text, diagnostics } = renderParse(readFileSync(file, 'utf8'), options);
  logger.debug('Parsed source file', { file, format: options.format ?? 'tree', diagnostics: diagnostics.length });
  output(text);
  if (diagnostics.length > 0) {
    throw createDiagnosticsError(diagnostics);
  }
}
