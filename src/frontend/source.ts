/**
 * @module source
 *
 * 简化的源码加载器：把原始文本切成行并为每行分类。
 *
 * 只识别空行、预处理指令与 `import x;`，其余一律视为 cpp2。
 * 超过最大行长度的行报告一次错误并截断。
 */

import type { SourceLine } from '../types.js';
import { SourceLineCategory } from '../types.js';
import type { ErrorList } from '../diagnostics/error-list.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { ConfigService } from '../config/config-service.js';

const IMPORT_LINE = /^\s*import\s+[A-Za-z_][\w.:]*\s*;\s*$/;

export function classifyLine(text: string): SourceLineCategory {
  const trimmed = text.trim();
  if (trimmed === '') return SourceLineCategory.Empty;
  if (trimmed.startsWith('#')) return SourceLineCategory.Preprocessor;
  if (IMPORT_LINE.test(text)) return SourceLineCategory.Import;
  return SourceLineCategory.Cpp2;
}

export function loadSourceLines(text: string, errors: ErrorList): SourceLine[] {
  const maxLength = ConfigService.getInstance().maxLineLength;
  return text.split(/\r?\n/).map((raw, idx) => {
    let lineText = raw;
    if (lineText.length > maxLength) {
      errors.add(Diagnostics.lineTooLong(maxLength, { line: idx + 1, col: maxLength + 1 }).build());
      lineText = lineText.slice(0, maxLength);
    }
    return { text: lineText, category: classifyLine(lineText) };
  });
}
