/**
 * @module error-list
 *
 * 编译期共享的错误列表。
 *
 * 词法分析器、语法分析器以及元函数都向同一个 ErrorList 追加诊断；
 * 列表只追加不删除，克隆出的子解析器共享同一实例。
 */

import type { Diagnostic } from './diagnostics.js';

function sameEntry(a: Diagnostic, b: Diagnostic): boolean {
  return (
    a.span.start.line === b.span.start.line &&
    a.span.start.col === b.span.start.col &&
    a.message === b.message &&
    Boolean(a.internal) === Boolean(b.internal) &&
    Boolean(a.fallback) === Boolean(b.fallback)
  );
}

export class ErrorList implements Iterable<Diagnostic> {
  private readonly entries: Diagnostic[] = [];

  /**
   * 追加一条诊断。位置、消息与标志完全相同的记录只保留一条。
   *
   * @returns 是否真正追加了新记录
   */
  add(diagnostic: Diagnostic): boolean {
    if (this.entries.some(existing => sameEntry(existing, diagnostic))) {
      return false;
    }
    this.entries.push(diagnostic);
    return true;
  }

  get size(): number {
    return this.entries.length;
  }

  hasErrors(): boolean {
    return this.entries.length > 0;
  }

  /** 返回从 start（含）开始追加的记录 */
  since(start: number): readonly Diagnostic[] {
    return this.entries.slice(start);
  }

  all(): readonly Diagnostic[] {
    return this.entries;
  }

  /**
   * 返回应展示给用户的诊断：存在任何非 fallback 记录时，隐藏所有 fallback 记录。
   */
  visible(): Diagnostic[] {
    const hasPrimary = this.entries.some(entry => !entry.fallback);
    return this.entries.filter(entry => !entry.fallback || !hasPrimary);
  }

  [Symbol.iterator](): Iterator<Diagnostic> {
    return this.entries[Symbol.iterator]();
  }
}
