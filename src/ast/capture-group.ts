/**
 * @module ast/capture-group
 *
 * 捕获组：把带 `$` 的后缀表达式映射到稳定的合成名字。
 *
 * 同一个表达式节点（按对象身份）只登记一次。捕获组必须比所有引用它的表达式活得更久，
 * 因此它由拥有它的声明或契约节点直接持有。
 */

import type { PostfixExpressionNode } from '../types.js';
import { printPostfixExpression } from './printer.js';

export interface Capture {
  readonly capturedExpr: PostfixExpressionNode;
  /** 形如 `_0_` 的合成名字 */
  readonly capName: string;
  /** 被捕获表达式的源码文本（不含 `$`） */
  readonly str: string;
}

/** {@link CaptureGroup.snapshot} 的返回值 */
export interface CaptureGroupSnapshot {
  readonly size: number;
  readonly nextId: number;
}

export class CaptureGroup {
  private readonly entries: Capture[] = [];
  private nextId = 0;

  get members(): readonly Capture[] {
    return this.entries;
  }

  add(expr: PostfixExpressionNode): Capture {
    const existing = this.entries.find(entry => entry.capturedExpr === expr);
    if (existing) return existing;
    const capture: Capture = {
      capturedExpr: expr,
      capName: `_${this.nextId++}_`,
      str: printPostfixExpression(expr, { omitCapture: true }),
    };
    this.entries.push(capture);
    return capture;
  }

  remove(expr: PostfixExpressionNode): boolean {
    const idx = this.entries.findIndex(entry => entry.capturedExpr === expr);
    if (idx < 0) return false;
    this.entries.splice(idx, 1);
    return true;
  }

  snapshot(): CaptureGroupSnapshot {
    return { size: this.entries.length, nextId: this.nextId };
  }

  /** 丢弃快照之后登记的捕获，合成名字的编号一并回退 */
  restore(snapshot: CaptureGroupSnapshot): void {
    this.entries.length = Math.min(this.entries.length, snapshot.size);
    this.nextId = snapshot.nextId;
  }

  find(capName: string): Capture | undefined {
    return this.entries.find(entry => entry.capName === capName);
  }
}
