/**
 * CLI 输出工具：诊断与状态写到 stderr，stdout 只留给命令结果（token 列表、语法树、源码）。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
}

// 遵循 NO_COLOR 约定
function colorEnabled(): boolean {
  return process.env.NO_COLOR === undefined || process.env.NO_COLOR === '';
}

function colorize(symbol: string, message: string, color: AnsiColor): string {
  if (!colorEnabled()) return `${symbol} ${message}`;
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}

/** 命令结果，原样写到 stdout */
export function output(text: string): void {
  console.log(text);
}
