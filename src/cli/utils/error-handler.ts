import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticCode, DiagnosticError } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'lexical' | 'syntax' | 'metafunction' | 'internal';

interface DiagnosticCarrier extends Error {
  diagnostics?: Diagnostic[];
}

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(DiagnosticCode));

function isDiagnostic(value: unknown): value is Diagnostic {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    KNOWN_CODES.has(value.code) &&
    'message' in value &&
    'span' in value
  );
}

function isDiagnosticArray(value: unknown): value is Diagnostic[] {
  return Array.isArray(value) && value.every(isDiagnostic);
}

function isDiagnosticCarrier(error: unknown): error is DiagnosticCarrier {
  return error instanceof Error && 'diagnostics' in error && isDiagnosticArray(error.diagnostics);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: DiagnosticCode): CliErrorCategory {
  if (code.startsWith('L')) return 'lexical';
  if (code.startsWith('P')) return 'syntax';
  if (code.startsWith('R')) return 'metafunction';
  return 'internal';
}

function hintFor(diag: Diagnostic): string | null {
  switch (classify(diag.code)) {
    case 'lexical':
      return '词法错误：检查该位置的字面量、注释或原始字符串是否闭合';
    case 'metafunction':
      return '元函数失败：检查类型体是否满足 @ 元函数的要求';
    case 'internal':
      return '编译器内部错误，请附上源码报告问题';
    default:
      return null;
  }
}

function location(diag: Diagnostic): string {
  return `${diag.span.start.line}:${diag.span.start.col}`;
}

/**
 * 逐条输出诊断；同一类别的提示只输出一次。
 */
export function printDiagnostics(diags: readonly Diagnostic[], file?: string): void {
  const hinted = new Set<CliErrorCategory>();
  const prefix = file === undefined ? '' : `${file}:`;
  for (const diag of diags) {
    const internal = diag.internal ? 'internal compiler error: ' : '';
    logError(`${prefix}${location(diag)} [${diag.code}] ${internal}${diag.message}`);
    const category = classify(diag.code);
    const hint = hintFor(diag);
    if (hint && !hinted.has(category)) {
      hinted.add(category);
      logWarn(hint);
    }
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`文件权限不足：${error.message}`);
      break;
    case 'ENOENT':
      logError(`未找到源文件：${error.message}`);
      break;
    case 'EISDIR':
      logError(`需要源文件而不是目录：${error.message}`);
      break;
    default:
      logError(`文件系统错误(${code})：${error.message}`);
      break;
  }
}

export function createDiagnosticsError(diagnostics: Diagnostic[]): Error {
  const error: DiagnosticCarrier = new Error('CLI_DIAGNOSTIC_ERROR');
  error.diagnostics = diagnostics;
  return error;
}

export function handleError(error: unknown): never {
  if (error instanceof DiagnosticError) {
    printDiagnostics([error.diagnostic]);
    process.exit(1);
  }

  if (isDiagnosticCarrier(error)) {
    printDiagnostics(error.diagnostics ?? []);
    process.exit(1);
  }

  if (isDiagnosticArray(error)) {
    printDiagnostics(error);
    process.exit(1);
  }

  if (isNodeError(error)) {
    handleNodeError(error);
    process.exit(1);
  }

  if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('发生未知错误，请重试');
  }

  process.exit(1);
}
