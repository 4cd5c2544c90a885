import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

/** 前端内部各阶段使用的日志组件名 */
export type LogComponent = 'lexer' | 'parser' | 'reflect' | 'cli';

export class Logger {
  constructor(private readonly component: LogComponent, private readonly minLevel: LogLevel = LogLevel.INFO) {}

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? {
          error: error.message,
          stack: error.stack,
          ...meta,
        }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };

    // stdout 留给 CLI 的解析结果输出
    console.error(JSON.stringify(entry));
  }
}

export function createLogger(component: LogComponent): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
