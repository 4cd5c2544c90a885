/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * - LOG_LEVEL：日志级别（DEBUG/INFO/WARN/ERROR，默认 INFO）
 * - CPP2_DEBUG_PARSER：设为 1 时输出解析器跟踪日志
 * - CPP2_MAX_LINE_LENGTH：源码加载器允许的最大行长度
 *
 * ```typescript
 * const config = ConfigService.getInstance();
 * if (config.debugParser) {
 *   // 输出解析跟踪
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

/** 默认的最大行长度，超出时源码加载器报错并截断该行 */
export const DEFAULT_MAX_LINE_LENGTH = 90_000;

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 是否输出解析器跟踪日志（默认 false） */
  readonly debugParser: boolean;

  /** 源码行最大长度 */
  readonly maxLineLength: number;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.debugParser = process.env.CPP2_DEBUG_PARSER === '1';
    this.maxLineLength = this.parsePositiveInt(process.env.CPP2_MAX_LINE_LENGTH, DEFAULT_MAX_LINE_LENGTH);
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值。
   *
   * @param raw - 原始环境变量值
   * @returns 解析后的 LogLevel，默认 INFO
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private parsePositiveInt(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const value = Number.parseInt(raw, 10);
    return Number.isFinite(value) && value > 0 ? value : fallback;
  }

  /**
   * 获取 ConfigService 单例实例。
   *
   * 首次调用时创建实例，后续调用返回同一实例。
   */
  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
