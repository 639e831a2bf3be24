/**
 * @module config-service
 *
 * 统一配置管理服务：集中读取所有环境变量。
 *
 * **设计目标**：
 * - 单一数据源：日志级别、JSON 缩进、转译缩进宽度都从 ConfigService 获取
 * - 启动时校验：数值配置越界或无法解析时回退到默认值
 * - 可测试性：`resetForTesting()` 之后下一次 `getInstance()` 重新读取环境变量
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const indent = ConfigService.getInstance().jsonIndent;
 * ```
 */

import { LogLevel } from '../utils/logger.js';

const DEFAULT_JSON_INDENT = 2;
const DEFAULT_INDENT_WIDTH = 4;

/**
 * 配置服务单例类。
 *
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（LOG_LEVEL，默认 INFO） */
  readonly logLevel: LogLevel;

  /** toJson 的缩进空格数（POLYAST_JSON_INDENT，0..8，默认 2） */
  readonly jsonIndent: number;

  /** 转译器每级缩进的空格数（POLYAST_INDENT_WIDTH，1..8，默认 4） */
  readonly indentWidth: number;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.jsonIndent = this.parseBoundedInt(process.env.POLYAST_JSON_INDENT, 0, 8, DEFAULT_JSON_INDENT);
    this.indentWidth = this.parseBoundedInt(process.env.POLYAST_INDENT_WIDTH, 1, 8, DEFAULT_INDENT_WIDTH);
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值，无法识别时返回 INFO。
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.toUpperCase()) {
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

  private parseBoundedInt(raw: string | undefined, min: number, max: number, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) return fallback;
    return value;
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
