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

/** 接收一行已序列化的 JSON 日志 */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = line => {
  console.error(line);
};

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * 结构化日志：每条日志一行 JSON。
 *
 * `child()` 派生的 Logger 共享级别与输出，组件名以 `.` 连接，
 * 绑定的元数据出现在每一条日志中（单条日志的元数据优先）。
 */
export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink,
    private readonly bindings: LogMetadata = {}
  ) {}

  child(name: string, bindings: LogMetadata = {}): Logger {
    return new Logger(`${this.component}.${name}`, this.minLevel, this.sink, { ...this.bindings, ...bindings });
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

  /** AstError 的诊断代码以 `code` 字段输出 */
  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? {
          error: error.message,
          code: errorCode(error),
          stack: error.stack,
          ...meta,
        }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...this.bindings,
      ...meta,
    };

    // stdout 留给调用方（转译结果、JSON 输出），日志一律写 stderr
    this.sink(JSON.stringify(entry));
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
