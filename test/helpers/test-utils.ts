/**
 * 测试工具函数
 */

import assert from 'node:assert/strict';
import { AstError, type DiagnosticCode } from '../../src/diagnostics/diagnostics.js';
import { Logger, LogLevel } from '../../src/utils/logger.js';

type AstErrorClass = new (...args: never[]) => AstError;

/**
 * 断言 fn 抛出指定类别与诊断代码的 AstError，返回该错误以便继续检查消息等细节
 */
export function assertAstError(fn: () => unknown, errorClass: AstErrorClass, code: DiagnosticCode): AstError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  assert.ok(caught instanceof errorClass, `expected ${errorClass.name}, got ${String(caught)}`);
  assert.equal(caught.code, code);
  return caught;
}

/**
 * 记录日志行的 Logger，用于断言调试事件
 */
export function createCapturingLogger(component = 'test', level = LogLevel.DEBUG): {
  logger: Logger;
  entries: Array<Record<string, unknown>>;
} {
  const entries: Array<Record<string, unknown>> = [];
  const logger = new Logger(component, level, line => {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed === 'object' && parsed !== null) entries.push(Object.fromEntries(Object.entries(parsed)));
  });
  return { logger, entries };
}
