import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigService } from '../../../src/config/config-service.js';
import { LogLevel } from '../../../src/utils/logger.js';

const ENV_KEYS = ['LOG_LEVEL', 'POLYAST_JSON_INDENT', 'POLYAST_INDENT_WIDTH'];

const ORIGINAL_ENV: Record<string, string | undefined> = Object.fromEntries(
  ENV_KEYS.map((key) => [key, process.env[key]])
);

function restoreEnv(): void {
  for (const key of ENV_KEYS) {
    const value = ORIGINAL_ENV[key];
    if (typeof value === 'undefined') {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

function clearEnv(): void {
  for (const key of ENV_KEYS) delete process.env[key];
}

beforeEach(() => {
  clearEnv();
  ConfigService.resetForTesting();
});

afterEach(() => {
  restoreEnv();
  ConfigService.resetForTesting();
});

describe('ConfigService', () => {
  it('未设置环境变量时应该使用默认值', () => {
    const config = ConfigService.getInstance();

    assert.equal(config.logLevel, LogLevel.INFO);
    assert.equal(config.jsonIndent, 2);
    assert.equal(config.indentWidth, 4);
  });

  it('应该从环境变量读取日志级别（忽略大小写）', () => {
    process.env.LOG_LEVEL = 'debug';
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.DEBUG);
  });

  it('无法识别的日志级别应该回退到 INFO', () => {
    process.env.LOG_LEVEL = 'verbose';
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.INFO);
  });

  it('应该读取合法范围内的缩进配置', () => {
    process.env.POLYAST_JSON_INDENT = '0';
    process.env.POLYAST_INDENT_WIDTH = '2';

    const config = ConfigService.getInstance();
    assert.equal(config.jsonIndent, 0);
    assert.equal(config.indentWidth, 2);
  });

  it('越界或非数值的缩进配置应该回退到默认值', () => {
    process.env.POLYAST_JSON_INDENT = '9';
    process.env.POLYAST_INDENT_WIDTH = 'wide';

    const config = ConfigService.getInstance();
    assert.equal(config.jsonIndent, 2);
    assert.equal(config.indentWidth, 4);
  });

  it('缩进宽度为 0 时应该回退到默认值', () => {
    process.env.POLYAST_INDENT_WIDTH = '0';
    assert.equal(ConfigService.getInstance().indentWidth, 4);
  });

  it('应该返回同一个单例，重置后重新读取环境变量', () => {
    const first = ConfigService.getInstance();
    assert.strictEqual(ConfigService.getInstance(), first);

    process.env.POLYAST_JSON_INDENT = '4';
    assert.equal(ConfigService.getInstance().jsonIndent, 2);

    ConfigService.resetForTesting();
    const second = ConfigService.getInstance();
    assert.notStrictEqual(second, first);
    assert.equal(second.jsonIndent, 4);
  });
});
