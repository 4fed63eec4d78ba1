/**
 * error 工具测试
 *
 * 功能：
 * - 验证 formatError 对各类输入的格式化
 * - 验证引擎错误类的 code、name 与消息拼装
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  ConfigLoadError,
  ConfigValidationError,
  EngineError,
  ExpressionCompileError,
  MissingIndicatorError,
  formatError,
} from '../../src/utils/error/index.js';

describe('formatError', () => {
  it('formats errors, strings and error-like objects', () => {
    assert.equal(formatError(null), '未知错误');
    assert.equal(formatError(undefined), '未知错误');
    assert.equal(formatError('plain text'), 'plain text');
    assert.equal(formatError(new Error('boom')), 'boom');
    assert.equal(formatError({ msg: 'bad request' }), 'bad request');
    assert.equal(formatError({ message: '', error: 'fallback' }), 'fallback');
    assert.equal(formatError({ a: 1 }), '{"a":1}');
    assert.equal(formatError(42), '42');
  });
});

describe('engine errors', () => {
  it('summarizes at most five validation issues', () => {
    const issues = Array.from({ length: 6 }, (_, i) => ({ path: `p${i}`, message: `m${i}` }));
    const error = new ConfigValidationError(issues);

    assert.equal(error.code, 'CONFIG_VALIDATION');
    assert.equal(error.name, 'ConfigValidationError');
    assert.ok(error instanceof EngineError);
    assert.equal(error.issues.length, 6);
    assert.equal(error.message, '配置语义校验失败：p0: m0；p1: m1；p2: m2；p3: m3；p4: m4（另有 1 项）');
  });

  it('keeps file path and cause on load errors', () => {
    const cause = new Error('ENOENT');
    const withPath = new ConfigLoadError('无法读取配置文件：ENOENT', '/tmp/strategy.json', { cause });
    const withoutPath = new ConfigLoadError('配置结构校验失败');

    assert.equal(withPath.code, 'CONFIG_LOAD');
    assert.equal(withPath.filePath, '/tmp/strategy.json');
    assert.equal(withPath.cause, cause);
    assert.equal(withoutPath.filePath, null);
  });

  it('builds missing-indicator keys and compile positions', () => {
    const missing = new MissingIndicatorError('rsi', 'value');
    assert.equal(missing.key, 'rsi.value');
    assert.equal(missing.message, '指标快照缺少 rsi.value');

    const compile = new ExpressionCompileError("未知函数 'foo'", 'foo(1)', 0);
    assert.equal(compile.message, "未知函数 'foo'（位置 0）");
    assert.equal(compile.source, 'foo(1)');
    assert.equal(compile.position, 0);
  });
});
