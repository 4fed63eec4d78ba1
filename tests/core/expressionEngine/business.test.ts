/**
 * 表达式引擎业务测试
 *
 * 功能：
 * - 验证编译缓存、求值结果对象与布尔门控的降级行为
 * - 验证运算符语义：拼接、深比较、成员判断、短路与类型错误
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createExpressionEngine } from '../../../src/core/expressionEngine/index.js';
import type { ExpressionContext, Value } from '../../../src/types/expression.js';
import { ExpressionCompileError, ExpressionEvalError } from '../../../src/utils/error/index.js';
import { createCapturingLogger } from '../../helpers/testDoubles.js';

const logger = createCapturingLogger();
const engine = createExpressionEngine({ logger });

function valueOf(source: string, context: ExpressionContext = {}): Value {
  const outcome = engine.evaluate(engine.compile(source), context);
  if (!outcome.ok) {
    return assert.fail(`求值失败：${source}：${outcome.error.message}`);
  }
  return outcome.value;
}

function evalErrorOf(source: string, context: ExpressionContext = {}): string {
  const outcome = engine.evaluate(engine.compile(source), context);
  if (outcome.ok) {
    return assert.fail(`期望求值失败：${source}`);
  }
  assert.ok(outcome.error instanceof ExpressionEvalError);
  return outcome.error.message;
}

describe('expression engine business flow', () => {
  it('caches compiled expressions by source', () => {
    const local = createExpressionEngine({ logger: createCapturingLogger() });

    const first = local.compile('a + 1');
    const second = local.compile('a + 1');

    assert.equal(first, second);
    assert.equal(Object.isFrozen(first), true);
    assert.deepEqual(local.getCacheStats(), { hits: 1, misses: 1, size: 1, maxSize: 128 });

    local.clearCache();
    assert.equal(local.getCacheStats().size, 0);
  });

  it('bounds the cache by the configured size', () => {
    const local = createExpressionEngine({ cacheSize: 2, logger: createCapturingLogger() });

    local.compile('1');
    local.compile('2');
    local.compile('3');

    assert.equal(local.getCacheStats().size, 2);
  });

  it('validates without caching or evaluating', () => {
    const local = createExpressionEngine({ logger: createCapturingLogger() });

    assert.deepEqual(local.validate('abs(-1)'), { valid: true, errors: [] });
    const result = local.validate('foo(1)');
    assert.equal(result.valid, false);
    assert.equal(result.errors[0]?.message, "未知函数 'foo'（位置 0）");
    assert.equal(local.getCacheStats().size, 0);
  });

  it('returns runtime failures as outcomes instead of throwing', () => {
    assert.deepEqual(
      engine.evaluate(engine.compile('rsi.value > 45 && rsi.value < 55'), { rsi: { value: 50 } }),
      { ok: true, value: true },
    );
    assert.equal(evalErrorOf('missing > 1'), "未定义的变量 'missing'");
  });

  it('treats non-boolean results and runtime errors as false in boolean gates', () => {
    const gateLogger = createCapturingLogger();
    const local = createExpressionEngine({ logger: gateLogger });

    assert.equal(local.evaluateBoolean('1 + 1', {}), false);
    assert.equal(local.evaluateBoolean('x > 1', {}), false);
    assert.equal(local.evaluateBoolean('x > 1', { x: 2 }), true);

    assert.deepEqual(gateLogger.messages('warn'), [
      '[表达式] 结果不是 bool，按 false 处理：1 + 1',
      '[表达式] 求值失败，按 false 处理：x > 1',
    ]);
  });

  it('throws compile errors from boolean gates', () => {
    assert.throws(() => engine.evaluateBoolean('abs(', {}), ExpressionCompileError);
  });

  it('reads the injected clock', () => {
    const local = createExpressionEngine({ now: () => 1_700_000_000_500, logger: createCapturingLogger() });

    const outcome = local.evaluate(local.compile('now()'), {});
    assert.deepEqual(outcome, { ok: true, value: 1_700_000_000 });
  });

  it('exposes the function registry', () => {
    assert.equal(engine.hasFunction('crossover'), true);
    assert.equal(engine.hasFunction('lambda'), false);
  });
});

describe('expression operator semantics', () => {
  it('follows arithmetic precedence and grouping', () => {
    assert.equal(valueOf('1 + 2 * 3'), 7);
    assert.equal(valueOf('(1 + 2) * 3'), 9);
    assert.equal(valueOf('7 % 4'), 3);
    assert.equal(valueOf('-x + 1', { x: 3 }), -2);
  });

  it('concatenates strings and lists', () => {
    assert.equal(valueOf('"ab" + "cd"'), 'abcd');
    assert.deepEqual(valueOf('[1, 2] + [3]'), [1, 2, 3]);
  });

  it('compares strings and deep-compares containers', () => {
    assert.equal(valueOf('"b" > "a"'), true);
    assert.equal(valueOf('{"a": [1, 2]} == {"a": [1, 2]}'), true);
    assert.equal(valueOf('[1, 2] != [2, 1]'), true);
  });

  it('checks membership in lists, maps and strings', () => {
    assert.equal(valueOf('2 in [1, 2, 3]'), true);
    assert.equal(valueOf('"k" in {"k": 1}'), true);
    assert.equal(valueOf('"ell" in "hello"'), true);
  });

  it('short-circuits logical operators', () => {
    assert.equal(valueOf('false && missing'), false);
    assert.equal(valueOf('true || missing'), true);
    assert.equal(valueOf('flag ? "yes" : "no"', { flag: false }), 'no');
    assert.equal(valueOf('!flag', { flag: false }), true);
  });

  it('reads members, indexes and receiver calls', () => {
    const context: ExpressionContext = { xs: [10, 20], trade: { side: 'long' }, x: -3 };

    assert.equal(valueOf('xs[1]', context), 20);
    assert.equal(valueOf('trade.side', context), 'long');
    assert.equal(valueOf('trade["side"]', context), 'long');
    assert.equal(valueOf('x.abs()', context), 3);
  });

  it('reports type and range errors', () => {
    assert.equal(evalErrorOf('10 / 0'), "运算符 '/' 除数为 0");
    assert.equal(evalErrorOf('1 < "a"'), "运算符 '<' 不支持 int 与 string");
    assert.equal(evalErrorOf('1 && true'), "运算符 '&&' 左侧 需要 bool，实际为 int");
    assert.equal(evalErrorOf('xs[5]', { xs: [10, 20] }), '列表下标越界：5（长度 2）');
    assert.equal(evalErrorOf('trade.missing', { trade: { side: 'long' } }), "映射中不存在键 'missing'");
  });
});
