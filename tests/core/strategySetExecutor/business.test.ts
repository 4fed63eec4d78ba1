/**
 * 策略集执行业务测试
 *
 * 功能：
 * - 验证策略解析：entry/exit 继承、risk 按字段合并、未知策略跳过
 * - 验证指标参数覆盖窗口：窗口内生效、窗口后恢复、钩子异常时恢复
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  checkoutIndicatorOverrides,
  createStrategySetExecutor,
  mergeRisk,
} from '../../../src/core/strategySetExecutor/index.js';
import type { StrategySetExecutorDeps } from '../../../src/core/strategySetExecutor/types.js';
import type {
  IndicatorParamValue,
  StrategyConfiguration,
  StrategySet,
} from '../../../src/types/strategyConfig.js';
import { loadTestConfiguration } from '../../helpers/strategyDocuments.js';
import { createCapturingLogger } from '../../helpers/testDoubles.js';

const config = loadTestConfiguration();

function findSet(configuration: StrategyConfiguration, id: string): StrategySet {
  const found = configuration.strategySets.find((set) => set.id === id);
  if (!found) {
    return assert.fail(`缺少策略集 ${id}`);
  }
  return found;
}

function createExecutor(onOverrideWindow?: StrategySetExecutorDeps['onOverrideWindow']) {
  const logger = createCapturingLogger();
  const executor = createStrategySetExecutor({
    indicators: config.indicators,
    strategies: config.strategies,
    logger,
    onOverrideWindow,
  });
  return { executor, logger };
}

describe('strategy set executor business flow', () => {
  it('merges risk overrides field by field', async () => {
    const { executor } = createExecutor();

    const [resolved] = await executor.resolve(findSet(config, 'set_strong'));

    assert.ok(resolved);
    assert.equal(resolved.strategySetId, 'set_strong');
    assert.equal(resolved.strategyId, 'trend_follow');
    assert.deepEqual(resolved.risk, {
      stopLossPct: 3,
      takeProfitPct: 5,
      trailingMode: 'atr',
      trailingMultiplier: 2.5,
    });
    assert.equal(resolved.entry?.mode, 'all');
  });

  it('keeps base risk when no override is given', async () => {
    const { executor } = createExecutor();

    const [resolved] = await executor.resolve(findSet(config, 'set_range'));

    assert.deepEqual(resolved?.risk, { stopLossPct: 1.5, takeProfitPct: 3, positionSize: 0.5 });
  });

  it('applies indicator overrides only inside the window', async () => {
    const seen: IndicatorParamValue[] = [];
    const { executor } = createExecutor(({ getIndicatorParams }) => {
      seen.push(getIndicatorParams('rsi')?.['period'] ?? -1);
    });

    const [resolved] = await executor.resolve(findSet(config, 'set_strong'));

    assert.deepEqual(seen, [21]);
    assert.deepEqual(resolved?.indicatorParams['rsi'], { period: 21 });
    assert.deepEqual(executor.getIndicatorParams('rsi'), { period: 14 });
    assert.equal(executor.isOverrideActive(), false);
  });

  it('restores parameters when the window hook throws', async () => {
    const { executor } = createExecutor(() => {
      throw new Error('recompute failed');
    });

    await assert.rejects(executor.resolve(findSet(config, 'set_strong')), { message: 'recompute failed' });

    assert.deepEqual(executor.getIndicatorParams('rsi'), { period: 14 });
    assert.equal(executor.isOverrideActive(), false);
  });

  it('waits for the running resolve before restoring on demand', async () => {
    let executorRef: ReturnType<typeof createStrategySetExecutor> | null = null;
    let pendingRestore: Promise<void> | null = null;
    const { executor } = createExecutor(() => {
      pendingRestore = executorRef?.restore() ?? null;
    });
    executorRef = executor;

    const [resolved] = await executor.resolve(findSet(config, 'set_strong'));
    await pendingRestore;

    assert.deepEqual(resolved?.indicatorParams['rsi'], { period: 21 });
    assert.deepEqual(executor.getIndicatorParams('rsi'), { period: 14 });
    assert.equal(executor.isOverrideActive(), false);
  });

  it('skips unknown strategies and indicators with a warning', async () => {
    const { executor, logger } = createExecutor();
    const set: StrategySet = {
      id: 'set_x',
      name: 'X',
      strategies: [
        { strategyId: 'ghost', overrides: null },
        { strategyId: 'mean_revert', overrides: null },
      ],
      indicatorOverrides: [{ indicatorId: 'vwap', params: { period: 5 } }],
    };

    const resolved = await executor.resolve(set);

    assert.deepEqual(
      resolved.map((strategy) => strategy.strategyId),
      ['mean_revert'],
    );
    assert.deepEqual(logger.messages('warn'), [
      '[策略集执行] set_x 覆盖了未知指标 vwap，已跳过',
      '[策略集执行] set_x 引用了未知策略 ghost，已跳过',
    ]);
  });

  it('returns unknown indicator params as null', () => {
    const { executor } = createExecutor();

    assert.equal(executor.getIndicatorParams('vwap'), null);
  });
});

describe('checkoutIndicatorOverrides', () => {
  it('restores the first original and removes added keys on checkin', () => {
    const registry = new Map<string, Record<string, IndicatorParamValue>>([['rsi', { period: 14 }]]);
    const set: StrategySet = {
      id: 'set_y',
      name: 'Y',
      strategies: [],
      indicatorOverrides: [
        { indicatorId: 'rsi', params: { period: 21, source: 'close' } },
        { indicatorId: 'rsi', params: { period: 28 } },
      ],
    };

    const checkout = checkoutIndicatorOverrides(registry, set, createCapturingLogger());

    assert.deepEqual(registry.get('rsi'), { period: 28, source: 'close' });
    assert.deepEqual(checkout.indicatorIds, ['rsi']);

    checkout.checkin();
    checkout.checkin();

    assert.deepEqual(registry.get('rsi'), { period: 14 });
    assert.equal(checkout.isCheckedIn(), true);
  });
});

describe('mergeRisk', () => {
  it('prefers defined override fields', () => {
    assert.deepEqual(
      mergeRisk({ stopLossPct: 2, takeProfitPct: 4 }, { takeProfitPct: 6, trailingMode: 'percent' }),
      {
        stopLossPct: 2,
        takeProfitPct: 6,
        trailingMode: 'percent',
        trailingMultiplier: undefined,
        positionSize: undefined,
      },
    );
  });

  it('copies the base when there is no override', () => {
    const base = { stopLossPct: 2 };

    const merged = mergeRisk(base, undefined);

    assert.deepEqual(merged, { stopLossPct: 2 });
    assert.notEqual(merged, base);
  });
});
