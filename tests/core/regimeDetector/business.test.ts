/**
 * regime 检测业务测试
 *
 * 功能：
 * - 验证多 regime 同时激活、按优先级排序与作用范围过滤
 * - 验证单个 regime 评估失败不影响其他 regime
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createConditionEvaluator } from '../../../src/core/conditionEvaluator/index.js';
import { createExpressionEngine } from '../../../src/core/expressionEngine/index.js';
import { createRegimeDetector } from '../../../src/core/regimeDetector/index.js';
import { createIndicatorSnapshot } from '../../../src/services/indicatorSnapshot/index.js';
import type { RegimeDefinition } from '../../../src/types/strategyConfig.js';
import { loadTestConfiguration } from '../../helpers/strategyDocuments.js';
import { createCapturingLogger } from '../../helpers/testDoubles.js';

function createDetector(regimes: ReadonlyArray<RegimeDefinition>) {
  const logger = createCapturingLogger();
  const conditionEvaluator = createConditionEvaluator({
    expressionEngine: createExpressionEngine({ logger }),
    logger,
  });
  return { detector: createRegimeDetector({ regimes, conditionEvaluator, logger }), logger };
}

const trendingSnapshot = createIndicatorSnapshot([
  { indicatorId: 'adx', field: 'value', value: 35 },
  { indicatorId: 'rsi', field: 'value', value: 65 },
  { indicatorId: 'atr', field: 'pct', value: 4 },
]);

describe('regime detector business flow', () => {
  it('returns every active regime ordered by priority', () => {
    const { detector } = createDetector(loadTestConfiguration().regimes);

    const active = detector.detectActive(trendingSnapshot);

    assert.deepEqual(
      active.map((regime) => regime.regimeId),
      ['STRONG_BULL', 'TF', 'HIGH_VOL'],
    );
    assert.deepEqual(
      active.map((regime) => regime.priority),
      [95, 85, 70],
    );
  });

  it('filters by scope and keeps global regimes', () => {
    const { detector } = createDetector(loadTestConfiguration().regimes);
    const active = detector.detectActive(trendingSnapshot);

    assert.deepEqual(
      detector.getByScope(active, 'exit').map((regime) => regime.regimeId),
      ['TF', 'HIGH_VOL'],
    );
    assert.deepEqual(
      detector.getByScope(active, 'entry').map((regime) => regime.regimeId),
      ['STRONG_BULL', 'TF'],
    );
  });

  it('attaches normalized weights', () => {
    const { detector } = createDetector(loadTestConfiguration().regimes);
    const [strongBull, trend] = detector.detectActive(trendingSnapshot);

    assert.ok(strongBull);
    assert.ok(Math.abs((strongBull.weights['adx'] ?? 0) - 0.75) < 1e-9);
    assert.ok(Math.abs((strongBull.weights['rsi'] ?? 0) - 0.25) < 1e-9);
    assert.deepEqual(trend?.weights, {});
  });

  it('keeps declaration order for equal priorities', () => {
    const always = { mode: 'all', items: [] } as const;
    const regimes: RegimeDefinition[] = ['B', 'A', 'C'].map((id) => ({
      id,
      name: id,
      conditions: always,
      priority: id === 'C' ? 90 : 10,
      scope: null,
      indicatorWeights: {},
    }));
    const { detector } = createDetector(regimes);

    assert.deepEqual(
      detector.detectActive(createIndicatorSnapshot([])).map((regime) => regime.regimeId),
      ['C', 'B', 'A'],
    );
  });

  it('treats a failing regime as inactive and evaluates the rest', () => {
    const regimes: RegimeDefinition[] = [
      {
        id: 'BROKEN',
        name: 'Broken',
        conditions: { mode: 'all', items: [{ kind: 'expression', expression: 'abs(' }] },
        priority: 99,
        scope: null,
        indicatorWeights: {},
      },
      {
        id: 'CALM',
        name: 'Calm',
        conditions: { mode: 'all', items: [{ kind: 'expression', expression: 'atr.pct < 5' }] },
        priority: 10,
        scope: null,
        indicatorWeights: {},
      },
    ];
    const { detector, logger } = createDetector(regimes);

    const active = detector.detectActive(trendingSnapshot);

    assert.deepEqual(
      active.map((regime) => regime.regimeId),
      ['CALM'],
    );
    const [warning] = logger.messages('warn');
    assert.match(warning ?? '', /^\[Regime检测\] BROKEN 评估失败，按未激活处理：/);
  });

  it('returns nothing when no regime matches', () => {
    const { detector } = createDetector(loadTestConfiguration().regimes);
    const snapshot = createIndicatorSnapshot([
      { indicatorId: 'adx', field: 'value', value: 22 },
      { indicatorId: 'rsi', field: 'value', value: 30 },
      { indicatorId: 'atr', field: 'pct', value: 1 },
    ]);

    assert.deepEqual(detector.detectActive(snapshot), []);
  });
});
