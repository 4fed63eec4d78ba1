/**
 * @module tests/integration/hot-reload-cycle.integration.test.ts
 * @description 热重载全链路：文件变更 → 防抖 → 两阶段校验 → 写锁替换 → 下一根 K 线按新配置路由。
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createConfigReloader } from '../../src/core/configReloader/index.js';
import type { ReloadEvent } from '../../src/core/configReloader/types.js';
import { createExpressionEngine } from '../../src/core/expressionEngine/index.js';
import { createConfigLoader } from '../../src/services/configLoader/index.js';
import type { ConfigLoader } from '../../src/services/configLoader/types.js';
import { createDecisionEngine } from '../../src/services/decisionEngine/index.js';
import { createIndicatorSnapshot } from '../../src/services/indicatorSnapshot/index.js';
import { createStrategyDocument, createTempConfigFile } from '../helpers/strategyDocuments.js';
import {
  createCapturingLogger,
  createDeferred,
  createFakeClock,
  createWatcherDouble,
  flushImmediates,
} from '../helpers/testDoubles.js';
import type { Deferred } from '../helpers/testDoubles.js';

const strongTrendBar = createIndicatorSnapshot([
  { indicatorId: 'adx', field: 'value', value: 35 },
  { indicatorId: 'rsi', field: 'value', value: 65 },
  { indicatorId: 'atr', field: 'pct', value: 2 },
]);

/** 强趋势改路由到 set_trend 的配置 */
function createRerouteDocument() {
  const base = createStrategyDocument();
  return createStrategyDocument({
    routing: [{ strategy_set_id: 'set_trend', match: { all_of: ['STRONG_BULL'] } }, ...base.routing],
  });
}

async function createRuntime() {
  const file = await createTempConfigFile();
  const logger = createCapturingLogger();
  const clock = createFakeClock(0);
  const watcher = createWatcherDouble();
  const expressionEngine = createExpressionEngine({ logger });
  const inner = createConfigLoader({ expressionEngine, logger });

  let loadedSignal: Deferred<void> = createDeferred<void>();
  const loader: ConfigLoader = {
    loadFromFile: async (filePath) => {
      const config = await inner.loadFromFile(filePath);
      loadedSignal.resolve();
      return config;
    },
    parseDocument: inner.parseDocument,
  };

  let windowGate: Deferred<void> | null = null;
  const reloader = createConfigReloader({
    configPath: file.filePath,
    loader,
    watcherFactory: watcher.factory,
    now: clock.now,
    logger,
  });
  const engine = createDecisionEngine({
    reloader,
    expressionEngine,
    logger,
    onOverrideWindow: async () => {
      if (windowGate) {
        await windowGate.promise;
      }
    },
  });

  return {
    file,
    clock,
    watcher,
    reloader,
    engine,
    holdOverrideWindow: (): Deferred<void> => {
      const gate = createDeferred<void>();
      windowGate = gate;
      return gate;
    },
    releaseOverrideWindow: () => {
      windowGate = null;
    },
    expectNextLoad: (): Promise<void> => {
      loadedSignal = createDeferred<void>();
      return loadedSignal.promise;
    },
  };
}

describe('hot reload cycle integration', () => {
  it('routes the next bar with the reloaded configuration and keeps it on a bad edit', async () => {
    const runtime = await createRuntime();
    const events: ReloadEvent[] = [];
    runtime.reloader.subscribe((event) => events.push(event));
    try {
      await runtime.reloader.load();
      runtime.reloader.start();

      const before = await runtime.engine.evaluateBar(strongTrendBar);
      assert.equal(before.configVersion, 1);
      assert.equal(before.strategySetId, 'set_strong');

      await runtime.file.write(createRerouteDocument());
      runtime.clock.set(5_000);
      runtime.watcher.emit('strategy.json');
      await runtime.reloader.waitForIdle();

      const after = await runtime.engine.evaluateBar(strongTrendBar);
      assert.equal(after.configVersion, 2);
      assert.equal(after.strategySetId, 'set_trend');
      assert.equal(after.matchedRuleIndex, 0);
      assert.deepEqual(after.strategies[0]?.risk, {
        stopLossPct: 2,
        takeProfitPct: 5,
        trailingMode: 'atr',
        trailingMultiplier: 2.5,
      });

      await runtime.file.write(
        createStrategyDocument({ routing: [{ strategy_set_id: 'set_ghost', match: { all_of: ['TF'] } }] }),
      );
      runtime.clock.set(7_000);
      runtime.watcher.emit('strategy.json');
      await runtime.reloader.waitForIdle();

      const kept = await runtime.engine.evaluateBar(strongTrendBar);
      assert.equal(kept.configVersion, 2);
      assert.equal(kept.strategySetId, 'set_trend');

      assert.deepEqual(
        events.map((event) => `${event.trigger}:${String(event.success)}:v${event.version}`),
        ['initial:true:v1', 'file_change:true:v2', 'file_change:false:v2'],
      );
    } finally {
      await runtime.reloader.stop();
      await runtime.file.cleanup();
    }
    assert.equal(runtime.watcher.isClosed(), true);
  });

  it('finishes an in-flight bar on the configuration it started with', async () => {
    const runtime = await createRuntime();
    try {
      await runtime.reloader.load();

      const gate = runtime.holdOverrideWindow();
      const inFlight = runtime.engine.evaluateBar(strongTrendBar);
      await flushImmediates(3);

      await runtime.file.write(createRerouteDocument());
      const loaded = runtime.expectNextLoad();
      const reloading = runtime.reloader.reload();
      await loaded;
      await flushImmediates(3);

      assert.equal(runtime.reloader.getVersion(), 1);
      assert.equal(runtime.reloader.getState(), 'validating');

      runtime.releaseOverrideWindow();
      gate.resolve();
      const decision = await inFlight;
      const event = await reloading;

      assert.equal(decision.configVersion, 1);
      assert.equal(decision.strategySetId, 'set_strong');
      assert.equal(event.version, 2);

      const next = await runtime.engine.evaluateBar(strongTrendBar);
      assert.equal(next.strategySetId, 'set_trend');
    } finally {
      await runtime.file.cleanup();
    }
  });
});
