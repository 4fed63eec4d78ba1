/**
 * 配置重载业务测试
 *
 * 功能：
 * - 验证首次加载、手动重载成功与失败时的版本与配置引用
 * - 验证订阅通知、订阅者异常隔离、被取代的重载结果丢弃
 * - 验证文件监听与启动/停止的幂等告警
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import type { ReloadEvent } from '../../../src/core/configReloader/types.js';
import { ConfigNotLoadedError } from '../../../src/utils/error/index.js';
import { createStrategyDocument, indicatorCondition } from '../../helpers/strategyDocuments.js';
import { createWatcherDouble } from '../../helpers/testDoubles.js';
import { createReloaderHarness } from './reloaderHarness.js';

const BASELINE_COUNTS = {
  indicators: 3,
  regimes: 4,
  strategies: 2,
  strategySets: 3,
  routingRules: 3,
};

describe('config reloader business flow', () => {
  it('publishes the initial load', async () => {
    const harness = await createReloaderHarness();
    try {
      const events: ReloadEvent[] = [];
      harness.reloader.subscribe((event) => events.push(event));

      const config = await harness.reloader.load();

      assert.equal(harness.reloader.getCurrent(), config);
      assert.equal(harness.reloader.getVersion(), 1);
      assert.equal(harness.reloader.getState(), 'idle');
      assert.deepEqual(events, [
        {
          success: true,
          trigger: 'initial',
          version: 1,
          oldCounts: null,
          newCounts: BASELINE_COUNTS,
          schemaVersion: '1.0',
        },
      ]);
    } finally {
      await harness.dispose();
    }
  });

  it('rejects reads before the first load', async () => {
    const harness = await createReloaderHarness();
    try {
      await assert.rejects(harness.reloader.withCurrent(() => 1), (err: unknown) => {
        assert.ok(err instanceof ConfigNotLoadedError);
        assert.equal(err.code, 'CONFIG_NOT_LOADED');
        assert.equal(err.message, '[配置重载] 配置尚未加载');
        return true;
      });
    } finally {
      await harness.dispose();
    }
  });

  it('swaps in a valid configuration on manual reload', async () => {
    const harness = await createReloaderHarness();
    try {
      const previous = await harness.reloader.load();
      const base = createStrategyDocument();
      await harness.file.write(createStrategyDocument({ routing: base.routing.slice(0, 2) }));

      const event = await harness.reloader.reload();

      assert.deepEqual(event, {
        success: true,
        trigger: 'manual',
        version: 2,
        oldCounts: BASELINE_COUNTS,
        newCounts: { ...BASELINE_COUNTS, routingRules: 2 },
        schemaVersion: '1.0',
      });
      assert.notEqual(harness.reloader.getCurrent(), previous);
      assert.equal(await harness.reloader.withCurrent((config) => config.routing.length), 2);
    } finally {
      await harness.dispose();
    }
  });

  it('keeps the current configuration when the file is not valid JSON', async () => {
    const harness = await createReloaderHarness();
    try {
      const previous = await harness.reloader.load();
      await harness.file.writeRaw('{ "schema_version": ');

      const event = await harness.reloader.reload();

      assert.equal(event.success, false);
      assert.equal(event.version, 1);
      assert.equal(event.newCounts, null);
      assert.deepEqual(event.oldCounts, BASELINE_COUNTS);
      assert.ok(event.error?.startsWith('配置文件不是合法 JSON：'));
      assert.equal(harness.reloader.getCurrent(), previous);
      assert.equal(harness.reloader.getState(), 'idle');
      const [errorLog] = harness.logger.messages('error');
      assert.ok(errorLog?.startsWith('[配置重载] 重载失败，保留当前配置 version=1：'));
    } finally {
      await harness.dispose();
    }
  });

  it('keeps the current configuration when semantic validation fails', async () => {
    const harness = await createReloaderHarness();
    try {
      const previous = await harness.reloader.load();
      await harness.file.write(
        createStrategyDocument({ routing: [{ strategy_set_id: 'set_ghost', match: { all_of: ['TF'] } }] }),
      );

      const event = await harness.reloader.reload();

      assert.equal(event.success, false);
      assert.equal(
        event.error,
        "配置语义校验失败：routing[0].strategy_set_id: 引用了未定义的策略集 'set_ghost'",
      );
      assert.equal(harness.reloader.getCurrent(), previous);
      assert.equal(harness.reloader.getVersion(), 1);
    } finally {
      await harness.dispose();
    }
  });

  it('keeps the current configuration when a condition names an unknown indicator', async () => {
    const harness = await createReloaderHarness();
    try {
      const previous = await harness.reloader.load();
      const base = createStrategyDocument();
      await harness.file.write(
        createStrategyDocument({
          regimes: base.regimes.map((regime) =>
            regime.id === 'TF'
              ? { ...regime, conditions: { all: [indicatorCondition('vwap', 'value', 'gt', 1)] } }
              : regime,
          ),
        }),
      );

      const event = await harness.reloader.reload();

      assert.equal(event.success, false);
      assert.equal(event.version, 1);
      assert.equal(
        event.error,
        "配置语义校验失败：regimes[1].conditions.all[0].left.indicator_id: 引用了未定义的指标 'vwap'",
      );
      assert.equal(harness.reloader.getCurrent(), previous);
      assert.equal(harness.reloader.getVersion(), 1);
    } finally {
      await harness.dispose();
    }
  });

  it('isolates subscriber failures', async () => {
    const harness = await createReloaderHarness();
    try {
      const received: number[] = [];
      harness.reloader.subscribe(() => {
        throw new Error('listener broke');
      });
      const unsubscribe = harness.reloader.subscribe((event) => received.push(event.version));

      await harness.reloader.load();
      unsubscribe();
      const event = await harness.reloader.reload();

      assert.equal(event.success, true);
      assert.deepEqual(received, [1]);
      assert.deepEqual(harness.logger.messages('error'), [
        '[配置重载] 订阅者处理重载事件失败',
        '[配置重载] 订阅者处理重载事件失败',
      ]);
    } finally {
      await harness.dispose();
    }
  });

  it('discards a reload superseded by a newer one', async () => {
    const harness = await createReloaderHarness();
    try {
      await harness.reloader.load();
      const gate = harness.loaderDouble.holdNextLoad();

      const first = harness.reloader.reload();
      const second = harness.reloader.reload();
      const secondEvent = await second;
      gate.resolve();
      const firstEvent = await first;

      assert.equal(secondEvent.success, true);
      assert.equal(secondEvent.version, 2);
      assert.deepEqual(firstEvent, {
        success: false,
        trigger: 'manual',
        version: 2,
        oldCounts: BASELINE_COUNTS,
        newCounts: null,
        schemaVersion: '1.0',
        error: '重载已被更新的重载取代',
      });
      assert.equal(harness.reloader.getVersion(), 2);
      assert.equal(harness.loaderDouble.getCallCount(), 3);
    } finally {
      await harness.dispose();
    }
  });

  it('holds replacement until in-flight reads finish', async () => {
    const harness = await createReloaderHarness();
    try {
      const previous = await harness.reloader.load();
      const order: string[] = [];

      const read = harness.reloader.withCurrent(async (config) => {
        order.push('read-start');
        await new Promise<void>((resolve) => setTimeout(resolve, 20));
        order.push('read-end');
        return config;
      });
      const reload = harness.reloader.reload().then((event) => {
        order.push(`reloaded-v${event.version}`);
      });

      assert.equal(await read, previous);
      await reload;
      assert.deepEqual(order, ['read-start', 'read-end', 'reloaded-v2']);
    } finally {
      await harness.dispose();
    }
  });
});

describe('config reloader file watching', () => {
  it('reloads when the watched file changes', async () => {
    const watcher = createWatcherDouble();
    const harness = await createReloaderHarness({ watchEnabled: true, watcherFactory: watcher.factory });
    try {
      await harness.reloader.load();
      harness.clock.set(5_000);
      harness.reloader.start();

      assert.equal(watcher.getDirectory(), path.dirname(path.resolve(harness.file.filePath)));

      watcher.emit('other.json');
      watcher.emit(null);
      await harness.reloader.waitForIdle();
      assert.equal(harness.loaderDouble.getCallCount(), 1);

      watcher.emit('strategy.json');
      await harness.reloader.waitForIdle();
      assert.equal(harness.reloader.getVersion(), 2);

      await harness.dispose();
      assert.equal(watcher.isClosed(), true);
    } finally {
      await harness.dispose();
    }
  });

  it('ignores change notifications for other files', async () => {
    const harness = await createReloaderHarness();
    try {
      await harness.reloader.load();
      harness.reloader.start();
      const otherPath = path.join(harness.file.directory, 'other.json');

      harness.reloader.notifyFileChange(otherPath);
      await harness.reloader.waitForIdle();

      assert.equal(harness.loaderDouble.getCallCount(), 1);
      assert.ok(harness.logger.messages('debug').includes(`[配置重载] 忽略非配置文件变更：${otherPath}`));
    } finally {
      await harness.dispose();
    }
  });

  it('warns on repeated start and stop', async () => {
    const harness = await createReloaderHarness();
    try {
      harness.reloader.start();
      harness.reloader.start();
      await harness.reloader.stop();
      await harness.reloader.stop();

      assert.deepEqual(harness.logger.messages('warn'), [
        '[配置重载] 重载器已在运行中',
        '[配置重载] 重载器未在运行',
      ]);
    } finally {
      await harness.file.cleanup();
    }
  });
});
