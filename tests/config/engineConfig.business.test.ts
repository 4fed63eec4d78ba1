/**
 * 引擎运行配置业务测试
 *
 * 功能：
 * - 验证环境变量解析、默认值与非法值回退。
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { createEngineConfig } from '../../src/config/config.index.js';

const CWD = '/srv/engine';

describe('engine config business flow', () => {
  it('falls back to defaults when nothing is set', () => {
    const config = createEngineConfig({ env: {}, cwd: CWD });

    assert.deepEqual(config, {
      strategyConfigPath: path.resolve(CWD, 'config/strategy.json'),
      reloadDebounceMs: 1000,
      watchEnabled: true,
      expressionCacheSize: 128,
      reloadQueueCapacity: 16,
    });
  });

  it('reads every supported variable', () => {
    const config = createEngineConfig({
      env: {
        STRATEGY_CONFIG_PATH: '/etc/rules/prod.json',
        CONFIG_RELOAD_DEBOUNCE_MS: '250',
        CONFIG_WATCH_ENABLED: 'FALSE ',
        EXPRESSION_CACHE_SIZE: '64',
        RELOAD_QUEUE_CAPACITY: '4',
      },
      cwd: CWD,
    });

    assert.deepEqual(config, {
      strategyConfigPath: path.resolve('/etc/rules/prod.json'),
      reloadDebounceMs: 250,
      watchEnabled: false,
      expressionCacheSize: 64,
      reloadQueueCapacity: 4,
    });
  });

  it('resolves a relative config path against cwd', () => {
    const config = createEngineConfig({ env: { STRATEGY_CONFIG_PATH: 'rules/dev.json' }, cwd: CWD });

    assert.equal(config.strategyConfigPath, path.resolve(CWD, 'rules/dev.json'));
  });

  it('uses defaults for blank, out-of-range, fractional and unparsable values', () => {
    const config = createEngineConfig({
      env: {
        STRATEGY_CONFIG_PATH: '   ',
        CONFIG_RELOAD_DEBOUNCE_MS: '-5',
        CONFIG_WATCH_ENABLED: 'maybe',
        EXPRESSION_CACHE_SIZE: '1.5',
        RELOAD_QUEUE_CAPACITY: 'abc',
      },
      cwd: CWD,
    });

    assert.equal(config.strategyConfigPath, path.resolve(CWD, 'config/strategy.json'));
    assert.equal(config.reloadDebounceMs, 1000);
    assert.equal(config.watchEnabled, true);
    assert.equal(config.expressionCacheSize, 128);
    assert.equal(config.reloadQueueCapacity, 16);
  });

  it('accepts a zero debounce window', () => {
    const config = createEngineConfig({ env: { CONFIG_RELOAD_DEBOUNCE_MS: '0' }, cwd: CWD });

    assert.equal(config.reloadDebounceMs, 0);
  });
});
