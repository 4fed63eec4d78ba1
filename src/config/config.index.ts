/**
 * 引擎运行配置模块
 *
 * 功能：
 * - 从环境变量读取策略配置路径、防抖窗口、监听开关与缓存容量
 * - 未设置或非法值回落到默认值（非法值会告警）
 *
 * 环境变量：
 * - STRATEGY_CONFIG_PATH：策略配置文件路径（默认 ./config/strategy.json）
 * - CONFIG_RELOAD_DEBOUNCE_MS：防抖窗口毫秒（默认 1000，范围 0..60000）
 * - CONFIG_WATCH_ENABLED：是否监听文件变更（默认 true）
 * - EXPRESSION_CACHE_SIZE：表达式编译缓存容量（默认 128，范围 1..10000）
 * - RELOAD_QUEUE_CAPACITY：文件事件队列容量（默认 16，范围 1..1024）
 */
import path from 'node:path';
import { EXPRESSION, RELOAD } from '../constants/index.js';
import type { EngineConfig } from './types.js';
import { getBooleanConfig, getStringConfig, parseBoundedNumberConfig } from './utils.js';

const DEFAULT_STRATEGY_CONFIG_PATH = './config/strategy.json';

export function createEngineConfig({
  env,
  cwd = process.cwd(),
}: {
  env: NodeJS.ProcessEnv;
  cwd?: string;
}): EngineConfig {
  const rawPath = getStringConfig(env, 'STRATEGY_CONFIG_PATH') ?? DEFAULT_STRATEGY_CONFIG_PATH;

  return {
    strategyConfigPath: path.resolve(cwd, rawPath),
    reloadDebounceMs: parseBoundedNumberConfig({
      env,
      envKey: 'CONFIG_RELOAD_DEBOUNCE_MS',
      defaultValue: RELOAD.DEFAULT_DEBOUNCE_MS,
      min: 0,
      max: 60_000,
    }),
    watchEnabled: getBooleanConfig(env, 'CONFIG_WATCH_ENABLED', true),
    expressionCacheSize: parseBoundedNumberConfig({
      env,
      envKey: 'EXPRESSION_CACHE_SIZE',
      defaultValue: EXPRESSION.DEFAULT_CACHE_SIZE,
      min: 1,
      max: 10_000,
    }),
    reloadQueueCapacity: parseBoundedNumberConfig({
      env,
      envKey: 'RELOAD_QUEUE_CAPACITY',
      defaultValue: RELOAD.DEFAULT_QUEUE_CAPACITY,
      min: 1,
      max: 1024,
    }),
  };
}
