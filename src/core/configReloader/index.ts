/**
 * 配置重载模块
 *
 * 功能：
 * - 持有当前策略配置与版本号，读写锁保护替换
 * - 文件变更事件进入有界队列，单消费者按时间戳防抖后重载
 * - 两阶段校验（结构 + 语义）在锁外完成，全部通过才在写锁内替换
 * - 重载结果通知订阅者；订阅者抛错只记录日志
 *
 * 状态：idle（持有 v）→ validating → idle（v' 或 v）
 *
 * 并发约束：
 * - 新一次重载开始后，更早的重载结果一律丢弃（不替换、不通知）
 * - 防抖：event.receivedAt - lastSuccessfulReloadAt < debounceMs 的事件跳过
 * - lastSuccessfulReloadAt 取成功重载的开始时刻
 */
import path from 'node:path';
import { RELOAD } from '../../constants/index.js';
import { getConfigCounts } from '../../services/configLoader/index.js';
import type { StrategyConfiguration } from '../../types/strategyConfig.js';
import { createReadWriteLock } from '../../utils/asyncLock/index.js';
import { ConfigNotLoadedError, formatError } from '../../utils/error/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import { watchDirectory } from './fileWatcher.js';
import { createReloadEventQueue } from './reloadEventQueue.js';
import type {
  ConfigReloader,
  ConfigReloaderDeps,
  ConfigReloaderState,
  ConfigWatcher,
  FileChangeEvent,
  ReloadEvent,
  ReloadListener,
  ReloadTrigger,
} from './types.js';

export { createReloadEventQueue } from './reloadEventQueue.js';

export function createConfigReloader(deps: ConfigReloaderDeps): ConfigReloader {
  const {
    loader,
    debounceMs = RELOAD.DEFAULT_DEBOUNCE_MS,
    queueCapacity = RELOAD.DEFAULT_QUEUE_CAPACITY,
    watchEnabled = true,
    watcherFactory = watchDirectory,
    now = Date.now,
    logger = defaultLogger,
  } = deps;

  const configPath = path.resolve(deps.configPath);
  const queue = createReloadEventQueue(queueCapacity);
  const rwLock = createReadWriteLock();
  const listeners = new Set<ReloadListener>();

  let current: StrategyConfiguration | null = null;
  let version = 0;
  let state: ConfigReloaderState = 'idle';
  let reloadSeq = 0;
  let lastSuccessfulReloadAt: number | null = null;

  // 消费者状态
  let running = false;
  let immediateHandle: ReturnType<typeof setImmediate> | null = null;
  let processing: Promise<void> | null = null;
  let watcher: ConfigWatcher | null = null;

  function notify(event: ReloadEvent): void {
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        logger.error('[配置重载] 订阅者处理重载事件失败', formatError(err));
      }
    }
  }

  /**
   * 执行一次重载。返回 null 表示结果已被更新的重载取代。
   */
  async function performReload(trigger: ReloadTrigger): Promise<ReloadEvent | null> {
    reloadSeq += 1;
    const seq = reloadSeq;
    const startedAt = now();
    state = 'validating';

    try {
      const next = await loader.loadFromFile(configPath);
      const swapped = await rwLock.withWrite(() => {
        if (seq !== reloadSeq) {
          return null;
        }
        const previous = current;
        current = next;
        version += 1;
        return { previous, version };
      });
      if (swapped === null) {
        logger.info(`[配置重载] 第 ${seq} 次重载结果已被更新的重载取代，丢弃`);
        return null;
      }

      lastSuccessfulReloadAt = startedAt;
      const event: ReloadEvent = {
        success: true,
        trigger,
        version: swapped.version,
        oldCounts: swapped.previous ? getConfigCounts(swapped.previous) : null,
        newCounts: getConfigCounts(next),
        schemaVersion: next.schemaVersion,
      };
      logger.info(
        `[配置重载] 重载成功 trigger=${trigger} version=${event.version} schema=${next.schemaVersion}`,
        { oldCounts: event.oldCounts, newCounts: event.newCounts },
      );
      notify(event);
      return event;
    } catch (err) {
      if (seq !== reloadSeq) {
        logger.info(`[配置重载] 第 ${seq} 次重载已被取代，忽略其失败：${formatError(err)}`);
        return null;
      }
      const message = formatError(err);
      const event: ReloadEvent = {
        success: false,
        trigger,
        version,
        oldCounts: current ? getConfigCounts(current) : null,
        newCounts: null,
        schemaVersion: current?.schemaVersion ?? null,
        error: message,
      };
      logger.error(`[配置重载] 重载失败，保留当前配置 version=${version}：${message}`);
      notify(event);
      return event;
    } finally {
      if (seq === reloadSeq) {
        state = 'idle';
      }
    }
  }

  async function load(): Promise<StrategyConfiguration> {
    const config = await loader.loadFromFile(configPath);
    reloadSeq += 1;
    const loadedAt = now();
    await rwLock.withWrite(() => {
      current = config;
      version += 1;
    });
    lastSuccessfulReloadAt = loadedAt;
    const event: ReloadEvent = {
      success: true,
      trigger: 'initial',
      version,
      oldCounts: null,
      newCounts: getConfigCounts(config),
      schemaVersion: config.schemaVersion,
    };
    logger.info(`[配置重载] 初始加载完成 version=${version} schema=${config.schemaVersion}`, {
      counts: event.newCounts,
    });
    notify(event);
    return config;
  }

  async function reload(): Promise<ReloadEvent> {
    const event = await performReload('manual');
    if (event) {
      return event;
    }
    return {
      success: false,
      trigger: 'manual',
      version,
      oldCounts: current ? getConfigCounts(current) : null,
      newCounts: null,
      schemaVersion: current?.schemaVersion ?? null,
      error: '重载已被更新的重载取代',
    };
  }

  function shouldDebounce(event: FileChangeEvent): boolean {
    return lastSuccessfulReloadAt !== null && event.receivedAt - lastSuccessfulReloadAt < debounceMs;
  }

  /**
   * 处理队列中的所有事件
   */
  async function processQueue(): Promise<void> {
    while (running && !queue.isEmpty()) {
      const event = queue.pop();
      if (!event) break;

      if (shouldDebounce(event)) {
        logger.debug(`[配置重载] 防抖窗口内，跳过文件事件 receivedAt=${event.receivedAt}`);
        continue;
      }
      await performReload('file_change');
    }
  }

  /**
   * 调度下一次处理（setImmediate）；队列为空时停止，等待入队回调重新调度
   */
  function scheduleNextProcess(): void {
    if (!running || queue.isEmpty()) {
      immediateHandle = null;
      return;
    }

    immediateHandle = setImmediate(() => {
      immediateHandle = null;
      if (!running || queue.isEmpty()) return;

      processing = processQueue()
        .catch((err) => {
          logger.error('[配置重载] 处理事件队列时发生错误', formatError(err));
        })
        .finally(() => {
          processing = null;
          scheduleNextProcess();
        });
    });
  }

  queue.onEventAdded(() => {
    if (running && immediateHandle === null && processing === null) {
      scheduleNextProcess();
    }
  });

  function notifyFileChange(filePath: string): void {
    if (path.resolve(filePath) !== configPath) {
      logger.debug(`[配置重载] 忽略非配置文件变更：${filePath}`);
      return;
    }
    const dropped = queue.push({ path: configPath, receivedAt: now() });
    if (dropped) {
      logger.warn(`[配置重载] 事件队列已满（${queueCapacity}），丢弃最旧事件 receivedAt=${dropped.receivedAt}`);
    }
  }

  function start(): void {
    if (running) {
      logger.warn('[配置重载] 重载器已在运行中');
      return;
    }
    running = true;

    if (watchEnabled) {
      const directory = path.dirname(configPath);
      const targetName = path.basename(configPath);
      watcher = watcherFactory(directory, (fileName) => {
        if (fileName === targetName) {
          notifyFileChange(path.join(directory, fileName));
        }
      });
      logger.info(`[配置重载] 开始监听 ${configPath}`);
    }

    scheduleNextProcess();
  }

  async function stop(): Promise<void> {
    if (!running) {
      logger.warn('[配置重载] 重载器未在运行');
      return;
    }
    running = false;

    if (immediateHandle !== null) {
      clearImmediate(immediateHandle);
      immediateHandle = null;
    }
    if (watcher) {
      watcher.close();
      watcher = null;
    }
    if (processing) {
      await processing;
    }
    queue.clear();
  }

  async function waitForIdle(): Promise<void> {
    while (immediateHandle !== null || processing !== null || (running && !queue.isEmpty())) {
      await (processing ?? new Promise<void>((resolve) => setImmediate(resolve)));
    }
  }

  function withCurrent<T>(fn: (config: StrategyConfiguration) => T | Promise<T>): Promise<T> {
    return rwLock.withRead(() => {
      if (!current) {
        throw new ConfigNotLoadedError();
      }
      return fn(current);
    });
  }

  function subscribe(listener: ReloadListener): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  return {
    load,
    reload,
    notifyFileChange,
    getCurrent: () => current,
    getVersion: () => version,
    getState: () => state,
    withCurrent,
    subscribe,
    start,
    stop,
    waitForIdle,
  };
}
