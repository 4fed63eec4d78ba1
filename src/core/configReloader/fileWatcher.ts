import { watch } from 'node:fs';
import { logger } from '../../utils/logger/index.js';
import { formatError } from '../../utils/error/index.js';
import type { ConfigWatcher, WatcherFactory } from './types.js';

/**
 * 默认文件监听：监听配置文件所在目录，文件名过滤由调用方完成。
 * 文件被重命名替换后目录监听仍然有效。
 */
export const watchDirectory: WatcherFactory = (directory, onChange): ConfigWatcher => {
  const watcher = watch(directory, { persistent: true }, (_eventType, fileName) => {
    onChange(fileName ?? null);
  });
  watcher.on('error', (err) => {
    logger.error(`[配置重载] 文件监听异常：${directory}`, formatError(err));
  });
  return {
    close: () => watcher.close(),
  };
};
