/**
 * 文件变更事件队列
 *
 * - 容量有界，满时丢弃最旧事件
 * - 入队后通知回调，由重载器消费者调度处理
 */
import type { FileChangeEvent, ReloadEventQueue } from './types.js';

export function createReloadEventQueue(capacity: number): ReloadEventQueue {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`事件队列容量必须为正整数，实际为 ${capacity}`);
  }

  const queue: FileChangeEvent[] = [];
  const callbacks: Array<() => void> = [];

  function push(event: FileChangeEvent): FileChangeEvent | null {
    const dropped = queue.length >= capacity ? (queue.shift() ?? null) : null;
    queue.push(event);
    for (const callback of callbacks) {
      callback();
    }
    return dropped;
  }

  return {
    push,
    pop: () => queue.shift() ?? null,
    size: () => queue.length,
    isEmpty: () => queue.length === 0,
    clear: () => {
      queue.length = 0;
    },
    onEventAdded: (callback: () => void) => {
      callbacks.push(callback);
    },
  };
}
