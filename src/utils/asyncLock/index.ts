/**
 * 异步锁模块
 *
 * 功能：
 * - createMutex：互斥锁，串行化覆盖窗口（resolve/restore）等临界区
 * - createReadWriteLock：写优先读写锁，保护「当前配置」引用的读取与替换
 *
 * 说明：
 * - Node 为单线程事件循环，锁保护的是跨 await 的异步临界区
 * - 等待者按 FIFO 顺序唤醒
 */
import type { Mutex, ReadWriteLock, ReadWriteLockStatus, Release } from './types.js';

/**
 * 包装释放回调，保证只生效一次
 */
function once(fn: () => void): Release {
  let released = false;
  return () => {
    if (released) {
      return;
    }
    released = true;
    fn();
  };
}

export function createMutex(): Mutex {
  let locked = false;
  const waiters: Array<(release: Release) => void> = [];

  function release(): void {
    const next = waiters.shift();
    if (next) {
      // 直接移交锁，locked 保持 true
      next(once(release));
      return;
    }
    locked = false;
  }

  function acquire(): Promise<Release> {
    if (!locked) {
      locked = true;
      return Promise.resolve(once(release));
    }
    return new Promise<Release>((resolve) => {
      waiters.push(resolve);
    });
  }

  async function runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const releaseLock = await acquire();
    try {
      return await fn();
    } finally {
      releaseLock();
    }
  }

  return {
    acquire,
    runExclusive,
    isLocked: () => locked,
  };
}

export function createReadWriteLock(): ReadWriteLock {
  let activeReaders = 0;
  let writerActive = false;
  const pendingReaders: Array<() => void> = [];
  const pendingWriters: Array<() => void> = [];

  /**
   * 调度等待者：优先唤醒写者；无写者排队时一次性唤醒全部读者
   */
  function dispatch(): void {
    if (writerActive) {
      return;
    }
    if (pendingWriters.length > 0) {
      if (activeReaders === 0) {
        const nextWriter = pendingWriters.shift();
        if (nextWriter) {
          writerActive = true;
          nextWriter();
        }
      }
      return;
    }
    const readers = pendingReaders.splice(0, pendingReaders.length);
    activeReaders += readers.length;
    for (const wake of readers) {
      wake();
    }
  }

  function releaseRead(): void {
    activeReaders -= 1;
    dispatch();
  }

  function releaseWrite(): void {
    writerActive = false;
    dispatch();
  }

  function acquireRead(): Promise<Release> {
    if (!writerActive && pendingWriters.length === 0) {
      activeReaders += 1;
      return Promise.resolve(once(releaseRead));
    }
    return new Promise<Release>((resolve) => {
      pendingReaders.push(() => resolve(once(releaseRead)));
    });
  }

  function acquireWrite(): Promise<Release> {
    if (!writerActive && activeReaders === 0 && pendingWriters.length === 0) {
      writerActive = true;
      return Promise.resolve(once(releaseWrite));
    }
    return new Promise<Release>((resolve) => {
      pendingWriters.push(() => resolve(once(releaseWrite)));
    });
  }

  async function withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async function withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  function getStatus(): ReadWriteLockStatus {
    return {
      activeReaders,
      writerActive,
      pendingWriters: pendingWriters.length,
      pendingReaders: pendingReaders.length,
    };
  }

  return {
    acquireRead,
    acquireWrite,
    withRead,
    withWrite,
    getStatus,
  };
}
