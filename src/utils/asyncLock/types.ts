/**
 * 释放锁的回调
 * 用途：acquire 系列方法返回，调用后释放当前持有的锁；重复调用无副作用
 * 使用范围：asyncLock 模块及其调用方
 */
export type Release = () => void;

/**
 * 互斥锁接口
 * - acquire()：等待获取锁，返回释放回调
 * - runExclusive(fn)：在锁内执行 fn，结束（含异常）后自动释放
 * - isLocked()：当前是否有持有者
 */
export interface Mutex {
  readonly acquire: () => Promise<Release>;
  readonly runExclusive: <T>(fn: () => T | Promise<T>) => Promise<T>;
  readonly isLocked: () => boolean;
}

/**
 * 读写锁状态快照
 * 由 getStatus() 返回，用于外部观测与测试断言
 */
export type ReadWriteLockStatus = Readonly<{
  activeReaders: number;
  writerActive: boolean;
  pendingWriters: number;
  pendingReaders: number;
}>;

/**
 * 读写锁接口（写优先）
 * - 读锁可并发持有；写锁独占
 * - 有写者排队时，新的读者需等待，避免写者饥饿
 */
export interface ReadWriteLock {
  readonly acquireRead: () => Promise<Release>;
  readonly acquireWrite: () => Promise<Release>;
  readonly withRead: <T>(fn: () => T | Promise<T>) => Promise<T>;
  readonly withWrite: <T>(fn: () => T | Promise<T>) => Promise<T>;
  readonly getStatus: () => ReadWriteLockStatus;
}
