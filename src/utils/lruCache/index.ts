/**
 * LRU 缓存模块
 *
 * 功能：
 * - 基于 Map 插入顺序实现最近最少使用淘汰
 * - 记录命中/未命中次数
 *
 * 说明：
 * - Map 的迭代顺序即插入顺序，首个键即最久未使用
 * - has() 不影响顺序也不计入统计
 */
import type { LruCache, LruCacheStats } from './types.js';

export function createLruCache<K, V>(maxSize: number): LruCache<K, V> {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`LRU 缓存容量必须为正整数，当前为 ${maxSize}`);
  }

  // 值包一层，区分「键不存在」与「值本身为 undefined」
  const entries = new Map<K, { readonly value: V }>();
  let hits = 0;
  let misses = 0;

  function get(key: K): V | undefined {
    const entry = entries.get(key);
    if (entry === undefined) {
      misses += 1;
      return undefined;
    }
    entries.delete(key);
    entries.set(key, entry);
    hits += 1;
    return entry.value;
  }

  function set(key: K, value: V): void {
    entries.delete(key);
    entries.set(key, { value });
    while (entries.size > maxSize) {
      const oldest = entries.keys().next();
      if (oldest.done) {
        break;
      }
      entries.delete(oldest.value);
    }
  }

  function clear(): void {
    entries.clear();
    hits = 0;
    misses = 0;
  }

  function getStats(): LruCacheStats {
    return { hits, misses, size: entries.size, maxSize };
  }

  return {
    get,
    set,
    has: (key: K) => entries.has(key),
    clear,
    getStats,
  };
}
