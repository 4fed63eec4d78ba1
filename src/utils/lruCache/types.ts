/**
 * LRU 缓存命中统计
 * 类型用途：getStats() 返回值，供表达式引擎暴露编译缓存状态
 */
export type LruCacheStats = Readonly<{
  hits: number;
  misses: number;
  size: number;
  maxSize: number;
}>;

/**
 * LRU 缓存接口
 * - get 命中时将条目移到最新位置
 * - set 超出容量时淘汰最久未使用的条目
 */
export interface LruCache<K, V> {
  readonly get: (key: K) => V | undefined;
  readonly set: (key: K, value: V) => void;
  readonly has: (key: K) => boolean;
  readonly clear: () => void;
  readonly getStats: () => LruCacheStats;
}
