/**
 * 类型保护：判断 unknown 是否为可索引对象（非数组）。
 * 默认行为：仅当 typeof value === 'object'、value !== null 且不是数组时返回 true。
 *
 * @param value 待判断值
 * @returns true 表示可按键读取字段
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 类型保护：判断是否为有限数字（排除 NaN/Infinity）。
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * 递归冻结对象，用于配置对象构建完成后的不可变保证。
 * 已冻结的子对象直接跳过。
 *
 * @param value 待冻结值
 * @returns 原对象（已冻结）
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

/**
 * 将 UTC 时间格式化为日志时间字符串（YYYY-MM-DD HH:mm:ss.sss）。
 *
 * @param date 时间对象，默认当前时间
 */
export function toUtcTimeLog(date: Date | null = null): string {
  const target = date ?? new Date();
  return target.toISOString().replace('T', ' ').replace('Z', '');
}
