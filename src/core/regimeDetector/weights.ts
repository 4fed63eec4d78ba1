/**
 * 指标权重归一化
 *
 * 规则：
 * - 输出权重非负且和为 1（容差 WEIGHT_SUM_TOLERANCE）
 * - 保序：输入越大，输出越大；相等输入输出相等
 * - 全零输入返回均分权重；空输入返回空对象
 */
import { WEIGHT_SUM_TOLERANCE } from '../../constants/index.js';

/**
 * 归一化权重。
 *
 * @param raw 指标 id → 原始权重（须为非负有限数）
 * @throws RangeError 存在负数或非有限数
 */
export function normalizeWeights(raw: Readonly<Record<string, number>>): Record<string, number> {
  const entries = Object.entries(raw);
  if (entries.length === 0) {
    return {};
  }

  let total = 0;
  for (const [id, weight] of entries) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new RangeError(`权重必须为非负有限数：${id}=${weight}`);
    }
    total += weight;
  }

  const normalized: Record<string, number> = {};
  if (total === 0) {
    const uniform = 1 / entries.length;
    for (const [id] of entries) {
      normalized[id] = uniform;
    }
    return normalized;
  }
  for (const [id, weight] of entries) {
    normalized[id] = weight / total;
  }
  return normalized;
}

/**
 * 判断权重和是否为 1（容差内）；空对象视为通过。
 */
export function isNormalized(weights: Readonly<Record<string, number>>): boolean {
  const values = Object.values(weights);
  if (values.length === 0) {
    return true;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return Math.abs(sum - 1) <= WEIGHT_SUM_TOLERANCE;
}
