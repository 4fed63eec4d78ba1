/**
 * 指标快照服务
 *
 * 功能：
 * - 由上游产出的 IndicatorValue 列表构建只读快照（indicatorId → field → value）
 * - 同一 (indicatorId, field) 重复出现或数值非有限时拒绝构建
 * - 读取单个字段值，缺失返回 null
 */
import { isFiniteNumber } from '../../utils/primitives/index.js';
import type { IndicatorSnapshot, IndicatorValue } from '../../types/indicator.js';

export { snapshotToContext } from '../../core/conditionEvaluator/index.js';

/**
 * 构建指标快照。
 *
 * @throws RangeError 数值为 NaN 或 Infinity
 * @throws Error 同一 indicatorId.field 出现多次
 */
export function createIndicatorSnapshot(values: ReadonlyArray<IndicatorValue>): IndicatorSnapshot {
  const snapshot = new Map<string, Record<string, number>>();
  for (const { indicatorId, field, value } of values) {
    if (!isFiniteNumber(value)) {
      throw new RangeError(`指标值必须为有限数字：${indicatorId}.${field}=${String(value)}`);
    }
    let fields = snapshot.get(indicatorId);
    if (!fields) {
      fields = {};
      snapshot.set(indicatorId, fields);
    }
    if (Object.hasOwn(fields, field)) {
      throw new Error(`指标值重复：${indicatorId}.${field}`);
    }
    fields[field] = value;
  }

  const result: Record<string, Readonly<Record<string, number>>> = {};
  for (const [indicatorId, fields] of snapshot) {
    result[indicatorId] = Object.freeze(fields);
  }
  return Object.freeze(result);
}

export function getSnapshotValue(
  snapshot: IndicatorSnapshot,
  indicatorId: string,
  field: string,
): number | null {
  if (!Object.hasOwn(snapshot, indicatorId)) {
    return null;
  }
  const fields = snapshot[indicatorId];
  if (fields === undefined || !Object.hasOwn(fields, field)) {
    return null;
  }
  return fields[field] ?? null;
}
