import type { Logger } from '../../utils/logger/types.js';
import type {
  IndicatorParams,
  IndicatorParamValue,
  RiskSettings,
  StrategySet,
} from '../../types/strategyConfig.js';
import type { MutableIndicatorRegistry, OverrideCheckout } from './types.js';

/**
 * 用原始快照整体替换参数对象内容（保留对象引用与键顺序）。
 */
function replaceParams(
  target: Record<string, IndicatorParamValue>,
  source: Readonly<Record<string, IndicatorParamValue>>,
): void {
  for (const key of Object.keys(target)) {
    delete target[key];
  }
  Object.assign(target, source);
}

/**
 * 签出并应用策略集的指标参数覆盖。
 * 只修改覆盖中列出的键；未知指标跳过并告警。
 *
 * @returns 签出凭证，checkin() 恢复原始参数
 */
export function checkoutIndicatorOverrides(
  registry: MutableIndicatorRegistry,
  strategySet: StrategySet,
  logger: Logger,
): OverrideCheckout {
  const originals = new Map<string, Readonly<Record<string, IndicatorParamValue>>>();

  for (const override of strategySet.indicatorOverrides) {
    const params = registry.get(override.indicatorId);
    if (!params) {
      logger.warn(
        `[策略集执行] ${strategySet.id} 覆盖了未知指标 ${override.indicatorId}，已跳过`,
      );
      continue;
    }
    // 同一指标多次覆盖时只保存第一次之前的原值
    if (!originals.has(override.indicatorId)) {
      originals.set(override.indicatorId, { ...params });
    }
    Object.assign(params, override.params);
  }

  let checkedIn = false;
  return {
    strategySetId: strategySet.id,
    indicatorIds: [...originals.keys()],
    checkin(): void {
      if (checkedIn) {
        return;
      }
      checkedIn = true;
      for (const [indicatorId, original] of originals) {
        const params = registry.get(indicatorId);
        if (params) {
          replaceParams(params, original);
        }
      }
    },
    isCheckedIn: () => checkedIn,
  };
}

/**
 * 合并风控设置：覆盖中有值（非 undefined）的字段生效。
 */
export function mergeRisk(base: RiskSettings, override: RiskSettings | undefined): RiskSettings {
  if (!override) {
    return { ...base };
  }
  return {
    stopLossPct: override.stopLossPct ?? base.stopLossPct,
    takeProfitPct: override.takeProfitPct ?? base.takeProfitPct,
    trailingMode: override.trailingMode ?? base.trailingMode,
    trailingMultiplier: override.trailingMultiplier ?? base.trailingMultiplier,
    positionSize: override.positionSize ?? base.positionSize,
  };
}

/**
 * 去掉值为 undefined 的风控字段，便于比较与序列化。
 */
export function compactRisk(risk: RiskSettings): RiskSettings {
  const result: {
    -readonly [K in keyof RiskSettings]: RiskSettings[K];
  } = {};
  if (risk.stopLossPct !== undefined) {
    result.stopLossPct = risk.stopLossPct;
  }
  if (risk.takeProfitPct !== undefined) {
    result.takeProfitPct = risk.takeProfitPct;
  }
  if (risk.trailingMode !== undefined) {
    result.trailingMode = risk.trailingMode;
  }
  if (risk.trailingMultiplier !== undefined) {
    result.trailingMultiplier = risk.trailingMultiplier;
  }
  if (risk.positionSize !== undefined) {
    result.positionSize = risk.positionSize;
  }
  return result;
}

/**
 * 深拷贝参数表为只读快照。
 */
export function snapshotRegistry(
  registry: MutableIndicatorRegistry,
): Readonly<Record<string, IndicatorParams>> {
  const snapshot: Record<string, IndicatorParams> = {};
  for (const [indicatorId, params] of registry) {
    snapshot[indicatorId] = Object.freeze({ ...params });
  }
  return Object.freeze(snapshot);
}
