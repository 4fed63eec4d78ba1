import type { Logger } from '../../utils/logger/types.js';
import type {
  ConditionGroup,
  IndicatorDefinition,
  IndicatorParams,
  IndicatorParamValue,
  RiskSettings,
  StrategyDefinition,
  StrategySet,
} from '../../types/strategyConfig.js';

/**
 * 可变指标参数表（indicatorId → params）。
 * 类型用途：执行器持有的指标参数副本，只在覆盖窗口内被临时修改。
 * 使用范围：仅 strategySetExecutor 模块内部使用。
 */
export type MutableIndicatorRegistry = Map<string, Record<string, IndicatorParamValue>>;

/**
 * 覆盖签出凭证。
 * 类型用途：checkoutIndicatorOverrides 返回值，持有被覆盖指标的原始参数快照；checkin() 恢复原值。
 * 使用范围：strategySetExecutor 内部，调用方须在 finally 中 checkin。
 */
export interface OverrideCheckout {
  readonly strategySetId: string;
  /** 实际被覆盖的指标 id（未知 id 已跳过） */
  readonly indicatorIds: ReadonlyArray<string>;
  /** 恢复原始参数；重复调用无副作用 */
  readonly checkin: () => void;
  readonly isCheckedIn: () => boolean;
}

/**
 * 覆盖窗口上下文。
 * 类型用途：onOverrideWindow 钩子入参，可读取覆盖后的指标参数（如触发上游指标重算）。
 */
export type OverrideWindowContext = {
  readonly strategySet: StrategySet;
  readonly getIndicatorParams: (indicatorId: string) => IndicatorParams | null;
};

/**
 * 解析后的策略。
 * 类型用途：resolve 返回元素；entry/exit 已应用整体替换，risk 已按字段合并。
 * indicatorParams 为覆盖生效时全部指标参数的深拷贝，窗口关闭后不受影响。
 */
export type ResolvedStrategy = {
  readonly strategySetId: string;
  readonly strategyId: string;
  readonly name: string;
  readonly entry: ConditionGroup | null;
  readonly exit: ConditionGroup | null;
  readonly risk: RiskSettings;
  readonly indicatorParams: Readonly<Record<string, IndicatorParams>>;
};

export type StrategySetExecutorDeps = {
  readonly indicators: ReadonlyArray<IndicatorDefinition>;
  readonly strategies: ReadonlyArray<StrategyDefinition>;
  readonly logger?: Logger | undefined;
  /** 覆盖窗口内调用（参数已覆盖、尚未恢复） */
  readonly onOverrideWindow?: ((context: OverrideWindowContext) => void | Promise<void>) | undefined;
};

/**
 * 策略集执行器接口。
 * resolve 在互斥锁内完成「签出 → 应用覆盖 → 构建 → 恢复」，并发调用串行执行。
 */
export interface StrategySetExecutor {
  readonly resolve: (strategySet: StrategySet) => Promise<ReadonlyArray<ResolvedStrategy>>;
  /** 在互斥锁内恢复所有未签入的覆盖（幂等），等待进行中的 resolve 结束 */
  readonly restore: () => Promise<void>;
  /** 原始参数副本，不受进行中的覆盖窗口影响 */
  readonly getIndicatorParams: (indicatorId: string) => IndicatorParams | null;
  readonly isOverrideActive: () => boolean;
}
