import type { Logger } from '../../utils/logger/types.js';
import type { ExpressionContext } from '../../types/expression.js';
import type { IndicatorSnapshot } from '../../types/indicator.js';
import type { ActiveRegime, RegimeDefinition, RegimeScope } from '../../types/strategyConfig.js';
import type { ConditionEvaluator, EvaluationCycle } from '../conditionEvaluator/types.js';

export type RegimeDetectorDeps = {
  readonly regimes: ReadonlyArray<RegimeDefinition>;
  readonly conditionEvaluator: ConditionEvaluator;
  readonly logger?: Logger | undefined;
};

/**
 * regime 检测选项。
 * - cycle：缺失指标日志去重周期（决策引擎每根 K 线一个）
 * - extraContext：表达式叶子的附加上下文
 */
export type DetectOptions = {
  readonly cycle?: EvaluationCycle | undefined;
  readonly extraContext?: ExpressionContext | undefined;
};

/**
 * regime 检测器接口。
 */
export interface RegimeDetector {
  /** 评估全部 regime（不提前退出），按优先级降序返回激活项，同优先级保持声明顺序 */
  readonly detectActive: (snapshot: IndicatorSnapshot, options?: DetectOptions) => ReadonlyArray<ActiveRegime>;
  /** 过滤出 scope 等于给定值或未设置（全局）的激活项 */
  readonly getByScope: (
    active: ReadonlyArray<ActiveRegime>,
    scope: RegimeScope,
  ) => ReadonlyArray<ActiveRegime>;
}
