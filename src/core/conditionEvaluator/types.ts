import type { Logger } from '../../utils/logger/types.js';
import type { ExpressionContext } from '../../types/expression.js';
import type { IndicatorSnapshot } from '../../types/indicator.js';
import type { Condition, ConditionGroup } from '../../types/strategyConfig.js';
import type { ExpressionEngine } from '../expressionEngine/types.js';

/**
 * 评估周期追踪器。
 * 类型用途：一次评估周期（一根 K 线）内对缺失指标键去重，避免日志风暴。
 * 数据来源：createEvaluationCycle 创建；决策引擎每根 K 线一个。
 * 使用范围：conditionEvaluator、regimeDetector、decisionEngine。
 */
export interface EvaluationCycle {
  /** 首次上报该键返回 true，之后返回 false */
  readonly markMissing: (key: string) => boolean;
  readonly getMissingKeys: () => ReadonlyArray<string>;
}

/**
 * 条件评估选项。
 * - cycle：缺失指标日志去重的周期；未传时每次 evaluateGroup 调用自成一个周期
 * - extraContext：表达式叶子求值时附加的上下文（如 trade、prev_regime）
 */
export type ConditionEvaluationOptions = {
  readonly cycle?: EvaluationCycle | undefined;
  readonly extraContext?: ExpressionContext | undefined;
};

export type ConditionEvaluatorDeps = {
  readonly expressionEngine: ExpressionEngine;
  readonly logger?: Logger | undefined;
};

/**
 * 条件评估器接口。
 * 无状态：不同快照可并发评估。
 */
export interface ConditionEvaluator {
  /** 单条件评估；引用的指标缺失时抛出 MissingIndicatorError */
  readonly evaluateCondition: (
    condition: Condition,
    snapshot: IndicatorSnapshot,
    options?: ConditionEvaluationOptions,
  ) => boolean;
  /** 条件组评估；叶子缺失指标按不满足处理（fail-closed） */
  readonly evaluateGroup: (
    group: ConditionGroup,
    snapshot: IndicatorSnapshot,
    options?: ConditionEvaluationOptions,
  ) => boolean;
}
