import type { ConfigReloader } from '../../core/configReloader/types.js';
import type { ExpressionEngine } from '../../core/expressionEngine/types.js';
import type { OverrideWindowContext } from '../../core/strategySetExecutor/types.js';
import type { ExpressionContext } from '../../types/expression.js';
import type { IndicatorSnapshot } from '../../types/indicator.js';
import type { ActiveRegime, RiskSettings } from '../../types/strategyConfig.js';
import type { Logger } from '../../utils/logger/types.js';

/**
 * 单个策略的信号结果。
 * 类型用途：交给下单/执行层的入场、出场判断与生效风控设置；核心不直接下单。
 */
export type StrategySignal = {
  readonly strategyId: string;
  readonly name: string;
  readonly entry: boolean;
  readonly exit: boolean;
  readonly risk: RiskSettings;
};

/**
 * 单根 K 线的决策结果。
 * 类型用途：一次评估周期的完整输出；整个周期使用同一个配置版本。
 * 使用范围：执行层、展示层（激活 regime 列表与命中策略集）。
 */
export type BarDecision = {
  readonly configVersion: number;
  readonly activeRegimes: ReadonlyArray<ActiveRegime>;
  /** 未命中任何路由规则时为 null */
  readonly strategySetId: string | null;
  readonly matchedRuleIndex: number | null;
  readonly strategies: ReadonlyArray<StrategySignal>;
  /** 本周期内缺失的指标键（indicatorId.field），每个只出现一次 */
  readonly missingIndicators: ReadonlyArray<string>;
};

export type EvaluateBarOptions = {
  /** 表达式条件的附加上下文（trade、chart_window 等） */
  readonly extraContext?: ExpressionContext | undefined;
};

export type DecisionEngineDeps = {
  readonly reloader: Pick<ConfigReloader, 'withCurrent' | 'getVersion'>;
  readonly expressionEngine: ExpressionEngine;
  readonly logger?: Logger | undefined;
  /** 透传给策略集执行器的覆盖窗口钩子 */
  readonly onOverrideWindow?: ((context: OverrideWindowContext) => void | Promise<void>) | undefined;
};

/**
 * 决策引擎接口。
 */
export interface DecisionEngine {
  /**
   * 评估一根 K 线：检测 regime → 路由策略集 → 解析策略 → 评估入场/出场。
   * 评估期间持有配置读锁，配置替换会等待本次评估结束。
   */
  readonly evaluateBar: (
    snapshot: IndicatorSnapshot,
    options?: EvaluateBarOptions,
  ) => Promise<BarDecision>;
}
