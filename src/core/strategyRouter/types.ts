import type { RoutingRule, StrategySet } from '../../types/strategyConfig.js';

/**
 * 路由结果。
 * 类型用途：route 命中时返回的策略集及命中规则下标（声明顺序，0 起）。
 * 使用范围：decisionEngine 与展示层。
 */
export type RoutedStrategySet = {
  readonly strategySet: StrategySet;
  readonly ruleIndex: number;
};

export type StrategyRouterDeps = {
  readonly routing: ReadonlyArray<RoutingRule>;
  readonly strategySets: ReadonlyArray<StrategySet>;
};

export interface StrategyRouter {
  /** 按声明顺序匹配，首条命中即返回；无命中返回 null，由调用方决定兜底策略 */
  readonly route: (activeRegimeIds: ReadonlySet<string>) => RoutedStrategySet | null;
}
