/**
 * 策略路由模块
 *
 * 功能：
 * - 将激活 regime id 集合按路由规则映射到唯一策略集
 *
 * 匹配规则（同时满足）：
 * - allOf 中的 id 全部激活
 * - anyOf 为 null 或至少一个激活
 * - noneOf 中的 id 全部未激活
 *
 * 规则顺序即用户定义的优先级，线性扫描，首条命中即返回。
 */
import type { RoutingMatch, StrategySet } from '../../types/strategyConfig.js';
import type { RoutedStrategySet, StrategyRouter, StrategyRouterDeps } from './types.js';

/**
 * 判断单条匹配条件是否命中。
 */
export function matchesRule(match: RoutingMatch, active: ReadonlySet<string>): boolean {
  if (!match.allOf.every((id) => active.has(id))) {
    return false;
  }
  if (match.anyOf !== null && !match.anyOf.some((id) => active.has(id))) {
    return false;
  }
  return !match.noneOf.some((id) => active.has(id));
}

export function createStrategyRouter(deps: StrategyRouterDeps): StrategyRouter {
  const { routing, strategySets } = deps;
  const setsById = new Map<string, StrategySet>(strategySets.map((set) => [set.id, set]));

  function route(activeRegimeIds: ReadonlySet<string>): RoutedStrategySet | null {
    for (const [ruleIndex, rule] of routing.entries()) {
      if (!matchesRule(rule.match, activeRegimeIds)) {
        continue;
      }
      const strategySet = setsById.get(rule.strategySetId);
      // 语义校验保证引用可解析；仍缺失时视为配置错误，不再继续匹配后续规则
      return strategySet ? { strategySet, ruleIndex } : null;
    }
    return null;
  }

  return { route };
}
