/**
 * regime 检测模块
 *
 * 功能：
 * - 评估每个 regime 的条件树，返回全部激活项（regime 之间不互斥，不提前退出）
 * - 激活项按优先级降序，同优先级保持声明顺序
 * - 单个 regime 评估出错时记录日志并视为未激活，不影响其他 regime
 * - 激活项附带归一化后的指标权重
 */
import { formatError } from '../../utils/error/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import type { IndicatorSnapshot } from '../../types/indicator.js';
import type { ActiveRegime, RegimeScope } from '../../types/strategyConfig.js';
import { createEvaluationCycle } from '../conditionEvaluator/index.js';
import type { DetectOptions, RegimeDetector, RegimeDetectorDeps } from './types.js';
import { normalizeWeights } from './weights.js';

export { normalizeWeights, isNormalized } from './weights.js';

export function createRegimeDetector(deps: RegimeDetectorDeps): RegimeDetector {
  const { regimes, conditionEvaluator, logger = defaultLogger } = deps;

  // 权重只与配置有关，构建时归一化一次
  const normalizedWeights = regimes.map((regime) => Object.freeze(normalizeWeights(regime.indicatorWeights)));

  function detectActive(
    snapshot: IndicatorSnapshot,
    options: DetectOptions = {},
  ): ReadonlyArray<ActiveRegime> {
    const cycle = options.cycle ?? createEvaluationCycle();
    const matched: Array<{ regime: ActiveRegime; order: number }> = [];

    regimes.forEach((regime, order) => {
      let isActive = false;
      try {
        isActive = conditionEvaluator.evaluateGroup(regime.conditions, snapshot, {
          cycle,
          extraContext: options.extraContext,
        });
      } catch (err) {
        logger.warn(`[Regime检测] ${regime.id} 评估失败，按未激活处理：${formatError(err)}`);
      }
      if (!isActive) {
        return;
      }
      matched.push({
        order,
        regime: {
          regimeId: regime.id,
          name: regime.name,
          priority: regime.priority,
          scope: regime.scope,
          weights: normalizedWeights[order] ?? {},
        },
      });
    });

    matched.sort((a, b) => b.regime.priority - a.regime.priority || a.order - b.order);
    return matched.map((entry) => entry.regime);
  }

  function getByScope(
    active: ReadonlyArray<ActiveRegime>,
    scope: RegimeScope,
  ): ReadonlyArray<ActiveRegime> {
    return active.filter((regime) => regime.scope === null || regime.scope === scope);
  }

  return {
    detectActive,
    getByScope,
  };
}
