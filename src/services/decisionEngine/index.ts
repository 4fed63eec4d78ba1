/**
 * 决策引擎
 *
 * 每根 K 线的评估周期：
 * 1. 读锁内取得当前配置与版本（整个周期只用这一份）
 * 2. regime 检测（全部评估，按优先级排序）
 * 3. 激活 id 集合 → 路由到策略集（首条命中）
 * 4. 策略集执行器解析策略（覆盖窗口，互斥）
 * 5. 评估每个策略的入场/出场条件树
 *
 * 说明：
 * - regime 检测器、路由器、执行器按配置对象缓存，配置替换后自动重建
 * - 同一周期内缺失指标只记录一次
 * - 表达式上下文附带 active_regimes（激活 regime id 列表），调用方提供的同名字段优先
 */
import { createConditionEvaluator, createEvaluationCycle } from '../../core/conditionEvaluator/index.js';
import type { ConditionEvaluator } from '../../core/conditionEvaluator/types.js';
import { createRegimeDetector } from '../../core/regimeDetector/index.js';
import type { RegimeDetector } from '../../core/regimeDetector/types.js';
import { createStrategyRouter } from '../../core/strategyRouter/index.js';
import type { StrategyRouter } from '../../core/strategyRouter/types.js';
import { createStrategySetExecutor } from '../../core/strategySetExecutor/index.js';
import type { StrategySetExecutor } from '../../core/strategySetExecutor/types.js';
import type { ExpressionContext } from '../../types/expression.js';
import type { IndicatorSnapshot } from '../../types/indicator.js';
import type { StrategyConfiguration } from '../../types/strategyConfig.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import type {
  BarDecision,
  DecisionEngine,
  DecisionEngineDeps,
  EvaluateBarOptions,
  StrategySignal,
} from './types.js';

type ConfigComponents = {
  readonly regimeDetector: RegimeDetector;
  readonly router: StrategyRouter;
  readonly executor: StrategySetExecutor;
};

export function createDecisionEngine(deps: DecisionEngineDeps): DecisionEngine {
  const { reloader, expressionEngine, logger = defaultLogger, onOverrideWindow } = deps;

  const conditionEvaluator: ConditionEvaluator = createConditionEvaluator({ expressionEngine, logger });
  const componentsByConfig = new WeakMap<StrategyConfiguration, ConfigComponents>();

  function getComponents(config: StrategyConfiguration): ConfigComponents {
    const cached = componentsByConfig.get(config);
    if (cached) {
      return cached;
    }
    const components: ConfigComponents = {
      regimeDetector: createRegimeDetector({ regimes: config.regimes, conditionEvaluator, logger }),
      router: createStrategyRouter({ routing: config.routing, strategySets: config.strategySets }),
      executor: createStrategySetExecutor({
        indicators: config.indicators,
        strategies: config.strategies,
        logger,
        onOverrideWindow,
      }),
    };
    componentsByConfig.set(config, components);
    return components;
  }

  async function evaluateBar(
    snapshot: IndicatorSnapshot,
    options: EvaluateBarOptions = {},
  ): Promise<BarDecision> {
    return reloader.withCurrent(async (config) => {
      const configVersion = reloader.getVersion();
      const { regimeDetector, router, executor } = getComponents(config);
      const cycle = createEvaluationCycle();

      const activeRegimes = regimeDetector.detectActive(snapshot, {
        cycle,
        extraContext: options.extraContext,
      });
      const activeIds = activeRegimes.map((regime) => regime.regimeId);
      const routed = router.route(new Set(activeIds));

      if (!routed) {
        logger.debug(`[决策引擎] 无路由命中，激活 regime=[${activeIds.join(', ')}]`);
        return {
          configVersion,
          activeRegimes,
          strategySetId: null,
          matchedRuleIndex: null,
          strategies: [],
          missingIndicators: cycle.getMissingKeys(),
        };
      }

      const extraContext: ExpressionContext = { active_regimes: activeIds, ...options.extraContext };
      const resolved = await executor.resolve(routed.strategySet);
      const strategies: StrategySignal[] = resolved.map((strategy) => ({
        strategyId: strategy.strategyId,
        name: strategy.name,
        entry: strategy.entry
          ? conditionEvaluator.evaluateGroup(strategy.entry, snapshot, { cycle, extraContext })
          : false,
        exit: strategy.exit
          ? conditionEvaluator.evaluateGroup(strategy.exit, snapshot, { cycle, extraContext })
          : false,
        risk: strategy.risk,
      }));

      logger.debug(
        `[决策引擎] version=${configVersion} 策略集=${routed.strategySet.id} 规则#${routed.ruleIndex} ` +
          `激活 regime=[${activeIds.join(', ')}]`,
      );
      return {
        configVersion,
        activeRegimes,
        strategySetId: routed.strategySet.id,
        matchedRuleIndex: routed.ruleIndex,
        strategies,
        missingIndicators: cycle.getMissingKeys(),
      };
    });
  }

  return { evaluateBar };
}
