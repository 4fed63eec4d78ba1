/**
 * 策略集执行模块
 *
 * 功能：
 * - 将策略集解析为具体策略：entry/exit 整体替换，risk 按字段合并
 * - 在覆盖窗口内临时修改指标参数，构建完成后立即恢复
 *
 * 覆盖窗口（互斥锁内）：
 * 1. 签出：保存被覆盖指标的原始参数
 * 2. 应用覆盖（仅列出的键）
 * 3. 调用 onOverrideWindow 钩子（可选）
 * 4. 构建解析结果，每个策略附带当前生效参数的深拷贝
 * 5. 签入：finally 中恢复原始参数
 *
 * 说明：
 * - 配置对象深度冻结，执行器持有指标参数的可变副本
 * - 任意一次 resolve 之后，参数与 resolve 之前深度相等
 * - 窗口外的读取方只看到原始参数；覆盖后的参数仅通过钩子上下文可见
 * - restore 同样经过互斥锁，不会打断进行中的 resolve
 */
import { createMutex } from '../../utils/asyncLock/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import type {
  IndicatorParams,
  IndicatorParamValue,
  StrategyDefinition,
  StrategySet,
} from '../../types/strategyConfig.js';
import type {
  MutableIndicatorRegistry,
  OverrideCheckout,
  ResolvedStrategy,
  StrategySetExecutor,
  StrategySetExecutorDeps,
} from './types.js';
import { checkoutIndicatorOverrides, compactRisk, mergeRisk, snapshotRegistry } from './utils.js';

export { checkoutIndicatorOverrides, mergeRisk } from './utils.js';

export function createStrategySetExecutor(deps: StrategySetExecutorDeps): StrategySetExecutor {
  const { indicators, strategies, logger = defaultLogger, onOverrideWindow } = deps;

  const registry: MutableIndicatorRegistry = new Map<string, Record<string, IndicatorParamValue>>(
    indicators.map((indicator) => [indicator.id, { ...indicator.params }]),
  );
  const strategiesById = new Map<string, StrategyDefinition>(
    strategies.map((strategy) => [strategy.id, strategy]),
  );
  const originals: ReadonlyMap<string, IndicatorParams> = new Map<string, IndicatorParams>(
    indicators.map((indicator) => [indicator.id, Object.freeze({ ...indicator.params })]),
  );
  const mutex = createMutex();
  const outstanding = new Set<OverrideCheckout>();

  function getIndicatorParams(indicatorId: string): IndicatorParams | null {
    const params = originals.get(indicatorId);
    return params ? { ...params } : null;
  }

  function getLiveIndicatorParams(indicatorId: string): IndicatorParams | null {
    const params = registry.get(indicatorId);
    return params ? { ...params } : null;
  }

  function buildResolved(strategySet: StrategySet): ResolvedStrategy[] {
    const indicatorParams = snapshotRegistry(registry);
    const resolved: ResolvedStrategy[] = [];

    for (const reference of strategySet.strategies) {
      const base = strategiesById.get(reference.strategyId);
      if (!base) {
        logger.warn(`[策略集执行] ${strategySet.id} 引用了未知策略 ${reference.strategyId}，已跳过`);
        continue;
      }
      const overrides = reference.overrides;
      resolved.push({
        strategySetId: strategySet.id,
        strategyId: base.id,
        name: base.name,
        entry: overrides?.entry !== undefined ? overrides.entry : base.entry,
        exit: overrides?.exit !== undefined ? overrides.exit : base.exit,
        risk: compactRisk(mergeRisk(base.risk, overrides?.risk)),
        indicatorParams,
      });
    }
    return resolved;
  }

  async function resolve(strategySet: StrategySet): Promise<ReadonlyArray<ResolvedStrategy>> {
    return mutex.runExclusive(async () => {
      const checkout = checkoutIndicatorOverrides(registry, strategySet, logger);
      outstanding.add(checkout);
      try {
        if (onOverrideWindow) {
          await onOverrideWindow({ strategySet, getIndicatorParams: getLiveIndicatorParams });
        }
        return buildResolved(strategySet);
      } finally {
        checkout.checkin();
        outstanding.delete(checkout);
      }
    });
  }

  async function restore(): Promise<void> {
    await mutex.runExclusive(() => {
      // 后签出的先恢复，保证嵌套签出回到最初状态
      for (const checkout of [...outstanding].reverse()) {
        checkout.checkin();
        outstanding.delete(checkout);
      }
    });
  }

  return {
    resolve,
    restore,
    getIndicatorParams,
    isOverrideActive: () => outstanding.size > 0,
  };
}
