/**
 * 配置语义校验（第二阶段）
 *
 * 检查项：
 * - 各类 id 唯一
 * - 策略、策略集、指标、regime 引用均可解析
 * - regime priority ∈ [0, 100]，指标权重 ∈ [0, 1]
 * - param_ranges：step > 0，min ≤ max，参数名存在于 params
 * - 风控数值在合法区间内
 * - 策略集至少包含一个策略
 */
import { CONFIG_LIMITS } from '../../constants/index.js';
import type { RiskSettings, StrategyConfiguration } from '../../types/strategyConfig.js';
import type { ConfigIssue } from '../../utils/error/types.js';

type IdEntity = { readonly id: string };

/** 风控字段的取值区间（左开右闭，max 为 null 表示无上限） */
const RISK_BOUNDS: ReadonlyArray<{
  readonly key: keyof RiskSettings;
  readonly jsonKey: string;
  readonly max: number | null;
}> = [
  { key: 'positionSize', jsonKey: 'position_size', max: 1 },
  { key: 'stopLossPct', jsonKey: 'stop_loss_pct', max: 100 },
  { key: 'takeProfitPct', jsonKey: 'take_profit_pct', max: 1000 },
  { key: 'trailingMultiplier', jsonKey: 'trailing_multiplier', max: null },
];

function collectIds(
  entities: ReadonlyArray<IdEntity>,
  section: string,
  issues: ConfigIssue[],
): ReadonlySet<string> {
  const seen = new Set<string>();
  entities.forEach((entity, index) => {
    if (seen.has(entity.id)) {
      issues.push({ path: `${section}[${index}].id`, message: `重复的 id '${entity.id}'` });
    }
    seen.add(entity.id);
  });
  return seen;
}

function checkRisk(risk: RiskSettings, path: string, issues: ConfigIssue[]): void {
  for (const { key, jsonKey, max } of RISK_BOUNDS) {
    const value = risk[key];
    if (typeof value !== 'number') {
      continue;
    }
    const upperOk = max === null || value <= max;
    if (!(value > 0) || !upperOk) {
      const range = max === null ? '(0, +∞)' : `(0, ${max}]`;
      issues.push({ path: `${path}.${jsonKey}`, message: `取值 ${value} 超出范围 ${range}` });
    }
  }
}

/**
 * 语义校验，问题追加写入 issues。
 */
export function validateConfiguration(config: StrategyConfiguration, issues: ConfigIssue[]): void {
  const indicatorIds = collectIds(config.indicators, 'indicators', issues);
  const regimeIds = collectIds(config.regimes, 'regimes', issues);
  const strategyIds = collectIds(config.strategies, 'strategies', issues);
  const strategySetIds = collectIds(config.strategySets, 'strategy_sets', issues);

  config.indicators.forEach((indicator, index) => {
    for (const [name, range] of Object.entries(indicator.paramRanges)) {
      const path = `indicators[${index}].param_ranges.${name}`;
      if (!Object.hasOwn(indicator.params, name)) {
        issues.push({ path, message: `参数 '${name}' 不在 params 中` });
      }
      if (!(range.step > 0)) {
        issues.push({ path: `${path}.step`, message: `step 必须大于 0，实际为 ${range.step}` });
      }
      if (range.min > range.max) {
        issues.push({ path, message: `min (${range.min}) 不能大于 max (${range.max})` });
      }
    }
  });

  config.regimes.forEach((regime, index) => {
    const path = `regimes[${index}]`;
    if (regime.priority < CONFIG_LIMITS.PRIORITY_MIN || regime.priority > CONFIG_LIMITS.PRIORITY_MAX) {
      issues.push({
        path: `${path}.priority`,
        message: `priority ${regime.priority} 超出范围 [${CONFIG_LIMITS.PRIORITY_MIN}, ${CONFIG_LIMITS.PRIORITY_MAX}]`,
      });
    }
    for (const [indicatorId, weight] of Object.entries(regime.indicatorWeights)) {
      const weightPath = `${path}.indicator_weights.${indicatorId}`;
      if (!indicatorIds.has(indicatorId)) {
        issues.push({ path: weightPath, message: `引用了未定义的指标 '${indicatorId}'` });
      }
      if (!(weight >= CONFIG_LIMITS.WEIGHT_MIN && weight <= CONFIG_LIMITS.WEIGHT_MAX)) {
        issues.push({
          path: weightPath,
          message: `权重 ${weight} 超出范围 [${CONFIG_LIMITS.WEIGHT_MIN}, ${CONFIG_LIMITS.WEIGHT_MAX}]`,
        });
      }
    }
  });

  config.strategies.forEach((strategy, index) => {
    checkRisk(strategy.risk, `strategies[${index}].risk`, issues);
  });

  config.strategySets.forEach((set, setIndex) => {
    const path = `strategy_sets[${setIndex}]`;
    if (set.strategies.length === 0) {
      issues.push({ path: `${path}.strategies`, message: '策略集至少需要一个策略' });
    }
    set.strategies.forEach((reference, index) => {
      const referencePath = `${path}.strategies[${index}]`;
      if (!strategyIds.has(reference.strategyId)) {
        issues.push({
          path: `${referencePath}.strategy_id`,
          message: `引用了未定义的策略 '${reference.strategyId}'`,
        });
      }
      if (reference.overrides?.risk) {
        checkRisk(reference.overrides.risk, `${referencePath}.strategy_overrides.risk`, issues);
      }
    });
    set.indicatorOverrides.forEach((override, index) => {
      if (!indicatorIds.has(override.indicatorId)) {
        issues.push({
          path: `${path}.indicator_overrides[${index}].indicator_id`,
          message: `引用了未定义的指标 '${override.indicatorId}'`,
        });
      }
    });
  });

  config.routing.forEach((rule, index) => {
    const path = `routing[${index}]`;
    if (!strategySetIds.has(rule.strategySetId)) {
      issues.push({
        path: `${path}.strategy_set_id`,
        message: `引用了未定义的策略集 '${rule.strategySetId}'`,
      });
    }
    const lists: ReadonlyArray<[string, ReadonlyArray<string> | null]> = [
      ['all_of', rule.match.allOf],
      ['any_of', rule.match.anyOf],
      ['none_of', rule.match.noneOf],
    ];
    for (const [name, ids] of lists) {
      for (const regimeId of ids ?? []) {
        if (!regimeIds.has(regimeId)) {
          issues.push({ path: `${path}.match.${name}`, message: `引用了未定义的 regime '${regimeId}'` });
        }
      }
    }
  });
}
