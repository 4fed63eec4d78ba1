/**
 * 配置文档 → 领域对象映射
 *
 * 职责：
 * - snake_case 文档映射为 camelCase 只读领域类型
 * - 条件树层面的语义检查：嵌套深度、between 区间、指标引用、表达式编译
 * - 路由规则至少声明一个匹配列表
 *
 * 所有问题写入 issues，不抛出；调用方在汇总后统一决定是否失败。
 */
import { CONDITION } from '../../constants/index.js';
import type { ExpressionEngine } from '../../core/expressionEngine/types.js';
import type {
  ConditionGroup,
  ConditionNode,
  ConfigMetadata,
  IndicatorDefinition,
  IndicatorParamValue,
  Operand,
  ParamRange,
  RegimeDefinition,
  RiskSettings,
  RoutingRule,
  StrategyConfiguration,
  StrategyDefinition,
  StrategySet,
} from '../../types/strategyConfig.js';
import type { ConfigIssue } from '../../utils/error/types.js';
import type {
  ConditionGroupDocument,
  ConditionNodeDocument,
  IndicatorDocument,
  OperandDocument,
  OperatorConditionDocument,
  RegimeDocument,
  RiskDocument,
  RoutingRuleDocument,
  StrategyConfigDocument,
  StrategyDocument,
  StrategySetDocument,
} from './types.js';

type BuildContext = {
  readonly issues: ConfigIssue[];
  readonly indicatorIds: ReadonlySet<string>;
  readonly expressionEngine: ExpressionEngine;
};

function report(context: BuildContext, path: string, message: string): void {
  context.issues.push({ path, message });
}

function buildOperand(operand: OperandDocument, path: string, context: BuildContext): Operand {
  if (typeof operand === 'number') {
    return { kind: 'constant', value: operand };
  }
  if ('indicator_id' in operand) {
    if (!context.indicatorIds.has(operand.indicator_id)) {
      report(context, `${path}.indicator_id`, `引用了未定义的指标 '${operand.indicator_id}'`);
    }
    return { kind: 'indicator', indicatorId: operand.indicator_id, field: operand.field };
  }
  return { kind: 'constant', value: operand.value };
}

function buildOperatorCondition(
  doc: OperatorConditionDocument,
  path: string,
  context: BuildContext,
): ConditionNode | null {
  const left = buildOperand(doc.left, `${path}.left`, context);
  const right = doc.right;

  if (doc.op === 'between') {
    if (typeof right === 'number' || !('min' in right)) {
      report(context, `${path}.right`, "'between' 需要 {min, max} 区间");
      return null;
    }
    // 两端闭区间，min == max 表示单点
    if (right.max < right.min) {
      report(context, `${path}.right`, `区间 max (${right.max}) 不能小于 min (${right.min})`);
      return null;
    }
    return { kind: 'between', left, range: { min: right.min, max: right.max } };
  }

  if (typeof right !== 'number' && 'min' in right) {
    report(context, `${path}.right`, `区间只能用于 'between'，当前为 '${doc.op}'`);
    return null;
  }
  return {
    kind: 'comparison',
    left,
    op: doc.op,
    right: buildOperand(right, `${path}.right`, context),
  };
}

function buildConditionNode(
  doc: ConditionNodeDocument,
  path: string,
  depth: number,
  context: BuildContext,
): ConditionNode | null {
  if ('cel_expression' in doc) {
    const result = context.expressionEngine.validate(doc.cel_expression);
    for (const error of result.errors) {
      report(context, `${path}.cel_expression`, `表达式编译失败：${error.message}`);
    }
    return { kind: 'expression', expression: doc.cel_expression };
  }
  if ('left' in doc) {
    return buildOperatorCondition(doc, path, context);
  }
  return buildConditionGroup(doc, path, depth + 1, context);
}

/**
 * 构建条件组。depth 从 1 开始计数，超过 CONDITION.MAX_DEPTH 时记录问题并截断。
 */
function buildConditionGroup(
  doc: ConditionGroupDocument,
  path: string,
  depth: number,
  context: BuildContext,
): ConditionGroup {
  const mode = doc.all === undefined ? 'any' : 'all';
  if (depth > CONDITION.MAX_DEPTH) {
    report(context, path, `条件嵌套层级超过上限 ${CONDITION.MAX_DEPTH}`);
    return { mode, items: [] };
  }
  const docs = doc.all ?? doc.any ?? [];
  const items: ConditionNode[] = [];
  docs.forEach((item, index) => {
    const node = buildConditionNode(item, `${path}.${mode}[${index}]`, depth, context);
    if (node) {
      items.push(node);
    }
  });
  return { mode, items };
}

function buildParams(
  params: Readonly<Record<string, IndicatorParamValue>>,
): Readonly<Record<string, IndicatorParamValue>> {
  return { ...params };
}

function buildIndicator(doc: IndicatorDocument): IndicatorDefinition {
  const paramRanges: Record<string, ParamRange> = {};
  for (const [name, range] of Object.entries(doc.param_ranges ?? {})) {
    paramRanges[name] = { min: range.min, max: range.max, step: range.step };
  }
  return {
    id: doc.id,
    type: doc.type,
    params: buildParams(doc.params),
    timeframe: doc.timeframe ?? null,
    paramRanges,
  };
}

function buildRegime(doc: RegimeDocument, path: string, context: BuildContext): RegimeDefinition {
  return {
    id: doc.id,
    name: doc.name,
    conditions: buildConditionGroup(doc.conditions, `${path}.conditions`, 1, context),
    priority: doc.priority ?? 0,
    scope: doc.scope === undefined || doc.scope === null || doc.scope === 'global' ? null : doc.scope,
    indicatorWeights: { ...(doc.indicator_weights ?? {}) },
  };
}

/**
 * 风控设置：null 与缺省一律视为未设置，不写入结果对象。
 */
export function buildRisk(doc: RiskDocument | null | undefined): RiskSettings {
  if (!doc) {
    return {};
  }
  const risk: {
    stopLossPct?: number;
    takeProfitPct?: number;
    trailingMode?: 'percent' | 'atr';
    trailingMultiplier?: number;
    positionSize?: number;
  } = {};
  if (doc.stop_loss_pct !== undefined && doc.stop_loss_pct !== null) {
    risk.stopLossPct = doc.stop_loss_pct;
  }
  if (doc.take_profit_pct !== undefined && doc.take_profit_pct !== null) {
    risk.takeProfitPct = doc.take_profit_pct;
  }
  if (doc.trailing_mode !== undefined && doc.trailing_mode !== null) {
    risk.trailingMode = doc.trailing_mode;
  }
  if (doc.trailing_multiplier !== undefined && doc.trailing_multiplier !== null) {
    risk.trailingMultiplier = doc.trailing_multiplier;
  }
  if (doc.position_size !== undefined && doc.position_size !== null) {
    risk.positionSize = doc.position_size;
  }
  return risk;
}

function buildOptionalGroup(
  doc: ConditionGroupDocument | null | undefined,
  path: string,
  context: BuildContext,
): ConditionGroup | null {
  return doc ? buildConditionGroup(doc, path, 1, context) : null;
}

function buildStrategy(doc: StrategyDocument, path: string, context: BuildContext): StrategyDefinition {
  return {
    id: doc.id,
    name: doc.name,
    entry: buildOptionalGroup(doc.entry, `${path}.entry`, context),
    exit: buildOptionalGroup(doc.exit, `${path}.exit`, context),
    risk: buildRisk(doc.risk),
  };
}

function buildStrategySet(doc: StrategySetDocument, path: string, context: BuildContext): StrategySet {
  return {
    id: doc.id,
    name: doc.name ?? doc.id,
    strategies: doc.strategies.map((reference, index) => {
      const overridesDoc = reference.strategy_overrides;
      if (!overridesDoc) {
        return { strategyId: reference.strategy_id, overrides: null };
      }
      const overridesPath = `${path}.strategies[${index}].strategy_overrides`;
      const overrides: {
        entry?: ConditionGroup;
        exit?: ConditionGroup;
        risk?: RiskSettings;
      } = {};
      if (overridesDoc.entry) {
        overrides.entry = buildConditionGroup(overridesDoc.entry, `${overridesPath}.entry`, 1, context);
      }
      if (overridesDoc.exit) {
        overrides.exit = buildConditionGroup(overridesDoc.exit, `${overridesPath}.exit`, 1, context);
      }
      if (overridesDoc.risk) {
        overrides.risk = buildRisk(overridesDoc.risk);
      }
      return { strategyId: reference.strategy_id, overrides };
    }),
    indicatorOverrides: (doc.indicator_overrides ?? []).map((override) => ({
      indicatorId: override.indicator_id,
      params: buildParams(override.params),
    })),
  };
}

function buildRoutingRule(doc: RoutingRuleDocument, path: string, context: BuildContext): RoutingRule {
  const { all_of: allOf, any_of: anyOf, none_of: noneOf } = doc.match;
  const hasList = [allOf, anyOf, noneOf].some((list) => list !== undefined && list !== null);
  if (!hasList) {
    report(context, `${path}.match`, '至少需要 all_of / any_of / none_of 之一');
  }
  return {
    strategySetId: doc.strategy_set_id,
    match: {
      allOf: [...(allOf ?? [])],
      anyOf: anyOf ? [...anyOf] : null,
      noneOf: [...(noneOf ?? [])],
    },
  };
}

function buildMetadata(doc: StrategyConfigDocument['metadata']): ConfigMetadata | null {
  if (!doc) {
    return null;
  }
  return { ...doc };
}

/**
 * 文档 → 配置对象。问题写入 issues，返回值仅在 issues 为空时有效。
 *
 * @param doc 已通过 schema 校验的文档
 * @param expressionEngine 用于编译校验表达式条件
 * @param issues 问题收集数组（追加写入）
 */
export function buildConfiguration(
  doc: StrategyConfigDocument,
  expressionEngine: ExpressionEngine,
  issues: ConfigIssue[],
): StrategyConfiguration {
  const context: BuildContext = {
    issues,
    indicatorIds: new Set(doc.indicators.map((indicator) => indicator.id)),
    expressionEngine,
  };
  return {
    schemaVersion: doc.schema_version,
    metadata: buildMetadata(doc.metadata),
    indicators: doc.indicators.map(buildIndicator),
    regimes: doc.regimes.map((regime, index) => buildRegime(regime, `regimes[${index}]`, context)),
    strategies: doc.strategies.map((strategy, index) =>
      buildStrategy(strategy, `strategies[${index}]`, context),
    ),
    strategySets: doc.strategy_sets.map((set, index) =>
      buildStrategySet(set, `strategy_sets[${index}]`, context),
    ),
    routing: doc.routing.map((rule, index) => buildRoutingRule(rule, `routing[${index}]`, context)),
  };
}
