import type { ExpressionEngine } from '../../core/expressionEngine/types.js';
import type { StrategyConfiguration } from '../../types/strategyConfig.js';
import type { Logger } from '../../utils/logger/types.js';

/**
 * 以下 *Document 类型描述 JSON 文档原始结构（snake_case）。
 * 仅在 schema 校验通过之后使用，由 buildConfiguration 映射为领域类型。
 */

export type IndicatorRefDocument = {
  readonly indicator_id: string;
  readonly field: string;
};

export type ConstantValueDocument = {
  readonly value: number;
};

export type OperandDocument = number | IndicatorRefDocument | ConstantValueDocument;

export type BetweenRangeDocument = {
  readonly min: number;
  readonly max: number;
};

export type OperatorConditionDocument = {
  readonly left: OperandDocument;
  readonly op: 'gt' | 'lt' | 'eq' | 'between';
  readonly right: OperandDocument | BetweenRangeDocument;
};

export type ExpressionConditionDocument = {
  readonly cel_expression: string;
};

export type ConditionGroupDocument = {
  readonly all?: ReadonlyArray<ConditionNodeDocument> | undefined;
  readonly any?: ReadonlyArray<ConditionNodeDocument> | undefined;
};

export type ConditionNodeDocument =
  | OperatorConditionDocument
  | ExpressionConditionDocument
  | ConditionGroupDocument;

export type ParamRangeDocument = {
  readonly min: number;
  readonly max: number;
  readonly step: number;
};

export type IndicatorDocument = {
  readonly id: string;
  readonly type: string;
  readonly params: Readonly<Record<string, number | string | boolean>>;
  readonly timeframe?: string | null | undefined;
  readonly param_ranges?: Readonly<Record<string, ParamRangeDocument>> | null | undefined;
};

export type RegimeDocument = {
  readonly id: string;
  readonly name: string;
  readonly conditions: ConditionGroupDocument;
  readonly priority?: number | undefined;
  readonly scope?: 'entry' | 'exit' | 'in_trade' | 'global' | null | undefined;
  readonly indicator_weights?: Readonly<Record<string, number>> | null | undefined;
};

export type RiskDocument = {
  readonly stop_loss_pct?: number | null | undefined;
  readonly take_profit_pct?: number | null | undefined;
  readonly trailing_mode?: 'percent' | 'atr' | null | undefined;
  readonly trailing_multiplier?: number | null | undefined;
  readonly position_size?: number | null | undefined;
};

export type StrategyDocument = {
  readonly id: string;
  readonly name: string;
  readonly entry?: ConditionGroupDocument | null | undefined;
  readonly exit?: ConditionGroupDocument | null | undefined;
  readonly risk?: RiskDocument | null | undefined;
};

export type StrategyOverridesDocument = {
  readonly entry?: ConditionGroupDocument | undefined;
  readonly exit?: ConditionGroupDocument | undefined;
  readonly risk?: RiskDocument | null | undefined;
};

export type StrategyReferenceDocument = {
  readonly strategy_id: string;
  readonly strategy_overrides?: StrategyOverridesDocument | null | undefined;
};

export type IndicatorOverrideDocument = {
  readonly indicator_id: string;
  readonly params: Readonly<Record<string, number | string | boolean>>;
};

export type StrategySetDocument = {
  readonly id: string;
  readonly name?: string | null | undefined;
  readonly strategies: ReadonlyArray<StrategyReferenceDocument>;
  readonly indicator_overrides?: ReadonlyArray<IndicatorOverrideDocument> | null | undefined;
};

export type RoutingRuleDocument = {
  readonly strategy_set_id: string;
  readonly match: {
    readonly all_of?: ReadonlyArray<string> | null | undefined;
    readonly any_of?: ReadonlyArray<string> | null | undefined;
    readonly none_of?: ReadonlyArray<string> | null | undefined;
  };
};

/**
 * 策略配置 JSON 文档（schema 校验通过后的形状）。
 */
export type StrategyConfigDocument = {
  readonly schema_version: string;
  readonly metadata?: Readonly<Record<string, unknown>> | null | undefined;
  readonly indicators: ReadonlyArray<IndicatorDocument>;
  readonly regimes: ReadonlyArray<RegimeDocument>;
  readonly strategies: ReadonlyArray<StrategyDocument>;
  readonly strategy_sets: ReadonlyArray<StrategySetDocument>;
  readonly routing: ReadonlyArray<RoutingRuleDocument>;
};

/**
 * 配置加载器依赖。
 * expressionEngine 用于在加载阶段编译校验表达式条件，编写错误在此暴露。
 */
export type ConfigLoaderDeps = {
  readonly expressionEngine: ExpressionEngine;
  readonly logger?: Logger | undefined;
  /** schema 文件路径，默认随包发布的 schemas/strategyConfig.schema.json */
  readonly schemaPath?: string | URL | undefined;
};

/**
 * 配置加载器接口
 *
 * 两阶段校验：
 * 1. 结构校验（JSON Schema）失败抛出 ConfigLoadError
 * 2. 语义校验（引用、取值范围、表达式编译）失败抛出 ConfigValidationError
 * 两阶段均通过后返回深度冻结的配置对象。
 */
export interface ConfigLoader {
  /** 读取并解析文件；读取或 JSON 解析失败抛出 ConfigLoadError */
  readonly loadFromFile: (filePath: string) => Promise<StrategyConfiguration>;
  /** 解析已反序列化的文档（编辑器、测试使用） */
  readonly parseDocument: (raw: unknown, source?: string | null) => StrategyConfiguration;
}
