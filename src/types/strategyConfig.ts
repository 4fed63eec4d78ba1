/**
 * 策略配置数据模型
 *
 * 说明：
 * - 所有字段 camelCase；JSON 文档为 snake_case，由 configLoader 映射
 * - 配置对象构建完成后深度冻结，仅能被完整校验通过的新对象替换
 */

/**
 * 常量操作数。
 * 类型用途：条件中的字面数值。
 * 数据来源：配置解析。
 */
export type ConstantOperand = {
  readonly kind: 'constant';
  readonly value: number;
};

/**
 * 指标引用操作数。
 * 类型用途：按 indicatorId.field 从快照读取数值。
 * 数据来源：配置解析。
 */
export type IndicatorRef = {
  readonly kind: 'indicator';
  readonly indicatorId: string;
  readonly field: string;
};

export type Operand = ConstantOperand | IndicatorRef;

export type ComparisonOperator = 'gt' | 'lt' | 'eq';

/**
 * 比较条件（gt / lt / eq）。
 */
export type ComparisonCondition = {
  readonly kind: 'comparison';
  readonly left: Operand;
  readonly op: ComparisonOperator;
  readonly right: Operand;
};

/**
 * 区间条件（闭区间，含两端）。
 */
export type BetweenCondition = {
  readonly kind: 'between';
  readonly left: Operand;
  readonly range: Readonly<{ min: number; max: number }>;
};

/**
 * 表达式条件。
 * 类型用途：条件树中的自由文本表达式叶子，委托表达式引擎求值。
 */
export type ExpressionCondition = {
  readonly kind: 'expression';
  readonly expression: string;
};

export type Condition = ComparisonCondition | BetweenCondition | ExpressionCondition;

/**
 * 条件组。
 * 类型用途：all（AND）/ any（OR）嵌套条件树；空组视为满足。
 * 数据来源：配置解析，嵌套深度受 CONDITION.MAX_DEPTH 限制。
 * 使用范围：regime 条件、策略入场/出场条件；全项目可引用。
 */
export type ConditionGroup = {
  readonly mode: 'all' | 'any';
  readonly items: ReadonlyArray<ConditionNode>;
};

export type ConditionNode = Condition | ConditionGroup;

/**
 * regime 作用范围。null 表示全局（任意范围均生效）。
 */
export type RegimeScope = 'entry' | 'exit' | 'in_trade';

/**
 * regime 定义。
 * 类型用途：命名的市场状态描述，条件满足即激活；多个 regime 可同时激活。
 * 数据来源：配置解析。
 * 使用范围：regimeDetector；全项目可引用。
 */
export type RegimeDefinition = {
  readonly id: string;
  readonly name: string;
  readonly conditions: ConditionGroup;
  /** 0..100，越大越优先 */
  readonly priority: number;
  readonly scope: RegimeScope | null;
  /** 指标权重（indicatorId → [0,1]），未配置时为空对象 */
  readonly indicatorWeights: Readonly<Record<string, number>>;
};

/**
 * 激活的 regime（单次评估的临时结果）。
 */
export type ActiveRegime = {
  readonly regimeId: string;
  readonly name: string;
  readonly priority: number;
  readonly scope: RegimeScope | null;
  /** 归一化后的指标权重，和为 1（无权重配置时为空对象） */
  readonly weights: Readonly<Record<string, number>>;
};

export type TrailingMode = 'percent' | 'atr';

/**
 * 风控设置，所有字段可选。
 */
export type RiskSettings = {
  readonly stopLossPct?: number | undefined;
  readonly takeProfitPct?: number | undefined;
  readonly trailingMode?: TrailingMode | undefined;
  readonly trailingMultiplier?: number | undefined;
  readonly positionSize?: number | undefined;
};

/**
 * 策略定义。
 * 类型用途：入场/出场条件树与风控设置；被策略集按 id 引用。
 * 数据来源：配置解析。
 */
export type StrategyDefinition = {
  readonly id: string;
  readonly name: string;
  readonly entry: ConditionGroup | null;
  readonly exit: ConditionGroup | null;
  readonly risk: RiskSettings;
};

export type IndicatorParamValue = number | string | boolean;

export type IndicatorParams = Readonly<Record<string, IndicatorParamValue>>;

/**
 * 参数优化区间。
 */
export type ParamRange = {
  readonly min: number;
  readonly max: number;
  readonly step: number;
};

/**
 * 指标定义。
 * 类型用途：指标类型与参数；params 仅在策略集覆盖窗口内被临时修改。
 * 数据来源：配置解析。
 */
export type IndicatorDefinition = {
  readonly id: string;
  readonly type: string;
  readonly params: IndicatorParams;
  readonly timeframe: string | null;
  readonly paramRanges: Readonly<Record<string, ParamRange>>;
};

/**
 * 策略覆盖：entry/exit 整体替换，risk 按字段合并。
 */
export type StrategyOverrides = {
  readonly entry?: ConditionGroup | undefined;
  readonly exit?: ConditionGroup | undefined;
  readonly risk?: RiskSettings | undefined;
};

export type StrategyReference = {
  readonly strategyId: string;
  readonly overrides: StrategyOverrides | null;
};

export type IndicatorOverride = {
  readonly indicatorId: string;
  readonly params: IndicatorParams;
};

/**
 * 策略集。
 * 类型用途：策略引用与指标参数覆盖的组合，由路由规则选中。
 * 数据来源：配置解析。
 */
export type StrategySet = {
  readonly id: string;
  readonly name: string;
  readonly strategies: ReadonlyArray<StrategyReference>;
  readonly indicatorOverrides: ReadonlyArray<IndicatorOverride>;
};

/**
 * 路由匹配条件；anyOf 为 null 表示不限制。
 */
export type RoutingMatch = {
  readonly allOf: ReadonlyArray<string>;
  readonly anyOf: ReadonlyArray<string> | null;
  readonly noneOf: ReadonlyArray<string>;
};

export type RoutingRule = {
  readonly strategySetId: string;
  readonly match: RoutingMatch;
};

export type ConfigMetadata = Readonly<Record<string, unknown>>;

/**
 * 策略配置（聚合根）。
 * 类型用途：一次加载校验得到的完整规则配置，深度冻结后共享。
 * 数据来源：configLoader.loadStrategyConfig。
 * 使用范围：configReloader 持有，regimeDetector/strategyRouter/strategySetExecutor 由其派生。
 */
export type StrategyConfiguration = {
  readonly schemaVersion: string;
  readonly metadata: ConfigMetadata | null;
  readonly indicators: ReadonlyArray<IndicatorDefinition>;
  readonly regimes: ReadonlyArray<RegimeDefinition>;
  readonly strategies: ReadonlyArray<StrategyDefinition>;
  readonly strategySets: ReadonlyArray<StrategySet>;
  readonly routing: ReadonlyArray<RoutingRule>;
};

/**
 * 配置摘要计数，用于重载事件中的前后对比。
 */
export type ConfigCounts = {
  readonly indicators: number;
  readonly regimes: number;
  readonly strategies: number;
  readonly strategySets: number;
  readonly routingRules: number;
};
