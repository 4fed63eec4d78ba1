/**
 * 单个指标字段值。
 * 类型用途：上游指标计算组件每根 K 线产出的原子数据，作为 createIndicatorSnapshot 的入参元素。
 * 数据来源：行情/指标计算模块（不在本项目范围内）。
 * 使用范围：indicatorSnapshot 服务；全项目可引用。
 */
export type IndicatorValue = {
  readonly indicatorId: string;
  readonly field: string;
  readonly value: number;
};

/**
 * 指标快照（indicatorId → field → value）。
 * 类型用途：一次评估周期内只读的指标数据，供条件评估、regime 检测与表达式上下文使用。
 * 数据来源：createIndicatorSnapshot 或调用方直接构造。
 * 使用范围：条件评估与决策引擎；全项目可引用。
 */
export type IndicatorSnapshot = Readonly<Record<string, Readonly<Record<string, number>>>>;
