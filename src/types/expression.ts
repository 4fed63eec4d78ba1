/**
 * 表达式值。
 * 类型用途：表达式求值的输入（上下文）与输出类型，覆盖数字、字符串、布尔、null、列表与映射。
 * 数据来源：调用方上下文、字面量及内置函数返回。
 * 使用范围：表达式引擎、条件评估的表达式叶子；全项目可引用。
 */
export type Value =
  | number
  | string
  | boolean
  | null
  | ReadonlyArray<Value>
  | { readonly [key: string]: Value };

/**
 * 表达式映射值。
 * 类型用途：Value 中的映射分支，用于上下文与成员访问。
 * 使用范围：表达式引擎；全项目可引用。
 */
export type ValueMap = { readonly [key: string]: Value };

/**
 * 表达式求值上下文（变量名 → 值）。
 * 类型用途：evaluate 的入参，标识符解析与上下文函数（如 last_closed_regime）的数据来源。
 * 使用范围：表达式引擎、条件评估、决策引擎；全项目可引用。
 */
export type ExpressionContext = ValueMap;
