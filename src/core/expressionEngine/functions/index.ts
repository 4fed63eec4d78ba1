/**
 * 内置函数注册表
 *
 * 功能：
 * - 汇总各类内置函数为静态只读 Map（函数名 → 描述）
 * - 编译期按名称解析并校验参数个数，运行期直接调用
 *
 * 分类：空值、数学、序列统计、字符串/类型、列表、时间、交易状态、regime、形态标志
 */
import type { BuiltinFunction, FunctionRegistry } from '../types.js';
import { COLLECTION_FUNCTIONS } from './collection.js';
import { MATH_FUNCTIONS } from './math.js';
import { NULLISH_FUNCTIONS } from './nullish.js';
import { PATTERN_FUNCTIONS } from './pattern.js';
import { REGIME_FUNCTIONS } from './regime.js';
import { SERIES_FUNCTIONS } from './series.js';
import { TEXT_FUNCTIONS } from './text.js';
import { TIME_FUNCTIONS } from './time.js';
import { TRADING_FUNCTIONS } from './trading.js';

/**
 * 由函数列表构建注册表；重名视为编程错误。
 */
export function createFunctionRegistry(
  groups: ReadonlyArray<ReadonlyArray<BuiltinFunction>>,
): FunctionRegistry {
  const registry = new Map<string, BuiltinFunction>();
  for (const group of groups) {
    for (const fn of group) {
      if (registry.has(fn.name)) {
        throw new Error(`内置函数重复注册：${fn.name}`);
      }
      registry.set(fn.name, fn);
    }
  }
  return registry;
}

export const BUILTIN_FUNCTIONS: FunctionRegistry = createFunctionRegistry([
  NULLISH_FUNCTIONS,
  MATH_FUNCTIONS,
  SERIES_FUNCTIONS,
  TEXT_FUNCTIONS,
  COLLECTION_FUNCTIONS,
  TIME_FUNCTIONS,
  TRADING_FUNCTIONS,
  REGIME_FUNCTIONS,
  PATTERN_FUNCTIONS,
]);
