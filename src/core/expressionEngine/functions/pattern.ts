/**
 * 形态 / 突破 / SMC 标志函数
 *
 * 标志由上游形态识别写入上下文，函数只做查找：
 * 依次尝试「命名空间.名称」「名称」等键，取第一个存在的值的真值；全部缺失返回 false。
 */
import type { ExpressionContext } from '../../../types/expression.js';
import type { BuiltinFunction } from '../types.js';
import { getOwnValue, isTruthy, isValueMap } from '../utils.js';
import { defineFunction } from './define.js';

/**
 * 读取上下文键：优先扁平键（如 "pattern.inside_bar"），其次嵌套映射。
 */
function lookup(context: ExpressionContext, key: string): boolean | null {
  const flat = getOwnValue(context, key);
  if (flat !== undefined && flat !== null) {
    return isTruthy(flat);
  }
  const dot = key.indexOf('.');
  if (dot < 0) {
    return null;
  }
  const container = getOwnValue(context, key.slice(0, dot));
  if (container === undefined || !isValueMap(container)) {
    return null;
  }
  const nested = getOwnValue(container, key.slice(dot + 1));
  return nested === undefined || nested === null ? null : isTruthy(nested);
}

function contextFlag(context: ExpressionContext, keys: ReadonlyArray<string>): boolean {
  for (const key of keys) {
    const flag = lookup(context, key);
    if (flag !== null) {
      return flag;
    }
  }
  return false;
}

/**
 * 函数名 → 命名空间顺序；aliases 为额外回退的同义标志名。
 */
const FLAG_TABLE: ReadonlyArray<
  Readonly<{ name: string; namespaces: ReadonlyArray<string>; aliases?: ReadonlyArray<string> }>
> = [
  { name: 'pin_bar_bullish', namespaces: ['pattern', 'patterns'], aliases: ['pin_bar'] },
  { name: 'pin_bar_bearish', namespaces: ['pattern', 'patterns'], aliases: ['pin_bar'] },
  { name: 'inside_bar', namespaces: ['pattern', 'patterns'] },
  { name: 'inverted_hammer', namespaces: ['pattern', 'patterns'] },
  { name: 'bull_flag', namespaces: ['pattern', 'patterns'] },
  { name: 'bear_flag', namespaces: ['pattern', 'patterns'] },
  { name: 'cup_and_handle', namespaces: ['pattern', 'patterns'] },
  { name: 'double_top', namespaces: ['pattern', 'patterns'] },
  { name: 'double_bottom', namespaces: ['pattern', 'patterns'] },
  { name: 'ascending_triangle', namespaces: ['pattern', 'patterns'] },
  { name: 'descending_triangle', namespaces: ['pattern', 'patterns'] },
  { name: 'breakout_above', namespaces: ['breakout', 'pattern'] },
  { name: 'breakdown_below', namespaces: ['breakout', 'pattern'] },
  { name: 'false_breakout', namespaces: ['breakout', 'pattern'] },
  { name: 'break_of_structure', namespaces: ['breakout', 'pattern'] },
  { name: 'liquidity_swept', namespaces: ['smc', 'pattern'] },
  { name: 'fvg_exists', namespaces: ['smc', 'pattern'] },
  { name: 'order_block_retest', namespaces: ['smc', 'pattern'] },
  { name: 'harmonic_pattern_detected', namespaces: ['smc', 'pattern'] },
];

/**
 * 生成查找键顺序：每个名称依次尝试各命名空间，再尝试裸名称。
 */
export function flagKeys(
  name: string,
  namespaces: ReadonlyArray<string>,
  aliases: ReadonlyArray<string> = [],
): string[] {
  return [name, ...aliases].flatMap((flag) => [...namespaces.map((ns) => `${ns}.${flag}`), flag]);
}

export const PATTERN_FUNCTIONS: ReadonlyArray<BuiltinFunction> = FLAG_TABLE.map(
  ({ name, namespaces, aliases }) => {
    const keys = flagKeys(name, namespaces, aliases);
    return defineFunction(name, { min: 0 }, (_args, runtime) => contextFlag(runtime.context, keys));
  },
);
