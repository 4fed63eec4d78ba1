/**
 * 数学与价位计算函数
 *
 * 包含 abs/min/max/floor/ceil/round/sqrt/pow/exp/clamp 以及
 * pct_change、pct_from_level、level_at_pct、retracement、extension 等价位换算。
 */
import { ExpressionEvalError } from '../../../utils/error/index.js';
import type { Value } from '../../../types/expression.js';
import type { BuiltinFunction } from '../types.js';
import { expectNumber, expectNumberList, expectString, isValueList, optionalNumber } from '../utils.js';
import { defineFunction } from './define.js';

/**
 * min/max 参数：单个列表参数时取列表内数字，否则取全部参数。
 */
function collectNumbers(fnName: string, args: ReadonlyArray<Value>): number[] {
  const [first] = args;
  if (args.length === 1 && first !== undefined && isValueList(first)) {
    const values = expectNumberList(fnName, args, 0);
    if (values.length === 0) {
      throw new ExpressionEvalError(`${fnName}() 列表为空`);
    }
    return values;
  }
  return args.map((_, i) => expectNumber(fnName, args, i));
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export const MATH_FUNCTIONS: ReadonlyArray<BuiltinFunction> = [
  defineFunction('abs', { min: 1 }, (args) => Math.abs(expectNumber('abs', args, 0))),
  defineFunction('min', { min: 1, max: Number.POSITIVE_INFINITY }, (args) =>
    Math.min(...collectNumbers('min', args)),
  ),
  defineFunction('max', { min: 1, max: Number.POSITIVE_INFINITY }, (args) =>
    Math.max(...collectNumbers('max', args)),
  ),
  defineFunction('floor', { min: 1 }, (args) => Math.floor(expectNumber('floor', args, 0))),
  defineFunction('ceil', { min: 1 }, (args) => Math.ceil(expectNumber('ceil', args, 0))),
  defineFunction('round', { min: 1, max: 2 }, (args) => {
    const decimals = optionalNumber('round', args, 1) ?? 0;
    if (!Number.isInteger(decimals) || decimals < 0) {
      throw new ExpressionEvalError(`round() 小数位必须为非负整数，实际为 ${decimals}`);
    }
    return roundTo(expectNumber('round', args, 0), decimals);
  }),
  defineFunction('sqrt', { min: 1 }, (args) => {
    const value = expectNumber('sqrt', args, 0);
    if (value < 0) {
      throw new ExpressionEvalError(`sqrt() 不支持负数：${value}`);
    }
    return Math.sqrt(value);
  }),
  defineFunction('pow', { min: 2 }, (args) =>
    expectNumber('pow', args, 0) ** expectNumber('pow', args, 1),
  ),
  defineFunction('exp', { min: 1 }, (args) => Math.exp(expectNumber('exp', args, 0))),
  defineFunction('clamp', { min: 3 }, (args) => {
    const value = expectNumber('clamp', args, 0);
    const lower = expectNumber('clamp', args, 1);
    const upper = expectNumber('clamp', args, 2);
    if (lower > upper) {
      throw new ExpressionEvalError(`clamp() 下限 ${lower} 大于上限 ${upper}`);
    }
    return Math.max(lower, Math.min(value, upper));
  }),
  defineFunction('pct_change', { min: 2 }, (args) => {
    const oldValue = expectNumber('pct_change', args, 0);
    const newValue = expectNumber('pct_change', args, 1);
    if (oldValue === 0) {
      if (newValue === 0) {
        return 0;
      }
      return newValue > 0 ? 100 : -100;
    }
    return ((newValue - oldValue) / Math.abs(oldValue)) * 100;
  }),
  defineFunction('pct_from_level', { min: 2 }, (args) => {
    const price = expectNumber('pct_from_level', args, 0);
    const level = expectNumber('pct_from_level', args, 1);
    if (level === 0) {
      return 0;
    }
    return Math.abs((price - level) / level) * 100;
  }),
  defineFunction('level_at_pct', { min: 3 }, (args) => {
    const entry = expectNumber('level_at_pct', args, 0);
    const pct = expectNumber('level_at_pct', args, 1);
    const side = expectString('level_at_pct', args, 2).toLowerCase();
    if (side === 'long') {
      return entry * (1 - pct / 100);
    }
    if (side === 'short') {
      return entry * (1 + pct / 100);
    }
    throw new ExpressionEvalError(`level_at_pct() 方向必须为 'long' 或 'short'，实际为 '${side}'`);
  }),
  defineFunction('retracement', { min: 3 }, (args) => {
    const from = expectNumber('retracement', args, 0);
    const to = expectNumber('retracement', args, 1);
    const pct = expectNumber('retracement', args, 2);
    return from + (to - from) * (pct / 100);
  }),
  defineFunction('extension', { min: 3 }, (args) => {
    const from = expectNumber('extension', args, 0);
    const to = expectNumber('extension', args, 1);
    const pct = expectNumber('extension', args, 2);
    return to + (to - from) * (pct / 100);
  }),
];
