/**
 * 序列统计函数
 *
 * 序列参数为数字列表（null 元素忽略）。
 * crossover/crossunder 的序列约定为 [当前值, 前值]，标量表示常数水平线。
 */
import { ExpressionEvalError } from '../../../utils/error/index.js';
import type { Value } from '../../../types/expression.js';
import type { BuiltinFunction } from '../types.js';
import { argAt, expectNumber, expectNumberList, isValueList, kindOf, optionalNumber } from '../utils.js';
import { defineFunction } from './define.js';

/**
 * 线性插值百分位（与常见统计库默认算法一致）。
 */
export function percentile(values: ReadonlyArray<number>, pct: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (pct / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (rank - lower);
}

/**
 * 取序列最后 period 个元素；period 非正整数时报错。
 */
function tail(fnName: string, args: ReadonlyArray<Value>): number[] {
  const values = expectNumberList(fnName, args, 0);
  const period = expectNumber(fnName, args, 1);
  if (!Number.isInteger(period) || period <= 0) {
    throw new ExpressionEvalError(`${fnName}() 周期必须为正整数，实际为 ${period}`);
  }
  return values.length >= period ? values.slice(values.length - period) : values;
}

function sumOf(values: ReadonlyArray<number>): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * 解析交叉判断的 [当前, 前值] 对。
 */
function currentAndPrevious(fnName: string, value: Value): Readonly<{ current: number; previous: number }> {
  if (typeof value === 'number') {
    return { current: value, previous: value };
  }
  if (!isValueList(value)) {
    throw new ExpressionEvalError(`${fnName}() 参数应为 number 或 list，实际为 ${kindOf(value)}`);
  }
  const current = value[0];
  const previous = value[1] ?? current;
  if (typeof current !== 'number' || typeof previous !== 'number') {
    throw new ExpressionEvalError(`${fnName}() 序列需要 [当前值, 前值] 两个数字`);
  }
  return { current, previous };
}

function average(fnName: string, args: ReadonlyArray<Value>): number {
  const values = expectNumberList(fnName, args, 0);
  return values.length === 0 ? 0 : sumOf(values) / values.length;
}

export const SERIES_FUNCTIONS: ReadonlyArray<BuiltinFunction> = [
  defineFunction('pctl', { min: 2, max: 3 }, (args) => {
    const first = argAt(args, 0) ?? null;
    const values = typeof first === 'number' ? [first] : expectNumberList('pctl', args, 0);
    const pct = expectNumber('pctl', args, 1);
    if (pct < 0 || pct > 100) {
      throw new ExpressionEvalError(`pctl() 百分位必须在 [0, 100] 内，实际为 ${pct}`);
    }
    const window = optionalNumber('pctl', args, 2);
    const data = window !== null && window > 0 && values.length > window
      ? values.slice(values.length - window)
      : values;
    return percentile(data.filter((value) => !Number.isNaN(value)), pct);
  }),
  defineFunction('crossover', { min: 2 }, ([first = null, second = null]) => {
    // 标量没有前值，无法判断交叉
    if (typeof first === 'number') {
      return false;
    }
    const a = currentAndPrevious('crossover', first);
    const b = currentAndPrevious('crossover', second);
    return a.previous <= b.previous && a.current > b.current;
  }),
  defineFunction('crossunder', { min: 2 }, ([first = null, second = null]) => {
    if (typeof first === 'number') {
      return false;
    }
    const a = currentAndPrevious('crossunder', first);
    const b = currentAndPrevious('crossunder', second);
    return a.previous >= b.previous && a.current < b.current;
  }),
  defineFunction('highest', { min: 2 }, (args) => {
    const data = tail('highest', args);
    return data.length === 0 ? 0 : Math.max(...data);
  }),
  defineFunction('lowest', { min: 2 }, (args) => {
    const data = tail('lowest', args);
    return data.length === 0 ? 0 : Math.min(...data);
  }),
  defineFunction('sma', { min: 2 }, (args) => {
    const data = tail('sma', args);
    return data.length === 0 ? 0 : sumOf(data) / data.length;
  }),
  defineFunction('sum', { min: 1 }, (args) => sumOf(expectNumberList('sum', args, 0))),
  defineFunction('avg', { min: 1 }, (args) => average('avg', args)),
  defineFunction('average', { min: 1 }, (args) => average('average', args)),
];
