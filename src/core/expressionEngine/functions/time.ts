/**
 * 时间函数（UTC，单位秒）
 *
 * 时间参数可为 Unix 秒数或 ISO 字符串；无时区后缀的字符串按 UTC 解析。
 * now() 读取引擎注入的时钟。
 */
import { TIME } from '../../../constants/index.js';
import { ExpressionEvalError } from '../../../utils/error/index.js';
import type { Value } from '../../../types/expression.js';
import type { BuiltinFunction, FunctionRuntime } from '../types.js';
import { argAt, expectNumber, getOwnValue, isValueMap, kindOf } from '../utils.js';
import { defineFunction } from './define.js';

const TIMEZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_TIME_WITH_SPACE = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2})/;

function nowSeconds(runtime: FunctionRuntime): number {
  return Math.floor(runtime.now() / TIME.MILLISECONDS_PER_SECOND);
}

/**
 * 转为 Unix 秒。
 *
 * @throws ExpressionEvalError 无法解析
 */
export function toEpochSeconds(fnName: string, value: Value | undefined): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    let text = value.trim().replace(DATE_TIME_WITH_SPACE, '$1T$2');
    // 仅日期（YYYY-MM-DD）本身按 UTC 解析；带时间但无时区的补 Z
    if (text.includes('T') && !TIMEZONE_SUFFIX.test(text)) {
      text = `${text}Z`;
    }
    const ms = Date.parse(text);
    if (Number.isFinite(ms)) {
      return Math.floor(ms / TIME.MILLISECONDS_PER_SECOND);
    }
  }
  throw new ExpressionEvalError(
    `${fnName}() 无法解析时间：${value === undefined ? '缺失' : `${kindOf(value)} ${String(value)}`}`,
  );
}

function toUtcDate(fnName: string, value: Value | undefined): Date {
  return new Date(toEpochSeconds(fnName, value) * TIME.MILLISECONDS_PER_SECOND);
}

/** ISO 周以周一开始：同一周的两个时刻有相同的「周一零点」 */
function isoWeekStart(date: Date): number {
  const dayOffset = (date.getUTCDay() + 6) % 7;
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() - dayOffset);
}

function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function compareTimes(
  fnName: string,
  args: ReadonlyArray<Value>,
  keyOf: (date: Date) => string | number,
): boolean {
  const previous = toUtcDate(fnName, argAt(args, 0));
  const current = toUtcDate(fnName, argAt(args, 1));
  return keyOf(previous) !== keyOf(current);
}

export const TIME_FUNCTIONS: ReadonlyArray<BuiltinFunction> = [
  defineFunction('now', { min: 0 }, (_args, runtime) => nowSeconds(runtime)),
  defineFunction('timestamp', { min: 1 }, (args) => toEpochSeconds('timestamp', argAt(args, 0))),
  defineFunction('bar_age', { min: 1 }, (args, runtime) =>
    nowSeconds(runtime) - toEpochSeconds('bar_age', argAt(args, 0)),
  ),
  defineFunction('bars_since', { min: 2 }, (args) => {
    const trade = argAt(args, 0) ?? null;
    const currentBar = expectNumber('bars_since', args, 1);
    if (!isValueMap(trade)) {
      return 0;
    }
    const barsInTrade = getOwnValue(trade, 'bars_in_trade');
    if (typeof barsInTrade === 'number') {
      return Math.trunc(barsInTrade);
    }
    const entryBar = getOwnValue(trade, 'entry_bar');
    if (typeof entryBar === 'number') {
      return currentBar - Math.trunc(entryBar);
    }
    return 0;
  }),
  defineFunction('is_new_day', { min: 2 }, (args) => compareTimes('is_new_day', args, dayKey)),
  defineFunction('is_new_hour', { min: 2 }, (args) =>
    compareTimes('is_new_hour', args, (date) => date.toISOString().slice(0, 13)),
  ),
  defineFunction('is_new_week', { min: 2 }, (args) => compareTimes('is_new_week', args, isoWeekStart)),
  defineFunction('is_new_month', { min: 2 }, (args) =>
    compareTimes('is_new_month', args, (date) => date.toISOString().slice(0, 7)),
  ),
];
