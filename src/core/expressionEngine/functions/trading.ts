/**
 * 交易状态与价位判断函数
 *
 * trade / strategy 参数为映射；非映射或缺少字段时返回 false（不报错）。
 */
import { ExpressionEvalError } from '../../../utils/error/index.js';
import type { Value, ValueMap } from '../../../types/expression.js';
import type { BuiltinFunction } from '../types.js';
import { argAt, expectNumber, getOwnValue, isTruthy, isValueMap, toDisplayString } from '../utils.js';
import { defineFunction } from './define.js';

const OPEN_STATUSES: ReadonlySet<string> = new Set(['open', 'active']);
const BULLISH_SIGNALS: ReadonlySet<string> = new Set(['bullish', 'buy', 'long']);
const BULLISH_BIASES: ReadonlySet<string> = new Set(['bullish', 'long', 'up']);
const BEARISH_SIGNALS: ReadonlySet<string> = new Set(['bearish', 'sell', 'short']);
const BEARISH_BIASES: ReadonlySet<string> = new Set(['bearish', 'short', 'down']);

function asMap(value: Value | undefined): ValueMap | null {
  return value !== undefined && isValueMap(value) ? value : null;
}

function lowerField(map: ValueMap, key: string): string | null {
  const value = getOwnValue(map, key);
  return value === undefined ? null : toDisplayString(value).toLowerCase();
}

/**
 * 按顺序取第一个真值数字字段（0 视为未设置）。
 */
function firstPriceField(fnName: string, map: ValueMap, keys: ReadonlyArray<string>): number | null {
  for (const key of keys) {
    const value = getOwnValue(map, key);
    if (value === undefined || !isTruthy(value)) {
      continue;
    }
    if (typeof value !== 'number') {
      throw new ExpressionEvalError(`${fnName}() 字段 ${key} 应为 number`);
    }
    return value;
  }
  return null;
}

function signalMatches(
  value: Value | undefined,
  signals: ReadonlySet<string>,
  biases: ReadonlySet<string>,
): boolean {
  const strategy = asMap(value);
  if (!strategy) {
    return false;
  }
  const signal = lowerField(strategy, 'signal');
  if (signal !== null) {
    return signals.has(signal);
  }
  const bias = lowerField(strategy, 'bias');
  return bias !== null && biases.has(bias);
}

function sideIs(value: Value | undefined, side: 'long' | 'short'): boolean {
  const trade = asMap(value);
  return trade !== null && lowerField(trade, 'side') === side;
}

function stopHit(fnName: string, args: ReadonlyArray<Value>, direction: 'long' | 'short'): boolean {
  const price = expectNumber(fnName, args, 1);
  const trade = asMap(argAt(args, 0));
  if (!trade) {
    return false;
  }
  const stop = firstPriceField(fnName, trade, ['stop_price', 'stop_loss']);
  if (stop === null) {
    return false;
  }
  return direction === 'long' ? price <= stop : price >= stop;
}

function compareNumbers(fnName: string, args: ReadonlyArray<Value>, above: boolean): boolean {
  const price = expectNumber(fnName, args, 0);
  const reference = expectNumber(fnName, args, 1);
  return above ? price > reference : price < reference;
}

export const TRADING_FUNCTIONS: ReadonlyArray<BuiltinFunction> = [
  defineFunction('is_trade_open', { min: 1 }, ([value]) => {
    const trade = asMap(value);
    if (!trade) {
      return false;
    }
    const isOpen = getOwnValue(trade, 'is_open');
    if (isOpen !== undefined) {
      return isTruthy(isOpen);
    }
    const status = lowerField(trade, 'status');
    return status !== null && OPEN_STATUSES.has(status);
  }),
  defineFunction('is_long', { min: 1 }, ([value]) => sideIs(value, 'long')),
  defineFunction('is_short', { min: 1 }, ([value]) => sideIs(value, 'short')),
  defineFunction('is_bullish_signal', { min: 1 }, ([value]) =>
    signalMatches(value, BULLISH_SIGNALS, BULLISH_BIASES),
  ),
  defineFunction('is_bearish_signal', { min: 1 }, ([value]) =>
    signalMatches(value, BEARISH_SIGNALS, BEARISH_BIASES),
  ),
  defineFunction('stop_hit_long', { min: 2 }, (args) => stopHit('stop_hit_long', args, 'long')),
  defineFunction('stop_hit_short', { min: 2 }, (args) => stopHit('stop_hit_short', args, 'short')),
  defineFunction('tp_hit', { min: 2 }, (args) => {
    const price = expectNumber('tp_hit', args, 1);
    const trade = asMap(argAt(args, 0));
    if (!trade) {
      return false;
    }
    const target = firstPriceField('tp_hit', trade, ['tp_price', 'take_profit']);
    if (target === null) {
      return false;
    }
    const side = lowerField(trade, 'side');
    if (side === 'long') {
      return price >= target;
    }
    if (side === 'short') {
      return price <= target;
    }
    // 方向未知时任一方向触及即视为命中
    return price >= target || price <= target;
  }),
  defineFunction('price_above_ema', { min: 2 }, (args) => compareNumbers('price_above_ema', args, true)),
  defineFunction('price_below_ema', { min: 2 }, (args) => compareNumbers('price_below_ema', args, false)),
  defineFunction('price_above_level', { min: 2 }, (args) =>
    compareNumbers('price_above_level', args, true),
  ),
  defineFunction('price_below_level', { min: 2 }, (args) =>
    compareNumbers('price_below_level', args, false),
  ),
];
