/**
 * regime 相关函数
 *
 * last_closed_regime() 读取顺序：
 * 1. chart_window.last_regime_name（非空且不为 UNKNOWN）
 * 2. last_closed_candle.regime
 * 3. chart_data 倒数第二根 K 线的 regime（最后一根为未收盘 K 线）
 * 4. prev_regime
 * 5. 'UNKNOWN'
 */
import { EXPRESSION } from '../../../constants/index.js';
import type { ExpressionContext, Value } from '../../../types/expression.js';
import type { BuiltinFunction, FunctionRuntime } from '../types.js';
import { getOwnValue, isValueList, isValueMap, toDisplayString } from '../utils.js';
import { defineFunction } from './define.js';

function regimeOf(value: Value | undefined): string | null {
  if (value === undefined || !isValueMap(value)) {
    return null;
  }
  const regime = getOwnValue(value, 'regime');
  return regime === undefined ? null : toDisplayString(regime);
}

export function resolveLastClosedRegime(context: ExpressionContext): string {
  const chartWindow = getOwnValue(context, 'chart_window');
  if (chartWindow !== undefined && isValueMap(chartWindow)) {
    const name = getOwnValue(chartWindow, 'last_regime_name');
    if (typeof name === 'string' && name !== '' && name !== EXPRESSION.UNKNOWN_REGIME) {
      return name;
    }
  }

  const fromCandle = regimeOf(getOwnValue(context, 'last_closed_candle'));
  if (fromCandle !== null) {
    return fromCandle;
  }

  const chartData = getOwnValue(context, 'chart_data');
  if (chartData !== undefined && isValueList(chartData) && chartData.length >= 2) {
    const fromHistory = regimeOf(chartData[chartData.length - 2]);
    if (fromHistory !== null) {
      return fromHistory;
    }
  }

  const previous = getOwnValue(context, 'prev_regime');
  if (previous !== undefined) {
    return toDisplayString(previous);
  }
  return EXPRESSION.UNKNOWN_REGIME;
}

function lastClosedRegime(runtime: FunctionRuntime): string {
  const regime = resolveLastClosedRegime(runtime.context);
  if (regime === EXPRESSION.UNKNOWN_REGIME) {
    runtime.logger.debug('[表达式] last_closed_regime 上下文中没有 regime 数据，返回 UNKNOWN');
  }
  return regime;
}

export const REGIME_FUNCTIONS: ReadonlyArray<BuiltinFunction> = [
  defineFunction('in_regime', { min: 2 }, ([current = null, regimeId = null]) => {
    if (typeof current === 'string') {
      return current === regimeId;
    }
    if (isValueList(current)) {
      return current.includes(regimeId);
    }
    return false;
  }),
  defineFunction('last_closed_regime', { min: 0 }, (_args, runtime) => lastClosedRegime(runtime)),
  defineFunction('new_regime_detected', { min: 0 }, (_args, runtime) => {
    const previousValue = getOwnValue(runtime.context, 'prev_regime');
    const previous =
      previousValue === undefined ? EXPRESSION.UNKNOWN_REGIME : toDisplayString(previousValue);
    const current = lastClosedRegime(runtime);
    if (previous === EXPRESSION.UNKNOWN_REGIME || current === EXPRESSION.UNKNOWN_REGIME) {
      return false;
    }
    return previous !== current;
  }),
];
