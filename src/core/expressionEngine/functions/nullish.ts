/**
 * 空值处理函数：isnull / nz / coalesce
 */
import type { Value } from '../../../types/expression.js';
import type { BuiltinFunction } from '../types.js';
import { defineFunction } from './define.js';

function isNullValue(value: Value | undefined): boolean {
  return value === undefined || value === null || (typeof value === 'number' && Number.isNaN(value));
}

export const NULLISH_FUNCTIONS: ReadonlyArray<BuiltinFunction> = [
  defineFunction('isnull', { min: 1 }, ([value]) => isNullValue(value)),
  defineFunction('nz', { min: 1, max: 2 }, ([value, fallback]) => {
    if (value === undefined || isNullValue(value)) {
      return fallback === undefined ? 0 : fallback;
    }
    return value;
  }),
  defineFunction('coalesce', { min: 1, max: Number.POSITIVE_INFINITY }, (args) => {
    for (const arg of args) {
      if (!isNullValue(arg)) {
        return arg;
      }
    }
    return null;
  }),
];
