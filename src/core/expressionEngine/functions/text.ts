/**
 * 字符串与类型转换函数
 */
import { ExpressionEvalError } from '../../../utils/error/index.js';
import type { Value } from '../../../types/expression.js';
import type { BuiltinFunction } from '../types.js';
import {
  expectList,
  expectNumber,
  expectString,
  isTruthy,
  kindOf,
  optionalNumber,
  toDisplayString,
} from '../utils.js';
import { defineFunction } from './define.js';

const TRUTHY_STRINGS: ReadonlySet<string> = new Set(['true', '1', 'yes', 'on']);

function toNumber(fnName: string, value: Value): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  throw new ExpressionEvalError(`${fnName}() 无法将 ${kindOf(value)} '${toDisplayString(value)}' 转为数字`);
}

export const TEXT_FUNCTIONS: ReadonlyArray<BuiltinFunction> = [
  defineFunction('type', { min: 1 }, ([value = null]) => kindOf(value)),
  defineFunction('string', { min: 1 }, ([value = null]) => toDisplayString(value)),
  defineFunction('int', { min: 1 }, ([value = null]) => Math.trunc(toNumber('int', value))),
  defineFunction('double', { min: 1 }, ([value = null]) => toNumber('double', value)),
  defineFunction('bool', { min: 1 }, ([value = null]) =>
    typeof value === 'string' ? TRUTHY_STRINGS.has(value.toLowerCase()) : isTruthy(value),
  ),
  defineFunction('contains', { min: 2 }, (args) =>
    expectString('contains', args, 0).includes(expectString('contains', args, 1)),
  ),
  defineFunction('startsWith', { min: 2 }, (args) =>
    expectString('startsWith', args, 0).startsWith(expectString('startsWith', args, 1)),
  ),
  defineFunction('endsWith', { min: 2 }, (args) =>
    expectString('endsWith', args, 0).endsWith(expectString('endsWith', args, 1)),
  ),
  defineFunction('toLowerCase', { min: 1 }, (args) => expectString('toLowerCase', args, 0).toLowerCase()),
  defineFunction('toUpperCase', { min: 1 }, (args) => expectString('toUpperCase', args, 0).toUpperCase()),
  defineFunction('substring', { min: 2, max: 3 }, (args) => {
    const text = expectString('substring', args, 0);
    const start = expectNumber('substring', args, 1);
    const end = optionalNumber('substring', args, 2);
    return end === null ? text.slice(start) : text.slice(start, end);
  }),
  defineFunction('split', { min: 2 }, (args) =>
    expectString('split', args, 0).split(expectString('split', args, 1)),
  ),
  defineFunction('join', { min: 2 }, (args) =>
    expectList('join', args, 0)
      .map((part) => toDisplayString(part))
      .join(expectString('join', args, 1)),
  ),
];
