/**
 * 列表与映射函数
 *
 * all/any 按元素真值判断（表达式语言不支持 lambda）。
 */
import { ExpressionEvalError } from '../../../utils/error/index.js';
import type { Value } from '../../../types/expression.js';
import type { BuiltinFunction } from '../types.js';
import {
  argAt,
  deepEqual,
  expectList,
  expectNumber,
  isTruthy,
  isValueList,
  isValueMap,
  kindOf,
  optionalNumber,
} from '../utils.js';
import { defineFunction } from './define.js';

function sizeOf(fnName: string, value: Value): number {
  if (typeof value === 'string' || isValueList(value)) {
    return value.length;
  }
  if (isValueMap(value)) {
    return Object.keys(value).length;
  }
  throw new ExpressionEvalError(`${fnName}() 不支持 ${kindOf(value)}`);
}

/**
 * 排序：元素须同为数字或同为字符串。
 */
function sortValues(list: ReadonlyArray<Value>, descending: boolean): Value[] {
  const numbers = list.filter((item): item is number => typeof item === 'number');
  const strings = list.filter((item): item is string => typeof item === 'string');
  let sorted: Value[];
  if (numbers.length === list.length) {
    sorted = [...numbers].sort((a, b) => a - b);
  } else if (strings.length === list.length) {
    sorted = [...strings].sort();
  } else {
    throw new ExpressionEvalError('sort() 只支持元素全为 number 或全为 string 的列表');
  }
  return descending ? sorted.reverse() : sorted;
}

export const COLLECTION_FUNCTIONS: ReadonlyArray<BuiltinFunction> = [
  defineFunction('size', { min: 1 }, ([value = null]) => sizeOf('size', value)),
  defineFunction('length', { min: 1 }, ([value = null]) => sizeOf('length', value)),
  defineFunction('has', { min: 2 }, ([container = null, element = null]) => {
    if (isValueList(container)) {
      return container.some((item) => deepEqual(item, element));
    }
    if (isValueMap(container) && typeof element === 'string') {
      return Object.hasOwn(container, element);
    }
    throw new ExpressionEvalError(`has() 不支持 ${kindOf(container)}`);
  }),
  defineFunction('all', { min: 1 }, (args) => expectList('all', args, 0).every((item) => isTruthy(item))),
  defineFunction('any', { min: 1 }, (args) => expectList('any', args, 0).some((item) => isTruthy(item))),
  defineFunction('first', { min: 1 }, (args) => expectList('first', args, 0)[0] ?? null),
  defineFunction('last', { min: 1 }, (args) => {
    const list = expectList('last', args, 0);
    return list[list.length - 1] ?? null;
  }),
  defineFunction('indexOf', { min: 2 }, (args) => {
    const list = expectList('indexOf', args, 0);
    const element = argAt(args, 1) ?? null;
    return list.findIndex((item) => deepEqual(item, element));
  }),
  defineFunction('slice', { min: 2, max: 3 }, (args) => {
    const list = expectList('slice', args, 0);
    const start = expectNumber('slice', args, 1);
    const end = optionalNumber('slice', args, 2);
    return end === null ? list.slice(start) : list.slice(start, end);
  }),
  defineFunction('distinct', { min: 1 }, (args) => {
    const result: Value[] = [];
    for (const item of expectList('distinct', args, 0)) {
      if (!result.some((existing) => deepEqual(existing, item))) {
        result.push(item);
      }
    }
    return result;
  }),
  defineFunction('sort', { min: 1, max: 2 }, (args) => {
    const descending = argAt(args, 1) ?? false;
    if (typeof descending !== 'boolean') {
      throw new ExpressionEvalError(`sort() 第 2 个参数应为 bool，实际为 ${kindOf(descending)}`);
    }
    return sortValues(expectList('sort', args, 0), descending);
  }),
  defineFunction('reverse', { min: 1 }, (args) => [...expectList('reverse', args, 0)].reverse()),
];
