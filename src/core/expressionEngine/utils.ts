import { ExpressionEvalError } from '../../utils/error/index.js';
import type { Value, ValueMap } from '../../types/expression.js';

/**
 * 值类型名（用于 type() 与错误信息）。
 */
export type ValueKind = 'null' | 'bool' | 'int' | 'double' | 'string' | 'list' | 'map';

export function isValueList(value: Value): value is ReadonlyArray<Value> {
  return Array.isArray(value);
}

export function isValueMap(value: Value): value is ValueMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function kindOf(value: Value): ValueKind {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'boolean') {
    return 'bool';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'int' : 'double';
  }
  if (typeof value === 'string') {
    return 'string';
  }
  return isValueList(value) ? 'list' : 'map';
}

/**
 * 读取映射自有字段；不存在返回 undefined（原型链上的键不算）。
 */
export function getOwnValue(map: ValueMap, key: string): Value | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

/**
 * 深比较：数字按 ===（NaN 不等于自身），列表逐项，映射按键集合与值。
 */
export function deepEqual(a: Value, b: Value): boolean {
  if (a === b) {
    return true;
  }
  if (isValueList(a) && isValueList(b)) {
    if (a.length !== b.length) {
      return false;
    }
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && deepEqual(item, other);
    });
  }
  if (isValueMap(a) && isValueMap(b)) {
    const keysA = Object.keys(a);
    if (keysA.length !== Object.keys(b).length) {
      return false;
    }
    return keysA.every((key) => {
      const left = getOwnValue(a, key);
      const right = getOwnValue(b, key);
      return left !== undefined && right !== undefined && deepEqual(left, right);
    });
  }
  return false;
}

/**
 * 真值判断：false、null、0、NaN、空串、空列表、空映射为假。
 */
export function isTruthy(value: Value): boolean {
  if (value === null) {
    return false;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0 && !Number.isNaN(value);
  }
  if (typeof value === 'string') {
    return value.length > 0;
  }
  if (isValueList(value)) {
    return value.length > 0;
  }
  return Object.keys(value).length > 0;
}

/**
 * 转为展示字符串：布尔为 true/false，null 为 'null'，列表与映射为 JSON。
 */
export function toDisplayString(value: Value): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

function argumentError(fnName: string, index: number, expected: string, actual: Value): ExpressionEvalError {
  return new ExpressionEvalError(
    `${fnName}() 第 ${index + 1} 个参数应为 ${expected}，实际为 ${kindOf(actual)}`,
  );
}

/**
 * 读取第 index 个参数；缺失（可选参数未传）返回 undefined。
 */
export function argAt(args: ReadonlyArray<Value>, index: number): Value | undefined {
  return args[index];
}

export function expectNumber(fnName: string, args: ReadonlyArray<Value>, index: number): number {
  const value = argAt(args, index) ?? null;
  if (typeof value !== 'number') {
    throw argumentError(fnName, index, 'number', value);
  }
  return value;
}

export function expectString(fnName: string, args: ReadonlyArray<Value>, index: number): string {
  const value = argAt(args, index) ?? null;
  if (typeof value !== 'string') {
    throw argumentError(fnName, index, 'string', value);
  }
  return value;
}

export function expectList(
  fnName: string,
  args: ReadonlyArray<Value>,
  index: number,
): ReadonlyArray<Value> {
  const value = argAt(args, index) ?? null;
  if (!isValueList(value)) {
    throw argumentError(fnName, index, 'list', value);
  }
  return value;
}

/**
 * 可选数字参数：未传或为 null 时返回 null。
 */
export function optionalNumber(
  fnName: string,
  args: ReadonlyArray<Value>,
  index: number,
): number | null {
  const value = argAt(args, index);
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'number') {
    throw argumentError(fnName, index, 'number', value);
  }
  return value;
}

/**
 * 数字列表：null 元素跳过，其余非数字元素报错。
 */
export function expectNumberList(
  fnName: string,
  args: ReadonlyArray<Value>,
  index: number,
): number[] {
  const list = expectList(fnName, args, index);
  const result: number[] = [];
  for (const item of list) {
    if (item === null) {
      continue;
    }
    if (typeof item !== 'number') {
      throw new ExpressionEvalError(`${fnName}() 列表元素应为 number，实际为 ${kindOf(item)}`);
    }
    result.push(item);
  }
  return result;
}
