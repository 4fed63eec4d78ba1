/**
 * 表达式解释执行
 *
 * 语义：
 * - + ：数字相加 / 字符串拼接 / 列表拼接
 * - / % ：除数为 0 时报错
 * - 关系比较：两侧同为数字或同为字符串
 * - == != ：深比较
 * - in ：列表元素 / 映射键 / 子串
 * - && || ：短路，两侧必须为布尔
 * - 标识符或映射键缺失：报错
 *
 * 运行时错误统一抛出 ExpressionEvalError，由引擎入口捕获。
 */
import { ExpressionEvalError } from '../../utils/error/index.js';
import type { Value } from '../../types/expression.js';
import type { AstNode, BinaryOperator, FunctionRuntime } from './types.js';
import { deepEqual, getOwnValue, isValueList, isValueMap, kindOf } from './utils.js';

function typeError(operator: string, left: Value, right: Value): ExpressionEvalError {
  return new ExpressionEvalError(
    `运算符 '${operator}' 不支持 ${kindOf(left)} 与 ${kindOf(right)}`,
  );
}

function expectBoolean(value: Value, where: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ExpressionEvalError(`${where} 需要 bool，实际为 ${kindOf(value)}`);
  }
  return value;
}

function evaluateBinary(operator: BinaryOperator, left: Value, right: Value): Value {
  switch (operator) {
    case '+':
      if (typeof left === 'number' && typeof right === 'number') {
        return left + right;
      }
      if (typeof left === 'string' && typeof right === 'string') {
        return left + right;
      }
      if (isValueList(left) && isValueList(right)) {
        return [...left, ...right];
      }
      throw typeError(operator, left, right);
    case '-':
    case '*':
    case '/':
    case '%':
      if (typeof left !== 'number' || typeof right !== 'number') {
        throw typeError(operator, left, right);
      }
      if (operator === '-') {
        return left - right;
      }
      if (operator === '*') {
        return left * right;
      }
      if (right === 0) {
        throw new ExpressionEvalError(`运算符 '${operator}' 除数为 0`);
      }
      return operator === '/' ? left / right : left % right;
    case '<':
    case '<=':
    case '>':
    case '>=':
      return compareValues(operator, left, right);
    case '==':
      return deepEqual(left, right);
    case '!=':
      return !deepEqual(left, right);
    case 'in':
      return evaluateMembership(left, right);
  }
}

function compareValues(operator: '<' | '<=' | '>' | '>=', left: Value, right: Value): boolean {
  let order: number;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left - right;
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw typeError(operator, left, right);
  }
  switch (operator) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
  }
}

function evaluateMembership(item: Value, container: Value): boolean {
  if (isValueList(container)) {
    return container.some((element) => deepEqual(element, item));
  }
  if (isValueMap(container)) {
    if (typeof item !== 'string') {
      throw typeError('in', item, container);
    }
    return Object.hasOwn(container, item);
  }
  if (typeof container === 'string' && typeof item === 'string') {
    return container.includes(item);
  }
  throw typeError('in', item, container);
}

function evaluateIndex(object: Value, index: Value): Value {
  if (isValueList(object)) {
    if (typeof index !== 'number' || !Number.isInteger(index)) {
      throw new ExpressionEvalError(`列表下标必须为整数，实际为 ${kindOf(index)}`);
    }
    const element = index >= 0 ? object[index] : undefined;
    if (element === undefined) {
      throw new ExpressionEvalError(`列表下标越界：${index}（长度 ${object.length}）`);
    }
    return element;
  }
  if (isValueMap(object)) {
    if (typeof index !== 'string') {
      throw new ExpressionEvalError(`映射键必须为 string，实际为 ${kindOf(index)}`);
    }
    const value = getOwnValue(object, index);
    if (value === undefined) {
      throw new ExpressionEvalError(`映射中不存在键 '${index}'`);
    }
    return value;
  }
  throw new ExpressionEvalError(`类型 ${kindOf(object)} 不支持下标访问`);
}

/**
 * 对语法树求值。
 *
 * @throws ExpressionEvalError 任意运行时错误
 */
export function evaluateNode(node: AstNode, runtime: FunctionRuntime): Value {
  switch (node.type) {
    case 'literal':
      return node.value;
    case 'identifier': {
      const value = getOwnValue(runtime.context, node.name);
      if (value === undefined) {
        throw new ExpressionEvalError(`未定义的变量 '${node.name}'`);
      }
      return value;
    }
    case 'list':
      return node.elements.map((element) => evaluateNode(element, runtime));
    case 'map': {
      const result: Record<string, Value> = {};
      for (const entry of node.entries) {
        const key = evaluateNode(entry.key, runtime);
        if (typeof key !== 'string') {
          throw new ExpressionEvalError(`映射字面量的键必须为 string，实际为 ${kindOf(key)}`);
        }
        result[key] = evaluateNode(entry.value, runtime);
      }
      return result;
    }
    case 'unary': {
      const operand = evaluateNode(node.operand, runtime);
      if (node.operator === '!') {
        return !expectBoolean(operand, "运算符 '!'");
      }
      if (typeof operand !== 'number') {
        throw new ExpressionEvalError(`运算符 '-' 需要 number，实际为 ${kindOf(operand)}`);
      }
      return -operand;
    }
    case 'binary':
      return evaluateBinary(
        node.operator,
        evaluateNode(node.left, runtime),
        evaluateNode(node.right, runtime),
      );
    case 'logical': {
      const left = expectBoolean(evaluateNode(node.left, runtime), `运算符 '${node.operator}' 左侧`);
      if (node.operator === '&&' && !left) {
        return false;
      }
      if (node.operator === '||' && left) {
        return true;
      }
      return expectBoolean(evaluateNode(node.right, runtime), `运算符 '${node.operator}' 右侧`);
    }
    case 'conditional': {
      const test = expectBoolean(evaluateNode(node.test, runtime), '三元表达式条件');
      return evaluateNode(test ? node.consequent : node.alternate, runtime);
    }
    case 'member': {
      const object = evaluateNode(node.object, runtime);
      if (!isValueMap(object)) {
        throw new ExpressionEvalError(`类型 ${kindOf(object)} 不支持字段访问 '.${node.property}'`);
      }
      const value = getOwnValue(object, node.property);
      if (value === undefined) {
        throw new ExpressionEvalError(`映射中不存在键 '${node.property}'`);
      }
      return value;
    }
    case 'index':
      return evaluateIndex(evaluateNode(node.object, runtime), evaluateNode(node.index, runtime));
    case 'call': {
      const args = node.args.map((arg) => evaluateNode(arg, runtime));
      try {
        return node.fn.call(args, runtime);
      } catch (err) {
        if (err instanceof ExpressionEvalError) {
          throw err;
        }
        throw new ExpressionEvalError(
          `函数 ${node.name}() 执行失败：${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }
    }
  }
}
