import type { Value } from '../../../types/expression.js';
import type { BuiltinFunction, FunctionRuntime } from '../types.js';

/**
 * 声明内置函数。maxArgs 省略时与 minArgs 相同。
 */
export function defineFunction(
  name: string,
  arity: Readonly<{ min: number; max?: number }>,
  call: (args: ReadonlyArray<Value>, runtime: FunctionRuntime) => Value,
): BuiltinFunction {
  return {
    name,
    minArgs: arity.min,
    maxArgs: arity.max ?? arity.min,
    call,
  };
}
