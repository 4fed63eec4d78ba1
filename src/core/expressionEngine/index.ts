/**
 * 表达式引擎
 *
 * 功能：
 * - compile：源码 → 已编译表达式（LRU 缓存，重复编译只做一次解析）
 * - evaluate：在上下文中求值，运行时错误以结果对象返回，不抛出
 * - evaluateBoolean：布尔门控用，错误或非布尔结果一律视为 false 并告警
 * - validate：编辑器实时校验（词法、语法、函数名、参数个数），不求值不缓存
 *
 * 说明：
 * - 编译错误（编写错误）始终抛出，不会被吞掉
 * - 内置函数只读取上下文与注入的时钟，不持有可变全局状态
 */
import { EXPRESSION } from '../../constants/index.js';
import { ExpressionCompileError, ExpressionEvalError, formatError } from '../../utils/error/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import { createLruCache } from '../../utils/lruCache/index.js';
import type { ExpressionContext } from '../../types/expression.js';
import { BUILTIN_FUNCTIONS } from './functions/index.js';
import { evaluateNode } from './interpreter.js';
import { parseExpression } from './parser.js';
import type {
  CompiledExpression,
  EvaluationOutcome,
  ExpressionEngine,
  ExpressionEngineDeps,
  ExpressionValidationResult,
} from './types.js';

export function createExpressionEngine(deps: ExpressionEngineDeps = {}): ExpressionEngine {
  const {
    cacheSize = EXPRESSION.DEFAULT_CACHE_SIZE,
    now = Date.now,
    functions = BUILTIN_FUNCTIONS,
    logger = defaultLogger,
  } = deps;

  const cache = createLruCache<string, CompiledExpression>(cacheSize);

  function compile(source: string): CompiledExpression {
    const cached = cache.get(source);
    if (cached) {
      return cached;
    }
    const ast = parseExpression(source, functions);
    const compiled: CompiledExpression = Object.freeze({ source, ast });
    cache.set(source, compiled);
    return compiled;
  }

  function evaluate(compiled: CompiledExpression, context: ExpressionContext): EvaluationOutcome {
    try {
      const value = evaluateNode(compiled.ast, { context, now, logger });
      return { ok: true, value };
    } catch (err) {
      const error =
        err instanceof ExpressionEvalError
          ? err
          : new ExpressionEvalError(`表达式求值异常：${formatError(err)}`, { cause: err });
      return { ok: false, error };
    }
  }

  function evaluateBoolean(
    expression: CompiledExpression | string,
    context: ExpressionContext,
  ): boolean {
    const compiled = typeof expression === 'string' ? compile(expression) : expression;
    const outcome = evaluate(compiled, context);
    if (!outcome.ok) {
      logger.warn(`[表达式] 求值失败，按 false 处理：${compiled.source}`, {
        error: outcome.error.message,
      });
      return false;
    }
    if (typeof outcome.value !== 'boolean') {
      logger.warn(`[表达式] 结果不是 bool，按 false 处理：${compiled.source}`, {
        resultType: outcome.value === null ? 'null' : typeof outcome.value,
      });
      return false;
    }
    return outcome.value;
  }

  function validate(source: string): ExpressionValidationResult {
    try {
      parseExpression(source, functions);
      return { valid: true, errors: [] };
    } catch (err) {
      if (err instanceof ExpressionCompileError) {
        return { valid: false, errors: [err] };
      }
      throw err;
    }
  }

  return {
    compile,
    evaluate,
    evaluateBoolean,
    validate,
    getCacheStats: () => cache.getStats(),
    clearCache: () => cache.clear(),
    hasFunction: (name: string) => functions.has(name),
  };
}
