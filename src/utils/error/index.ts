import { inspect } from 'node:util';
import { isRecord } from '../primitives/index.js';
import type { ConfigIssue, EngineErrorCode } from './types.js';

/**
 * 引擎错误基类。
 * 所有可预期的业务错误均继承此类，通过 code 区分处理策略。
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * 配置加载错误：文件读取失败、JSON 语法错误或结构（schema）校验失败。
 * 重载时抛出此错误会中止重载并保留旧配置。
 */
export class ConfigLoadError extends EngineError {
  readonly filePath: string | null;

  constructor(message: string, filePath: string | null = null, options?: ErrorOptions) {
    super('CONFIG_LOAD', message, options);
    this.filePath = filePath;
  }
}

/**
 * 首次加载完成前读取当前配置。
 */
export class ConfigNotLoadedError extends EngineError {
  constructor() {
    super('CONFIG_NOT_LOADED', '[配置重载] 配置尚未加载');
  }
}

/**
 * 配置语义校验错误：引用无法解析、数值超出范围等。
 */
export class ConfigValidationError extends EngineError {
  readonly issues: ReadonlyArray<ConfigIssue>;

  constructor(issues: ReadonlyArray<ConfigIssue>) {
    const summary = issues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('；');
    const suffix = issues.length > 5 ? `（另有 ${issues.length - 5} 项）` : '';
    super('CONFIG_VALIDATION', `配置语义校验失败：${summary}${suffix}`);
    this.issues = issues;
  }
}

/**
 * 条件引用的指标字段在当前快照中不存在。
 * 仅影响单个条件的评估，由条件组按「不满足」处理。
 */
export class MissingIndicatorError extends EngineError {
  readonly indicatorId: string;
  readonly field: string;

  constructor(indicatorId: string, field: string) {
    super('MISSING_INDICATOR', `指标快照缺少 ${indicatorId}.${field}`);
    this.indicatorId = indicatorId;
    this.field = field;
  }

  /** 去重用的键（indicatorId.field） */
  get key(): string {
    return `${this.indicatorId}.${this.field}`;
  }
}

/**
 * 表达式编译错误（词法/语法/未知函数/参数个数）。
 * 编写错误必须在加载或编辑时暴露，不得静默吞掉。
 */
export class ExpressionCompileError extends EngineError {
  readonly source: string;
  readonly position: number;

  constructor(message: string, source: string, position: number) {
    super('EXPRESSION_COMPILE', `${message}（位置 ${position}）`);
    this.source = source;
    this.position = position;
  }
}

/**
 * 表达式运行时错误（变量缺失、类型不匹配、除零等）。
 * 在引擎内部捕获，不会抛出到调用方。
 */
export class ExpressionEvalError extends EngineError {
  constructor(message: string, options?: ErrorOptions) {
    super('EXPRESSION_EVAL', message, options);
  }
}

/**
 * 类型保护：检查是否为类似错误的对象（内部使用）。
 *
 * @param value 待检查值
 * @returns 如果对象包含常见错误字段返回 true
 */
function isErrorLike(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value['message'] === 'string' ||
    typeof value['error'] === 'string' ||
    typeof value['msg'] === 'string' ||
    typeof value['code'] === 'string'
  );
}

/**
 * 将错误对象格式化为可读字符串。
 * 默认行为：null/undefined 返回「未知错误」；Error 取 message；类错误对象取 message/error/msg/code；否则 JSON 或 inspect。
 *
 * @param err 任意错误或未知值
 * @returns 可读错误消息字符串
 */
export function formatError(err: unknown): string {
  if (err === null || err === undefined) {
    return '未知错误';
  }
  if (typeof err === 'string') {
    return err;
  }
  if (err instanceof Error) {
    return err.message || err.name || 'Error';
  }
  if (typeof err !== 'object') {
    return inspect(err, { depth: 5, maxArrayLength: 100 });
  }
  if (isErrorLike(err)) {
    const errorKeys = ['message', 'error', 'msg', 'code'] as const;
    for (const key of errorKeys) {
      const value = err[key];
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  try {
    return JSON.stringify(err);
  } catch {
    return inspect(err, { depth: 5, maxArrayLength: 100 });
  }
}
