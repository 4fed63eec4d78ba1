import type { ErrorObject } from 'ajv';
import type { ConfigCounts, StrategyConfiguration } from '../../types/strategyConfig.js';
import { isRecord } from '../../utils/primitives/index.js';

const COMMENT_KEY_PREFIX = '_comment';

/** 结构错误信息最多列出的条数 */
const MAX_SCHEMA_ERRORS_IN_MESSAGE = 8;

/**
 * 递归移除所有以 _comment 开头的键（任意层级）。
 * 返回新对象，不修改入参。
 */
export function stripCommentKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripCommentKeys);
  }
  if (!isRecord(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    if (key.startsWith(COMMENT_KEY_PREFIX)) {
      continue;
    }
    result[key] = stripCommentKeys(child);
  }
  return result;
}

/**
 * 将 ajv 错误列表格式化为单行说明，路径为空时以 (root) 表示。
 */
export function formatSchemaErrors(errors: ReadonlyArray<ErrorObject> | null | undefined): string {
  if (!errors || errors.length === 0) {
    return '未知结构错误';
  }
  const lines = errors.slice(0, MAX_SCHEMA_ERRORS_IN_MESSAGE).map((error) => {
    const path = error.instancePath === '' ? '(root)' : error.instancePath;
    const extra =
      error.keyword === 'additionalProperties' && typeof error.params['additionalProperty'] === 'string'
        ? `: ${error.params['additionalProperty']}`
        : '';
    return `${path} ${error.message ?? error.keyword}${extra}`;
  });
  const suffix =
    errors.length > MAX_SCHEMA_ERRORS_IN_MESSAGE
      ? `（另有 ${errors.length - MAX_SCHEMA_ERRORS_IN_MESSAGE} 项）`
      : '';
  return `${lines.join('；')}${suffix}`;
}

/**
 * 配置摘要计数（重载事件前后对比用）。
 */
export function getConfigCounts(config: StrategyConfiguration): ConfigCounts {
  return {
    indicators: config.indicators.length,
    regimes: config.regimes.length,
    strategies: config.strategies.length,
    strategySets: config.strategySets.length,
    routingRules: config.routing.length,
  };
}
