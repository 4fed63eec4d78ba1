import { MissingIndicatorError } from '../../utils/error/index.js';
import type { ExpressionContext, Value } from '../../types/expression.js';
import type { IndicatorSnapshot } from '../../types/indicator.js';
import type { ConditionGroup, ConditionNode, Operand } from '../../types/strategyConfig.js';
import type { EvaluationCycle } from './types.js';

export function isConditionGroup(node: ConditionNode): node is ConditionGroup {
  return 'mode' in node;
}

/**
 * 解析操作数数值。
 *
 * @throws MissingIndicatorError 快照中不存在 indicatorId.field
 */
export function resolveOperand(operand: Operand, snapshot: IndicatorSnapshot): number {
  if (operand.kind === 'constant') {
    return operand.value;
  }
  const fields = Object.hasOwn(snapshot, operand.indicatorId) ? snapshot[operand.indicatorId] : undefined;
  const value = fields !== undefined && Object.hasOwn(fields, operand.field) ? fields[operand.field] : undefined;
  if (value === undefined) {
    throw new MissingIndicatorError(operand.indicatorId, operand.field);
  }
  return value;
}

/**
 * 将指标快照转为表达式上下文（indicatorId → { field → value }），附加字段在下层。
 * 同名时快照优先。
 */
export function snapshotToContext(
  snapshot: IndicatorSnapshot,
  extra: ExpressionContext = {},
): ExpressionContext {
  const context: Record<string, Value> = { ...extra };
  for (const [indicatorId, fields] of Object.entries(snapshot)) {
    context[indicatorId] = { ...fields };
  }
  return context;
}

export function createEvaluationCycle(): EvaluationCycle {
  const missing = new Set<string>();
  return {
    markMissing(key: string): boolean {
      if (missing.has(key)) {
        return false;
      }
      missing.add(key);
      return true;
    },
    getMissingKeys: () => [...missing],
  };
}
