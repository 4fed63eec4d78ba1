/**
 * 条件评估模块
 *
 * 功能：
 * - 评估声明式条件树（all / any 嵌套）与叶子条件（gt / lt / eq / between / 表达式）
 * - gt、lt 严格比较；eq 容差 1e-6；between 闭区间、无容差
 * - 叶子引用的指标缺失时按不满足处理，同一周期内每个缺失键只记录一次
 *
 * 说明：
 * - all 遇到第一个 false 即短路，any 遇到第一个 true 即短路，空组为 true
 * - 表达式叶子委托表达式引擎，运行时失败为 false；编译错误向上抛出
 */
import { CONDITION } from '../../constants/index.js';
import { MissingIndicatorError } from '../../utils/error/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import type { IndicatorSnapshot } from '../../types/indicator.js';
import type { Condition, ConditionGroup } from '../../types/strategyConfig.js';
import type {
  ConditionEvaluationOptions,
  ConditionEvaluator,
  ConditionEvaluatorDeps,
  EvaluationCycle,
} from './types.js';
import { createEvaluationCycle, isConditionGroup, resolveOperand, snapshotToContext } from './utils.js';

export { createEvaluationCycle, snapshotToContext } from './utils.js';

export function createConditionEvaluator(deps: ConditionEvaluatorDeps): ConditionEvaluator {
  const { expressionEngine, logger = defaultLogger } = deps;

  function evaluateCondition(
    condition: Condition,
    snapshot: IndicatorSnapshot,
    options: ConditionEvaluationOptions = {},
  ): boolean {
    switch (condition.kind) {
      case 'comparison': {
        const left = resolveOperand(condition.left, snapshot);
        const right = resolveOperand(condition.right, snapshot);
        if (condition.op === 'gt') {
          return left > right;
        }
        if (condition.op === 'lt') {
          return left < right;
        }
        return Math.abs(left - right) <= CONDITION.EQ_EPSILON;
      }
      case 'between': {
        const value = resolveOperand(condition.left, snapshot);
        return value >= condition.range.min && value <= condition.range.max;
      }
      case 'expression':
        return expressionEngine.evaluateBoolean(
          condition.expression,
          snapshotToContext(snapshot, options.extraContext),
        );
    }
  }

  function evaluateNodes(
    group: ConditionGroup,
    snapshot: IndicatorSnapshot,
    options: ConditionEvaluationOptions,
    cycle: EvaluationCycle,
  ): boolean {
    const wantAll = group.mode === 'all';
    for (const item of group.items) {
      let result: boolean;
      if (isConditionGroup(item)) {
        result = evaluateNodes(item, snapshot, options, cycle);
      } else {
        try {
          result = evaluateCondition(item, snapshot, options);
        } catch (err) {
          if (!(err instanceof MissingIndicatorError)) {
            throw err;
          }
          if (cycle.markMissing(err.key)) {
            logger.warn(`[条件评估] 指标快照缺少 ${err.key}，条件按不满足处理`);
          }
          result = false;
        }
      }
      if (wantAll && !result) {
        return false;
      }
      if (!wantAll && result) {
        return true;
      }
    }
    // 全部满足（all）或空组为 true；any 无一满足为 false
    return wantAll || group.items.length === 0;
  }

  function evaluateGroup(
    group: ConditionGroup,
    snapshot: IndicatorSnapshot,
    options: ConditionEvaluationOptions = {},
  ): boolean {
    return evaluateNodes(group, snapshot, options, options.cycle ?? createEvaluationCycle());
  }

  return {
    evaluateCondition,
    evaluateGroup,
  };
}
