/**
 * 引擎错误码。
 * 类型用途：标识错误分类，供日志与通知通道区分处理策略。
 * 使用范围：utils/error 及全项目错误处理。
 */
export type EngineErrorCode =
  | 'CONFIG_LOAD'
  | 'CONFIG_NOT_LOADED'
  | 'CONFIG_VALIDATION'
  | 'MISSING_INDICATOR'
  | 'EXPRESSION_COMPILE'
  | 'EXPRESSION_EVAL';

/**
 * 单条配置校验问题。
 * 类型用途：描述语义校验失败的位置与原因，作为 ConfigValidationError.issues 元素。
 * 数据来源：configLoader 语义校验阶段。
 */
export type ConfigIssue = {
  /** 出错字段路径，如 regimes[2].conditions.all[0].left */
  readonly path: string;
  readonly message: string;
};
