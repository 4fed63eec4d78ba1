/**
 * 全局常量模块
 *
 * 统一管理项目中使用的所有常量，包括：
 * - 日志相关：级别数值、流超时
 * - 条件评估：浮点比较容差、条件树最大深度
 * - 表达式引擎：编译缓存容量、缺省哨兵值
 * - 配置重载：防抖窗口、事件队列容量、优先级/权重范围
 */

/** 日志级别（pino 自定义级别数值） */
export const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

/** 日志相关常量，用于 pino 日志系统 */
export const LOGGING = {
  /** 文件流 drain 超时时间（毫秒） */
  DRAIN_TIMEOUT_MS: 5000,
  /** 控制台流 drain 超时时间（毫秒） */
  CONSOLE_DRAIN_TIMEOUT_MS: 3000,
} as const;

/** 条件评估相关常量 */
export const CONDITION = {
  /** eq 运算符的浮点容差 */
  EQ_EPSILON: 1e-6,
  /** 条件树最大嵌套深度（解析时校验，替代环检测） */
  MAX_DEPTH: 32,
} as const;

/** 表达式引擎相关常量 */
export const EXPRESSION = {
  /** 默认编译缓存容量（LRU） */
  DEFAULT_CACHE_SIZE: 128,
  /** 表达式源码最大长度 */
  MAX_SOURCE_LENGTH: 10_000,
  /** 表达式语法树最大嵌套深度 */
  MAX_NESTING: 64,
  /** 无法获取 regime 时返回的哨兵值 */
  UNKNOWN_REGIME: 'UNKNOWN',
} as const;

/** 配置重载相关常量 */
export const RELOAD = {
  /** 默认防抖窗口（毫秒） */
  DEFAULT_DEBOUNCE_MS: 1000,
  /** 默认文件事件队列容量 */
  DEFAULT_QUEUE_CAPACITY: 16,
} as const;

/** 配置语义校验范围 */
export const CONFIG_LIMITS = {
  PRIORITY_MIN: 0,
  PRIORITY_MAX: 100,
  WEIGHT_MIN: 0,
  WEIGHT_MAX: 1,
} as const;

/** 权重归一化容差 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

/** 时间相关常量 */
export const TIME = {
  MILLISECONDS_PER_SECOND: 1000,
  SECONDS_PER_DAY: 86_400,
} as const;
