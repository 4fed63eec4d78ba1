/**
 * 引擎运行配置。
 * 类型用途：由环境变量解析得到的运行参数，作为 createEngineConfig 返回类型。
 * 数据来源：process.env（入口通过 dotenv 加载 .env）。
 * 使用范围：入口 main 与各组件工厂的默认参数。
 */
export type EngineConfig = {
  /** 策略配置文件路径（已解析为绝对路径） */
  readonly strategyConfigPath: string;
  /** 文件变更防抖窗口（毫秒） */
  readonly reloadDebounceMs: number;
  /** 是否监听配置文件变更 */
  readonly watchEnabled: boolean;
  /** 表达式编译缓存容量 */
  readonly expressionCacheSize: number;
  /** 文件事件队列容量 */
  readonly reloadQueueCapacity: number;
};

/**
 * 带上下限的数值配置读取参数。
 * 类型用途：作为 parseBoundedNumberConfig 的入参，从环境变量读取并校验范围内的数值。
 * 数据来源：调用方从 process.env 及配置键传入。
 * 使用范围：仅 config 模块内部使用。
 */
export type BoundedNumberConfig = {
  readonly env: NodeJS.ProcessEnv;
  readonly envKey: string;
  readonly defaultValue: number;
  readonly min: number;
  readonly max: number;
};
