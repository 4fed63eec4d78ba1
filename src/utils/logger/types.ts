import type { LOG_LEVELS } from '../../constants/index.js';

/**
 * 日志对象接口
 * 用途：描述 pino 输出的单条结构化日志记录，供格式化器序列化输出
 * 数据来源：由 logger 各级别方法经 pino 序列化生成
 * 使用范围：仅 logger 模块内部使用
 */
export type LogObject = {
  readonly level: (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];
  readonly time: number;
  readonly msg: string;
  readonly extra?: unknown;
};

/**
 * Logger 接口定义
 * 用途：定义日志记录器的公开方法契约，供业务模块注入和调用
 * 数据来源：由 logger 模块默认实例实现；测试中可注入捕获型替身
 * 使用范围：全局使用，业务模块通过依赖注入获取实例
 */
export interface Logger {
  debug(msg: string, extra?: unknown): void;
  info(msg: string, extra?: unknown): void;
  warn(msg: string, extra?: unknown): void;
  error(msg: string, extra?: unknown): void;
}
