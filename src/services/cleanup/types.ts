import type { ConfigReloader } from '../../core/configReloader/types.js';

/**
 * 清理上下文。
 * 类型用途：作为 createCleanup 的入参，封装程序退出时需要停止与释放的资源引用。
 * 数据来源：由主入口构造并传入 createCleanup。
 * 使用范围：仅 cleanup 模块内部使用。
 */
export type CleanupContext = {
  readonly reloader: Pick<ConfigReloader, 'stop'>;
  /** 退出前刷新日志缓冲 */
  readonly flushLogs: () => void;
  /** 进程退出函数，测试中注入 */
  readonly exit?: ((code: number) => void) | undefined;
};

/**
 * 清理器接口。
 * - execute：按顺序执行清理步骤，任一步骤失败不影响后续步骤，最后汇总抛出
 * - registerExitHandlers：注册 SIGINT / SIGTERM，只执行一次
 */
export interface Cleanup {
  readonly execute: () => Promise<void>;
  readonly registerExitHandlers: () => void;
}
