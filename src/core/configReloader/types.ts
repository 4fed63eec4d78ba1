import type { ConfigLoader } from '../../services/configLoader/types.js';
import type { ConfigCounts, StrategyConfiguration } from '../../types/strategyConfig.js';
import type { Logger } from '../../utils/logger/types.js';

/**
 * 重载触发来源。
 * - initial：首次加载
 * - manual：调用 reload()
 * - file_change：文件变更事件（经队列与防抖）
 */
export type ReloadTrigger = 'initial' | 'manual' | 'file_change';

/**
 * 重载器状态：idle 表示持有（或尚未持有）配置且无重载进行；validating 表示正在锁外校验候选配置。
 */
export type ConfigReloaderState = 'idle' | 'validating';

/**
 * 文件变更事件（队列元素）。
 * receivedAt 为事件进入队列的时刻（毫秒），防抖按此时间判断。
 */
export type FileChangeEvent = {
  readonly path: string;
  readonly receivedAt: number;
};

/**
 * 重载结果通知。
 * 类型用途：订阅者接收的前后摘要；失败时 error 为可读原因，旧配置继续生效。
 * 使用范围：展示层、日志、测试断言。
 */
export type ReloadEvent = {
  readonly success: boolean;
  readonly trigger: ReloadTrigger;
  /** 通知时刻生效的配置版本（失败时为未变化的旧版本） */
  readonly version: number;
  readonly oldCounts: ConfigCounts | null;
  readonly newCounts: ConfigCounts | null;
  readonly schemaVersion: string | null;
  readonly error?: string | undefined;
};

export type ReloadListener = (event: ReloadEvent) => void;

/**
 * 文件监听句柄。
 */
export interface ConfigWatcher {
  readonly close: () => void;
}

/**
 * 文件监听工厂：监听目录，变更时回调文件名（平台不提供时为 null）。
 * 测试中注入假实现，手动触发回调。
 */
export type WatcherFactory = (
  directory: string,
  onChange: (fileName: string | null) => void,
) => ConfigWatcher;

/**
 * 有界事件队列。
 * 容量满时丢弃最旧事件，保证最新变更一定会被处理。
 */
export interface ReloadEventQueue {
  /** 入队；返回因容量满被丢弃的旧事件（无则 null） */
  readonly push: (event: FileChangeEvent) => FileChangeEvent | null;
  readonly pop: () => FileChangeEvent | null;
  readonly size: () => number;
  readonly isEmpty: () => boolean;
  readonly clear: () => void;
  readonly onEventAdded: (callback: () => void) => void;
}

export type ConfigReloaderDeps = {
  readonly configPath: string;
  readonly loader: ConfigLoader;
  /** 防抖窗口（毫秒），默认 RELOAD.DEFAULT_DEBOUNCE_MS */
  readonly debounceMs?: number | undefined;
  /** 事件队列容量，默认 RELOAD.DEFAULT_QUEUE_CAPACITY */
  readonly queueCapacity?: number | undefined;
  /** start() 时是否启动文件监听，默认 true */
  readonly watchEnabled?: boolean | undefined;
  readonly watcherFactory?: WatcherFactory | undefined;
  /** 时钟（毫秒），测试注入 */
  readonly now?: (() => number) | undefined;
  readonly logger?: Logger | undefined;
};

/**
 * 配置重载器接口
 *
 * 持有当前配置，通过读写锁保护替换；校验在锁外完成，失败保留旧配置。
 */
export interface ConfigReloader {
  /** 首次加载；失败直接抛出 */
  readonly load: () => Promise<StrategyConfiguration>;
  /** 手动重载（不经防抖）；失败不抛出，结果见返回的事件 */
  readonly reload: () => Promise<ReloadEvent>;
  /** 文件变更生产者：非目标文件忽略，其余进入有界队列 */
  readonly notifyFileChange: (filePath: string) => void;
  /** 当前配置引用（未加载时为 null） */
  readonly getCurrent: () => StrategyConfiguration | null;
  readonly getVersion: () => number;
  readonly getState: () => ConfigReloaderState;
  /** 持有读锁期间执行 fn，保证 fn 内看到的配置不被替换 */
  readonly withCurrent: <T>(fn: (config: StrategyConfiguration) => T | Promise<T>) => Promise<T>;
  /** 订阅重载结果，返回取消订阅函数 */
  readonly subscribe: (listener: ReloadListener) => () => void;
  /** 启动队列消费与文件监听 */
  readonly start: () => void;
  /** 停止监听与消费，等待进行中的处理结束 */
  readonly stop: () => Promise<void>;
  /** 等待队列清空且无处理进行（测试与优雅退出用） */
  readonly waitForIdle: () => Promise<void>;
}
