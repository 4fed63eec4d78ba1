/**
 * 测试替身与工厂（testDoubles）
 *
 * 功能：
 * - 捕获型 logger、可控时钟、文件监听替身、可挂起的配置加载器
 * - 供 core / services / integration 测试共用
 */
import type { ConfigReloader, WatcherFactory } from '../../src/core/configReloader/types.js';
import type { ConfigLoader } from '../../src/services/configLoader/types.js';
import type { StrategyConfiguration } from '../../src/types/strategyConfig.js';
import type { Logger } from '../../src/utils/logger/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogEntry = {
  readonly level: LogLevel;
  readonly msg: string;
  readonly extra: unknown;
};

export type CapturingLogger = Logger & {
  readonly entries: LogEntry[];
  readonly messages: (level: LogLevel) => string[];
};

/**
 * 创建捕获型 logger：记录全部级别（含 debug），不输出到控制台。
 */
export function createCapturingLogger(): CapturingLogger {
  const entries: LogEntry[] = [];
  const record =
    (level: LogLevel) =>
    (msg: string, extra?: unknown): void => {
      entries.push({ level, msg, extra });
    };

  return {
    entries,
    messages: (level: LogLevel) =>
      entries.filter((entry) => entry.level === level).map((entry) => entry.msg),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

export type FakeClock = {
  readonly now: () => number;
  readonly set: (ms: number) => void;
  readonly advance: (ms: number) => void;
};

export function createFakeClock(start: number = 0): FakeClock {
  let current = start;
  return {
    now: () => current,
    set: (ms: number) => {
      current = ms;
    },
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export type WatcherDouble = {
  readonly factory: WatcherFactory;
  /** 模拟目录内文件变更 */
  readonly emit: (fileName: string | null) => void;
  readonly getDirectory: () => string | null;
  readonly isClosed: () => boolean;
};

/**
 * 创建文件监听替身，替代 fs.watch。
 */
export function createWatcherDouble(): WatcherDouble {
  let directory: string | null = null;
  let listener: ((fileName: string | null) => void) | null = null;
  let closed = false;

  const factory: WatcherFactory = (dir, onChange) => {
    directory = dir;
    listener = onChange;
    closed = false;
    return {
      close: () => {
        closed = true;
        listener = null;
      },
    };
  };

  return {
    factory,
    emit: (fileName: string | null) => {
      listener?.(fileName);
    },
    getDirectory: () => directory,
    isClosed: () => closed,
  };
}

export type Deferred<T> = {
  readonly promise: Promise<T>;
  readonly resolve: (value: T) => void;
};

export function createDeferred<T>(): Deferred<T> {
  let resolveFn: ((value: T) => void) | null = null;
  const promise = new Promise<T>((resolve) => {
    resolveFn = resolve;
  });
  return {
    promise,
    resolve: (value: T) => {
      resolveFn?.(value);
    },
  };
}

/**
 * 让出事件循环若干轮（setImmediate），等待文件读取等异步步骤推进。
 */
export async function flushImmediates(rounds: number = 1): Promise<void> {
  for (let i = 0; i < rounds; i += 1) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export type LoaderDouble = {
  readonly loader: ConfigLoader;
  readonly getCallCount: () => number;
  /** 挂起下一次 loadFromFile，直到返回的 deferred 被 resolve */
  readonly holdNextLoad: () => Deferred<void>;
};

/**
 * 包装真实加载器：统计调用次数，并可挂起单次加载以构造并发场景。
 */
export function createLoaderDouble(inner: ConfigLoader): LoaderDouble {
  let callCount = 0;
  let nextGate: Promise<void> | null = null;

  return {
    loader: {
      loadFromFile: async (filePath: string) => {
        callCount += 1;
        const gate = nextGate;
        nextGate = null;
        if (gate) {
          await gate;
        }
        return inner.loadFromFile(filePath);
      },
      parseDocument: inner.parseDocument,
    },
    getCallCount: () => callCount,
    holdNextLoad: () => {
      const deferred = createDeferred<void>();
      nextGate = deferred.promise;
      return deferred;
    },
  };
}

/**
 * 固定配置的重载器替身，只提供决策引擎需要的读取接口。
 */
export function createStaticReloaderDouble(
  config: StrategyConfiguration,
  version: number = 1,
): Pick<ConfigReloader, 'withCurrent' | 'getVersion'> {
  return {
    withCurrent: async <T>(fn: (current: StrategyConfiguration) => T | Promise<T>): Promise<T> =>
      fn(config),
    getVersion: () => version,
  };
}
