/**
 * 配置重载测试装配：临时配置文件 + 真实加载器（可挂起）+ 可控时钟 + 捕获型 logger
 */
import { createConfigReloader } from '../../../src/core/configReloader/index.js';
import type { ConfigReloader, ConfigReloaderDeps } from '../../../src/core/configReloader/types.js';
import { createExpressionEngine } from '../../../src/core/expressionEngine/index.js';
import { createConfigLoader } from '../../../src/services/configLoader/index.js';
import { createTempConfigFile } from '../../helpers/strategyDocuments.js';
import type { TempConfigFile } from '../../helpers/strategyDocuments.js';
import {
  createCapturingLogger,
  createFakeClock,
  createLoaderDouble,
} from '../../helpers/testDoubles.js';
import type { CapturingLogger, FakeClock, LoaderDouble } from '../../helpers/testDoubles.js';

export type ReloaderHarness = {
  readonly file: TempConfigFile;
  readonly logger: CapturingLogger;
  readonly clock: FakeClock;
  readonly loaderDouble: LoaderDouble;
  readonly reloader: ConfigReloader;
  /** 停止重载器并删除临时目录 */
  readonly dispose: () => Promise<void>;
};

export async function createReloaderHarness(
  overrides: Partial<Omit<ConfigReloaderDeps, 'configPath' | 'loader'>> = {},
): Promise<ReloaderHarness> {
  const file = await createTempConfigFile();
  const logger = createCapturingLogger();
  const clock = createFakeClock(0);
  const loaderDouble = createLoaderDouble(
    createConfigLoader({ expressionEngine: createExpressionEngine({ logger }), logger }),
  );
  const reloader = createConfigReloader({
    configPath: file.filePath,
    loader: loaderDouble.loader,
    now: clock.now,
    logger,
    watchEnabled: false,
    ...overrides,
  });

  let stopped = false;
  return {
    file,
    logger,
    clock,
    loaderDouble,
    reloader,
    dispose: async () => {
      if (!stopped) {
        stopped = true;
        await reloader.stop();
      }
      await file.cleanup();
    },
  };
}
