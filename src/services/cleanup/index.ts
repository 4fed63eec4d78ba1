/**
 * 程序退出清理模块
 *
 * 功能：
 * - 停止配置重载器（关闭文件监听，等待进行中的重载结束）
 * - 刷新日志缓冲
 * - 注册 SIGINT 和 SIGTERM 信号处理器
 */
import { logger } from '../../utils/logger/index.js';
import { formatError } from '../../utils/error/index.js';
import type { Cleanup, CleanupContext } from './types.js';

export function createCleanup(context: CleanupContext): Cleanup {
  const { reloader, flushLogs, exit = (code: number) => process.exit(code) } = context;
  let isExiting = false;

  async function execute(): Promise<void> {
    logger.info('[Cleanup] 程序退出，开始清理资源');
    const failures: Array<{ readonly step: string; readonly error: unknown }> = [];

    const runStep = async (step: string, handler: () => Promise<void> | void): Promise<void> => {
      try {
        await handler();
      } catch (err) {
        failures.push({ step, error: err });
        logger.error(`[Cleanup] ${step} 失败: ${formatError(err)}`);
      }
    };

    await runStep('停止配置重载器', async () => {
      await reloader.stop();
    });
    await runStep('刷新日志', () => {
      flushLogs();
    });

    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((item) => item.error),
        `[Cleanup] 资源清理失败，共 ${failures.length} 处`,
      );
    }
  }

  function registerExitHandlers(): void {
    const handler = (): void => {
      if (isExiting) {
        return;
      }
      isExiting = true;
      void execute()
        .then(() => {
          exit(0);
        })
        .catch((err: unknown) => {
          logger.error('[Cleanup] 程序退出清理失败', formatError(err));
          exit(1);
        });
    };
    process.once('SIGINT', handler);
    process.once('SIGTERM', handler);
  }

  return {
    execute,
    registerExitHandlers,
  };
}
