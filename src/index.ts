/**
 * 市场状态 / 策略决策引擎 - 主入口模块
 *
 * 系统概述：
 * - 以 JSON 规则配置描述指标、市场状态（regime）、策略、策略集与路由规则
 * - 每根 K 线根据指标快照判断同时激活的 regime，路由到唯一策略集并给出入场/出场信号
 * - 规则配置支持热重载：防抖、锁外两阶段校验、写锁内原子替换，失败保留旧配置
 *
 * 启动流程：
 * 1. 读取 .env.local 与环境变量，构建运行配置
 * 2. 创建表达式引擎、配置加载器与重载器，完成首次加载（失败即退出）
 * 3. 订阅重载事件并启动文件监听
 * 4. 注册退出清理
 *
 * 指标快照由上游行情/指标模块提供，通过 createDecisionEngine().evaluateBar() 接入。
 */
import dotenv from 'dotenv';
import { createEngineConfig } from './config/config.index.js';
import { createConfigReloader } from './core/configReloader/index.js';
import { createExpressionEngine } from './core/expressionEngine/index.js';
import { createCleanup } from './services/cleanup/index.js';
import { createConfigLoader } from './services/configLoader/index.js';
import { formatError } from './utils/error/index.js';
import { flushLogger, logger } from './utils/logger/index.js';

dotenv.config({ path: '.env.local' });

async function main(): Promise<void> {
  const engineConfig = createEngineConfig({ env: process.env });
  logger.info(`[启动] 策略配置文件：${engineConfig.strategyConfigPath}`);

  const expressionEngine = createExpressionEngine({ cacheSize: engineConfig.expressionCacheSize });
  const loader = createConfigLoader({ expressionEngine });
  const reloader = createConfigReloader({
    configPath: engineConfig.strategyConfigPath,
    loader,
    debounceMs: engineConfig.reloadDebounceMs,
    queueCapacity: engineConfig.reloadQueueCapacity,
    watchEnabled: engineConfig.watchEnabled,
  });

  const config = await reloader.load();
  logger.info(
    `[启动] 配置加载完成 schema=${config.schemaVersion} regime=${config.regimes.length} ` +
      `策略=${config.strategies.length} 策略集=${config.strategySets.length}`,
  );

  reloader.subscribe((event) => {
    if (event.success) {
      logger.info(`[启动] 配置已更新 version=${event.version}`, {
        oldCounts: event.oldCounts,
        newCounts: event.newCounts,
      });
    } else {
      logger.warn(`[启动] 配置重载失败，继续使用 version=${event.version}：${event.error ?? '未知错误'}`);
    }
  });

  reloader.start();

  const cleanup = createCleanup({ reloader, flushLogs: flushLogger });
  cleanup.registerExitHandlers();
}

// 启动程序
try {
  await main();
} catch (err: unknown) {
  logger.error('程序异常退出', formatError(err));
  flushLogger();
  process.exit(1);
}
