/**
 * 策略配置加载器
 *
 * 流程：
 * 1. 读取文件并 JSON 解析（失败 → ConfigLoadError）
 * 2. 递归移除 _comment* 键
 * 3. 结构校验：ajv 编译 schemas/strategyConfig.schema.json（失败 → ConfigLoadError）
 * 4. 映射为领域对象，同时做条件树层面的语义检查
 * 5. 语义校验：引用、取值范围（失败 → ConfigValidationError，携带全部问题）
 * 6. 深度冻结后返回
 *
 * 加载器本身无状态，可在锁外执行；是否替换当前配置由 configReloader 决定。
 */
import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import Ajv from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { ConfigLoadError, ConfigValidationError, formatError } from '../../utils/error/index.js';
import type { ConfigIssue } from '../../utils/error/types.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import { deepFreeze, isRecord } from '../../utils/primitives/index.js';
import type { StrategyConfiguration } from '../../types/strategyConfig.js';
import { buildConfiguration } from './builder.js';
import type { ConfigLoader, ConfigLoaderDeps, StrategyConfigDocument } from './types.js';
import { formatSchemaErrors, stripCommentKeys } from './utils.js';
import { validateConfiguration } from './validator.js';

export { getConfigCounts, stripCommentKeys } from './utils.js';

const DEFAULT_SCHEMA_URL = new URL('../../../schemas/strategyConfig.schema.json', import.meta.url);

function readSchema(schemaPath: string | URL): SchemaObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(schemaPath, 'utf8'));
  } catch (err) {
    throw new ConfigLoadError(`无法读取配置 schema：${formatError(err)}`, String(schemaPath), {
      cause: err,
    });
  }
  if (!isRecord(parsed)) {
    throw new ConfigLoadError('配置 schema 必须是 JSON 对象', String(schemaPath));
  }
  const schema: SchemaObject = {};
  for (const [key, value] of Object.entries(parsed)) {
    schema[key] = value;
  }
  return schema;
}

function compileSchema(schemaPath: string | URL): ValidateFunction<StrategyConfigDocument> {
  const ajv = new Ajv.default({ allErrors: true, allowUnionTypes: true });
  return ajv.compile<StrategyConfigDocument>(readSchema(schemaPath));
}

export function createConfigLoader(deps: ConfigLoaderDeps): ConfigLoader {
  const { expressionEngine, logger = defaultLogger, schemaPath = DEFAULT_SCHEMA_URL } = deps;
  const validateDocument = compileSchema(schemaPath);

  function parseDocument(raw: unknown, source: string | null = null): StrategyConfiguration {
    const stripped = stripCommentKeys(raw);
    if (!validateDocument(stripped)) {
      throw new ConfigLoadError(
        `配置结构校验失败：${formatSchemaErrors(validateDocument.errors)}`,
        source,
      );
    }

    const issues: ConfigIssue[] = [];
    const config = buildConfiguration(stripped, expressionEngine, issues);
    validateConfiguration(config, issues);
    if (issues.length > 0) {
      throw new ConfigValidationError(issues);
    }

    logger.debug(
      `[配置加载] 校验通过 schema=${config.schemaVersion} 指标=${config.indicators.length} ` +
        `regime=${config.regimes.length} 策略=${config.strategies.length} ` +
        `策略集=${config.strategySets.length} 路由=${config.routing.length}`,
    );
    return deepFreeze(config);
  }

  async function loadFromFile(filePath: string): Promise<StrategyConfiguration> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (err) {
      throw new ConfigLoadError(`无法读取配置文件：${formatError(err)}`, filePath, { cause: err });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigLoadError(`配置文件不是合法 JSON：${formatError(err)}`, filePath, {
        cause: err,
      });
    }
    return parseDocument(raw, filePath);
  }

  return {
    loadFromFile,
    parseDocument,
  };
}
