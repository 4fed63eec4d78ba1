import { logger } from '../utils/logger/index.js';
import type { BoundedNumberConfig } from './types.js';

/**
 * 读取字符串配置，未设置或空串时返回 null。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @returns 去除首尾空白后的字符串，或 null
 */
export function getStringConfig(env: NodeJS.ProcessEnv, envKey: string): string | null {
  const value = env[envKey];
  if (!value || value.trim() === '') {
    return null;
  }
  return value.trim();
}

/**
 * 读取数字配置，未设置、非有限数或小于最小值时返回 null。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @param minValue - 允许的最小值，默认为 0
 * @returns 解析后的数字，或 null
 */
export function getNumberConfig(
  env: NodeJS.ProcessEnv,
  envKey: string,
  minValue: number = 0,
): number | null {
  const value = env[envKey];
  if (!value || value.trim() === '') {
    return null;
  }
  const num = Number(value);
  if (!Number.isFinite(num) || num < minValue) {
    return null;
  }
  return num;
}

/**
 * 读取布尔配置，仅识别 'true'/'false'，其他值返回默认值。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @param defaultValue - 未设置或无法识别时的默认值，默认为 false
 * @returns 解析后的布尔值
 */
export function getBooleanConfig(
  env: NodeJS.ProcessEnv,
  envKey: string,
  defaultValue: boolean = false,
): boolean {
  const value = env[envKey];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalizedValue = value.trim().toLowerCase();
  if (normalizedValue === 'true') {
    return true;
  }
  if (normalizedValue === 'false') {
    return false;
  }
  logger.warn(`[配置] ${envKey}=${value} 无法识别，使用默认值 ${String(defaultValue)}`);
  return defaultValue;
}

/**
 * 读取带上下限的整数配置；未设置返回默认值，非整数或越界时告警并返回默认值。
 */
export function parseBoundedNumberConfig({
  env,
  envKey,
  defaultValue,
  min,
  max,
}: BoundedNumberConfig): number {
  const value = getNumberConfig(env, envKey, Number.NEGATIVE_INFINITY);
  if (value === null) {
    if (env[envKey] !== undefined && env[envKey]?.trim() !== '') {
      logger.warn(`[配置] ${envKey} 不是有效数字，使用默认值 ${defaultValue}`);
    }
    return defaultValue;
  }
  if (!Number.isInteger(value) || value < min || value > max) {
    logger.warn(`[配置] ${envKey}=${value} 超出范围 [${min}, ${max}]，使用默认值 ${defaultValue}`);
    return defaultValue;
  }
  return value;
}
