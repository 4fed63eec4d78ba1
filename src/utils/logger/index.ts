/**
 * 日志系统模块
 *
 * 功能：
 * - 基于 pino 的日志系统，支持 DEBUG/INFO/WARN/ERROR 级别
 * - 控制台输出带颜色高亮，WARN/ERROR 输出到 stderr
 * - 设置 LOG_DIR 时额外输出到按日期分割的纯文本文件
 *
 * 环境变量：
 * - DEBUG=true：开启调试日志
 * - LOG_DIR：日志文件目录（未设置时只输出到控制台）
 */

import pino from 'pino';
import fs from 'node:fs';
import path from 'node:path';
import { Writable } from 'node:stream';
import { inspect } from 'node:util';
import { LOG_LEVELS, LOGGING } from '../../constants/index.js';
import { isRecord, toUtcTimeLog } from '../primitives/index.js';
import type { LogObject, Logger } from './types.js';

const IS_DEBUG = process.env['DEBUG'] === 'true';
const LOG_DIR = process.env['LOG_DIR'];

// ANSI 颜色代码
export const colors = {
  reset: '\x1b[0m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
  green: '\x1b[32m',
  cyan: '\x1b[96m',
} as const;

const LEVEL_NAMES: Readonly<Record<number, string>> = {
  [LOG_LEVELS.DEBUG]: 'DEBUG',
  [LOG_LEVELS.INFO]: 'INFO',
  [LOG_LEVELS.WARN]: 'WARN',
  [LOG_LEVELS.ERROR]: 'ERROR',
};

const LEVEL_COLORS: Readonly<Record<number, string>> = {
  [LOG_LEVELS.DEBUG]: colors.gray,
  [LOG_LEVELS.WARN]: colors.yellow,
  [LOG_LEVELS.ERROR]: colors.red,
};

function isLogLevel(value: unknown): value is LogObject['level'] {
  return (
    value === LOG_LEVELS.DEBUG ||
    value === LOG_LEVELS.INFO ||
    value === LOG_LEVELS.WARN ||
    value === LOG_LEVELS.ERROR
  );
}

/**
 * 解析 pino 输出的 JSON 行，结构不符时返回 null
 */
function parseLogObject(text: string): LogObject | null {
  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed) || !isLogLevel(parsed['level'])) {
    return null;
  }
  const time = typeof parsed['time'] === 'number' ? parsed['time'] : Date.now();
  const msg = typeof parsed['msg'] === 'string' ? parsed['msg'] : '';
  return { level: parsed['level'], time, msg, extra: parsed['extra'] };
}

function formatExtra(extra: unknown): string {
  if (typeof extra === 'object') {
    try {
      return JSON.stringify(extra);
    } catch {
      return inspect(extra, { depth: 5, maxArrayLength: 100 });
    }
  }
  return inspect(extra, { depth: 5, maxArrayLength: 100 });
}

/**
 * 格式化单条日志，colored=false 时用于文件输出
 */
function formatLine(obj: LogObject, colored: boolean): string {
  const levelStr = `[${LEVEL_NAMES[obj.level] ?? 'INFO'}]`;
  const color = colored ? (LEVEL_COLORS[obj.level] ?? '') : '';
  const reset = color ? colors.reset : '';
  let line = `${color}${levelStr} ${toUtcTimeLog(new Date(obj.time))} ${obj.msg}${reset}`;
  if (obj.extra !== undefined && obj.extra !== null) {
    line += ` ${formatExtra(obj.extra)}`;
  }
  return `${line}\n`;
}

/**
 * 带超时保护的写入：缓冲区满时等待 drain，超时后继续，避免阻塞日志系统
 */
function writeWithDrainTimeout(
  stream: NodeJS.WritableStream,
  data: string,
  timeout: number,
  callback: () => void,
): void {
  if (stream.write(data)) {
    callback();
    return;
  }
  let settled = false;
  const finish = (): void => {
    if (settled) return;
    settled = true;
    clearTimeout(timer);
    stream.removeListener('drain', finish);
    callback();
  };
  const timer = setTimeout(finish, timeout);
  stream.once('drain', finish);
}

/**
 * 按日期分割的文件流（UTC 日期）
 */
class DateRotatingStream extends Writable {
  private readonly _logDir: string;
  private _currentDate: string | null = null;
  private _fileStream: fs.WriteStream | null = null;

  constructor(logDir: string) {
    super();
    this._logDir = logDir;
    fs.mkdirSync(this._logDir, { recursive: true });
  }

  private _ensureStream(): fs.WriteStream {
    const today = toUtcTimeLog().slice(0, 10);
    if (this._fileStream && this._currentDate === today) {
      return this._fileStream;
    }
    this._fileStream?.end();
    this._currentDate = today;
    const stream = fs.createWriteStream(path.join(this._logDir, `${today}.log`), {
      flags: 'a',
      encoding: 'utf8',
    });
    stream.on('error', (err) => {
      process.stderr.write(`[DateRotatingStream] 文件流错误: ${err.message}\n`);
    });
    this._fileStream = stream;
    return stream;
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    try {
      const obj = parseLogObject(chunk.toString());
      if (!obj) {
        callback();
        return;
      }
      writeWithDrainTimeout(this._ensureStream(), formatLine(obj, false), LOGGING.DRAIN_TIMEOUT_MS, callback);
    } catch (err) {
      process.stderr.write(`[DateRotatingStream] 写入失败: ${String(err)}\n`);
      callback();
    }
  }

  closeSync(): void {
    this._fileStream?.end();
    this._fileStream = null;
  }
}

// 控制台流（自定义格式）
const consoleStream = new Writable({
  write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
    try {
      const obj = parseLogObject(chunk.toString());
      if (!obj) {
        callback();
        return;
      }
      const target = obj.level >= LOG_LEVELS.WARN ? process.stderr : process.stdout;
      writeWithDrainTimeout(target, formatLine(obj, true), LOGGING.CONSOLE_DRAIN_TIMEOUT_MS, callback);
    } catch (err) {
      process.stderr.write(`[Logger Error] ${String(err)}\n`);
      callback();
    }
  },
});

const fileStream = LOG_DIR ? new DateRotatingStream(path.resolve(LOG_DIR)) : null;
const level = IS_DEBUG ? 'debug' : 'info';

const pinoLogger = pino(
  {
    level,
    customLevels: {
      debug: LOG_LEVELS.DEBUG,
      info: LOG_LEVELS.INFO,
      warn: LOG_LEVELS.WARN,
      error: LOG_LEVELS.ERROR,
    },
    useOnlyCustomLevels: true,
  },
  pino.multistream(
    fileStream
      ? [
        { level, stream: consoleStream },
        { level, stream: fileStream },
      ]
      : [{ level, stream: consoleStream }],
  ),
);

/**
 * 默认 logger 实例，业务模块未注入 logger 时使用
 */
export const logger: Logger = {
  debug(msg: string, extra?: unknown): void {
    if (!IS_DEBUG) {
      return;
    }
    if (extra == null) {
      pinoLogger.debug(msg);
    } else {
      pinoLogger.debug({ extra }, msg);
    }
  },

  info(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.info(msg);
    } else {
      pinoLogger.info({ extra }, msg);
    }
  },

  warn(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.warn(msg);
    } else {
      pinoLogger.warn({ extra }, msg);
    }
  },

  error(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.error(msg);
    } else {
      pinoLogger.error({ extra }, msg);
    }
  },
};

/**
 * 同步刷新并关闭日志流（进程退出前调用）
 */
export function flushLogger(): void {
  try {
    pinoLogger.flush();
    fileStream?.closeSync();
  } catch (err) {
    process.stderr.write(`[Logger] 同步清理过程出错: ${String(err)}\n`);
  }
}
