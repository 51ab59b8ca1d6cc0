/**
 * Chat Relay — 统一日志框架
 * 基于自定义 Logger 的结构化日志系统，替代散落的 console.log
 *
 * 使用方式：
 *   import { createModuleLogger } from '../core/logger';
 *   const log = createModuleLogger('broadcast-hub');
 *   log.info({ listenerId }, 'Listener registered');
 *   log.error({ err }, 'Commit failed');
 */

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

interface LogEntry {
  level: LogLevel;
  module: string;
  timestamp: string;
  message: string;
  [key: string]: unknown;
}

interface LoggerOptions {
  level?: LogLevel;
  module?: string;
  pretty?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',   // gray
  debug: '\x1b[36m',   // cyan
  info: '\x1b[32m',    // green
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
  fatal: '\x1b[35m',   // magenta
};

const RESET = '\x1b[0m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/** Error 对象不可直接 JSON 序列化，转换为普通对象 */
function serializeError(err: Error): Record<string, unknown> {
  return { name: err.name, message: err.message, stack: err.stack };
}

// ============================================
// Logger 核心类
// ============================================

class Logger {
  /**
   * 不在实例上固化级别快照，通过 getter 动态读取 Logger.globalLevel，
   * 保证 setGlobalLevel() 对已创建的实例同样生效。
   */
  private overrideLevel: number | null;
  private module: string;
  private pretty: boolean;
  // logger 是最早初始化的模块，在 config 加载之前就可能被使用，因此保留 process.env 作为引导 fallback
  private static globalLevel: LogLevel = initialLevel();

  constructor(options: LoggerOptions = {}) {
    this.overrideLevel = options.level ? LOG_LEVELS[options.level] : null;
    this.module = options.module || 'app';
    this.pretty = options.pretty ?? (process.env.NODE_ENV !== 'production');
  }

  private get effectiveLevel(): number {
    return this.overrideLevel ?? LOG_LEVELS[Logger.globalLevel];
  }

  /** 设置全局日志级别 */
  static setGlobalLevel(level: LogLevel): void {
    Logger.globalLevel = level;
  }

  /** 创建子日志器（继承模块前缀） */
  child(subModule: string): Logger {
    return new Logger({
      module: `${this.module}:${subModule}`,
      pretty: this.pretty,
    });
  }

  trace(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('trace', data, message);
  }

  debug(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('debug', data, message);
  }

  info(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('info', data, message);
  }

  warn(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('warn', data, message);
  }

  error(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('error', data, message);
  }

  fatal(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('fatal', data, message);
  }

  private log(level: LogLevel, data: Record<string, unknown> | string, message?: unknown): void {
    if (LOG_LEVELS[level] < this.effectiveLevel) return;

    const timestamp = new Date().toISOString();
    let msg: string;
    let extra: Record<string, unknown> = {};

    if (typeof data === 'string') {
      msg = data;
      // 第二参数是非字符串值（如 Error 对象）时附加到 extra
      if (message !== undefined && typeof message !== 'string') {
        extra = { err: message instanceof Error ? serializeError(message) : message };
      }
    } else {
      msg = typeof message === 'string' ? message : (message !== undefined ? String(message) : '');
      extra = data.err instanceof Error ? { ...data, err: serializeError(data.err) } : data;
    }

    const entry: LogEntry = {
      level,
      module: this.module,
      timestamp,
      message: msg,
      ...extra,
    };

    if (this.pretty) {
      this.prettyPrint(level, timestamp, msg, extra);
    } else {
      // 生产环境输出 JSON 结构化日志
      const output = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
      output.write(JSON.stringify(entry) + '\n');
    }
  }

  private prettyPrint(
    level: LogLevel,
    timestamp: string,
    msg: string,
    extra: Record<string, unknown>,
  ): void {
    const color = LEVEL_COLORS[level];
    const time = timestamp.slice(11, 23); // HH:mm:ss.SSS
    const levelStr = level.toUpperCase().padEnd(5);
    const moduleStr = `[${this.module}]`;

    let extraStr = '';
    if (Object.keys(extra).length > 0) {
      const { err, ...rest } = extra;
      if (err && typeof err === 'object' && 'stack' in err && typeof err.stack === 'string') {
        extraStr = `\n  ${err.stack}`;
        if (Object.keys(rest).length > 0) {
          extraStr += `\n  ${JSON.stringify(rest)}`;
        }
      } else {
        extraStr = ` ${JSON.stringify(extra)}`;
      }
    }

    const output = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
    output.write(`${color}${time} ${levelStr}${RESET} ${moduleStr} ${msg}${extraStr}\n`);
  }
}

// ============================================
// 导出 API
// ============================================

/** 创建模块级日志器 */
export function createModuleLogger(module: string): Logger {
  return new Logger({ module });
}

/** 设置全局日志级别 */
export function setLogLevel(level: LogLevel): void {
  Logger.setGlobalLevel(level);
}

export { Logger };
export type { LogLevel };
