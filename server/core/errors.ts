/**
 * Chat Relay — 统一错误体系
 * 分层错误类 + 错误码 + 自动 HTTP 状态码映射
 *
 * 使用方式：
 *   import { InvalidMessageError, StorageUnavailableError } from '../core/errors';
 *   throw new InvalidMessageError('content must not be blank', { issues });
 *   throw new StorageUnavailableError('insert', err);
 */

// ============================================
// 错误码枚举
// ============================================

export enum ErrorCode {
  // 通用错误 (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  SERVICE_UNAVAILABLE = 1003,

  // 验证错误 (2xxx)
  VALIDATION = 2000,
  INVALID_MESSAGE = 2001,
  MALFORMED_BODY = 2002,

  // 存储错误 (3xxx)
  STORAGE_UNAVAILABLE = 3000,

  // 推送通道 (4xxx)
  LISTENER_OVERRUN = 4000,
  TRANSPORT_CLOSED = 4001,

  // 启动配置 (9xxx)
  CONFIGURATION = 9000,
}

// 错误码到 HTTP 状态码的映射
const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.UNKNOWN]: 500,
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.INVALID_MESSAGE]: 400,
  [ErrorCode.MALFORMED_BODY]: 400,
  [ErrorCode.STORAGE_UNAVAILABLE]: 503,
  [ErrorCode.LISTENER_OVERRUN]: 500,
  // 客户端主动断开，不会真正写回响应
  [ErrorCode.TRANSPORT_CLOSED]: 499,
  [ErrorCode.CONFIGURATION]: 500,
};

// ============================================
// 基础错误类
// ============================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Record<string, unknown> = {},
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code];
    this.context = context;
    this.timestamp = new Date().toISOString();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /** 序列化为 API 响应格式 */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================
// 具体错误类
// ============================================

/** 消息校验失败：客户端错误，不落库、不广播、不应自动重试 */
export class InvalidMessageError extends AppError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.INVALID_MESSAGE, context);
  }
}

/** 请求体无法解析为 JSON */
export class MalformedBodyError extends AppError {
  constructor(message = 'Request body is not valid JSON', context: Record<string, unknown> = {}) {
    super(message, ErrorCode.MALFORMED_BODY, context);
  }
}

/**
 * 存储层不可用（打开/读/写失败）。
 * 对客户端而言是可重试的服务端错误，重试时必须沿用同一个消息 id。
 */
export class StorageUnavailableError extends AppError {
  constructor(operation: string, cause?: unknown, context: Record<string, unknown> = {}) {
    const reason = cause instanceof Error ? cause.message : cause !== undefined ? String(cause) : 'unknown failure';
    super(`Storage unavailable during ${operation}: ${reason}`, ErrorCode.STORAGE_UNAVAILABLE, { operation, ...context });
  }
}

/** 监听者缓冲区写满被摘除；只会以终止事件的形式出现在该监听者自己的流上 */
export class ListenerOverrunError extends AppError {
  constructor(listenerId: number, capacity: number) {
    super(
      `Listener fell more than ${capacity} messages behind and was disconnected`,
      ErrorCode.LISTENER_OVERRUN,
      { listenerId, capacity },
    );
  }
}

/** 连接正常关闭（客户端断开 / 服务端关停），属于生命周期事件而非故障 */
export class TransportClosedError extends AppError {
  constructor(reason: 'client' | 'shutdown', context: Record<string, unknown> = {}) {
    super(`Transport closed by ${reason}`, ErrorCode.TRANSPORT_CLOSED, { reason, ...context });
  }
}

/** 启动配置错误：唯一允许导致进程退出的错误 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, ErrorCode.CONFIGURATION, { issues }, false);
    this.issues = issues;
  }
}

// ============================================
// 错误处理工具
// ============================================

/** 判断是否为 AppError */
export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

/** 将未知错误包装为 AppError */
export function wrapError(err: unknown, context: Record<string, unknown> = {}): AppError {
  if (isAppError(err)) return err;

  if (err instanceof Error) {
    return new AppError(err.message, ErrorCode.INTERNAL, {
      originalName: err.name,
      ...context,
    });
  }

  return new AppError(String(err), ErrorCode.UNKNOWN, context);
}
