/**
 * 统一错误响应中间件
 *
 * AppError → { error, code, message, context, timestamp } + 对应 HTTP 状态码。
 * express.json 的解析失败映射为 MalformedBodyError（400），
 * 超出 JSON_BODY_LIMIT 映射为 InvalidMessageError（400）。
 */

import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import {
  InvalidMessageError,
  MalformedBodyError,
  wrapError,
  type AppError,
} from '../core/errors';
import { createModuleLogger } from '../core/logger';

const log = createModuleLogger('http-error');

/** body-parser 抛出的错误带有 type 字段 */
function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return undefined;
}

export function toHttpError(err: unknown): AppError {
  switch (bodyParserErrorType(err)) {
    case 'entity.parse.failed':
      return new MalformedBodyError();
    case 'entity.too.large':
      return new InvalidMessageError('Request body is too large');
    default:
      return wrapError(err);
  }
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const appError = toHttpError(err);
    if (appError.httpStatus >= 500) {
      log.error({ err, method: req.method, path: req.path }, `Request failed: ${appError.message}`);
    } else {
      log.debug({ method: req.method, path: req.path, code: appError.code }, `Request rejected: ${appError.message}`);
    }

    res.status(appError.httpStatus).json(appError.toJSON());
  };
}
