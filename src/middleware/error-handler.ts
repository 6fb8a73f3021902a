import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import { AppError, MESSAGES, createBadRequestError, createNotFoundError, createUnexpectedError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { redactPayload, requestUrl } from './request-context.js';

/**
 * Error envelope returned for every failed request
 */
export interface ErrorResponse {
  message: string;
}

const LOG_LABELS: Record<number, string> = {
  400: 'Bad request',
  401: 'Unauthorized',
  404: 'Not found',
};

/**
 * body-parser reports unparseable JSON as a SyntaxError tagged with a status
 */
const isBodyParseError = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

/**
 * Any other body-parser rejection (too large, bad encoding or charset,
 * aborted upload) carries a string type and a 4xx status
 */
const isBodyRejection = (err: Error): boolean => {
  if (!('type' in err) || typeof err.type !== 'string') return false;

  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500;
};

const toHttpError = (err: Error): AppError => {
  if (err instanceof AppError) {
    return err;
  }
  if (isBodyParseError(err)) {
    return createBadRequestError(MESSAGES.malformedBody);
  }
  if (isBodyRejection(err)) {
    return createBadRequestError(MESSAGES.rejectedBody);
  }
  return createUnexpectedError();
};

/**
 * Global error handling middleware. Renders `{ message: "<cause>: <url>" }`
 * and logs the request payload; internal details stay in the log.
 */
export const createErrorHandler = (log: Logger): ErrorRequestHandler =>
  (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const httpError = toHttpError(err);
    const payload = redactPayload(req.body);

    if (httpError.isOperational) {
      log.error(`${LOG_LABELS[httpError.statusCode] ?? 'Request failed'}: '${JSON.stringify(payload) ?? ''}'`, {
        kind: httpError.kind,
        method: req.method,
        path: req.path,
      });
    } else {
      log.error(`Error: '${JSON.stringify(payload) ?? ''}'`, {
        method: req.method,
        path: req.path,
        error: err.message,
        stack: err.stack,
      });
    }

    const body: ErrorResponse = { message: `${httpError.message}: ${requestUrl(req)}` };
    res.status(httpError.statusCode).json(body);
  };

/**
 * 404 handler - must come after all other routes
 */
export const notFoundHandler: RequestHandler = (_req, _res, next) => {
  next(createNotFoundError());
};
