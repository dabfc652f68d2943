/**
 * Express middleware: async wrapper, request logging, 404 and error handlers.
 */
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { AppError, PayloadTooLargeError, ValidationError, errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('api');

/**
 * Forward rejections from async route handlers to the error handler.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    const message = `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`;
    if (res.statusCode >= 400) {
      logger.warn(message);
    } else {
      logger.debug(message);
    }
  });
  next();
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: `Route not found: ${req.method} ${req.path}` });
}

function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

function toAppError(error: unknown): AppError | undefined {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE'
      ? new PayloadTooLargeError('File exceeds the maximum upload size')
      : new ValidationError('Upload rejected', error.message);
  }
  if (isJsonSyntaxError(error)) {
    return new ValidationError('Malformed JSON body');
  }
  return undefined;
}

/**
 * Registered last. Known errors keep their status; anything else is a 500
 * with a generic body.
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  const appError = toAppError(error);
  if (appError) {
    if (appError.statusCode >= 500) {
      logger.error(`${req.method} ${req.path}: ${appError.message}`);
    }
    res.status(appError.statusCode).json(appError.toJSON());
    return;
  }

  logger.error(`${req.method} ${req.path} failed:`, errorMessage(error));
  res.status(500).json({ error: 'Internal server error' });
};
