import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, logger } from '../utils';
import { env } from '../config';
import { toValidationIssues } from './validateRequest';

/**
 * body-parser reports malformed JSON and oversized bodies with a `status`
 * and a `type` on the error object.
 */
interface BodyParserError extends Error {
  status: number;
  type: string;
}

const isBodyParserError = (err: Error): err is BodyParserError =>
  'status' in err && typeof err.status === 'number' && 'type' in err && typeof err.type === 'string';

/**
 * Maps anything thrown in a route onto an AppError.
 */
const normalizeError = (err: Error): AppError => {
  if (err instanceof AppError) {
    return err;
  }

  if (err instanceof ZodError) {
    return AppError.badRequest('Validation failed', toValidationIssues(err));
  }

  if (isBodyParserError(err)) {
    if (err.type === 'entity.too.large') {
      return AppError.payloadTooLarge();
    }
    if (err.type === 'entity.parse.failed') {
      return AppError.badRequest('Malformed JSON body');
    }
  }

  return AppError.internal('Internal Server Error');
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const appError = normalizeError(err);

  if (!appError.isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${appError.message}`);
  }

  res.status(appError.statusCode).json({
    success: false,
    error: appError.message,
    ...(appError.details && { details: appError.details }),
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
