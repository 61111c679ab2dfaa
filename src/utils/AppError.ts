import type { ValidationIssue } from '../types';

/**
 * Operational error carrying the HTTP status it should be reported with.
 * `details` lists the offending fields when a request fails validation.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: ValidationIssue[];

  constructor(message: string, statusCode: number, isOperational = true, details?: ValidationIssue[]) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static badRequest(message: string, details?: ValidationIssue[]): AppError {
    return new AppError(message, 400, true, details);
  }

  static payloadTooLarge(message = 'Request body too large'): AppError {
    return new AppError(message, 413);
  }

  static tooManyRequests(message = 'Too many requests'): AppError {
    return new AppError(message, 429);
  }

  static internal(message = 'Internal server error'): AppError {
    return new AppError(message, 500, false);
  }
}

export default AppError;
