import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema } from 'zod';
import { AppError } from '../utils';
import type { ValidationIssue } from '../types';

interface ValidationSchemas {
  body?: ZodSchema;
}

export const toValidationIssues = (error: ZodError): ValidationIssue[] =>
  error.errors.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

/**
 * Middleware to validate the request body with a Zod schema.
 * The parsed (and transformed) value replaces the raw body.
 */
export const validateRequest = (schemas: ValidationSchemas) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(AppError.badRequest('Validation failed', toValidationIssues(error)));
      } else {
        next(error);
      }
    }
  };
};

export default validateRequest;
