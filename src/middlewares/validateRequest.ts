import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationError } from 'express-validator';
import { ApiError } from './errorHandler';

const fieldOf = (error: ValidationError): string =>
  error.type === 'field' ? error.path : error.type;

/**
 * Collapse express-validator errors into `{ field: [messages] }`
 */
export const collectValidationErrors = (
  errors: ValidationError[]
): Record<string, string[]> =>
  errors.reduce<Record<string, string[]>>((acc, err) => {
    const field = fieldOf(err);
    if (!acc[field]) acc[field] = [];
    acc[field].push(String(err.msg));
    return acc;
  }, {});

/**
 * Reusable validation middleware that extracts express-validator errors
 * and formats them into a consistent error response
 */
export const validateRequest = (req: Request, _res: Response, next: NextFunction): void => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    throw ApiError.validationError('Validation failed', collectValidationErrors(errors.array()));
  }

  next();
};
