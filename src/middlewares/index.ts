/**
 * Middleware Exports
 */

// Error handling
export {
  errorHandler,
  notFoundHandler,
  ApiError,
  AppError,
} from './errorHandler';

// Request validation
export { validateRequest, collectValidationErrors } from './validateRequest';

// Rate limiting
export { globalLimiter, authLimiter, escrowLimiter } from './rateLimiter';

// Idempotency
export { idempotencyMiddleware } from './idempotency';
