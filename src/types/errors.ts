/**
 * Error Codes for the Timelock Escrow API
 *
 * Categorized by error type:
 * - 1xxx: Authentication and authorization errors
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication / authorization errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  INVALID_CREDENTIALS = 1004,
  NOT_ADMINISTRATOR = 1005,
  NOT_BENEFICIARY = 1006,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,
  MISSING_REQUIRED_FIELD = 2004,
  INVALID_BENEFICIARY = 2005,
  ZERO_VALUE = 2006,
  UNLOCK_TIME_IN_PAST = 2007,
  FEE_TOO_HIGH = 2008,
  INVALID_RECIPIENT = 2009,
  INVALID_ADMINISTRATOR = 2010,

  // Business errors (3xxx)
  INSUFFICIENT_BALANCE = 3001,
  USER_NOT_FOUND = 3002,
  WALLET_NOT_FOUND = 3003,
  USER_ALREADY_EXISTS = 3008,
  WALLET_ALREADY_EXISTS = 3009,
  RESOURCE_NOT_FOUND = 3010,
  RECORD_NOT_FOUND = 3011,
  ALREADY_CLAIMED = 3012,
  NOT_YET_UNLOCKED = 3013,
  NOTHING_TO_CLAIM = 3014,
  REENTRANT_CALL = 3015,
  RESOURCE_CONFLICT = 3016,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_LOGIN_ATTEMPTS = 4002,
  TOO_MANY_ESCROW_REQUESTS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  REDIS_ERROR = 5003,
  EVENT_BUS_ERROR = 5004,
  TRANSFER_FAILED = 5006,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401/403
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.INVALID_CREDENTIALS]: 401,
  [ErrorCode.NOT_ADMINISTRATOR]: 403,
  [ErrorCode.NOT_BENEFICIARY]: 403,

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.INVALID_BENEFICIARY]: 400,
  [ErrorCode.ZERO_VALUE]: 400,
  [ErrorCode.UNLOCK_TIME_IN_PAST]: 400,
  [ErrorCode.FEE_TOO_HIGH]: 400,
  [ErrorCode.INVALID_RECIPIENT]: 400,
  [ErrorCode.INVALID_ADMINISTRATOR]: 400,

  // Business errors -> 400/404/409/423
  [ErrorCode.INSUFFICIENT_BALANCE]: 400,
  [ErrorCode.USER_NOT_FOUND]: 404,
  [ErrorCode.WALLET_NOT_FOUND]: 404,
  [ErrorCode.USER_ALREADY_EXISTS]: 409,
  [ErrorCode.WALLET_ALREADY_EXISTS]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ErrorCode.RECORD_NOT_FOUND]: 404,
  [ErrorCode.ALREADY_CLAIMED]: 409,
  [ErrorCode.NOT_YET_UNLOCKED]: 423,
  [ErrorCode.NOTHING_TO_CLAIM]: 409,
  [ErrorCode.REENTRANT_CALL]: 409,
  [ErrorCode.RESOURCE_CONFLICT]: 409,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_LOGIN_ATTEMPTS]: 429,
  [ErrorCode.TOO_MANY_ESCROW_REQUESTS]: 429,

  // System errors -> 500/502/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.REDIS_ERROR]: 503,
  [ErrorCode.EVENT_BUS_ERROR]: 503,
  [ErrorCode.TRANSFER_FAILED]: 502,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

/**
 * API Response type
 */
export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
