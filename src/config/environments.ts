/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, ESCROW_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const rate = ESCROW_CONFIG.feeBasisPoints;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

/**
 * Local development flag
 * Set LOCAL_DEV=true to use localhost URLs even in non-development environments
 */
export const isLocalDev = process.env.LOCAL_DEV === 'true';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/timelock-escrow'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/timelock-escrow-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/timelock-escrow';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(
  process.env.REDIS_PORT || (isTest ? '6380' : '6379'),
  10
);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction
  ? process.env.REDIS_PASSWORD || undefined
  : undefined;

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT Secret - MUST be set in production (validateProductionEnv enforces it)
 */
export const JWT_SECRET = process.env.JWT_SECRET || (isProduction ? '' : 'dev-secret-do-not-use-in-production');

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  accessTokenExpiresIn: process.env.JWT_ACCESS_TOKEN_EXPIRES_IN || (isProduction ? '15m' : '1h'),
  refreshTokenExpiresIn: process.env.JWT_REFRESH_TOKEN_EXPIRES_IN || '7d',
};

/**
 * Bcrypt rounds - higher in production, minimal in test for speed
 */
export const BCRYPT_ROUNDS = isProduction
  ? parseInt(process.env.BCRYPT_ROUNDS || '12', 10)
  : isTest
  ? 4
  : parseInt(process.env.BCRYPT_ROUNDS || '10', 10);

// =============================================================================
// ESCROW LEDGER CONFIGURATION
// =============================================================================

export type FeePolicySetting = 'STORE_AND_CLAIM' | 'STORE_ONLY';

const parseFeePolicy = (value: string | undefined): FeePolicySetting | null => {
  const normalized = (value || 'STORE_AND_CLAIM').trim().toUpperCase();
  if (normalized === 'STORE_AND_CLAIM' || normalized === 'STORE_ONLY') {
    return normalized;
  }
  return null;
};

/**
 * Escrow ledger settings
 *
 * - administrator: identity that may change the fee rate and withdraw fees.
 *   Only seeds a fresh ledger; a persisted administrator takes precedence.
 * - feeBasisPoints: initial fee rate (1 bp = 0.01%), 42 = 0.42%
 * - feePolicy: STORE_AND_CLAIM charges the rate on deposit and again on claim,
 *   STORE_ONLY charges it on deposit only
 */
export const ESCROW_CONFIG = {
  administrator: process.env.ESCROW_ADMIN_ID || (isProduction ? '' : 'user_admin'),
  feeBasisPoints: parseInt(process.env.ESCROW_FEE_BASIS_POINTS || '42', 10),
  feePolicy: parseFeePolicy(process.env.ESCROW_FEE_POLICY) ?? 'STORE_AND_CLAIM',
  feePolicyValid: parseFeePolicy(process.env.ESCROW_FEE_POLICY) !== null,
  maxPageLimit: Math.min(parseInt(process.env.ESCROW_MAX_PAGE_LIMIT || '50', 10), 100),
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting configuration by environment
 *
 * In test/development environments, rate limits are significantly relaxed.
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting, or set
 * LOAD_TEST_SECRET and send it as X-Load-Test-Token to bypass the limiters.
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  loadTestSecret: process.env.LOAD_TEST_SECRET || (isTest ? 'test-load-secret' : ''),

  // Global rate limiter (all routes)
  global: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10)
      : isTest
      ? 10000
      : parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
  },

  // Auth rate limiter (login, register)
  auth: {
    windowMs: parseInt(process.env.AUTH_RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.AUTH_RATE_LIMIT_MAX || '5', 10)
      : isTest
      ? 10000
      : parseInt(process.env.AUTH_RATE_LIMIT_MAX || '100', 10),
  },

  // Escrow mutations (store, claim, administration)
  escrow: {
    windowMs: parseInt(process.env.ESCROW_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.ESCROW_RATE_LIMIT_MAX || '10', 10)
      : isTest
      ? 10000
      : parseInt(process.env.ESCROW_RATE_LIMIT_MAX || '100', 10),
  },
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: !isProduction && !isTest,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

export const OTEL_CONFIG = {
  enabled: !isTest && (isProduction || process.env.OTEL_ENABLED === 'true'),
  serviceName: process.env.OTEL_SERVICE_NAME || 'timelock-escrow',
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// SECURITY CONFIGURATION
// =============================================================================

export const SECURITY_CONFIG = {
  contentSecurityPolicy: isProduction,
  hsts: isProduction,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = [
    'JWT_SECRET',
    'MONGODB_URI',
    'REDIS_HOST',
    'REDIS_PASSWORD',
    'CORS_ORIGINS',
    'ESCROW_ADMIN_ID',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }

  validateEscrowConfig();
};

/**
 * Reject fee settings the ledger would refuse at runtime
 */
export const validateEscrowConfig = (): void => {
  const { feeBasisPoints, feePolicyValid } = ESCROW_CONFIG;

  if (!Number.isInteger(feeBasisPoints) || feeBasisPoints < 0 || feeBasisPoints > 10000) {
    throw new Error('ESCROW_FEE_BASIS_POINTS must be an integer between 0 and 10000');
  }

  if (!feePolicyValid) {
    throw new Error('ESCROW_FEE_POLICY must be STORE_AND_CLAIM or STORE_ONLY');
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  feePolicy: ESCROW_CONFIG.feePolicy,
});
