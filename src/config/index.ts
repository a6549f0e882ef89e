import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

// Import environment-specific configurations
import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  JWT_CONFIG,
  BCRYPT_ROUNDS,
  ESCROW_CONFIG,
  RATE_LIMIT_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  SECURITY_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

// Re-export environment utilities
export {
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  validateProductionEnv,
  getEnvironmentInfo,
};

// Re-export environment-specific configs for direct access
export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * Consolidates all environment-specific settings.
 * For individual values, import directly from './environments'.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,

  // Server
  port: API_CONFIG.port,

  // MongoDB
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Redis
  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
  },

  // JWT Authentication
  jwt: JWT_CONFIG,

  // Bcrypt
  bcrypt: {
    rounds: BCRYPT_ROUNDS,
  },

  // Escrow ledger
  escrow: ESCROW_CONFIG,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  // Rate Limiting
  rateLimit: RATE_LIMIT_CONFIG,

  // Logging
  logging: LOG_CONFIG,

  // Observability
  otel: OTEL_CONFIG,

  // Security
  security: SECURITY_CONFIG,
};
