/**
 * Rate Limiting Middleware
 *
 * Limiters share a Redis store so limits hold across instances.
 *
 * Environment-based configuration:
 * - Production: strict limits
 * - Development: relaxed limits
 * - Test: in-memory store and very lenient limits
 *
 * Set RATE_LIMIT_DISABLED=true to turn every limiter into a pass-through, or
 * send LOAD_TEST_SECRET as X-Load-Test-Token to bypass them per request.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit, { Store } from 'express-rate-limit';
import RedisStore from 'rate-limit-redis';

import { config } from '../config';
import { RATE_LIMIT_CONFIG } from '../config/environments';
import { getRedisClient } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';
import type { AuthRequest } from '../auth/auth.types';

type RedisReply = number | string;

const toRedisReply = (value: unknown): RedisReply | RedisReply[] => {
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => (typeof item === 'number' ? item : String(item)));
  }
  return String(value);
};

/**
 * Redis-backed store; the default memory store in tests
 */
const createStore = (prefix: string): Store | undefined => {
  if (config.isTest) {
    return undefined;
  }

  const client = getRedisClient();
  return new RedisStore({
    sendCommand: async (command: string, ...args: string[]) =>
      toRedisReply(await client.call(command, ...args)),
    prefix,
  });
};

const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const hasValidBypassHeader = (req: Request): boolean => {
  if (!RATE_LIMIT_CONFIG.loadTestSecret) return false;
  return req.get('X-Load-Test-Token') === RATE_LIMIT_CONFIG.loadTestSecret;
};

const createLimiter = (limiter: RequestHandler): RequestHandler => {
  if (RATE_LIMIT_CONFIG.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }

  return (req: Request, res: Response, next: NextFunction) => {
    if (hasValidBypassHeader(req)) {
      return next();
    }
    return limiter(req, res, next);
  };
};

const limitMessage = (code: ErrorCode, message: string) => ({
  success: false,
  error: {
    code,
    message,
    timestamp: new Date().toISOString(),
  },
});

const userOrIp = (req: AuthRequest): string => req.user?.userId || req.ip || 'unknown';

/**
 * Applied to all routes except health checks and metrics
 */
export const globalLimiter = createLimiter(
  rateLimit({
    store: createStore('rl:global:'),
    windowMs: RATE_LIMIT_CONFIG.global.windowMs,
    max: RATE_LIMIT_CONFIG.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please try again later'),
    skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
  })
);

/**
 * Brute-force protection for login and registration, keyed by IP + email
 */
export const authLimiter = createLimiter(
  rateLimit({
    store: createStore('rl:auth:'),
    windowMs: RATE_LIMIT_CONFIG.auth.windowMs,
    max: RATE_LIMIT_CONFIG.auth.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(
      ErrorCode.TOO_MANY_LOGIN_ATTEMPTS,
      'Too many login attempts, please try again later'
    ),
    keyGenerator: (req) => {
      const body: unknown = req.body;
      const email =
        typeof body === 'object' && body !== null && 'email' in body && typeof body.email === 'string'
          ? body.email
          : '';
      return `${req.ip}:${email}`;
    },
    validate: false,
  })
);

/**
 * Escrow and ledger mutations, keyed by user
 */
export const escrowLimiter = createLimiter(
  rateLimit({
    store: createStore('rl:escrow:'),
    windowMs: RATE_LIMIT_CONFIG.escrow.windowMs,
    max: RATE_LIMIT_CONFIG.escrow.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(
      ErrorCode.TOO_MANY_ESCROW_REQUESTS,
      'Too many escrow requests, please try again later'
    ),
    keyGenerator: (req: AuthRequest) => userOrIp(req),
    validate: false,
  })
);
