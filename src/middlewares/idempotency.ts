/**
 * Idempotency Middleware
 *
 * Replays the cached response for a repeated X-Idempotency-Key instead of
 * processing the request again. Keys are scoped per user.
 */

import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { getRedisClient, isRedisConnected } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';
import type { AuthRequest } from '../auth/auth.types';

import { ApiError } from './errorHandler';

interface CachedResponse {
  statusCode: number;
  body: unknown;
  cachedAt: string;
}

/**
 * 24 hours, in seconds
 */
export const IDEMPOTENCY_TTL = 24 * 60 * 60;

const IDEMPOTENCY_KEY_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

const parseCachedResponse = (raw: string): CachedResponse | null => {
  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'statusCode' in parsed &&
    typeof parsed.statusCode === 'number' &&
    'cachedAt' in parsed &&
    typeof parsed.cachedAt === 'string'
  ) {
    const body: unknown = 'body' in parsed ? parsed.body : undefined;
    return { statusCode: parsed.statusCode, body, cachedAt: parsed.cachedAt };
  }
  return null;
};

export const idempotencyCacheKey = (req: AuthRequest, idempotencyKey: string): string => {
  const scope = req.user?.userId || req.ip || 'anonymous';
  return `idempotency:${scope}:${req.method}:${req.baseUrl}${req.path}:${idempotencyKey}`;
};

/**
 * Usage:
 * - Client sends X-Idempotency-Key with a unique key
 * - First request: processed normally; responses below 500 are cached
 * - Repeats with the same key get the cached response and X-Idempotent-Replayed
 *
 * Server errors are not cached so a failed transfer can be retried.
 */
export const idempotencyMiddleware = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  const idempotencyKey = req.get('x-idempotency-key');

  if (!idempotencyKey) {
    next();
    return;
  }

  if (!IDEMPOTENCY_KEY_PATTERN.test(idempotencyKey)) {
    next(
      new ApiError(
        ErrorCode.INVALID_INPUT,
        'Invalid X-Idempotency-Key format. Must be alphanumeric with dashes/underscores, max 64 characters.'
      )
    );
    return;
  }

  if (config.isTest || !isRedisConnected()) {
    next();
    return;
  }

  const cacheKey = idempotencyCacheKey(req, idempotencyKey);

  try {
    const redis = getRedisClient();
    const raw = await redis.get(cacheKey);
    const cached = raw ? parseCachedResponse(raw) : null;

    if (cached) {
      logger.info(
        { idempotencyKey, userId: req.user?.userId, cachedAt: cached.cachedAt },
        'Returning cached idempotent response'
      );
      res.setHeader('X-Idempotent-Replayed', 'true');
      res.status(cached.statusCode).json(cached.body);
      return;
    }

    const originalJson = res.json.bind(res);

    res.json = (body: unknown): Response => {
      if (res.statusCode < 500) {
        const responseToCache: CachedResponse = {
          statusCode: res.statusCode,
          body,
          cachedAt: new Date().toISOString(),
        };

        redis
          .setex(cacheKey, IDEMPOTENCY_TTL, JSON.stringify(responseToCache))
          .then(() => {
            logger.debug(
              { idempotencyKey, statusCode: res.statusCode },
              'Cached idempotent response'
            );
          })
          .catch((err: unknown) => {
            logger.error({ err, idempotencyKey }, 'Failed to cache idempotent response');
          });
      }

      return originalJson(body);
    };

    next();
  } catch (error) {
    // The cache is an optimisation; the request still goes through
    logger.error({ err: error, idempotencyKey }, 'Idempotency middleware error');
    next();
  }
};
