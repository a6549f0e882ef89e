import { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDuration } from './metrics';

/**
 * Collapse dynamic path segments so label cardinality stays bounded:
 * record ids, user identities and raw UUIDs become placeholders.
 */
const normalizePath = (path: string): string =>
  path
    .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, ':id')
    .replace(/\/(depositors|beneficiaries)\/[^/]+/g, '/$1/:identity')
    .replace(/\/\d+(?=\/|$)/g, '/:recordId');

/**
 * Prefer the matched Express route pattern, falling back to the normalized path
 */
const getRoutePath = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return (req.baseUrl || '') + routePath;
  }

  return normalizePath(req.baseUrl + req.path);
};

/**
 * HTTP metrics middleware
 * Records request count and duration for Prometheus
 */
export const metricsMiddleware = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;

    const labels = {
      method: req.method,
      path: getRoutePath(req),
      status: res.statusCode.toString(),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, durationSeconds);
  });

  next();
};
