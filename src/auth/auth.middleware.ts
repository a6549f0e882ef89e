import { Response, NextFunction } from 'express';
import { authService } from './auth.service';
import { AuthRequest } from './auth.types';
import { ApiError } from '../middlewares/errorHandler';
import { ErrorCode } from '../types/errors';
import { addLogContext } from '../observability';

const bearerToken = (header: string | undefined): string => {
  if (!header) {
    throw ApiError.unauthorized('No authorization header provided');
  }

  if (!header.startsWith('Bearer ')) {
    throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
  }

  const token = header.substring(7);
  if (!token) {
    throw ApiError.unauthorized('No token provided');
  }
  return token;
};

/**
 * Resolve the JWT to an active user; `req.user.userId` is the caller's
 * identity for every escrow operation.
 */
export const authMiddleware = async (
  req: AuthRequest,
  _res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const payload = authService.verifyToken(bearerToken(req.get('authorization')));
    const user = await authService.getUserById(payload.userId);

    if (!user) {
      throw ApiError.unauthorized('User not found');
    }

    if (!user.isActive) {
      throw new ApiError(ErrorCode.UNAUTHORIZED, 'Account is deactivated', { statusCode: 403 });
    }

    req.user = user;
    addLogContext({ userId: user.userId });
    next();
  } catch (error) {
    next(error);
  }
};
