import crypto from 'crypto';

import jwt, { JwtPayload, SignOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { User, IUser } from '../models/User';
import { authAttemptsTotal, createServiceLogger } from '../observability';
import { walletService } from '../services/wallet/wallet.service';
import { ErrorCode } from '../types/errors';

import { JWTPayload, TokenPair, RegisterDTO, LoginDTO, AuthResponse } from './auth.types';

const log = createServiceLogger('auth');

const isJwtPayload = (value: string | JwtPayload): value is JwtPayload & JWTPayload =>
  typeof value === 'object' &&
  typeof value.userId === 'string' &&
  typeof value.email === 'string';

const toUserView = (user: IUser): AuthResponse['user'] => ({
  userId: user.userId,
  name: user.name,
  email: user.email,
});

export class AuthService {
  generateTokens(user: IUser): TokenPair {
    const payload: JWTPayload = {
      userId: user.userId,
      email: user.email,
    };

    const accessTokenOptions: SignOptions = {
      expiresIn: config.jwt.accessTokenExpiresIn as jwt.SignOptions['expiresIn'],
    };

    const refreshTokenOptions: SignOptions = {
      expiresIn: config.jwt.refreshTokenExpiresIn as jwt.SignOptions['expiresIn'],
    };

    const accessToken = jwt.sign(payload, config.jwt.secret, accessTokenOptions);
    const refreshToken = jwt.sign(payload, config.jwt.secret, refreshTokenOptions);

    return { accessToken, refreshToken };
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, config.jwt.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    if (!isJwtPayload(decoded)) {
      throw ApiError.invalidToken('Token payload is malformed');
    }
    return { userId: decoded.userId, email: decoded.email, iat: decoded.iat, exp: decoded.exp };
  }

  /**
   * Create the user and the wallet escrow deposits are drawn from
   */
  async register(dto: RegisterDTO): Promise<AuthResponse> {
    const existingUser = await User.findOne({ email: dto.email.toLowerCase() });
    if (existingUser) {
      throw ApiError.alreadyExists('User');
    }

    const userId = `user_${crypto.randomUUID().replace(/-/g, '')}`;

    const user = await User.create({
      userId,
      name: dto.name,
      email: dto.email.toLowerCase(),
      password: dto.password,
    });

    await walletService.createWallet(userId);
    authAttemptsTotal.inc({ outcome: 'registered' });
    log.info({ userId }, 'User registered');

    return {
      user: toUserView(user),
      tokens: this.generateTokens(user),
    };
  }

  async login(dto: LoginDTO): Promise<AuthResponse> {
    const user = await User.findOne({ email: dto.email.toLowerCase() }).select('+password');
    if (!user) {
      authAttemptsTotal.inc({ outcome: 'failure' });
      throw new ApiError(ErrorCode.INVALID_CREDENTIALS, 'Invalid email or password');
    }

    if (!user.isActive) {
      authAttemptsTotal.inc({ outcome: 'failure' });
      throw new ApiError(ErrorCode.UNAUTHORIZED, 'Account is deactivated', { statusCode: 403 });
    }

    const isPasswordValid = await user.comparePassword(dto.password);
    if (!isPasswordValid) {
      authAttemptsTotal.inc({ outcome: 'failure' });
      throw new ApiError(ErrorCode.INVALID_CREDENTIALS, 'Invalid email or password');
    }

    user.lastLoginAt = new Date();
    await user.save();
    authAttemptsTotal.inc({ outcome: 'success' });

    return {
      user: toUserView(user),
      tokens: this.generateTokens(user),
    };
  }

  async refreshTokens(refreshToken: string): Promise<TokenPair> {
    const payload = this.verifyToken(refreshToken);

    const user = await User.findOne({ userId: payload.userId });
    if (!user) {
      throw ApiError.unauthorized('User not found');
    }

    if (!user.isActive) {
      throw new ApiError(ErrorCode.UNAUTHORIZED, 'Account is deactivated', { statusCode: 403 });
    }

    return this.generateTokens(user);
  }

  async getUserById(userId: string): Promise<IUser | null> {
    return User.findOne({ userId });
  }
}

export const authService = new AuthService();
