import { authService } from '../../src/auth/auth.service';
import { User, IUser } from '../../src/models/User';

/**
 * An unsaved user document; no database is involved
 */
export const buildUser = (userId: string, overrides: Partial<{ isActive: boolean }> = {}): IUser =>
  new User({
    userId,
    name: `Test ${userId}`,
    email: `${userId}@example.com`,
    password: 'Password123',
    isActive: overrides.isActive ?? true,
  });

export const bearerFor = (user: IUser): string =>
  `Bearer ${authService.generateTokens(user).accessToken}`;

/**
 * Resolve tokens for the given users without touching MongoDB
 */
export const stubUserLookup = (users: IUser[]): jest.SpyInstance => {
  const byId = new Map(users.map((user) => [user.userId, user]));
  return jest
    .spyOn(authService, 'getUserById')
    .mockImplementation(async (userId: string) => byId.get(userId) ?? null);
};
