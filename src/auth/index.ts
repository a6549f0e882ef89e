export { authService, AuthService } from './auth.service';
export { authMiddleware } from './auth.middleware';
export { authController, AuthController } from './auth.controller';
export * from './auth.types';
export { default as authRoutes } from './auth.routes';
