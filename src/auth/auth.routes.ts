import { Router, Request, Response, NextFunction } from 'express';
import { authController } from './auth.controller';
import { authMiddleware } from './auth.middleware';
import { registerValidation, loginValidation, refreshTokenValidation } from './auth.validation';
import { validateRequest } from '../middlewares/validateRequest';
import { authLimiter } from '../middlewares/rateLimiter';

const router = Router();

router.post('/register', authLimiter, registerValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => authController.register(req, res, next));

router.post('/login', authLimiter, loginValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => authController.login(req, res, next));

router.post('/refresh', refreshTokenValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => authController.refresh(req, res, next));

router.get('/me', authMiddleware, (req: Request, res: Response, next: NextFunction) => authController.me(req, res, next));

export default router;
