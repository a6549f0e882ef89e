import { Router, Request, Response, NextFunction } from 'express';
import { walletController } from './wallet.controller';
import { authMiddleware } from '../../auth/auth.middleware';
import { depositValidation, historyQueryValidation } from './wallet.validation';
import { validateRequest } from '../../middlewares/validateRequest';
import { idempotencyMiddleware } from '../../middlewares/idempotency';

const router = Router();

// All wallet routes require authentication
router.use(authMiddleware);

// GET /wallets/me - Get current user's wallet
router.get('/me', (req: Request, res: Response, next: NextFunction) => walletController.getMyWallet(req, res, next));

// GET /wallets/me/history - Get wallet operation history
router.get('/me/history', historyQueryValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => walletController.getHistory(req, res, next));

// POST /wallets/me/deposit - Fund the wallet
router.post('/me/deposit', idempotencyMiddleware, depositValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => walletController.deposit(req, res, next));

export default router;
