import { Response, NextFunction } from 'express';

import { walletService, toWalletView, toOperationView } from './wallet.service';
import { AuthRequest } from '../../auth/auth.types';
import { ApiError } from '../../middlewares/errorHandler';

export class WalletController {
  /**
   * GET /wallets/me
   */
  async getMyWallet(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.user) {
        throw ApiError.unauthorized('Not authenticated');
      }

      const wallet = await walletService.getWallet(req.user.userId);

      res.status(200).json({
        success: true,
        data: { wallet: toWalletView(wallet) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Fund the caller's wallet
   * POST /wallets/me/deposit
   */
  async deposit(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.user) {
        throw ApiError.unauthorized('Not authenticated');
      }

      const { amount, idempotencyKey } = req.body as { amount: string; idempotencyKey?: string };
      const result = await walletService.deposit(req.user.userId, BigInt(amount), idempotencyKey);

      res.status(200).json({
        success: true,
        data: {
          message: 'Deposit successful',
          newBalance: result.newBalance.toString(),
          operationId: result.operationId,
          idempotent: result.idempotent,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /wallets/me/history
   */
  async getHistory(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.user) {
        throw ApiError.unauthorized('Not authenticated');
      }

      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : 20;
      const operations = await walletService.getOperationHistory(req.user.userId, limit);

      res.status(200).json({
        success: true,
        data: { operations: operations.map(toOperationView) },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const walletController = new WalletController();
