import crypto from 'crypto';

import { FilterQuery } from 'mongoose';

import {
  Wallet,
  IWallet,
  toDecimal128,
  fromDecimal128,
  MAX_BALANCE_DIGITS,
  MAX_WALLET_BALANCE,
} from '../../models/Wallet';
import { WalletOperation, IWalletOperation, OperationType } from '../../models/WalletOperation';
import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';
import { createServiceLogger, walletOperationsTotal } from '../../observability';

const log = createServiceLogger('wallet');

export interface OperationResult<T extends OperationType = OperationType> {
  success: boolean;
  newBalance: bigint;
  operationId: string;
  idempotent: boolean;
  type: T;
}

export type DebitResult = OperationResult<'DEBIT'>;
export type CreditResult = OperationResult<'CREDIT'>;
export type RefundResult = OperationResult<'REFUND'>;
export type DepositResult = OperationResult<'DEPOSIT'>;

export interface WalletView {
  walletId: string;
  userId: string;
  balance: string;
  isActive: boolean;
  createdAt: Date;
}

export interface WalletOperationView {
  operationId: string;
  type: OperationType;
  amount: string;
  resultBalance: string;
  reference?: string;
  createdAt: Date;
}

export const toWalletView = (wallet: IWallet): WalletView => ({
  walletId: wallet.walletId,
  userId: wallet.userId,
  balance: fromDecimal128(wallet.balance).toString(),
  isActive: wallet.isActive,
  createdAt: wallet.createdAt,
});

export const toOperationView = (operation: IWalletOperation): WalletOperationView => ({
  operationId: operation.operationId,
  type: operation.type,
  amount: fromDecimal128(operation.amount).toString(),
  resultBalance: fromDecimal128(operation.resultBalance).toString(),
  reference: operation.reference,
  createdAt: operation.createdAt,
});

const assertAmountFits = (amount: bigint): void => {
  if (amount > MAX_WALLET_BALANCE) {
    throw new ApiError(
      ErrorCode.INVALID_AMOUNT,
      `Amount exceeds the ${MAX_BALANCE_DIGITS}-digit wallet limit`
    );
  }
};

/**
 * Custodial balances in base units. Every balance change is recorded as a
 * WalletOperation keyed by `<reference>:<TYPE>`; replaying a reference
 * returns the recorded result without touching the balance again.
 */
export class WalletService {
  private async findExisting<T extends OperationType>(
    operationId: string,
    type: T
  ): Promise<OperationResult<T> | null> {
    const existing = await WalletOperation.findOne({ operationId });
    if (!existing) {
      return null;
    }
    return {
      success: true,
      newBalance: fromDecimal128(existing.resultBalance),
      operationId,
      idempotent: true,
      type,
    };
  }

  private async record<T extends OperationType>(
    wallet: IWallet,
    type: T,
    amount: bigint,
    operationId: string,
    reference?: string
  ): Promise<OperationResult<T>> {
    await WalletOperation.create({
      operationId,
      walletId: wallet.walletId,
      userId: wallet.userId,
      type,
      amount: toDecimal128(amount),
      resultBalance: wallet.balance,
      reference,
    });

    walletOperationsTotal.inc({ operation: type.toLowerCase() });
    const newBalance = fromDecimal128(wallet.balance);
    log.debug(
      { userId: wallet.userId, type, amount: amount.toString(), newBalance: newBalance.toString() },
      'Wallet operation applied'
    );

    return { success: true, newBalance, operationId, idempotent: false, type };
  }

  async createWallet(userId: string): Promise<IWallet> {
    const existing = await Wallet.findOne({ userId });
    if (existing) {
      throw ApiError.alreadyExists('Wallet');
    }
    return Wallet.create({
      walletId: `wallet_${crypto.randomUUID().replace(/-/g, '')}`,
      userId,
      balance: toDecimal128(0n),
    });
  }

  async getWallet(userId: string): Promise<IWallet> {
    const wallet = await Wallet.findOne({ userId });
    if (!wallet) {
      throw ApiError.notFound('Wallet');
    }
    return wallet;
  }

  /**
   * Add `amount` to the wallet matching `filter`, only while the new balance
   * still fits. A wallet that matches but has no headroom is refused rather
   * than rounded.
   */
  private async increase(filter: FilterQuery<IWallet>, amount: bigint): Promise<IWallet> {
    assertAmountFits(amount);

    const wallet = await Wallet.findOneAndUpdate(
      { ...filter, balance: { $lte: toDecimal128(MAX_WALLET_BALANCE - amount) } },
      { $inc: { balance: toDecimal128(amount) } },
      { new: true }
    );
    if (wallet) {
      return wallet;
    }

    if (await Wallet.exists(filter)) {
      throw new ApiError(
        ErrorCode.INVALID_AMOUNT,
        `Wallet balance would exceed ${MAX_BALANCE_DIGITS} digits`
      );
    }
    throw ApiError.notFound('Wallet');
  }

  /**
   * Atomically take `amount` from the wallet if the balance covers it
   */
  async debit(userId: string, amount: bigint, reference: string): Promise<DebitResult> {
    const operationId = `${reference}:DEBIT`;

    const replay = await this.findExisting(operationId, 'DEBIT');
    if (replay) {
      return replay;
    }

    assertAmountFits(amount);

    const current = await this.getWallet(userId);
    if (!current.isActive) {
      throw new ApiError(ErrorCode.WALLET_NOT_FOUND, 'Wallet is inactive');
    }

    const wallet = await Wallet.findOneAndUpdate(
      { userId, isActive: true, balance: { $gte: toDecimal128(amount) } },
      { $inc: { balance: toDecimal128(-amount) } },
      { new: true }
    );

    if (!wallet) {
      throw ApiError.insufficientBalance();
    }

    return this.record(wallet, 'DEBIT', amount, operationId, reference);
  }

  /**
   * Pay `amount` into an active wallet
   */
  async credit(userId: string, amount: bigint, reference: string): Promise<CreditResult> {
    const operationId = `${reference}:CREDIT`;

    const replay = await this.findExisting(operationId, 'CREDIT');
    if (replay) {
      return replay;
    }

    const wallet = await this.increase({ userId, isActive: true }, amount);
    return this.record(wallet, 'CREDIT', amount, operationId, reference);
  }

  /**
   * Compensating credit for an earlier debit. Goes through even when the
   * wallet has since been deactivated.
   */
  async refund(userId: string, amount: bigint, reference: string): Promise<RefundResult> {
    const operationId = `${reference}:REFUND`;

    const replay = await this.findExisting(operationId, 'REFUND');
    if (replay) {
      return replay;
    }

    let wallet: IWallet;
    try {
      wallet = await this.increase({ userId }, amount);
    } catch (error) {
      log.error({ userId, amount: amount.toString(), reference, err: error }, 'Refund failed');
      throw error;
    }

    return this.record(wallet, 'REFUND', amount, operationId, reference);
  }

  /**
   * Fund a wallet. With an idempotency key a repeated request is a no-op.
   */
  async deposit(userId: string, amount: bigint, idempotencyKey?: string): Promise<DepositResult> {
    if (amount <= 0n) {
      throw new ApiError(ErrorCode.INVALID_AMOUNT, 'Deposit amount must be positive');
    }

    const operationId = idempotencyKey
      ? `deposit:${userId}:${idempotencyKey}`
      : `deposit:${userId}:${crypto.randomUUID()}`;

    if (idempotencyKey) {
      const replay = await this.findExisting(operationId, 'DEPOSIT');
      if (replay) {
        return replay;
      }
    }

    const wallet = await this.increase({ userId, isActive: true }, amount);
    return this.record(wallet, 'DEPOSIT', amount, operationId);
  }

  async getOperationHistory(userId: string, limit = 20): Promise<IWalletOperation[]> {
    const wallet = await this.getWallet(userId);
    return WalletOperation.find({ walletId: wallet.walletId }).sort({ createdAt: -1 }).limit(limit);
  }
}

export const walletService = new WalletService();
