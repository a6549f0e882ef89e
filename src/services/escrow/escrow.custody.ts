import { v4 as uuidv4 } from 'uuid';

import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';
import { walletService, WalletService } from '../wallet/wallet.service';

import { EscrowErrors } from './escrow.errors';
import { TransferSimulation, transferSimulation } from './escrow.simulation';
import type { Identity, SendPurpose, ValueCustody } from './escrow.types';

/**
 * Wallet reference for a send. Claim credits are keyed by record id so a
 * retried claim can never pay twice.
 */
export const sendReference = (purpose: SendPurpose): string =>
  purpose.kind === 'claim' ? `escrow-claim:${purpose.recordId}` : `fee-withdrawal:${uuidv4()}`;

export type CustodyWallets = Pick<WalletService, 'debit' | 'credit' | 'refund'>;

const DEPOSITOR_ERRORS = new Set<ErrorCode>([
  ErrorCode.INSUFFICIENT_BALANCE,
  ErrorCode.INVALID_AMOUNT,
]);

const reasonOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Custody backed by user wallets: deposits are debits, payouts are credits
 * and a reversed deposit is a refund.
 */
export class WalletCustody implements ValueCustody {
  constructor(
    private readonly wallets: CustodyWallets = walletService,
    private readonly simulation: TransferSimulation = transferSimulation
  ) {}

  async receive(from: Identity, amount: bigint): Promise<string> {
    const reference = `escrow-deposit:${uuidv4()}`;
    try {
      await this.wallets.debit(from, amount, reference);
    } catch (error) {
      // The depositor's own errors, not transfer faults
      if (error instanceof ApiError && DEPOSITOR_ERRORS.has(error.errorCode)) {
        throw error;
      }
      throw EscrowErrors.transferFailed(`could not collect deposit: ${reasonOf(error)}`);
    }
    return reference;
  }

  async reverse(from: Identity, amount: bigint, reference: string): Promise<void> {
    await this.wallets.refund(from, amount, reference);
  }

  async send(to: Identity, amount: bigint, purpose: SendPurpose): Promise<void> {
    try {
      await this.simulation.simulateFailure(to);
      await this.wallets.credit(to, amount, sendReference(purpose));
    } catch (error) {
      throw EscrowErrors.transferFailed(reasonOf(error));
    }
  }
}
