/**
 * Escrow Service
 *
 * Owns the process-wide ledger instance and wraps every call with tracing
 * and metrics. Controllers talk to this, never to the ledger directly.
 */

import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import {
  createServiceLogger,
  escrowFeesCollected,
  escrowOperationDuration,
  escrowOperationsTotal,
  escrowRecordsTotal,
  traceEscrowOperation,
} from '../../observability';
import { ErrorCode } from '../../types/errors';

import { SystemClock } from './escrow.clock';
import { WalletCustody } from './escrow.custody';
import { escrowEventSink } from './escrow.events';
import { EscrowLedger, EscrowLedgerOptions } from './escrow.ledger';
import { MongoLedgerRepository } from './escrow.repository';
import type {
  ClaimReceipt,
  EscrowRecord,
  Identity,
  LedgerState,
  StoreReceipt,
} from './escrow.types';

const log = createServiceLogger('escrow-service');

export interface Page {
  recordIds: number[];
  total: number;
  offset: number;
  limit: number;
}

export interface PageRequest {
  offset?: number;
  limit?: number;
}

const outcomeOf = (error: unknown): string =>
  error instanceof ApiError ? ErrorCode[error.errorCode] : 'UNEXPECTED_ERROR';

export class EscrowService {
  private ledger: EscrowLedger | null = null;

  /**
   * Open the ledger against MongoDB and wallet custody. Any collaborator can
   * be replaced through `overrides`.
   */
  async initialize(overrides: Partial<EscrowLedgerOptions> = {}): Promise<EscrowLedger> {
    const ledger = await EscrowLedger.open({
      repository: overrides.repository ?? new MongoLedgerRepository(),
      custody: overrides.custody ?? new WalletCustody(),
      clock: overrides.clock ?? new SystemClock(),
      sink: overrides.sink ?? escrowEventSink,
      logger: overrides.logger,
      defaults: overrides.defaults ?? {
        administrator: config.escrow.administrator,
        feeBasisPoints: config.escrow.feeBasisPoints,
        feePolicy: config.escrow.feePolicy,
      },
    });

    this.attach(ledger);
    const state = await ledger.getState();
    this.updateGauges(state);
    log.info(
      {
        nextRecordId: state.nextRecordId,
        feeBasisPoints: state.feeBasisPoints,
        feePolicy: state.feePolicy,
        administrator: state.administrator,
      },
      'Escrow ledger loaded'
    );
    return ledger;
  }

  attach(ledger: EscrowLedger): void {
    this.ledger = ledger;
  }

  detach(): void {
    this.ledger = null;
  }

  isReady(): boolean {
    return this.ledger !== null;
  }

  getLedger(): EscrowLedger {
    if (!this.ledger) {
      throw ApiError.internal('Escrow ledger is not initialized');
    }
    return this.ledger;
  }

  private async instrument<T>(
    operation: string,
    attributes: Record<string, string | number | boolean>,
    task: (ledger: EscrowLedger) => Promise<T>
  ): Promise<T> {
    const ledger = this.getLedger();
    const stopTimer = escrowOperationDuration.startTimer({ operation });

    try {
      const result = await traceEscrowOperation(operation, attributes, () => task(ledger));
      escrowOperationsTotal.inc({ operation, outcome: 'success' });
      return result;
    } catch (error) {
      escrowOperationsTotal.inc({ operation, outcome: outcomeOf(error) });
      throw error;
    } finally {
      stopTimer();
    }
  }

  private updateGauges(state: LedgerState): void {
    escrowRecordsTotal.set(state.nextRecordId);
    escrowFeesCollected.set(Number(state.collectedFees));
  }

  private async refreshGauges(): Promise<void> {
    this.updateGauges(await this.getLedger().getState());
  }

  async store(
    caller: Identity,
    beneficiary: Identity,
    unlockTime: number,
    amount: bigint
  ): Promise<StoreReceipt> {
    const receipt = await this.instrument('store', { 'escrow.depositor': caller }, (ledger) =>
      ledger.store(caller, beneficiary, unlockTime, amount)
    );
    log.info(
      { recordId: receipt.recordId, depositor: caller, beneficiary, fee: receipt.fee.toString() },
      'Escrow stored'
    );
    await this.refreshGauges();
    return receipt;
  }

  async claim(recordId: number, caller: Identity): Promise<ClaimReceipt> {
    const receipt = await this.instrument('claim', { 'escrow.record_id': recordId }, (ledger) =>
      ledger.claim(recordId, caller)
    );
    log.info(
      { recordId, beneficiary: caller, payout: receipt.payout.toString() },
      'Escrow claimed'
    );
    await this.refreshGauges();
    return receipt;
  }

  async setFeeRate(caller: Identity, feeBasisPoints: number): Promise<LedgerState> {
    await this.instrument('setFeeRate', { 'escrow.fee_bp': feeBasisPoints }, (ledger) =>
      ledger.setFeeRate(caller, feeBasisPoints)
    );
    log.info({ feeBasisPoints }, 'Fee rate updated');
    return this.getState();
  }

  async withdrawFees(caller: Identity, recipient: Identity): Promise<bigint> {
    const amount = await this.instrument('withdrawFees', {}, (ledger) =>
      ledger.withdrawFees(caller, recipient)
    );
    log.info({ recipient, amount: amount.toString() }, 'Fees withdrawn');
    await this.refreshGauges();
    return amount;
  }

  async transferAdministration(caller: Identity, administrator: Identity): Promise<LedgerState> {
    await this.instrument('transferAdministration', {}, (ledger) =>
      ledger.transferAdministration(caller, administrator)
    );
    log.info({ previous: caller, administrator }, 'Administration transferred');
    return this.getState();
  }

  async getRecord(recordId: number): Promise<EscrowRecord> {
    return this.getLedger().recordDetails(recordId);
  }

  async getState(): Promise<LedgerState> {
    return this.getLedger().getState();
  }

  async recordsByDepositor(identity: Identity, page: PageRequest = {}): Promise<Page> {
    return this.paginate(await this.getLedger().recordsByDepositor(identity), page);
  }

  async recordsByBeneficiary(identity: Identity, page: PageRequest = {}): Promise<Page> {
    return this.paginate(await this.getLedger().recordsByBeneficiary(identity), page);
  }

  private paginate(recordIds: number[], { offset = 0, limit }: PageRequest): Page {
    const size = Math.min(limit ?? config.escrow.maxPageLimit, config.escrow.maxPageLimit);
    return {
      recordIds: recordIds.slice(offset, offset + size),
      total: recordIds.length,
      offset,
      limit: size,
    };
  }
}

export const escrowService = new EscrowService();
