import { createServiceLogger, Logger } from '../../observability/logger';
import { EscrowEvent, EventType } from '../../types/events';
import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';

import { EscrowErrors } from './escrow.errors';
import { computeFee, MAX_FEE_BASIS_POINTS, splitFee } from './escrow.fees';
import { OperationGuard } from './escrow.guard';
import type {
  ClaimReceipt,
  Clock,
  EscrowEventSink,
  EscrowRecord,
  FeePolicy,
  Identity,
  LedgerRepository,
  LedgerSettingsState,
  LedgerState,
  MutatingOperation,
  StoreReceipt,
  ValueCustody,
} from './escrow.types';

export interface LedgerDefaults {
  administrator: Identity;
  feeBasisPoints: number;
  feePolicy: FeePolicy;
}

export interface EscrowLedgerOptions {
  repository: LedgerRepository;
  custody: ValueCustody;
  clock: Clock;
  defaults: LedgerDefaults;
  sink?: EscrowEventSink;
  logger?: Logger;
}

/**
 * Trimmed identity, or null for the null identity
 */
export const normalizeIdentity = (value: string | null | undefined): Identity | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

const copyRecord = (record: EscrowRecord): EscrowRecord => ({ ...record });

class UndoLog {
  private readonly steps: Array<() => void> = [];

  record(step: () => void): void {
    this.steps.push(step);
  }

  rollback(): void {
    let step = this.steps.pop();
    while (step) {
      step();
      step = this.steps.pop();
    }
  }
}

const assertFeeRate = (feeBasisPoints: number): void => {
  if (!Number.isInteger(feeBasisPoints) || feeBasisPoints < 0) {
    throw EscrowErrors.invalidInput('feeBasisPoints must be a non-negative integer');
  }
  if (feeBasisPoints > MAX_FEE_BASIS_POINTS) {
    throw EscrowErrors.feeTooHigh(feeBasisPoints);
  }
};

/**
 * Custodial time-locked escrow ledger.
 *
 * All state lives in memory and is written through the repository before any
 * value leaves custody. A failed write or send restores memory from the undo
 * log and writes the previous state back.
 */
export class EscrowLedger {
  private readonly guard = new OperationGuard();
  private readonly records: EscrowRecord[] = [];
  private readonly byDepositor = new Map<Identity, number[]>();
  private readonly byBeneficiary = new Map<Identity, number[]>();
  private readonly journal: EscrowEvent[] = [];
  private readonly repository: LedgerRepository;
  private readonly custody: ValueCustody;
  private readonly clock: Clock;
  private readonly sink?: EscrowEventSink;
  private readonly log: Logger;

  private constructor(options: EscrowLedgerOptions, private settings: LedgerSettingsState) {
    this.repository = options.repository;
    this.custody = options.custody;
    this.clock = options.clock;
    this.sink = options.sink;
    this.log = options.logger ?? createServiceLogger('escrow-ledger');
  }

  /**
   * Load persisted state, or start an empty ledger from the defaults.
   * The fee policy always comes from the defaults.
   */
  static async open(options: EscrowLedgerOptions): Promise<EscrowLedger> {
    const { repository, defaults } = options;
    const snapshot = await repository.load();

    if (!snapshot) {
      const administrator = normalizeIdentity(defaults.administrator);
      if (!administrator) {
        throw EscrowErrors.invalidAdministrator();
      }
      assertFeeRate(defaults.feeBasisPoints);

      const settings: LedgerSettingsState = {
        nextRecordId: 0,
        feeBasisPoints: defaults.feeBasisPoints,
        collectedFees: 0n,
        administrator,
        feePolicy: defaults.feePolicy,
        eventSequence: 0,
      };
      await repository.saveSettings(settings);
      return new EscrowLedger(options, settings);
    }

    const settings: LedgerSettingsState = { ...snapshot.settings };
    const ledger = new EscrowLedger(options, settings);
    ledger.hydrate(snapshot.records);

    if (settings.feePolicy !== defaults.feePolicy) {
      ledger.log.info(
        { previous: settings.feePolicy, current: defaults.feePolicy },
        'Fee policy changed by configuration'
      );
      settings.feePolicy = defaults.feePolicy;
      await repository.saveSettings(settings);
    }

    return ledger;
  }

  private hydrate(persisted: EscrowRecord[]): void {
    const ordered = [...persisted].sort((a, b) => a.recordId - b.recordId);

    for (const record of ordered) {
      // Written by a store whose settings commit failed
      if (record.recordId >= this.settings.nextRecordId) {
        this.log.warn({ recordId: record.recordId }, 'Ignoring uncommitted escrow record');
        continue;
      }
      if (record.recordId !== this.records.length) {
        throw new Error(`Escrow records are not contiguous at recordId ${record.recordId}`);
      }
      this.records.push(copyRecord(record));
      this.index(this.byDepositor, record.depositor).push(record.recordId);
      this.index(this.byBeneficiary, record.beneficiary).push(record.recordId);
    }

    if (this.records.length !== this.settings.nextRecordId) {
      throw new Error(
        `Expected ${this.settings.nextRecordId} escrow records, found ${this.records.length}`
      );
    }
  }

  get activeOperation(): MutatingOperation | null {
    return this.guard.activeOperation;
  }

  /**
   * Take the deposit into custody and open a record for the beneficiary.
   * The store fee goes to the pool; the record holds the rest. If persisting
   * fails the deposit is refunded.
   */
  store(
    caller: Identity,
    beneficiary: Identity | null | undefined,
    unlockTime: number,
    depositedValue: bigint
  ): Promise<StoreReceipt> {
    return this.guard.run('store', async () => {
      const depositor = this.requireCaller(caller);
      if (!Number.isSafeInteger(unlockTime)) {
        throw EscrowErrors.invalidInput('unlockTime must be an integer number of seconds');
      }
      if (depositedValue < 0n) {
        throw EscrowErrors.invalidInput('Deposited value must not be negative');
      }

      const recipient = normalizeIdentity(beneficiary);
      if (!recipient) {
        throw EscrowErrors.invalidBeneficiary();
      }
      if (depositedValue === 0n) {
        throw EscrowErrors.zeroValue();
      }
      const now = this.clock.now();
      if (unlockTime <= now) {
        throw EscrowErrors.unlockTimeInPast(unlockTime, now);
      }

      const reference = await this.custody.receive(depositor, depositedValue);

      const { fee, net } = splitFee(depositedValue, this.settings.feeBasisPoints);
      const undo = new UndoLog();
      const record: EscrowRecord = {
        recordId: this.settings.nextRecordId,
        amount: net,
        unlockTime,
        claimed: false,
        depositor,
        beneficiary: recipient,
      };

      this.creditPool(fee, undo);
      this.setSetting('nextRecordId', record.recordId + 1, undo);
      this.records.push(record);
      undo.record(() => {
        this.records.pop();
      });
      this.appendIndex(this.byDepositor, depositor, record.recordId, undo);
      this.appendIndex(this.byBeneficiary, recipient, record.recordId, undo);
      const sequence = this.nextSequence(undo);

      try {
        await this.repository.saveRecord(record);
        await this.repository.saveSettings(this.settings);
      } catch (error) {
        undo.rollback();
        await this.restorePersisted([]);
        await this.reverseDeposit(depositor, depositedValue, reference);
        throw error;
      }

      await this.emit({
        eventType: EventType.ESCROW_STORED,
        sequence,
        timestamp: new Date(),
        payload: {
          depositor,
          beneficiary: recipient,
          netAmount: net.toString(),
          unlockTime,
          recordId: record.recordId,
        },
      });

      return { recordId: record.recordId, fee, netAmount: net };
    });
  }

  /**
   * Pay an unlocked record out to its beneficiary, less the claim fee under
   * STORE_AND_CLAIM. The record is marked claimed and persisted before the
   * send; a failed send restores it.
   */
  claim(recordId: number, caller: Identity): Promise<ClaimReceipt> {
    return this.guard.run('claim', async () => {
      const claimant = this.requireCaller(caller);
      if (!Number.isSafeInteger(recordId)) {
        throw EscrowErrors.invalidInput('recordId must be an integer');
      }

      const record = this.records[recordId];
      if (!record) {
        throw EscrowErrors.recordNotFound(recordId);
      }
      if (record.beneficiary !== claimant) {
        throw EscrowErrors.notBeneficiary(recordId);
      }
      if (record.claimed) {
        throw EscrowErrors.alreadyClaimed(recordId);
      }
      if (this.clock.now() < record.unlockTime) {
        throw EscrowErrors.notYetUnlocked(recordId, record.unlockTime);
      }
      if (record.amount === 0n) {
        throw EscrowErrors.nothingToClaim(recordId);
      }

      const fee =
        this.settings.feePolicy === 'STORE_AND_CLAIM'
          ? computeFee(record.amount, this.settings.feeBasisPoints)
          : 0n;
      const payout = record.amount - fee;

      const undo = new UndoLog();
      const previousAmount = record.amount;
      this.creditPool(fee, undo);
      record.claimed = true;
      record.amount = 0n;
      undo.record(() => {
        record.claimed = false;
        record.amount = previousAmount;
      });
      const sequence = this.nextSequence(undo);

      await this.commit(undo, [record]);

      try {
        await this.custody.send(claimant, payout, { kind: 'claim', recordId });
      } catch (error) {
        undo.rollback();
        await this.restorePersisted([record]);
        throw this.transferFailure('claim', error);
      }

      await this.emit({
        eventType: EventType.ESCROW_CLAIMED,
        sequence,
        timestamp: new Date(),
        payload: { beneficiary: claimant, payout: payout.toString(), recordId },
      });

      return { recordId, fee, payout };
    });
  }

  setFeeRate(caller: Identity, feeBasisPoints: number): Promise<void> {
    return this.guard.run('setFeeRate', async () => {
      if (!Number.isInteger(feeBasisPoints) || feeBasisPoints < 0) {
        throw EscrowErrors.invalidInput('feeBasisPoints must be a non-negative integer');
      }
      this.requireAdministrator(caller);
      if (feeBasisPoints > MAX_FEE_BASIS_POINTS) {
        throw EscrowErrors.feeTooHigh(feeBasisPoints);
      }

      const undo = new UndoLog();
      this.setSetting('feeBasisPoints', feeBasisPoints, undo);
      const sequence = this.nextSequence(undo);
      await this.commit(undo, []);

      await this.emit({
        eventType: EventType.FEE_UPDATED,
        sequence,
        timestamp: new Date(),
        payload: { feeBasisPoints },
      });
    });
  }

  /**
   * Send the whole fee pool to `recipient`. An empty pool still sends zero.
   */
  withdrawFees(caller: Identity, recipient: Identity | null | undefined): Promise<bigint> {
    return this.guard.run('withdrawFees', async () => {
      this.requireAdministrator(caller);
      const to = normalizeIdentity(recipient);
      if (!to) {
        throw EscrowErrors.invalidRecipient();
      }

      const amount = this.settings.collectedFees;
      const undo = new UndoLog();
      this.setSetting('collectedFees', 0n, undo);
      const sequence = this.nextSequence(undo);
      await this.commit(undo, []);

      try {
        await this.custody.send(to, amount, { kind: 'withdrawal' });
      } catch (error) {
        undo.rollback();
        await this.restorePersisted([]);
        throw this.transferFailure('withdrawFees', error);
      }

      await this.emit({
        eventType: EventType.FEES_WITHDRAWN,
        sequence,
        timestamp: new Date(),
        payload: { recipient: to, amount: amount.toString() },
      });

      return amount;
    });
  }

  transferAdministration(
    caller: Identity,
    newAdministrator: Identity | null | undefined
  ): Promise<void> {
    return this.guard.run('transferAdministration', async () => {
      const previousAdministrator = this.requireAdministrator(caller);
      const next = normalizeIdentity(newAdministrator);
      if (!next) {
        throw EscrowErrors.invalidAdministrator();
      }

      const undo = new UndoLog();
      this.setSetting('administrator', next, undo);
      const sequence = this.nextSequence(undo);
      await this.commit(undo, []);

      await this.emit({
        eventType: EventType.ADMINISTRATION_TRANSFERRED,
        sequence,
        timestamp: new Date(),
        payload: { previousAdministrator, newAdministrator: next },
      });
    });
  }

  /**
   * Record ids in creation order
   */
  recordsByDepositor(identity: Identity): Promise<number[]> {
    return this.guard.read(() => [...(this.byDepositor.get(identity.trim()) ?? [])]);
  }

  recordsByBeneficiary(identity: Identity): Promise<number[]> {
    return this.guard.read(() => [...(this.byBeneficiary.get(identity.trim()) ?? [])]);
  }

  recordDetails(recordId: number): Promise<EscrowRecord> {
    return this.guard.read(() => {
      const record = Number.isSafeInteger(recordId) ? this.records[recordId] : undefined;
      if (!record) {
        throw EscrowErrors.recordNotFound(recordId);
      }
      return copyRecord(record);
    });
  }

  getState(): Promise<LedgerState> {
    return this.guard.read(() => ({
      nextRecordId: this.settings.nextRecordId,
      feeBasisPoints: this.settings.feeBasisPoints,
      collectedFees: this.settings.collectedFees,
      administrator: this.settings.administrator,
      feePolicy: this.settings.feePolicy,
    }));
  }

  /**
   * Notifications emitted since this ledger was opened, oldest first
   */
  getNotifications(afterSequence = 0): Promise<EscrowEvent[]> {
    return this.guard.read(() => this.journal.filter((event) => event.sequence > afterSequence));
  }

  private requireCaller(caller: Identity): Identity {
    const identity = normalizeIdentity(caller);
    if (!identity) {
      throw EscrowErrors.invalidInput('Caller identity is required');
    }
    return identity;
  }

  private requireAdministrator(caller: Identity): Identity {
    const identity = normalizeIdentity(caller);
    if (!identity || identity !== this.settings.administrator) {
      throw EscrowErrors.notAdministrator();
    }
    return identity;
  }

  private index(map: Map<Identity, number[]>, identity: Identity): number[] {
    let list = map.get(identity);
    if (!list) {
      list = [];
      map.set(identity, list);
    }
    return list;
  }

  private appendIndex(
    map: Map<Identity, number[]>,
    identity: Identity,
    recordId: number,
    undo: UndoLog
  ): void {
    const existed = map.has(identity);
    const list = this.index(map, identity);
    list.push(recordId);
    undo.record(() => {
      list.pop();
      if (!existed) {
        map.delete(identity);
      }
    });
  }

  private setSetting<K extends keyof LedgerSettingsState>(
    key: K,
    value: LedgerSettingsState[K],
    undo: UndoLog
  ): void {
    const previous = this.settings[key];
    this.settings[key] = value;
    undo.record(() => {
      this.settings[key] = previous;
    });
  }

  private creditPool(fee: bigint, undo: UndoLog): void {
    this.setSetting('collectedFees', this.settings.collectedFees + fee, undo);
  }

  private nextSequence(undo: UndoLog): number {
    const sequence = this.settings.eventSequence + 1;
    this.setSetting('eventSequence', sequence, undo);
    return sequence;
  }

  /**
   * Write touched records, then settings. On failure memory and storage are
   * put back before the error propagates.
   */
  private async commit(undo: UndoLog, touched: EscrowRecord[]): Promise<void> {
    try {
      for (const record of touched) {
        await this.repository.saveRecord(record);
      }
      await this.repository.saveSettings(this.settings);
    } catch (error) {
      undo.rollback();
      await this.restorePersisted(touched);
      throw error;
    }
  }

  private async restorePersisted(records: EscrowRecord[]): Promise<void> {
    try {
      for (const record of records) {
        await this.repository.saveRecord(record);
      }
      await this.repository.saveSettings(this.settings);
    } catch (error) {
      this.log.error(
        { err: error, recordIds: records.map((record) => record.recordId) },
        'Failed to restore persisted ledger state after rollback'
      );
    }
  }

  private async reverseDeposit(from: Identity, amount: bigint, reference: string): Promise<void> {
    try {
      await this.custody.reverse(from, amount, reference);
    } catch (error) {
      this.log.error(
        { err: error, depositor: from, amount: amount.toString(), reference },
        'Failed to reverse escrow deposit'
      );
    }
  }

  private transferFailure(operation: MutatingOperation, error: unknown): ApiError {
    if (error instanceof ApiError && error.errorCode === ErrorCode.TRANSFER_FAILED) {
      return error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    this.log.warn({ operation, reason }, 'Value transfer failed, ledger state rolled back');
    return EscrowErrors.transferFailed(reason);
  }

  private async emit(event: EscrowEvent): Promise<void> {
    this.journal.push(event);
    if (!this.sink) {
      return;
    }
    try {
      await this.sink.publish(event);
    } catch (error) {
      this.log.warn(
        { err: error, eventType: event.eventType, sequence: event.sequence },
        'Failed to publish escrow notification'
      );
    }
  }
}
