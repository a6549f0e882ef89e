import type { FeePolicySetting } from '../../config/environments';
import type { EscrowEvent } from '../../types/events';

/**
 * An authenticated user id. The null identity is an absent value or a string
 * that is empty after trimming.
 */
export type Identity = string;

export type FeePolicy = FeePolicySetting;

export interface EscrowRecord {
  recordId: number;
  /** Remaining claimable amount in base units; 0 once claimed */
  amount: bigint;
  /** Seconds since epoch */
  unlockTime: number;
  claimed: boolean;
  depositor: Identity;
  beneficiary: Identity;
}

export interface LedgerSettingsState {
  nextRecordId: number;
  feeBasisPoints: number;
  collectedFees: bigint;
  administrator: Identity;
  feePolicy: FeePolicy;
  eventSequence: number;
}

export interface LedgerSnapshot {
  settings: LedgerSettingsState;
  records: EscrowRecord[];
}

export type LedgerState = Omit<LedgerSettingsState, 'eventSequence'>;

export interface StoreReceipt {
  recordId: number;
  fee: bigint;
  netAmount: bigint;
}

export interface ClaimReceipt {
  recordId: number;
  fee: bigint;
  payout: bigint;
}

export interface Clock {
  /** Integer seconds since epoch */
  now(): number;
}

export type SendPurpose = { kind: 'claim'; recordId: number } | { kind: 'withdrawal' };

/**
 * Moves value between the ledger and its users. `receive` pulls a deposit and
 * returns a reference that `reverse` accepts to hand it back.
 */
export interface ValueCustody {
  receive(from: Identity, amount: bigint): Promise<string>;
  reverse(from: Identity, amount: bigint, reference: string): Promise<void>;
  send(to: Identity, amount: bigint, purpose: SendPurpose): Promise<void>;
}

export interface LedgerRepository {
  /** Null when nothing has been persisted yet */
  load(): Promise<LedgerSnapshot | null>;
  saveSettings(settings: LedgerSettingsState): Promise<void>;
  saveRecord(record: EscrowRecord): Promise<void>;
}

export interface EscrowEventSink {
  publish(event: EscrowEvent): Promise<void>;
}

export type MutatingOperation =
  | 'store'
  | 'claim'
  | 'setFeeRate'
  | 'withdrawFees'
  | 'transferAdministration';
