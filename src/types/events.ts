export enum EventType {
  // Record lifecycle
  ESCROW_STORED = 'ESCROW_STORED',
  ESCROW_CLAIMED = 'ESCROW_CLAIMED',

  // Fee pool administration
  FEE_UPDATED = 'FEE_UPDATED',
  FEES_WITHDRAWN = 'FEES_WITHDRAWN',

  // Role management
  ADMINISTRATION_TRANSFERRED = 'ADMINISTRATION_TRANSFERRED',
}

/**
 * Amounts travel as decimal strings: they are unsigned integers in base units
 * and may exceed Number.MAX_SAFE_INTEGER.
 */
export interface BaseEvent {
  eventType: EventType;
  sequence: number;
  timestamp: Date;
  payload: Record<string, unknown>;
}

export interface EscrowStoredEvent extends BaseEvent {
  eventType: EventType.ESCROW_STORED;
  payload: {
    depositor: string;
    beneficiary: string;
    netAmount: string;
    unlockTime: number;
    recordId: number;
  };
}

export interface EscrowClaimedEvent extends BaseEvent {
  eventType: EventType.ESCROW_CLAIMED;
  payload: {
    beneficiary: string;
    payout: string;
    recordId: number;
  };
}

export interface FeeUpdatedEvent extends BaseEvent {
  eventType: EventType.FEE_UPDATED;
  payload: {
    feeBasisPoints: number;
  };
}

export interface FeesWithdrawnEvent extends BaseEvent {
  eventType: EventType.FEES_WITHDRAWN;
  payload: {
    recipient: string;
    amount: string;
  };
}

export interface AdministrationTransferredEvent extends BaseEvent {
  eventType: EventType.ADMINISTRATION_TRANSFERRED;
  payload: {
    previousAdministrator: string;
    newAdministrator: string;
  };
}

export type EscrowEvent =
  | EscrowStoredEvent
  | EscrowClaimedEvent
  | FeeUpdatedEvent
  | FeesWithdrawnEvent
  | AdministrationTransferredEvent;

export type EventHandler<T extends BaseEvent = BaseEvent> = (event: T) => Promise<void>;
