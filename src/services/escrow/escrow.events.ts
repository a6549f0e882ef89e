/**
 * Escrow notifications on the event bus
 *
 * The ledger hands every notification to `escrowEventSink`, which publishes
 * it on the channel for its event type. The registered handlers write an
 * audit line per notification.
 */

import { eventBus } from '../../events/eventBus';
import { createServiceLogger } from '../../observability/logger';
import { BaseEvent, EscrowEvent, EventType } from '../../types/events';

import type { EscrowEventSink } from './escrow.types';

const log = createServiceLogger('escrow-events');

export const escrowEventSink: EscrowEventSink = {
  publish: (event: EscrowEvent) => eventBus.publish(event),
};

const ESCROW_EVENT_TYPES: EventType[] = [
  EventType.ESCROW_STORED,
  EventType.ESCROW_CLAIMED,
  EventType.FEE_UPDATED,
  EventType.FEES_WITHDRAWN,
  EventType.ADMINISTRATION_TRANSFERRED,
];

export async function handleEscrowEvent(event: BaseEvent): Promise<void> {
  log.info(
    { eventType: event.eventType, sequence: event.sequence, payload: event.payload },
    'Escrow audit'
  );
}

export async function registerEscrowEventHandlers(): Promise<void> {
  try {
    for (const eventType of ESCROW_EVENT_TYPES) {
      await eventBus.subscribe(eventType, handleEscrowEvent);
    }
    log.info('Escrow event handlers registered');
  } catch (error) {
    log.error({ err: error }, 'Failed to register escrow event handlers');
    throw error;
  }
}

export async function unregisterEscrowEventHandlers(): Promise<void> {
  try {
    for (const eventType of ESCROW_EVENT_TYPES) {
      await eventBus.unsubscribe(eventType);
    }
    log.info('Escrow event handlers unregistered');
  } catch (error) {
    log.error({ err: error }, 'Failed to unregister escrow event handlers');
  }
}
