/**
 * Escrow Module
 *
 * Time-locked custodial escrow: the ledger state machine, its collaborators
 * (clock, wallet custody, Mongo repository, event sink) and the HTTP layer.
 */

// Ledger core
export { EscrowLedger, EscrowLedgerOptions, LedgerDefaults, normalizeIdentity } from './escrow.ledger';
export { OperationGuard } from './escrow.guard';
export { computeFee, splitFee, BASIS_POINTS_DENOMINATOR, MAX_FEE_BASIS_POINTS } from './escrow.fees';
export { EscrowErrors } from './escrow.errors';
export * from './escrow.types';

// Collaborators
export { SystemClock } from './escrow.clock';
export { WalletCustody, CustodyWallets, sendReference } from './escrow.custody';
export { MongoLedgerRepository } from './escrow.repository';
export {
  transferSimulation,
  TransferSimulation,
  SimulatedFailureError,
  FailureType,
} from './escrow.simulation';

// Service
export { escrowService, EscrowService, Page, PageRequest } from './escrow.service';

// Event handlers
export {
  escrowEventSink,
  registerEscrowEventHandlers,
  unregisterEscrowEventHandlers,
} from './escrow.events';

// HTTP
export { escrowController, ledgerController } from './escrow.controller';
export { escrowRoutes, ledgerRoutes } from './escrow.routes';
