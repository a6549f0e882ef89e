export { User, IUser } from './User';
export {
  Wallet,
  IWallet,
  toDecimal128,
  fromDecimal128,
  MAX_BALANCE_DIGITS,
  MAX_WALLET_BALANCE,
} from './Wallet';
export { WalletOperation, IWalletOperation, OperationType } from './WalletOperation';
export { EscrowRecordModel, IEscrowRecord } from './EscrowRecord';
export { LedgerSettings, ILedgerSettings, LEDGER_SETTINGS_KEY } from './LedgerSettings';
