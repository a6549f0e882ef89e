import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';

export const EscrowErrors = {
  invalidBeneficiary: () =>
    new ApiError(ErrorCode.INVALID_BENEFICIARY, 'Beneficiary must be a non-empty identity'),

  zeroValue: () => new ApiError(ErrorCode.ZERO_VALUE, 'Deposited value must be greater than zero'),

  unlockTimeInPast: (unlockTime: number, now: number) =>
    new ApiError(
      ErrorCode.UNLOCK_TIME_IN_PAST,
      `Unlock time ${unlockTime} must be after the current time ${now}`
    ),

  recordNotFound: (recordId: number) =>
    new ApiError(ErrorCode.RECORD_NOT_FOUND, `Escrow record ${recordId} not found`),

  notBeneficiary: (recordId: number) =>
    new ApiError(ErrorCode.NOT_BENEFICIARY, `Caller is not the beneficiary of record ${recordId}`),

  alreadyClaimed: (recordId: number) =>
    new ApiError(ErrorCode.ALREADY_CLAIMED, `Escrow record ${recordId} has already been claimed`),

  notYetUnlocked: (recordId: number, unlockTime: number) =>
    new ApiError(
      ErrorCode.NOT_YET_UNLOCKED,
      `Escrow record ${recordId} is locked until ${unlockTime}`
    ),

  nothingToClaim: (recordId: number) =>
    new ApiError(ErrorCode.NOTHING_TO_CLAIM, `Escrow record ${recordId} holds nothing to claim`),

  notAdministrator: () =>
    new ApiError(ErrorCode.NOT_ADMINISTRATOR, 'Only the ledger administrator may do this'),

  feeTooHigh: (feeBasisPoints: number) =>
    new ApiError(
      ErrorCode.FEE_TOO_HIGH,
      `Fee rate ${feeBasisPoints} exceeds the maximum of 10000 basis points`
    ),

  invalidRecipient: () =>
    new ApiError(ErrorCode.INVALID_RECIPIENT, 'Recipient must be a non-empty identity'),

  invalidAdministrator: () =>
    new ApiError(ErrorCode.INVALID_ADMINISTRATOR, 'Administrator must be a non-empty identity'),

  reentrantCall: (operation: string, activeOperation: string) =>
    new ApiError(
      ErrorCode.REENTRANT_CALL,
      `Cannot run ${operation} while ${activeOperation} is in progress`
    ),

  transferFailed: (reason: string) =>
    new ApiError(ErrorCode.TRANSFER_FAILED, `Value transfer failed: ${reason}`),

  invalidInput: (message: string) => ApiError.invalidInput(message),
};
