import mongoose, { Document, Schema } from 'mongoose';

export const LEDGER_SETTINGS_KEY = 'escrow-ledger';

/**
 * Singleton document holding the ledger's scalar state
 */
export interface ILedgerSettings extends Document {
  key: string;
  nextRecordId: number;
  feeBasisPoints: number;
  collectedFees: string;
  administrator: string;
  feePolicy: 'STORE_AND_CLAIM' | 'STORE_ONLY';
  eventSequence: number;
  createdAt: Date;
  updatedAt: Date;
}

const ledgerSettingsSchema = new Schema<ILedgerSettings>(
  {
    key: {
      type: String,
      required: true,
      unique: true,
      default: LEDGER_SETTINGS_KEY,
    },
    nextRecordId: {
      type: Number,
      required: true,
      min: 0,
    },
    feeBasisPoints: {
      type: Number,
      required: true,
      min: 0,
      max: 10000,
    },
    collectedFees: {
      type: String,
      required: true,
      match: /^\d+$/,
    },
    administrator: {
      type: String,
      required: true,
    },
    feePolicy: {
      type: String,
      required: true,
      enum: ['STORE_AND_CLAIM', 'STORE_ONLY'],
    },
    eventSequence: {
      type: Number,
      required: true,
      default: 0,
    },
  },
  {
    timestamps: true,
  }
);

export const LedgerSettings = mongoose.model<ILedgerSettings>('LedgerSettings', ledgerSettingsSchema);
