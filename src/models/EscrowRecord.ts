import mongoose, { Document, Schema } from 'mongoose';

/**
 * Persisted escrow record. `amount` is a base-unit decimal string;
 * the depositor/beneficiary indexes back the per-party lookups.
 */
export interface IEscrowRecord extends Document {
  recordId: number;
  amount: string;
  unlockTime: number;
  claimed: boolean;
  depositor: string;
  beneficiary: string;
  createdAt: Date;
  updatedAt: Date;
}

const escrowRecordSchema = new Schema<IEscrowRecord>(
  {
    recordId: {
      type: Number,
      required: true,
      unique: true,
      min: 0,
    },
    amount: {
      type: String,
      required: true,
      match: /^\d+$/,
    },
    unlockTime: {
      type: Number,
      required: true,
    },
    claimed: {
      type: Boolean,
      required: true,
      default: false,
    },
    depositor: {
      type: String,
      required: true,
    },
    beneficiary: {
      type: String,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

escrowRecordSchema.index({ depositor: 1, recordId: 1 });
escrowRecordSchema.index({ beneficiary: 1, recordId: 1 });

export const EscrowRecordModel = mongoose.model<IEscrowRecord>('EscrowRecord', escrowRecordSchema);
