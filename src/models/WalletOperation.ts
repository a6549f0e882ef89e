import mongoose, { Document, Schema, Types } from 'mongoose';

export type OperationType = 'DEBIT' | 'CREDIT' | 'REFUND' | 'DEPOSIT';

/**
 * One applied balance change. `operationId` is unique, which is what makes
 * wallet operations idempotent: replaying an id returns the recorded result.
 */
export interface IWalletOperation extends Document {
  operationId: string;
  walletId: string;
  userId: string;
  type: OperationType;
  amount: Types.Decimal128;
  resultBalance: Types.Decimal128;
  reference?: string;
  createdAt: Date;
  updatedAt: Date;
}

const walletOperationSchema = new Schema<IWalletOperation>(
  {
    operationId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    walletId: {
      type: String,
      required: true,
      index: true,
    },
    userId: {
      type: String,
      required: true,
      index: true,
    },
    type: {
      type: String,
      required: true,
      enum: ['DEBIT', 'CREDIT', 'REFUND', 'DEPOSIT'],
    },
    amount: {
      type: Schema.Types.Decimal128,
      required: true,
    },
    resultBalance: {
      type: Schema.Types.Decimal128,
      required: true,
    },
    reference: {
      type: String,
      index: true,
    },
  },
  {
    timestamps: true,
  }
);

walletOperationSchema.index({ walletId: 1, createdAt: -1 });

export const WalletOperation = mongoose.model<IWalletOperation>(
  'WalletOperation',
  walletOperationSchema
);
