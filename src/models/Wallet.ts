import mongoose, { Document, Schema, Types } from 'mongoose';

/**
 * Balances are unsigned integers in base units. Decimal128 keeps them exact
 * beyond 2^53 and still supports atomic $inc and $gte.
 */
export interface IWallet extends Document {
  walletId: string;
  userId: string;
  balance: Types.Decimal128;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const walletSchema = new Schema<IWallet>(
  {
    walletId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    userId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    balance: {
      type: Schema.Types.Decimal128,
      required: true,
      default: () => Types.Decimal128.fromString('0'),
    },
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  {
    timestamps: true,
  }
);

export const Wallet = mongoose.model<IWallet>('Wallet', walletSchema);

/**
 * Decimal128 keeps 34 significant digits; past that `$inc` rounds. Balances
 * and amounts are held to whole numbers of at most 34 digits.
 */
export const MAX_BALANCE_DIGITS = 34;
export const MAX_WALLET_BALANCE = 10n ** BigInt(MAX_BALANCE_DIGITS) - 1n;

export const toDecimal128 = (amount: bigint): Types.Decimal128 => {
  if (amount > MAX_WALLET_BALANCE || amount < -MAX_WALLET_BALANCE) {
    throw new RangeError(`Amount ${amount} does not fit in ${MAX_BALANCE_DIGITS} digits`);
  }
  return Types.Decimal128.fromString(amount.toString());
};

export const fromDecimal128 = (value: Types.Decimal128): bigint => {
  const text = value.toString();
  if (!/^-?\d+$/.test(text)) {
    throw new RangeError(`Stored amount ${text} is not a whole number of base units`);
  }
  return BigInt(text);
};
