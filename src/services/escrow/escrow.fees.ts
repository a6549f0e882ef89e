export const BASIS_POINTS_DENOMINATOR = 10000n;
export const MAX_FEE_BASIS_POINTS = 10000;

/**
 * floor(amount * bp / 10000)
 */
export const computeFee = (amount: bigint, feeBasisPoints: number): bigint =>
  (amount * BigInt(feeBasisPoints)) / BASIS_POINTS_DENOMINATOR;

/**
 * Split an amount into the fee kept by the pool and the remainder.
 * `fee + net === amount` always holds.
 */
export const splitFee = (
  amount: bigint,
  feeBasisPoints: number
): { fee: bigint; net: bigint } => {
  const fee = computeFee(amount, feeBasisPoints);
  return { fee, net: amount - fee };
};
