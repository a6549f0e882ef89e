import { computeFee, splitFee } from '../../../src/services/escrow/escrow.fees';

describe('escrow fees', () => {
  it('should round the fee down', () => {
    expect(computeFee(1_000_000_000_000_000_000n, 42)).toBe(4_200_000_000_000_000n);
    expect(computeFee(999n, 42)).toBe(4n);
    expect(computeFee(238n, 42)).toBe(0n);
  });

  it('should take nothing at 0 and everything at 10000', () => {
    expect(computeFee(123_456n, 0)).toBe(0n);
    expect(computeFee(123_456n, 10000)).toBe(123_456n);
  });

  it('should not lose precision above 2^53', () => {
    const amount = 2n ** 200n + 1n;
    const { fee, net } = splitFee(amount, 1);
    expect(fee).toBe(amount / 10000n);
    expect(fee + net).toBe(amount);
  });

  it('should split so both parts add back to the amount', () => {
    expect(splitFee(12_345n, 42)).toEqual({ fee: 51n, net: 12_294n });
  });
});
