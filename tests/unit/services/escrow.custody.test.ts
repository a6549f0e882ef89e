import { ApiError } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';
import {
  WalletCustody,
  CustodyWallets,
  sendReference,
} from '../../../src/services/escrow/escrow.custody';
import { TransferSimulation } from '../../../src/services/escrow/escrow.simulation';

const result = <T extends 'DEBIT' | 'CREDIT' | 'REFUND'>(type: T) => ({
  success: true,
  newBalance: 0n,
  operationId: `op:${type}`,
  idempotent: false,
  type,
});

describe('WalletCustody', () => {
  let wallets: jest.Mocked<CustodyWallets>;
  let simulation: TransferSimulation;
  let custody: WalletCustody;

  beforeEach(() => {
    wallets = {
      debit: jest.fn().mockResolvedValue(result('DEBIT')),
      credit: jest.fn().mockResolvedValue(result('CREDIT')),
      refund: jest.fn().mockResolvedValue(result('REFUND')),
    };
    simulation = new TransferSimulation(() => 0.99);
    custody = new WalletCustody(wallets, simulation);
  });

  describe('sendReference', () => {
    it('should key claims by record id', () => {
      expect(sendReference({ kind: 'claim', recordId: 7 })).toBe('escrow-claim:7');
    });

    it('should make every withdrawal reference unique', () => {
      const first = sendReference({ kind: 'withdrawal' });
      expect(first).toMatch(/^fee-withdrawal:[0-9a-f-]{36}$/);
      expect(sendReference({ kind: 'withdrawal' })).not.toBe(first);
    });
  });

  describe('receive', () => {
    it('should debit the depositor and return the reference', async () => {
      const reference = await custody.receive('user_alice', 500n);

      expect(reference).toMatch(/^escrow-deposit:[0-9a-f-]{36}$/);
      expect(wallets.debit).toHaveBeenCalledWith('user_alice', 500n, reference);
    });

    it('should pass insufficient balance through unchanged', async () => {
      const insufficient = ApiError.insufficientBalance();
      wallets.debit.mockRejectedValueOnce(insufficient);

      await expect(custody.receive('user_alice', 500n)).rejects.toBe(insufficient);
    });

    it('should pass an amount past the wallet limit through unchanged', async () => {
      const tooWide = new ApiError(ErrorCode.INVALID_AMOUNT, 'Amount exceeds the 34-digit wallet limit');
      wallets.debit.mockRejectedValueOnce(tooWide);

      await expect(custody.receive('user_alice', 10n ** 34n)).rejects.toBe(tooWide);
    });

    it('should report any other debit failure as a failed transfer', async () => {
      wallets.debit.mockRejectedValueOnce(ApiError.notFound('Wallet'));

      await expect(custody.receive('user_alice', 500n)).rejects.toMatchObject({
        errorCode: ErrorCode.TRANSFER_FAILED,
        message: 'Value transfer failed: could not collect deposit: Wallet not found',
      });
    });
  });

  describe('reverse', () => {
    it('should refund under the deposit reference', async () => {
      await custody.reverse('user_alice', 500n, 'escrow-deposit:abc');

      expect(wallets.refund).toHaveBeenCalledWith('user_alice', 500n, 'escrow-deposit:abc');
    });
  });

  describe('send', () => {
    it('should credit the recipient under the claim reference', async () => {
      await custody.send('user_bob', 991n, { kind: 'claim', recordId: 3 });

      expect(wallets.credit).toHaveBeenCalledWith('user_bob', 991n, 'escrow-claim:3');
    });

    it('should turn a credit failure into TRANSFER_FAILED', async () => {
      wallets.credit.mockRejectedValueOnce(new Error('connection reset'));

      await expect(custody.send('user_bob', 1n, { kind: 'withdrawal' })).rejects.toMatchObject({
        errorCode: ErrorCode.TRANSFER_FAILED,
        message: 'Value transfer failed: connection reset',
      });
    });

    it('should fail without crediting when the simulation rejects the recipient', async () => {
      simulation.enable({ failRecipients: ['user_bob'] });

      await expect(custody.send('user_bob', 1n, { kind: 'claim', recordId: 0 })).rejects.toMatchObject({
        errorCode: ErrorCode.TRANSFER_FAILED,
        message: 'Value transfer failed: Simulated transfer failure for recipient user_bob',
      });
      expect(wallets.credit).not.toHaveBeenCalled();
    });
  });
});
