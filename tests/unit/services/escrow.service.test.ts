/**
 * EscrowService Unit Tests
 *
 * Runs the service over an in-memory ledger and checks instrumentation and
 * paging.
 */

import { EscrowService } from '../../../src/services/escrow/escrow.service';
import {
  escrowOperationsTotal,
  escrowRecordsTotal,
  escrowFeesCollected,
  resetMetrics,
} from '../../../src/observability';
import { ErrorCode } from '../../../src/types/errors';
import {
  ADMIN,
  ALICE,
  BOB,
  NOW,
  FakeCustody,
  InMemoryLedgerRepository,
  ManualClock,
  RecordingSink,
  defaultLedgerSettings,
} from '../../helpers/ledgerFakes';

const UNLOCK = NOW + 60;

const operationCount = async (operation: string, outcome: string): Promise<number> => {
  const metric = await escrowOperationsTotal.get();
  const sample = metric.values.find(
    (value) => value.labels.operation === operation && value.labels.outcome === outcome
  );
  return sample?.value ?? 0;
};

const gaugeValue = async (gauge: typeof escrowRecordsTotal): Promise<number> => {
  const metric = await gauge.get();
  return metric.values[0]?.value ?? 0;
};

describe('EscrowService', () => {
  let service: EscrowService;
  let repository: InMemoryLedgerRepository;
  let custody: FakeCustody;
  let clock: ManualClock;

  const initialize = () =>
    service.initialize({
      repository,
      custody,
      clock,
      sink: new RecordingSink(),
      defaults: defaultLedgerSettings(),
    });

  beforeEach(() => {
    resetMetrics();
    service = new EscrowService();
    repository = new InMemoryLedgerRepository();
    custody = new FakeCustody();
    clock = new ManualClock();
    custody.fund(ALICE, 1_000_000n);
  });

  it('should refuse calls before a ledger is attached', async () => {
    expect(service.isReady()).toBe(false);
    await expect(service.getState()).rejects.toMatchObject({
      errorCode: ErrorCode.INTERNAL_ERROR,
      message: 'Escrow ledger is not initialized',
    });
  });

  it('should open the ledger and publish its gauges', async () => {
    await initialize();

    expect(service.isReady()).toBe(true);
    expect(await service.getState()).toEqual({
      nextRecordId: 0,
      feeBasisPoints: 42,
      collectedFees: 0n,
      administrator: ADMIN,
      feePolicy: 'STORE_AND_CLAIM',
    });
    expect(await gaugeValue(escrowRecordsTotal)).toBe(0);
  });

  it('should count successful operations and refresh gauges', async () => {
    await initialize();

    await service.store(ALICE, BOB, UNLOCK, 100_000n);

    expect(await operationCount('store', 'success')).toBe(1);
    expect(await gaugeValue(escrowRecordsTotal)).toBe(1);
    expect(await gaugeValue(escrowFeesCollected)).toBe(420);
  });

  it('should label rejected operations with their error code', async () => {
    await initialize();

    await expect(service.store(ALICE, BOB, UNLOCK, 0n)).rejects.toMatchObject({
      errorCode: ErrorCode.ZERO_VALUE,
    });
    await expect(service.claim(3, BOB)).rejects.toMatchObject({
      errorCode: ErrorCode.RECORD_NOT_FOUND,
    });

    expect(await operationCount('store', 'ZERO_VALUE')).toBe(1);
    expect(await operationCount('claim', 'RECORD_NOT_FOUND')).toBe(1);
  });

  it('should label failures that are not ledger errors as unexpected', async () => {
    await initialize();
    repository.failNext('saveSettings');

    await expect(service.setFeeRate(ADMIN, 5)).rejects.toThrow('saveSettings failed: disk full');

    expect(await operationCount('setFeeRate', 'UNEXPECTED_ERROR')).toBe(1);
  });

  it('should return the updated state from administrative calls', async () => {
    await initialize();

    expect(await service.setFeeRate(ADMIN, 7)).toMatchObject({ feeBasisPoints: 7 });
    expect(await service.transferAdministration(ADMIN, ALICE)).toMatchObject({
      administrator: ALICE,
    });
  });

  it('should run a claim end to end', async () => {
    await initialize();
    await service.store(ALICE, BOB, UNLOCK, 100_000n);
    clock.current = UNLOCK;

    const receipt = await service.claim(0, BOB);

    expect(receipt).toEqual({ recordId: 0, fee: 418n, payout: 99_162n });
    expect(custody.balanceOf(BOB)).toBe(99_162n);
    expect(await gaugeValue(escrowFeesCollected)).toBe(838);
  });

  it('should withdraw the pool to the recipient', async () => {
    await initialize();
    await service.store(ALICE, BOB, UNLOCK, 100_000n);

    expect(await service.withdrawFees(ADMIN, ADMIN)).toBe(420n);
    expect(await gaugeValue(escrowFeesCollected)).toBe(0);
  });

  describe('paging', () => {
    beforeEach(async () => {
      await initialize();
      for (let i = 0; i < 60; i += 1) {
        await service.store(ALICE, BOB, UNLOCK, 1_000n);
      }
    });

    it('should default to the configured page size', async () => {
      const page = await service.recordsByDepositor(ALICE);

      expect(page.total).toBe(60);
      expect(page.limit).toBe(50);
      expect(page.recordIds).toHaveLength(50);
      expect(page.recordIds[49]).toBe(49);
    });

    it('should slice from the offset', async () => {
      const page = await service.recordsByBeneficiary(BOB, { offset: 55, limit: 10 });

      expect(page).toEqual({ recordIds: [55, 56, 57, 58, 59], total: 60, offset: 55, limit: 10 });
    });

    it('should cap the limit', async () => {
      const page = await service.recordsByDepositor(ALICE, { limit: 500 });
      expect(page.limit).toBe(50);
    });

    it('should return an empty page for unknown identities', async () => {
      expect(await service.recordsByDepositor('user_nobody')).toEqual({
        recordIds: [],
        total: 0,
        offset: 0,
        limit: 50,
      });
    });
  });
});
