/**
 * Escrow API E2E Tests
 *
 * Full HTTP stack over an in-memory ledger; tokens resolve to stub users.
 */

import request from 'supertest';

import { escrowService } from '../../src/services/escrow/escrow.service';
import { transferSimulation } from '../../src/services/escrow/escrow.simulation';
import { ErrorCode } from '../../src/types/errors';
import {
  ADMIN,
  ALICE,
  BOB,
  CAROL,
  NOW,
  LedgerFixture,
  bearerFor,
  buildUser,
  getTestApp,
  openLedger,
  stubUserLookup,
} from '../helpers';

const ONE = '1000000000000000000';
const UNLOCK = NOW + 3600;

describe('Escrow API', () => {
  const app = getTestApp();
  const admin = buildUser(ADMIN);
  const alice = buildUser(ALICE);
  const bob = buildUser(BOB);
  const dormant = buildUser(CAROL, { isActive: false });
  let fx: LedgerFixture;

  beforeEach(async () => {
    stubUserLookup([admin, alice, bob, dormant]);
    fx = await openLedger();
    fx.custody.fund(ALICE, 5n * BigInt(ONE));
    escrowService.attach(fx.ledger);
  });

  afterEach(() => {
    escrowService.detach();
    jest.restoreAllMocks();
  });

  const storeAsAlice = (body: Record<string, unknown>) =>
    request(app).post('/escrows').set('Authorization', bearerFor(alice)).send(body);

  describe('authentication', () => {
    it('should reject requests without a token', async () => {
      const response = await request(app).post('/escrows').send({});

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(ErrorCode.UNAUTHORIZED);
      expect(response.body.error.message).toBe('No authorization header provided');
    });

    it('should reject a tampered token', async () => {
      const response = await request(app)
        .get('/escrows/0')
        .set('Authorization', `${bearerFor(alice)}x`);

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(ErrorCode.INVALID_TOKEN);
    });

    it('should reject a deactivated account', async () => {
      const response = await request(app).get('/ledger').set('Authorization', bearerFor(dormant));

      expect(response.status).toBe(403);
      expect(response.body.error.message).toBe('Account is deactivated');
    });
  });

  describe('POST /escrows', () => {
    it('should store a deposit and return the receipt', async () => {
      const response = await storeAsAlice({ beneficiary: BOB, unlockTime: UNLOCK, amount: ONE });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        success: true,
        data: { recordId: 0, fee: '4200000000000000', netAmount: '995800000000000000' },
      });
      expect(fx.custody.balanceOf(ALICE)).toBe(4n * BigInt(ONE));
    });

    it('should reject a numeric amount before it reaches the ledger', async () => {
      const response = await storeAsAlice({ beneficiary: BOB, unlockTime: UNLOCK, amount: 1000 });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(response.body.error.details).toEqual({
        amount: ['amount must be a string of decimal digits in base units'],
      });
    });

    it('should surface the ledger error for a null beneficiary', async () => {
      const response = await storeAsAlice({ beneficiary: null, unlockTime: UNLOCK, amount: ONE });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.INVALID_BENEFICIARY);
    });

    it('should surface the ledger error for a zero amount', async () => {
      const response = await storeAsAlice({ beneficiary: BOB, unlockTime: UNLOCK, amount: '0' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.ZERO_VALUE);
    });

    it('should reject an unlock time that is not in the future', async () => {
      const response = await storeAsAlice({ beneficiary: BOB, unlockTime: NOW, amount: ONE });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.UNLOCK_TIME_IN_PAST);
      expect(response.body.error.message).toBe(
        `Unlock time ${NOW} must be after the current time ${NOW}`
      );
    });

    it('should reject a deposit the wallet cannot cover', async () => {
      const response = await storeAsAlice({
        beneficiary: BOB,
        unlockTime: UNLOCK,
        amount: '6000000000000000000',
      });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.INSUFFICIENT_BALANCE);
    });
  });

  describe('claiming', () => {
    beforeEach(async () => {
      await storeAsAlice({ beneficiary: BOB, unlockTime: UNLOCK, amount: ONE });
    });

    const claimAs = (user: typeof bob, recordId: number | string = 0) =>
      request(app).post(`/escrows/${recordId}/claim`).set('Authorization', bearerFor(user));

    it('should show the stored record', async () => {
      const response = await request(app).get('/escrows/0').set('Authorization', bearerFor(bob));

      expect(response.status).toBe(200);
      expect(response.body.data.record).toEqual({
        recordId: 0,
        amount: '995800000000000000',
        unlockTime: UNLOCK,
        claimed: false,
        depositor: ALICE,
        beneficiary: BOB,
      });
    });

    it('should refuse to pay out before the unlock time', async () => {
      const response = await claimAs(bob);

      expect(response.status).toBe(423);
      expect(response.body.error.code).toBe(ErrorCode.NOT_YET_UNLOCKED);
    });

    it('should pay the beneficiary once unlocked', async () => {
      fx.clock.current = UNLOCK;

      const response = await claimAs(bob);

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        recordId: 0,
        fee: '4182360000000000',
        payout: '991617640000000000',
      });
      expect(fx.custody.balanceOf(BOB)).toBe(991_617_640_000_000_000n);
    });

    it('should refuse anyone but the beneficiary', async () => {
      fx.clock.current = UNLOCK;

      const response = await claimAs(alice);

      expect(response.status).toBe(403);
      expect(response.body.error.code).toBe(ErrorCode.NOT_BENEFICIARY);
    });

    it('should refuse a second claim', async () => {
      fx.clock.current = UNLOCK;
      await claimAs(bob);

      const response = await claimAs(bob);

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe(ErrorCode.ALREADY_CLAIMED);
    });

    it('should report a failed payout and leave the record claimable', async () => {
      fx.clock.current = UNLOCK;
      fx.custody.failingRecipients.add(BOB);

      const failed = await claimAs(bob);

      expect(failed.status).toBe(502);
      expect(failed.body.error.code).toBe(ErrorCode.TRANSFER_FAILED);

      fx.custody.failingRecipients.delete(BOB);
      const retried = await claimAs(bob);
      expect(retried.status).toBe(200);
    });

    it('should 404 an unknown record', async () => {
      const response = await claimAs(bob, 9);

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.RECORD_NOT_FOUND);
    });

    it('should validate the record id', async () => {
      const response = await claimAs(bob, 'abc');

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual({
        recordId: ['recordId must be a non-negative integer'],
      });
    });

    it('should list records by depositor and beneficiary', async () => {
      await storeAsAlice({ beneficiary: ALICE, unlockTime: UNLOCK, amount: '1000' });

      const byDepositor = await request(app)
        .get(`/escrows/depositors/${ALICE}`)
        .set('Authorization', bearerFor(bob));
      const byBeneficiary = await request(app)
        .get(`/escrows/beneficiaries/${BOB}?limit=1`)
        .set('Authorization', bearerFor(bob));

      expect(byDepositor.body.data).toEqual({ recordIds: [0, 1], total: 2, offset: 0, limit: 50 });
      expect(byBeneficiary.body.data).toEqual({ recordIds: [0], total: 1, offset: 0, limit: 1 });
    });
  });

  describe('ledger administration', () => {
    const asAdmin = bearerFor(admin);

    it('should show the ledger state', async () => {
      const response = await request(app).get('/ledger').set('Authorization', bearerFor(bob));

      expect(response.body.data.ledger).toEqual({
        nextRecordId: 0,
        feeBasisPoints: 42,
        collectedFees: '0',
        administrator: ADMIN,
        feePolicy: 'STORE_AND_CLAIM',
      });
    });

    it('should let the administrator change the fee rate', async () => {
      const response = await request(app)
        .put('/ledger/fee-rate')
        .set('Authorization', asAdmin)
        .send({ feeBasisPoints: 250 });

      expect(response.status).toBe(200);
      expect(response.body.data.ledger.feeBasisPoints).toBe(250);
    });

    it('should refuse a fee rate from anyone else', async () => {
      const response = await request(app)
        .put('/ledger/fee-rate')
        .set('Authorization', bearerFor(alice))
        .send({ feeBasisPoints: 250 });

      expect(response.status).toBe(403);
      expect(response.body.error.code).toBe(ErrorCode.NOT_ADMINISTRATOR);
    });

    it('should refuse a fee rate above 100%', async () => {
      const response = await request(app)
        .put('/ledger/fee-rate')
        .set('Authorization', asAdmin)
        .send({ feeBasisPoints: 10001 });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.FEE_TOO_HIGH);
    });

    it('should withdraw the fee pool', async () => {
      await storeAsAlice({ beneficiary: BOB, unlockTime: UNLOCK, amount: ONE });

      const response = await request(app)
        .post('/ledger/fees/withdraw')
        .set('Authorization', asAdmin)
        .send({ recipient: CAROL });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ recipient: CAROL, amount: '4200000000000000' });
      expect(fx.custody.balanceOf(CAROL)).toBe(4_200_000_000_000_000n);
    });

    it('should refuse a withdrawal without a recipient', async () => {
      const response = await request(app)
        .post('/ledger/fees/withdraw')
        .set('Authorization', asAdmin)
        .send({});

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.INVALID_RECIPIENT);
    });

    it('should hand administration to another user', async () => {
      const response = await request(app)
        .put('/ledger/administrator')
        .set('Authorization', asAdmin)
        .send({ administrator: ALICE });

      expect(response.status).toBe(200);
      expect(response.body.data.ledger.administrator).toBe(ALICE);
    });
  });

  describe('transfer simulation', () => {
    afterEach(() => {
      transferSimulation.reset();
    });

    it('should configure and reset the simulation', async () => {
      const configured = await request(app)
        .post('/ledger/simulation')
        .send({ enabled: true, failRecipients: [BOB], failureType: 'ERROR' });

      expect(configured.status).toBe(200);
      expect(configured.body.data.simulation).toEqual({
        enabled: true,
        failureRate: 0,
        failRecipients: [BOB],
        failureType: 'ERROR',
        timeoutMs: 30000,
      });

      await request(app).post('/ledger/simulation/fail-recipients').send({ recipients: [CAROL] });
      const current = await request(app).get('/ledger/simulation');
      expect(current.body.data.simulation.failRecipients).toEqual([BOB, CAROL]);

      const reset = await request(app).post('/ledger/simulation/reset');
      expect(reset.body.data.simulation.enabled).toBe(false);
    });

    it('should validate the configuration', async () => {
      const response = await request(app).post('/ledger/simulation').send({ enabled: 'yes' });

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual({ enabled: ['enabled must be a boolean'] });
    });
  });
});
