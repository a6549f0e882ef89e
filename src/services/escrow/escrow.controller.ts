/**
 * Escrow Controllers
 *
 * The authenticated user is the caller of every ledger operation. Amounts
 * leave as decimal strings.
 */

import { Response, NextFunction } from 'express';

import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability';
import { AuthRequest } from '../../auth/auth.types';

import { escrowService } from './escrow.service';
import { transferSimulation, FailureType } from './escrow.simulation';
import type { EscrowRecord, LedgerState } from './escrow.types';

interface StoreRequest {
  beneficiary?: string | null;
  unlockTime: number;
  amount: string;
}

interface SimulationConfigRequest {
  enabled: boolean;
  failureRate?: number;
  failRecipients?: string[];
  failureType?: FailureType;
  timeoutMs?: number;
}

export const toRecordView = (record: EscrowRecord) => ({
  recordId: record.recordId,
  amount: record.amount.toString(),
  unlockTime: record.unlockTime,
  claimed: record.claimed,
  depositor: record.depositor,
  beneficiary: record.beneficiary,
});

export const toLedgerView = (state: LedgerState) => ({
  ...state,
  collectedFees: state.collectedFees.toString(),
});

const callerOf = (req: AuthRequest): string => {
  if (!req.user) {
    throw ApiError.unauthorized('Not authenticated');
  }
  return req.user.userId;
};

const optionalInt = (value: unknown): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
};

export class EscrowController {
  /**
   * POST /escrows
   */
  async store(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = callerOf(req);
      const { beneficiary, unlockTime, amount } = req.body as StoreRequest;

      const receipt = await escrowService.store(
        caller,
        beneficiary ?? '',
        unlockTime,
        BigInt(amount)
      );
      addLogContext({ recordId: receipt.recordId });

      res.status(201).json({
        success: true,
        data: {
          recordId: receipt.recordId,
          fee: receipt.fee.toString(),
          netAmount: receipt.netAmount.toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /escrows/:recordId/claim
   */
  async claim(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = callerOf(req);
      const recordId = Number(req.params.recordId);
      addLogContext({ recordId });

      const receipt = await escrowService.claim(recordId, caller);

      res.status(200).json({
        success: true,
        data: {
          recordId: receipt.recordId,
          fee: receipt.fee.toString(),
          payout: receipt.payout.toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /escrows/:recordId
   */
  async getRecord(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const record = await escrowService.getRecord(Number(req.params.recordId));

      res.status(200).json({
        success: true,
        data: { record: toRecordView(record) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /escrows/depositors/:identity
   */
  async byDepositor(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const page = await escrowService.recordsByDepositor(req.params.identity, {
        offset: optionalInt(req.query.offset),
        limit: optionalInt(req.query.limit),
      });

      res.status(200).json({ success: true, data: page });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /escrows/beneficiaries/:identity
   */
  async byBeneficiary(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const page = await escrowService.recordsByBeneficiary(req.params.identity, {
        offset: optionalInt(req.query.offset),
        limit: optionalInt(req.query.limit),
      });

      res.status(200).json({ success: true, data: page });
    } catch (error) {
      next(error);
    }
  }
}

const assertSimulationAllowed = (): void => {
  if (!config.isTest && !config.isDevelopment) {
    throw new ApiError(403, 'Simulation API only available in test/development environments');
  }
};

export class LedgerController {
  /**
   * GET /ledger
   */
  async getState(_req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const state = await escrowService.getState();
      res.status(200).json({ success: true, data: { ledger: toLedgerView(state) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /ledger/fee-rate
   */
  async setFeeRate(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = callerOf(req);
      const { feeBasisPoints } = req.body as { feeBasisPoints: number };

      const state = await escrowService.setFeeRate(caller, feeBasisPoints);
      res.status(200).json({ success: true, data: { ledger: toLedgerView(state) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /ledger/fees/withdraw
   */
  async withdrawFees(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = callerOf(req);
      const { recipient } = req.body as { recipient?: string | null };

      const amount = await escrowService.withdrawFees(caller, recipient ?? '');
      res.status(200).json({
        success: true,
        data: { recipient: recipient ?? null, amount: amount.toString() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /ledger/administrator
   */
  async transferAdministration(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = callerOf(req);
      const { administrator } = req.body as { administrator?: string | null };

      const state = await escrowService.transferAdministration(caller, administrator ?? '');
      res.status(200).json({ success: true, data: { ledger: toLedgerView(state) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /ledger/simulation
   */
  async getSimulationConfig(_req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      assertSimulationAllowed();
      res.status(200).json({
        success: true,
        data: { simulation: transferSimulation.getConfig() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /ledger/simulation
   *
   * enabled=true updates the provided fields and keeps the rest;
   * enabled=false disables and clears the recipient list.
   */
  async updateSimulationConfig(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      assertSimulationAllowed();
      const { enabled, failureRate, failRecipients, failureType, timeoutMs } =
        req.body as SimulationConfigRequest;

      if (enabled) {
        transferSimulation.enable({ failureRate, failRecipients, failureType, timeoutMs });
      } else {
        transferSimulation.disable();
      }

      res.status(200).json({
        success: true,
        data: { simulation: transferSimulation.getConfig() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /ledger/simulation/fail-recipients
   */
  async addFailingRecipients(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      assertSimulationAllowed();
      const { recipients } = req.body as { recipients: string[] };

      transferSimulation.addFailingRecipients(recipients);

      res.status(200).json({
        success: true,
        data: { simulation: transferSimulation.getConfig() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /ledger/simulation/reset
   */
  async resetSimulation(_req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      assertSimulationAllowed();
      transferSimulation.reset();

      res.status(200).json({
        success: true,
        data: { simulation: transferSimulation.getConfig() },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const escrowController = new EscrowController();
export const ledgerController = new LedgerController();
