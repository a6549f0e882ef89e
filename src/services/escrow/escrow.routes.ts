/**
 * Escrow API Routes
 *
 * /escrows: deposit, claim and lookups
 * /ledger: ledger state, administration and (test/development) transfer simulation
 */

import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { idempotencyMiddleware } from '../../middlewares/idempotency';
import { escrowLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { escrowController, ledgerController } from './escrow.controller';
import {
  administratorValidation,
  failRecipientsValidation,
  feeRateValidation,
  identityLookupValidation,
  recordIdValidation,
  simulationConfigValidation,
  storeValidation,
  withdrawFeesValidation,
} from './escrow.validation';

const escrowRouter = Router();

escrowRouter.use(authMiddleware);

// POST /escrows - Lock value for a beneficiary
escrowRouter.post('/', escrowLimiter, idempotencyMiddleware, storeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => escrowController.store(req, res, next));

// GET /escrows/depositors/:identity - Records created by an identity
escrowRouter.get('/depositors/:identity', identityLookupValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => escrowController.byDepositor(req, res, next));

// GET /escrows/beneficiaries/:identity - Records payable to an identity
escrowRouter.get('/beneficiaries/:identity', identityLookupValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => escrowController.byBeneficiary(req, res, next));

// GET /escrows/:recordId - Record details
escrowRouter.get('/:recordId', recordIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => escrowController.getRecord(req, res, next));

// POST /escrows/:recordId/claim - Claim an unlocked record
escrowRouter.post('/:recordId/claim', escrowLimiter, recordIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => escrowController.claim(req, res, next));

const ledgerRouter = Router();

// Simulation routes are unauthenticated and refuse to run outside test/development
ledgerRouter.get('/simulation', (req: Request, res: Response, next: NextFunction) => ledgerController.getSimulationConfig(req, res, next));

ledgerRouter.post('/simulation', simulationConfigValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.updateSimulationConfig(req, res, next));

ledgerRouter.post('/simulation/fail-recipients', failRecipientsValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.addFailingRecipients(req, res, next));

ledgerRouter.post('/simulation/reset', (req: Request, res: Response, next: NextFunction) => ledgerController.resetSimulation(req, res, next));

// GET /ledger - Ledger state
ledgerRouter.get('/', authMiddleware, (req: Request, res: Response, next: NextFunction) => ledgerController.getState(req, res, next));

// PUT /ledger/fee-rate - Administrator sets the fee rate
ledgerRouter.put('/fee-rate', authMiddleware, escrowLimiter, feeRateValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.setFeeRate(req, res, next));

// POST /ledger/fees/withdraw - Administrator drains the fee pool
ledgerRouter.post('/fees/withdraw', authMiddleware, escrowLimiter, withdrawFeesValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.withdrawFees(req, res, next));

// PUT /ledger/administrator - Administrator hands over the role
ledgerRouter.put('/administrator', authMiddleware, escrowLimiter, administratorValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.transferAdministration(req, res, next));

export { escrowRouter as escrowRoutes, ledgerRouter as ledgerRoutes };
