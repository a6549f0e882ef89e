/**
 * Escrow and ledger request validation
 *
 * Shape checks only. Semantic checks (null beneficiary, zero value, unlock
 * time, fee ceiling) belong to the ledger so they surface with their own
 * error codes.
 */

import { body, param, query } from 'express-validator';

import { config } from '../../config';
import { isBaseUnitAmount } from '../wallet/wallet.validation';

const optionalIdentity = (field: string) =>
  body(field)
    .optional({ values: 'null' })
    .isString()
    .withMessage(`${field} must be a string`)
    .isLength({ max: 128 })
    .withMessage(`${field} must be at most 128 characters`);

export const storeValidation = [
  optionalIdentity('beneficiary'),
  body('unlockTime')
    .exists()
    .withMessage('unlockTime is required')
    .isInt()
    .withMessage('unlockTime must be an integer number of seconds since epoch')
    .toInt(),
  body('amount')
    .exists()
    .withMessage('amount is required')
    .custom((value: unknown) => isBaseUnitAmount(value))
    .withMessage('amount must be a string of decimal digits in base units'),
];

export const recordIdValidation = [
  param('recordId')
    .isInt({ min: 0 })
    .withMessage('recordId must be a non-negative integer')
    .toInt(),
];

export const identityLookupValidation = [
  param('identity').trim().notEmpty().withMessage('identity is required'),
  query('offset')
    .optional()
    .isInt({ min: 0 })
    .withMessage('offset must be a non-negative integer')
    .toInt(),
  query('limit')
    .optional()
    .isInt({ min: 1, max: config.escrow.maxPageLimit })
    .withMessage(`limit must be between 1 and ${config.escrow.maxPageLimit}`)
    .toInt(),
];

export const feeRateValidation = [
  body('feeBasisPoints')
    .exists()
    .withMessage('feeBasisPoints is required')
    .isInt({ min: 0 })
    .withMessage('feeBasisPoints must be a non-negative integer')
    .toInt(),
];

export const withdrawFeesValidation = [optionalIdentity('recipient')];

export const administratorValidation = [optionalIdentity('administrator')];

export const simulationConfigValidation = [
  body('enabled')
    .isBoolean()
    .withMessage('enabled must be a boolean'),

  body('failureRate')
    .optional()
    .isFloat({ min: 0, max: 1 })
    .withMessage('failureRate must be between 0 and 1'),

  body('failRecipients')
    .optional()
    .isArray()
    .withMessage('failRecipients must be an array'),

  body('failRecipients.*')
    .optional()
    .isString()
    .notEmpty()
    .withMessage('Each recipient must be a non-empty string'),

  body('failureType')
    .optional()
    .isIn(['ERROR', 'TIMEOUT'])
    .withMessage('failureType must be ERROR or TIMEOUT'),

  body('timeoutMs')
    .optional()
    .isInt({ min: 0, max: 60000 })
    .withMessage('timeoutMs must be between 0 and 60000'),
];

export const failRecipientsValidation = [
  body('recipients')
    .isArray({ min: 1 })
    .withMessage('recipients must be a non-empty array'),
  body('recipients.*')
    .isString()
    .notEmpty()
    .withMessage('Each recipient must be a non-empty string'),
];
