import { body, query } from 'express-validator';

import { MAX_BALANCE_DIGITS } from '../../models/Wallet';

/**
 * Unsigned base-unit amounts: decimal digits, no sign, no leading zeros,
 * no wider than a wallet balance can hold.
 */
export const BASE_UNIT_AMOUNT = new RegExp(`^(0|[1-9]\\d{0,${MAX_BALANCE_DIGITS - 1}})$`);

export const isBaseUnitAmount = (value: unknown): value is string =>
  typeof value === 'string' && BASE_UNIT_AMOUNT.test(value);

export const depositValidation = [
  body('amount')
    .notEmpty()
    .withMessage('Amount is required')
    .custom((value: unknown) => isBaseUnitAmount(value))
    .withMessage('Amount must be a string of decimal digits in base units')
    .custom((value: string) => value !== '0')
    .withMessage('Amount must be greater than 0'),
  body('idempotencyKey')
    .optional()
    .isString()
    .withMessage('Idempotency key must be a string')
    .isLength({ min: 1, max: 64 })
    .withMessage('Idempotency key must be between 1 and 64 characters'),
];

export const historyQueryValidation = [
  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('Limit must be between 1 and 100'),
];
