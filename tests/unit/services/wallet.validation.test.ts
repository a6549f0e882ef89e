/**
 * Unit tests for Wallet Validation
 *
 * Tests the express-validator chains for wallet endpoints.
 */

import { validationResult, ValidationChain } from 'express-validator';
import { Request } from 'express';
import {
  depositValidation,
  historyQueryValidation,
  isBaseUnitAmount,
} from '../../../src/services/wallet/wallet.validation';

const runValidation = async (
  validations: ValidationChain[],
  input: { body?: Record<string, unknown>; query?: Record<string, unknown> }
) => {
  const req = {
    body: input.body ?? {},
    params: {},
    query: input.query ?? {},
  } as unknown as Request;

  for (const validation of validations) {
    await validation.run(req);
  }

  return validationResult(req);
};

const messagesFor = async (
  validations: ValidationChain[],
  input: { body?: Record<string, unknown>; query?: Record<string, unknown> },
  field: string
): Promise<string[]> => {
  const result = await runValidation(validations, input);
  return result
    .array()
    .filter((error) => error.type === 'field' && error.path === field)
    .map((error) => String(error.msg));
};

describe('Wallet Validation', () => {
  describe('isBaseUnitAmount', () => {
    it.each([['0'], ['1'], ['1000000000000000000'], ['9'.repeat(34)]])(
      'should accept %s',
      (value) => {
        expect(isBaseUnitAmount(value)).toBe(true);
      }
    );

    it.each([['01'], ['-1'], ['1.5'], ['1e18'], [' 1'], [''], ['1' + '0'.repeat(34)], ['9'.repeat(78)]])(
      'should reject %p',
      (value) => {
        expect(isBaseUnitAmount(value)).toBe(false);
      }
    );

    it('should reject numbers', () => {
      expect(isBaseUnitAmount(100)).toBe(false);
    });
  });

  describe('depositValidation', () => {
    it('should pass with a base-unit string', async () => {
      const messages = await messagesFor(
        depositValidation,
        { body: { amount: '1000000000000000000' } },
        'amount'
      );
      expect(messages).toEqual([]);
    });

    it('should fail when amount is missing', async () => {
      const messages = await messagesFor(depositValidation, { body: {} }, 'amount');
      expect(messages[0]).toBe('Amount is required');
    });

    it('should fail with a numeric amount', async () => {
      const messages = await messagesFor(depositValidation, { body: { amount: 100 } }, 'amount');
      expect(messages).toContain('Amount must be a string of decimal digits in base units');
    });

    it('should fail with a decimal string', async () => {
      const messages = await messagesFor(depositValidation, { body: { amount: '1.5' } }, 'amount');
      expect(messages).toEqual(['Amount must be a string of decimal digits in base units']);
    });

    it('should fail with 35 digits', async () => {
      const messages = await messagesFor(
        depositValidation,
        { body: { amount: '1' + '0'.repeat(34) } },
        'amount'
      );
      expect(messages).toEqual(['Amount must be a string of decimal digits in base units']);
    });

    it('should fail with zero', async () => {
      const messages = await messagesFor(depositValidation, { body: { amount: '0' } }, 'amount');
      expect(messages).toEqual(['Amount must be greater than 0']);
    });

    it('should accept an idempotency key up to 64 characters', async () => {
      const messages = await messagesFor(
        depositValidation,
        { body: { amount: '5', idempotencyKey: 'k'.repeat(64) } },
        'idempotencyKey'
      );
      expect(messages).toEqual([]);
    });

    it('should reject an idempotency key over 64 characters', async () => {
      const messages = await messagesFor(
        depositValidation,
        { body: { amount: '5', idempotencyKey: 'k'.repeat(65) } },
        'idempotencyKey'
      );
      expect(messages).toEqual(['Idempotency key must be between 1 and 64 characters']);
    });
  });

  describe('historyQueryValidation', () => {
    it('should pass without a limit', async () => {
      const result = await runValidation(historyQueryValidation, { query: {} });
      expect(result.isEmpty()).toBe(true);
    });

    it('should pass with limit 100', async () => {
      const result = await runValidation(historyQueryValidation, { query: { limit: '100' } });
      expect(result.isEmpty()).toBe(true);
    });

    it.each([['0'], ['101'], ['abc']])('should fail with limit %s', async (limit) => {
      const messages = await messagesFor(historyQueryValidation, { query: { limit } }, 'limit');
      expect(messages).toEqual(['Limit must be between 1 and 100']);
    });
  });
});
