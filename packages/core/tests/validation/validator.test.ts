import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  assertReviewableItem,
  readItemId,
  toValidationIssues,
  validateSchema,
} from '../../src/validation/validator';
import { ReviewableItemSchema } from '../../src/domain/review';
import { InvalidItemStateError } from '../../src/errors';
import { makeItem } from '../helpers/items';

describe('Validation', () => {
  describe('validateSchema', () => {
    it('should validate a well-formed item and apply defaults', () => {
      const raw: Record<string, unknown> = { ...makeItem({ id: 'q-1' }) };
      delete raw.topics;
      const result = validateSchema(ReviewableItemSchema, raw);

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.data.topics).toEqual([]);
        expect(result.data.id).toBe('q-1');
      }
    });

    it('should report every failing field', () => {
      const result = validateSchema(ReviewableItemSchema, {
        ...makeItem({ id: 'q-1' }),
        currentIntervalDays: -1,
        easeFactor: 0,
      });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map((issue) => issue.field).sort()).toEqual([
          'currentIntervalDays',
          'easeFactor',
        ]);
      }
    });

    it('should reject a malformed due date', () => {
      const result = validateSchema(ReviewableItemSchema, { ...makeItem({ id: 'q-1' }), dueDate: '03/01/2024' });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors[0]?.field).toBe('dueDate');
      }
    });
  });

  describe('toValidationIssues', () => {
    it('should name root-level issues', () => {
      const result = z.string().safeParse(5);
      expect(result.success).toBe(false);
      if (!result.success) {
        const [issue] = toValidationIssues(result.error);
        expect(issue?.field).toBe('(root)');
        expect(issue?.expected).toBe('string');
        expect(issue?.received).toBe('number');
      }
    });
  });

  describe('readItemId', () => {
    it('should read string ids only', () => {
      expect(readItemId({ id: 'q-9' })).toBe('q-9');
      expect(readItemId({ id: 9 })).toBeNull();
      expect(readItemId({ id: '' })).toBeNull();
      expect(readItemId(null)).toBeNull();
      expect(readItemId('q-9')).toBeNull();
    });
  });

  describe('assertReviewableItem', () => {
    it('should return the parsed item', () => {
      const item = makeItem({ id: 'q-1', topics: ['algebra'] });
      expect(assertReviewableItem(item)).toEqual(item);
    });

    it('should throw InvalidItemStateError carrying the item id', () => {
      try {
        assertReviewableItem({ ...makeItem({ id: 'q-2' }), easeFactor: -1 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidItemStateError);
        if (error instanceof InvalidItemStateError) {
          expect(error.itemId).toBe('q-2');
          expect(error.code).toBe('INVALID_ITEM_STATE');
          expect(error.statusCode).toBe(422);
          expect(error.issues[0]?.field).toBe('easeFactor');
        }
      }
    });
  });
});
