import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createTestServer } from '../setup';
import { createInMemoryServices } from '../helpers/repositories';
import { makeItem } from '../helpers/config';

describe('Item routes', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    const { services } = createInMemoryServices([
      makeItem({ id: 'alg-1', dueDate: '2024-03-01', topics: ['algebra'] }),
      makeItem({
        id: 'kin-1',
        subject: 'physics',
        dueDate: '2024-03-04',
        lastReviewedAt: new Date('2024-02-27T08:30:00.000Z'),
      }),
      makeItem({ id: 'opt-1', subject: 'physics', dueDate: '2024-03-10' }),
    ]);
    server = await createTestServer(services);
  });

  afterEach(async () => {
    vi.useRealTimers();
    await server.close();
  });

  describe('GET /api/v1/items/due', () => {
    it('should list items due on or before the date', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/v1/items/due?asOf=2024-03-05',
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<{ asOf: string; items: Array<{ id: string; lastReviewedAt: string | null }>; total: number }>();
      expect(body.asOf).toBe('2024-03-05');
      expect(body.total).toBe(2);
      expect(body.items.map((item) => item.id)).toEqual(['alg-1', 'kin-1']);
      expect(body.items[1]?.lastReviewedAt).toBe('2024-02-27T08:30:00.000Z');
    });

    it('should reject a malformed date', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/v1/items/due?asOf=March-5',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ error: { code: string } }>().error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /api/v1/items/:id', () => {
    it('should return a stored item', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/v1/items/alg-1' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        id: 'alg-1',
        subject: 'math',
        topics: ['algebra'],
        repetitionCount: 0,
        easeFactor: 2.5,
        currentIntervalDays: 0,
        dueDate: '2024-03-01',
        lastReviewedAt: null,
      });
    });

    it('should answer 404 for an unknown item', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/v1/items/missing' });

      expect(response.statusCode).toBe(404);
      const body = response.json<{ error: { code: string; message: string } }>();
      expect(body.error.code).toBe('ITEM_NOT_FOUND');
      expect(body.error.message).toBe('Item missing was not found');
    });
  });

  describe('POST /api/v1/items', () => {
    it('should create an item due today', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2024-03-06T15:00:00.000Z'));

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/items',
        payload: { id: 'geo-1', subject: 'math', topics: ['geometry'] },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({
        id: 'geo-1',
        subject: 'math',
        topics: ['geometry'],
        repetitionCount: 0,
        easeFactor: 2.5,
        currentIntervalDays: 0,
        dueDate: '2024-03-06',
        lastReviewedAt: null,
      });
    });

    it('should answer 409 for a taken id', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/items',
        payload: { id: 'alg-1', subject: 'math' },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json<{ error: { code: string } }>().error.code).toBe('DUPLICATE_ITEM');
    });

    it('should reject a body without a subject', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/items',
        payload: { id: 'geo-2' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ error: { code: string } }>().error.code).toBe('VALIDATION_ERROR');
    });
  });
});
