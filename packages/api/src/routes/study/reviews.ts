import type { FastifyPluginAsync } from 'fastify';
import { Type } from '@sinclair/typebox';
import { ErrorResponseSchema } from '../../schemas/common';
import {
  ItemSchema,
  PreviewBodySchema,
  ProcessResponseSchema,
  ReviewBodySchema,
  ReviewEventResponseSchema,
  type PreviewBody,
  type ReviewBody,
} from '../../schemas/study';
import { toEventResponse, toItemResponse } from '../serializers';

const reviewsRoute: FastifyPluginAsync = async (fastify) => {
  await Promise.resolve();

  void fastify.post<{ Body: ReviewBody }>(
    '/reviews',
    {
      schema: {
        body: ReviewBodySchema,
        response: {
          202: ReviewEventResponseSchema,
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { itemId, quality, occurredAt } = request.body;

      const event = await fastify.services.reviews.recordReview({
        itemId,
        quality,
        occurredAt: occurredAt ? new Date(occurredAt) : undefined,
      });

      return reply.status(202).send(toEventResponse(event));
    }
  );

  void fastify.post(
    '/reviews/process',
    {
      schema: {
        response: {
          200: ProcessResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const summary = await fastify.services.reviews.processPending();
      return reply.status(200).send(summary);
    }
  );

  void fastify.post<{ Body: PreviewBody }>(
    '/reviews/preview',
    {
      schema: {
        body: PreviewBodySchema,
        response: {
          200: Type.Object({ item: ItemSchema }),
          400: ErrorResponseSchema,
          422: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { item, quality, reviewedAt } = request.body;

      const next = fastify.services.reviews.previewReview(
        {
          ...item,
          lastReviewedAt: item.lastReviewedAt ? new Date(item.lastReviewedAt) : null,
        },
        quality,
        reviewedAt ? new Date(reviewedAt) : undefined
      );

      return reply.status(200).send({ item: toItemResponse(next) });
    }
  );
};

export default reviewsRoute;
