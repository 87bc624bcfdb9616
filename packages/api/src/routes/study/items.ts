import type { FastifyPluginAsync } from 'fastify';
import { toCalendarDate } from '@study-cadence/core';
import { ErrorResponseSchema } from '../../schemas/common';
import {
  CreateItemBodySchema,
  DueItemsQuerySchema,
  DueItemsResponseSchema,
  ItemParamsSchema,
  ItemSchema,
  type CreateItemBody,
  type DueItemsQuery,
  type ItemParams,
} from '../../schemas/study';
import { toItemResponse } from '../serializers';

const itemsRoute: FastifyPluginAsync = async (fastify) => {
  await Promise.resolve();

  void fastify.get<{ Querystring: DueItemsQuery }>(
    '/items/due',
    {
      schema: {
        querystring: DueItemsQuerySchema,
        response: {
          200: DueItemsResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const asOf = request.query.asOf ?? toCalendarDate(new Date());
      const items = await fastify.services.catalog.getDueItems(asOf);

      return reply.status(200).send({
        asOf,
        items: items.map(toItemResponse),
        total: items.length,
      });
    }
  );

  void fastify.get<{ Params: ItemParams }>(
    '/items/:id',
    {
      schema: {
        params: ItemParamsSchema,
        response: {
          200: ItemSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const item = await fastify.services.catalog.getItem(request.params.id);
      return reply.status(200).send(toItemResponse(item));
    }
  );

  void fastify.post<{ Body: CreateItemBody }>(
    '/items',
    {
      schema: {
        body: CreateItemBodySchema,
        response: {
          201: ItemSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const item = await fastify.services.catalog.createItem(request.body);
      return reply.status(201).send(toItemResponse(item));
    }
  );
};

export default itemsRoute;
