import type { FastifyPluginAsync } from 'fastify';
import { Type } from '@sinclair/typebox';
import { toCalendarDate } from '@study-cadence/core';
import { getEnv } from '../../config/env';
import { ErrorResponseSchema } from '../../schemas/common';
import {
  DayPlanSchema,
  GeneratePlanBodySchema,
  GeneratePlanResponseSchema,
  ListPlansQuerySchema,
  type GeneratePlanBody,
  type ListPlansQuery,
} from '../../schemas/study';

const plansRoute: FastifyPluginAsync = async (fastify) => {
  await Promise.resolve();

  void fastify.post<{ Body: GeneratePlanBody }>(
    '/plans',
    {
      schema: {
        body: GeneratePlanBodySchema,
        response: {
          201: GeneratePlanResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const startDate = request.body.startDate ?? toCalendarDate(new Date());
      const horizonDays = request.body.horizonDays ?? getEnv().PLAN_DEFAULT_HORIZON_DAYS;

      const result = await fastify.services.plans.generate({ startDate, horizonDays });

      return reply.status(201).send(result);
    }
  );

  void fastify.get<{ Querystring: ListPlansQuery }>(
    '/plans',
    {
      schema: {
        querystring: ListPlansQuerySchema,
        response: {
          200: Type.Object({ plans: Type.Array(DayPlanSchema) }),
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const plans = await fastify.services.plans.listPlans(request.query.from, request.query.to);
      return reply.status(200).send({ plans });
    }
  );
};

export default plansRoute;
