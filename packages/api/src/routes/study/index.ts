import type { FastifyPluginAsync } from 'fastify';
import itemsRoute from './items';
import reviewsRoute from './reviews';
import plansRoute from './plans';

const studyRoutes: FastifyPluginAsync = async (fastify) => {
  await fastify.register(itemsRoute);
  await fastify.register(reviewsRoute);
  await fastify.register(plansRoute);
};

export default studyRoutes;
