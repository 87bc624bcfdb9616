import 'fastify';
import type { AppServices } from '../services';

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}
