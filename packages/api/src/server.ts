import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyRateLimit from '@fastify/rate-limit';
import type { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { createPool } from '@study-cadence/db';
import { getEnv, getSchedulingConfig } from './config/env';
import { HealthResponseSchema } from './schemas/common';
import { createServices, type AppServices } from './services';

const SERVICE_NAME = 'study-cadence-api';

export interface BuildServerOptions {
  /** Services to use instead of ones backed by a new database pool */
  services?: AppServices;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const env = getEnv();

  const server = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
    },
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    disableRequestLogging: false,
    trustProxy: true,
  }).withTypeProvider<TypeBoxTypeProvider>();

  let services = options.services;
  if (!services) {
    const pool = createPool(env.DATABASE_URL);
    services = createServices(pool, getSchedulingConfig(env));
    server.addHook('onClose', async () => {
      await pool.end();
    });
  }

  server.decorate('services', services);

  await registerPlugins(server);
  registerErrorHandler(server);
  await registerRoutes(server);

  return server;
}

async function registerPlugins(server: FastifyInstance): Promise<void> {
  const env = getEnv();

  await server.register(fastifyCors, {
    origin: env.NODE_ENV === 'development' ? true : env.CORS_ORIGIN,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID'],
    maxAge: 86400,
  });

  if (env.NODE_ENV !== 'test') {
    await server.register(fastifyRateLimit, {
      max: env.RATE_LIMIT_MAX,
      timeWindow: env.RATE_LIMIT_WINDOW,
      cache: 10000,
      allowList: ['127.0.0.1', '::1'],
      keyGenerator: (request: FastifyRequest) => {
        return request.ip;
      },
      errorResponseBuilder: (request: FastifyRequest, context) => {
        return {
          error: {
            statusCode: 429,
            message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
            requestId: request.id,
            code: 'RATE_LIMIT_EXCEEDED',
          },
        };
      },
    });
  }
}

interface FastifyError extends Error {
  statusCode?: number;
  code?: string;
  validation?: unknown;
  issues?: unknown;
}

function registerErrorHandler(server: FastifyInstance): void {
  const env = getEnv();

  server.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = err.statusCode ?? 500;
    const isClientError = statusCode >= 400 && statusCode < 500;

    if (isClientError) {
      request.log.debug(
        {
          err,
          requestId: request.id,
          method: request.method,
          url: request.url,
        },
        'Request rejected'
      );
    } else {
      request.log.error(
        {
          err,
          requestId: request.id,
          method: request.method,
          url: request.url,
        },
        'Request error'
      );
    }

    const response: {
      error: {
        statusCode: number;
        message: string;
        requestId: string;
        code?: string;
        details?: Record<string, unknown>;
      };
    } = {
      error: {
        statusCode,
        message:
          env.NODE_ENV === 'production' && statusCode === 500
            ? 'Internal Server Error'
            : err.message,
        requestId: request.id,
      },
    };

    if (err.code) {
      response.error.code = err.code;
    }

    if (Array.isArray(err.issues)) {
      response.error.details = { issues: err.issues };
    }

    if (err.validation) {
      response.error.code = 'VALIDATION_ERROR';
      response.error.details = { validation: err.validation };
    }

    void reply.status(statusCode).send(response);
  });

  server.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    void reply.status(404).send({
      error: {
        statusCode: 404,
        message: `Route ${request.method} ${request.url} not found`,
        requestId: request.id,
        code: 'NOT_FOUND',
      },
    });
  });
}

async function registerRoutes(server: FastifyInstance): Promise<void> {
  const env = getEnv();

  server.get(
    '/health',
    {
      schema: {
        response: {
          200: HealthResponseSchema,
          503: HealthResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const startTime = Date.now();

      try {
        await server.services.checkDatabase();
        const latencyMs = Date.now() - startTime;

        return reply.status(200).send({
          status: 'healthy',
          timestamp: new Date().toISOString(),
          service: SERVICE_NAME,
          version: env.APP_VERSION,
          database: {
            connected: true,
            latencyMs,
          },
        });
      } catch (error) {
        request.log.error({ err: error }, 'Health check failed');

        return reply.status(503).send({
          status: 'unhealthy',
          timestamp: new Date().toISOString(),
          service: SERVICE_NAME,
          version: env.APP_VERSION,
          database: {
            connected: false,
          },
        });
      }
    }
  );

  server.get('/', async (_request, reply) => {
    return reply.status(200).send({
      service: 'Study Cadence API',
      version: env.APP_VERSION,
      endpoints: {
        health: '/health',
        items: '/api/v1/items',
        reviews: '/api/v1/reviews',
        plans: '/api/v1/plans',
      },
    });
  });

  await server.register(
    async (apiV1: FastifyInstance) => {
      const studyRoutes = (await import('./routes/study/index')).default;
      await apiV1.register(studyRoutes);
    },
    { prefix: '/api/v1' }
  );
}

export async function startServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const env = getEnv();
  const server = await buildServer(options);

  try {
    await server.listen({ port: env.PORT, host: env.HOST });
    server.log.info(`Server listening on http://${env.HOST}:${String(env.PORT)}`);
    return server;
  } catch (error) {
    server.log.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}
