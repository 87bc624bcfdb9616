import { createPool } from '@study-cadence/db';
import { getSchedulingConfig, validateEnv } from './config/env';
import { createServices } from './services';
import { startServer } from './server';
import { createShutdownHandler } from './shutdown';
import { createChildLogger, logError, toError } from './utils/logger';

const log = createChildLogger({ component: 'main' });

async function main(): Promise<void> {
  const env = validateEnv();

  // Inconsistent scheduler or planner settings stop the process before it listens.
  const schedulingConfig = getSchedulingConfig(env);

  log.info(
    {
      scheduler: schedulingConfig.scheduler,
      constraints: schedulingConfig.constraints,
      defaultHorizonDays: env.PLAN_DEFAULT_HORIZON_DAYS,
    },
    'Scheduling configuration loaded'
  );

  const pool = createPool(env.DATABASE_URL);
  const server = await startServer({ services: createServices(pool, schedulingConfig) });
  const shutdown = createShutdownHandler({ server, pool }, log);

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }

  process.on('uncaughtException', (error) => {
    logError(error, { phase: 'runtime', kind: 'uncaughtException' }, log);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logError(toError(reason), { phase: 'runtime', kind: 'unhandledRejection' }, log);
    process.exit(1);
  });
}

main().catch((error: unknown) => {
  logError(toError(error), { phase: 'startup' }, log);
  process.exit(1);
});
