import { logError, toError, type Logger } from './utils/logger';

export interface ShutdownTargets {
  server: { close(): Promise<unknown> };
  pool: { end(): Promise<void> };
}

/**
 * Signal handler that closes the server, then the database pool, and exits.
 * Repeated signals while a shutdown is running are ignored.
 */
export function createShutdownHandler(
  targets: ShutdownTargets,
  log: Logger,
  exit: (code: number) => void = (code) => process.exit(code)
): (signal: NodeJS.Signals) => Promise<void> {
  let shuttingDown = false;

  return async (signal) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    try {
      await targets.server.close();
      await targets.pool.end();
      log.info('Server and database pool closed');
      exit(0);
    } catch (error) {
      logError(toError(error), { phase: 'shutdown', signal }, log);
      exit(1);
    }
  };
}
