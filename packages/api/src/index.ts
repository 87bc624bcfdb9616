export const API_VERSION = '0.1.0';

export { buildServer, startServer, type BuildServerOptions } from './server';
export { createServices, createServicesFromRepositories, type AppServices } from './services';
export { getEnv, getSchedulingConfig, validateEnv, resetEnv, type Env } from './config/env';
export { createShutdownHandler, type ShutdownTargets } from './shutdown';
export { logger, logError, logPerformance, createChildLogger, toError } from './utils/logger';
