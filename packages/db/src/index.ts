export const DB_VERSION = '0.1.0';
export { createPool, query, close } from './connection';
export type { CreatePoolOptions } from './connection';
export * from './repositories/items';
export * from './repositories/review-events';
export * from './repositories/day-plans';
