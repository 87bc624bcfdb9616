export const VERSION = '0.1.0';

export * from './domain';
export * from './config';
export * from './errors';
export * from './validation';
export * from './scheduling';
export * from './planning';
export * from './workflow';
export * from './ports';
export { z } from 'zod';
