export * from './scheduling-config';
