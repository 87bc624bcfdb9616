export * from './quality';
export * from './review-scheduler';
export * from './batch';
