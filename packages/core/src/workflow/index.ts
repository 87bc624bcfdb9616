export * from './review-workflow';
export * from './plan-workflow';
