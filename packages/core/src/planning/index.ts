export * from './plan-selector';
