export * from './enums';
export * from './calendar';
export * from './review';
export * from './plan';
