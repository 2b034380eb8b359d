export * from './outcome.js';
export type * from './test-result.js';
export type * from './test-point.js';
