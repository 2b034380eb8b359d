export type { ITestPointStore } from './test-point-store.js';
export type { ILogger } from './logger.js';
