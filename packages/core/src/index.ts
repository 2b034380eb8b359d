/**
 * @testsync/core
 *
 * Shared types, the test point store contract and the error taxonomy
 */

// Types
export * from './types/index.js';

// Interfaces
export type * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
