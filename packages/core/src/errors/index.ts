/**
 * Error exports
 */

export {
  SyncError,
  ConfigurationError,
  RemoteError,
  NotFoundError,
  ParseError,
  InvalidOptionsError,
  CancelledError,
  wrapError,
  errorMessage,
} from './sync-error.js';
export type { SyncErrorCode, SyncErrorDetails, RemoteErrorCode } from './sync-error.js';
