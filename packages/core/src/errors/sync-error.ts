/**
 * Error taxonomy shared by every package.
 * Messages carry an optional suggestion so the CLI can print an actionable hint.
 */

export type SyncErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'REMOTE_ERROR'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'RATE_LIMITED'
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'INVALID_OPTIONS'
  | 'CANCELLED';

export interface SyncErrorDetails {
  /** Error code for programmatic handling */
  code: SyncErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SyncErrorDetails) {
    super(details.message);
    this.name = 'SyncError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace?.(this, new.target);
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

type Details<C extends SyncErrorCode = SyncErrorCode> = Omit<SyncErrorDetails, 'code'> & {
  code?: C;
};

/** Missing or invalid connection settings */
export class ConfigurationError extends SyncError {
  constructor(details: Details<'CONFIGURATION_ERROR'>) {
    super({ ...details, code: 'CONFIGURATION_ERROR' });
    this.name = 'ConfigurationError';
  }
}

export type RemoteErrorCode = 'REMOTE_ERROR' | 'AUTHENTICATION_FAILED' | 'TIMEOUT' | 'RATE_LIMITED';

/** Any failure talking to the test point store */
export class RemoteError extends SyncError {
  declare readonly code: RemoteErrorCode;
  /** HTTP status, when the server answered */
  readonly status?: number;

  constructor(details: Details<RemoteErrorCode> & { status?: number }) {
    super({ ...details, code: details.code ?? 'REMOTE_ERROR' });
    this.name = 'RemoteError';
    this.status = details.status;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), status: this.status };
  }
}

/** Result document does not exist */
export class NotFoundError extends SyncError {
  constructor(details: Details<'NOT_FOUND'>) {
    super({ ...details, code: 'NOT_FOUND' });
    this.name = 'NotFoundError';
  }
}

/** Result document is not well-formed or has an unexpected structure */
export class ParseError extends SyncError {
  constructor(details: Details<'PARSE_ERROR'>) {
    super({ ...details, code: 'PARSE_ERROR' });
    this.name = 'ParseError';
  }
}

export class InvalidOptionsError extends SyncError {
  constructor(details: Details<'INVALID_OPTIONS'>) {
    super({ ...details, code: 'INVALID_OPTIONS' });
    this.name = 'InvalidOptionsError';
  }
}

export class CancelledError extends SyncError {
  constructor(details: Details<'CANCELLED'>) {
    super({ ...details, code: 'CANCELLED' });
    this.name = 'CancelledError';
  }
}

/**
 * Helper to wrap unknown errors as SyncError
 */
export function wrapError(
  error: unknown,
  defaultCode: SyncErrorCode = 'REMOTE_ERROR'
): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new SyncError({ code: defaultCode, message, cause });
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
