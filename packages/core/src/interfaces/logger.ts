/**
 * Minimal structured logger contract. The CLI supplies the concrete logger;
 * library code defaults to `silentLogger`.
 */
export interface ILogger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}
