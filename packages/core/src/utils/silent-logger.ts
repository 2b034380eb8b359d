import type { ILogger } from '../interfaces/logger.js';

const noop = (): void => {};

export const silentLogger: ILogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
