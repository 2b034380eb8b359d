/**
 * @testsync/cli
 *
 * Command-line front end for listing, bulk-updating and reconciling test points.
 */

export { run, createDefaultStore } from './run.js';
export type { RunDeps, StoreFactory } from './run.js';
export { parseCliArgs, resolveMode, USAGE, OUTPUT_FORMATS } from './args.js';
export type { CliArgs, CliMode, OutputFormat } from './args.js';
export {
  expandEnvVars,
  loadConfigFile,
  mergeSettings,
  resolveConfig,
  describeConfig,
  formatZodError,
  configFileSchema,
  syncConfigSchema,
} from './config.js';
export type { ConfigFile, ConfigSettings, Env, SyncConfig } from './config.js';
export { Logger, redactSecrets, LOG_LEVELS } from './logger.js';
export type { LogFormat, LogLevel, LogSink, LoggerOptions } from './logger.js';
export { outputFileName, writeListingFile } from './output.js';
