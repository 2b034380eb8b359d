/**
 * CLI runner
 *
 * Everything the command does apart from touching `process`, so tests can
 * drive it with an in-memory store and captured output.
 */

import {
  CancelledError,
  SyncError,
  errorMessage,
  type ILogger,
  type ITestPointStore,
  type TestOutcome,
} from '@testsync/core';
import { createAzureTestPointStore } from '@testsync/connector-azure';
import {
  RULE,
  Reconciler,
  formatCriteriaUpdateSummary,
  formatReconciliationSummary,
  formatTestPointListing,
  formatTestPointsCsv,
  formatTestPointsJson,
  listTestPoints,
  updateByCriteria,
} from '@testsync/reconciliation';
import { USAGE, parseCliArgs, resolveMode, type CliArgs } from './args.js';
import {
  describeConfig,
  loadConfigFile,
  mergeSettings,
  resolveConfig,
  type Env,
  type SyncConfig,
} from './config.js';
import { Logger, type LogSink } from './logger.js';
import { writeListingFile } from './output.js';

export type StoreFactory = (config: SyncConfig, logger: ILogger, signal?: AbortSignal) => ITestPointStore;

export interface RunDeps {
  env: Env;
  /** Command output (stdout) */
  print: (text: string) => void;
  /** Fatal errors (stderr) */
  printError: (text: string) => void;
  cwd: string;
  now?: () => Date;
  signal?: AbortSignal;
  createStore?: StoreFactory;
  /** Log destination (default: stderr) */
  logSink?: LogSink;
}

export const createDefaultStore: StoreFactory = (config, logger, signal) =>
  createAzureTestPointStore({
    organizationUrl: config.azure.organizationUrl,
    project: config.azure.project,
    personalAccessToken: config.azure.personalAccessToken,
    apiVersion: config.azure.apiVersion,
    timeoutMs: config.azure.timeoutMs,
    retry: { attempts: config.azure.retryAttempts },
    signal,
    logger,
  });

function missingPlanMessage(): string {
  return [
    'Error: plan id is required for test point operations',
    'Usage examples:',
    '  testpoint-sync 1201              # list test points',
    '  testpoint-sync --show-config     # show configuration',
    '  testpoint-sync --help            # show all options',
  ].join('\n');
}

async function runFromXml(
  store: ITestPointStore,
  logger: ILogger,
  args: CliArgs,
  planId: number,
  resultsPath: string,
  deps: RunDeps
): Promise<number> {
  const reconciler = new Reconciler(store, { logger });
  const summary = await reconciler.reconcile({
    planId,
    suiteId: args.suiteId,
    resultsPath,
    comment: args.comment,
    dryRun: args.dryRun,
    detailed: args.detailed,
    minScore: args.minScore,
    signal: deps.signal,
  });

  deps.print(formatReconciliationSummary(summary));
  if (summary.cancelled || summary.totalMatches === 0) return 1;
  return 0;
}

async function runUpdateOutcome(
  store: ITestPointStore,
  logger: ILogger,
  args: CliArgs,
  outcome: TestOutcome,
  planId: number,
  deps: RunDeps
): Promise<number> {
  const summary = await updateByCriteria(store, planId, outcome, {
    suiteId: args.suiteId,
    criteria: args.criteria,
    dryRun: args.dryRun,
    comment: args.comment,
    signal: deps.signal,
    logger,
  });

  deps.print(formatCriteriaUpdateSummary(summary));
  return summary.cancelled ? 1 : 0;
}

async function runList(
  store: ITestPointStore,
  logger: ILogger,
  config: SyncConfig,
  args: CliArgs,
  planId: number,
  deps: RunDeps
): Promise<number> {
  const now = deps.now ?? (() => new Date());

  deps.print(
    [
      RULE,
      'Test Points Listing',
      RULE,
      `Organization: ${config.azure.organizationUrl}`,
      `Project: ${config.azure.project}`,
      `Test Plan ID: ${planId}`,
      `Suite ID: ${args.suiteId ?? 'All suites'}`,
      `Detailed Mode: ${args.detailed ? 'Yes' : 'No'}`,
      RULE,
    ].join('\n')
  );

  if (deps.signal?.aborted) {
    throw new CancelledError({ message: 'Listing cancelled before fetching test points' });
  }

  const suites = await listTestPoints(store, planId, {
    suiteId: args.suiteId,
    detailed: args.detailed,
    logger,
  });

  if (suites.length === 0) {
    deps.printError('No test points found.');
    return 1;
  }

  switch (args.output) {
    case 'console':
      deps.print(formatTestPointListing(suites, { detailed: args.detailed, generatedAt: now() }));
      break;
    case 'json': {
      const path = await writeListingFile(deps.cwd, planId, 'json', formatTestPointsJson(suites), now());
      deps.print(`Results saved to: ${path}`);
      break;
    }
    case 'csv': {
      const path = await writeListingFile(deps.cwd, planId, 'csv', formatTestPointsCsv(suites), now());
      deps.print(`Results saved to: ${path}`);
      break;
    }
  }

  return 0;
}

async function execute(argv: readonly string[], deps: RunDeps): Promise<number> {
  const args = parseCliArgs(argv);
  const mode = resolveMode(args);

  if (mode === 'help') {
    deps.print(USAGE);
    return 0;
  }

  const file = args.configPath ? await loadConfigFile(args.configPath, deps.env, deps.cwd) : undefined;
  const settings = mergeSettings(deps.env, file);

  if (mode === 'show-config') {
    deps.print(describeConfig(settings));
    return 0;
  }

  const { planId } = args;
  if (planId === undefined) {
    deps.printError(missingPlanMessage());
    return 1;
  }

  const config = resolveConfig(settings);
  const logger = new Logger({
    level: config.logging.level,
    format: config.logging.format,
    sink: deps.logSink,
  }).child({ planId });
  const store = (deps.createStore ?? createDefaultStore)(config, logger, deps.signal);

  logger.info('Starting', {
    mode,
    organizationUrl: config.azure.organizationUrl,
    project: config.azure.project,
  });

  if (mode === 'from-xml' && args.fromXml !== undefined) {
    return runFromXml(store, logger, args, planId, args.fromXml, deps);
  }
  if (mode === 'update-outcome' && args.updateOutcome !== undefined) {
    return runUpdateOutcome(store, logger, args, args.updateOutcome, planId, deps);
  }
  return runList(store, logger, config, args, planId, deps);
}

/**
 * Run the command and return its exit code. Never throws.
 */
export async function run(argv: readonly string[], deps: RunDeps): Promise<number> {
  try {
    return await execute(argv, deps);
  } catch (err) {
    if (err instanceof SyncError) {
      deps.printError(err.toActionableMessage());
    } else {
      deps.printError(`Unexpected error: ${errorMessage(err)}`);
    }
    return 1;
  }
}
