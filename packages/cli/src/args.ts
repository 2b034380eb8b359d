/**
 * Command-line arguments
 */

import { parseArgs } from 'node:util';
import {
  InvalidOptionsError,
  TEST_OUTCOMES,
  errorMessage,
  isTestOutcome,
  type TestOutcome,
} from '@testsync/core';
import { DEFAULT_MIN_SCORE, type PointCriteria } from '@testsync/reconciliation';

export const OUTPUT_FORMATS = ['console', 'json', 'csv'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type CliMode = 'help' | 'show-config' | 'from-xml' | 'update-outcome' | 'list';

export interface CliArgs {
  planId?: number;
  suiteId?: number;
  detailed: boolean;
  output: OutputFormat;
  updateOutcome?: TestOutcome;
  comment?: string;
  dryRun: boolean;
  criteria?: PointCriteria;
  fromXml?: string;
  minScore: number;
  configPath?: string;
  showConfig: boolean;
  help: boolean;
}

export const USAGE = `Usage: testpoint-sync <planId> [suiteId] [options]

Options:
  -d, --detailed               Fetch work item details for each point (slower)
  -o, --output <format>        console | json | csv (default: console)
  --update-outcome <outcome>   Set this outcome on every matching point
                               (${TEST_OUTCOMES.join(', ')})
  --comment <text>             Comment to add to updated points
  --dry-run                    Show what would be updated without changing anything
  --filter-outcome <outcome>   Only update points with this current outcome
  --filter-automated <bool>    Only update automated (true) or manual (false) points
  --filter-state <state>       Only update points in this state
  --filter-name <text>         Only update points whose title contains this text
  --from-xml <file>            Update points from a JUnit XML result file
  --min-score <0-100>          Minimum match score for --from-xml (default: ${DEFAULT_MIN_SCORE})
  --config <file>              JSON config file (overrides environment variables)
  --show-config                Print the current configuration and exit
  -h, --help                   Show this help

Environment:
  AZURE_DEVOPS_PAT       Personal access token
  AZURE_DEVOPS_ORG       Organization URL, e.g. https://dev.azure.com/yourorg
  AZURE_DEVOPS_PROJECT   Project name

Examples:
  testpoint-sync 1201                                  # list all points in a plan
  testpoint-sync 1201 1202 --output csv                # save one suite as CSV
  testpoint-sync 1201 --update-outcome Passed --dry-run
  testpoint-sync 1201 --from-xml results.xml --min-score 85`;

function parseId(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new InvalidOptionsError({ message: `${label} must be a positive integer, got "${value}"` });
  }
  return Number(value);
}

function parseBoolean(value: string | undefined, flag: string): boolean | undefined {
  if (value === undefined) return undefined;
  switch (value.trim().toLowerCase()) {
    case 'true':
    case 'yes':
    case '1':
      return true;
    case 'false':
    case 'no':
    case '0':
      return false;
    default:
      throw new InvalidOptionsError({ message: `${flag} expects true or false, got "${value}"` });
  }
}

function parseOutcome(value: string | undefined, flag: string): TestOutcome | undefined {
  if (value === undefined) return undefined;
  if (!isTestOutcome(value)) {
    throw new InvalidOptionsError({
      message: `${flag} must be one of ${TEST_OUTCOMES.join(', ')}, got "${value}"`,
    });
  }
  return value;
}

function parseOutput(value: string | undefined): OutputFormat {
  if (value === undefined) return 'console';
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidOptionsError({
      message: `--output must be one of ${OUTPUT_FORMATS.join(', ')}, got "${value}"`,
    });
  }
  return format;
}

function parseMinScore(value: string | undefined): number {
  if (value === undefined) return DEFAULT_MIN_SCORE;
  const score = Number(value);
  if (!/^\d+$/.test(value) || score > 100) {
    throw new InvalidOptionsError({ message: `--min-score must be an integer from 0 to 100, got "${value}"` });
  }
  return score;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        detailed: { type: 'boolean', short: 'd', default: false },
        output: { type: 'string', short: 'o' },
        'update-outcome': { type: 'string' },
        comment: { type: 'string' },
        'dry-run': { type: 'boolean', default: false },
        'filter-outcome': { type: 'string' },
        'filter-automated': { type: 'string' },
        'filter-state': { type: 'string' },
        'filter-name': { type: 'string' },
        'from-xml': { type: 'string' },
        'min-score': { type: 'string' },
        config: { type: 'string' },
        'show-config': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (err) {
    throw new InvalidOptionsError({
      message: errorMessage(err),
      suggestion: 'Run testpoint-sync --help for the list of options.',
      cause: err instanceof Error ? err : undefined,
    });
  }
}

/**
 * @throws InvalidOptionsError for unknown flags or malformed values
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = readArgs(argv);
  if (positionals.length > 2) {
    throw new InvalidOptionsError({
      message: `Unexpected argument: ${positionals.slice(2).join(' ')}`,
      suggestion: 'Run testpoint-sync --help for usage.',
    });
  }

  const criteria: PointCriteria = {};
  const currentOutcome = values['filter-outcome'];
  const automated = parseBoolean(values['filter-automated'], '--filter-automated');
  const state = values['filter-state'];
  const nameContains = values['filter-name'];
  if (currentOutcome !== undefined) criteria.currentOutcome = currentOutcome;
  if (automated !== undefined) criteria.automated = automated;
  if (state !== undefined) criteria.state = state;
  if (nameContains !== undefined) criteria.nameContains = nameContains;

  return {
    planId: parseId(positionals[0], 'Plan id'),
    suiteId: parseId(positionals[1], 'Suite id'),
    detailed: values.detailed,
    output: parseOutput(values.output),
    updateOutcome: parseOutcome(values['update-outcome'], '--update-outcome'),
    comment: values.comment,
    dryRun: values['dry-run'],
    criteria: Object.keys(criteria).length > 0 ? criteria : undefined,
    fromXml: values['from-xml'],
    minScore: parseMinScore(values['min-score']),
    configPath: values.config,
    showConfig: values['show-config'],
    help: values.help,
  };
}

/** from-xml takes precedence over update-outcome, which takes precedence over listing */
export function resolveMode(args: CliArgs): CliMode {
  if (args.help) return 'help';
  if (args.showConfig) return 'show-config';
  if (args.fromXml !== undefined) return 'from-xml';
  if (args.updateOutcome !== undefined) return 'update-outcome';
  return 'list';
}
