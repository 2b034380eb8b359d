#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   testpoint-sync <planId> [suiteId] [options]
 */

import { run } from './run.js';

async function main(): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    process.stderr.write('\nOperation cancelled by user\n');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    process.exitCode = await run(process.argv.slice(2), {
      env: process.env,
      print: (text) => process.stdout.write(`${text}\n`),
      printError: (text) => process.stderr.write(`${text}\n`),
      cwd: process.cwd(),
      signal: controller.signal,
    });
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`Unexpected error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
