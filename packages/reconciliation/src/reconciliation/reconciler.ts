/**
 * Reconciler
 *
 * Runs one pass over a plan: fetch points, parse the result document,
 * match, map categories to outcomes and update each matched point.
 */

import {
  CancelledError,
  errorMessage,
  flattenResults,
  silentLogger,
  type ILogger,
  type ITestPointStore,
  type TestOutcome,
} from '@testsync/core';
import type {
  ReconcileOptions,
  ReconciledMatch,
  ReconciliationSummary,
  UpdateFailure,
} from '../types/index.js';
import { flattenPoints, listTestPoints } from '../listing/test-point-lister.js';
import { matchTestPoints, resolveMatchOptions } from '../matching/match-engine.js';
import { parseTestResults } from '../results/result-parser.js';
import { mapCategoryToOutcome } from './outcome-mapper.js';

export interface ReconcilerOptions {
  logger?: ILogger;
}

export const NO_MATCHES_MESSAGE = 'No matches found';

function throwIfCancelled(signal: AbortSignal | undefined, phase: string): void {
  if (signal?.aborted) {
    throw new CancelledError({ message: `Reconciliation cancelled before ${phase}` });
  }
}

export class Reconciler {
  private readonly store: ITestPointStore;
  private readonly logger: ILogger;

  constructor(store: ITestPointStore, options: ReconcilerOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Reconcile a result document with the points of a plan.
   *
   * Fetch and parse failures propagate. Update failures are collected in
   * the summary and the remaining matches are still attempted.
   *
   * @throws CancelledError when the signal fires before matching finished
   */
  async reconcile(options: ReconcileOptions): Promise<ReconciliationSummary> {
    const startTime = Date.now();
    const { minScore } = resolveMatchOptions(options);
    const { planId, suiteId, resultsPath, comment, signal, dryRun = false, detailed = false } = options;

    throwIfCancelled(signal, 'fetching test points');
    this.logger.info('Fetching test points', { planId, suiteId, detailed });
    const points = flattenPoints(
      await listTestPoints(this.store, planId, { suiteId, detailed, logger: this.logger })
    );

    throwIfCancelled(signal, 'parsing results');
    this.logger.info('Parsing test results', { resultsPath });
    const results = flattenResults(await parseTestResults(resultsPath));

    throwIfCancelled(signal, 'matching');
    const report = matchTestPoints(results, points, options);
    this.logger.info('Matched test points', {
      points: points.length,
      results: results.length,
      matches: report.matches.length,
      minScore,
    });

    const matches: ReconciledMatch[] = [];
    const errors: UpdateFailure[] = [];
    const byOutcome: Partial<Record<TestOutcome, number>> = {};
    let totalUpdated = 0;
    let cancelled = false;

    for (const match of report.matches) {
      const outcome = mapCategoryToOutcome(match.result.category);

      if (cancelled || signal?.aborted) {
        cancelled = true;
        matches.push({ ...match, outcome, status: 'skipped' });
        continue;
      }

      if (dryRun) {
        matches.push({ ...match, outcome, status: 'planned' });
        byOutcome[outcome] = (byOutcome[outcome] ?? 0) + 1;
        continue;
      }

      const { pointId, suiteId: pointSuiteId } = match.point;
      try {
        await this.store.updateOutcome(planId, pointSuiteId, pointId, outcome, comment);
        totalUpdated++;
        byOutcome[outcome] = (byOutcome[outcome] ?? 0) + 1;
        matches.push({ ...match, outcome, status: 'updated' });
        this.logger.debug('Updated test point', { pointId, outcome });
      } catch (err) {
        const message = errorMessage(err);
        errors.push({ pointId, suiteId: pointSuiteId, outcome, message });
        matches.push({ ...match, outcome, status: 'failed' });
        this.logger.warn('Failed to update test point', { pointId, outcome, error: message });
      }
    }

    if (cancelled) {
      this.logger.warn('Reconciliation cancelled during updates', { totalUpdated });
    }

    return {
      planId,
      suiteId,
      totalResults: results.length,
      totalPoints: points.length,
      totalMatches: report.matches.length,
      totalUpdated,
      byOutcome,
      errors,
      matches,
      unmatchedPoints: report.unmatchedPoints,
      unmatchedResults: report.unmatchedResults,
      dryRun,
      cancelled,
      noMatches: report.matches.length === 0 ? NO_MATCHES_MESSAGE : undefined,
      processingTimeMs: Date.now() - startTime,
    };
  }
}
