/**
 * Bulk outcome updates for points selected by filters
 */

import {
  CancelledError,
  errorMessage,
  silentLogger,
  type ITestPointStore,
  type TestOutcome,
  type TestPointRecord,
} from '@testsync/core';
import type {
  CriteriaSuiteResult,
  CriteriaUpdateOptions,
  CriteriaUpdateSummary,
  PointCriteria,
} from '../types/index.js';
import { listTestPoints } from '../listing/test-point-lister.js';

export function matchesCriteria(point: TestPointRecord, criteria: PointCriteria = {}): boolean {
  const { currentOutcome, automated, state, nameContains } = criteria;
  if (currentOutcome !== undefined && point.outcome !== currentOutcome) return false;
  if (automated !== undefined && point.automated !== automated) return false;
  if (state !== undefined && point.state !== state) return false;
  if (
    nameContains !== undefined &&
    !point.displayTitle.toLowerCase().includes(nameContains.toLowerCase())
  ) {
    return false;
  }
  return true;
}

/**
 * Set `outcome` on every point that meets the criteria.
 * A failed update is recorded and the batch continues.
 */
export async function updateByCriteria(
  store: ITestPointStore,
  planId: number,
  outcome: TestOutcome,
  options: CriteriaUpdateOptions = {}
): Promise<CriteriaUpdateSummary> {
  const { suiteId, criteria, comment, signal, dryRun = false } = options;
  const logger = options.logger ?? silentLogger;

  if (signal?.aborted) {
    throw new CancelledError({ message: 'Update cancelled before fetching test points' });
  }

  const listing = await listTestPoints(store, planId, { suiteId, logger });

  const suites: CriteriaSuiteResult[] = [];
  const errors: string[] = [];
  let totalFound = 0;
  let totalEligible = 0;
  let totalUpdated = 0;
  let cancelled = false;

  for (const { suite, points } of listing) {
    totalFound += points.length;
    const eligible = points.filter((point) => matchesCriteria(point, criteria));
    totalEligible += eligible.length;
    if (eligible.length === 0) continue;

    suites.push({ suite, totalPoints: points.length, eligible });
    if (dryRun) continue;

    for (const point of eligible) {
      if (cancelled || signal?.aborted) {
        cancelled = true;
        break;
      }
      try {
        await store.updateOutcome(planId, suite.id, point.pointId, outcome, comment);
        totalUpdated++;
        logger.debug('Updated test point', { pointId: point.pointId, outcome });
      } catch (err) {
        const message = `Failed to update point ${point.pointId}: ${errorMessage(err)}`;
        errors.push(message);
        logger.warn(message);
      }
    }
  }

  return {
    planId,
    suiteId,
    outcome,
    criteria,
    totalFound,
    totalEligible,
    totalUpdated,
    suitesProcessed: suites.length,
    suites,
    errors,
    dryRun,
    cancelled,
  };
}
