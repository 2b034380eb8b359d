/**
 * Criteria Update Formatter
 */

import type { CriteriaUpdateSummary, PointCriteria } from '../types/index.js';
import { RULE, pushLimited } from './utils.js';

export function describeCriteria(criteria: PointCriteria | undefined): string {
  const parts = Object.entries(criteria ?? {})
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? parts.join(', ') : 'None (all points)';
}

export function formatCriteriaUpdateSummary(summary: CriteriaUpdateSummary): string {
  const lines: string[] = [];

  lines.push(RULE);
  lines.push(`${summary.dryRun ? 'DRY RUN - ' : ''}UPDATING TEST POINTS`);
  lines.push(RULE);
  lines.push(`Plan ID: ${summary.planId}`);
  lines.push(`Suite ID: ${summary.suiteId ?? 'All suites'}`);
  lines.push(`Target Outcome: ${summary.outcome}`);
  lines.push(`Filter Criteria: ${describeCriteria(summary.criteria)}`);
  lines.push(RULE);

  for (const { suite, totalPoints, eligible } of summary.suites) {
    lines.push('');
    lines.push(`Suite: ${suite.name} (ID: ${suite.id})`);
    lines.push(`  Eligible points: ${eligible.length}/${totalPoints}`);
    if (summary.dryRun) {
      lines.push(`  [DRY RUN] Would update ${eligible.length} points to ${summary.outcome}`);
      pushLimited(
        lines,
        eligible,
        5,
        (point) => `    - Point ${point.pointId}: ${point.displayTitle.slice(0, 60)} (Current: ${point.outcome})`,
        (remaining) => `    - ... and ${remaining} more points`
      );
    }
  }

  lines.push('');
  lines.push(RULE, 'UPDATE SUMMARY', RULE);
  lines.push(`Total Points Found: ${summary.totalFound}`);
  lines.push(`Eligible for Update: ${summary.totalEligible}`);
  lines.push(`Successfully Updated: ${summary.totalUpdated}`);
  lines.push(`Suites Processed: ${summary.suitesProcessed}`);
  if (summary.cancelled) {
    lines.push('Cancelled: remaining updates were not attempted');
  }
  if (summary.errors.length > 0) {
    lines.push(`Errors: ${summary.errors.length}`);
    pushLimited(
      lines,
      summary.errors,
      5,
      (error) => `  - ${error}`,
      (remaining) => `  - ... and ${remaining} more errors`
    );
  }

  return lines.join('\n');
}
