/**
 * Reconciliation Summary Formatter
 */

import type { ReconciledMatch, ReconciliationSummary } from '../types/index.js';
import { RULE, pushLimited } from './utils.js';

const STATUS_LABELS: Record<ReconciledMatch['status'], string> = {
  updated: 'updated',
  failed: 'failed',
  planned: 'would update',
  skipped: 'not attempted',
};

function formatByOutcome(byOutcome: ReconciliationSummary['byOutcome']): string {
  const entries = Object.entries(byOutcome);
  return entries.length > 0 ? entries.map(([outcome, count]) => `${outcome}: ${count}`).join(', ') : 'none';
}

function formatMatch(match: ReconciledMatch): string {
  return (
    `  - Point ${match.point.pointId} "${match.pointName}" <- ${match.resultName} ` +
    `[${match.result.category} -> ${match.outcome}] (${match.strategy}, ${match.score}%, ${STATUS_LABELS[match.status]})`
  );
}

/**
 * Format a reconciliation summary as plain text
 */
export function formatReconciliationSummary(summary: ReconciliationSummary): string {
  const lines: string[] = [];

  lines.push(RULE);
  lines.push(`${summary.dryRun ? 'DRY RUN - ' : ''}RECONCILIATION SUMMARY`);
  lines.push(RULE);
  lines.push(`Plan ID: ${summary.planId}`);
  lines.push(`Suite ID: ${summary.suiteId ?? 'All suites'}`);
  lines.push(`Test Results: ${summary.totalResults}`);
  lines.push(`Test Points: ${summary.totalPoints}`);
  lines.push(`Matches: ${summary.totalMatches}`);
  if (summary.dryRun) {
    lines.push(`Planned Updates: ${summary.matches.filter((m) => m.status === 'planned').length}`);
  } else {
    lines.push(`Updated: ${summary.totalUpdated}/${summary.totalMatches}`);
  }
  lines.push(`By Outcome: ${formatByOutcome(summary.byOutcome)}`);
  if (summary.cancelled) {
    lines.push('Cancelled: remaining updates were not attempted');
  }
  if (summary.noMatches) {
    lines.push(summary.noMatches);
  }

  if (summary.matches.length > 0) {
    lines.push('');
    lines.push(`Matches (showing first ${Math.min(10, summary.matches.length)} of ${summary.matches.length})`);
    pushLimited(lines, summary.matches, 10, formatMatch, (remaining) => `  ... and ${remaining} more`);
  }

  if (summary.unmatchedPoints.length > 0) {
    lines.push('');
    lines.push(`Unmatched Test Points (${summary.unmatchedPoints.length})`);
    pushLimited(
      lines,
      summary.unmatchedPoints,
      10,
      (point) => `  - Point ${point.pointId}: ${point.displayTitle}`,
      (remaining) => `  ... and ${remaining} more`
    );
  }

  if (summary.unmatchedResults.length > 0) {
    lines.push('');
    lines.push(`Unmatched Test Results (${summary.unmatchedResults.length})`);
    pushLimited(
      lines,
      summary.unmatchedResults,
      10,
      (result) => `  - ${result.fullName} [${result.category}]`,
      (remaining) => `  ... and ${remaining} more`
    );
  }

  if (summary.errors.length > 0) {
    lines.push('');
    lines.push(`Errors (${summary.errors.length})`);
    pushLimited(
      lines,
      summary.errors,
      5,
      (failure) => `  - Point ${failure.pointId} (${failure.outcome}): ${failure.message}`,
      (remaining) => `  ... and ${remaining} more errors`
    );
  }

  lines.push('---');
  lines.push(`Processing time: ${summary.processingTimeMs}ms`);

  return lines.join('\n');
}
