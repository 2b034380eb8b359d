/**
 * Test Point Listing Formatters
 *
 * Console text, CSV rows and JSON for a plan's points.
 */

import { stringify } from 'csv-stringify/sync';
import type { SuitePoints, TestPointRecord } from '@testsync/core';
import { RULE, formatDistribution, formatTimestamp, pushLimited } from './utils.js';

export interface ListingFormatOptions {
  detailed?: boolean;
  /** Defaults to now */
  generatedAt?: Date;
}

function formatPoint(point: TestPointRecord, index: number, detailed: boolean): string[] {
  const lines = [
    `     ${index + 1}. Point ${point.pointId}: TC-${point.testCaseId ?? 'N/A'} - ${point.displayTitle.slice(0, 60)}`,
    `        State: ${point.state}, Outcome: ${point.outcome}, Config: ${point.configurationName}`,
  ];
  if (detailed && point.details) {
    lines.push(
      `        Priority: ${point.details.priority ?? 'N/A'}, Steps: ${point.details.steps.length}`,
      `        Automation: ${point.details.automationStatus ?? 'N/A'}`
    );
  }
  return lines;
}

/**
 * Console summary: per-suite distributions and the first 5 points of each suite
 */
export function formatTestPointListing(
  suites: readonly SuitePoints[],
  options: ListingFormatOptions = {}
): string {
  const { detailed = false, generatedAt = new Date() } = options;
  const lines: string[] = [RULE, 'TEST POINTS SUMMARY', RULE];
  let totalPoints = 0;

  for (const { suite, points } of suites) {
    totalPoints += points.length;
    lines.push('');
    lines.push(`Suite: ${suite.name} (ID: ${suite.id})`);
    lines.push(`   Type: ${suite.type}`);
    lines.push(`   Test Points: ${points.length}`);
    if (points.length === 0) continue;

    const automated = points.filter((point) => point.automated).length;
    lines.push(`   Outcomes: ${formatDistribution(points.map((point) => point.outcome))}`);
    lines.push(`   States: ${formatDistribution(points.map((point) => point.state))}`);
    lines.push(`   Automated: ${automated}/${points.length}`);
    lines.push('   Test Points:');
    pushLimited(
      lines,
      points,
      5,
      (point, index) => formatPoint(point, index, detailed),
      (remaining) => `     ... and ${remaining} more test points`
    );
  }

  lines.push('');
  lines.push(RULE, 'TOTAL SUMMARY', RULE);
  lines.push(`Total Suites: ${suites.length}`);
  lines.push(`Total Test Points: ${totalPoints}`);
  lines.push(`Generated: ${formatTimestamp(generatedAt)}`);

  return lines.join('\n');
}

export const CSV_HEADER = [
  'Suite ID',
  'Suite Name',
  'Suite Type',
  'Point ID',
  'Test Case ID',
  'Test Case Name',
  'State',
  'Outcome',
  'Configuration',
  'Assigned To',
  'Automated',
  'Priority',
  'Steps Count',
] as const;

/**
 * One row per point, in CSV_HEADER column order
 */
export function toTestPointRows(suites: readonly SuitePoints[]): string[][] {
  return suites.flatMap(({ suite, points }) =>
    points.map((point) => [
      String(suite.id),
      suite.name,
      suite.type,
      String(point.pointId),
      String(point.testCaseId ?? ''),
      point.displayTitle,
      point.state,
      String(point.outcome),
      point.configurationName,
      point.assignedTo,
      String(point.automated),
      String(point.details?.priority ?? 'N/A'),
      String(point.details?.steps.length ?? 0),
    ])
  );
}

export function formatTestPointsCsv(suites: readonly SuitePoints[]): string {
  return stringify([[...CSV_HEADER], ...toTestPointRows(suites)]);
}

export function formatTestPointsJson(suites: readonly SuitePoints[]): string {
  return JSON.stringify(suites, null, 2);
}
