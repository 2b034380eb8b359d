import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { formatCompactTimestamp } from '@testsync/reconciliation';

export function outputFileName(planId: number, ext: 'json' | 'csv', date: Date): string {
  return `test_points_plan_${planId}_${formatCompactTimestamp(date)}.${ext}`;
}

/**
 * Write a listing export into `cwd` and return its path
 */
export async function writeListingFile(
  cwd: string,
  planId: number,
  ext: 'json' | 'csv',
  content: string,
  date: Date
): Promise<string> {
  const path = resolve(cwd, outputFileName(planId, ext, date));
  await writeFile(path, content, 'utf-8');
  return path;
}
