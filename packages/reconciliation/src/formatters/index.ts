export {
  formatTestPointListing,
  formatTestPointsCsv,
  formatTestPointsJson,
  toTestPointRows,
  CSV_HEADER,
} from './listing-formatter.js';
export type { ListingFormatOptions } from './listing-formatter.js';
export { formatReconciliationSummary } from './reconciliation-formatter.js';
export { formatCriteriaUpdateSummary, describeCriteria } from './criteria-formatter.js';
export { RULE, formatTimestamp, formatCompactTimestamp } from './utils.js';
