/**
 * @testsync/connector-azure
 *
 * Azure DevOps implementation of the test point store
 */

import { AzureTestPointStore, type AzureTestPointStoreConfig } from './azure/store.js';

export { AzureDevOpsClient } from './azure/client.js';
export type { AzureDevOpsClientConfig } from './azure/client.js';
export { AzureTestPointStore, toTestCaseDetails } from './azure/store.js';
export type { AzureTestPointStoreConfig } from './azure/store.js';
export { parseTestSteps, htmlToText } from './azure/steps.js';
export {
  withRetries,
  isRetryableRemoteError,
  computeBackoffDelayMs,
  resolveRetryConfig,
} from './retry.js';
export type { RetryConfig, RetryHooks } from './retry.js';

/**
 * Factory function to create an Azure DevOps test point store
 */
export function createAzureTestPointStore(config: AzureTestPointStoreConfig): AzureTestPointStore {
  return new AzureTestPointStore(config);
}
