export { flattenResults, countResults } from './results.js';
export { silentLogger } from './silent-logger.js';
