export * from './search/index.js';

export { fetchWithRetry, HttpStatusError, type FetchRetryConfig } from './retry.js';
