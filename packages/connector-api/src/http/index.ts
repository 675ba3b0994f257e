export { ApiClient, recordsAt } from './api-client.js';
export type { ApiClientConfig } from './api-client.js';
