export { HttpCrmWatchClient, CrmApiError } from './crm-watch-client.js';
export type { CrmWatchClientConfig } from './crm-watch-client.js';
