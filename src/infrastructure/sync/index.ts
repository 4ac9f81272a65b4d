export { HttpSyncTarget, SyncTargetError } from './http-sync-target.js';
export type { HttpSyncTargetConfig } from './http-sync-target.js';
export { DebouncedSyncTarget } from './debounced-sync-target.js';
