import type { CrmModule, RecordData, WebhookEvent } from './webhook-event.js';

/**
 * Account fields whose change always forces a refresh of the
 * downstream account representation.
 */
export const CRITICAL_ACCOUNT_FIELDS: ReadonlySet<string> = new Set([
  'Account_Status',
  'Health_Score',
  'Owner',
  'Annual_Revenue',
  'Account_Type',
  'Industry',
]);

/**
 * What the Sync Target should be told to do for one event.
 *
 * Routing is pure: it inspects the event and never performs I/O,
 * so every (module, event_type) pair maps to exactly one action.
 */
export type SyncAction =
  | { readonly kind: 'sync-account'; readonly account_id: string; readonly force: boolean }
  | { readonly kind: 'skip'; readonly reason: string }
  | { readonly kind: 'ignore-delete' };

/** Reads `record[field].id`, optionally requiring `record[field].module`. */
function referencedId(
  record: RecordData,
  field: string,
  requiredModule?: CrmModule,
): string | null {
  const ref = record[field];
  if (typeof ref !== 'object' || ref === null || Array.isArray(ref)) return null;

  if (requiredModule !== undefined) {
    const refModule = 'module' in ref ? ref.module : undefined;
    if (refModule !== requiredModule) return null;
  }

  const id = 'id' in ref ? ref.id : undefined;
  if (typeof id === 'string' && id !== '') return id;
  if (typeof id === 'number') return String(id);
  return null;
}

/**
 * Resolves the owning account of a non-account record.
 *
 * Contacts and Deals point at the account through `Account_Name`.
 * Activities and Tasks use the polymorphic `What_Id`, and Notes use
 * `Parent_Id`; both only count when they reference the Accounts module.
 */
export function resolveOwningAccountId(module: CrmModule, record: RecordData): string | null {
  switch (module) {
    case 'Accounts':
      return null;
    case 'Contacts':
    case 'Deals':
      return referencedId(record, 'Account_Name');
    case 'Activities':
    case 'Tasks':
      return referencedId(record, 'What_Id', 'Accounts');
    case 'Notes':
      return referencedId(record, 'Parent_Id', 'Accounts');
  }
}

export function hasCriticalChanges(modifiedFields: readonly string[]): boolean {
  return modifiedFields.some((field) => CRITICAL_ACCOUNT_FIELDS.has(field));
}

export function resolveSyncAction(event: WebhookEvent): SyncAction {
  if (event.event_type === 'delete') {
    return { kind: 'ignore-delete' };
  }

  if (event.module === 'Accounts') {
    if (event.record_id === '') {
      return { kind: 'skip', reason: 'account event without record_id' };
    }
    const force = event.event_type === 'update'
      ? hasCriticalChanges(event.modified_fields)
      : true;
    return { kind: 'sync-account', account_id: event.record_id, force };
  }

  const accountId = resolveOwningAccountId(event.module, event.record_data);
  if (accountId === null) {
    return { kind: 'skip', reason: `no owning account on ${event.module} record` };
  }
  return { kind: 'sync-account', account_id: accountId, force: true };
}
