import type { SyncedRecord } from './records.js';

/** Exactly one of these happens per reconciled ref. */
export type UpsertOutcomeKind = 'inserted' | 'merged' | 'noop_stale' | 'deleted' | 'noop_absent';

export type UpsertOutcome<R extends SyncedRecord> =
  | { readonly outcome: 'inserted'; readonly record: R }
  | { readonly outcome: 'merged'; readonly record: R; readonly previous: R }
  | { readonly outcome: 'noop_stale'; readonly record: R }
  | { readonly outcome: 'deleted'; readonly record: R }
  | { readonly outcome: 'noop_absent' };

/** Response handed back to the endpoint adapter. */
export interface WebhookResponse {
  readonly status: 'Accepted' | 'Rejected';
  readonly reason?: string;
  readonly eventType?: string;
  readonly externalId?: string;
  readonly outcome?: UpsertOutcomeKind;
}
