import type {
  ExternalEntityRef,
  RecordRepository,
  SyncedRecord,
  UpsertOutcome,
} from '../domain/index.js';

export type DeletePolicy = 'soft' | 'hard';
export type StalenessMode = 'source' | 'source-and-local';

export interface ReconcileOptions {
  readonly deletePolicy: DeletePolicy;
  readonly stalenessMode: StalenessMode;
  /** Clock for `last_synced_at` / `deleted_at`. */
  readonly now: () => Date;
}

/**
 * Upsert request. `buildFields` runs only when a write will actually
 * happen, so callers can defer side work (such as creating a parent
 * placeholder) until the staleness guard has passed. Optional keys the
 * built fields leave out keep their stored value on merge.
 */
export interface UpsertRequest<F> {
  readonly operation: 'upsert';
  readonly modifiedAt: Date;
  readonly buildFields: () => Promise<F>;
}

export interface DeleteRequest {
  readonly operation: 'delete';
  readonly occurredAt: Date;
}

export type ReconcileRequest<F> = UpsertRequest<F> | DeleteRequest;

/**
 * Staleness guard: an incoming snapshot older than what is stored must
 * not overwrite it. Equal times pass so redelivery stays idempotent.
 */
export function isStale(
  existing: SyncedRecord,
  modifiedAt: Date,
  mode: StalenessMode,
): boolean {
  const incoming = modifiedAt.getTime();

  if (existing.external_last_modified !== null
    && incoming < existing.external_last_modified.getTime()) {
    return true;
  }

  if (mode === 'source-and-local'
    && existing.local_modified_at !== null
    && incoming < existing.local_modified_at.getTime()) {
    return true;
  }

  return false;
}

function laterOf(a: Date | null, b: Date): Date {
  return a !== null && a.getTime() > b.getTime() ? a : b;
}

async function resolveUpsert<R extends SyncedRecord, F extends object>(
  repo: RecordRepository<R, F>,
  ref: ExternalEntityRef,
  request: UpsertRequest<F>,
  options: ReconcileOptions,
): Promise<UpsertOutcome<R>> {
  const existing = await repo.findByExternalId(ref.externalId);

  if (existing === undefined) {
    const fields = await request.buildFields();
    const record = await repo.insert(ref.externalId, fields, {
      external_last_modified: request.modifiedAt,
      last_synced_at: options.now(),
    });
    return { outcome: 'inserted', record };
  }

  if (isStale(existing, request.modifiedAt, options.stalenessMode)) {
    return { outcome: 'noop_stale', record: existing };
  }

  const fields = await request.buildFields();
  const merged: R = {
    ...existing,
    ...fields,
    external_last_modified: request.modifiedAt,
    last_synced_at: options.now(),
    deleted_at: null,
  };
  const record = await repo.update(merged);

  // A newer snapshot over a tombstone brings the entity back.
  if (existing.deleted_at !== null) {
    return { outcome: 'inserted', record };
  }

  return { outcome: 'merged', record, previous: existing };
}

async function resolveDelete<R extends SyncedRecord, F>(
  repo: RecordRepository<R, F>,
  ref: ExternalEntityRef,
  request: DeleteRequest,
  options: ReconcileOptions,
): Promise<UpsertOutcome<R>> {
  const existing = await repo.findByExternalId(ref.externalId);

  if (existing === undefined || existing.deleted_at !== null) {
    return { outcome: 'noop_absent' };
  }

  if (options.deletePolicy === 'hard') {
    const removed = await repo.delete(ref.externalId);
    return removed ? { outcome: 'deleted', record: existing } : { outcome: 'noop_absent' };
  }

  const tombstone: R = {
    ...existing,
    external_last_modified: laterOf(existing.external_last_modified, request.occurredAt),
    last_synced_at: options.now(),
    deleted_at: options.now(),
  };
  const record = await repo.update(tombstone);
  return { outcome: 'deleted', record };
}

/**
 * Reconciles one incoming change against the local record for `ref`.
 *
 * Reads by external id, applies the staleness guard, then performs at
 * most one write. Must run inside `SyncStore.transaction` holding the
 * lock for `ref`.
 */
export async function resolve<R extends SyncedRecord, F extends object>(
  repo: RecordRepository<R, F>,
  ref: ExternalEntityRef,
  request: ReconcileRequest<F>,
  options: ReconcileOptions,
): Promise<UpsertOutcome<R>> {
  if (request.operation === 'delete') {
    return resolveDelete(repo, ref, request, options);
  }
  return resolveUpsert(repo, ref, request, options);
}
