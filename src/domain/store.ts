import type { ExternalEntityRef } from './envelope.js';
import type {
  IssueFields,
  IssueRecord,
  ProjectFields,
  ProjectRecord,
  SyncedRecord,
  SyncStamp,
} from './records.js';

/**
 * Per-kind record access inside a unit of work.
 *
 * Lookups include soft-deleted tombstones; callers decide what a
 * tombstone means.
 */
export interface RecordRepository<R extends SyncedRecord, F> {
  findByExternalId(externalId: string): Promise<R | undefined>;
  insert(externalId: string, fields: F, stamp: SyncStamp): Promise<R>;
  update(record: R): Promise<R>;
  /** Hard delete. Returns false if no row matched. */
  delete(externalId: string): Promise<boolean>;
}

/** Project attributes an issue snapshot may carry about its parent. */
export type PlaceholderFields = Omit<ProjectFields, 'is_placeholder'>;

export interface ProjectRepository extends RecordRepository<ProjectRecord, ProjectFields> {
  /**
   * Returns the live project for `externalId`. When there is none, inserts
   * a placeholder, or brings a tombstone back as one, and reports
   * `created`. Callers need not hold the project's ref: the write is
   * serialized against other writers of that project by the store.
   */
  ensurePlaceholder(
    externalId: string,
    fields: PlaceholderFields,
    now: Date,
  ): Promise<{ record: ProjectRecord; created: boolean }>;
}

export interface IssueRepository extends RecordRepository<IssueRecord, IssueFields> {
  /**
   * Tombstones every live issue of a local project. `external_last_modified`
   * moves up to `occurredAt` so older issue snapshots stay stale.
   * Returns the number of issues tombstoned.
   */
  tombstoneByProject(projectId: string, occurredAt: Date, now: Date): Promise<number>;
}

export interface SyncTransaction {
  readonly projects: ProjectRepository;
  readonly issues: IssueRepository;
}

/**
 * Persistent store port.
 *
 * `transaction` serializes units that share a ref and rolls back every
 * write of a unit whose `work` rejects. Units on disjoint refs never
 * wait on each other.
 */
export interface SyncStore {
  transaction<T>(
    refs: readonly ExternalEntityRef[],
    work: (tx: SyncTransaction) => Promise<T>,
  ): Promise<T>;
  findProject(externalId: string): Promise<ProjectRecord | undefined>;
  findIssue(externalId: string): Promise<IssueRecord | undefined>;
  /** Reachability check for health endpoints. */
  ping(): Promise<void>;
}
