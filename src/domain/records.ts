/** Columns every mirrored record carries for sync bookkeeping. */
export interface SyncedRecord {
  readonly id: string;
  readonly external_id: string;
  /** Modification time of the last snapshot applied; null for placeholders. */
  readonly external_last_modified: Date | null;
  /** Set by local edits / outbound sync; consulted in `source-and-local` mode. */
  readonly local_modified_at: Date | null;
  readonly last_synced_at: Date;
  /** Tombstone marker under the soft-delete policy. */
  readonly deleted_at: Date | null;
}

export interface ProjectRecord extends SyncedRecord {
  readonly key: string | null;
  readonly name: string | null;
  readonly is_placeholder: boolean;
}

export interface IssueRecord extends SyncedRecord {
  /** Local id of the owning project. */
  readonly project_id: string;
  readonly key: string | null;
  readonly summary: string | null;
  readonly status: string | null;
}

/**
 * Attribute sets written from a snapshot. Optional attributes that are
 * absent keep their stored value on merge.
 */
export interface ProjectFields {
  readonly key?: string;
  readonly name?: string;
  readonly is_placeholder: boolean;
}

export interface IssueFields {
  readonly key?: string;
  readonly summary?: string;
  readonly status?: string;
  readonly project_id: string;
}

/** Sync columns stamped on every write. */
export interface SyncStamp {
  readonly external_last_modified: Date | null;
  readonly last_synced_at: Date;
}
