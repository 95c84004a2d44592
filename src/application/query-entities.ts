import type { IssueRecord, ProjectRecord, SyncStore } from '../domain/index.js';

/**
 * Use case: fetch a mirrored project by external id.
 * Returns null if absent or tombstoned.
 */
export async function getProject(store: SyncStore, externalId: string): Promise<ProjectRecord | null> {
  const record = await store.findProject(externalId);
  if (record === undefined || record.deleted_at !== null) return null;
  return record;
}

/**
 * Use case: fetch a mirrored issue by external id.
 * Returns null if absent or tombstoned.
 */
export async function getIssue(store: SyncStore, externalId: string): Promise<IssueRecord | null> {
  const record = await store.findIssue(externalId);
  if (record === undefined || record.deleted_at !== null) return null;
  return record;
}
