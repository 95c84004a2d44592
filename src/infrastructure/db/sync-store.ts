import { and, eq, isNotNull, isNull, sql } from 'drizzle-orm';
import { PersistenceConflictError, refKey } from '../../domain/index.js';
import type {
  ExternalEntityRef,
  IssueFields,
  IssueRecord,
  IssueRepository,
  PlaceholderFields,
  ProjectFields,
  ProjectRecord,
  ProjectRepository,
  SyncStamp,
  SyncStore,
  SyncTransaction,
} from '../../domain/index.js';
import type { Database, DbTransaction } from './client.js';
import { toPersistenceError } from './pg-errors.js';
import { issues, projects } from './schema.js';

/** Row shapes returned by the mirror tables. */
export type ProjectRow = typeof projects.$inferSelect;
export type IssueRow = typeof issues.$inferSelect;

function firstRow<T>(rows: T[], what: string): T {
  const [row] = rows;
  if (row === undefined) {
    throw new PersistenceConflictError(`${what} affected no rows`);
  }
  return row;
}

class DrizzleProjectRepository implements ProjectRepository {
  constructor(private readonly tx: DbTransaction) {}

  async findByExternalId(externalId: string): Promise<ProjectRecord | undefined> {
    const rows = await this.tx.select().from(projects).where(eq(projects.external_id, externalId)).limit(1);
    return rows[0];
  }

  async insert(externalId: string, fields: ProjectFields, stamp: SyncStamp): Promise<ProjectRecord> {
    const rows = await this.tx.insert(projects).values({
      external_id: externalId,
      key: fields.key ?? null,
      name: fields.name ?? null,
      is_placeholder: fields.is_placeholder,
      external_last_modified: stamp.external_last_modified,
      last_synced_at: stamp.last_synced_at,
    }).returning();
    return firstRow(rows, `Insert of project "${externalId}"`);
  }

  async update(record: ProjectRecord): Promise<ProjectRecord> {
    const rows = await this.tx.update(projects).set({
      key: record.key,
      name: record.name,
      is_placeholder: record.is_placeholder,
      external_last_modified: record.external_last_modified,
      local_modified_at: record.local_modified_at,
      last_synced_at: record.last_synced_at,
      deleted_at: record.deleted_at,
    }).where(eq(projects.id, record.id)).returning();
    return firstRow(rows, `Update of project "${record.external_id}"`);
  }

  async delete(externalId: string): Promise<boolean> {
    const rows = await this.tx.delete(projects)
      .where(eq(projects.external_id, externalId))
      .returning({ id: projects.id });
    return rows.length > 0;
  }

  /**
   * Insert-if-absent, then revive-if-tombstoned, then read. Row locks
   * taken by the insert and update order this against other writers of
   * the project without its advisory lock.
   */
  async ensurePlaceholder(
    externalId: string,
    fields: PlaceholderFields,
    now: Date,
  ): Promise<{ record: ProjectRecord; created: boolean }> {
    const [inserted] = await this.tx.insert(projects).values({
      external_id: externalId,
      key: fields.key ?? null,
      name: fields.name ?? null,
      is_placeholder: true,
      external_last_modified: null,
      last_synced_at: now,
    }).onConflictDoNothing({ target: projects.external_id }).returning();
    if (inserted !== undefined) return { record: inserted, created: true };

    const [revived] = await this.tx.update(projects)
      .set({ is_placeholder: true, deleted_at: null, last_synced_at: now })
      .where(and(eq(projects.external_id, externalId), isNotNull(projects.deleted_at)))
      .returning();
    if (revived !== undefined) return { record: revived, created: true };

    const existing = await this.findByExternalId(externalId);
    return { record: firstRow(existing === undefined ? [] : [existing], `Read of project "${externalId}"`), created: false };
  }
}

/**
 * Share-locks the issue's project until commit and refuses a tombstoned
 * one. A concurrent soft delete of the project then either waits for
 * this unit, and its issue cascade sees the issue, or has already
 * committed, and this unit fails as a retriable conflict.
 */
async function assertLiveProject(tx: DbTransaction, issue: IssueRecord): Promise<void> {
  if (issue.deleted_at !== null) return;

  const [project] = await tx.select({ deleted_at: projects.deleted_at })
    .from(projects)
    .where(eq(projects.id, issue.project_id))
    .for('share');
  if (project === undefined || project.deleted_at !== null) {
    throw new PersistenceConflictError(
      `Issue "${issue.external_id}" references deleted project ${issue.project_id}`,
    );
  }
}

class DrizzleIssueRepository implements IssueRepository {
  constructor(private readonly tx: DbTransaction) {}

  async findByExternalId(externalId: string): Promise<IssueRecord | undefined> {
    const rows = await this.tx.select().from(issues).where(eq(issues.external_id, externalId)).limit(1);
    return rows[0];
  }

  async insert(externalId: string, fields: IssueFields, stamp: SyncStamp): Promise<IssueRecord> {
    const rows = await this.tx.insert(issues).values({
      external_id: externalId,
      project_id: fields.project_id,
      key: fields.key ?? null,
      summary: fields.summary ?? null,
      status: fields.status ?? null,
      external_last_modified: stamp.external_last_modified,
      last_synced_at: stamp.last_synced_at,
    }).returning();
    const inserted = firstRow(rows, `Insert of issue "${externalId}"`);
    await assertLiveProject(this.tx, inserted);
    return inserted;
  }

  async update(record: IssueRecord): Promise<IssueRecord> {
    const rows = await this.tx.update(issues).set({
      project_id: record.project_id,
      key: record.key,
      summary: record.summary,
      status: record.status,
      external_last_modified: record.external_last_modified,
      local_modified_at: record.local_modified_at,
      last_synced_at: record.last_synced_at,
      deleted_at: record.deleted_at,
    }).where(eq(issues.id, record.id)).returning();
    const updated = firstRow(rows, `Update of issue "${record.external_id}"`);
    await assertLiveProject(this.tx, updated);
    return updated;
  }

  async delete(externalId: string): Promise<boolean> {
    const rows = await this.tx.delete(issues)
      .where(eq(issues.external_id, externalId))
      .returning({ id: issues.id });
    return rows.length > 0;
  }

  async tombstoneByProject(projectId: string, occurredAt: Date, now: Date): Promise<number> {
    const at = sql`${occurredAt.toISOString()}::timestamptz`;
    const rows = await this.tx.update(issues).set({
      external_last_modified: sql`GREATEST(COALESCE(${issues.external_last_modified}, ${at}), ${at})`,
      last_synced_at: now,
      deleted_at: now,
    }).where(and(eq(issues.project_id, projectId), isNull(issues.deleted_at)))
      .returning({ id: issues.id });
    return rows.length;
  }
}

/**
 * PostgreSQL `SyncStore`.
 *
 * One database transaction per unit of work. Before running `work` it
 * takes a transaction-scoped advisory lock per ref, in sorted key order;
 * advisory locks also cover refs that have no row yet, which row locks
 * cannot. Issue units lock only the issue ref; see `ensurePlaceholder`
 * and `assertLiveProject` for how they order against project writers.
 * Retriable driver errors surface as `PersistenceConflictError`.
 */
export class DrizzleSyncStore implements SyncStore {
  constructor(private readonly db: Database) {}

  async transaction<T>(
    refs: readonly ExternalEntityRef[],
    work: (tx: SyncTransaction) => Promise<T>,
  ): Promise<T> {
    const keys = [...new Set(refs.map(refKey))].sort();

    try {
      return await this.db.transaction(async (tx) => {
        for (const key of keys) {
          await tx.execute(sql`SELECT pg_advisory_xact_lock(hashtext(${key}))`);
        }
        return work({
          projects: new DrizzleProjectRepository(tx),
          issues: new DrizzleIssueRepository(tx),
        });
      });
    } catch (err: unknown) {
      throw toPersistenceError(err);
    }
  }

  async findProject(externalId: string): Promise<ProjectRecord | undefined> {
    const rows = await this.db.select().from(projects).where(eq(projects.external_id, externalId)).limit(1);
    return rows[0];
  }

  async findIssue(externalId: string): Promise<IssueRecord | undefined> {
    const rows = await this.db.select().from(issues).where(eq(issues.external_id, externalId)).limit(1);
    return rows[0];
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }
}
