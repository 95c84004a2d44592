import { randomUUID } from 'node:crypto';
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
  RecordRepository,
  SyncedRecord,
  SyncStamp,
  SyncStore,
  SyncTransaction,
} from '../../domain/index.js';
import { KeyedMutex } from './keyed-mutex.js';

type Journal = (() => void)[];

/** Runs `work` holding the mutex key, unless the current unit already holds it. */
type Exclusive = <T>(key: string, work: () => Promise<T>) => Promise<T>;

function laterOf(a: Date | null, b: Date): Date {
  return a !== null && a.getTime() > b.getTime() ? a : b;
}

interface TableHooks<R extends SyncedRecord, F> {
  build(id: string, externalId: string, fields: F, stamp: SyncStamp): R;
  /** Throws on a foreign-key violation. */
  check(record: R): void;
  /** Cascade hook run after a hard delete. */
  afterDelete(record: R, journal: Journal): void;
}

/**
 * One table keyed by external id. Every mutation pushes its inverse onto
 * the unit-of-work journal so a failed unit can be rolled back.
 */
class MemoryTable<R extends SyncedRecord, F> implements RecordRepository<R, F> {
  constructor(
    protected readonly rows: Map<string, R>,
    protected readonly hooks: TableHooks<R, F>,
    protected readonly journal: Journal,
    protected readonly newId: () => string,
  ) {}

  async findByExternalId(externalId: string): Promise<R | undefined> {
    const row = this.rows.get(externalId);
    return row === undefined ? undefined : { ...row };
  }

  async insert(externalId: string, fields: F, stamp: SyncStamp): Promise<R> {
    if (this.rows.has(externalId)) {
      throw new PersistenceConflictError(`Duplicate external id "${externalId}"`);
    }
    const record = this.hooks.build(this.newId(), externalId, fields, stamp);
    this.hooks.check(record);
    this.put(record);
    return { ...record };
  }

  async update(record: R): Promise<R> {
    const current = this.rows.get(record.external_id);
    if (current === undefined || current.id !== record.id) {
      throw new PersistenceConflictError(`No row for external id "${record.external_id}"`);
    }
    this.hooks.check(record);
    this.put({ ...record });
    return { ...record };
  }

  async delete(externalId: string): Promise<boolean> {
    const current = this.rows.get(externalId);
    if (current === undefined) return false;
    this.remove(current);
    this.hooks.afterDelete(current, this.journal);
    return true;
  }

  protected put(record: R): void {
    const previous = this.rows.get(record.external_id);
    this.rows.set(record.external_id, record);
    this.journal.push(() => {
      if (previous === undefined) {
        this.rows.delete(record.external_id);
      } else {
        this.rows.set(record.external_id, previous);
      }
    });
  }

  private remove(record: R): void {
    this.rows.delete(record.external_id);
    this.journal.push(() => {
      this.rows.set(record.external_id, record);
    });
  }
}

class MemoryProjectTable extends MemoryTable<ProjectRecord, ProjectFields> implements ProjectRepository {
  constructor(
    rows: Map<string, ProjectRecord>,
    hooks: TableHooks<ProjectRecord, ProjectFields>,
    journal: Journal,
    newId: () => string,
    private readonly exclusive: Exclusive,
    private readonly held: ReadonlySet<string>,
  ) {
    super(rows, hooks, journal, newId);
  }

  async ensurePlaceholder(
    externalId: string,
    fields: PlaceholderFields,
    now: Date,
  ): Promise<{ record: ProjectRecord; created: boolean }> {
    const key = refKey({ kind: 'project', externalId });

    return this.exclusive(key, async () => {
      const current = this.rows.get(externalId);
      if (current !== undefined && current.deleted_at === null) {
        return { record: { ...current }, created: false };
      }

      const record: ProjectRecord = current === undefined
        ? this.hooks.build(this.newId(), externalId, { ...fields, is_placeholder: true }, {
          external_last_modified: null,
          last_synced_at: now,
        })
        : { ...current, is_placeholder: true, deleted_at: null, last_synced_at: now };

      if (this.held.has(key)) {
        this.put(record);
      } else {
        // Other units may link issues to it before this one settles, so it
        // is committed at once rather than journaled.
        this.rows.set(externalId, record);
      }
      return { record: { ...record }, created: true };
    });
  }
}

class MemoryIssueTable extends MemoryTable<IssueRecord, IssueFields> implements IssueRepository {
  async tombstoneByProject(projectId: string, occurredAt: Date, now: Date): Promise<number> {
    let count = 0;
    for (const issue of [...this.rows.values()]) {
      if (issue.project_id !== projectId || issue.deleted_at !== null) continue;
      this.put({
        ...issue,
        external_last_modified: laterOf(issue.external_last_modified, occurredAt),
        last_synced_at: now,
        deleted_at: now,
      });
      count += 1;
    }
    return count;
  }
}

/**
 * In-process `SyncStore`.
 *
 * Mirrors the Postgres store's guarantees: per-ref serialization through
 * a keyed mutex, unique external ids, the issue → project foreign key
 * with cascade on hard delete, and all-or-nothing units of work. A live
 * issue may only be written against a live project.
 */
export class MemorySyncStore implements SyncStore {
  private readonly projects: Map<string, ProjectRecord> = new Map();
  private readonly issues: Map<string, IssueRecord> = new Map();
  private readonly mutex = new KeyedMutex();

  constructor(private readonly newId: () => string = randomUUID) {}

  async transaction<T>(
    refs: readonly ExternalEntityRef[],
    work: (tx: SyncTransaction) => Promise<T>,
  ): Promise<T> {
    const held: ReadonlySet<string> = new Set(refs.map(refKey));

    return this.mutex.runExclusive([...held], async () => {
      const journal: Journal = [];
      try {
        return await work(this.openTransaction(journal, held));
      } catch (err: unknown) {
        for (const undo of journal.reverse()) {
          undo();
        }
        throw err;
      }
    });
  }

  async findProject(externalId: string): Promise<ProjectRecord | undefined> {
    const row = this.projects.get(externalId);
    return row === undefined ? undefined : { ...row };
  }

  async findIssue(externalId: string): Promise<IssueRecord | undefined> {
    const row = this.issues.get(externalId);
    return row === undefined ? undefined : { ...row };
  }

  async ping(): Promise<void> {}

  /** Copies of every stored row, for tests. */
  snapshot(): { projects: ProjectRecord[]; issues: IssueRecord[] } {
    return {
      projects: [...this.projects.values()].map((row) => ({ ...row })),
      issues: [...this.issues.values()].map((row) => ({ ...row })),
    };
  }

  private openTransaction(journal: Journal, held: ReadonlySet<string>): SyncTransaction {
    const projectById = (id: string): ProjectRecord | undefined =>
      [...this.projects.values()].find((p) => p.id === id);

    const exclusive: Exclusive = (key, work) =>
      held.has(key) ? work() : this.mutex.runExclusive([key], work);

    const projects = new MemoryProjectTable(this.projects, {
      build: (id, externalId, fields, stamp) => ({
        id,
        external_id: externalId,
        key: fields.key ?? null,
        name: fields.name ?? null,
        is_placeholder: fields.is_placeholder,
        local_modified_at: null,
        deleted_at: null,
        ...stamp,
      }),
      check: () => {},
      afterDelete: (project, log) => {
        for (const issue of [...this.issues.values()]) {
          if (issue.project_id !== project.id) continue;
          this.issues.delete(issue.external_id);
          log.push(() => {
            this.issues.set(issue.external_id, issue);
          });
        }
      },
    }, journal, this.newId, exclusive, held);

    const issues = new MemoryIssueTable(this.issues, {
      build: (id, externalId, fields, stamp) => ({
        id,
        external_id: externalId,
        project_id: fields.project_id,
        key: fields.key ?? null,
        summary: fields.summary ?? null,
        status: fields.status ?? null,
        local_modified_at: null,
        deleted_at: null,
        ...stamp,
      }),
      check: (issue) => {
        const project = projectById(issue.project_id);
        if (project === undefined) {
          throw new PersistenceConflictError(
            `Issue "${issue.external_id}" references missing project ${issue.project_id}`,
          );
        }
        if (issue.deleted_at === null && project.deleted_at !== null) {
          throw new PersistenceConflictError(
            `Issue "${issue.external_id}" references deleted project ${issue.project_id}`,
          );
        }
      },
      afterDelete: () => {},
    }, journal, this.newId);

    return { projects, issues };
  }
}
