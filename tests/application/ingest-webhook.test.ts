import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ingestWebhook } from '../../src/application/ingest-webhook.js';
import type { IngestDeps } from '../../src/application/ingest-webhook.js';
import { ProcessorRegistry } from '../../src/application/processor-registry.js';
import { PersistenceConflictError } from '../../src/domain/index.js';
import type { SyncStore } from '../../src/domain/index.js';
import { MemorySyncStore } from '../../src/infrastructure/memory/index.js';
import { fakeLogger, reconcileOptions } from '../helpers.js';

let store: MemorySyncStore;
let deps: IngestDeps;

function post(body: unknown) {
  return ingestWebhook(deps, { body: JSON.stringify(body), contentType: 'application/json' });
}

function projectEvent(eventType: string, timestamp: string, entityPayload: Record<string, unknown>) {
  return { eventType: `jira:${eventType}`, timestamp, entityPayload };
}

beforeEach(() => {
  store = new MemorySyncStore();
  deps = {
    store,
    registry: ProcessorRegistry.withDefaults(),
    log: fakeLogger(),
    unsupportedEventPolicy: 'reject',
    reconcile: reconcileOptions(),
  };
});

// ─── End-to-end ──────────────────────────────────────────────

describe('ingestWebhook end-to-end', () => {
  it('creates, renames, then ignores a replay of the older event', async () => {
    const created = projectEvent('project_created', '2025-01-01T00:00:00Z', { id: 'PRJ-1', name: 'Alpha' });
    const updated = projectEvent('project_updated', '2025-01-02T00:00:00Z', { id: 'PRJ-1', name: 'Alpha Renamed' });

    expect(await post(created)).toEqual({
      status: 'Accepted',
      eventType: 'jira:project_created',
      externalId: 'PRJ-1',
      outcome: 'inserted',
    });
    expect(store.snapshot().projects).toHaveLength(1);
    expect((await store.findProject('PRJ-1'))?.name).toBe('Alpha');

    expect((await post(updated)).outcome).toBe('merged');
    expect((await store.findProject('PRJ-1'))?.name).toBe('Alpha Renamed');

    const replay = await post(created);
    expect(replay).toEqual({
      status: 'Accepted',
      eventType: 'jira:project_created',
      externalId: 'PRJ-1',
      outcome: 'noop_stale',
    });
    expect((await store.findProject('PRJ-1'))?.name).toBe('Alpha Renamed');
    expect(store.snapshot().projects).toHaveLength(1);
    expect(deps.log.info).toHaveBeenCalledWith(
      { eventType: 'jira:project_created', externalId: 'PRJ-1', outcome: 'noop_stale' },
      'Stale event ignored',
    );
  });

  it('yields one record when the same created event arrives twice', async () => {
    const created = projectEvent('project_created', '2025-01-01T00:00:00Z', { id: 'PRJ-1', name: 'Alpha' });

    await post(created);
    await post(created);

    expect(store.snapshot().projects).toHaveLength(1);
  });

  describe('out-of-order updates', () => {
    const events = {
      t1: projectEvent('project_updated', '2025-01-01T00:00:00Z', { id: 'PRJ-1', name: 'First' }),
      t2: projectEvent('project_updated', '2025-01-02T00:00:00Z', { id: 'PRJ-1', name: 'Second' }),
    };

    async function expectConverged(): Promise<void> {
      const stored = await store.findProject('PRJ-1');
      expect(stored?.name).toBe('Second');
      expect(stored?.external_last_modified).toEqual(new Date('2025-01-02T00:00:00Z'));
    }

    it('converges on the later snapshot in delivery order', async () => {
      await post(events.t1);
      await post(events.t2);
      await expectConverged();
    });

    it('converges on the later snapshot in reverse order', async () => {
      await post(events.t2);
      await post(events.t1);
      await expectConverged();
    });
  });

  it('accepts a delete for an absent entity and again after deleting', async () => {
    const deleted = projectEvent('project_deleted', '2025-01-03T00:00:00Z', { id: 'PRJ-1' });

    expect((await post(deleted)).outcome).toBe('noop_absent');

    await post(projectEvent('project_created', '2025-01-01T00:00:00Z', { id: 'PRJ-1', name: 'Alpha' }));
    const first = await post(deleted);
    const tombstone = await store.findProject('PRJ-1');
    const second = await post(deleted);

    expect(first.outcome).toBe('deleted');
    expect(second).toEqual({ status: 'Accepted', eventType: 'jira:project_deleted', externalId: 'PRJ-1', outcome: 'noop_absent' });
    expect(await store.findProject('PRJ-1')).toEqual(tombstone);
  });

  it('auto-links an orphan issue and enriches the placeholder later', async () => {
    await post({
      eventType: 'jira:issue_created',
      timestamp: '2025-01-01T00:00:00Z',
      entityPayload: { id: 'ISS-1', summary: 'Orphan', project: { id: 'P-999' } },
    });
    await post(projectEvent('project_created', '2025-01-02T00:00:00Z', { id: 'P-999', name: 'Recovered' }));

    const { projects, issues } = store.snapshot();
    expect(projects).toHaveLength(1);
    expect(projects[0]?.name).toBe('Recovered');
    expect(projects[0]?.is_placeholder).toBe(false);
    expect(issues[0]?.project_id).toBe(projects[0]?.id);
  });
});

// ─── Failure handling ────────────────────────────────────────

describe('ingestWebhook failures', () => {
  it('rejects an unknown event type without touching the store', async () => {
    const spyStore: SyncStore = {
      transaction: vi.fn(),
      findProject: vi.fn(),
      findIssue: vi.fn(),
      ping: vi.fn(),
    };
    deps = { ...deps, store: spyStore };

    const response = await post({
      eventType: 'jira:widget_frobnicated',
      timestamp: '2025-01-01T00:00:00Z',
      entityPayload: { id: 'W-1' },
    });

    expect(response).toEqual({
      status: 'Rejected',
      reason: 'Unsupported event type "jira:widget_frobnicated"',
      eventType: 'jira:widget_frobnicated',
      externalId: 'W-1',
    });
    expect(spyStore.transaction).not.toHaveBeenCalled();
    expect(deps.log.warn).toHaveBeenCalledWith(
      { eventType: 'jira:widget_frobnicated', externalId: 'W-1', policy: 'reject' },
      'Unsupported event type',
    );
  });

  it('accepts and ignores an unknown event type under the ignore policy', async () => {
    deps = { ...deps, unsupportedEventPolicy: 'ignore' };

    const response = await post({
      eventType: 'jira:widget_frobnicated',
      timestamp: '2025-01-01T00:00:00Z',
      entityPayload: { id: 'W-1' },
    });

    expect(response).toEqual({
      status: 'Accepted',
      reason: 'ignored unsupported event type jira:widget_frobnicated',
      eventType: 'jira:widget_frobnicated',
      externalId: 'W-1',
    });
    expect(deps.log.warn).toHaveBeenCalledTimes(1);
  });

  it('rejects a malformed body', async () => {
    const response = await ingestWebhook(deps, { body: 'not json', contentType: 'application/json' });

    expect(response).toEqual({ status: 'Rejected', reason: 'Body is not valid JSON' });
    expect(deps.log.warn).toHaveBeenCalledTimes(1);
  });

  it('rejects a payload failing operation validation', async () => {
    const response = await post(projectEvent('project_created', '2025-01-01T00:00:00Z', { id: 'PRJ-1' }));

    expect(response.status).toBe('Rejected');
    expect(response.reason).toMatch(/^Invalid payload for "jira:project_created": name: /);
    expect(store.snapshot().projects).toHaveLength(0);
  });

  it('propagates persistence conflicts after logging them', async () => {
    const conflict = new PersistenceConflictError('Store conflict (23505): duplicate key');
    const failingStore: SyncStore = {
      transaction: vi.fn().mockRejectedValue(conflict),
      findProject: vi.fn(),
      findIssue: vi.fn(),
      ping: vi.fn(),
    };
    deps = { ...deps, store: failingStore };

    await expect(
      post(projectEvent('project_created', '2025-01-01T00:00:00Z', { id: 'PRJ-1', name: 'Alpha' })),
    ).rejects.toBe(conflict);
    expect(deps.log.error).toHaveBeenCalledWith(
      { err: conflict, eventType: 'jira:project_created', externalId: 'PRJ-1' },
      'Failed to apply webhook',
    );
  });
});
