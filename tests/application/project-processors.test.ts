import { describe, it, expect, beforeEach } from 'vitest';
import {
  createProjectCreatedProcessor,
  createProjectDeletedProcessor,
  createProjectUpdatedProcessor,
} from '../../src/application/processors/index.js';
import type { ProcessorContext } from '../../src/application/processors/index.js';
import { ValidationError } from '../../src/domain/index.js';
import { MemorySyncStore } from '../../src/infrastructure/memory/index.js';
import { FIXED_NOW, fakeLogger, makeEnvelope, reconcileOptions } from '../helpers.js';

let store: MemorySyncStore;
let context: ProcessorContext;

beforeEach(() => {
  store = new MemorySyncStore();
  context = { store, log: fakeLogger(), options: reconcileOptions() };
});

describe('project_created', () => {
  const processor = createProjectCreatedProcessor();

  it('inserts a new project', async () => {
    const result = await processor.process(
      makeEnvelope('jira:project_created', { id: 'PRJ-1', key: 'ALPHA', name: 'Alpha' }),
      context,
    );

    expect(result).toEqual({ ref: { kind: 'project', externalId: 'PRJ-1' }, outcome: 'inserted' });
    const stored = await store.findProject('PRJ-1');
    expect(stored?.name).toBe('Alpha');
    expect(stored?.key).toBe('ALPHA');
    expect(stored?.is_placeholder).toBe(false);
  });

  it('treats a duplicate delivery as a merge', async () => {
    const envelope = makeEnvelope('jira:project_created', { id: 'PRJ-1', name: 'Alpha' });

    await processor.process(envelope, context);
    const second = await processor.process(envelope, context);

    expect(second.outcome).toBe('merged');
    expect(store.snapshot().projects).toHaveLength(1);
  });

  it('prefers the payload lastModified over the envelope timestamp', async () => {
    await processor.process(
      makeEnvelope('jira:project_created', {
        id: 'PRJ-1',
        name: 'Alpha',
        lastModified: '2025-01-05T00:00:00Z',
      }),
      context,
    );

    expect((await store.findProject('PRJ-1'))?.external_last_modified)
      .toEqual(new Date('2025-01-05T00:00:00Z'));
  });

  it('rejects a payload without a name', async () => {
    const envelope = makeEnvelope('jira:project_created', { id: 'PRJ-1', key: 'ALPHA' });

    await expect(processor.process(envelope, context)).rejects.toBeInstanceOf(ValidationError);
    expect(store.snapshot().projects).toHaveLength(0);
  });
});

describe('project_updated', () => {
  const processor = createProjectUpdatedProcessor();

  it('auto-creates an unseen project', async () => {
    const result = await processor.process(
      makeEnvelope('jira:project_updated', { id: 'PRJ-7', name: 'Seventh' }),
      context,
    );

    expect(result.outcome).toBe('inserted');
    expect((await store.findProject('PRJ-7'))?.name).toBe('Seventh');
  });

  it('ignores a stale snapshot', async () => {
    await processor.process(
      makeEnvelope('jira:project_updated', { id: 'PRJ-1', name: 'Newer' }, '2025-01-02T00:00:00Z'),
      context,
    );
    const result = await processor.process(
      makeEnvelope('jira:project_updated', { id: 'PRJ-1', name: 'Older' }, '2025-01-01T00:00:00Z'),
      context,
    );

    expect(result.outcome).toBe('noop_stale');
    expect((await store.findProject('PRJ-1'))?.name).toBe('Newer');
  });
});

describe('project_deleted', () => {
  const processor = createProjectDeletedProcessor();

  it('succeeds as a no-op for an unknown project', async () => {
    const result = await processor.process(makeEnvelope('jira:project_deleted', { id: 'PRJ-404' }), context);

    expect(result).toEqual({ ref: { kind: 'project', externalId: 'PRJ-404' }, outcome: 'noop_absent' });
  });

  it('needs nothing but the id', async () => {
    await createProjectCreatedProcessor().process(
      makeEnvelope('jira:project_created', { id: 'PRJ-1', name: 'Alpha' }),
      context,
    );

    const result = await processor.process(
      makeEnvelope('jira:project_deleted', { id: 'PRJ-1' }, '2025-01-02T00:00:00Z'),
      context,
    );

    expect(result.outcome).toBe('deleted');
  });

  it('tombstones the project\'s issues under the soft policy', async () => {
    await createProjectCreatedProcessor().process(
      makeEnvelope('jira:project_created', { id: 'PRJ-1', name: 'Alpha' }),
      context,
    );
    const project = await store.findProject('PRJ-1');
    await store.transaction([{ kind: 'issue', externalId: 'ISS-1' }], (tx) =>
      tx.issues.insert('ISS-1', { project_id: project?.id ?? '', summary: 'Child' }, {
        external_last_modified: new Date('2025-01-01T00:00:00Z'),
        last_synced_at: new Date('2025-01-01T00:00:00Z'),
      }),
    );

    await processor.process(
      makeEnvelope('jira:project_deleted', { id: 'PRJ-1' }, '2025-01-03T00:00:00Z'),
      context,
    );

    const issue = await store.findIssue('ISS-1');
    expect(issue?.deleted_at).toEqual(FIXED_NOW);
    expect(issue?.external_last_modified).toEqual(new Date('2025-01-03T00:00:00Z'));
    expect(context.log.info).toHaveBeenCalledWith(
      { eventType: 'jira:project_deleted', externalId: 'PRJ-1', issues: 1 },
      'Tombstoned issues of deleted project',
    );
  });

  it('cascades to issues under the hard policy', async () => {
    const hard: ProcessorContext = { ...context, options: reconcileOptions({ deletePolicy: 'hard' }) };
    await createProjectCreatedProcessor().process(
      makeEnvelope('jira:project_created', { id: 'PRJ-1', name: 'Alpha' }),
      hard,
    );
    const project = await store.findProject('PRJ-1');
    await store.transaction([{ kind: 'issue', externalId: 'ISS-1' }], (tx) =>
      tx.issues.insert('ISS-1', { project_id: project?.id ?? '', summary: 'Child' }, {
        external_last_modified: new Date('2025-01-01T00:00:00Z'),
        last_synced_at: new Date('2025-01-01T00:00:00Z'),
      }),
    );

    await processor.process(makeEnvelope('jira:project_deleted', { id: 'PRJ-1' }), hard);

    expect(store.snapshot()).toEqual({ projects: [], issues: [] });
  });
});
