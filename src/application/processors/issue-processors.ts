import type {
  ExternalEntityRef,
  IssueFields,
  ProjectRecord,
  SyncTransaction,
  WebhookEnvelope,
} from '../../domain/index.js';
import { resolve } from '../reconciler.js';
import type { ReconcileOptions } from '../reconciler.js';
import { issueSnapshotSchema, modifiedAtOf, parseSnapshot } from './snapshot-schema.js';
import type { IssueSnapshot } from './snapshot-schema.js';
import type { Processor, ProcessorContext, ProcessResult } from './types.js';

function issueRef(externalId: string): ExternalEntityRef {
  return { kind: 'issue', externalId };
}

/**
 * Resolves the live local project the issue points at. An unseen
 * project becomes a placeholder and a tombstoned one comes back as a
 * placeholder; either way it has no newer modification time than it
 * had, so the next genuine project event merges into it.
 */
function ensureParentProject(
  tx: SyncTransaction,
  project: IssueSnapshot['project'],
  options: ReconcileOptions,
): Promise<{ record: ProjectRecord; created: boolean }> {
  return tx.projects.ensurePlaceholder(
    project.id,
    {
      ...(project.key !== undefined ? { key: project.key } : {}),
      ...(project.name !== undefined ? { name: project.name } : {}),
    },
    options.now(),
  );
}

/**
 * Issue Created/Updated. Locks only the issue ref, so issues of one
 * project do not wait on each other. The parent is resolved only once
 * the staleness guard lets the write through, so a stale event never
 * creates a placeholder.
 */
function createIssueUpsertProcessor(operation: 'created' | 'updated'): Processor {
  return {
    eventName: `issue_${operation}`,
    kind: 'issue',
    operation,

    async process(envelope: WebhookEnvelope, context: ProcessorContext): Promise<ProcessResult> {
      const snapshot = parseSnapshot(issueSnapshotSchema, envelope);
      const ref = issueRef(snapshot.id);
      const parentRef: ExternalEntityRef = { kind: 'project', externalId: snapshot.project.id };

      const parent = { created: false };

      const result = await context.store.transaction([ref], (tx) =>
        resolve(tx.issues, ref, {
          operation: 'upsert',
          modifiedAt: modifiedAtOf(snapshot, envelope),
          buildFields: async (): Promise<IssueFields> => {
            const project = await ensureParentProject(tx, snapshot.project, context.options);
            parent.created = project.created;
            return {
              project_id: project.record.id,
              summary: snapshot.summary,
              ...(snapshot.key !== undefined ? { key: snapshot.key } : {}),
              ...(snapshot.status !== undefined ? { status: snapshot.status } : {}),
            };
          },
        }, context.options),
      );

      if (parent.created) {
        context.log.info(
          { eventType: envelope.eventType, externalId: ref.externalId, projectExternalId: parentRef.externalId },
          'Created placeholder project for missing parent',
        );
        return { ref, outcome: result.outcome, placeholderProject: parentRef };
      }

      return { ref, outcome: result.outcome };
    },
  };
}

export function createIssueCreatedProcessor(): Processor {
  return createIssueUpsertProcessor('created');
}

export function createIssueUpdatedProcessor(): Processor {
  return createIssueUpsertProcessor('updated');
}

/** Removes or tombstones the issue; an unknown id is a successful no-op. */
export function createIssueDeletedProcessor(): Processor {
  return {
    eventName: 'issue_deleted',
    kind: 'issue',
    operation: 'deleted',

    async process(envelope: WebhookEnvelope, context: ProcessorContext): Promise<ProcessResult> {
      const ref = issueRef(envelope.entityPayload.id);

      const result = await context.store.transaction([ref], (tx) =>
        resolve(tx.issues, ref, { operation: 'delete', occurredAt: envelope.timestamp }, context.options),
      );

      return { ref, outcome: result.outcome };
    },
  };
}
