import type { ExternalEntityRef, ProjectFields } from '../../domain/index.js';
import { resolve } from '../reconciler.js';
import { modifiedAtOf, parseSnapshot, projectSnapshotSchema } from './snapshot-schema.js';
import type { Processor, ProcessorContext, ProcessResult } from './types.js';
import type { WebhookEnvelope } from '../../domain/index.js';

function projectRef(externalId: string): ExternalEntityRef {
  return { kind: 'project', externalId };
}

/**
 * Created and Updated share one path: an unseen id is inserted, a known
 * one is merged behind the staleness guard. A genuine project event
 * over a placeholder clears the placeholder flag.
 */
function createProjectUpsertProcessor(operation: 'created' | 'updated'): Processor {
  return {
    eventName: `project_${operation}`,
    kind: 'project',
    operation,

    async process(envelope: WebhookEnvelope, context: ProcessorContext): Promise<ProcessResult> {
      const snapshot = parseSnapshot(projectSnapshotSchema, envelope);
      const ref = projectRef(snapshot.id);

      const result = await context.store.transaction([ref], (tx) =>
        resolve(tx.projects, ref, {
          operation: 'upsert',
          modifiedAt: modifiedAtOf(snapshot, envelope),
          buildFields: async (): Promise<ProjectFields> => ({
            name: snapshot.name,
            is_placeholder: false,
            ...(snapshot.key !== undefined ? { key: snapshot.key } : {}),
          }),
        }, context.options),
      );

      return { ref, outcome: result.outcome };
    },
  };
}

export function createProjectCreatedProcessor(): Processor {
  return createProjectUpsertProcessor('created');
}

export function createProjectUpdatedProcessor(): Processor {
  return createProjectUpsertProcessor('updated');
}

/**
 * Removes or tombstones the project; an unknown id is a successful no-op.
 * A hard delete takes the project's issues with it through the foreign
 * key, so a soft delete tombstones them in the same unit.
 */
export function createProjectDeletedProcessor(): Processor {
  return {
    eventName: 'project_deleted',
    kind: 'project',
    operation: 'deleted',

    async process(envelope: WebhookEnvelope, context: ProcessorContext): Promise<ProcessResult> {
      const ref = projectRef(envelope.entityPayload.id);

      const result = await context.store.transaction([ref], async (tx) => {
        const deleted = await resolve(
          tx.projects,
          ref,
          { operation: 'delete', occurredAt: envelope.timestamp },
          context.options,
        );
        if (deleted.outcome !== 'deleted' || context.options.deletePolicy !== 'soft') {
          return { outcome: deleted.outcome, issues: 0 };
        }
        const issues = await tx.issues.tombstoneByProject(
          deleted.record.id,
          envelope.timestamp,
          context.options.now(),
        );
        return { outcome: deleted.outcome, issues };
      });

      if (result.issues > 0) {
        context.log.info(
          { eventType: envelope.eventType, externalId: ref.externalId, issues: result.issues },
          'Tombstoned issues of deleted project',
        );
      }

      return { ref, outcome: result.outcome };
    },
  };
}
