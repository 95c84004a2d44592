import { z } from 'zod';
import { ValidationError } from '../../domain/index.js';
import type { WebhookEnvelope } from '../../domain/index.js';
import { externalIdSchema, instantSchema } from '../envelope-schema.js';

const optionalText = z.string().trim().min(1).optional();

/** Project snapshot for created/updated events. */
export const projectSnapshotSchema = z.object({
  id: externalIdSchema,
  key: optionalText,
  name: z.string().trim().min(1),
  lastModified: instantSchema.optional(),
}).passthrough();

export type ProjectSnapshot = z.infer<typeof projectSnapshotSchema>;

/** Reference to the owning project carried inside an issue snapshot. */
export const projectRefSchema = z.object({
  id: externalIdSchema,
  key: optionalText,
  name: optionalText,
}).passthrough();

/** Issue snapshot for created/updated events. */
export const issueSnapshotSchema = z.object({
  id: externalIdSchema,
  key: optionalText,
  summary: z.string().trim().min(1),
  status: optionalText,
  project: projectRefSchema,
  lastModified: instantSchema.optional(),
}).passthrough();

export type IssueSnapshot = z.infer<typeof issueSnapshotSchema>;

/**
 * Validates the entity payload against an operation-specific schema.
 * Failures become a non-retriable `ValidationError`.
 */
export function parseSnapshot<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  envelope: WebhookEnvelope,
): T {
  const parsed = schema.safeParse(envelope.entityPayload);
  if (!parsed.success) {
    throw new ValidationError(
      envelope.eventType,
      envelope.entityPayload.id,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/** Snapshot modification time, falling back to the envelope's event time. */
export function modifiedAtOf(snapshot: { lastModified?: Date | undefined }, envelope: WebhookEnvelope): Date {
  return snapshot.lastModified ?? envelope.timestamp;
}
