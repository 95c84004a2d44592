/**
 * Core domain types for inbound tracker notifications.
 *
 * These types describe a notification after parsing. They carry no
 * framework dependencies.
 */

/** Entity kinds mirrored from the source system. */
export type EntityKind = 'project' | 'issue';

/** Operation encoded in the event-type tag suffix. */
export type EventOperation = 'created' | 'updated' | 'deleted';

/** Open key/value snapshot of the entity as of the event. */
export type EntityPayload = Readonly<Record<string, unknown>> & { readonly id: string };

/**
 * One inbound notification, built once per call and discarded after
 * dispatch.
 */
export interface WebhookEnvelope {
  /** `"<domain>:<entity>_<operation>"`, e.g. `jira:issue_created`. */
  readonly eventType: string;
  /** Source-system event time. */
  readonly timestamp: Date;
  readonly entityPayload: EntityPayload;
}

/**
 * Identity correlation key. `externalId` is unique per kind and is the
 * only key used to find local records.
 */
export interface ExternalEntityRef {
  readonly kind: EntityKind;
  readonly externalId: string;
}

/** Lock/log key for a ref, e.g. `issue:10001`. */
export function refKey(ref: ExternalEntityRef): string {
  return `${ref.kind}:${ref.externalId}`;
}
