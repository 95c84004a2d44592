import type { Logger } from 'pino';
import type {
  EntityKind,
  EventOperation,
  ExternalEntityRef,
  SyncStore,
  UpsertOutcomeKind,
  WebhookEnvelope,
} from '../../domain/index.js';
import type { ReconcileOptions } from '../reconciler.js';

/** Logger subset the pipeline writes to; Fastify's request logger fits. */
export type SyncLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/** Everything a processor may touch. The store is the only shared state. */
export interface ProcessorContext {
  readonly store: SyncStore;
  readonly log: SyncLogger;
  readonly options: ReconcileOptions;
}

/** What a processor did for one envelope. */
export interface ProcessResult {
  readonly ref: ExternalEntityRef;
  readonly outcome: UpsertOutcomeKind;
  /** Set when an issue event had to create its parent project. */
  readonly placeholderProject?: ExternalEntityRef;
}

/**
 * Handler for exactly one (entity kind, operation) pair.
 *
 * `eventName` is the tag suffix (`issue_created`); the registry prefixes
 * the event domain. Throws `ValidationError` for payloads missing a
 * field this operation needs; store errors propagate unchanged.
 */
export interface Processor {
  readonly eventName: string;
  readonly kind: EntityKind;
  readonly operation: EventOperation;
  process(envelope: WebhookEnvelope, context: ProcessorContext): Promise<ProcessResult>;
}
