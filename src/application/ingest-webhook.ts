import {
  MalformedPayloadError,
  UnsupportedEventTypeError,
  ValidationError,
} from '../domain/index.js';
import type { SyncStore, WebhookEnvelope, WebhookResponse } from '../domain/index.js';
import { parseWebhookPayload } from './payload-parser.js';
import type { ProcessorRegistry } from './processor-registry.js';
import type { Processor, SyncLogger } from './processors/index.js';
import type { ReconcileOptions } from './reconciler.js';

/** What happens to a well-formed event nobody handles. */
export type UnsupportedEventPolicy = 'reject' | 'ignore';

export interface IngestDeps {
  readonly store: SyncStore;
  readonly registry: ProcessorRegistry;
  readonly log: SyncLogger;
  readonly unsupportedEventPolicy: UnsupportedEventPolicy;
  readonly reconcile: ReconcileOptions;
}

/** Body bytes and declared content type as received by the adapter. */
export interface RawWebhook {
  readonly body: Buffer | string;
  readonly contentType?: string | undefined;
}

function parse(deps: IngestDeps, raw: RawWebhook): WebhookEnvelope | WebhookResponse {
  try {
    return parseWebhookPayload(raw.body, raw.contentType);
  } catch (err: unknown) {
    if (err instanceof MalformedPayloadError) {
      deps.log.warn({ issues: err.issues, contentType: raw.contentType }, `Rejected webhook: ${err.message}`);
      return { status: 'Rejected', reason: err.message };
    }
    throw err;
  }
}

function classify(deps: IngestDeps, envelope: WebhookEnvelope): Processor | WebhookResponse {
  const eventType = envelope.eventType;
  const externalId = envelope.entityPayload.id;

  try {
    return deps.registry.resolve(eventType);
  } catch (err: unknown) {
    if (!(err instanceof UnsupportedEventTypeError)) throw err;

    deps.log.warn(
      { eventType, externalId, policy: deps.unsupportedEventPolicy },
      'Unsupported event type',
    );

    if (deps.unsupportedEventPolicy === 'ignore') {
      return { status: 'Accepted', reason: `ignored unsupported event type ${eventType}`, eventType, externalId };
    }
    return { status: 'Rejected', reason: err.message, eventType, externalId };
  }
}

function isEnvelope(value: WebhookEnvelope | WebhookResponse): value is WebhookEnvelope {
  return 'entityPayload' in value;
}

function isProcessor(value: Processor | WebhookResponse): value is Processor {
  return 'process' in value;
}

/**
 * Use case: one inbound notification, parse → classify → process.
 *
 * Parse and classify failures answer without touching the store.
 * Validation failures are rejected. Anything else the store throws
 * (`PersistenceConflictError` included) is logged and rethrown so the
 * adapter can answer with a retriable status.
 */
export async function ingestWebhook(deps: IngestDeps, raw: RawWebhook): Promise<WebhookResponse> {
  const envelope = parse(deps, raw);
  if (!isEnvelope(envelope)) return envelope;

  const processor = classify(deps, envelope);
  if (!isProcessor(processor)) return processor;

  const eventType = envelope.eventType;
  const externalId = envelope.entityPayload.id;

  try {
    const result = await processor.process(envelope, {
      store: deps.store,
      log: deps.log,
      options: deps.reconcile,
    });

    if (result.outcome === 'noop_stale') {
      deps.log.info({ eventType, externalId, outcome: result.outcome }, 'Stale event ignored');
    } else {
      deps.log.info({ eventType, externalId, outcome: result.outcome }, 'Webhook applied');
    }

    return { status: 'Accepted', eventType, externalId: result.ref.externalId, outcome: result.outcome };
  } catch (err: unknown) {
    if (err instanceof ValidationError) {
      deps.log.warn({ eventType, externalId, issues: err.issues }, 'Rejected webhook failing validation');
      return { status: 'Rejected', reason: err.message, eventType, externalId };
    }

    deps.log.error({ err, eventType, externalId }, 'Failed to apply webhook');
    throw err;
  }
}
