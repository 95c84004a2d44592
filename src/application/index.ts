export { envelopeSchema, instantSchema, externalIdSchema } from './envelope-schema.js';
export type { EnvelopeInput } from './envelope-schema.js';
export { parseWebhookPayload } from './payload-parser.js';
export { normalizeNativePayload, isNativePayload } from './native-payload.js';
export { ProcessorRegistry, DEFAULT_EVENT_DOMAIN } from './processor-registry.js';
export { resolve, isStale } from './reconciler.js';
export type {
  DeletePolicy,
  StalenessMode,
  ReconcileOptions,
  ReconcileRequest,
  UpsertRequest,
  DeleteRequest,
} from './reconciler.js';
export { ingestWebhook } from './ingest-webhook.js';
export type { IngestDeps, RawWebhook, UnsupportedEventPolicy } from './ingest-webhook.js';
export { getProject, getIssue } from './query-entities.js';
export * from './processors/index.js';
