export type {
  EntityKind,
  EventOperation,
  EntityPayload,
  WebhookEnvelope,
  ExternalEntityRef,
} from './envelope.js';
export { refKey } from './envelope.js';
export type {
  SyncedRecord,
  ProjectRecord,
  IssueRecord,
  ProjectFields,
  IssueFields,
  SyncStamp,
} from './records.js';
export type { UpsertOutcome, UpsertOutcomeKind, WebhookResponse } from './outcome.js';
export type {
  RecordRepository,
  ProjectRepository,
  IssueRepository,
  PlaceholderFields,
  SyncTransaction,
  SyncStore,
} from './store.js';
export {
  MalformedPayloadError,
  UnsupportedEventTypeError,
  ValidationError,
  PersistenceConflictError,
  PipelineTimeoutError,
} from './errors.js';
