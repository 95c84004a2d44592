/**
 * Failure taxonomy of the ingestion pipeline.
 *
 * Each error carries a stable `code` and whether the delivering system
 * should retry. A stale event is not an error; it is the `noop_stale`
 * outcome.
 */

/** Raw body could not be decoded into an envelope. */
export class MalformedPayloadError extends Error {
  readonly code = 'MALFORMED_PAYLOAD' as const;
  readonly retriable = false;

  constructor(message: string, readonly issues: readonly string[] = []) {
    super(message);
    this.name = 'MalformedPayloadError';
  }
}

/** No processor is registered for the event-type tag. */
export class UnsupportedEventTypeError extends Error {
  readonly code = 'UNSUPPORTED_EVENT_TYPE' as const;
  readonly retriable = false;

  constructor(readonly eventType: string) {
    super(`Unsupported event type "${eventType}"`);
    this.name = 'UnsupportedEventTypeError';
  }
}

/** Payload lacks a field the specific operation requires. */
export class ValidationError extends Error {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly retriable = false;

  constructor(
    readonly eventType: string,
    readonly externalId: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid payload for "${eventType}": ${issues.join('; ')}`);
    this.name = 'ValidationError';
  }
}

/** Store-level conflict not explained by the staleness guard. Retry with backoff. */
export class PersistenceConflictError extends Error {
  readonly code = 'PERSISTENCE_CONFLICT' as const;
  readonly retriable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceConflictError';
  }
}

/** The pipeline did not finish within the adapter's budget. */
export class PipelineTimeoutError extends Error {
  readonly code = 'PIPELINE_TIMEOUT' as const;
  readonly retriable = true;

  constructor(readonly timeoutMs: number) {
    super(`Webhook processing exceeded ${timeoutMs}ms`);
    this.name = 'PipelineTimeoutError';
  }
}
