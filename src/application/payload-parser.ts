import { MalformedPayloadError } from '../domain/index.js';
import type { EntityPayload, WebhookEnvelope } from '../domain/index.js';
import { envelopeSchema } from './envelope-schema.js';
import { isObject, normalizeNativePayload } from './native-payload.js';

const JSON_MEDIA_TYPE = /^application\/(?:[\w.+-]+\+)?json$/i;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** `application/json; charset=utf-8` → `application/json`. */
function mediaType(contentType: string): string {
  return (contentType.split(';')[0] ?? '').trim();
}

function decode(raw: Buffer | string): string {
  if (typeof raw === 'string') return raw;
  try {
    return utf8.decode(raw);
  } catch {
    throw new MalformedPayloadError('Body is not valid UTF-8');
  }
}

/**
 * Decodes a raw webhook body into a `WebhookEnvelope`.
 *
 * A missing content type is read as JSON. Unknown fields are kept in
 * `entityPayload`. Throws `MalformedPayloadError` naming every missing
 * or invalid mandatory field. Pure: no I/O, no logging.
 */
export function parseWebhookPayload(
  raw: Buffer | string,
  contentType?: string,
): WebhookEnvelope {
  if (contentType !== undefined && contentType !== '' && !JSON_MEDIA_TYPE.test(mediaType(contentType))) {
    throw new MalformedPayloadError(`Unsupported content type "${contentType}"`);
  }

  const text = decode(raw);
  if (text.trim() === '') {
    throw new MalformedPayloadError('Body is empty');
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new MalformedPayloadError('Body is not valid JSON');
  }

  if (!isObject(body)) {
    throw new MalformedPayloadError('Body must be a JSON object');
  }

  const parsed = envelopeSchema.safeParse(normalizeNativePayload(body));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new MalformedPayloadError(`Invalid webhook envelope: ${issues.join('; ')}`, issues);
  }

  const entityPayload: EntityPayload = parsed.data.entityPayload;

  return {
    eventType: parsed.data.eventType,
    timestamp: parsed.data.timestamp,
    entityPayload,
  };
}
