/**
 * Normalizes the tracker's own webhook body into the envelope shape.
 *
 * The tracker posts `{ webhookEvent, timestamp, issue | project }`, with
 * issue attributes nested under `fields`. Anything already carrying an
 * `eventType` is returned untouched.
 */

type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `status: { name: 'Done' }` → `'Done'`; plain strings pass through. */
function nameOf(value: unknown): unknown {
  return isObject(value) ? value['name'] : value;
}

function issueSnapshot(issue: JsonObject): JsonObject {
  const fields = isObject(issue['fields']) ? issue['fields'] : {};
  const project = fields['project'];

  return {
    id: issue['id'],
    key: issue['key'],
    summary: fields['summary'],
    status: nameOf(fields['status']),
    project: isObject(project)
      ? { id: project['id'], key: project['key'], name: project['name'] }
      : undefined,
    lastModified: fields['updated'],
  };
}

function projectSnapshot(project: JsonObject): JsonObject {
  return {
    id: project['id'],
    key: project['key'],
    name: project['name'],
  };
}

export function isNativePayload(body: JsonObject): boolean {
  return body['eventType'] === undefined && typeof body['webhookEvent'] === 'string';
}

export function normalizeNativePayload(body: JsonObject): JsonObject {
  if (!isNativePayload(body)) return body;

  const issue = body['issue'];
  const project = body['project'];

  let entityPayload: JsonObject | undefined;
  if (isObject(issue)) {
    entityPayload = issueSnapshot(issue);
  } else if (isObject(project)) {
    entityPayload = projectSnapshot(project);
  }

  return {
    eventType: body['webhookEvent'],
    timestamp: body['timestamp'],
    entityPayload,
  };
}
