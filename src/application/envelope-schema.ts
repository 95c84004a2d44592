import { z } from 'zod';

/** True when `Date.parse` understands the string. */
function isParsableDate(value: string): boolean {
  return !Number.isNaN(Date.parse(value));
}

/** Largest epoch offset, in ms, a `Date` can hold. */
const MAX_EPOCH_MS = 8.64e15;

/**
 * A point in time as the tracker sends it: ISO-8601 string or epoch
 * milliseconds. Normalized to a `Date`.
 */
export const instantSchema = z
  .union([
    z.string().min(1).refine(isParsableDate, { message: 'Must be a valid ISO-8601 datetime' }),
    z.number().int().nonnegative().max(MAX_EPOCH_MS, { message: 'Must be within the representable date range' }),
  ])
  .transform((value) => new Date(value));

/** External identifiers arrive as strings or integers; both map to a string. */
export const externalIdSchema = z
  .union([z.string().trim().min(1), z.number().int()])
  .transform((value) => String(value));

/**
 * Zod schema for a decoded webhook body.
 *
 * - `eventType` is required; its format is checked by the registry, not here.
 * - `entityPayload` must carry an `id`; any other key passes through
 *   untouched so new tracker fields never break parsing.
 */
export const envelopeSchema = z.object({
  eventType: z.string().trim().min(1).max(255),
  timestamp: instantSchema,
  entityPayload: z
    .object({ id: externalIdSchema })
    .passthrough(),
});

export type EnvelopeInput = z.input<typeof envelopeSchema>;
