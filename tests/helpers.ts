import { vi } from 'vitest';
import type { WebhookEnvelope } from '../src/domain/index.js';
import type { ReconcileOptions, SyncLogger } from '../src/application/index.js';

/** Fixed "now" so sync stamps are deterministic. */
export const FIXED_NOW = new Date('2026-03-01T12:00:00Z');

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as SyncLogger;
}

export function reconcileOptions(overrides: Partial<ReconcileOptions> = {}): ReconcileOptions {
  return {
    deletePolicy: overrides.deletePolicy ?? 'soft',
    stalenessMode: overrides.stalenessMode ?? 'source',
    now: overrides.now ?? (() => FIXED_NOW),
  };
}

/**
 * Factory for parsed envelopes. `timestamp` defaults to the first of
 * January 2025.
 */
export function makeEnvelope(
  eventType: string,
  entityPayload: { id: string } & Record<string, unknown>,
  timestamp: string = '2025-01-01T00:00:00Z',
): WebhookEnvelope {
  return {
    eventType,
    timestamp: new Date(timestamp),
    entityPayload,
  };
}

/** Promise whose resolution the test controls. */
export function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
