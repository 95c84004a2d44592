import { PersistenceConflictError } from '../../domain/index.js';

/**
 * SQLSTATE codes that mean "another writer got in the way": unique and
 * foreign-key violations, serialization failures, deadlocks and lock
 * timeouts. Retrying the whole unit is safe for all of them.
 */
const CONFLICT_CODES: ReadonlySet<string> = new Set([
  '23505', // unique_violation
  '23503', // foreign_key_violation
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '55P03', // lock_not_available
]);

function sqlState(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  // Drizzle wraps driver errors; the SQLSTATE sits on the cause.
  if ('cause' in err) return sqlState(err.cause);
  return undefined;
}

/**
 * Maps a driver error to `PersistenceConflictError` when it is a
 * retriable conflict; anything else comes back unchanged.
 */
export function toPersistenceError(err: unknown): unknown {
  if (err instanceof PersistenceConflictError) return err;

  const code = sqlState(err);
  if (code !== undefined && CONFLICT_CODES.has(code)) {
    const detail = err instanceof Error ? err.message : 'database conflict';
    return new PersistenceConflictError(`Store conflict (${code}): ${detail}`, { cause: err });
  }
  return err;
}
