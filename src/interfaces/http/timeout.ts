import { PipelineTimeoutError } from '../../domain/index.js';

/**
 * Races `work` against a timer. On timeout the work is not cancelled;
 * it finishes in the background and its result is dropped, which is
 * safe because processing is idempotent and the sender will retry.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new PipelineTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
