import { ServiceError } from './errors';

/**
 * Runs `work` and rejects with a retryable `internal` error once `timeoutMs` elapses.
 * The underlying call is not aborted; its late result is ignored.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  work: () => Promise<T>
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return work();

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(
        new ServiceError('internal', `Timed out after ${timeoutMs}ms: ${operation}`, {
          reason: 'timeout',
          category: 'correctness',
          retryable: true,
          details: { operation, timeout_ms: timeoutMs },
        })
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
