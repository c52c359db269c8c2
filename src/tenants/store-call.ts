import { StoreUnavailableError } from '../access-keys/errors';
import type { StoreCallOptions } from '../access-keys/types';

/**
 * Runs a single store call under a deadline. Timeouts, aborts and backend
 * failures all surface as {@link StoreUnavailableError}.
 */
export function runStoreCall<T>(
  operation: string,
  call: () => Promise<T>,
  options: StoreCallOptions,
  defaultTimeoutMs: number,
): Promise<T> {
  const { signal } = options;
  const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;

  if (signal?.aborted) {
    return Promise.reject(new StoreUnavailableError(`Store call ${operation} aborted`));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(new StoreUnavailableError(`Store call ${operation} aborted`));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new StoreUnavailableError(`Store call ${operation} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    Promise.resolve()
      .then(call)
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(
            error instanceof StoreUnavailableError
              ? error
              : new StoreUnavailableError(`Store call ${operation} failed`, { cause: error }),
          );
        },
      );
  });
}
