import { StageAbortedError, StageTimeoutError } from '../../retrieval/errors/retrieval-errors';

export interface DeadlineOptions {
  /** Stage name used in error messages */
  label: string;
  timeoutMs: number;
  /** Request-level signal; aborting it abandons the operation immediately */
  signal?: AbortSignal;
}

/**
 * Run an external call under its own deadline.
 *
 * The operation receives a signal that aborts on timeout or when the parent
 * signal aborts. Clients that ignore signals are simply no longer awaited.
 */
export function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const { label, timeoutMs, signal } = options;

  if (signal?.aborted) {
    return Promise.reject(new StageAbortedError(label));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      cleanup();
      controller.abort();
      reject(new StageAbortedError(label));
    };

    const timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(new StageTimeoutError(label, timeoutMs));
    }, timeoutMs);

    function cleanup(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    signal?.addEventListener('abort', onAbort, { once: true });

    operation(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });
}

/**
 * Sleep that wakes early (rejecting) when the signal aborts
 */
export function abortableDelay(
  ms: number,
  signal: AbortSignal | undefined,
  label: string,
): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new StageAbortedError(label));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new StageAbortedError(label));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
