/**
 * @fileoverview Async Utilities
 *
 * Timeout and bounded-concurrency helpers used by the indexer and engine.
 *
 * @packageDocumentation
 */

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
  /** Invoked when the timeout fires, e.g. to abort the underlying operation */
  onTimeout?: () => void;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param timeoutMs - Timeout in milliseconds (if <= 0 or undefined, returns promise as-is)
 * @throws TimeoutError if the promise does not settle within timeoutMs
 *
 * @example
 * ```typescript
 * const content = await withTimeout(fs.readFile(file), 5000, { context: `reading ${file}` });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          options?.onTimeout?.();
          reject(new TimeoutError(timeoutMs, options?.context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

export interface ConcurrencyOptions {
  /** Checked before each item is started; once aborted, remaining items are skipped. */
  signal?: AbortSignal;
}

export interface ConcurrencyResult<U> {
  /** One slot per input item; `undefined` for items skipped after abort. */
  results: Array<U | undefined>;
  completed: number;
  skipped: number;
}

/**
 * Map items through an async mapper with at most `limit` in flight.
 * Results keep the input order regardless of completion order.
 */
export async function runWithConcurrency<T, U>(
  items: readonly T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<U>,
  options: ConcurrencyOptions = {}
): Promise<ConcurrencyResult<U>> {
  const results = new Array<U | undefined>(items.length).fill(undefined);
  let nextIndex = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      if (options.signal?.aborted) return;
      const index = nextIndex++;
      results[index] = await mapper(items[index], index);
      completed++;
    }
  };

  const poolSize = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  await Promise.all(Array.from({ length: poolSize }, () => worker()));

  return { results, completed, skipped: items.length - completed };
}
