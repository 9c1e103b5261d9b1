/**
 * @fileoverview Deadline enforcement for connect and exchange operations.
 *
 * Key exports:
 * - withTimeout(): Promise wrapper that rejects with a TIMEOUT V24Error
 */

import { timeoutError } from './error.utils';
import { logVerbose } from './logging';

export interface TimeoutOptions {
  readonly timeoutMs: number;
  readonly operation: string;
  /** Runs when the deadline fires, before the returned promise rejects */
  readonly onTimeout?: () => void;
}

/**
 * Wrap a promise with timeout enforcement
 *
 * Races the provided promise against a timer. If the timer fires first, `onTimeout`
 * runs and the promise is rejected with a TIMEOUT V24Error. The timer is cleared on
 * every exit path so no handle outlives the operation.
 *
 * @example
 * ```typescript
 * const stream = await withTimeout(connector(endpoint, 5000), {
 *   timeoutMs: 5000,
 *   operation: 'connect'
 * });
 * ```
 */
export async function withTimeout<T>(promise: Promise<T>, options: TimeoutOptions): Promise<T> {
  const { timeoutMs, operation, onTimeout } = options;

  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      logVerbose('Timeout', `${operation} exceeded ${timeoutMs}ms`);
      onTimeout?.();
      reject(timeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}
