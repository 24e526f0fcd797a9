/**
 * Time bounds for collaborator calls.
 *
 * Responsibilities:
 * - Race a promise against a timer and reject with CollaboratorTimeout
 * - Abort the underlying request (via AbortController) when the timer wins
 * - Bound the wait for each item of an async stream
 */

import { CollaboratorTimeout } from "./errors.js";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Resolve with `promise`, or reject with CollaboratorTimeout after `timeoutMs`.
 * The timer is always cleared, and `controller` (if given) is aborted on timeout.
 *
 * @param promise - The collaborator call
 * @param timeoutMs - Time budget in milliseconds
 * @param label - Collaborator name used in the error message
 * @param controller - Aborted when the timer fires
 * @returns The value of `promise`
 * @throws CollaboratorTimeout when the budget is exceeded
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  controller?: AbortController
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout, not the abort
      reject(new CollaboratorTimeout(label, timeoutMs));
      controller?.abort();
    }, timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Re-yield an async stream, failing if any single item takes longer than `timeoutMs`.
 *
 * When the consumer stops early the source is closed. After a timeout the
 * source cannot be closed (its next() is still pending), so callers abort the
 * producer through `controller`.
 *
 * @param source - The stream to bound
 * @param timeoutMs - Maximum wait per item
 * @param label - Collaborator name used in the error message
 * @param controller - Aborted when an item times out
 * @yields Items of `source`, in order
 */
export async function* withIdleTimeout<T>(
  source: AsyncIterable<T>,
  timeoutMs: number,
  label: string,
  controller?: AbortController
): AsyncGenerator<T> {
  const iterator = source[Symbol.asyncIterator]();
  let awaitingNext = false;
  let exhausted = false;

  try {
    while (true) {
      awaitingNext = true;
      const result = await withTimeout(iterator.next(), timeoutMs, label, controller);
      awaitingNext = false;

      if (result.done) {
        exhausted = true;
        return;
      }
      yield result.value;
    }
  } finally {
    if (!awaitingNext && !exhausted) {
      await iterator.return?.();
    }
  }
}
