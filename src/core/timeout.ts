/**
 * Deadline helper for external calls (index lookups, generation, embeddings)
 */

import { TimeoutError } from "./errors.js";

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with TimeoutError when the deadline passes, even if the task ignores the signal.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

