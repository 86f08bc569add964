import { CONFIG } from "./config";
import { FetchTimeoutError } from "./errors";

/**
 * Races `work` against a timer. On timeout the controller is aborted and
 * the promise rejects with `FetchTimeoutError`; `work` itself is left to settle.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  controller?: AbortController
): Promise<T> {
  if (!(timeoutMs > 0 && timeoutMs <= CONFIG.MAX_TIMER_MS)) {
    throw new RangeError(`timeout must be positive and at most ${CONFIG.MAX_TIMER_MS}ms, got ${timeoutMs}ms`);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller?.abort();
      reject(new FetchTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}
