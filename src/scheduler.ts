import { CONFIG } from "./config";
import type { Trigger } from "./trigger";

/**
 * Requests a fetch and redraw every `intervalMs`. Returns a stop function.
 */
export function startScheduler(trigger: Trigger, intervalMs: number): () => void {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`interval must be positive, got ${intervalMs}ms`);
  }
  if (intervalMs > CONFIG.MAX_TIMER_MS) {
    throw new RangeError(`interval must be at most ${CONFIG.MAX_TIMER_MS}ms, got ${intervalMs}ms`);
  }

  let intervalId: ReturnType<typeof setInterval> | null = setInterval(
    () => trigger.wake(true, true),
    intervalMs
  );

  return () => {
    if (intervalId) {
      clearInterval(intervalId);
      intervalId = null;
    }
  };
}
