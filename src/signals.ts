import { CONFIG } from "./config";
import type { Logger } from "./log";
import type { Trigger } from "./trigger";

/**
 * The part of `process` the bridge needs, so tests can hand in an emitter.
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, handler: () => void): unknown;
  off(signal: NodeJS.Signals, handler: () => void): unknown;
}

export interface SignalOptions {
  refresh?: NodeJS.Signals;
  toggle?: NodeJS.Signals;
  source?: SignalSource;
  logger?: Logger;
}

/**
 * Routes the refresh and toggle signals into the trigger.
 * Returns a function that removes both handlers.
 */
export function installSignalHandlers(trigger: Trigger, options: SignalOptions = {}): () => void {
  const refresh = options.refresh ?? CONFIG.REFRESH_SIGNAL;
  const toggle = options.toggle ?? CONFIG.TOGGLE_SIGNAL;
  const source: SignalSource = options.source ?? process;
  const logger = options.logger;

  if (refresh === toggle) {
    throw new RangeError(`refresh and toggle signals must differ (both ${refresh})`);
  }

  const onRefresh = (): void => {
    logger?.debug(`received ${refresh}, refreshing`);
    trigger.wake(true, true);
  };

  const onToggle = (): void => {
    logger?.debug(`received ${toggle}, switching format`);
    trigger.requestToggle();
  };

  source.on(refresh, onRefresh);
  source.on(toggle, onToggle);

  return () => {
    source.off(refresh, onRefresh);
    source.off(toggle, onToggle);
  };
}
