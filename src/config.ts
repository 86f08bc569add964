export const CONFIG = {
  // Scheduling
  DEFAULT_INTERVAL_SECONDS: 5,
  FETCH_TIMEOUT_MS: 30_000,
  // Longest delay Node timers honor; larger ones fire after 1ms
  MAX_TIMER_MS: 2_147_483_647,

  // Signals the bar host sends to a custom module
  REFRESH_SIGNAL: "SIGHUP",
  TOGGLE_SIGNAL: "SIGUSR1",

  // Reachability check (a public DNS resolver)
  REACHABILITY_HOST: "8.8.8.8",
  REACHABILITY_PORT: 53,
  REACHABILITY_TIMEOUT_MS: 3000,

  // Thresholds
  FILESYSTEM_CRITICAL_FREE_PCT: 20,
  FILESYSTEM_WARNING_FREE_PCT: 50,
  MEMORY_CRITICAL_USED_PCT: 90,
  MEMORY_WARNING_USED_PCT: 75,
  CPU_CRITICAL_BUSY_PCT: 90,
  CPU_WARNING_BUSY_PCT: 70,
  CPU_SAMPLE_MS: 1000,
  NETWORK_SAMPLE_MS: 1000,

  // USGS earthquake feed
  QUAKES_DEFAULT_INTERVAL_SECONDS: 300,
  QUAKES_URL: "https://earthquake.usgs.gov/fdsnws/event/1/query",
  QUAKES_DEFAULT_RADIUS_KM: 250,
  QUAKES_DEFAULT_LIMIT: 10,
  QUAKES_DEFAULT_MIN_MAGNITUDE: 1,
} as const;

export type StatusClass = "success" | "warning" | "critical" | "error" | "loading";

export interface StatusRecord {
  readonly text: string;
  readonly class: StatusClass;
  readonly tooltip?: string;
}

export type Result<T> =
  | { readonly kind: "success"; readonly payload: T; readonly updatedAt: Date }
  | { readonly kind: "failure"; readonly error: string };

/**
 * Produces one result per target, in target order.
 * Failures come back as `failure` results rather than rejections; the
 * signal is aborted when the reactor gives up waiting.
 */
export interface Provider<T> {
  fetch(targets: readonly string[], signal: AbortSignal): Promise<Result<T>[]>;
}

/**
 * Maps a result to the record the bar shows. Must be pure.
 */
export interface Renderer<T> {
  render(result: Result<T>, mode: number): StatusRecord;
}

/**
 * Cheap availability check run before a fetch.
 */
export interface Precheck {
  check(): Promise<boolean>;
}

export interface Agent<T> {
  /** Command name, also used as the log scope */
  name: string;
  /** What the agent gathers, as shown in loading text ("disk data") */
  label: string;
  provider: Provider<T>;
  renderer: Renderer<T>;
  precheck?: Precheck;
}
