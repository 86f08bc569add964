import { CONFIG, type Agent, type Provider, type Result, type StatusRecord } from "./config";
import type { Emitter } from "./emitter";
import { ConfigurationError, FetchTimeoutError, ReactorFatalError, describeError } from "./errors";
import type { HostGuard } from "./host";
import type { Logger } from "./log";
import { asLoading, gatheringRecord, pendingRecord } from "./render";
import { alignResults, failure } from "./result";
import { withTimeout } from "./timeout";
import { Trigger, type Drained } from "./trigger";

export const UNREACHABLE = "unreachable";
export const STILL_RUNNING = "previous fetch still running";

export interface ReactorOptions<T> {
  agent: Agent<T>;
  targets: readonly string[];
  emitter: Emitter;
  logger: Logger;
  /** Supplied by callers that wire signals and timers before constructing the reactor */
  trigger?: Trigger;
  fetchTimeoutMs?: number;
  hostGuard?: HostGuard;
}

interface ReactorState<T> {
  cachedResults: Result<T>[];
  /** A provider call the timeout gave up on that has not settled yet */
  abandonedFetch: Promise<void> | null;
}

/**
 * Calls the provider once under a timeout. Never rejects: timeouts and
 * provider errors come back as one failure per target. An empty provider
 * answer stays empty so the caller can tell "nothing" from "short".
 */
export async function fetchWithTimeout<T>(
  provider: Provider<T>,
  targets: readonly string[],
  timeoutMs: number,
  onAbandoned?: (work: Promise<Result<T>[]>) => void
): Promise<Result<T>[]> {
  const controller = new AbortController();
  const work = Promise.resolve().then(() => provider.fetch(targets, controller.signal));

  try {
    const results = await withTimeout(work, timeoutMs, controller);
    return results.length === 0 ? [] : alignResults(targets, results);
  } catch (error) {
    if (error instanceof FetchTimeoutError) onAbandoned?.(work);
    return targets.map(() => failure<T>(describeError(error)));
  }
}

/**
 * The worker loop: waits on the trigger, fetches, caches and renders.
 * It is the only caller of the provider, renderer and emitter.
 */
export class Reactor<T> {
  readonly trigger: Trigger;
  private readonly timeoutMs: number;
  private readonly state: ReactorState<T> = {
    cachedResults: [],
    abandonedFetch: null,
  };

  constructor(private readonly options: ReactorOptions<T>) {
    const { agent, targets } = options;
    if (targets.length === 0) {
      throw new ConfigurationError(`${agent.name}: at least one target is required`);
    }

    this.trigger = options.trigger ?? new Trigger(targets.length);
    if (this.trigger.targetCount !== targets.length) {
      throw new ConfigurationError(
        `${agent.name}: trigger expects ${this.trigger.targetCount} targets, got ${targets.length}`
      );
    }

    this.timeoutMs = options.fetchTimeoutMs ?? CONFIG.FETCH_TIMEOUT_MS;
    if (!(this.timeoutMs > 0 && this.timeoutMs <= CONFIG.MAX_TIMER_MS)) {
      throw new ConfigurationError(`${agent.name}: fetch timeout must be positive and at most ${CONFIG.MAX_TIMER_MS}ms`);
    }
  }

  get cachedResults(): readonly Result<T>[] {
    return this.state.cachedResults;
  }

  /**
   * Runs until `stop()` or until the host guard reports the host gone.
   * Rejects with `ReactorFatalError` if rendering or emitting throws.
   */
  async run(): Promise<void> {
    for (;;) {
      const drained = await this.trigger.waitAndDrain();
      if (!drained) return;

      try {
        await this.cycle(drained);
      } catch (error) {
        this.stop();
        throw new ReactorFatalError(`worker loop failed: ${describeError(error)}`, { cause: error });
      }
    }
  }

  stop(): void {
    this.trigger.close();
  }

  private async cycle({ fetch, redraw }: Drained): Promise<void> {
    const { emitter, logger, hostGuard } = this.options;
    logger.debug(`woke with fetch=${fetch} redraw=${redraw} index=${this.trigger.formatIndex}`);

    if (hostGuard && !(await this.hostIsRunning(hostGuard))) {
      logger.info(`👋 ${hostGuard.processName} is not running, exiting`);
      this.stop();
      return;
    }

    if (fetch) {
      emitter.emit(this.loadingRecord());

      const results = await this.fetch();
      if (results.length === 0) {
        logger.warn("⚠️  Fetch returned no results");
        return;
      }
      this.state.cachedResults = results;
    }

    if (redraw) {
      this.trigger.applyToggles();
      emitter.emit(this.currentRecord());
    }
  }

  private async fetch(): Promise<Result<T>[]> {
    const { agent, targets, logger } = this.options;

    if (agent.precheck && !(await this.precheckPasses())) {
      logger.warn("🔌 Pre-check failed, skipping fetch");
      return targets.map(() => failure<T>(UNREACHABLE));
    }

    if (this.state.abandonedFetch) {
      logger.warn("⏳ Previous fetch is still running, skipping fetch");
      return targets.map(() => failure<T>(STILL_RUNNING));
    }

    const started = Date.now();
    const results = await fetchWithTimeout(agent.provider, targets, this.timeoutMs, (work) => {
      const clear = (): void => {
        this.state.abandonedFetch = null;
      };
      this.state.abandonedFetch = work.then(clear, clear);
    });
    logger.debug(`fetched ${results.length} result(s) in ${Date.now() - started}ms`);

    results.forEach((result, index) => {
      if (result.kind === "failure") logger.warn(`❌ ${targets[index]}: ${result.error}`);
    });

    return results;
  }

  private loadingRecord(): StatusRecord {
    const index = this.trigger.formatIndex;
    const stale = this.state.cachedResults[index];
    return stale
      ? asLoading(this.options.agent.renderer.render(stale, index))
      : gatheringRecord(this.options.agent.label);
  }

  private currentRecord(): StatusRecord {
    const index = this.trigger.formatIndex;
    const cached = this.state.cachedResults[index];
    return cached
      ? this.options.agent.renderer.render(cached, index)
      : pendingRecord(this.options.agent.label);
  }

  private async precheckPasses(): Promise<boolean> {
    try {
      return (await this.options.agent.precheck?.check()) ?? true;
    } catch (error) {
      this.options.logger.error("Pre-check failed", error);
      return false;
    }
  }

  private async hostIsRunning(guard: HostGuard): Promise<boolean> {
    try {
      return await guard.isRunning();
    } catch (error) {
      // Unknown counts as running
      this.options.logger.error(`Could not check for ${guard.processName}`, error);
      return true;
    }
  }
}
