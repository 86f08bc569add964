import { CONFIG, type Agent } from "./config";
import { createEmitter, type Emitter, type LineSink } from "./emitter";
import { ConfigurationError, ReactorFatalError } from "./errors";
import { createHostGuard, type ProcessFinder } from "./host";
import { createLogger, type Logger } from "./log";
import { Reactor, fetchWithTimeout } from "./reactor";
import { failureRecord } from "./render";
import { startScheduler } from "./scheduler";
import { installSignalHandlers, type SignalSource } from "./signals";
import { Trigger } from "./trigger";

export interface RunOptions {
  /** Seconds between scheduled refreshes */
  interval: number;
  /** Seconds a single fetch may take */
  timeout: number;
  test: boolean;
  debug: boolean;
  logFile?: string;
  host?: string;
}

/**
 * Process plumbing, replaceable in tests.
 */
export interface RunIO {
  stdout?: LineSink;
  signals?: SignalSource;
  log?: (line: string) => void;
  findProcess?: ProcessFinder;
}

export type AgentRunner = <T>(agent: Agent<T>, targets: readonly string[], options: RunOptions) => Promise<number>;

/**
 * Runs an agent until it is told to stop. Resolves with the exit code.
 */
export async function runAgent<T>(
  agent: Agent<T>,
  targets: readonly string[],
  options: RunOptions,
  io: RunIO = {}
): Promise<number> {
  const logger = createLogger({ name: agent.name, debug: options.debug, file: options.logFile, write: io.log });
  const emitter = createEmitter(io.stdout);

  try {
    if (targets.length === 0) {
      throw new ConfigurationError(`${agent.name}: at least one target is required`);
    }
    checkSeconds("timeout", options.timeout);
    if (options.test) {
      return await runOnce(agent, targets, options, emitter);
    }
    return await serve(agent, targets, options, emitter, logger, io);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error("❌ Invalid configuration", error);
      emitter.emit(failureRecord(error.message));
      return 1;
    }
    if (error instanceof ReactorFatalError) {
      logger.error("💥 Fatal error", error.cause ?? error);
      return 1;
    }
    throw error;
  }
}

/** Largest whole number of seconds a Node timer can wait */
export const MAX_TIMER_SECONDS = Math.floor(CONFIG.MAX_TIMER_MS / 1000);

function checkSeconds(name: string, seconds: number): void {
  if (!(seconds > 0 && seconds <= MAX_TIMER_SECONDS)) {
    throw new ConfigurationError(`${name} must be positive and at most ${MAX_TIMER_SECONDS}s, got ${seconds}`);
  }
}

/**
 * `--test`: one fetch, one line per target, no reactor.
 */
async function runOnce<T>(agent: Agent<T>, targets: readonly string[], options: RunOptions, emitter: Emitter): Promise<number> {
  const results = await fetchWithTimeout(agent.provider, targets, options.timeout * 1000);
  if (results.length === 0) {
    emitter.emit(failureRecord(`${agent.name} returned no results`));
    return 1;
  }
  results.forEach((result, index) => emitter.emit(agent.renderer.render(result, index)));
  return 0;
}

async function serve<T>(
  agent: Agent<T>,
  targets: readonly string[],
  options: RunOptions,
  emitter: Emitter,
  logger: Logger,
  io: RunIO
): Promise<number> {
  checkSeconds("interval", options.interval);

  const trigger = new Trigger(targets.length);
  const reactor = new Reactor({
    agent,
    targets,
    emitter,
    logger,
    trigger,
    fetchTimeoutMs: options.timeout * 1000,
    hostGuard: options.host ? createHostGuard(options.host, io.findProcess) : undefined,
  });

  const signals: SignalSource = io.signals ?? process;
  const uninstall = installSignalHandlers(trigger, {
    refresh: CONFIG.REFRESH_SIGNAL,
    toggle: CONFIG.TOGGLE_SIGNAL,
    source: signals,
    logger,
  });
  const shutdown = (): void => {
    logger.info("🛑 Stopping");
    reactor.stop();
  };
  signals.on("SIGINT", shutdown);
  signals.on("SIGTERM", shutdown);

  const stopScheduler = startScheduler(trigger, options.interval * 1000);
  logger.info(`⏱️  Refreshing ${targets.join(", ")} every ${options.interval}s`);

  try {
    await reactor.run();
    return 0;
  } finally {
    stopScheduler();
    uninstall();
    signals.off("SIGINT", shutdown);
    signals.off("SIGTERM", shutdown);
  }
}
