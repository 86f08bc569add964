export * from "./config";
export * from "./errors";
export * from "./result";
export { Trigger, type Drained } from "./trigger";
export { installSignalHandlers, type SignalOptions, type SignalSource } from "./signals";
export { startScheduler } from "./scheduler";
export { createEmitter, serializeRecord, type Emitter, type LineSink } from "./emitter";
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./log";
export { Reactor, fetchWithTimeout, STILL_RUNNING, UNREACHABLE, type ReactorOptions } from "./reactor";
export { createHostGuard, pgrepFinder, type HostGuard, type ProcessFinder } from "./host";
export { isNetworkReachable, networkPrecheck, type ReachabilityOptions } from "./reachability";
export { runAgent, type AgentRunner, type RunIO, type RunOptions } from "./run";
export * from "./agents";
