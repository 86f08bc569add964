/**
 * A provider could not produce data (command failed, bad HTTP status, bad payload).
 * Providers turn these into `failure` results; they never escape the reactor.
 */
export class ProviderError extends Error {
  override name = "ProviderError";
}

export class FetchTimeoutError extends ProviderError {
  override name = "FetchTimeoutError";

  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs / 1000}s`);
  }
}

/**
 * Startup misconfiguration, e.g. no targets. Raised before the reactor runs.
 */
export class ConfigurationError extends Error {
  override name = "ConfigurationError";
}

/**
 * Something broke inside the worker loop outside the provider call.
 * Terminates the agent.
 */
export class ReactorFatalError extends Error {
  override name = "ReactorFatalError";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
