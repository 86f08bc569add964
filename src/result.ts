import type { Result } from "./config";

export function success<T>(payload: T, updatedAt: Date = new Date()): Result<T> {
  return { kind: "success", payload, updatedAt };
}

export function failure<T>(error: string): Result<T> {
  return { kind: "failure", error };
}

export function isSuccess<T>(
  result: Result<T>
): result is Extract<Result<T>, { kind: "success" }> {
  return result.kind === "success";
}

/**
 * Fits a provider's results to the configured targets: one result per target,
 * missing entries become failures and extras are dropped.
 */
export function alignResults<T>(targets: readonly string[], results: readonly Result<T>[]): Result<T>[] {
  return targets.map((target, index) => results[index] ?? failure<T>(`no result for ${target}`));
}
