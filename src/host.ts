import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export interface HostGuard {
  readonly processName: string;
  isRunning(): Promise<boolean>;
}

export type ProcessFinder = (processName: string, uid: number) => Promise<boolean>;

/**
 * pgrep exits 1 when nothing matches and 2+ on real errors; only a clean
 * "no match" counts as the host being gone.
 */
export const pgrepFinder: ProcessFinder = async (processName, uid) => {
  try {
    await execFileAsync("pgrep", ["-x", "-u", String(uid), processName]);
    return true;
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === 1) return false;
    throw error;
  }
};

/**
 * Tells the reactor whether the bar host is still around, so an orphaned
 * agent can exit instead of writing into a closed pipe forever.
 */
export function createHostGuard(processName: string, find: ProcessFinder = pgrepFinder): HostGuard {
  const uid = process.getuid?.() ?? 0;
  return {
    processName,
    isRunning: () => find(processName, uid),
  };
}
