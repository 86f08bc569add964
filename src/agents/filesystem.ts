import { execFile } from "child_process";
import { promisify } from "util";
import { CONFIG, type Agent, type Provider, type Renderer, type Result, type StatusClass } from "../config";
import { describeError } from "../errors";
import { alignedRows, formatBytes, tooltipWithFooter, type ByteUnit } from "../format";
import { GLYPHS, withIcon } from "../glyphs";
import { failureRecord } from "../render";
import { failure, isSuccess, success } from "../result";

const execFileAsync = promisify(execFile);

export interface FilesystemUsage {
  mountpoint: string;
  filesystem: string;
  fstype: string;
  total: number;
  used: number;
  available: number;
  usedPercent: number;
}

export type CommandRunner = (file: string, args: string[], signal: AbortSignal) => Promise<string>;

const DF_COLUMNS = "source,fstype,size,used,avail,pcent,target";

export const runCommand: CommandRunner = async (file, args, signal) => {
  const { stdout } = await execFileAsync(file, args, { signal });
  return stdout;
};

/**
 * First stderr line of a failed command, else the first line of the error message.
 */
export function commandErrorMessage(error: unknown): string {
  if (error instanceof Error && "stderr" in error && typeof error.stderr === "string") {
    const line = error.stderr.trim().split("\n")[0];
    if (line) return line;
  }
  return describeError(error).split("\n")[0];
}

/**
 * Parses `df -B1 --output=source,fstype,size,used,avail,pcent,target`.
 * Returns null when the output has no data row.
 */
export function parseDfOutput(stdout: string): FilesystemUsage | null {
  const row = stdout.trim().split("\n")[1];
  if (!row) return null;

  const [filesystem, fstype, size, used, avail, pcent, ...target] = row.trim().split(/\s+/);
  const total = parseInt(size, 10);
  if (!filesystem || Number.isNaN(total)) return null;

  return {
    mountpoint: target.join(" "),
    filesystem,
    fstype,
    total,
    used: parseInt(used, 10) || 0,
    available: parseInt(avail, 10) || 0,
    usedPercent: parseInt(pcent, 10) || 0,
  };
}

export function createFilesystemProvider(run: CommandRunner = runCommand): Provider<FilesystemUsage> {
  return {
    async fetch(mountpoints, signal) {
      const results: Result<FilesystemUsage>[] = [];
      for (const mountpoint of mountpoints) {
        try {
          const stdout = await run("df", ["-B1", `--output=${DF_COLUMNS}`, mountpoint], signal);
          const usage = parseDfOutput(stdout);
          results.push(usage ? success(usage) : failure<FilesystemUsage>(`${mountpoint} returned no data`));
        } catch (error) {
          results.push(failure<FilesystemUsage>(commandErrorMessage(error)));
        }
      }
      return results;
    },
  };
}

export function filesystemClass(usage: FilesystemUsage): StatusClass {
  const freePercent = 100 - usage.usedPercent;
  if (freePercent < CONFIG.FILESYSTEM_CRITICAL_FREE_PCT) return "critical";
  if (freePercent < CONFIG.FILESYSTEM_WARNING_FREE_PCT) return "warning";
  return "success";
}

export function createFilesystemRenderer(unit: ByteUnit = "auto"): Renderer<FilesystemUsage> {
  return {
    render(result) {
      if (!isSuccess(result)) return failureRecord(result.error);

      const usage = result.payload;
      const rows = alignedRows([
        ["Filesystem", usage.filesystem],
        ["Mountpoint", usage.mountpoint],
        ["Type", usage.fstype],
        ["Used", `${formatBytes(usage.used, unit)} (${usage.usedPercent}%)`],
        ["Available", `${formatBytes(usage.available, unit)} (${100 - usage.usedPercent}%)`],
      ]);

      return {
        text: withIcon(
          GLYPHS.harddisk,
          `${usage.mountpoint} ${formatBytes(usage.used, unit)} / ${formatBytes(usage.total, unit)}`
        ),
        class: filesystemClass(usage),
        tooltip: tooltipWithFooter(rows, result.updatedAt),
      };
    },
  };
}

export function createFilesystemAgent(options: { unit?: ByteUnit; run?: CommandRunner } = {}): Agent<FilesystemUsage> {
  return {
    name: "filesystem",
    label: "disk data",
    provider: createFilesystemProvider(options.run),
    renderer: createFilesystemRenderer(options.unit),
  };
}
