import { readFile } from "fs/promises";
import { CONFIG, type Agent, type Provider, type Renderer, type StatusClass } from "../config";
import { describeError } from "../errors";
import { alignedRows, formatBytes, percent, tooltipWithFooter, type ByteUnit } from "../format";
import { GLYPHS, withIcon } from "../glyphs";
import { failureRecord } from "../render";
import { failure, isSuccess, success } from "../result";

export const MEMORY_VIEWS = ["memory", "swap"] as const;

export type MemoryView = (typeof MEMORY_VIEWS)[number];

export interface MemoryUsage {
  view: MemoryView;
  total: number;
  used: number;
  free: number;
  /** Extra tooltip rows, already in bytes */
  details: Record<string, number>;
}

export type MeminfoReader = (signal: AbortSignal) => Promise<string>;

export const readMeminfo: MeminfoReader = (signal) => readFile("/proc/meminfo", { encoding: "utf-8", signal });

/**
 * Parses `/proc/meminfo` ("Key:   12345 kB") into bytes.
 */
export function parseMeminfo(contents: string): Record<string, number> {
  const values: Record<string, number> = {};
  for (const line of contents.split("\n")) {
    const match = line.match(/^(\w+(?:\(\w+\))?):\s+(\d+)(?:\s*kB)?$/);
    if (match) {
      values[match[1]] = parseInt(match[2], 10) * 1024;
    }
  }
  return values;
}

export function memoryUsage(view: MemoryView, meminfo: Record<string, number>): MemoryUsage {
  if (view === "swap") {
    const total = meminfo.SwapTotal ?? 0;
    const free = meminfo.SwapFree ?? 0;
    return { view, total, free, used: total - free, details: { Cached: meminfo.SwapCached ?? 0 } };
  }

  const total = meminfo.MemTotal ?? 0;
  const free = meminfo.MemFree ?? 0;
  const buffers = meminfo.Buffers ?? 0;
  const cached = meminfo.Cached ?? 0;
  return {
    view,
    total,
    free,
    used: total - free - buffers - cached,
    details: {
      Available: meminfo.MemAvailable ?? free,
      Buffers: buffers,
      Cached: cached,
      Shared: meminfo.Shmem ?? 0,
    },
  };
}

function isMemoryView(target: string): target is MemoryView {
  return (MEMORY_VIEWS as readonly string[]).includes(target);
}

export function createMemoryProvider(read: MeminfoReader = readMeminfo): Provider<MemoryUsage> {
  return {
    async fetch(targets, signal) {
      let meminfo: Record<string, number>;
      try {
        meminfo = parseMeminfo(await read(signal));
      } catch (error) {
        const message = `failed to read meminfo: ${describeError(error)}`;
        return targets.map(() => failure<MemoryUsage>(message));
      }

      const updatedAt = new Date();
      return targets.map((target) =>
        isMemoryView(target)
          ? success(memoryUsage(target, meminfo), updatedAt)
          : failure<MemoryUsage>(`unknown view "${target}"`)
      );
    },
  };
}

export function memoryClass(usage: MemoryUsage): StatusClass {
  const usedPercent = percent(usage.used, usage.total);
  if (usedPercent >= CONFIG.MEMORY_CRITICAL_USED_PCT) return "critical";
  if (usedPercent >= CONFIG.MEMORY_WARNING_USED_PCT) return "warning";
  return "success";
}

export function createMemoryRenderer(unit: ByteUnit = "auto"): Renderer<MemoryUsage> {
  return {
    render(result) {
      if (!isSuccess(result)) return failureRecord(result.error);

      const usage = result.payload;
      const title = usage.view === "swap" ? "Swap" : "Memory";
      const rows = alignedRows(
        [
          ["Total", formatBytes(usage.total, unit)],
          ["Used", `${formatBytes(usage.used, unit)} (${percent(usage.used, usage.total)}%)`],
          ["Free", formatBytes(usage.free, unit)],
          ...Object.entries(usage.details).map(([key, value]) => [key, formatBytes(value, unit)] as const),
        ],
        "  "
      );
      const prefix = usage.view === "swap" ? "swap " : "";

      return {
        text: withIcon(GLYPHS.memory, `${prefix}${formatBytes(usage.used, unit)} / ${formatBytes(usage.total, unit)}`),
        class: memoryClass(usage),
        tooltip: tooltipWithFooter([title, ...rows], result.updatedAt),
      };
    },
  };
}

export function createMemoryAgent(options: { unit?: ByteUnit; read?: MeminfoReader } = {}): Agent<MemoryUsage> {
  return {
    name: "memory",
    label: "memory data",
    provider: createMemoryProvider(options.read),
    renderer: createMemoryRenderer(options.unit),
  };
}
