import { cpus, loadavg, type CpuInfo } from "os";
import { setTimeout as sleep } from "timers/promises";
import { CONFIG, type Agent, type Provider, type Renderer, type StatusClass } from "../config";
import { describeError } from "../errors";
import { alignedRows, padFloat, tooltipWithFooter } from "../format";
import { GLYPHS, withIcon } from "../glyphs";
import { failureRecord } from "../render";
import { failure, isSuccess, success } from "../result";

export const CPU_VIEWS = ["usage", "load"] as const;

export type CpuUsage =
  | { view: "usage"; model: string; cores: number; user: number; system: number; idle: number }
  | { view: "load"; cores: number; load1: number; load5: number; load15: number };

export interface CpuSource {
  cpus(): CpuInfo[];
  loadavg(): number[];
  wait(ms: number, signal: AbortSignal): Promise<void>;
}

export const osCpuSource: CpuSource = {
  cpus,
  loadavg,
  wait: async (ms, signal) => {
    await sleep(ms, undefined, { signal });
  },
};

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Percent of time spent in user, system and idle between two `os.cpus()` snapshots.
 */
export function cpuPercentages(before: CpuInfo[], after: CpuInfo[]) {
  const sum = (snapshot: CpuInfo[], key: keyof CpuInfo["times"]): number =>
    snapshot.reduce((total, cpu) => total + cpu.times[key], 0);

  const delta = (key: keyof CpuInfo["times"]): number => sum(after, key) - sum(before, key);
  const user = delta("user") + delta("nice");
  const system = delta("sys") + delta("irq");
  const idle = delta("idle");
  const total = user + system + idle;

  if (total <= 0) return { user: 0, system: 0, idle: 100 };
  return {
    user: round((user / total) * 100),
    system: round((system / total) * 100),
    idle: round((idle / total) * 100),
  };
}

export function createCpuProvider(source: CpuSource = osCpuSource): Provider<CpuUsage> {
  return {
    async fetch(targets, signal) {
      try {
        const before = source.cpus();
        await source.wait(CONFIG.CPU_SAMPLE_MS, signal);
        const after = source.cpus();
        const [load1 = 0, load5 = 0, load15 = 0] = source.loadavg();
        const cores = after.length;
        const updatedAt = new Date();

        return targets.map((target) => {
          if (target === "usage") {
            const model = after[0]?.model.trim() || "Unknown";
            return success<CpuUsage>({ view: "usage", model, cores, ...cpuPercentages(before, after) }, updatedAt);
          }
          if (target === "load") {
            return success<CpuUsage>({ view: "load", cores, load1, load5, load15 }, updatedAt);
          }
          return failure<CpuUsage>(`unknown view "${target}"`);
        });
      } catch (error) {
        const message = `failed to sample CPU: ${describeError(error)}`;
        return targets.map(() => failure<CpuUsage>(message));
      }
    },
  };
}

export function cpuClass(usage: CpuUsage): StatusClass {
  const busy = usage.view === "usage" ? 100 - usage.idle : (usage.load1 / Math.max(usage.cores, 1)) * 100;
  if (busy >= CONFIG.CPU_CRITICAL_BUSY_PCT) return "critical";
  if (busy >= CONFIG.CPU_WARNING_BUSY_PCT) return "warning";
  return "success";
}

export const cpuRenderer: Renderer<CpuUsage> = {
  render(result) {
    if (!isSuccess(result)) return failureRecord(result.error);

    const usage = result.payload;
    if (usage.view === "usage") {
      return {
        text: withIcon(
          GLYPHS.cpu,
          `user ${padFloat(usage.user)}%, sys ${padFloat(usage.system)}%, idle ${padFloat(usage.idle)}%`
        ),
        class: cpuClass(usage),
        tooltip: tooltipWithFooter(
          alignedRows([
            ["Model", usage.model],
            ["Logical cores", usage.cores],
          ]),
          result.updatedAt
        ),
      };
    }

    return {
      text: withIcon(GLYPHS.cpu, `load ${usage.load1.toFixed(2)} ${usage.load5.toFixed(2)} ${usage.load15.toFixed(2)}`),
      class: cpuClass(usage),
      tooltip: tooltipWithFooter(
        alignedRows([
          ["1 min", usage.load1.toFixed(2)],
          ["5 min", usage.load5.toFixed(2)],
          ["15 min", usage.load15.toFixed(2)],
          ["Per core", (usage.load1 / Math.max(usage.cores, 1)).toFixed(2)],
        ]),
        result.updatedAt
      ),
    };
  },
};

export function createCpuAgent(options: { source?: CpuSource } = {}): Agent<CpuUsage> {
  return {
    name: "cpu",
    label: "CPU data",
    provider: createCpuProvider(options.source),
    renderer: cpuRenderer,
  };
}
