import { readFile } from "fs/promises";
import { setTimeout as sleep } from "timers/promises";
import { CONFIG, type Agent, type Provider, type Renderer } from "../config";
import { describeError } from "../errors";
import { alignedRows, formatBytes, tooltipWithFooter } from "../format";
import { GLYPHS, withIcon } from "../glyphs";
import { failureRecord } from "../render";
import { failure, isSuccess, success } from "../result";

const SYS_CLASS_NET = "/sys/class/net";

export type NetworkThroughput =
  | { state: "disconnected"; name: string }
  | {
      state: "connected";
      name: string;
      address: string;
      /** Bytes per second over the sample */
      received: number;
      transmitted: number;
      /** Counters since the interface came up */
      receivedTotal: number;
      transmittedTotal: number;
    };

export interface NetworkSource {
  read(path: string, signal: AbortSignal): Promise<string>;
  wait(ms: number, signal: AbortSignal): Promise<void>;
}

export const sysfsNetworkSource: NetworkSource = {
  read: (path, signal) => readFile(path, { encoding: "utf-8", signal }),
  wait: async (ms, signal) => {
    await sleep(ms, undefined, { signal });
  },
};

type Snapshot =
  | { kind: "missing" }
  | { kind: "down" }
  | { kind: "up"; address: string; rx: number; tx: number };

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function isInterfaceName(name: string): boolean {
  return name !== "" && name !== "." && name !== ".." && !/[/\s]/.test(name);
}

async function readSnapshot(source: NetworkSource, name: string, signal: AbortSignal): Promise<Snapshot> {
  const base = `${SYS_CLASS_NET}/${name}`;
  try {
    await source.read(`${base}/operstate`, signal);
  } catch (error) {
    if (isMissing(error)) return { kind: "missing" };
    throw error;
  }

  // The kernel refuses to read carrier while the link is administratively down
  let carrier: string;
  try {
    carrier = await source.read(`${base}/carrier`, signal);
  } catch (error) {
    if (signal.aborted) throw error;
    return { kind: "down" };
  }
  if (carrier.trim() !== "1") return { kind: "down" };

  const [address, rx, tx] = await Promise.all([
    source.read(`${base}/address`, signal),
    source.read(`${base}/statistics/rx_bytes`, signal),
    source.read(`${base}/statistics/tx_bytes`, signal),
  ]);
  return { kind: "up", address: address.trim(), rx: parseInt(rx, 10), tx: parseInt(tx, 10) };
}

/**
 * Bytes per second between two counter readings. A counter that went
 * backwards (the interface was reset) counts as idle.
 */
export function byteRate(before: number, after: number, elapsedMs: number): number {
  if (!(elapsedMs > 0) || after < before) return 0;
  return Math.round(((after - before) * 1000) / elapsedMs);
}

/**
 * Samples the byte counters of each interface twice, `CONFIG.NETWORK_SAMPLE_MS` apart.
 */
export function createNetworkProvider(source: NetworkSource = sysfsNetworkSource): Provider<NetworkThroughput> {
  return {
    async fetch(targets, signal) {
      const names = targets.filter(isInterfaceName);
      try {
        const before = new Map<string, Snapshot>();
        for (const name of names) before.set(name, await readSnapshot(source, name, signal));
        await source.wait(CONFIG.NETWORK_SAMPLE_MS, signal);
        const after = new Map<string, Snapshot>();
        for (const name of names) after.set(name, await readSnapshot(source, name, signal));
        const updatedAt = new Date();

        return targets.map((name) => {
          const first = before.get(name);
          const second = after.get(name);
          if (!first || !second) return failure<NetworkThroughput>(`invalid interface "${name}"`);
          if (second.kind === "missing") return failure<NetworkThroughput>(`${name} does not exist`);
          if (second.kind === "down") return success<NetworkThroughput>({ state: "disconnected", name }, updatedAt);

          const sampled = first.kind === "up";
          return success<NetworkThroughput>(
            {
              state: "connected",
              name,
              address: second.address,
              received: sampled ? byteRate(first.rx, second.rx, CONFIG.NETWORK_SAMPLE_MS) : 0,
              transmitted: sampled ? byteRate(first.tx, second.tx, CONFIG.NETWORK_SAMPLE_MS) : 0,
              receivedTotal: second.rx,
              transmittedTotal: second.tx,
            },
            updatedAt
          );
        });
      } catch (error) {
        const message = `failed to sample network: ${describeError(error)}`;
        return targets.map(() => failure<NetworkThroughput>(message));
      }
    },
  };
}

function formatRate(bytesPerSecond: number): string {
  return `${formatBytes(bytesPerSecond)}/s`;
}

export const networkRenderer: Renderer<NetworkThroughput> = {
  render(result) {
    if (!isSuccess(result)) return failureRecord(result.error);

    const usage = result.payload;
    if (usage.state === "disconnected") {
      return { text: withIcon(GLYPHS.networkOff, `${usage.name} disconnected`), class: "error" };
    }

    return {
      text: withIcon(
        GLYPHS.network,
        `${usage.name} ${GLYPHS.arrowDown}${formatRate(usage.received)} ${GLYPHS.arrowUp}${formatRate(usage.transmitted)}`
      ),
      class: "success",
      tooltip: tooltipWithFooter(
        alignedRows([
          ["MAC address", usage.address],
          ["Received", formatBytes(usage.receivedTotal)],
          ["Transmitted", formatBytes(usage.transmittedTotal)],
        ]),
        result.updatedAt
      ),
    };
  },
};

export function createNetworkAgent(options: { source?: NetworkSource } = {}): Agent<NetworkThroughput> {
  return {
    name: "network",
    label: "network data",
    provider: createNetworkProvider(options.source),
    renderer: networkRenderer,
  };
}
