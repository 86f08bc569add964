import { describe, expect, it } from "vitest";
import { GLYPHS } from "../glyphs";
import { failure, success } from "../result";
import {
  byteRate,
  createNetworkAgent,
  createNetworkProvider,
  isInterfaceName,
  networkRenderer,
  type NetworkSource,
} from "./network";

const updatedAt = new Date(2026, 0, 2, 3, 4, 5);

function fsError(code: string, path: string): Error {
  return Object.assign(new Error(`${code}: open '${path}'`), { code });
}

/**
 * Serves `before` until the provider waits, then `after`.
 */
function fakeSysfs(before: Record<string, string>, after: Record<string, string> = before) {
  let files = before;
  const reads: string[] = [];
  const waits: number[] = [];
  const source: NetworkSource = {
    read: async (path) => {
      reads.push(path);
      const contents = files[path];
      if (contents === undefined) throw fsError("ENOENT", path);
      return contents;
    },
    wait: async (ms) => {
      waits.push(ms);
      files = after;
    },
  };
  return { source, reads, waits };
}

function eth0(rx: number, tx: number, carrier = "1\n"): Record<string, string> {
  return {
    "/sys/class/net/eth0/operstate": "up\n",
    "/sys/class/net/eth0/carrier": carrier,
    "/sys/class/net/eth0/address": "aa:bb:cc:dd:ee:ff\n",
    "/sys/class/net/eth0/statistics/rx_bytes": `${rx}\n`,
    "/sys/class/net/eth0/statistics/tx_bytes": `${tx}\n`,
  };
}

describe("byteRate", () => {
  it("scales the counter delta to one second", () => {
    expect(byteRate(100, 2100, 2000)).toBe(1000);
  });

  it("treats a counter that went backwards as idle", () => {
    expect(byteRate(500, 100, 1000)).toBe(0);
  });
});

describe("isInterfaceName", () => {
  it("rejects names that would leave /sys/class/net", () => {
    expect(isInterfaceName("wlp3s0")).toBe(true);
    expect(isInterfaceName("..")).toBe(false);
    expect(isInterfaceName("eth0/../..")).toBe(false);
    expect(isInterfaceName("")).toBe(false);
  });
});

describe("network provider", () => {
  it("samples the counters twice and reports bytes per second", async () => {
    const sysfs = fakeSysfs(eth0(1000, 500), eth0(4072, 1012));

    const results = await createNetworkProvider(sysfs.source).fetch(["eth0"], new AbortController().signal);

    expect(sysfs.waits).toEqual([1000]);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      kind: "success",
      payload: {
        state: "connected",
        name: "eth0",
        address: "aa:bb:cc:dd:ee:ff",
        received: 3072,
        transmitted: 512,
        receivedTotal: 4072,
        transmittedTotal: 1012,
      },
    });
  });

  it("reports a missing interface by name", async () => {
    const sysfs = fakeSysfs(eth0(0, 0));

    const results = await createNetworkProvider(sysfs.source).fetch(["eth0", "wlan9"], new AbortController().signal);

    expect(results[0]).toMatchObject({ kind: "success", payload: { state: "connected", received: 0 } });
    expect(results[1]).toEqual(failure("wlan9 does not exist"));
  });

  it("reports an interface without carrier as disconnected", async () => {
    const sysfs = fakeSysfs(eth0(0, 0, "0\n"));

    const results = await createNetworkProvider(sysfs.source).fetch(["eth0"], new AbortController().signal);

    expect(results[0]).toMatchObject({ kind: "success", payload: { state: "disconnected", name: "eth0" } });
    expect(sysfs.reads).not.toContain("/sys/class/net/eth0/statistics/rx_bytes");
  });

  it("reports an interface whose carrier cannot be read as disconnected", async () => {
    const files = eth0(0, 0);
    const source: NetworkSource = {
      read: async (path) => {
        if (path.endsWith("/carrier")) throw fsError("EINVAL", path);
        return files[path] ?? "";
      },
      wait: async () => undefined,
    };

    const results = await createNetworkProvider(source).fetch(["eth0"], new AbortController().signal);

    expect(results[0]).toMatchObject({ kind: "success", payload: { state: "disconnected" } });
  });

  it("reads nothing for an invalid interface name", async () => {
    const sysfs = fakeSysfs(eth0(0, 0));

    const results = await createNetworkProvider(sysfs.source).fetch(["../eth0"], new AbortController().signal);

    expect(results).toEqual([failure('invalid interface "../eth0"')]);
    expect(sysfs.reads).toEqual([]);
  });

  it("fails every target when the sample is aborted", async () => {
    const sysfs = fakeSysfs(eth0(0, 0));
    const source: NetworkSource = {
      read: sysfs.source.read,
      wait: async () => {
        throw new Error("The operation was aborted");
      },
    };

    const results = await createNetworkProvider(source).fetch(["eth0", "wlan0"], new AbortController().signal);

    expect(results).toEqual([
      failure("failed to sample network: The operation was aborted"),
      failure("failed to sample network: The operation was aborted"),
    ]);
  });
});

describe("network renderer", () => {
  it("shows receive and transmit rates", () => {
    const result = success(
      {
        state: "connected" as const,
        name: "eth0",
        address: "aa:bb:cc:dd:ee:ff",
        received: 3072,
        transmitted: 512,
        receivedTotal: 4072,
        transmittedTotal: 1012,
      },
      updatedAt
    );

    expect(networkRenderer.render(result, 0)).toEqual({
      text: `${GLYPHS.network} eth0 ${GLYPHS.arrowDown}3 KiB/s ${GLYPHS.arrowUp}512 B/s`,
      class: "success",
      tooltip: [
        "MAC address : aa:bb:cc:dd:ee:ff",
        "Received    : 3.98 KiB",
        "Transmitted : 1012 B",
        "",
        "Last updated 2026-01-02 03:04:05",
      ].join("\n"),
    });
  });

  it("shows a disconnected interface as an error", () => {
    expect(networkRenderer.render(success({ state: "disconnected" as const, name: "wlan0" }, updatedAt), 1)).toEqual({
      text: `${GLYPHS.networkOff} wlan0 disconnected`,
      class: "error",
    });
  });

  it("renders failures as errors", () => {
    expect(networkRenderer.render(failure("wlan9 does not exist"), 0)).toEqual({
      text: `${GLYPHS.alert} wlan9 does not exist`,
      class: "error",
    });
  });
});

describe("createNetworkAgent", () => {
  it("names the agent and what it gathers", () => {
    const agent = createNetworkAgent({ source: fakeSysfs({}).source });
    expect(agent.name).toBe("network");
    expect(agent.label).toBe("network data");
  });
});
