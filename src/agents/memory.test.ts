import { describe, expect, it } from "vitest";
import { GLYPHS } from "../glyphs";
import { failure, success } from "../result";
import {
  createMemoryAgent,
  createMemoryProvider,
  createMemoryRenderer,
  memoryClass,
  memoryUsage,
  parseMeminfo,
  type MemoryUsage,
} from "./memory";

const MEMINFO = [
  "MemTotal:       16777216 kB",
  "MemFree:         4194304 kB",
  "MemAvailable:    9437184 kB",
  "Buffers:          524288 kB",
  "Cached:          3670016 kB",
  "SwapCached:        10240 kB",
  "Active(anon):    1048576 kB",
  "Shmem:            262144 kB",
  "SwapTotal:       2097152 kB",
  "SwapFree:        1572864 kB",
  "HugePages_Total:       0",
  "",
].join("\n");

const GiB = 1024 ** 3;
const MiB = 1024 ** 2;
const updatedAt = new Date(2026, 0, 2, 3, 4, 5);

describe("parseMeminfo", () => {
  it("converts kB values to bytes", () => {
    const meminfo = parseMeminfo(MEMINFO);
    expect(meminfo.MemTotal).toBe(16 * GiB);
    expect(meminfo["Active(anon)"]).toBe(GiB);
    expect(meminfo.HugePages_Total).toBe(0);
  });
});

describe("memoryUsage", () => {
  const meminfo = parseMeminfo(MEMINFO);

  it("counts buffers and cache as free memory", () => {
    expect(memoryUsage("memory", meminfo)).toEqual({
      view: "memory",
      total: 16 * GiB,
      used: 8 * GiB,
      free: 4 * GiB,
      details: { Available: 9 * GiB, Buffers: 512 * MiB, Cached: 3.5 * GiB, Shared: 256 * MiB },
    });
  });

  it("reports swap from its own counters", () => {
    expect(memoryUsage("swap", meminfo)).toEqual({
      view: "swap",
      total: 2 * GiB,
      used: 512 * MiB,
      free: 1.5 * GiB,
      details: { Cached: 10 * MiB },
    });
  });

  it("treats missing counters as zero", () => {
    expect(memoryUsage("swap", {})).toEqual({ view: "swap", total: 0, used: 0, free: 0, details: { Cached: 0 } });
  });
});

describe("memory provider", () => {
  it("answers each view from one read", async () => {
    let reads = 0;
    const provider = createMemoryProvider(async () => {
      reads += 1;
      return MEMINFO;
    });

    const results = await provider.fetch(["swap", "memory", "disk"], new AbortController().signal);

    expect(reads).toBe(1);
    expect(results[0]).toMatchObject({ kind: "success", payload: { view: "swap", used: 512 * MiB } });
    expect(results[1]).toMatchObject({ kind: "success", payload: { view: "memory", used: 8 * GiB } });
    expect(results[2]).toEqual(failure('unknown view "disk"'));
  });

  it("fails every view when meminfo cannot be read", async () => {
    const provider = createMemoryProvider(async () => {
      throw new Error("EACCES: permission denied");
    });

    await expect(provider.fetch(["memory", "swap"], new AbortController().signal)).resolves.toEqual([
      failure("failed to read meminfo: EACCES: permission denied"),
      failure("failed to read meminfo: EACCES: permission denied"),
    ]);
  });
});

describe("memoryClass", () => {
  const usage = (used: number): MemoryUsage => ({ view: "memory", total: 100, used, free: 100 - used, details: {} });

  it("grades by used share", () => {
    expect(memoryClass(usage(95))).toBe("critical");
    expect(memoryClass(usage(80))).toBe("warning");
    expect(memoryClass(usage(50))).toBe("success");
  });
});

describe("memory renderer", () => {
  const renderer = createMemoryRenderer();
  const meminfo = parseMeminfo(MEMINFO);

  it("shows used of total memory", () => {
    expect(renderer.render(success(memoryUsage("memory", meminfo), updatedAt), 0)).toEqual({
      text: `${GLYPHS.memory} 8 GiB / 16 GiB`,
      class: "success",
      tooltip: [
        "Memory",
        "  Total     : 16 GiB",
        "  Used      : 8 GiB (50%)",
        "  Free      : 4 GiB",
        "  Available : 9 GiB",
        "  Buffers   : 512 MiB",
        "  Cached    : 3.50 GiB",
        "  Shared    : 256 MiB",
        "",
        "Last updated 2026-01-02 03:04:05",
      ].join("\n"),
    });
  });

  it("prefixes swap", () => {
    const record = renderer.render(success(memoryUsage("swap", meminfo), updatedAt), 1);
    expect(record.text).toBe(`${GLYPHS.memory} swap 512 MiB / 2 GiB`);
    expect(record.tooltip?.split("\n").slice(0, 5)).toEqual([
      "Swap",
      "  Total  : 2 GiB",
      "  Used   : 512 MiB (25%)",
      "  Free   : 1.50 GiB",
      "  Cached : 10 MiB",
    ]);
  });

  it("renders failures as errors", () => {
    expect(renderer.render(failure("failed to read meminfo: EACCES: permission denied"), 0)).toEqual({
      text: `${GLYPHS.alert} failed to read meminfo: EACCES: permission denied`,
      class: "error",
    });
  });

  it("uses the configured unit", () => {
    const record = createMemoryRenderer("Mi").render(success(memoryUsage("swap", meminfo), updatedAt), 1);
    expect(record.text).toBe(`${GLYPHS.memory} swap 512 MiB / 2048 MiB`);
  });
});

describe("createMemoryAgent", () => {
  it("names the agent and what it gathers", () => {
    const agent = createMemoryAgent();
    expect(agent.name).toBe("memory");
    expect(agent.label).toBe("memory data");
  });
});
