import { Command, InvalidArgumentError } from "commander";
import { createCpuAgent, CPU_VIEWS } from "./agents/cpu";
import { createFilesystemAgent } from "./agents/filesystem";
import { createMemoryAgent, MEMORY_VIEWS } from "./agents/memory";
import { createNetworkAgent, isInterfaceName } from "./agents/network";
import { createQuakesAgent, parseLocation } from "./agents/quakes";
import { CONFIG } from "./config";
import { BYTE_UNITS, isByteUnit, type ByteUnit } from "./format";
import { MAX_TIMER_SECONDS, runAgent, type AgentRunner, type RunOptions } from "./run";

interface FilesystemCliOptions extends RunOptions {
  mountpoint?: string[];
  unit: ByteUnit;
}

interface MemoryCliOptions extends RunOptions {
  view?: string[];
  unit: ByteUnit;
}

interface CpuCliOptions extends RunOptions {
  view?: string[];
}

interface NetworkCliOptions extends RunOptions {
  interface?: string[];
}

interface QuakesCliOptions extends RunOptions {
  location?: string[];
  radius: number;
  limit: number;
  minMagnitude: number;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number.");
  }
  return parsed;
}

/**
 * Seconds for an interval or timeout, capped at what a Node timer can wait.
 */
export function parseSeconds(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (parsed > MAX_TIMER_SECONDS) {
    throw new InvalidArgumentError(`Must be at most ${MAX_TIMER_SECONDS} seconds.`);
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Must be a whole number.");
  }
  return parsed;
}

export function parseMagnitude(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Must be a number.");
  }
  return parsed;
}

export function parseUnit(value: string): ByteUnit {
  if (!isByteUnit(value)) {
    throw new InvalidArgumentError(`Must be one of: ${BYTE_UNITS.join(", ")}.`);
  }
  return value;
}

/**
 * Repeatable option. Starts from `undefined` so a default never gets appended to.
 */
export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function collectChoice(choices: readonly string[]) {
  return (value: string, previous: string[] | undefined): string[] => {
    if (!choices.includes(value)) {
      throw new InvalidArgumentError(`Must be one of: ${choices.join(", ")}.`);
    }
    return collect(value, previous);
  };
}

export function collectInterface(value: string, previous: string[] | undefined): string[] {
  if (!isInterfaceName(value)) {
    throw new InvalidArgumentError("Must be a network interface name.");
  }
  return collect(value, previous);
}

export function collectLocation(value: string, previous: string[] | undefined): string[] {
  if (!parseLocation(value)) {
    throw new InvalidArgumentError('Must be "latitude,longitude".');
  }
  return collect(value, previous);
}

/**
 * Options every agent takes.
 */
function withCommonOptions(command: Command, defaultInterval: number): Command {
  return command
    .option("-i, --interval <seconds>", "seconds between refreshes", parseSeconds, defaultInterval)
    .option("-t, --test", "fetch once, print one line per target and exit", false)
    .option("-d, --debug", "log debug messages", false)
    .option("--timeout <seconds>", "seconds a single fetch may take", parseSeconds, CONFIG.FETCH_TIMEOUT_MS / 1000)
    .option("--log-file <path>", "append log lines to this file instead of stderr")
    .option("--host <process>", "exit once this process is no longer running");
}

export interface ProgramDeps {
  run?: AgentRunner;
  exit?: (code: number) => void;
}

/**
 * Builds the `status-agent` command line. Each subcommand runs one agent.
 */
export function buildProgram(deps: ProgramDeps = {}): Command {
  const run = deps.run ?? runAgent;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  const program = new Command();

  program
    .name("status-agent")
    .description("📊 Status bar agents that print one JSON line per update")
    .version("1.0.0");

  withCommonOptions(
    program
      .command("filesystem")
      .description("Disk usage for one or more mountpoints")
      .option("-m, --mountpoint <path>", "mountpoint to report (repeatable)", collect)
      .option("-u, --unit <unit>", `byte unit (${BYTE_UNITS.join(", ")})`, parseUnit, "auto"),
    CONFIG.DEFAULT_INTERVAL_SECONDS
  ).action(async (options: FilesystemCliOptions) => {
    exit(await run(createFilesystemAgent({ unit: options.unit }), options.mountpoint ?? [], options));
  });

  withCommonOptions(
    program
      .command("memory")
      .description("Memory and swap usage")
      .option("-v, --view <view>", `view to report: ${MEMORY_VIEWS.join(", ")} (repeatable)`, collectChoice(MEMORY_VIEWS))
      .option("-u, --unit <unit>", `byte unit (${BYTE_UNITS.join(", ")})`, parseUnit, "auto"),
    CONFIG.DEFAULT_INTERVAL_SECONDS
  ).action(async (options: MemoryCliOptions) => {
    exit(await run(createMemoryAgent({ unit: options.unit }), options.view ?? [...MEMORY_VIEWS], options));
  });

  withCommonOptions(
    program
      .command("cpu")
      .description("CPU usage and load average")
      .option("-v, --view <view>", `view to report: ${CPU_VIEWS.join(", ")} (repeatable)`, collectChoice(CPU_VIEWS)),
    CONFIG.DEFAULT_INTERVAL_SECONDS
  ).action(async (options: CpuCliOptions) => {
    exit(await run(createCpuAgent(), options.view ?? [...CPU_VIEWS], options));
  });

  withCommonOptions(
    program
      .command("network")
      .description("Throughput of one or more network interfaces")
      .option("-n, --interface <name>", "interface to report (repeatable)", collectInterface),
    CONFIG.DEFAULT_INTERVAL_SECONDS
  ).action(async (options: NetworkCliOptions) => {
    exit(await run(createNetworkAgent(), options.interface ?? [], options));
  });

  withCommonOptions(
    program
      .command("quakes")
      .description("Recent earthquakes near one or more locations")
      .option("-l, --location <lat,lon>", "location to watch (repeatable)", collectLocation)
      .option("-r, --radius <km>", "search radius in km", parsePositiveNumber, CONFIG.QUAKES_DEFAULT_RADIUS_KM)
      .option("--limit <count>", "quakes to list per location", parsePositiveInteger, CONFIG.QUAKES_DEFAULT_LIMIT)
      .option("--min-magnitude <mag>", "smallest magnitude to list", parseMagnitude, CONFIG.QUAKES_DEFAULT_MIN_MAGNITUDE),
    CONFIG.QUAKES_DEFAULT_INTERVAL_SECONDS
  ).action(async (options: QuakesCliOptions) => {
    const agent = createQuakesAgent({
      radiusKm: options.radius,
      limit: options.limit,
      minMagnitude: options.minMagnitude,
    });
    exit(await run(agent, options.location ?? [], options));
  });

  return program;
}
