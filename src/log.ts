import { Console } from "console";
import { appendFileSync } from "fs";
import { describeError } from "./errors";
import { formatTimestamp } from "./format";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  /** Scope printed on every line, usually the agent name */
  name: string;
  debug?: boolean;
  /** Append to this file instead of stderr */
  file?: string;
  /** Overrides both `file` and stderr (used by tests) */
  write?: (line: string) => void;
}

/**
 * Stdout belongs to the bar host, so log lines go to stderr or a file.
 */
export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? consoleWriter(options.file);

  const log = (level: LogLevel, message: string): void => {
    if (level === "debug" && !options.debug) return;
    write(`${formatTimestamp(new Date())} [${level.toUpperCase()}] ${options.name} - ${message}`);
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message, error) =>
      log("error", error === undefined ? message : `${message}: ${describeError(error)}`),
  };
}

/**
 * File lines are appended synchronously so nothing is lost when the agent
 * calls `process.exit`.
 */
function consoleWriter(file: string | undefined): (line: string) => void {
  if (file) {
    return (line) => appendFileSync(file, `${line}\n`);
  }
  const output = new Console({ stdout: process.stderr, stderr: process.stderr });
  return (line) => output.log(line);
}
