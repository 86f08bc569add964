import type { StatusRecord } from "./config";
import type { Emitter } from "./emitter";
import { createLogger, type Logger } from "./log";

/**
 * Lets queued promise callbacks run. Works under fake timers.
 */
export async function settle(rounds = 100): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

export interface RecordingEmitter extends Emitter {
  records: StatusRecord[];
}

export function recordingEmitter(): RecordingEmitter {
  const records: StatusRecord[] = [];
  return {
    records,
    emit(record) {
      records.push(record);
    },
  };
}

export interface RecordingLogger extends Logger {
  lines: string[];
  /** Lines without the leading timestamp */
  entries(): string[];
}

export function recordingLogger(name = "test"): RecordingLogger {
  const lines: string[] = [];
  const logger = createLogger({ name, debug: true, write: (line) => lines.push(line) });
  return {
    ...logger,
    lines,
    entries: () => lines.map((line) => line.slice("YYYY-MM-DD HH:MM:SS ".length)),
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
