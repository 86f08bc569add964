import type { StatusRecord } from "./config";

export interface Emitter {
  emit(record: StatusRecord): void;
}

export interface LineSink {
  write(chunk: string): unknown;
}

/**
 * One JSON object, keys in `text`, `class`, `tooltip` order; no tooltip key when absent.
 */
export function serializeRecord(record: StatusRecord): string {
  const line: { text: string; class: StatusRecord["class"]; tooltip?: string } = {
    text: record.text,
    class: record.class,
  };
  if (record.tooltip !== undefined) line.tooltip = record.tooltip;
  return JSON.stringify(line);
}

/**
 * Writes each record as a single line. Node writes to files and pipes
 * synchronously on Linux, so the host sees the line as soon as `emit` returns.
 */
export function createEmitter(sink: LineSink = process.stdout): Emitter {
  return {
    emit(record) {
      sink.write(`${serializeRecord(record)}\n`);
    },
  };
}
