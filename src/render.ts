import type { StatusRecord } from "./config";
import { GLYPHS, withIcon } from "./glyphs";

export function failureRecord(error: string): StatusRecord {
  return { text: withIcon(GLYPHS.alert, error), class: "error" };
}

/**
 * Shown while the first fetch is running.
 */
export function gatheringRecord(label: string): StatusRecord {
  return {
    text: withIcon(GLYPHS.timer, `Gathering ${label}...`),
    class: "loading",
    tooltip: `Gathering ${label}...`,
  };
}

/**
 * Shown when a redraw finds nothing cached yet.
 */
export function pendingRecord(label: string): StatusRecord {
  return { text: withIcon(GLYPHS.timer, `Waiting for ${label}...`), class: "loading" };
}

/**
 * Keeps stale data on screen during a refetch, marked as loading.
 */
export function asLoading(record: StatusRecord): StatusRecord {
  return { ...record, class: "loading" };
}
