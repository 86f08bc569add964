export const BYTE_UNITS = ["K", "Ki", "M", "Mi", "G", "Gi", "T", "Ti", "P", "Pi", "auto"] as const;

export type ByteUnit = (typeof BYTE_UNITS)[number];

const AUTO_PREFIXES = ["", "Ki", "Mi", "Gi", "Ti", "Pi", "Ei"];
const POWERS: Record<string, number> = { K: 1, M: 2, G: 3, T: 4, P: 5 };

export function isByteUnit(value: string): value is ByteUnit {
  return (BYTE_UNITS as readonly string[]).includes(value);
}

/**
 * Whole numbers print bare, anything else with two decimals.
 */
export function padFloat(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function formatBytes(bytes: number, unit: ByteUnit = "auto"): string {
  if (unit === "auto") {
    let value = bytes;
    for (const prefix of AUTO_PREFIXES) {
      if (Math.abs(value) < 1024) return `${padFloat(value)} ${prefix}B`;
      value /= 1024;
    }
    return `${padFloat(value)} ZiB`;
  }

  const divisor = unit.endsWith("i") ? 1024 : 1000;
  const power = POWERS[unit[0]] ?? 0;
  return `${padFloat(bytes / divisor ** power)} ${unit}B`;
}

export function percent(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 100) : 0;
}

function twoDigits(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${twoDigits(date.getMonth() + 1)}-${twoDigits(date.getDate())}`;
  const time = `${twoDigits(date.getHours())}:${twoDigits(date.getMinutes())}:${twoDigits(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Renders rows as `key : value` with the keys padded to a common width.
 */
export function alignedRows(rows: ReadonlyArray<readonly [string, string | number]>, indent = ""): string[] {
  const width = Math.max(0, ...rows.map(([key]) => key.length));
  return rows.map(([key, value]) => `${indent}${key.padEnd(width)} : ${value}`);
}

/**
 * Joins tooltip lines and appends the "Last updated" footer.
 */
export function tooltipWithFooter(lines: string[], updatedAt: Date): string {
  return [...lines, "", `Last updated ${formatTimestamp(updatedAt)}`].join("\n");
}
