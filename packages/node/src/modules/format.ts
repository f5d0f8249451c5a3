const KIB = 1024;
const UNITS = ["KB", "MB", "GB", "TB"] as const;

/** Binary-prefixed size with one decimal ("1.5 GB"); plain bytes below 1 KiB. */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";
  if (bytes < KIB) return `${String(Math.floor(bytes))} B`;
  let value = bytes / KIB;
  let unit = 0;
  while (value >= KIB && unit < UNITS.length - 1) {
    value /= KIB;
    unit++;
  }
  return `${value.toFixed(1)} ${UNITS[unit] ?? "TB"}`;
}

/** Cut to `maxChars` code points, the last one replaced by an ellipsis. */
export function truncateText(text: string, maxChars: number): string {
  const chars = [...text];
  if (chars.length <= maxChars) return text;
  if (maxChars <= 0) return "";
  return `${chars.slice(0, maxChars - 1).join("")}…`;
}

export function plural(n: number, one: string, many: string): string {
  return `${String(n)} ${n === 1 ? one : many}`;
}

export function clampPercent(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return Math.min(100, Math.max(0, v));
}
