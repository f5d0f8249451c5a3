/**
 * packages/core/src/render/style.ts — Color and text styling helpers.
 */

/** Packed RGB color (0x00RRGGBB). */
export type Rgb24 = number;

/** Text styling options understood by every rasterizer. */
export type TextStyle = Readonly<{
  fg: Rgb24;
  bg?: Rgb24 | undefined;
  bold?: boolean | undefined;
  dim?: boolean | undefined;
}>;

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}

export function rgbR(value: Rgb24): number {
  return (value >>> 16) & 0xff;
}

export function rgbG(value: Rgb24): number {
  return (value >>> 8) & 0xff;
}

export function rgbB(value: Rgb24): number {
  return value & 0xff;
}

/** Parse "#rrggbb" (or "rrggbb"). Returns null for anything else. */
export function parseHexColor(raw: string): Rgb24 | null {
  const m = /^#?([0-9a-fA-F]{6})$/u.exec(raw.trim());
  if (m === null || m[1] === undefined) return null;
  return Number.parseInt(m[1], 16);
}
