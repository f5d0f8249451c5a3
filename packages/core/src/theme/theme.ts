/**
 * packages/core/src/theme/theme.ts — Bar palettes.
 */

import { parseHexColor, rgb } from "../render/style.js";
import type { BarTheme, ThemeName } from "./types.js";
export type { BarTheme, ThemeName } from "./types.js";

export const darkTheme: BarTheme = Object.freeze({
  name: "dark",
  background: rgb(28, 28, 30),
  backgroundSecondary: rgb(44, 44, 46),
  textPrimary: rgb(242, 242, 247),
  textSecondary: rgb(152, 152, 157),
  accent: rgb(10, 132, 255),
  hover: rgb(58, 58, 60),
  pressed: rgb(72, 72, 74),
});

export const lightTheme: BarTheme = Object.freeze({
  name: "light",
  background: rgb(246, 246, 246),
  backgroundSecondary: rgb(229, 229, 234),
  textPrimary: rgb(28, 28, 30),
  textSecondary: rgb(99, 99, 102),
  accent: rgb(0, 122, 255),
  hover: rgb(209, 209, 214),
  pressed: rgb(199, 199, 204),
});

export function resolveTheme(name: ThemeName, accentHex?: string | null): BarTheme {
  const base = name === "light" ? lightTheme : darkTheme;
  if (accentHex === undefined || accentHex === null) return base;
  const accent = parseHexColor(accentHex);
  if (accent === null) return base;
  return Object.freeze({ ...base, accent });
}
