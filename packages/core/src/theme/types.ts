import type { Rgb24 } from "../render/style.js";

export type ThemeName = "dark" | "light";

export type BarTheme = Readonly<{
  name: ThemeName;
  background: Rgb24;
  backgroundSecondary: Rgb24;
  textPrimary: Rgb24;
  textSecondary: Rgb24;
  accent: Rgb24;
  hover: Rgb24;
  pressed: Rgb24;
}>;
