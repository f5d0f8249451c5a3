/**
 * STRIPBAR_* environment overrides. The host applies them last, over the
 * defaults and any configuration passed in code.
 */

import { type BarConfigInput, StripbarError, type ThemeName } from "@stripbar/core";

const ENV_BAR_HEIGHT = "STRIPBAR_BAR_HEIGHT" as const;
const ENV_THEME = "STRIPBAR_THEME" as const;
const ENV_ACCENT = "STRIPBAR_ACCENT" as const;
const ENV_LEFT = "STRIPBAR_LEFT" as const;
const ENV_CENTER = "STRIPBAR_CENTER" as const;
const ENV_RIGHT = "STRIPBAR_RIGHT" as const;

function fail(key: string, detail: string): never {
  throw new StripbarError("STRIPBAR_INVALID_CONFIG", `${key} ${detail}`);
}

function parsePositiveInt(key: string, raw: string): number {
  const v = raw.trim();
  if (!/^\d+$/u.test(v)) fail(key, "must be a positive integer");
  const n = Number.parseInt(v, 10);
  if (n <= 0) fail(key, "must be a positive integer");
  return n;
}

function parseTheme(raw: string): ThemeName {
  const v = raw.trim().toLowerCase();
  if (v === "dark" || v === "light") return v;
  return fail(ENV_THEME, `must be "dark" or "light"`);
}

/** Comma-separated module ids. Blank entries are dropped; an empty value means an empty section. */
function parseIdList(raw: string): readonly string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function present(env: NodeJS.ProcessEnv, key: string): string | null {
  const v = env[key];
  return v === undefined ? null : v;
}

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): BarConfigInput {
  const height = present(env, ENV_BAR_HEIGHT);
  const theme = present(env, ENV_THEME);
  const accent = present(env, ENV_ACCENT);
  const left = present(env, ENV_LEFT);
  const center = present(env, ENV_CENTER);
  const right = present(env, ENV_RIGHT);

  const sections = {
    ...(left === null ? {} : { left: parseIdList(left) }),
    ...(center === null ? {} : { center: parseIdList(center) }),
    ...(right === null ? {} : { right: parseIdList(right) }),
  };

  return {
    ...(height === null ? {} : { layout: { barHeight: parsePositiveInt(ENV_BAR_HEIGHT, height) } }),
    ...(theme === null ? {} : { theme: parseTheme(theme) }),
    ...(accent === null || accent.trim() === "" ? {} : { accentColor: accent.trim() }),
    ...(Object.keys(sections).length === 0 ? {} : { sections }),
  };
}
