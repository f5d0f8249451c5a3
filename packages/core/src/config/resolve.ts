/**
 * packages/core/src/config/resolve.ts — Defaults, validation and section resolution.
 *
 * resolveBarConfig() is the only way a BarConfig is built: it merges a partial
 * input over a base snapshot, validates every value and freezes the result.
 * Invalid values throw STRIPBAR_INVALID_CONFIG; unknown module ids are not a
 * config error (the layout skips them).
 */

import { invalidConfig } from "../errors.js";
import type { Section } from "../layout/types.js";
import type { ThemeName } from "../theme/types.js";
import { DEFAULT_BAR_CONFIG } from "./defaults.js";
import type {
  BarConfig,
  BarConfigInput,
  ClockOptions,
  DiskOptions,
  LayoutOptions,
  MediaOptions,
  ModulesOptions,
  SectionOrder,
  TemperatureUnit,
  VolumeOptions,
  WeatherOptions,
} from "./types.js";

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidConfig(`${name} must be a positive integer`);
  return v;
}

function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidConfig(`${name} must be a non-negative integer`);
  return v;
}

function requireBoolean(name: string, v: unknown): boolean {
  if (typeof v !== "boolean") invalidConfig(`${name} must be a boolean`);
  return v;
}

function requireIdList(name: string, v: unknown): readonly string[] {
  if (!Array.isArray(v)) invalidConfig(`${name} must be an array of module ids`);
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== "string" || item.length === 0) {
      invalidConfig(`${name} must only contain non-empty strings`);
    }
    out.push(item);
  }
  return Object.freeze(out);
}

function requireTheme(v: unknown): ThemeName {
  if (v !== "dark" && v !== "light") invalidConfig(`theme must be "dark" or "light"`);
  return v;
}

function requireUnit(v: unknown): TemperatureUnit {
  if (v !== "celsius" && v !== "fahrenheit") {
    invalidConfig(`modules.weather.unit must be "celsius" or "fahrenheit"`);
  }
  return v;
}

function requireCoordinate(name: string, v: number | null, limit: number): number | null {
  if (v === null) return null;
  if (!Number.isFinite(v) || Math.abs(v) > limit) {
    invalidConfig(`${name} must be null or a number within ±${String(limit)}`);
  }
  return v;
}

function resolveLayout(base: LayoutOptions, input: Partial<LayoutOptions> | undefined): LayoutOptions {
  const merged = { ...base, ...(input ?? {}) };
  return Object.freeze({
    barHeight: requirePositiveInt("layout.barHeight", merged.barHeight),
    margin: requireNonNegativeInt("layout.margin", merged.margin),
    itemPadding: requireNonNegativeInt("layout.itemPadding", merged.itemPadding),
    itemSpacing: requireNonNegativeInt("layout.itemSpacing", merged.itemSpacing),
    dragThreshold: requireNonNegativeInt("layout.dragThreshold", merged.dragThreshold),
  });
}

function resolveSections(base: SectionOrder, input: Partial<SectionOrder> | undefined): SectionOrder {
  return Object.freeze({
    left: requireIdList("sections.left", input?.left ?? base.left),
    center: requireIdList("sections.center", input?.center ?? base.center),
    right: requireIdList("sections.right", input?.right ?? base.right),
  });
}

function resolveFixedWidths(
  base: Readonly<Record<string, number>>,
  input: Readonly<Record<string, number>> | undefined,
): Readonly<Record<string, number>> {
  const merged: Record<string, number> = { ...base, ...(input ?? {}) };
  for (const [id, width] of Object.entries(merged)) {
    requirePositiveInt(`fixedWidths.${id}`, width);
  }
  return Object.freeze(merged);
}

function resolveClock(base: ClockOptions, input: Partial<ClockOptions> | undefined): ClockOptions {
  const m = { ...base, ...(input ?? {}) };
  return Object.freeze({
    format24h: requireBoolean("modules.clock.format24h", m.format24h),
    showSeconds: requireBoolean("modules.clock.showSeconds", m.showSeconds),
    showDate: requireBoolean("modules.clock.showDate", m.showDate),
    showDay: requireBoolean("modules.clock.showDay", m.showDay),
    center: requireBoolean("modules.clock.center", m.center),
  });
}

function resolveWeather(
  base: WeatherOptions,
  input: Partial<WeatherOptions> | undefined,
): WeatherOptions {
  const m = { ...base, ...(input ?? {}) };
  if (typeof m.locationName !== "string") invalidConfig("modules.weather.locationName must be a string");
  return Object.freeze({
    enabled: requireBoolean("modules.weather.enabled", m.enabled),
    unit: requireUnit(m.unit),
    showIcon: requireBoolean("modules.weather.showIcon", m.showIcon),
    latitude: requireCoordinate("modules.weather.latitude", m.latitude, 90),
    longitude: requireCoordinate("modules.weather.longitude", m.longitude, 180),
    locationName: m.locationName,
    refreshMinutes: requirePositiveInt("modules.weather.refreshMinutes", m.refreshMinutes),
  });
}

function resolveVolume(base: VolumeOptions, input: Partial<VolumeOptions> | undefined): VolumeOptions {
  const m = { ...base, ...(input ?? {}) };
  return Object.freeze({
    showPercentage: requireBoolean("modules.volume.showPercentage", m.showPercentage),
    scrollStep: requirePositiveInt("modules.volume.scrollStep", m.scrollStep),
  });
}

function resolveDisk(base: DiskOptions, input: Partial<DiskOptions> | undefined): DiskOptions {
  const m = { ...base, ...(input ?? {}) };
  if (typeof m.path !== "string" || m.path.length === 0) {
    invalidConfig("modules.disk.path must be a non-empty string");
  }
  return Object.freeze({
    path: m.path,
    refreshSeconds: requirePositiveInt("modules.disk.refreshSeconds", m.refreshSeconds),
  });
}

function resolveMedia(base: MediaOptions, input: Partial<MediaOptions> | undefined): MediaOptions {
  const m = { ...base, ...(input ?? {}) };
  return Object.freeze({
    showNowPlaying: requireBoolean("modules.media.showNowPlaying", m.showNowPlaying),
    maxTitleLength: requirePositiveInt("modules.media.maxTitleLength", m.maxTitleLength),
  });
}

function resolveModules(base: ModulesOptions, input: BarConfigInput["modules"]): ModulesOptions {
  const network = { ...base.network, ...(input?.network ?? {}) };
  const battery = { ...base.battery, ...(input?.battery ?? {}) };
  const uptime = { ...base.uptime, ...(input?.uptime ?? {}) };
  const systemInfo = { ...base.systemInfo, ...(input?.systemInfo ?? {}) };
  const keyboardLayout = { ...base.keyboardLayout, ...(input?.keyboardLayout ?? {}) };
  const gpu = { ...base.gpu, ...(input?.gpu ?? {}) };
  const bluetooth = { ...base.bluetooth, ...(input?.bluetooth ?? {}) };
  const clipboard = { ...base.clipboard, ...(input?.clipboard ?? {}) };
  return Object.freeze({
    clock: resolveClock(base.clock, input?.clock),
    weather: resolveWeather(base.weather, input?.weather),
    network: Object.freeze({
      showName: requireBoolean("modules.network.showName", network.showName),
    }),
    battery: Object.freeze({
      showPercentage: requireBoolean("modules.battery.showPercentage", battery.showPercentage),
    }),
    volume: resolveVolume(base.volume, input?.volume),
    uptime: Object.freeze({
      compact: requireBoolean("modules.uptime.compact", uptime.compact),
      showDays: requireBoolean("modules.uptime.showDays", uptime.showDays),
    }),
    systemInfo: Object.freeze({
      showCpu: requireBoolean("modules.systemInfo.showCpu", systemInfo.showCpu),
      showMemory: requireBoolean("modules.systemInfo.showMemory", systemInfo.showMemory),
    }),
    disk: resolveDisk(base.disk, input?.disk),
    media: resolveMedia(base.media, input?.media),
    keyboardLayout: Object.freeze({
      showFullName: requireBoolean("modules.keyboardLayout.showFullName", keyboardLayout.showFullName),
    }),
    gpu: Object.freeze({
      showUsage: requireBoolean("modules.gpu.showUsage", gpu.showUsage),
      showMemory: requireBoolean("modules.gpu.showMemory", gpu.showMemory),
      showTemperature: requireBoolean("modules.gpu.showTemperature", gpu.showTemperature),
    }),
    bluetooth: Object.freeze({
      showDeviceCount: requireBoolean("modules.bluetooth.showDeviceCount", bluetooth.showDeviceCount),
      showDeviceNames: requireBoolean("modules.bluetooth.showDeviceNames", bluetooth.showDeviceNames),
    }),
    clipboard: Object.freeze({
      maxEntries: requirePositiveInt("modules.clipboard.maxEntries", clipboard.maxEntries),
    }),
  });
}

/** Apply `input` over `base` (defaults when omitted), validating all values. */
export function resolveBarConfig(
  input?: BarConfigInput,
  base: BarConfig = DEFAULT_BAR_CONFIG,
): BarConfig {
  if (!input) return base;
  const accentColor = input.accentColor === undefined ? base.accentColor : input.accentColor;
  if (accentColor !== null && typeof accentColor !== "string") {
    invalidConfig("accentColor must be a string or null");
  }
  return Object.freeze({
    layout: resolveLayout(base.layout, input.layout),
    sections: resolveSections(base.sections, input.sections),
    fixedWidths: resolveFixedWidths(base.fixedWidths, input.fixedWidths),
    theme: requireTheme(input.theme ?? base.theme),
    accentColor,
    modules: resolveModules(base.modules, input.modules),
  });
}

export type ResolvedSections = Readonly<{
  order: SectionOrder;
  /** Ids dropped because they already appeared in an earlier section. */
  duplicates: readonly string[];
}>;

/**
 * Final per-section id lists for a snapshot.
 *
 * - `modules.clock.center` moves "clock" to the end of the center list.
 * - An id listed in more than one section keeps its first occurrence
 *   (left, then center, then right); later ones are reported as duplicates.
 */
export function resolveSectionOrder(config: BarConfig): ResolvedSections {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  const clockCentered = config.modules.clock.center;

  const take = (section: Section, ids: readonly string[]): readonly string[] => {
    const out: string[] = [];
    for (const id of ids) {
      if (clockCentered && id === "clock" && section !== "center") continue;
      if (seen.has(id)) {
        duplicates.push(id);
        continue;
      }
      seen.add(id);
      out.push(id);
    }
    return out;
  };

  const left = take("left", config.sections.left);
  const centerIds =
    clockCentered && !config.sections.center.includes("clock")
      ? [...config.sections.center, "clock"]
      : config.sections.center;
  const center = take("center", centerIds);
  const right = take("right", config.sections.right);

  return Object.freeze({
    order: Object.freeze({
      left: Object.freeze(left),
      center: Object.freeze(center),
      right: Object.freeze(right),
    }),
    duplicates: Object.freeze(duplicates),
  });
}
