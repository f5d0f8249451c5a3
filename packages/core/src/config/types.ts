/**
 * packages/core/src/config/types.ts — Configuration snapshot types.
 *
 * A BarConfig is immutable. Every change (including a drag reorder) produces a
 * new snapshot from the config store; the runtime only ever reads them.
 */

import type { ThemeName } from "../theme/types.js";

export type LayoutOptions = Readonly<{
  /** Bar height in pixels. */
  barHeight: number;
  /** Distance between the bar edge and the first/last item. */
  margin: number;
  /** Horizontal padding inside each item, applied on both sides. */
  itemPadding: number;
  /** Gap between neighbouring items. */
  itemSpacing: number;
  /** Horizontal pointer travel (px) before a press becomes a drag. */
  dragThreshold: number;
}>;

export type SectionOrder = Readonly<{
  left: readonly string[];
  center: readonly string[];
  right: readonly string[];
}>;

export type ClockOptions = Readonly<{
  format24h: boolean;
  showSeconds: boolean;
  showDate: boolean;
  showDay: boolean;
  /** Move the clock into the center section regardless of the configured lists. */
  center: boolean;
}>;

export type TemperatureUnit = "celsius" | "fahrenheit";

export type WeatherOptions = Readonly<{
  enabled: boolean;
  unit: TemperatureUnit;
  showIcon: boolean;
  latitude: number | null;
  longitude: number | null;
  locationName: string;
  refreshMinutes: number;
}>;

export type NetworkOptions = Readonly<{ showName: boolean }>;
export type BatteryOptions = Readonly<{ showPercentage: boolean }>;
export type VolumeOptions = Readonly<{ showPercentage: boolean; scrollStep: number }>;
export type UptimeOptions = Readonly<{ compact: boolean; showDays: boolean }>;
export type SystemInfoOptions = Readonly<{ showCpu: boolean; showMemory: boolean }>;
export type DiskOptions = Readonly<{ path: string; refreshSeconds: number }>;
export type MediaOptions = Readonly<{
  /** Title and artist after the playback icon. */
  showNowPlaying: boolean;
  maxTitleLength: number;
}>;
export type KeyboardLayoutOptions = Readonly<{ showFullName: boolean }>;
export type GpuOptions = Readonly<{ showUsage: boolean; showMemory: boolean; showTemperature: boolean }>;
export type BluetoothOptions = Readonly<{ showDeviceCount: boolean; showDeviceNames: boolean }>;
/** History kept by the clipboard module, newest first. */
export type ClipboardOptions = Readonly<{ maxEntries: number }>;

export type ModulesOptions = Readonly<{
  clock: ClockOptions;
  weather: WeatherOptions;
  network: NetworkOptions;
  battery: BatteryOptions;
  volume: VolumeOptions;
  uptime: UptimeOptions;
  systemInfo: SystemInfoOptions;
  disk: DiskOptions;
  media: MediaOptions;
  keyboardLayout: KeyboardLayoutOptions;
  gpu: GpuOptions;
  bluetooth: BluetoothOptions;
  clipboard: ClipboardOptions;
}>;

export type BarConfig = Readonly<{
  layout: LayoutOptions;
  sections: SectionOrder;
  /** Reserved pixel widths per module id (anti-jitter). */
  fixedWidths: Readonly<Record<string, number>>;
  theme: ThemeName;
  accentColor: string | null;
  modules: ModulesOptions;
}>;

/** Partial input accepted by resolveBarConfig and ConfigStore.update. */
export type BarConfigInput = Readonly<{
  layout?: Partial<LayoutOptions>;
  sections?: Partial<SectionOrder>;
  fixedWidths?: Readonly<Record<string, number>>;
  theme?: ThemeName;
  accentColor?: string | null;
  modules?: Readonly<{ [K in keyof ModulesOptions]?: Partial<ModulesOptions[K]> }>;
}>;
