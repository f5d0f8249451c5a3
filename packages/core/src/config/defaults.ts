import type { BarConfig } from "./types.js";

/** Default configuration values. */
export const DEFAULT_BAR_CONFIG: BarConfig = Object.freeze({
  layout: Object.freeze({
    barHeight: 34,
    margin: 8,
    itemPadding: 8,
    itemSpacing: 4,
    dragThreshold: 6,
  }),
  sections: Object.freeze({
    left: Object.freeze(["app_menu", "active_app"]),
    center: Object.freeze([]),
    right: Object.freeze([
      "weather",
      "media",
      "clipboard",
      "keyboard_layout",
      "gpu",
      "system_info",
      "disk",
      "network",
      "bluetooth",
      "volume",
      "battery",
      "uptime",
      "clock",
    ]),
  }),
  fixedWidths: Object.freeze({}),
  theme: "dark",
  accentColor: null,
  modules: Object.freeze({
    clock: Object.freeze({
      format24h: false,
      showSeconds: false,
      showDate: true,
      showDay: true,
      center: false,
    }),
    weather: Object.freeze({
      enabled: false,
      unit: "celsius",
      showIcon: true,
      latitude: null,
      longitude: null,
      locationName: "",
      refreshMinutes: 30,
    }),
    network: Object.freeze({ showName: false }),
    battery: Object.freeze({ showPercentage: true }),
    volume: Object.freeze({ showPercentage: true, scrollStep: 2 }),
    uptime: Object.freeze({ compact: true, showDays: true }),
    systemInfo: Object.freeze({ showCpu: true, showMemory: true }),
    disk: Object.freeze({ path: "/", refreshSeconds: 30 }),
    media: Object.freeze({ showNowPlaying: true, maxTitleLength: 30 }),
    keyboardLayout: Object.freeze({ showFullName: false }),
    gpu: Object.freeze({ showUsage: true, showMemory: true, showTemperature: true }),
    bluetooth: Object.freeze({ showDeviceCount: true, showDeviceNames: false }),
    clipboard: Object.freeze({ maxEntries: 10 }),
  }),
});
