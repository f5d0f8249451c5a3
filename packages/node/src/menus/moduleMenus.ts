/**
 * packages/node/src/menus/moduleMenus.ts — Per-module settings menus.
 *
 * Module-specific options are reached through ModuleRegistry.queryAs, never
 * through the engine's capability interface. A chosen toggle becomes a
 * configuration patch for the store. Module actions (clipboard entries) are
 * run on the module by runMenuAction and never touch the configuration.
 */

import type { BarConfig, BarConfigInput, ModuleRegistry } from "@stripbar/core";
import { AppMenuModule } from "../modules/appMenu.js";
import { BatteryModule } from "../modules/battery.js";
import { BluetoothModule } from "../modules/bluetooth.js";
import { ClipboardModule, previewEntry } from "../modules/clipboard.js";
import { ClockModule } from "../modules/clock.js";
import { GpuModule } from "../modules/gpu.js";
import { KeyboardLayoutModule } from "../modules/keyboardLayout.js";
import { MediaModule } from "../modules/media.js";
import { NetworkModule } from "../modules/network.js";
import { SystemInfoModule } from "../modules/systemInfo.js";
import { UptimeModule } from "../modules/uptime.js";
import { VolumeModule } from "../modules/volume.js";
import { WeatherModule } from "../modules/weather.js";

export type MenuItem =
  | Readonly<{ kind: "toggle"; id: string; label: string; checked: boolean }>
  | Readonly<{ kind: "action"; id: string; label: string }>
  | Readonly<{ kind: "separator" }>;

export type ModuleMenu = Readonly<{ moduleId: string; title: string; items: readonly MenuItem[] }>;

export const HIDE_MODULE_ITEM = "module.hide" as const;
export const CLEAR_CLIPBOARD_ITEM = "clipboard.clear" as const;

const CLIPBOARD_ENTRY_PREFIX = "clipboard.entry.";
const CLIPBOARD_LABEL_CHARS = 40;

const SEPARATOR: MenuItem = Object.freeze({ kind: "separator" });

function toggle(id: string, label: string, checked: boolean): MenuItem {
  return { kind: "toggle", id, label, checked };
}

function moduleItems(registry: ModuleRegistry, moduleId: string, config: BarConfig): readonly MenuItem[] {
  const m = config.modules;
  if (registry.queryAs(moduleId, AppMenuModule) !== null) {
    return [toggle("theme.dark", "Dark theme", config.theme === "dark"), toggle("theme.light", "Light theme", config.theme === "light")];
  }
  if (registry.queryAs(moduleId, ClockModule) !== null) {
    return [
      toggle("clock.format24h", "24-hour time", m.clock.format24h),
      toggle("clock.showSeconds", "Show seconds", m.clock.showSeconds),
      toggle("clock.showDate", "Show date", m.clock.showDate),
      toggle("clock.showDay", "Show weekday", m.clock.showDay),
      toggle("clock.center", "Center on bar", m.clock.center),
    ];
  }
  if (registry.queryAs(moduleId, WeatherModule) !== null) {
    return [
      toggle("weather.enabled", "Enabled", m.weather.enabled),
      toggle("weather.showIcon", "Show icon", m.weather.showIcon),
      toggle("weather.unit.celsius", "Celsius", m.weather.unit === "celsius"),
      toggle("weather.unit.fahrenheit", "Fahrenheit", m.weather.unit === "fahrenheit"),
    ];
  }
  if (registry.queryAs(moduleId, VolumeModule) !== null) {
    return [toggle("volume.showPercentage", "Show percentage", m.volume.showPercentage)];
  }
  if (registry.queryAs(moduleId, BatteryModule) !== null) {
    return [toggle("battery.showPercentage", "Show percentage", m.battery.showPercentage)];
  }
  if (registry.queryAs(moduleId, NetworkModule) !== null) {
    return [toggle("network.showName", "Show interface name", m.network.showName)];
  }
  if (registry.queryAs(moduleId, UptimeModule) !== null) {
    return [
      toggle("uptime.compact", "Compact format", m.uptime.compact),
      toggle("uptime.showDays", "Show days", m.uptime.showDays),
    ];
  }
  if (registry.queryAs(moduleId, MediaModule) !== null) {
    return [toggle("media.showNowPlaying", "Show title and artist", m.media.showNowPlaying)];
  }
  if (registry.queryAs(moduleId, KeyboardLayoutModule) !== null) {
    return [toggle("keyboardLayout.showFullName", "Show full name", m.keyboardLayout.showFullName)];
  }
  if (registry.queryAs(moduleId, GpuModule) !== null) {
    return [
      toggle("gpu.showUsage", "Show usage", m.gpu.showUsage),
      toggle("gpu.showMemory", "Show VRAM", m.gpu.showMemory),
      toggle("gpu.showTemperature", "Show temperature", m.gpu.showTemperature),
    ];
  }
  if (registry.queryAs(moduleId, BluetoothModule) !== null) {
    return [
      toggle("bluetooth.showDeviceCount", "Show device count", m.bluetooth.showDeviceCount),
      toggle("bluetooth.showDeviceNames", "Show device names", m.bluetooth.showDeviceNames),
    ];
  }
  const clipboard = registry.queryAs(moduleId, ClipboardModule);
  if (clipboard !== null) {
    const entries: MenuItem[] = clipboard.history.map((text, i) => ({
      kind: "action",
      id: `${CLIPBOARD_ENTRY_PREFIX}${String(i)}`,
      label: previewEntry(text, CLIPBOARD_LABEL_CHARS),
    }));
    if (entries.length > 0) entries.push(SEPARATOR);
    entries.push({ kind: "action", id: CLEAR_CLIPBOARD_ITEM, label: "Clear history" });
    return entries;
  }
  if (registry.queryAs(moduleId, SystemInfoModule) !== null) {
    return [
      toggle("systemInfo.showCpu", "Show CPU", m.systemInfo.showCpu),
      toggle("systemInfo.showMemory", "Show memory", m.systemInfo.showMemory),
    ];
  }
  return [];
}

/** Menu for a module's right-click, or null for an unknown id. */
export function buildModuleMenu(registry: ModuleRegistry, moduleId: string, config: BarConfig): ModuleMenu | null {
  const module = registry.get(moduleId);
  if (module === null) return null;
  const items = [...moduleItems(registry, moduleId, config)];
  if (registry.queryAs(moduleId, AppMenuModule) === null) {
    if (items.length > 0) items.push(SEPARATOR);
    items.push({ kind: "action", id: HIDE_MODULE_ITEM, label: `Hide ${module.name}` });
  }
  return { moduleId, title: module.name, items };
}

function isOffered(menu: ModuleMenu | null, itemId: string): menu is ModuleMenu {
  return menu !== null && menu.items.some((item) => item.kind !== "separator" && item.id === itemId);
}

/**
 * Run a module action from the menu (restore or clear clipboard history).
 * False when the item is not an action of this module's menu.
 */
export function runMenuAction(registry: ModuleRegistry, moduleId: string, itemId: string, config: BarConfig): boolean {
  if (!isOffered(buildModuleMenu(registry, moduleId, config), itemId)) return false;
  const clipboard = registry.queryAs(moduleId, ClipboardModule);
  if (clipboard === null) return false;
  if (itemId === CLEAR_CLIPBOARD_ITEM) {
    clipboard.clear();
    return true;
  }
  if (!itemId.startsWith(CLIPBOARD_ENTRY_PREFIX)) return false;
  return clipboard.restore(Number.parseInt(itemId.slice(CLIPBOARD_ENTRY_PREFIX.length), 10));
}

function withoutId(ids: readonly string[], id: string): readonly string[] {
  return ids.filter((x) => x !== id);
}

function hidePatch(config: BarConfig, moduleId: string): BarConfigInput {
  const s = config.sections;
  return {
    sections: { left: withoutId(s.left, moduleId), center: withoutId(s.center, moduleId), right: withoutId(s.right, moduleId) },
    ...(moduleId === "clock" ? { modules: { clock: { center: false } } } : {}),
  };
}

/**
 * Configuration patch for a chosen menu item. Toggles flip the current
 * value; returns null for an item id this module's menu does not offer.
 */
export function applyMenuSelection(
  registry: ModuleRegistry,
  moduleId: string,
  itemId: string,
  config: BarConfig,
): BarConfigInput | null {
  const menu = buildModuleMenu(registry, moduleId, config);
  if (!isOffered(menu, itemId)) return null;
  if (itemId === HIDE_MODULE_ITEM) return hidePatch(config, moduleId);

  const m = config.modules;
  switch (itemId) {
    case "theme.dark":
      return { theme: "dark" };
    case "theme.light":
      return { theme: "light" };
    case "clock.format24h":
      return { modules: { clock: { format24h: !m.clock.format24h } } };
    case "clock.showSeconds":
      return { modules: { clock: { showSeconds: !m.clock.showSeconds } } };
    case "clock.showDate":
      return { modules: { clock: { showDate: !m.clock.showDate } } };
    case "clock.showDay":
      return { modules: { clock: { showDay: !m.clock.showDay } } };
    case "clock.center":
      return { modules: { clock: { center: !m.clock.center } } };
    case "weather.enabled":
      return { modules: { weather: { enabled: !m.weather.enabled } } };
    case "weather.showIcon":
      return { modules: { weather: { showIcon: !m.weather.showIcon } } };
    case "weather.unit.celsius":
      return { modules: { weather: { unit: "celsius" } } };
    case "weather.unit.fahrenheit":
      return { modules: { weather: { unit: "fahrenheit" } } };
    case "volume.showPercentage":
      return { modules: { volume: { showPercentage: !m.volume.showPercentage } } };
    case "battery.showPercentage":
      return { modules: { battery: { showPercentage: !m.battery.showPercentage } } };
    case "network.showName":
      return { modules: { network: { showName: !m.network.showName } } };
    case "uptime.compact":
      return { modules: { uptime: { compact: !m.uptime.compact } } };
    case "uptime.showDays":
      return { modules: { uptime: { showDays: !m.uptime.showDays } } };
    case "systemInfo.showCpu":
      return { modules: { systemInfo: { showCpu: !m.systemInfo.showCpu } } };
    case "systemInfo.showMemory":
      return { modules: { systemInfo: { showMemory: !m.systemInfo.showMemory } } };
    case "media.showNowPlaying":
      return { modules: { media: { showNowPlaying: !m.media.showNowPlaying } } };
    case "keyboardLayout.showFullName":
      return { modules: { keyboardLayout: { showFullName: !m.keyboardLayout.showFullName } } };
    case "gpu.showUsage":
      return { modules: { gpu: { showUsage: !m.gpu.showUsage } } };
    case "gpu.showMemory":
      return { modules: { gpu: { showMemory: !m.gpu.showMemory } } };
    case "gpu.showTemperature":
      return { modules: { gpu: { showTemperature: !m.gpu.showTemperature } } };
    case "bluetooth.showDeviceCount":
      return { modules: { bluetooth: { showDeviceCount: !m.bluetooth.showDeviceCount } } };
    case "bluetooth.showDeviceNames":
      return { modules: { bluetooth: { showDeviceNames: !m.bluetooth.showDeviceNames } } };
    default:
      return null;
  }
}
