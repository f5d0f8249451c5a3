/**
 * @stripbar/node
 *
 * Node.js host for the bar: concrete modules, background probes, a
 * terminal-cell rasterizer, pino logging and the timer-driven host loop.
 */

export { type CreateLoggerOptions, createLogger } from "./logger.js";
export { readEnvConfig } from "./config/env.js";

export {
  type GridCell,
  type GridFrame,
  TextGridRasterizer,
  type TextGridRasterizerOptions,
  gridFrameToAnsi,
  gridFrameToText,
} from "./backend/textGridRasterizer.js";
export { clearTextWidthCache, graphemeWidth, measureTextCells } from "./backend/textWidth.js";

export {
  type BackgroundTaskOptions,
  type BackgroundTaskOutcome,
  spawnBackgroundTask,
} from "./workers/backgroundTask.js";

export { type ModuleDeps, PolledModule } from "./modules/polledModule.js";
export { AppMenuModule } from "./modules/appMenu.js";
export { type ActiveWindow, type ActiveWindowProbe, ActiveAppModule, formatActiveApp, xdotoolProbe } from "./modules/activeApp.js";
export { type ClockFormat, ClockModule, formatClock, formatClockTooltip } from "./modules/clock.js";
export {
  type WeatherCondition,
  type WeatherFetcher,
  type WeatherQuery,
  type WeatherReport,
  WeatherModule,
  createOpenMeteoFetcher,
  describeWmoCode,
  formatWeather,
  formatWeatherTooltip,
  parseForecast,
} from "./modules/weather.js";
export { UptimeModule, formatUptime, formatUptimeLong } from "./modules/uptime.js";
export { type SystemSample, type SystemSampler, SystemInfoModule, formatSystemInfo, sampleSystem } from "./modules/systemInfo.js";
export { type DiskProbe, type DiskUsage, DiskModule, statfsProbe } from "./modules/disk.js";
export { type NetworkKind, type NetworkStatus, NetworkModule, classifyInterfaces } from "./modules/network.js";
export { type BatteryProbe, type BatteryStatus, BatteryModule, formatBattery, sysfsBatteryProbe } from "./modules/battery.js";
export {
  MemoryVolumeBackend,
  type VolumeBackend,
  VolumeModule,
  type VolumeState,
  formatVolume,
} from "./modules/volume.js";
export {
  type MediaProbe,
  MediaModule,
  type NowPlaying,
  type PlaybackStatus,
  formatMedia,
  parsePlayerctlLine,
  playerctlProbe,
} from "./modules/media.js";
export {
  type KeyboardLayoutProbe,
  type KeyboardLayouts,
  KeyboardLayoutModule,
  describeLayout,
  formatKeyboardLayout,
  parseXkbQuery,
  setxkbmapProbe,
} from "./modules/keyboardLayout.js";
export {
  type GpuProbe,
  type GpuSample,
  GpuModule,
  defaultGpuProbe,
  formatGpu,
  nvidiaSmiProbe,
  parseNvidiaSmi,
  sysfsGpuProbe,
} from "./modules/gpu.js";
export {
  type BluetoothProbe,
  type BluetoothStatus,
  BluetoothModule,
  bluetoothctlProbe,
  formatBluetooth,
} from "./modules/bluetooth.js";
export {
  type ClipboardBackend,
  ClipboardModule,
  CommandClipboardBackend,
  MemoryClipboardBackend,
  pushHistory,
} from "./modules/clipboard.js";
export { GsettingsNightLightBackend, type NightLightBackend, NightLightModule } from "./modules/nightLight.js";
export {
  type DefaultModuleSources,
  type DefaultRegistryOptions,
  createDefaultModules,
  createDefaultRegistry,
} from "./modules/defaultRegistry.js";

export {
  HIDE_MODULE_ITEM,
  type MenuItem,
  type ModuleMenu,
  applyMenuSelection,
  buildModuleMenu,
  runMenuAction,
} from "./menus/moduleMenus.js";

export { type CommandRunnerOptions, createCommandRunner, openUrlCommand } from "./host/commands.js";
export { type TimerPlan, type TimerPlanInput, computeAlignedDelay, computeTimerPlan } from "./host/timerPlan.js";
export { type NodeBar, type NodeBarOptions, createNodeBar } from "./host/nodeBar.js";
