import { type AsyncBridge, type BarLogger, type BarModule, ModuleRegistry } from "@stripbar/core";
import { type ActiveWindowProbe, ActiveAppModule } from "./activeApp.js";
import { AppMenuModule } from "./appMenu.js";
import { type BatteryProbe, BatteryModule } from "./battery.js";
import { type BluetoothProbe, BluetoothModule } from "./bluetooth.js";
import { type ClipboardBackend, ClipboardModule } from "./clipboard.js";
import { ClockModule } from "./clock.js";
import { type DiskProbe, DiskModule } from "./disk.js";
import { type GpuProbe, GpuModule } from "./gpu.js";
import { type KeyboardLayoutProbe, KeyboardLayoutModule } from "./keyboardLayout.js";
import { type MediaProbe, MediaModule } from "./media.js";
import { type InterfaceTable, NetworkModule } from "./network.js";
import { type NightLightBackend, NightLightModule } from "./nightLight.js";
import { type SystemSampler, SystemInfoModule } from "./systemInfo.js";
import { UptimeModule } from "./uptime.js";
import { type VolumeBackend, VolumeModule } from "./volume.js";
import { type WeatherFetcher, WeatherModule } from "./weather.js";

/** Probe overrides; anything left out uses the real system source. */
export type DefaultModuleSources = Readonly<{
  clock?: () => Date;
  now?: () => number;
  activeWindow?: ActiveWindowProbe;
  battery?: BatteryProbe;
  bluetooth?: BluetoothProbe;
  clipboard?: ClipboardBackend;
  disk?: DiskProbe;
  gpu?: GpuProbe;
  interfaces?: () => InterfaceTable;
  keyboardLayout?: KeyboardLayoutProbe;
  media?: MediaProbe;
  nightLight?: NightLightBackend;
  systemSampler?: SystemSampler;
  uptimeSeconds?: () => number;
  volume?: VolumeBackend;
  weather?: WeatherFetcher;
}>;

export type DefaultRegistryOptions = Readonly<{
  bridge: AsyncBridge;
  logger: BarLogger;
  sources?: DefaultModuleSources;
}>;

export function createDefaultModules(opts: DefaultRegistryOptions): readonly BarModule[] {
  const s = opts.sources ?? {};
  const deps = { bridge: opts.bridge, logger: opts.logger, now: s.now };
  return [
    new AppMenuModule(),
    new ActiveAppModule({ ...deps, probe: s.activeWindow }),
    new ClockModule({ clock: s.clock }),
    new WeatherModule({ ...deps, fetcher: s.weather }),
    new UptimeModule({ uptimeSeconds: s.uptimeSeconds }),
    new SystemInfoModule({ sampler: s.systemSampler, now: s.now }),
    new DiskModule({ ...deps, probe: s.disk }),
    new NetworkModule({ ...deps, interfaces: s.interfaces }),
    new BatteryModule({ ...deps, probe: s.battery }),
    new VolumeModule({ ...deps, backend: s.volume }),
    new MediaModule({ ...deps, probe: s.media }),
    new ClipboardModule({ ...deps, backend: s.clipboard }),
    new KeyboardLayoutModule({ ...deps, probe: s.keyboardLayout }),
    new GpuModule({ ...deps, probe: s.gpu }),
    new BluetoothModule({ ...deps, probe: s.bluetooth }),
    new NightLightModule({ ...deps, backend: s.nightLight }),
  ];
}

/** Registry holding every built-in module, keyed by the ids the default configuration lists. */
export function createDefaultRegistry(opts: DefaultRegistryOptions): ModuleRegistry {
  return new ModuleRegistry({ logger: opts.logger, modules: createDefaultModules(opts) });
}
