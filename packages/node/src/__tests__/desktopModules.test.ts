import assert from "node:assert/strict";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import {
  type BarConfig,
  DEFAULT_BAR_CONFIG,
  type ModuleActionContext,
  type ModuleCommand,
  createAsyncBridge,
} from "@stripbar/core";
import { createCapturingLogger } from "@stripbar/testkit";
import {
  type BluetoothStatus,
  BluetoothModule,
  formatBluetooth,
  formatBluetoothTooltip,
  parseConnectedDevices,
  parseControllerPower,
} from "../modules/bluetooth.js";
import { ClipboardModule, MemoryClipboardBackend, pushHistory } from "../modules/clipboard.js";
import { type GpuSample, formatGpu, formatGpuTooltip, parseNvidiaSmi, sysfsGpuProbe } from "../modules/gpu.js";
import {
  type KeyboardLayouts,
  KeyboardLayoutModule,
  describeLayout,
  formatKeyboardLayout,
  parseXkbQuery,
  rotateLayouts,
  setxkbmapArgs,
} from "../modules/keyboardLayout.js";
import { type NowPlaying, MediaModule, formatMedia, formatMediaTooltip, parsePlayerctlLine } from "../modules/media.js";
import { type NightLightBackend, NightLightModule } from "../modules/nightLight.js";

function deps() {
  return { bridge: createAsyncBridge({ schedule: () => {} }), logger: createCapturingLogger().logger, now: () => 0 };
}

function actionContext() {
  const commands: ModuleCommand[] = [];
  const ctx: ModuleActionContext = {
    config: DEFAULT_BAR_CONFIG,
    anchor: { x: 0, y: 0, w: 10, h: 10 },
    requestCommand: (c) => commands.push(c),
  };
  return { ctx, commands };
}

/** Run the first probe and copy its result into the module. */
async function primed<M extends { update(config: BarConfig): void; settled(): Promise<void> }>(module: M): Promise<M> {
  module.update(DEFAULT_BAR_CONFIG);
  await module.settled();
  module.update(DEFAULT_BAR_CONFIG);
  return module;
}

const SONG: NowPlaying = { status: "playing", title: "Test Song", artist: "Test Band", album: "" };

test("playerctl lines parse into playback state", () => {
  assert.deepEqual(parsePlayerctlLine("Playing\tTest Song\tTest Band\tTest Record\n"), {
    status: "playing",
    title: "Test Song",
    artist: "Test Band",
    album: "Test Record",
  });
  assert.deepEqual(parsePlayerctlLine(""), { status: "stopped", title: "", artist: "", album: "" });
});

test("media text shows the playback icon, title and artist", () => {
  const long: NowPlaying = { status: "playing", title: "A very long title that goes on", artist: "Band", album: "" };
  assert.equal(formatMedia(long, { showNowPlaying: true, maxTitleLength: 10 }), "▶ A very lo… - Band");
  assert.equal(formatMedia({ ...SONG, status: "paused" }, { showNowPlaying: false, maxTitleLength: 30 }), "⏸");
  assert.equal(formatMedia({ ...SONG, status: "stopped" }, DEFAULT_BAR_CONFIG.modules.media), "");
  assert.equal(formatMediaTooltip(SONG), "Test Song\nArtist: Test Band\nStatus: Playing");
  assert.equal(formatMediaTooltip({ ...SONG, status: "stopped" }), "No media playing");
});

test("a media click toggles playback and scrolling skips tracks", async () => {
  const module = await primed(new MediaModule({ ...deps(), probe: async () => SONG }));
  const { ctx, commands } = actionContext();
  assert.equal(module.isVisible(), true);

  module.onClick(ctx);
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "⏸ Test Song - Test Band");
  module.onScroll(-1, ctx);
  module.onScroll(0, ctx);
  assert.deepEqual(commands, [
    { kind: "runCommand", command: "playerctl", args: ["play-pause"] },
    { kind: "runCommand", command: "playerctl", args: ["previous"] },
  ]);
});

test("stopped media is hidden and ignores clicks", async () => {
  const module = await primed(new MediaModule({ ...deps(), probe: async () => ({ ...SONG, status: "stopped" }) }));
  const { ctx, commands } = actionContext();
  assert.equal(module.isVisible(), false);
  module.onClick(ctx);
  module.onScroll(1, ctx);
  assert.deepEqual(commands, []);
});

const XKB_QUERY = "rules:      evdev\nmodel:      pc105\nlayout:     us,de\nvariant:    ,nodeadkeys\n";

test("setxkbmap -query output yields layouts with their variants", () => {
  assert.deepEqual(parseXkbQuery(XKB_QUERY), { layouts: ["us", "de"], variants: ["", "nodeadkeys"] });
  assert.equal(parseXkbQuery("rules:      evdev\n"), null);
});

test("keyboard layout text uses the short code or the full name", () => {
  const state: KeyboardLayouts = { layouts: ["us", "de"], variants: ["", ""] };
  assert.equal(formatKeyboardLayout(state, { showFullName: false }), "⌨ EN");
  assert.equal(formatKeyboardLayout(state, { showFullName: true }), "⌨ English (US)");
  assert.equal(formatKeyboardLayout(null, { showFullName: false }), "⌨ ??");
  assert.deepEqual(describeLayout("cz"), { code: "CZ", name: "cz" });
});

test("switching layouts rotates the list and keeps variants aligned", () => {
  const next = rotateLayouts({ layouts: ["us", "de"], variants: ["", "nodeadkeys"] });
  assert.deepEqual(next, { layouts: ["de", "us"], variants: ["nodeadkeys", ""] });
  assert.deepEqual(setxkbmapArgs(next), ["-layout", "de,us", "-variant", "nodeadkeys,"]);
  assert.deepEqual(setxkbmapArgs({ layouts: ["us"], variants: [""] }), ["-layout", "us"]);
});

test("a keyboard layout click activates the next layout", async () => {
  const module = await primed(new KeyboardLayoutModule({ ...deps(), probe: async () => parseXkbQuery(XKB_QUERY) }));
  const { ctx, commands } = actionContext();
  module.onClick(ctx);
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "⌨ DE");
  assert.equal(module.tooltip(), "Keyboard Layout: German\nClick to switch layout");
  assert.deepEqual(commands, [
    { kind: "runCommand", command: "setxkbmap", args: ["-layout", "de,us", "-variant", "nodeadkeys,"] },
  ]);
});

test("DRM sysfs yields load, VRAM and temperature of the first card", async () => {
  const root = await mkdtemp(join(tmpdir(), "stripbar-drm-"));
  try {
    await mkdir(join(root, "card0-DP-1"));
    const device = join(root, "card0", "device");
    await mkdir(join(device, "hwmon", "hwmon3"), { recursive: true });
    await writeFile(join(device, "gpu_busy_percent"), "37\n");
    await writeFile(join(device, "mem_info_vram_used"), "1073741824\n");
    await writeFile(join(device, "mem_info_vram_total"), "8589934592\n");
    await writeFile(join(device, "vendor"), "0x1002\n");
    await writeFile(join(device, "hwmon", "hwmon3", "temp1_input"), "54000\n");

    const sample = await sysfsGpuProbe(root)();
    assert.deepEqual(sample, {
      name: "AMD (card0)",
      usagePercent: 37,
      vramUsedBytes: 1073741824,
      vramTotalBytes: 8589934592,
      temperatureC: 54,
    });
    assert.ok(sample !== null);
    assert.equal(formatGpu(sample, DEFAULT_BAR_CONFIG.modules.gpu), "GPU 37%  VRAM 13%  54°C");
    assert.equal(formatGpu(sample, { showUsage: false, showMemory: false, showTemperature: true }), "54°C");
    assert.equal(
      formatGpuTooltip(sample),
      "GPU Usage: 37.0%\nVRAM: 1.0 GB / 8.0 GB\nTemperature: 54°C\nDevice: AMD (card0)",
    );
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

test("DRM sysfs without a card yields no GPU", async () => {
  const root = await mkdtemp(join(tmpdir(), "stripbar-drm-"));
  try {
    await mkdir(join(root, "renderD128"));
    assert.equal(await sysfsGpuProbe(root)(), null);
    assert.equal(await sysfsGpuProbe(join(root, "missing"))(), null);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

test("nvidia-smi csv rows convert MiB to bytes", () => {
  const sample: GpuSample | null = parseNvidiaSmi("45, 2048, 8192, 61, Test GPU\n");
  assert.deepEqual(sample, {
    name: "Test GPU",
    usagePercent: 45,
    vramUsedBytes: 2048 * 1024 * 1024,
    vramTotalBytes: 8192 * 1024 * 1024,
    temperatureC: 61,
  });
  assert.equal(parseNvidiaSmi(""), null);
  assert.equal(formatGpuTooltip(null), "No GPU information");
});

test("bluetoothctl output yields power state and connected devices", () => {
  assert.equal(parseControllerPower("Controller 00:00:00:00:00:01 (public)\n\tName: host\n\tPowered: yes\n"), "on");
  assert.equal(parseControllerPower("Controller 00:00:00:00:00:01 (public)\n\tPowered: no\n"), "off");
  assert.equal(parseControllerPower("No default controller available\n"), "unavailable");
  assert.deepEqual(
    parseConnectedDevices("Device 00:00:00:00:00:02 Test Headphones\nDevice 00:00:00:00:00:03 Test Mouse\n"),
    ["Test Headphones", "Test Mouse"],
  );
});

test("bluetooth text shows a device count or names", () => {
  const connected: BluetoothStatus = { power: "on", devices: ["Test Headphones", "Test Mouse"] };
  assert.equal(formatBluetooth(connected, DEFAULT_BAR_CONFIG.modules.bluetooth), "ᛒ 2");
  assert.equal(formatBluetooth(connected, { showDeviceCount: true, showDeviceNames: true }), "ᛒ Test Headphones +1");
  assert.equal(formatBluetooth({ power: "on", devices: [] }, DEFAULT_BAR_CONFIG.modules.bluetooth), "ᛒ");
  assert.equal(formatBluetooth({ power: "off", devices: [] }, DEFAULT_BAR_CONFIG.modules.bluetooth), "ᛒ off");
  assert.equal(formatBluetooth({ power: "unavailable", devices: [] }, DEFAULT_BAR_CONFIG.modules.bluetooth), "");
  assert.equal(formatBluetoothTooltip(connected), "Bluetooth: Connected\nTest Headphones, Test Mouse");
  assert.equal(formatBluetoothTooltip({ power: "on", devices: [] }), "Bluetooth: On\nNo devices connected");
});

test("a bluetooth click toggles adapter power", async () => {
  const module = await primed(
    new BluetoothModule({ ...deps(), probe: async () => ({ power: "on", devices: ["Test Headphones"] }) }),
  );
  const { ctx, commands } = actionContext();
  module.onClick(ctx);
  assert.deepEqual(module.status, { power: "off", devices: [] });
  assert.deepEqual(commands, [{ kind: "runCommand", command: "bluetoothctl", args: ["power", "off"] }]);
});

test("without an adapter bluetooth is hidden and ignores clicks", async () => {
  const module = await primed(new BluetoothModule({ ...deps(), probe: async () => ({ power: "unavailable", devices: [] }) }));
  const { ctx, commands } = actionContext();
  assert.equal(module.isVisible(), false);
  module.onClick(ctx);
  assert.deepEqual(commands, []);
});

test("pushHistory keeps new text in front without repeats", () => {
  const history = ["a"];
  assert.deepEqual(pushHistory([], "a", 3), ["a"]);
  assert.equal(pushHistory(history, "a", 3), history);
  assert.equal(pushHistory(history, "  ", 3), history);
  assert.equal(pushHistory(history, null, 3), history);
  assert.deepEqual(pushHistory(["a", "b"], "b", 3), ["b", "a"]);
  assert.deepEqual(pushHistory(["a", "b", "c"], "d", 3), ["d", "a", "b"]);
});

test("the clipboard tooltip previews the newest entry", async () => {
  const empty = new ClipboardModule({ ...deps(), backend: new MemoryClipboardBackend() });
  assert.equal(empty.tooltip(), "No clipboard history");

  const module = await primed(new ClipboardModule({ ...deps(), backend: new MemoryClipboardBackend("copied   text") }));
  assert.deepEqual(module.history, ["copied   text"]);
  assert.equal(module.tooltip(), "copied text\n1 entry");
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "📋");
});

class MemoryNightLight implements NightLightBackend {
  constructor(public enabled: boolean) {}

  async read(): Promise<boolean | null> {
    return this.enabled;
  }

  async write(enabled: boolean): Promise<void> {
    this.enabled = enabled;
  }
}

test("a night light click toggles at once and writes to the backend", async () => {
  const backend = new MemoryNightLight(false);
  const module = new NightLightModule({ ...deps(), backend });
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "🌓");

  await primed(module);
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "☀");
  assert.equal(module.tooltip(), "Night Light: OFF\nClick to toggle");

  module.onClick(actionContext().ctx);
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "🌙");
  await module.settled();
  assert.equal(backend.enabled, true);
});
