import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_BAR_CONFIG, type ModuleActionContext, type ModuleCommand, createAsyncBridge } from "@stripbar/core";
import { createCapturingLogger } from "@stripbar/testkit";
import { MemoryVolumeBackend, VolumeModule, formatVolume, stepVolume, volumeIcon } from "../modules/volume.js";

function setup(level: number, muted = false) {
  const backend = new MemoryVolumeBackend({ level, muted });
  const bridge = createAsyncBridge({ schedule: () => {} });
  const module = new VolumeModule({
    bridge,
    logger: createCapturingLogger().logger,
    backend,
    initial: { level, muted },
    now: () => 0,
  });
  const commands: ModuleCommand[] = [];
  const ctx: ModuleActionContext = {
    config: DEFAULT_BAR_CONFIG,
    anchor: { x: 0, y: 0, w: 10, h: 10 },
    requestCommand: (c) => commands.push(c),
  };
  return { backend, bridge, module, ctx, commands };
}

test("volumeIcon follows level bands and mute", () => {
  assert.equal(volumeIcon({ level: 50, muted: true }), "🔇");
  assert.equal(volumeIcon({ level: 0, muted: false }), "🔇");
  assert.equal(volumeIcon({ level: 32, muted: false }), "🔈");
  assert.equal(volumeIcon({ level: 33, muted: false }), "🔉");
  assert.equal(volumeIcon({ level: 66, muted: false }), "🔊");
  assert.equal(formatVolume({ level: 66, muted: false }, { showPercentage: false, scrollStep: 2 }), "🔊");
});

test("stepVolume moves by one step per notch and clamps", () => {
  assert.equal(stepVolume(50, 1, 2), 52);
  assert.equal(stepVolume(50, -3, 2), 48);
  assert.equal(stepVolume(99, 1, 2), 100);
  assert.equal(stepVolume(1, -1, 2), 0);
  assert.equal(stepVolume(40, 0, 2), 40);
});

test("a click toggles mute at once and writes it to the backend", async () => {
  const { backend, bridge, module, ctx } = setup(50);
  module.onClick(ctx);
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "🔇 50%");
  assert.equal(module.tooltip(), "Volume: 50% (Muted)");

  await module.settled();
  assert.deepEqual(await backend.read(), { level: 50, muted: true });
  assert.deepEqual(bridge.drain(), ["volume"]);
});

test("scrolling adjusts the level by the configured step", async () => {
  const { backend, module, ctx } = setup(50);
  module.onScroll(1, ctx);
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "🔉 52%");
  module.onScroll(-1, ctx);
  module.onScroll(-1, ctx);
  assert.equal(module.state.level, 48);
  await module.settled();
  assert.deepEqual(await backend.read(), { level: 48, muted: false });
});

test("scrolling at the limit changes nothing", () => {
  const { module, ctx } = setup(100);
  const version = module.version;
  module.onScroll(1, ctx);
  assert.equal(module.version, version);
});

test("a right click asks for the mixer", () => {
  const { module, ctx, commands } = setup(10);
  module.onRightClick(ctx);
  assert.deepEqual(commands, [{ kind: "runCommand", command: "pavucontrol", args: [] }]);
});
