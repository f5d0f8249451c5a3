import assert from "node:assert/strict";
import test from "node:test";
import { type BarConfigInput, type ModuleCommand, ModuleRegistry, StripbarError } from "@stripbar/core";
import { type StubModule, createCapturingLogger, createFakeRasterizer, createStubModule } from "@stripbar/testkit";
import { type NodeBar, createNodeBar } from "../host/nodeBar.js";

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function setup(right: readonly string[], env: NodeJS.ProcessEnv = {}) {
  const log = createCapturingLogger();
  const rasterizer = createFakeRasterizer();
  const stubs: StubModule[] = [
    createStubModule("network", { text: "net" }),
    createStubModule("battery", { text: "bat" }),
    createStubModule("clock", { text: "12:00" }),
  ];
  const commands: ModuleCommand[] = [];
  const config: BarConfigInput = { sections: { left: [], center: [], right } };
  const bar: NodeBar = createNodeBar({
    width: 1000,
    config,
    env,
    logger: log.logger,
    rasterizer,
    createRegistry: ({ logger }) => new ModuleRegistry({ logger, modules: stubs }),
    onCommand: (command) => commands.push(command),
    timers: { enabled: false },
  });
  return { bar, log, rasterizer, stubs, commands };
}

test("the first frame is painted on the next turn", async () => {
  const { bar, rasterizer, log } = setup(["network", "battery"]);
  assert.equal(rasterizer.frames.length, 0);
  await flush();
  assert.equal(rasterizer.frames.length, 1);
  assert.ok(rasterizer.lastTexts().includes("net"));
  assert.ok(rasterizer.lastTexts().includes("bat"));
  assert.equal(bar.runtime.bounds().get("network")?.x, 914);
  assert.equal(log.withMessage("bar started").length, 1);
  bar.stop();
});

test("environment overrides win over code configuration", () => {
  const { bar } = setup(["network"], { STRIPBAR_THEME: "light", STRIPBAR_RIGHT: "battery,network" });
  assert.equal(bar.store.snapshot().theme, "light");
  assert.deepEqual(bar.store.snapshot().sections.right, ["battery", "network"]);
  bar.stop();
});

test("a drag reorder is written back to the store", async () => {
  const { bar } = setup(["network", "battery"]);
  await flush();
  bar.dispatch({ kind: "pointerDown", x: 960, y: 17, button: "primary" });
  bar.dispatch({ kind: "pointerMove", x: 940, y: 17 });
  bar.dispatch({ kind: "pointerMove", x: 920, y: 17 });
  bar.dispatch({ kind: "pointerUp", x: 920, y: 17, button: "primary" });
  assert.deepEqual(bar.store.snapshot().sections.right, ["battery", "network"]);

  await flush();
  assert.equal(bar.runtime.bounds().get("battery")?.x, 914);
  assert.equal(bar.runtime.bounds().get("network")?.x, 955);
  bar.stop();
});

test("a primary click reaches the module under the pointer", async () => {
  const { bar, stubs, commands } = setup(["network", "battery"]);
  await flush();
  bar.dispatch({ kind: "pointerDown", x: 920, y: 17, button: "primary" });
  bar.dispatch({ kind: "pointerUp", x: 920, y: 17, button: "primary" });
  assert.equal(stubs[0]?.clicks.length, 1);
  assert.deepEqual(commands, []);
  bar.stop();
});

test("the timer plan follows the placed modules", () => {
  const { bar } = setup(["network", "clock"]);
  assert.deepEqual(bar.timerPlan, { slowIntervalMs: 1000, fastIntervalMs: null, alignSlowTick: true });

  assert.equal(bar.selectMenuItem("clock", "module.hide"), true);
  assert.deepEqual(bar.store.snapshot().sections.right, ["network"]);
  assert.equal(bar.timerPlan.alignSlowTick, false);
  bar.stop();
});

test("menus only accept the items they offer", () => {
  const { bar } = setup(["network"]);
  assert.deepEqual(bar.menuFor("network")?.items, [{ kind: "action", id: "module.hide", label: "Hide network" }]);
  assert.equal(bar.menuFor("unknown"), null);
  assert.equal(bar.selectMenuItem("network", "clock.format24h"), false);
  assert.deepEqual(bar.store.snapshot().sections.right, ["network"]);
  bar.stop();
});

test("stop disposes everything once", async () => {
  const { bar, stubs, log, rasterizer } = setup(["network"]);
  bar.stop();
  bar.stop();
  await flush();
  assert.equal(rasterizer.frames.length, 0);
  assert.deepEqual(
    stubs.map((s) => s.disposed),
    [1, 1, 1],
  );
  assert.equal(log.withMessage("bar stopped").length, 1);
  assert.throws(
    () => bar.dispatch({ kind: "paint" }),
    (err: unknown) => err instanceof StripbarError && err.code === "STRIPBAR_DISPOSED",
  );
});
