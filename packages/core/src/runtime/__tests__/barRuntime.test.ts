import {
  assert,
  createFakeRasterizer,
  createStubModule,
  describe,
  silentLogger,
  test,
} from "@stripbar/testkit";
import { resolveBarConfig } from "../../config/resolve.js";
import { createConfigStore } from "../../config/store.js";
import type { BarConfigInput } from "../../config/types.js";
import { StripbarError } from "../../errors.js";
import type { ReorderCommit } from "../../events.js";
import { hitTest } from "../../layout/hitTest.js";
import { ModuleRegistry } from "../../modules/registry.js";
import { ModuleStateCell } from "../../modules/stateCell.js";
import type { BarModule } from "../../modules/types.js";
import { lightTheme } from "../../theme/theme.js";
import { type AsyncBridge, createAsyncBridge } from "../asyncBridge.js";
import { BarRuntime } from "../barRuntime.js";

function sections(left: readonly string[], right: readonly string[], center: readonly string[] = []): BarConfigInput {
  return { sections: { left, center, right } };
}

function setup(modules: readonly BarModule[], input: BarConfigInput, width = 1000) {
  const logger = silentLogger();
  const rasterizer = createFakeRasterizer();
  const registry = new ModuleRegistry({ logger, modules });
  const store = createConfigStore(resolveBarConfig(input));
  const commits: ReorderCommit[] = [];
  const runtime = new BarRuntime({
    registry,
    rasterizer,
    logger,
    config: store.snapshot(),
    width,
    onReorderCommit: (commit) => {
      commits.push(commit);
      store.applyReorder(commit);
    },
  });
  store.subscribe((next) => runtime.dispatch({ kind: "configChanged", config: next }));
  runtime.dispatch({ kind: "paint" });
  return { runtime, registry, rasterizer, store, commits };
}

const flushTasks = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("BarRuntime end-to-end", () => {
  test("left modules pack from the margin and the clock is right-aligned", () => {
    const { runtime } = setup(
      [
        createStubModule("app_menu", { text: "Apps" }),
        createStubModule("active_app", { text: "Finder" }),
        createStubModule("clock", { text: "12:00 PM" }),
      ],
      sections(["app_menu", "active_app"], ["clock"]),
    );
    const bounds = runtime.bounds();
    assert.deepEqual(bounds.get("app_menu"), { x: 8, y: 5, w: 44, h: 24 });
    assert.deepEqual(bounds.get("active_app"), { x: 56, y: 5, w: 58, h: 24 });
    assert.deepEqual(bounds.get("clock"), { x: 920, y: 5, w: 72, h: 24 });
    assert.equal(hitTest(bounds, 950, 17), "clock");
  });

  test("a press that moves less than the threshold is a click", () => {
    const volume = createStubModule("volume", { text: "Vol 50%" });
    const { runtime, commits, registry } = setup([volume], sections([], ["volume"]));
    assert.equal(runtime.bounds().get("volume")?.x, 927);

    runtime.dispatch({ kind: "pointerDown", x: 930, y: 17, button: "primary" });
    runtime.dispatch({ kind: "pointerMove", x: 933, y: 17 });
    runtime.dispatch({ kind: "pointerUp", x: 933, y: 17, button: "primary" });

    assert.equal(volume.clicks.length, 1);
    assert.equal(commits.length, 0);
    assert.deepEqual(registry.sectionIds("right"), ["volume"]);
  });

  test("dragging battery past network's midpoint reorders the right section once", () => {
    const { runtime, commits, store } = setup(
      [createStubModule("network", { text: "net" }), createStubModule("battery", { text: "bat" })],
      sections([], ["network", "battery"]),
    );
    assert.equal(runtime.bounds().get("network")?.x, 914);
    assert.equal(runtime.bounds().get("battery")?.x, 955);

    runtime.dispatch({ kind: "pointerDown", x: 960, y: 17, button: "primary" });
    runtime.dispatch({ kind: "pointerMove", x: 940, y: 17 });
    assert.equal(runtime.phase, "dragging");
    runtime.dispatch({ kind: "pointerMove", x: 920, y: 17 });
    runtime.dispatch({ kind: "pointerUp", x: 920, y: 17, button: "primary" });

    assert.deepEqual(commits, [
      { section: "right", moduleId: "battery", oldIndex: 1, newIndex: 0, order: ["battery", "network"] },
    ]);
    assert.deepEqual(store.snapshot().sections.right, ["battery", "network"]);
    assert.equal(runtime.bounds().get("battery")?.x, 914);
    assert.equal(runtime.bounds().get("network")?.x, 955);
  });

  test("a background result is picked up without the loop waiting for it", async () => {
    const bridge = createAsyncBridge();
    const weather = new DeferredModule("weather", bridge);
    const logger = silentLogger();
    const rasterizer = createFakeRasterizer();
    const runtime = new BarRuntime({
      registry: new ModuleRegistry({ logger, modules: [weather] }),
      rasterizer,
      logger,
      config: resolveBarConfig(sections([], ["weather"])),
      width: 400,
      bridge,
    });

    runtime.dispatch({ kind: "timerTick", timerId: "slow" });
    assert.deepEqual(rasterizer.lastTexts(), ["--"]);
    assert.equal(weather.started, 1);

    weather.resolve("21°C");
    await flushTasks();
    assert.deepEqual(rasterizer.lastTexts(), ["21°C"]);

    runtime.dispatch({ kind: "timerTick", timerId: "slow" });
    assert.deepEqual(rasterizer.lastTexts(), ["21°C"]);
    assert.equal(weather.started, 1);
  });
});

describe("BarRuntime event loop", () => {
  test("events posted from a handler run after the current one", () => {
    const seen: number[] = [];
    let runtimeRef: BarRuntime | null = null;
    const resizer: BarModule = {
      id: "resizer",
      name: "Resizer",
      displayText: () => "rs",
      update: () => {},
      onClick: () => {
        runtimeRef?.dispatch({ kind: "resize", w: 500, h: 34 });
        seen.push(runtimeRef?.context.size().w ?? -1);
      },
    };
    const { runtime } = setup([resizer, createStubModule("clock", { text: "12:00 PM" })], sections(["resizer"], ["clock"]));
    runtimeRef = runtime;
    runtime.dispatch({ kind: "pointerDown", x: 10, y: 17, button: "primary" });
    runtime.dispatch({ kind: "pointerUp", x: 10, y: 17, button: "primary" });
    assert.deepEqual(seen, [1000]);
    assert.equal(runtime.context.size().w, 500);
    assert.equal(runtime.bounds().get("clock")?.x, 420);
  });

  test("a dirty bar asks the host for one paint until it is painted", () => {
    let requests = 0;
    const logger = silentLogger();
    const rasterizer = createFakeRasterizer();
    const runtime = new BarRuntime({
      registry: new ModuleRegistry({ logger, modules: [createStubModule("a")] }),
      rasterizer,
      logger,
      config: resolveBarConfig(sections(["a"], [])),
      width: 300,
      requestPaint: () => {
        requests++;
      },
    });
    runtime.dispatch({ kind: "timerTick", timerId: "slow" });
    runtime.dispatch({ kind: "timerTick", timerId: "fast" });
    runtime.dispatch({ kind: "refresh", moduleId: "a" });
    assert.equal(requests, 1);
    assert.equal(rasterizer.frames.length, 0);

    runtime.dispatch({ kind: "paint" });
    assert.equal(rasterizer.frames.length, 1);
    assert.equal(runtime.isDirty, false);

    runtime.dispatch({ kind: "timerTick", timerId: "slow" });
    assert.equal(requests, 2);
  });

  test("configChanged applies the new theme and order", () => {
    const { runtime, rasterizer, store } = setup(
      [createStubModule("a", { text: "aa" }), createStubModule("b", { text: "bb" })],
      sections(["a", "b"], []),
    );
    store.update({ theme: "light", sections: { left: ["b", "a"] } });
    assert.equal(runtime.bounds().get("b")?.x, 8);
    assert.deepEqual(rasterizer.lastFrame()?.ops[0], { op: "clear", color: lightTheme.background });
  });

  test("tooltip follows the hovered module", () => {
    const { runtime } = setup(
      [createStubModule("a", { text: "aa", tooltip: "Applications" }), createStubModule("b", { text: "bb" })],
      sections(["a", "b"], []),
    );
    assert.equal(runtime.tooltip(), null);
    runtime.dispatch({ kind: "pointerMove", x: 10, y: 17 });
    assert.equal(runtime.hoverId, "a");
    assert.equal(runtime.tooltip(), "Applications");
    runtime.dispatch({ kind: "pointerMove", x: 45, y: 17 });
    assert.equal(runtime.tooltip(), null);
    runtime.dispatch({ kind: "pointerLeave" });
    assert.equal(runtime.hoverId, null);
  });

  test("invalid events are rejected before they are queued", () => {
    const { runtime } = setup([], sections([], []));
    assert.throws(
      () => runtime.dispatch({ kind: "resize", w: 0, h: 34 }),
      (err: unknown) => err instanceof StripbarError && err.code === "STRIPBAR_INVALID_EVENT",
    );
    assert.throws(
      () => runtime.dispatch({ kind: "pointerMove", x: Number.NaN, y: 1 }),
      (err: unknown) => err instanceof StripbarError && err.code === "STRIPBAR_INVALID_EVENT",
    );
  });

  test("a disposed runtime refuses events", () => {
    const { runtime } = setup([], sections([], []));
    runtime.dispose();
    assert.throws(
      () => runtime.dispatch({ kind: "paint" }),
      (err: unknown) => err instanceof StripbarError && err.code === "STRIPBAR_DISPOSED",
    );
  });
});

/** Starts one background task and shows its result once published. */
class DeferredModule implements BarModule {
  readonly id: string;
  readonly name = "Deferred";
  started = 0;
  private readonly cell = new ModuleStateCell<string>("");
  private readonly bridge: AsyncBridge;
  private resolver: ((text: string) => void) | null = null;

  constructor(id: string, bridge: AsyncBridge) {
    this.id = id;
    this.bridge = bridge;
  }

  update(): void {
    if (this.cell.refreshing || this.cell.version > 0) return;
    this.started++;
    this.cell.taskStarted();
    void new Promise<string>((resolve) => {
      this.resolver = resolve;
    }).then((text) => {
      this.cell.publish(text);
      this.cell.taskSettled();
      this.bridge.notifyRefresh(this.id);
    });
  }

  displayText(): string {
    const text = this.cell.read();
    return text === "" ? "--" : text;
  }

  resolve(text: string): void {
    this.resolver?.(text);
  }
}
