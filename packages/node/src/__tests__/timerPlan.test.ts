import assert from "node:assert/strict";
import test from "node:test";
import { computeAlignedDelay, computeTimerPlan } from "../host/timerPlan.js";

test("computeTimerPlan runs only the slow tick when nothing needs the fast one", () => {
  assert.deepEqual(computeTimerPlan({ needsFastTick: false, hasClock: true }), {
    slowIntervalMs: 1000,
    fastIntervalMs: null,
    alignSlowTick: true,
  });
});

test("computeTimerPlan defaults the fast tick to 100ms", () => {
  const plan = computeTimerPlan({ needsFastTick: true, hasClock: false });
  assert.equal(plan.fastIntervalMs, 100);
  assert.equal(plan.alignSlowTick, false);
});

test("computeTimerPlan sanitizes and bounds intervals", () => {
  assert.equal(computeTimerPlan({ slowIntervalMs: -5, needsFastTick: false, hasClock: false }).slowIntervalMs, 1000);
  assert.equal(computeTimerPlan({ slowIntervalMs: 100, needsFastTick: false, hasClock: false }).slowIntervalMs, 250);
  assert.equal(computeTimerPlan({ fastIntervalMs: 1, needsFastTick: true, hasClock: false }).fastIntervalMs, 16);
  assert.equal(computeTimerPlan({ fastIntervalMs: 800, needsFastTick: true, hasClock: false }).fastIntervalMs, 500);
  assert.equal(
    computeTimerPlan({ slowIntervalMs: 300, fastIntervalMs: 450, needsFastTick: true, hasClock: false }).fastIntervalMs,
    300,
  );
});

test("computeAlignedDelay waits for the next wall-clock boundary", () => {
  assert.equal(computeAlignedDelay(1500, 1000), 500);
  assert.equal(computeAlignedDelay(2000, 1000), 1000);
  assert.equal(computeAlignedDelay(2999.9, 1000), 1);
  assert.equal(computeAlignedDelay(Number.NaN, 1000), 1000);
});
