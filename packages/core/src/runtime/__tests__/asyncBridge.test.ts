import { assert, describe, test } from "@stripbar/testkit";
import { createAsyncBridge } from "../asyncBridge.js";

function manualScheduler() {
  const jobs: Array<() => void> = [];
  return {
    schedule: (fn: () => void) => {
      jobs.push(fn);
    },
    runAll: () => {
      for (let job = jobs.shift(); job !== undefined; job = jobs.shift()) job();
    },
    get size() {
      return jobs.length;
    },
  };
}

describe("AsyncBridge", () => {
  test("coalesces notifications per module in first-notified order", () => {
    const bridge = createAsyncBridge({ schedule: () => {} });
    bridge.notifyRefresh("weather");
    bridge.notifyRefresh("disk");
    bridge.notifyRefresh("weather");
    assert.equal(bridge.pending, 2);
    assert.deepEqual(bridge.drain(), ["weather", "disk"]);
    assert.equal(bridge.pending, 0);
    assert.deepEqual(bridge.drain(), []);
  });

  test("wakes the loop once per batch, outside the notifying call", () => {
    const scheduler = manualScheduler();
    const bridge = createAsyncBridge({ schedule: scheduler.schedule });
    const woken: string[][] = [];
    bridge.setWakeup(() => woken.push([...bridge.drain()]));

    bridge.notifyRefresh("a");
    bridge.notifyRefresh("b");
    assert.equal(woken.length, 0);
    assert.equal(scheduler.size, 1);

    scheduler.runAll();
    assert.deepEqual(woken, [["a", "b"]]);

    bridge.notifyRefresh("c");
    scheduler.runAll();
    assert.deepEqual(woken, [["a", "b"], ["c"]]);
  });

  test("notifications before a wakeup is installed are delivered when it is", () => {
    const scheduler = manualScheduler();
    const bridge = createAsyncBridge({ schedule: scheduler.schedule });
    bridge.notifyRefresh("a");
    assert.equal(scheduler.size, 0);

    const woken: string[][] = [];
    bridge.setWakeup(() => woken.push([...bridge.drain()]));
    scheduler.runAll();
    assert.deepEqual(woken, [["a"]]);
  });

  test("removing the wakeup stops delivery", () => {
    const scheduler = manualScheduler();
    const bridge = createAsyncBridge({ schedule: scheduler.schedule });
    let calls = 0;
    bridge.setWakeup(() => {
      calls++;
    });
    bridge.notifyRefresh("a");
    bridge.setWakeup(null);
    scheduler.runAll();
    assert.equal(calls, 0);
    assert.equal(bridge.pending, 1);
  });
});
