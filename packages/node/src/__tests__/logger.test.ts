import assert from "node:assert/strict";
import test from "node:test";
import { createLogger } from "../logger.js";

function capture() {
  const lines: unknown[] = [];
  return { lines, destination: { write: (line: string) => void lines.push(JSON.parse(line)) } };
}

function field(record: unknown, key: string): unknown {
  if (typeof record !== "object" || record === null) return undefined;
  return Object.entries(record).find(([k]) => k === key)?.[1];
}

test("logs JSON lines at info by default", () => {
  const { lines, destination } = capture();
  const logger = createLogger({ env: {}, destination });
  logger.debug("hidden");
  logger.info({ moduleId: "clock" }, "shown");
  assert.equal(lines.length, 1);
  assert.equal(field(lines[0], "msg"), "shown");
  assert.equal(field(lines[0], "moduleId"), "clock");
  assert.equal(field(lines[0], "name"), "stripbar");
});

test("LOG_LEVEL sets the level", () => {
  const { lines, destination } = capture();
  const logger = createLogger({ env: { LOG_LEVEL: "warn" }, destination, name: "preview" });
  logger.info("dropped");
  logger.warn("kept");
  assert.deepEqual(
    lines.map((l) => [field(l, "msg"), field(l, "name")]),
    [["kept", "preview"]],
  );
  assert.equal(logger.level, "warn");
});
