import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_BAR_CONFIG } from "@stripbar/core";
import { UptimeModule, formatUptime, formatUptimeLong } from "../modules/uptime.js";

const DAY_HOUR_MINUTE_SECOND = 86_400 + 3600 + 60 + 1;

test("compact uptime picks the two largest units", () => {
  const opts = { compact: true, showDays: true };
  assert.equal(formatUptime(DAY_HOUR_MINUTE_SECOND, opts), "⏱ 1d 1h");
  assert.equal(formatUptime(3 * 3600 + 5 * 60, opts), "⏱ 3h 5m");
  assert.equal(formatUptime(59, opts), "⏱ 0m");
});

test("without days the hour count wraps at a day", () => {
  assert.equal(formatUptime(DAY_HOUR_MINUTE_SECOND, { compact: true, showDays: false }), "⏱ 1h 1m");
});

test("long uptime pluralizes each unit", () => {
  const opts = { compact: false, showDays: true };
  assert.equal(formatUptime(DAY_HOUR_MINUTE_SECOND, opts), "⏱ 1 day, 1 hour");
  assert.equal(formatUptime(2 * 86_400 + 3 * 3600, opts), "⏱ 2 days, 3 hours");
  assert.equal(formatUptime(3660, opts), "⏱ 1 hour, 1 minute");
  assert.equal(formatUptime(120, opts), "⏱ 2 minutes");
});

test("formatUptimeLong lists every unit down to seconds", () => {
  assert.equal(formatUptimeLong(DAY_HOUR_MINUTE_SECOND), "1 days, 1 hours, 1 minutes, 1 seconds");
  assert.equal(formatUptimeLong(61), "1 minutes, 1 seconds");
  assert.equal(formatUptimeLong(7), "7 seconds");
});

test("UptimeModule samples on update", () => {
  let seconds = 3600;
  const module = new UptimeModule({ uptimeSeconds: () => seconds });
  seconds = 7200;
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "⏱ 1h 0m");
  module.update(DEFAULT_BAR_CONFIG);
  assert.equal(module.displayText(DEFAULT_BAR_CONFIG), "⏱ 2h 0m");
  assert.equal(module.tooltip(), "System Uptime\n2 hours, 0 minutes, 0 seconds");
});
