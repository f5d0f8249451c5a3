const DEFAULT_SLOW_INTERVAL_MS = 1000;
const DEFAULT_FAST_INTERVAL_MS = 100;
const MIN_FAST_INTERVAL_MS = 16;
const MAX_FAST_INTERVAL_MS = 500;
const MIN_SLOW_INTERVAL_MS = 250;
const MAX_SLOW_INTERVAL_MS = 60_000;

export type TimerPlan = Readonly<{
  slowIntervalMs: number;
  /** null when nothing on the bar needs the fast tick. */
  fastIntervalMs: number | null;
  /** Fire slow ticks on wall-clock boundaries so the clock flips on time. */
  alignSlowTick: boolean;
}>;

export type TimerPlanInput = Readonly<{
  slowIntervalMs?: number;
  fastIntervalMs?: number;
  /** At least one fast-polled module (e.g. active_app) is placed on the bar. */
  needsFastTick: boolean;
  /** The clock is placed on the bar. */
  hasClock: boolean;
}>;

function sanitizeInterval(raw: number | undefined, fallback: number, lo: number, hi: number): number {
  if (raw === undefined || !Number.isFinite(raw) || raw <= 0) return fallback;
  return Math.min(hi, Math.max(lo, Math.floor(raw)));
}

export function computeTimerPlan(input: TimerPlanInput): TimerPlan {
  const slowIntervalMs = sanitizeInterval(
    input.slowIntervalMs,
    DEFAULT_SLOW_INTERVAL_MS,
    MIN_SLOW_INTERVAL_MS,
    MAX_SLOW_INTERVAL_MS,
  );
  const fast = sanitizeInterval(input.fastIntervalMs, DEFAULT_FAST_INTERVAL_MS, MIN_FAST_INTERVAL_MS, MAX_FAST_INTERVAL_MS);
  return Object.freeze({
    slowIntervalMs,
    fastIntervalMs: input.needsFastTick ? Math.min(fast, slowIntervalMs) : null,
    alignSlowTick: input.hasClock,
  });
}

/** Delay until the next multiple of `intervalMs` on the wall clock (at least 1ms). */
export function computeAlignedDelay(nowMs: number, intervalMs: number): number {
  const interval = Math.max(1, Math.floor(intervalMs));
  const now = Number.isFinite(nowMs) ? Math.floor(nowMs) : 0;
  const rem = ((now % interval) + interval) % interval;
  return Math.max(1, interval - rem);
}
