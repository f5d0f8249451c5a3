import type { BarLogger } from "@stripbar/core";
import { pino } from "pino";

export type CapturedLog = Readonly<Record<string, unknown>> & Readonly<{ level: number; msg: string }>;

export type CapturingLogger = Readonly<{
  logger: BarLogger;
  records: readonly CapturedLog[];
  /** Records whose message equals `msg`. */
  withMessage(msg: string): readonly CapturedLog[];
  clear(): void;
}>;

function isCapturedLog(v: unknown): v is CapturedLog {
  if (typeof v !== "object" || v === null) return false;
  return "level" in v && typeof v.level === "number" && "msg" in v && typeof v.msg === "string";
}

/** pino logger at trace level whose JSON lines are parsed into `records`. */
export function createCapturingLogger(): CapturingLogger {
  const records: CapturedLog[] = [];
  const logger = pino(
    { level: "trace", base: null, timestamp: false },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (isCapturedLog(parsed)) records.push(parsed);
      },
    },
  );
  return {
    logger,
    records,
    withMessage: (msg) => records.filter((r) => r.msg === msg),
    clear: () => {
      records.length = 0;
    },
  };
}

export function silentLogger(): BarLogger {
  return pino({ level: "silent" });
}
