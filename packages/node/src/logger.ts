import type { BarLogger } from "@stripbar/core";
import { type DestinationStream, type LoggerOptions, pino } from "pino";

export type CreateLoggerOptions = Readonly<{
  env?: NodeJS.ProcessEnv;
  /** Write JSON lines here instead of stdout (pretty printing is then skipped). */
  destination?: DestinationStream;
  name?: string;
}>;

function truthy(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  const v = raw.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/**
 * Application logger.
 *
 * Level comes from LOG_LEVEL (default "info"). Outside production,
 * STRIPBAR_LOG_PRETTY routes output through pino-pretty.
 */
export function createLogger(opts: CreateLoggerOptions = {}): BarLogger {
  const env = opts.env ?? process.env;
  const options: LoggerOptions = {
    name: opts.name ?? "stripbar",
    level: env.LOG_LEVEL || "info",
  };
  if (opts.destination !== undefined) return pino(options, opts.destination);

  const pretty = truthy(env.STRIPBAR_LOG_PRETTY) && env.NODE_ENV !== "production";
  if (!pretty) return pino(options);
  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        ignore: "pid,hostname",
        translateTime: "SYS:standard",
      },
    },
  });
}
