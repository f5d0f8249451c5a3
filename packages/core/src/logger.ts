import type { Logger } from "pino";

/**
 * Structured logger handed to the core through the context object.
 * The Node host builds it with pino; tests pass a silent or capturing one.
 */
export type BarLogger = Logger;
