import type { DestinationStream, LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface NodeLoggerOptions {
  /** Service name written into every line */
  service: string;
  level?: LogLevel;
  /** Deployment label, e.g. "local" or "ci" */
  environment?: string;
  version?: string;
  /**
   * Route output through pino-pretty on stdout. Defaults to
   * NODE_ENV === "development" unless a destination is given.
   */
  pretty?: boolean;
  /** Extra bindings merged into the base object */
  base?: Record<string, unknown>;
  /** Raw pino options, applied last */
  pinoOptions?: LoggerOptions;
  /** Write JSON lines here instead of stdout; cannot be combined with `pretty: true` */
  destination?: DestinationStream;
}

/**
 * Bindings attached to a child logger while a validator runs.
 */
export interface ValidationContext {
  /** Validator entry point, e.g. "checkFh" */
  validator: string;
  /** Argument under validation, e.g. "fh" */
  parameter?: string;
}
