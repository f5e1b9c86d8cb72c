import pino, { type Logger, type LoggerOptions } from "pino";
import type { NodeLoggerOptions, ValidationContext } from "./types";

/**
 * JSON-lines pino logger. `pretty` and `destination` are exclusive:
 * pino-pretty always writes to stdout.
 */
export function createNodeLogger(options: NodeLoggerOptions): Logger {
  const {
    service,
    level = "info",
    environment,
    version,
    pretty,
    base = {},
    pinoOptions = {},
    destination,
  } = options;

  if (pretty === true && destination !== undefined) {
    throw new Error("createNodeLogger: `pretty` output cannot be sent to a custom `destination`");
  }
  const isPretty = pretty ?? (destination === undefined && process.env.NODE_ENV === "development");

  const loggerOptions: LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
      // Remove pid, hostname
      bindings: ({ pid, hostname, ...rest }) => rest,
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    base: {
      service,
      environment,
      version,
      ...base,
    },
    ...pinoOptions,
  };

  if (isPretty) {
    return pino(
      loggerOptions,
      pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,service,environment,version",
          customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
          singleLine: true,
        },
      })
    );
  }
  return destination === undefined ? pino(loggerOptions) : pino(loggerOptions, destination);
}

export function withValidationContext(logger: Logger, context: ValidationContext): Logger {
  return logger.child({
    validator: context.validator,
    parameter: context.parameter,
  });
}
