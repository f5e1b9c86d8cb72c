import { createNodeLogger, type Logger, withValidationContext } from "@chronocheck/logger";
import { loadValidationConfig } from "./env";
import type { ValidationError } from "./errors";

const config = loadValidationConfig();

export const log: Logger = createNodeLogger({
  service: "validation",
  level: config.logLevel,
  environment: config.environment,
  pretty: config.pretty,
});

/**
 * Log a rejected input at debug level and throw it.
 */
export function reject(validator: string, error: ValidationError): never {
  withValidationContext(log, { validator, parameter: error.parameter }).debug(
    { code: error.code, details: error.details },
    error.message
  );
  throw error;
}
