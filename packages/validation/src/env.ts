/**
 * Environment Configuration
 *
 * The validators themselves take no ambient configuration; the variables
 * here only shape the package logger. A value that cannot be used falls
 * back to its default.
 */

import { z } from "zod";

export const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);
export type LogLevel = z.infer<typeof LogLevel>;

const envSchema = z.object({
  LOG_LEVEL: z
    .preprocess((value) => (typeof value === "string" ? value.toLowerCase() : value), LogLevel)
    .catch("info")
    .describe("Minimum level written by the package logger, case-insensitive"),
  NODE_ENV: z
    .string()
    .optional()
    .describe("Enables pretty output when set to development"),
  CHRONOCHECK_ENV: z
    .string()
    .min(1)
    .catch("local")
    .describe("Deployment label attached to every log line"),
});

export type ValidationEnv = z.infer<typeof envSchema>;

export interface ValidationConfig {
  logLevel: LogLevel;
  environment: string;
  pretty: boolean;
}

/**
 * Parse configuration from environment variables.
 */
export function loadValidationConfig(
  env: Record<string, string | undefined> = process.env
): ValidationConfig {
  const parsed = envSchema.parse(env);
  return {
    logLevel: parsed.LOG_LEVEL,
    environment: parsed.CHRONOCHECK_ENV,
    pretty: parsed.NODE_ENV === "development",
  };
}
