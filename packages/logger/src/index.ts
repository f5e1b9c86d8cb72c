import pino from "pino";

export { createNodeLogger, withValidationContext } from "./node";
export * from "./types";

export type { Logger } from "pino";
export { pino };
