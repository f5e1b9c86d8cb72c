import { isNumericTypedArray } from "./arrays";

/**
 * Validation Errors
 *
 * Every rejected input surfaces as a `ValidationError` carrying a
 * machine-readable code. Messages include the offending value or the
 * name of the offending column so the caller can locate the problem.
 *
 * | Code                        | Raised by                         |
 * |-----------------------------|-----------------------------------|
 * | WRONG_TYPE                  | any validator given the wrong shape |
 * | UNSUPPORTED_INDEX_KIND      | checkTimeIndex                    |
 * | UNSORTED_INDEX              | checkTimeIndex                    |
 * | EMPTY_SERIES                | checkY                            |
 * | CONSTANT_SERIES             | checkY                            |
 * | EMPTY_NESTED_SERIES         | checkX                            |
 * | MULTI_ROW_INPUT             | checkX                            |
 * | INCONSISTENT_NESTED_INDEX   | checkX                            |
 * | INDEX_MISMATCH              | checkConsistentTimeIndex          |
 * | TRAINING_LEAKS_INTO_TEST    | checkConsistentTimeIndex          |
 * | EMPTY_HORIZON               | checkFh                           |
 * | WRONG_DIMENSION             | checkFh, checkCutoffs             |
 * | NON_INTEGER_HORIZON         | checkFh                           |
 * | DUPLICATE_HORIZON_STEPS     | checkFh                           |
 * | OUT_OF_RANGE                | scalar validators, checkAlpha     |
 * | EMPTY_CUTOFFS               | checkCutoffs                      |
 * | LENGTH_MISMATCH             | createSeries                      |
 * | NOT_FITTED                  | checkIsFitted                     |
 */

export type ValidationErrorCode =
  | "WRONG_TYPE"
  | "UNSUPPORTED_INDEX_KIND"
  | "UNSORTED_INDEX"
  | "EMPTY_SERIES"
  | "EMPTY_HORIZON"
  | "EMPTY_NESTED_SERIES"
  | "EMPTY_CUTOFFS"
  | "CONSTANT_SERIES"
  | "MULTI_ROW_INPUT"
  | "INCONSISTENT_NESTED_INDEX"
  | "INDEX_MISMATCH"
  | "TRAINING_LEAKS_INTO_TEST"
  | "WRONG_DIMENSION"
  | "NON_INTEGER_HORIZON"
  | "DUPLICATE_HORIZON_STEPS"
  | "OUT_OF_RANGE"
  | "LENGTH_MISMATCH"
  | "NOT_FITTED";

export interface ValidationErrorOptions {
  /** Argument the error refers to, e.g. "fh" or "y_train" */
  parameter?: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Render a value for an error message. Long sequences are elided in the
 * middle so messages stay readable for large indices.
 */
export function describeValue(value: unknown): string {
  if (Array.isArray(value) || isNumericTypedArray(value)) {
    const items = Array.from(value, (v: unknown) => describeValue(v));
    if (items.length > 10) {
      return `[${items.slice(0, 5).join(", ")}, ..., ${items.slice(-5).join(", ")}]`;
    }
    return `[${items.join(", ")}]`;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    return value.constructor?.name ?? "Object";
  }
  return String(value);
}

/**
 * Describe the runtime type of a value for WRONG_TYPE messages.
 */
export function typeName(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "Array";
  }
  if (typeof value === "object" || typeof value === "function") {
    return value.constructor?.name ?? typeof value;
  }
  return typeof value;
}

export class ValidationError extends Error {
  readonly code: ValidationErrorCode;
  readonly parameter?: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ValidationErrorCode, options: ValidationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ValidationError";
    this.code = code;
    this.parameter = options.parameter;
    this.details = options.details;
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      parameter: this.parameter,
      details: this.details,
    };
  }

  static wrongType(parameter: string, expected: string, value: unknown): ValidationError {
    return new ValidationError(
      `\`${parameter}\` must be ${expected}, but found type: ${typeName(value)}`,
      "WRONG_TYPE",
      { parameter, details: { expected, found: typeName(value) } }
    );
  }

  static unsupportedIndexKind(kind: string, supported: readonly string[]): ValidationError {
    return new ValidationError(
      `Time index of kind "${kind}" is not supported, please use one of ${supported.join(", ")} instead`,
      "UNSUPPORTED_INDEX_KIND",
      { parameter: "index", details: { kind, supported } }
    );
  }

  static unsortedIndex(found: string): ValidationError {
    return new ValidationError(
      `Time index must be sorted (monotonically increasing), but found: ${found}`,
      "UNSORTED_INDEX",
      { parameter: "index" }
    );
  }

  static outOfRange(parameter: string, constraint: string, value: unknown): ValidationError {
    return new ValidationError(
      `\`${parameter}\` must be ${constraint}, but found: ${describeValue(value)}`,
      "OUT_OF_RANGE",
      { parameter, details: { constraint, value } }
    );
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function hasErrorCode(error: unknown, code: ValidationErrorCode): error is ValidationError {
  return error instanceof ValidationError && error.code === code;
}
