import { expect } from "vitest";
import { isValidationError, type ValidationError, type ValidationErrorCode } from "./errors";

/**
 * Run `fn`, assert it throws a ValidationError with `code`, and return it.
 */
export function expectValidationError(fn: () => unknown, code: ValidationErrorCode): ValidationError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }

  if (!isValidationError(caught)) {
    throw new Error(`Expected ValidationError ${code}, got: ${String(caught)}`);
  }
  expect(caught.code).toBe(code);
  return caught;
}
