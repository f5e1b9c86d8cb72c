/**
 * Series
 *
 * A value sequence paired one-to-one with a time index.
 */

import { z } from "zod";
import { ValidationError } from "./errors";
import { reject } from "./logger";
import {
  checkTimeIndex,
  indexLength,
  rangeIndex,
  type TimeIndex,
  TimeIndexSchema,
} from "./time-index";

export interface Series<T = number> {
  readonly index: TimeIndex;
  readonly values: readonly T[];
}

const SeriesShapeSchema = z.object({
  index: TimeIndexSchema,
  values: z.array(z.unknown()).readonly(),
});

/**
 * Structural check: an object with a valid time index and a values array
 * of the same length. A bare array is not a series.
 */
export function isSeries(value: unknown): value is Series<unknown> {
  const result = SeriesShapeSchema.safeParse(value);
  return result.success && indexLength(result.data.index) === result.data.values.length;
}

/**
 * Pair values with an index, defaulting to `rangeIndex(values.length)`.
 *
 * @throws {ValidationError} LENGTH_MISMATCH when index and values differ in length
 */
export function createSeries<T>(values: readonly T[], index?: TimeIndex): Series<T> {
  const timeIndex = index ?? rangeIndex(values.length);
  const length = indexLength(timeIndex);
  if (length !== values.length) {
    reject(
      "createSeries",
      new ValidationError(
        `Series index has ${length} positions but ${values.length} values were given`,
        "LENGTH_MISMATCH",
        { parameter: "index", details: { indexLength: length, valuesLength: values.length } }
      )
    );
  }
  return { index: timeIndex, values };
}

export interface CheckYOptions {
  /** Accept a series with no observations (default false) */
  allowEmpty?: boolean;
  /** Accept a series whose values are all equal (default true) */
  allowConstant?: boolean;
}

function sameValue(a: unknown, b: unknown): boolean {
  // NaN counts as equal to itself
  return a === b || Object.is(a, b);
}

function isConstant(values: readonly unknown[]): boolean {
  if (values.length === 0) {
    return false;
  }
  const first = values[0];
  return values.every((v) => sameValue(v, first));
}

/**
 * Validate a target series. Returns the same object; nothing is copied.
 *
 * @throws {ValidationError} WRONG_TYPE, EMPTY_SERIES, CONSTANT_SERIES, or any
 *   error raised by `checkTimeIndex`
 */
export function checkY<T>(y: Series<T>, options?: CheckYOptions): Series<T>;
export function checkY(y: unknown, options?: CheckYOptions): Series<unknown>;
export function checkY(y: unknown, options: CheckYOptions = {}): Series<unknown> {
  const { allowEmpty = false, allowConstant = true } = options;

  if (!isSeries(y)) {
    return reject("checkY", ValidationError.wrongType("y", "a series", y));
  }

  if (!allowEmpty && y.values.length < 1) {
    reject(
      "checkY",
      new ValidationError(
        "`y` must contain at least some observations, but found empty series",
        "EMPTY_SERIES",
        { parameter: "y" }
      )
    );
  }

  if (!allowConstant && isConstant(y.values)) {
    reject(
      "checkY",
      new ValidationError("All values of `y` are the same", "CONSTANT_SERIES", {
        parameter: "y",
        details: { value: y.values[0] },
      })
    );
  }

  checkTimeIndex(y.index);
  return y;
}
