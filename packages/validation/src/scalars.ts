/**
 * Scalar Parameter Validators
 *
 * Window, step and seasonal lengths, confidence levels and cutoff points.
 * For the length parameters `null`/`undefined` means "unset" and passes
 * through unchanged.
 */

import { isInteger, isIntegerTypedArray, shapeOf, sortAscending } from "./arrays";
import { describeValue, ValidationError } from "./errors";
import { reject } from "./logger";

type Unset = null | undefined;

function checkPositiveInteger<T extends number | Unset>(
  validator: string,
  parameter: string,
  value: T
): T {
  if (value === null || value === undefined) {
    return value;
  }
  if (!isInteger(value)) {
    reject(validator, ValidationError.wrongType(parameter, "a positive integer >= 1 or unset", value));
  }
  if (value < 1) {
    reject(validator, ValidationError.outOfRange(parameter, "a positive integer >= 1 or unset", value));
  }
  return value;
}

export function checkWindowLength<T extends number | Unset>(windowLength: T): T {
  return checkPositiveInteger("checkWindowLength", "windowLength", windowLength);
}

export function checkStepLength<T extends number | Unset>(stepLength: T): T {
  return checkPositiveInteger("checkStepLength", "stepLength", stepLength);
}

/**
 * Validate seasonal periodicity (observations per season).
 */
export function checkSp<T extends number | Unset>(sp: T): T {
  return checkPositiveInteger("checkSp", "sp", sp);
}

/**
 * Validate one confidence level or a list of them. Every value must lie in
 * the open interval (0, 1); a single value is returned as a one-element list.
 * An empty list has nothing to reject and comes back as `[]`.
 *
 * @throws {ValidationError} WRONG_TYPE, OUT_OF_RANGE
 */
export function checkAlpha(alpha: unknown): number[] {
  let levels: number[];
  if (typeof alpha === "number") {
    levels = [alpha];
  } else if (Array.isArray(alpha)) {
    levels = [];
    for (const level of alpha) {
      if (typeof level !== "number") {
        return reject(
          "checkAlpha",
          new ValidationError(
            `When \`alpha\` is passed as a list, it must be a list of numbers, but found: ${describeValue(level)}`,
            "WRONG_TYPE",
            { parameter: "alpha" }
          )
        );
      }
      levels.push(level);
    }
  } else {
    return reject("checkAlpha", ValidationError.wrongType("alpha", "a number or a list of numbers", alpha));
  }

  for (const level of levels) {
    // written so that NaN fails
    if (!(level > 0 && level < 1)) {
      reject("checkAlpha", ValidationError.outOfRange("alpha", "in the open interval (0, 1)", level));
    }
  }

  return levels;
}

/**
 * Validate cutoff points and return them sorted ascending as a new array.
 *
 * @throws {ValidationError} WRONG_TYPE, WRONG_DIMENSION, EMPTY_CUTOFFS
 */
export function checkCutoffs(cutoffs: unknown): number[] {
  let points: number[];
  if (isIntegerTypedArray(cutoffs)) {
    points = Array.from(cutoffs);
  } else if (Array.isArray(cutoffs)) {
    if (cutoffs.some((cutoff) => Array.isArray(cutoff))) {
      const shape = shapeOf(cutoffs);
      return reject(
        "checkCutoffs",
        new ValidationError(
          `\`cutoffs\` must be a 1-dimensional array, but found shape: (${shape.join(", ")})`,
          "WRONG_DIMENSION",
          { parameter: "cutoffs", details: { shape } }
        )
      );
    }
    points = [];
    for (const cutoff of cutoffs) {
      if (!isInteger(cutoff)) {
        return reject(
          "checkCutoffs",
          new ValidationError(
            `All cutoff points must be integers, but found: ${describeValue(cutoff)}`,
            "WRONG_TYPE",
            { parameter: "cutoffs" }
          )
        );
      }
      points.push(cutoff);
    }
  } else {
    return reject("checkCutoffs", ValidationError.wrongType("cutoffs", "an array of integers", cutoffs));
  }

  if (points.length < 1) {
    reject(
      "checkCutoffs",
      new ValidationError("Found empty `cutoffs` array", "EMPTY_CUTOFFS", { parameter: "cutoffs" })
    );
  }

  return sortAscending(points);
}
