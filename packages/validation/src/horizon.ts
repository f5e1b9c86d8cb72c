/**
 * Forecasting Horizon
 *
 * Normalizes a user-supplied horizon (a single step, a list of steps or an
 * integer typed array) into a sorted, duplicate-free list of integer steps.
 * Steps may be zero or negative: callers read them as in-sample or
 * relative offsets, so the sign is left alone here.
 */

import {
  isFloatTypedArray,
  isInteger,
  isIntegerTypedArray,
  shapeOf,
  sortAscending,
} from "./arrays";
import { describeValue, ValidationError } from "./errors";
import { reject } from "./logger";

/** Sorted ascending, no repeated steps */
export type ForecastingHorizon = readonly number[];

function toSteps(fh: unknown): number[] {
  if (isInteger(fh)) {
    return [fh];
  }

  if (isFloatTypedArray(fh)) {
    return reject(
      "checkFh",
      new ValidationError(
        `If \`fh\` is passed as an array, it must be an array of integers, but found an array of type: ${fh.constructor.name}`,
        "NON_INTEGER_HORIZON",
        { parameter: "fh" }
      )
    );
  }
  if (isIntegerTypedArray(fh)) {
    return Array.from(fh);
  }

  if (Array.isArray(fh)) {
    if (fh.some((step) => Array.isArray(step))) {
      const shape = shapeOf(fh);
      return reject(
        "checkFh",
        new ValidationError(
          `\`fh\` must be a 1d array, but found shape: (${shape.join(", ")})`,
          "WRONG_DIMENSION",
          { parameter: "fh", details: { shape } }
        )
      );
    }
    const steps: number[] = [];
    for (const step of fh) {
      if (!isInteger(step)) {
        return reject(
          "checkFh",
          new ValidationError(
            `If \`fh\` is passed as a list, it has to be a list of integers, but found: ${describeValue(step)}`,
            "NON_INTEGER_HORIZON",
            { parameter: "fh" }
          )
        );
      }
      steps.push(step);
    }
    return steps;
  }

  return reject(
    "checkFh",
    ValidationError.wrongType("fh", "an integer, a list of integers or an integer array", fh)
  );
}

/**
 * Validate and normalize a forecasting horizon. Always returns a new array,
 * so normalizing an already-normalized horizon yields an equal copy.
 *
 * @throws {ValidationError} WRONG_TYPE, WRONG_DIMENSION, NON_INTEGER_HORIZON,
 *   EMPTY_HORIZON, DUPLICATE_HORIZON_STEPS
 */
export function checkFh(fh: unknown): ForecastingHorizon {
  const steps = toSteps(fh);

  if (steps.length < 1) {
    reject(
      "checkFh",
      new ValidationError(
        "`fh` cannot be empty, please specify at least one step to forecast",
        "EMPTY_HORIZON",
        { parameter: "fh" }
      )
    );
  }

  const unique = new Set(steps);
  if (unique.size !== steps.length) {
    const duplicates = sortAscending(new Set(steps.filter((step, i) => steps.indexOf(step) !== i)));
    reject(
      "checkFh",
      new ValidationError(
        `\`fh\` should not contain duplicates, but found repeated steps: ${describeValue(duplicates)}`,
        "DUPLICATE_HORIZON_STEPS",
        { parameter: "fh", details: { duplicates } }
      )
    );
  }

  return sortAscending(steps);
}
