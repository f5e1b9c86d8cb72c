/**
 * Time Index Consistency
 *
 * Series compared against each other (truth vs. prediction, target vs.
 * exogenous data) must sit on the same positions, and training data must
 * end strictly before the evaluation window starts.
 */

import { ValidationError } from "./errors";
import { reject } from "./logger";
import {
  checkTimeIndex,
  describeIndex,
  indexEquals,
  indexMax,
  indexMin,
  type TimeIndex,
} from "./time-index";

/** Anything that carries a time index, typically a `Series` */
export interface Indexed {
  readonly index: TimeIndex;
}

export interface ConsistencyOptions {
  /** Training data whose positions must all precede those of `ys` */
  yTrain?: Indexed | null;
}

/**
 * Check that every series in `ys` has exactly the index of the first one
 * and, if given, that `yTrain` ends before that index begins.
 *
 * @throws {ValidationError} INDEX_MISMATCH, TRAINING_LEAKS_INTO_TEST, or any
 *   error raised by `checkTimeIndex`
 */
export function checkConsistentTimeIndex(
  ys: readonly Indexed[],
  options: ConsistencyOptions = {}
): void {
  const [first, ...rest] = ys;
  if (first === undefined) {
    reject(
      "checkConsistentTimeIndex",
      ValidationError.wrongType("ys", "a non-empty list of series", ys)
    );
  }

  const reference = checkTimeIndex(first.index);

  rest.forEach((y, i) => {
    const index = checkTimeIndex(y.index);
    if (!indexEquals(reference, index)) {
      reject(
        "checkConsistentTimeIndex",
        new ValidationError(
          `Found inconsistent time indices: series ${i + 1} has ${describeIndex(index)}, ` +
            `expected ${describeIndex(reference)}`,
          "INDEX_MISMATCH",
          { parameter: "ys", details: { position: i + 1 } }
        )
      );
    }
  });

  const { yTrain } = options;
  if (yTrain === undefined || yTrain === null) {
    return;
  }

  const trainIndex = checkTimeIndex(yTrain.index);
  const trainEnd = indexMax(trainIndex);
  const testStart = indexMin(reference);
  if (trainEnd !== undefined && testStart !== undefined && trainEnd >= testStart) {
    reject(
      "checkConsistentTimeIndex",
      new ValidationError(
        `Found \`yTrain\` with time index which is not before the evaluation time index: ` +
          `training ends at ${trainEnd}, evaluation starts at ${testStart}`,
        "TRAINING_LEAKS_INTO_TEST",
        { parameter: "yTrain", details: { trainEnd, testStart } }
      )
    );
  }
}
