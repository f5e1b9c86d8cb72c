/**
 * Forecasting Entry Points
 *
 * Composite checks run by estimators before `fit` and by evaluation code
 * after `predict`.
 */

import { checkConsistentTimeIndex } from "./consistency";
import { checkX, type NestedTable, nestedIndex } from "./nested-table";
import { checkY, type Series } from "./series";

/**
 * Validate a target series together with its exogenous table. The table's
 * shared cell index must equal the target's index.
 *
 * @throws {ValidationError} anything `checkY` or `checkX` raise, or
 *   INDEX_MISMATCH when the table is not aligned with `y`
 */
export function checkYX(y: unknown, X: unknown): { y: Series<unknown>; X: NestedTable } {
  const series = checkY(y);
  const table = checkX(X);

  const index = nestedIndex(table);
  if (index !== undefined) {
    checkConsistentTimeIndex([series, { index }]);
  }

  return { y: series, X: table };
}

export interface ForecastOutput<T = number> {
  yTrue: Series<T>;
  yPred: Series<T>;
  /** Observations the forecaster was fitted on */
  yTrain?: Series<T> | null;
}

/**
 * Validate predictions against the truth: both non-empty, on identical
 * indices, and (when given) strictly after the training data.
 *
 * @throws {ValidationError} anything `checkY` or `checkConsistentTimeIndex` raise
 */
export function checkForecastOutput<T>(output: ForecastOutput<T>): ForecastOutput<T> {
  const yTrue = checkY(output.yTrue);
  const yPred = checkY(output.yPred);
  const yTrain =
    output.yTrain === undefined || output.yTrain === null
      ? output.yTrain
      : checkY(output.yTrain, { allowEmpty: true });

  checkConsistentTimeIndex([yTrue, yPred], { yTrain });

  return { yTrue, yPred, yTrain };
}
