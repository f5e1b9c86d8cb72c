/**
 * Fitted-State Checks
 *
 * An estimator counts as fitted once the attributes its `fit` sets are
 * present. Message templates may contain `%(name)s`, which is replaced by
 * the estimator's class name.
 */

import { ValidationError } from "./errors";
import { reject } from "./logger";

export interface Estimator {
  fit(...args: never[]): unknown;
}

export type AllOrAny = "all" | "any";

export interface CheckIsFittedOptions {
  /** Message template, `%(name)s` is replaced by the estimator name */
  msg?: string;
  /** Require all attributes (default) or any one of them */
  allOrAny?: AllOrAny;
}

export const NOT_FITTED_MESSAGE =
  "This %(name)s instance is not fitted yet. Call 'fit' with appropriate arguments before using this method.";

export const NOT_FITTED_IN_TRANSFORM_MESSAGE =
  "This %(name)s instance has not been fitted yet. Call 'transform' with appropriate arguments before using this method.";

export function isEstimator(value: unknown): value is Estimator {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "fit") === "function";
}

export function estimatorName(estimator: object): string {
  return estimator.constructor?.name || "Estimator";
}

function hasAttribute(estimator: object, attribute: string): boolean {
  return attribute in estimator && Reflect.get(estimator, attribute) !== undefined;
}

/**
 * @throws {ValidationError} WRONG_TYPE if `estimator` has no `fit` method
 * @throws {ValidationError} NOT_FITTED if the attribute predicate fails
 */
export function checkIsFitted(
  estimator: unknown,
  attributes: string | readonly string[],
  options: CheckIsFittedOptions = {}
): void {
  const { msg = NOT_FITTED_MESSAGE, allOrAny = "all" } = options;

  if (!isEstimator(estimator)) {
    reject("checkIsFitted", ValidationError.wrongType("estimator", "an estimator instance", estimator));
  }

  const target: Estimator = estimator;
  const names: readonly string[] = typeof attributes === "string" ? [attributes] : attributes;
  const present = (attribute: string) => hasAttribute(target, attribute);
  const fitted = allOrAny === "all" ? names.every(present) : names.some(present);

  if (!fitted) {
    const name = estimatorName(target);
    reject(
      "checkIsFitted",
      new ValidationError(msg.replaceAll("%(name)s", name), "NOT_FITTED", {
        parameter: "estimator",
        details: { estimator: name, attributes: names, allOrAny },
      })
    );
  }
}

/**
 * `checkIsFitted` with a default message pointing at `transform`.
 */
export function checkIsFittedInTransform(
  estimator: unknown,
  attributes: string | readonly string[],
  options: CheckIsFittedOptions = {}
): void {
  checkIsFitted(estimator, attributes, {
    msg: options.msg ?? NOT_FITTED_IN_TRANSFORM_MESSAGE,
    allOrAny: options.allOrAny,
  });
}
