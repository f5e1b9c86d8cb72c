/**
 * Collaborator Capabilities
 *
 * Cross-validators and scoring metrics live outside this package. Callers
 * hand in the abstraction they require as a `Capability`, either built
 * from a base class with `instanceCapability` or one of the structural
 * defaults below.
 */

import type { Indexed } from "./consistency";
import { ValidationError } from "./errors";
import { reject } from "./logger";
import type { Series } from "./series";

export interface Capability<T> {
  /** Name used in error messages */
  readonly name: string;
  matches(value: unknown): value is T;
}

/** Train and test positions of one split */
export type TrainTestSplit = readonly [train: readonly number[], test: readonly number[]];

export interface TemporalCrossValidator {
  split(y: Indexed): Iterable<TrainTestSplit>;
  getNSplits(y?: Indexed): number;
  getCutoffs(y?: Indexed): readonly number[];
}

export interface ForecastingMetric {
  (yTrue: Series, yPred: Series): number;
  readonly metricName: string;
  readonly greaterIsBetter: boolean;
}

export function instanceCapability<T>(
  base: abstract new (...args: never[]) => T,
  name: string = base.name
): Capability<T> {
  return {
    name,
    matches: (value: unknown): value is T => value instanceof base,
  };
}

function hasMethods(value: unknown, methods: readonly string[]): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    methods.every((method) => typeof Reflect.get(value, method) === "function")
  );
}

export const temporalCrossValidatorCapability: Capability<TemporalCrossValidator> = {
  name: "TemporalCrossValidator",
  matches: (value: unknown): value is TemporalCrossValidator =>
    hasMethods(value, ["split", "getNSplits", "getCutoffs"]),
};

export const forecastingMetricCapability: Capability<ForecastingMetric> = {
  name: "ForecastingMetric",
  matches: (value: unknown): value is ForecastingMetric =>
    typeof value === "function" &&
    typeof Reflect.get(value, "metricName") === "string" &&
    typeof Reflect.get(value, "greaterIsBetter") === "boolean",
};

/**
 * @throws {ValidationError} WRONG_TYPE if `cv` does not provide the capability
 */
export function checkCv(
  cv: unknown,
  capability: Capability<TemporalCrossValidator> = temporalCrossValidatorCapability
): TemporalCrossValidator {
  if (!capability.matches(cv)) {
    return reject(
      "checkCv",
      new ValidationError(`\`cv\` is not an instance of ${capability.name}`, "WRONG_TYPE", {
        parameter: "cv",
        details: { required: capability.name },
      })
    );
  }
  return cv;
}

export interface CheckScoringOptions {
  /** Metric used when no scoring function is supplied */
  createDefault: () => ForecastingMetric;
  capability?: Capability<ForecastingMetric>;
}

/**
 * Resolve the scoring function, falling back to the injected default.
 *
 * @throws {ValidationError} WRONG_TYPE if `scoring` is not callable or does
 *   not provide the capability
 */
export function checkScoring(scoring: unknown, options: CheckScoringOptions): ForecastingMetric {
  const { createDefault, capability = forecastingMetricCapability } = options;

  if (scoring === null || scoring === undefined) {
    return createDefault();
  }

  if (typeof scoring !== "function") {
    reject(
      "checkScoring",
      ValidationError.wrongType("scoring", "a callable object", scoring)
    );
  }

  if (!capability.matches(scoring)) {
    return reject(
      "checkScoring",
      new ValidationError(`\`scoring\` must implement \`${capability.name}\``, "WRONG_TYPE", {
        parameter: "scoring",
        details: { required: capability.name },
      })
    );
  }

  return scoring;
}
