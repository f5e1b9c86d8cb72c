/**
 * @chronocheck/validation - Forecasting Input Contracts
 *
 * Validators run before an estimator fits or predicts: time index
 * ordering and alignment, forecasting horizon normalization, nested
 * exogenous tables and scalar parameters.
 *
 * @module @chronocheck/validation
 */

export const PACKAGE_NAME = "@chronocheck/validation";
export const VERSION = "0.1.0";

// Errors
export {
  describeValue,
  hasErrorCode,
  isValidationError,
  typeName,
  ValidationError,
  type ValidationErrorCode,
  type ValidationErrorOptions,
} from "./errors";

// Configuration
export { LogLevel, loadValidationConfig, type ValidationConfig, type ValidationEnv } from "./env";

// Time index
export {
  type DatetimeIndex,
  type FloatIndex,
  type IndexLabel,
  type IntIndex,
  type PeriodIndex,
  type RangeIndex,
  type RawIndex,
  type SupportedTimeIndex,
  type TimeIndex,
  type UintIndex,
  checkTimeIndex,
  describeIndex,
  indexEquals,
  indexLength,
  indexMax,
  indexMin,
  indexValues,
  intIndex,
  integerValues,
  isMonotonicIncreasing,
  isSupportedTimeIndex,
  isTimeIndex,
  rangeIndex,
  SUPPORTED_INDEX_KINDS,
  TimeIndexSchema,
  toTimeIndex,
  uintIndex,
} from "./time-index";

// Series
export { type CheckYOptions, checkY, createSeries, isSeries, type Series } from "./series";

// Nested tables
export {
  checkX,
  createNestedTable,
  effectiveIndex,
  type IndexedCell,
  indexedCell,
  isNestedTable,
  type NestedCell,
  type NestedTable,
  nestedIndex,
  type RawCell,
  rawCell,
} from "./nested-table";

// Consistency
export { checkConsistentTimeIndex, type ConsistencyOptions, type Indexed } from "./consistency";

// Horizon
export { checkFh, type ForecastingHorizon } from "./horizon";

// Scalar parameters
export { checkAlpha, checkCutoffs, checkSp, checkStepLength, checkWindowLength } from "./scalars";

// Composite entry points
export { checkForecastOutput, checkYX, type ForecastOutput } from "./forecasting";

// Collaborators
export {
  type AllOrAny,
  type CheckIsFittedOptions,
  checkIsFitted,
  checkIsFittedInTransform,
  type Estimator,
  estimatorName,
  isEstimator,
  NOT_FITTED_IN_TRANSFORM_MESSAGE,
  NOT_FITTED_MESSAGE,
} from "./estimator";
export {
  type Capability,
  type CheckScoringOptions,
  checkCv,
  checkScoring,
  type ForecastingMetric,
  forecastingMetricCapability,
  instanceCapability,
  type TemporalCrossValidator,
  temporalCrossValidatorCapability,
  type TrainTestSplit,
} from "./capabilities";

// Sequence helpers
export {
  type FloatTypedArray,
  type IntegerTypedArray,
  isInteger,
  type NumericTypedArray,
} from "./arrays";
