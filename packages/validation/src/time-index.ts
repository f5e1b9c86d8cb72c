/**
 * Time Index
 *
 * Ordered observation positions attached to a series. Only integer
 * positions are supported: either a dense generated range or an explicit
 * signed/unsigned integer sequence. Float, calendar and period indices
 * can be represented (so they can be reported) but are rejected by
 * `checkTimeIndex`.
 */

import { z } from "zod";
import {
  isFloatTypedArray,
  isNumericTypedArray,
  isInteger,
  isSignedIntegerArray,
  isUnsignedIntegerArray,
  type NumericTypedArray,
} from "./arrays";
import { describeValue, ValidationError } from "./errors";
import { reject } from "./logger";

// ============================================
// Schemas
// ============================================

export const RangeIndexSchema = z.object({
  kind: z.literal("range"),
  start: z.number().int(),
  stop: z.number().int(),
  step: z
    .number()
    .int()
    .refine((step) => step !== 0, { message: "step must be non-zero" }),
});
export type RangeIndex = z.infer<typeof RangeIndexSchema>;

export const IntIndexSchema = z.object({
  kind: z.literal("int"),
  values: z.array(z.number().int()).readonly(),
});
export type IntIndex = z.infer<typeof IntIndexSchema>;

export const UintIndexSchema = z.object({
  kind: z.literal("uint"),
  values: z.array(z.number().int().nonnegative()).readonly(),
});
export type UintIndex = z.infer<typeof UintIndexSchema>;

export const FloatIndexSchema = z.object({
  kind: z.literal("float"),
  values: z.array(z.number()).readonly(),
});
export type FloatIndex = z.infer<typeof FloatIndexSchema>;

export const DatetimeIndexSchema = z.object({
  kind: z.literal("datetime"),
  values: z.array(z.date()).readonly(),
});
export type DatetimeIndex = z.infer<typeof DatetimeIndexSchema>;

export const PeriodIndexSchema = z.object({
  kind: z.literal("period"),
  values: z.array(z.string()).readonly(),
  /** Period frequency, e.g. "M" or "Q" */
  freq: z.string(),
});
export type PeriodIndex = z.infer<typeof PeriodIndexSchema>;

export const TimeIndexSchema = z.discriminatedUnion("kind", [
  RangeIndexSchema,
  IntIndexSchema,
  UintIndexSchema,
  FloatIndexSchema,
  DatetimeIndexSchema,
  PeriodIndexSchema,
]);
export type TimeIndex = z.infer<typeof TimeIndexSchema>;

/** Index kinds accepted by `checkTimeIndex` */
export type SupportedTimeIndex = RangeIndex | IntIndex | UintIndex;
export const SUPPORTED_INDEX_KINDS = ["range", "int", "uint"] as const;

/** A raw sequence that `toTimeIndex` can wrap */
export type RawIndex = readonly number[] | NumericTypedArray | readonly Date[];

export type IndexLabel = number | Date | string;

export function isTimeIndex(value: unknown): value is TimeIndex {
  return TimeIndexSchema.safeParse(value).success;
}

export function isSupportedTimeIndex(index: TimeIndex): index is SupportedTimeIndex {
  return index.kind === "range" || index.kind === "int" || index.kind === "uint";
}

// ============================================
// Construction
// ============================================

/**
 * Dense integer range, `rangeIndex(4)` is 0, 1, 2, 3.
 */
export function rangeIndex(stop: number): RangeIndex;
export function rangeIndex(start: number, stop: number, step?: number): RangeIndex;
export function rangeIndex(startOrStop: number, stop?: number, step = 1): RangeIndex {
  const start = stop === undefined ? 0 : startOrStop;
  const end = stop === undefined ? startOrStop : stop;

  for (const [name, value] of [
    ["start", start],
    ["stop", end],
    ["step", step],
  ] as const) {
    if (!isInteger(value)) {
      reject("rangeIndex", ValidationError.wrongType(name, "an integer", value));
    }
  }
  if (step === 0) {
    reject("rangeIndex", ValidationError.outOfRange("step", "a non-zero integer", step));
  }

  return { kind: "range", start, stop: end, step };
}

export function intIndex(values: readonly number[]): IntIndex {
  const invalid = values.find((v) => !isInteger(v));
  if (invalid !== undefined) {
    reject(
      "intIndex",
      new ValidationError(
        `Integer index values must be integers, but found: ${describeValue(invalid)}`,
        "WRONG_TYPE",
        { parameter: "index" }
      )
    );
  }
  return { kind: "int", values };
}

export function uintIndex(values: readonly number[]): UintIndex {
  const invalid = values.find((v) => !isInteger(v) || v < 0);
  if (invalid !== undefined) {
    reject(
      "uintIndex",
      new ValidationError(
        `Unsigned index values must be non-negative integers, but found: ${describeValue(invalid)}`,
        "WRONG_TYPE",
        { parameter: "index" }
      )
    );
  }
  return { kind: "uint", values };
}

function isDateArray(values: readonly unknown[]): values is readonly Date[] {
  return values.every((v) => v instanceof Date);
}

function isNumberArray(values: readonly unknown[]): values is readonly number[] {
  return values.every((v) => typeof v === "number");
}

/**
 * Wrap a raw sequence into a time index. The kind follows the element
 * type: integer typed arrays keep their signedness, plain number arrays
 * are `int` when every element is integral and `float` otherwise.
 */
export function toTimeIndex(raw: RawIndex): TimeIndex {
  if (isSignedIntegerArray(raw)) {
    return { kind: "int", values: Array.from(raw) };
  }
  if (isUnsignedIntegerArray(raw)) {
    return { kind: "uint", values: Array.from(raw) };
  }
  if (isFloatTypedArray(raw)) {
    return { kind: "float", values: Array.from(raw) };
  }
  if (isNumberArray(raw)) {
    return raw.every((v) => isInteger(v))
      ? { kind: "int", values: raw }
      : { kind: "float", values: raw };
  }
  if (isDateArray(raw)) {
    return { kind: "datetime", values: raw };
  }
  return reject("toTimeIndex", ValidationError.wrongType("index", "an array of numbers or dates", raw));
}

// ============================================
// Inspection
// ============================================

export function indexLength(index: TimeIndex): number {
  if (index.kind === "range") {
    return Math.max(0, Math.ceil((index.stop - index.start) / index.step));
  }
  return index.values.length;
}

/**
 * Every position, with ranges expanded.
 */
export function integerValues(index: SupportedTimeIndex): readonly number[] {
  if (index.kind === "range") {
    return Array.from({ length: indexLength(index) }, (_, i) => index.start + i * index.step);
  }
  return index.values;
}

export function indexValues(index: TimeIndex): readonly IndexLabel[] {
  if (index.kind === "range") {
    return integerValues(index);
  }
  return index.values;
}

export function indexMin(index: SupportedTimeIndex): number | undefined {
  if (index.kind === "range") {
    const n = indexLength(index);
    if (n === 0) {
      return undefined;
    }
    return index.step > 0 ? index.start : index.start + (n - 1) * index.step;
  }
  return index.values.reduce<number | undefined>((min, v) => (min === undefined || v < min ? v : min), undefined);
}

export function indexMax(index: SupportedTimeIndex): number | undefined {
  if (index.kind === "range") {
    const n = indexLength(index);
    if (n === 0) {
      return undefined;
    }
    return index.step > 0 ? index.start + (n - 1) * index.step : index.start;
  }
  return index.values.reduce<number | undefined>((max, v) => (max === undefined || v > max ? v : max), undefined);
}

/**
 * Non-decreasing check. Repeated positions count as sorted.
 */
export function isMonotonicIncreasing(index: SupportedTimeIndex): boolean {
  if (index.kind === "range") {
    return index.step > 0 || indexLength(index) <= 1;
  }
  for (let i = 1; i < index.values.length; i++) {
    const prev = index.values[i - 1];
    const curr = index.values[i];
    if (prev !== undefined && curr !== undefined && curr < prev) {
      return false;
    }
  }
  return true;
}

function labelAt(index: TimeIndex, position: number): IndexLabel | undefined {
  if (index.kind === "range") {
    return index.start + position * index.step;
  }
  return index.values[position];
}

function labelsEqual(a: IndexLabel | undefined, b: IndexLabel | undefined): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

/**
 * Positional equality: same length and the same label at every position.
 * The representation does not matter, `rangeIndex(3)` equals `intIndex([0, 1, 2])`.
 */
export function indexEquals(a: TimeIndex, b: TimeIndex): boolean {
  if (indexLength(a) !== indexLength(b)) {
    return false;
  }
  if (a.kind === "range" && b.kind === "range") {
    return indexLength(a) === 0 || (a.start === b.start && (a.step === b.step || indexLength(a) === 1));
  }
  const n = indexLength(a);
  for (let i = 0; i < n; i++) {
    if (!labelsEqual(labelAt(a, i), labelAt(b, i))) {
      return false;
    }
  }
  return true;
}

export function describeIndex(index: TimeIndex): string {
  if (index.kind === "range") {
    return `range(start=${index.start}, stop=${index.stop}, step=${index.step})`;
  }
  return `${index.kind}${describeValue(index.values)}`;
}

// ============================================
// Validation
// ============================================

/**
 * Validate a time index, wrapping raw sequences first.
 *
 * @throws {ValidationError} UNSUPPORTED_INDEX_KIND for float, datetime or period indices
 * @throws {ValidationError} UNSORTED_INDEX if positions ever decrease
 */
export function checkTimeIndex(index: unknown): SupportedTimeIndex {
  let timeIndex: TimeIndex;
  if (Array.isArray(index) || isNumericTypedArray(index)) {
    timeIndex = toTimeIndex(index);
  } else if (isTimeIndex(index)) {
    timeIndex = index;
  } else {
    return reject(
      "checkTimeIndex",
      ValidationError.wrongType("index", "a time index or an array of integers", index)
    );
  }

  if (!isSupportedTimeIndex(timeIndex)) {
    return reject(
      "checkTimeIndex",
      ValidationError.unsupportedIndexKind(timeIndex.kind, SUPPORTED_INDEX_KINDS)
    );
  }

  if (!isMonotonicIncreasing(timeIndex)) {
    const found = timeIndex.kind === "range" ? describeIndex(timeIndex) : describeValue(timeIndex.values);
    reject("checkTimeIndex", ValidationError.unsortedIndex(found));
  }

  return timeIndex;
}
