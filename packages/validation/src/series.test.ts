import { describe, expect, test } from "vitest";
import { checkY, createSeries, isSeries } from "./series";
import { expectValidationError } from "./test-utils";
import { intIndex, rangeIndex, toTimeIndex } from "./time-index";

describe("createSeries", () => {
  test("defaults to a dense range index", () => {
    const y = createSeries([10, 11, 12]);
    expect(y.index).toEqual({ kind: "range", start: 0, stop: 3, step: 1 });
  });

  test("rejects an index of a different length", () => {
    const error = expectValidationError(() => createSeries([1, 2], rangeIndex(3)), "LENGTH_MISMATCH");
    expect(error.message).toBe("Series index has 3 positions but 2 values were given");
  });
});

describe("isSeries", () => {
  test("bare arrays are not series", () => {
    expect(isSeries([1, 2, 3])).toBe(false);
  });

  test("objects whose index and values differ in length are not series", () => {
    expect(isSeries({ index: rangeIndex(3), values: [1, 2] })).toBe(false);
  });

  test("plain objects with an index and values are series", () => {
    expect(isSeries({ index: intIndex([4, 5]), values: ["a", "b"] })).toBe(true);
  });
});

describe("checkY", () => {
  test("returns the same series", () => {
    const y = createSeries([1, 2, 3], intIndex([5, 6, 7]));
    expect(checkY(y)).toBe(y);
  });

  test("rejects a bare array", () => {
    const error = expectValidationError(() => checkY([1, 2, 3]), "WRONG_TYPE");
    expect(error.message).toBe("`y` must be a series, but found type: Array");
  });

  test("rejects an empty series unless allowed", () => {
    const y = createSeries([]);
    expectValidationError(() => checkY(y), "EMPTY_SERIES");
    expect(checkY(y, { allowEmpty: true })).toBe(y);
  });

  test("allows constant series by default", () => {
    const y = createSeries([2, 2, 2]);
    expect(checkY(y)).toBe(y);
  });

  test("rejects constant series when asked", () => {
    const error = expectValidationError(
      () => checkY(createSeries([2, 2, 2]), { allowConstant: false }),
      "CONSTANT_SERIES"
    );
    expect(error.message).toBe("All values of `y` are the same");
    expectValidationError(
      () => checkY(createSeries([Number.NaN, Number.NaN]), { allowConstant: false }),
      "CONSTANT_SERIES"
    );
  });

  test("non-constant series pass the constant check", () => {
    const y = createSeries([2, 2, 3]);
    expect(checkY(y, { allowConstant: false })).toBe(y);
  });

  test("an empty series is not reported as constant", () => {
    const y = createSeries([]);
    expect(checkY(y, { allowEmpty: true, allowConstant: false })).toBe(y);
  });

  test("propagates index failures", () => {
    expectValidationError(() => checkY(createSeries([1, 2, 3], intIndex([2, 1, 0]))), "UNSORTED_INDEX");
    expectValidationError(
      () => checkY(createSeries([1, 2], toTimeIndex([new Date(0), new Date(1)]))),
      "UNSUPPORTED_INDEX_KIND"
    );
  });
});
