import { describe, expect, test } from "vitest";
import { expectValidationError } from "./test-utils";
import {
  checkTimeIndex,
  describeIndex,
  indexEquals,
  indexLength,
  indexMax,
  indexMin,
  intIndex,
  integerValues,
  rangeIndex,
  toTimeIndex,
  uintIndex,
} from "./time-index";

describe("rangeIndex", () => {
  test("single argument is the stop", () => {
    expect(rangeIndex(4)).toEqual({ kind: "range", start: 0, stop: 4, step: 1 });
  });

  test("counts positions with a stride", () => {
    const index = rangeIndex(0, 10, 3);
    expect(indexLength(index)).toBe(4);
    expect(integerValues(index)).toEqual([0, 3, 6, 9]);
  });

  test("empty when stop is before start", () => {
    expect(indexLength(rangeIndex(5, 2))).toBe(0);
  });

  test("rejects a zero step", () => {
    const error = expectValidationError(() => rangeIndex(0, 4, 0), "OUT_OF_RANGE");
    expect(error.parameter).toBe("step");
  });

  test("rejects non-integer bounds", () => {
    const error = expectValidationError(() => rangeIndex(2.5), "WRONG_TYPE");
    expect(error.parameter).toBe("stop");
  });
});

describe("intIndex / uintIndex", () => {
  test("rejects non-integer values", () => {
    expectValidationError(() => intIndex([0, 1.5]), "WRONG_TYPE");
  });

  test("rejects negative unsigned values", () => {
    expectValidationError(() => uintIndex([0, -1]), "WRONG_TYPE");
  });
});

describe("toTimeIndex", () => {
  test("integer number arrays become int indices", () => {
    expect(toTimeIndex([-1, 0, 1])).toEqual({ kind: "int", values: [-1, 0, 1] });
  });

  test("fractional number arrays become float indices", () => {
    expect(toTimeIndex([0, 0.5]).kind).toBe("float");
  });

  test("typed arrays keep their signedness", () => {
    expect(toTimeIndex(Int32Array.from([1, 2]))).toEqual({ kind: "int", values: [1, 2] });
    expect(toTimeIndex(Uint16Array.from([1, 2]))).toEqual({ kind: "uint", values: [1, 2] });
    expect(toTimeIndex(Float64Array.from([1, 2])).kind).toBe("float");
  });

  test("dates become datetime indices", () => {
    expect(toTimeIndex([new Date(0)]).kind).toBe("datetime");
  });
});

describe("checkTimeIndex", () => {
  test("accepts an explicit sorted integer sequence", () => {
    expect(checkTimeIndex([0, 1, 2, 3])).toEqual({ kind: "int", values: [0, 1, 2, 3] });
  });

  test("accepts a dense range equivalent to the explicit sequence", () => {
    const range = checkTimeIndex(rangeIndex(4));
    expect(range.kind).toBe("range");
    expect(indexEquals(range, intIndex([0, 1, 2, 3]))).toBe(true);
  });

  test("returns an index object unchanged", () => {
    const index = intIndex([1, 2, 5]);
    expect(checkTimeIndex(index)).toBe(index);
  });

  test("tolerates repeated positions", () => {
    expect(checkTimeIndex([0, 0, 1]).kind).toBe("int");
  });

  test("accepts unsigned typed arrays", () => {
    expect(checkTimeIndex(Uint32Array.from([3, 4])).kind).toBe("uint");
  });

  test("rejects an unsorted sequence", () => {
    const error = expectValidationError(() => checkTimeIndex([3, 1, 2]), "UNSORTED_INDEX");
    expect(error.message).toBe("Time index must be sorted (monotonically increasing), but found: [3, 1, 2]");
  });

  test("rejects a descending range but not a single-element one", () => {
    expectValidationError(() => checkTimeIndex(rangeIndex(3, 0, -1)), "UNSORTED_INDEX");
    expect(checkTimeIndex(rangeIndex(5, 4, -1)).kind).toBe("range");
  });

  test("reports a descending range by its bounds without expanding it", () => {
    const error = expectValidationError(() => checkTimeIndex(rangeIndex(2 ** 32, 0, -1)), "UNSORTED_INDEX");
    expect(error.message).toBe(
      "Time index must be sorted (monotonically increasing), but found: range(start=4294967296, stop=0, step=-1)"
    );
  });

  test("accepts a range with 2^32 positions", () => {
    expect(checkTimeIndex(rangeIndex(0, 2 ** 32)).kind).toBe("range");
  });

  test("rejects float indices", () => {
    const error = expectValidationError(() => checkTimeIndex([0.5, 1.5]), "UNSUPPORTED_INDEX_KIND");
    expect(error.message).toBe(
      'Time index of kind "float" is not supported, please use one of range, int, uint instead'
    );
    expectValidationError(() => checkTimeIndex(Float64Array.from([1, 2])), "UNSUPPORTED_INDEX_KIND");
  });

  test("rejects calendar and period indices", () => {
    expectValidationError(
      () => checkTimeIndex([new Date(0), new Date(1000)]),
      "UNSUPPORTED_INDEX_KIND"
    );
    expectValidationError(
      () => checkTimeIndex({ kind: "period", values: ["2024-01", "2024-02"], freq: "M" }),
      "UNSUPPORTED_INDEX_KIND"
    );
  });

  test("rejects values that are not indices", () => {
    expectValidationError(() => checkTimeIndex("0,1,2"), "WRONG_TYPE");
    expectValidationError(() => checkTimeIndex(["a", "b"]), "WRONG_TYPE");
    expectValidationError(() => checkTimeIndex({ kind: "range", start: 0, stop: 3, step: 0 }), "WRONG_TYPE");
  });
});

describe("index inspection", () => {
  test("min and max ignore order", () => {
    expect(indexMin(intIndex([2, 5, 3]))).toBe(2);
    expect(indexMax(intIndex([2, 5, 3]))).toBe(5);
    expect(indexMax(rangeIndex(3, 10, 2))).toBe(9);
  });

  test("min and max of a range come from its bounds", () => {
    expect(indexMin(rangeIndex(10, 0, -3))).toBe(1);
    expect(indexMax(rangeIndex(10, 0, -3))).toBe(10);
    expect(indexMin(rangeIndex(0, 2 ** 32))).toBe(0);
    expect(indexMax(rangeIndex(0, 2 ** 32))).toBe(2 ** 32 - 1);
  });

  test("min and max of an empty index are undefined", () => {
    expect(indexMin(intIndex([]))).toBeUndefined();
    expect(indexMax(rangeIndex(0))).toBeUndefined();
  });

  test("equality is positional and order sensitive", () => {
    expect(indexEquals(intIndex([0, 1, 2]), intIndex([0, 1, 2]))).toBe(true);
    expect(indexEquals(intIndex([0, 1, 2]), intIndex([0, 1, 3]))).toBe(false);
    expect(indexEquals(intIndex([0, 1]), intIndex([0, 1, 2]))).toBe(false);
    expect(indexEquals(rangeIndex(0, 6, 2), intIndex([0, 2, 4]))).toBe(true);
    expect(indexEquals(rangeIndex(2, 3), rangeIndex(2, 3, 5))).toBe(true);
    expect(indexEquals(intIndex([0, 2, 5]), rangeIndex(0, 6, 2))).toBe(false);
  });

  test("describeIndex", () => {
    expect(describeIndex(rangeIndex(3))).toBe("range(start=0, stop=3, step=1)");
    expect(describeIndex(intIndex([1, 2]))).toBe("int[1, 2]");
  });
});
