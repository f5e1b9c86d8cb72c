/**
 * Numeric sequence helpers shared by the index, horizon and cutoff validators.
 */

export type SignedIntegerArray = Int8Array | Int16Array | Int32Array;
export type UnsignedIntegerArray = Uint8Array | Uint8ClampedArray | Uint16Array | Uint32Array;
export type IntegerTypedArray = SignedIntegerArray | UnsignedIntegerArray;
export type FloatTypedArray = Float32Array | Float64Array;
export type NumericTypedArray = IntegerTypedArray | FloatTypedArray;

export function isSignedIntegerArray(value: unknown): value is SignedIntegerArray {
  return value instanceof Int8Array || value instanceof Int16Array || value instanceof Int32Array;
}

export function isUnsignedIntegerArray(value: unknown): value is UnsignedIntegerArray {
  return (
    value instanceof Uint8Array ||
    value instanceof Uint8ClampedArray ||
    value instanceof Uint16Array ||
    value instanceof Uint32Array
  );
}

export function isIntegerTypedArray(value: unknown): value is IntegerTypedArray {
  return isSignedIntegerArray(value) || isUnsignedIntegerArray(value);
}

export function isFloatTypedArray(value: unknown): value is FloatTypedArray {
  return value instanceof Float32Array || value instanceof Float64Array;
}

export function isNumericTypedArray(value: unknown): value is NumericTypedArray {
  return isIntegerTypedArray(value) || isFloatTypedArray(value);
}

/**
 * True for integral numbers that survive a round trip through a double.
 */
export function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

/**
 * Shape of a (possibly nested) plain array, following the first element
 * at each level: `[[1, 2], [3, 4]]` has shape `[2, 2]`.
 */
export function shapeOf(value: readonly unknown[]): number[] {
  const shape = [value.length];
  let current: unknown = value[0];
  while (Array.isArray(current)) {
    shape.push(current.length);
    current = current[0];
  }
  return shape;
}

export function sortAscending(values: Iterable<number>): number[] {
  return Array.from(values).sort((a, b) => a - b);
}
