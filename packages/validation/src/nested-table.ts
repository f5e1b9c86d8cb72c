/**
 * Nested Table
 *
 * A single-row table whose cells are themselves time series, used to
 * carry one multivariate instance. Cells are either indexed (a full
 * series) or raw (a bare sequence positioned 0..n-1).
 */

import { z } from "zod";
import { isNumericTypedArray, type NumericTypedArray } from "./arrays";
import { ValidationError } from "./errors";
import { reject } from "./logger";
import { isSeries, type Series } from "./series";
import { describeIndex, indexEquals, indexLength, rangeIndex, type TimeIndex } from "./time-index";

export interface IndexedCell {
  readonly kind: "indexed";
  readonly series: Series<unknown>;
}

export interface RawCell {
  readonly kind: "raw";
  readonly values: readonly unknown[] | NumericTypedArray;
}

export type NestedCell = IndexedCell | RawCell;

export interface NestedTable {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly NestedCell[])[];
}

const NestedCellSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("indexed"),
    series: z.custom<Series<unknown>>(isSeries),
  }),
  z.object({
    kind: z.literal("raw"),
    values: z.union([
      z.array(z.unknown()).readonly(),
      z.custom<NumericTypedArray>(isNumericTypedArray),
    ]),
  }),
]);

const NestedTableSchema = z
  .object({
    columns: z.array(z.string()).readonly(),
    rows: z.array(z.array(NestedCellSchema).readonly()).readonly(),
  })
  .refine((table) => table.rows.every((row) => row.length === table.columns.length), {
    message: "every row must have one cell per column",
  });

export function isNestedTable(value: unknown): value is NestedTable {
  return NestedTableSchema.safeParse(value).success;
}

export function indexedCell(series: Series<unknown>): IndexedCell {
  return { kind: "indexed", series };
}

export function rawCell(values: readonly unknown[] | NumericTypedArray): RawCell {
  return { kind: "raw", values };
}

/**
 * Build a one-row table from column name → cell.
 */
export function createNestedTable(cells: Record<string, NestedCell>): NestedTable {
  return {
    columns: Object.keys(cells),
    rows: [Object.values(cells)],
  };
}

/**
 * Index a cell is positioned on: the series index for indexed cells, a
 * dense range over the element count for raw cells.
 */
export function effectiveIndex(cell: NestedCell): TimeIndex {
  switch (cell.kind) {
    case "indexed":
      return cell.series.index;
    case "raw":
      return rangeIndex(cell.values.length);
  }
}

/**
 * Index of the first cell, which a validated table shares across columns.
 */
export function nestedIndex(X: NestedTable): TimeIndex | undefined {
  const cell = X.rows[0]?.[0];
  return cell === undefined ? undefined : effectiveIndex(cell);
}

/**
 * Validate a nested table and require every cell to share the first
 * column's index. Returns the same object.
 *
 * @throws {ValidationError} WRONG_TYPE, MULTI_ROW_INPUT, EMPTY_NESTED_SERIES,
 *   INCONSISTENT_NESTED_INDEX
 */
export function checkX(X: unknown): NestedTable {
  if (!isNestedTable(X)) {
    return reject("checkX", ValidationError.wrongType("X", "a nested table", X));
  }

  if (X.rows.length > 1) {
    reject(
      "checkX",
      new ValidationError(
        `\`X\` must consist of a single row, but found: ${X.rows.length} rows`,
        "MULTI_ROW_INPUT",
        { parameter: "X", details: { rows: X.rows.length } }
      )
    );
  }

  const row = X.rows[0];
  const firstColumn = X.columns[0];
  const firstCell = row?.[0];
  if (row === undefined || firstColumn === undefined || firstCell === undefined) {
    return reject(
      "checkX",
      new ValidationError(
        `\`X\` must contain one row with at least one column, but found ${X.rows.length} rows and ${X.columns.length} columns`,
        "EMPTY_NESTED_SERIES",
        { parameter: "X" }
      )
    );
  }

  const referenceIndex = effectiveIndex(firstCell);
  if (indexLength(referenceIndex) < 1) {
    reject(
      "checkX",
      new ValidationError(
        `Time series must contain at least 1 observation, but found: 0 observations in column: ${firstColumn}`,
        "EMPTY_NESTED_SERIES",
        { parameter: "X", details: { column: firstColumn } }
      )
    );
  }

  for (let c = 1; c < X.columns.length; c++) {
    const column = X.columns[c];
    const cell = row[c];
    if (column === undefined || cell === undefined) {
      continue;
    }
    const index = effectiveIndex(cell);
    if (!indexEquals(referenceIndex, index)) {
      reject(
        "checkX",
        new ValidationError(
          `Found time series with unequal index in column ${column}. Input time-series must have the same index. ` +
            `Expected ${describeIndex(referenceIndex)}, found ${describeIndex(index)}`,
          "INCONSISTENT_NESTED_INDEX",
          { parameter: "X", details: { column } }
        )
      );
    }
  }

  return X;
}
