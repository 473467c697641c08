/**
 * pg-fluent - Row Reader
 *
 * Typed view over one decoded row. Column decoding itself belongs to the
 * driver; this only checks that a value has the shape a decoder asked for.
 */

import { QueryError } from "../types/index.js";

export type RowValues = Readonly<Record<string, unknown>>;

export class RowReader {
  private values: RowValues = {};

  constructor(public readonly columns: readonly string[] = []) {}

  /** Points the reader at the driver's current row */
  setCurrent(values: RowValues): void {
    this.values = values;
  }

  value(column: string): unknown {
    if (!Object.prototype.hasOwnProperty.call(this.values, column)) {
      throw new QueryError(`Column '${column}' was not found in the result set`, {
        column,
        columns: [...this.columns],
      });
    }
    return this.values[column];
  }

  isNull(column: string): boolean {
    return this.value(column) === null;
  }

  text(column: string): string {
    const value = this.value(column);
    if (typeof value !== "string") {
      throw this.mismatch(column, "text", value);
    }
    return value;
  }

  textOrNone(column: string): string | null {
    return this.isNull(column) ? null : this.text(column);
  }

  int(column: string): number {
    const value = this.value(column);
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw this.mismatch(column, "int", value);
    }
    return value;
  }

  intOrNone(column: string): number | null {
    return this.isNull(column) ? null : this.int(column);
  }

  /** pg returns int8 as a string to avoid precision loss */
  bigint(column: string): bigint {
    const value = this.value(column);
    if (typeof value === "bigint") return value;
    if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
    if (typeof value === "string" && /^-?\d+$/.test(value)) return BigInt(value);
    throw this.mismatch(column, "bigint", value);
  }

  double(column: string): number {
    const value = this.value(column);
    if (typeof value === "number") return value;
    if (typeof value === "string" && value.trim() !== "" && !Number.isNaN(Number(value))) {
      return Number(value);
    }
    throw this.mismatch(column, "double", value);
  }

  doubleOrNone(column: string): number | null {
    return this.isNull(column) ? null : this.double(column);
  }

  /** numeric stays a string so no digits are lost */
  decimal(column: string): string {
    const value = this.value(column);
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
    throw this.mismatch(column, "decimal", value);
  }

  bool(column: string): boolean {
    const value = this.value(column);
    if (typeof value !== "boolean") {
      throw this.mismatch(column, "bool", value);
    }
    return value;
  }

  boolOrNone(column: string): boolean | null {
    return this.isNull(column) ? null : this.bool(column);
  }

  date(column: string): Date {
    const value = this.value(column);
    if (!(value instanceof Date)) {
      throw this.mismatch(column, "date", value);
    }
    return value;
  }

  dateOrNone(column: string): Date | null {
    return this.isNull(column) ? null : this.date(column);
  }

  bytea(column: string): Uint8Array {
    const value = this.value(column);
    if (!(value instanceof Uint8Array)) {
      throw this.mismatch(column, "bytea", value);
    }
    return value;
  }

  uuid(column: string): string {
    return this.text(column);
  }

  /** jsonb columns arrive parsed; json text is parsed here */
  json(column: string): unknown {
    const value = this.value(column);
    return typeof value === "string" ? JSON.parse(value) : value;
  }

  stringArray(column: string): string[] {
    const value = this.value(column);
    if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
      throw this.mismatch(column, "text[]", value);
    }
    return value;
  }

  intArray(column: string): number[] {
    const value = this.value(column);
    if (
      !Array.isArray(value) ||
      !value.every((v) => typeof v === "number" && Number.isInteger(v))
    ) {
      throw this.mismatch(column, "integer[]", value);
    }
    return value;
  }

  private mismatch(column: string, expected: string, actual: unknown): QueryError {
    return new QueryError(
      `Column '${column}' could not be read as ${expected}`,
      { column, expected, actualType: actual === null ? "null" : typeof actual },
    );
  }
}
