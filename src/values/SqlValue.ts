/**
 * pg-fluent - Tagged Parameter Values
 *
 * Closed set of SQL input kinds. Each kind maps to exactly one wire type
 * through WIRE_TYPES, which must stay total over SqlValueKind.
 */

/**
 * PostgreSQL type names used for parameter placeholders
 */
export type WireType =
  | "text"
  | "integer"
  | "smallint"
  | "bigint"
  | "bit"
  | "boolean"
  | "double precision"
  | "numeric"
  | "money"
  | "date"
  | "timestamp"
  | "timestamptz"
  | "time"
  | "timetz"
  | "bytea"
  | "jsonb"
  | "text[]"
  | "integer[]"
  | "uuid"
  | "uuid[]"
  | "point";

export interface Point {
  x: number;
  y: number;
}

/**
 * Parameter handed straight to the driver. Only its name is normalized.
 */
export interface DriverParameter {
  name: string;
  value: unknown;
  /** Omit to let the server infer the type */
  wireType?: WireType | undefined;
}

export type SqlValue =
  | { kind: "null" }
  | { kind: "text"; value: string }
  | { kind: "int"; value: number }
  | { kind: "short"; value: number }
  | { kind: "tinyInt"; value: number }
  | { kind: "long"; value: bigint | number }
  | { kind: "bit"; value: boolean }
  | { kind: "bool"; value: boolean }
  | { kind: "number"; value: number }
  | { kind: "decimal"; value: string | number }
  | { kind: "money"; value: string | number }
  | { kind: "date"; value: Date }
  | { kind: "timestamp"; value: Date }
  | { kind: "timestampTz"; value: Date }
  | { kind: "time"; value: string }
  | { kind: "timeTz"; value: string }
  | { kind: "bytea"; value: Uint8Array }
  | { kind: "jsonb"; value: string }
  | { kind: "stringArray"; value: readonly string[] }
  | { kind: "intArray"; value: readonly number[] }
  | { kind: "uuid"; value: string }
  | { kind: "uuidArray"; value: readonly string[] }
  | { kind: "point"; value: Point }
  | { kind: "parameter"; value: DriverParameter };

export type SqlValueKind = SqlValue["kind"];

/** A single named binding; the `@` sigil is optional */
export type SqlParameter = readonly [name: string, value: SqlValue];

/**
 * Wire type per kind. `null` leaves the placeholder untyped; a raw
 * parameter carries its own.
 */
export const WIRE_TYPES: Readonly<
  Record<Exclude<SqlValueKind, "parameter">, WireType | null>
> = {
  null: null,
  text: "text",
  int: "integer",
  short: "smallint",
  tinyInt: "smallint",
  long: "bigint",
  bit: "bit",
  bool: "boolean",
  number: "double precision",
  decimal: "numeric",
  money: "money",
  date: "date",
  timestamp: "timestamp",
  timestampTz: "timestamptz",
  time: "time",
  timeTz: "timetz",
  bytea: "bytea",
  jsonb: "jsonb",
  stringArray: "text[]",
  intArray: "integer[]",
  uuid: "uuid",
  uuidArray: "uuid[]",
  point: "point",
};

/**
 * Constructors, e.g. `Sql.int(42)` or `Sql.textOrNone(maybe)`
 */
export const SqlValues = {
  dbnull: { kind: "null" } as const satisfies SqlValue,
  text: (value: string): SqlValue => ({ kind: "text", value }),
  string: (value: string): SqlValue => ({ kind: "text", value }),
  int: (value: number): SqlValue => ({ kind: "int", value }),
  int16: (value: number): SqlValue => ({ kind: "short", value }),
  int8: (value: number): SqlValue => ({ kind: "tinyInt", value }),
  int64: (value: bigint | number): SqlValue => ({ kind: "long", value }),
  bit: (value: boolean): SqlValue => ({ kind: "bit", value }),
  bool: (value: boolean): SqlValue => ({ kind: "bool", value }),
  double: (value: number): SqlValue => ({ kind: "number", value }),
  decimal: (value: string | number): SqlValue => ({ kind: "decimal", value }),
  money: (value: string | number): SqlValue => ({ kind: "money", value }),
  date: (value: Date): SqlValue => ({ kind: "date", value }),
  timestamp: (value: Date): SqlValue => ({ kind: "timestamp", value }),
  timestamptz: (value: Date): SqlValue => ({ kind: "timestampTz", value }),
  time: (value: string): SqlValue => ({ kind: "time", value }),
  timetz: (value: string): SqlValue => ({ kind: "timeTz", value }),
  bytea: (value: Uint8Array): SqlValue => ({ kind: "bytea", value }),
  jsonb: (value: string): SqlValue => ({ kind: "jsonb", value }),
  stringArray: (value: readonly string[]): SqlValue => ({
    kind: "stringArray",
    value,
  }),
  intArray: (value: readonly number[]): SqlValue => ({
    kind: "intArray",
    value,
  }),
  uuid: (value: string): SqlValue => ({ kind: "uuid", value }),
  uuidArray: (value: readonly string[]): SqlValue => ({
    kind: "uuidArray",
    value,
  }),
  point: (value: Point): SqlValue => ({ kind: "point", value }),
  parameter: (value: DriverParameter): SqlValue => ({
    kind: "parameter",
    value,
  }),

  textOrNone: (value: string | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "text", value },
  intOrNone: (value: number | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "int", value },
  int64OrNone: (value: bigint | number | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "long", value },
  boolOrNone: (value: boolean | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "bool", value },
  doubleOrNone: (value: number | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "number", value },
  decimalOrNone: (value: string | number | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "decimal", value },
  timestampOrNone: (value: Date | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "timestamp", value },
  timestamptzOrNone: (value: Date | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "timestampTz", value },
  uuidOrNone: (value: string | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "uuid", value },
  jsonbOrNone: (value: string | null | undefined): SqlValue =>
    value == null ? { kind: "null" } : { kind: "jsonb", value },
};
