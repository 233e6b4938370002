/**
 * Typed SQL parameter values.
 *
 * `SqlValue` is a closed union with one variant per DuckDB type this library
 * binds, plus `null` and the raw `parameter` escape hatch. Constructors in
 * `Sql` validate the payload up front, so a variant's value always has the
 * representation its tag promises.
 *
 * @example
 * Db.inMemory("app")
 *   .query("INSERT INTO users VALUES ($id, $name, $tags)")
 *   .parameters([
 *     ["id", Sql.integer(1)],
 *     ["name", Sql.varChar("ada")],
 *     ["tags", Sql.varCharList(["admin", null])],
 *   ])
 *   .executeNonQuery();
 */

import type { DuckDBParameter } from "./engine/command.ts";
import {
  toBigInt,
  toDouble,
  toInteger,
  toReal,
  toSmallInt,
  toTinyInt,
  toValidBitString,
  toValidDate,
  toValidDecimal,
  toValidUUID,
} from "./coercion.ts";
import {
  type CalendarDate,
  type Interval,
  type TimeOfDay,
  type TimeWithOffset,
  calendarDate,
  calendarDateOf,
  interval as makeInterval,
  timeOfDay,
} from "./temporal.ts";

export type SqlValue =
  | { readonly kind: "null" }
  | { readonly kind: "parameter"; readonly value: DuckDBParameter }
  // Integers
  | { readonly kind: "tinyInt"; readonly value: number }
  | { readonly kind: "smallInt"; readonly value: number }
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "bigInt"; readonly value: bigint }
  // Floating point & decimal
  | { readonly kind: "real"; readonly value: number }
  | { readonly kind: "double"; readonly value: number }
  | { readonly kind: "decimal"; readonly value: string }
  // Boolean & bit string
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "bit"; readonly value: string }
  // Text
  | { readonly kind: "varChar"; readonly value: string }
  | { readonly kind: "json"; readonly value: string }
  // Binary & UUID
  | { readonly kind: "blob"; readonly value: Uint8Array }
  | { readonly kind: "uuid"; readonly value: string }
  // Date & time
  | { readonly kind: "date"; readonly value: CalendarDate }
  | { readonly kind: "time"; readonly value: TimeOfDay }
  | { readonly kind: "timeTz"; readonly value: TimeWithOffset }
  | { readonly kind: "timestamp"; readonly value: Date }
  | { readonly kind: "timestampTz"; readonly value: Date }
  | { readonly kind: "interval"; readonly value: Interval }
  // Lists
  | { readonly kind: "varCharList"; readonly value: readonly (string | null)[] }
  | { readonly kind: "integerList"; readonly value: readonly number[] }
  | { readonly kind: "smallIntList"; readonly value: readonly number[] }
  | { readonly kind: "bigIntList"; readonly value: readonly bigint[] }
  | { readonly kind: "doubleList"; readonly value: readonly number[] }
  | { readonly kind: "decimalList"; readonly value: readonly string[] }
  | { readonly kind: "uuidList"; readonly value: readonly string[] };

export type SqlValueKind = SqlValue["kind"];

/** An ordered list of named parameters. Names may carry a `$` or `@` prefix. */
export type SqlParameters = readonly (readonly [string, SqlValue])[];

const dbnull: SqlValue = { kind: "null" };

/** Absent (`undefined`) becomes SQL NULL. */
function orNone<T>(build: (v: T) => SqlValue): (v?: T) => SqlValue {
  return (v) => (v === undefined ? dbnull : build(v));
}

/** Absent (`null`) becomes SQL NULL. */
function orValueNone<T>(build: (v: T) => SqlValue): (v: T | null) => SqlValue {
  return (v) => (v === null ? dbnull : build(v));
}

// --- Null & raw parameter ---

function parameter(p: DuckDBParameter): SqlValue {
  return { kind: "parameter", value: p };
}

// --- Integer types ---

function tinyInt(v: number): SqlValue {
  return { kind: "tinyInt", value: toTinyInt(v) };
}

function smallInt(v: number): SqlValue {
  return { kind: "smallInt", value: toSmallInt(v) };
}

function integer(v: number): SqlValue {
  return { kind: "integer", value: toInteger(v) };
}

/** Numbers are accepted while they are safe integers; larger values must be bigint. */
function bigInt(v: bigint | number): SqlValue {
  return { kind: "bigInt", value: toBigInt(v) };
}

// --- Floating point & decimal ---

function real(v: number): SqlValue {
  return { kind: "real", value: toReal(v) };
}

function double(v: number): SqlValue {
  return { kind: "double", value: toDouble(v) };
}

/** Exact decimal. Pass a string to keep more digits than a double holds. */
function decimal(v: string | number | bigint): SqlValue {
  return { kind: "decimal", value: toValidDecimal(v) };
}

// --- Boolean & bit string ---

function boolean(v: boolean): SqlValue {
  if (typeof v !== "boolean") {
    throw new TypeError(`Cannot coerce ${typeof v} "${v}" to BOOLEAN`);
  }
  return { kind: "boolean", value: v };
}

/** BIT string such as "10110". */
function bit(v: string): SqlValue {
  return { kind: "bit", value: toValidBitString(v) };
}

// --- Text & JSON ---

/**
 * Non-nullable text. `null` and `undefined` become the empty string, not SQL
 * NULL; use `varCharOrNone` / `varCharOrValueNone` for nullable columns.
 */
function varChar(v: string | null | undefined): SqlValue {
  return { kind: "varChar", value: v ?? "" };
}

function json(v: string): SqlValue {
  if (typeof v !== "string") {
    throw new TypeError(`JSON values are passed as text, got ${typeof v}`);
  }
  return { kind: "json", value: v };
}

// --- Binary ---

function blob(v: Uint8Array): SqlValue {
  if (!(v instanceof Uint8Array)) {
    throw new TypeError(`BLOB values must be Uint8Array, got ${typeof v}`);
  }
  return { kind: "blob", value: v };
}

// --- UUID ---

function uuid(v: string): SqlValue {
  return { kind: "uuid", value: toValidUUID(v) };
}

function uuidList(v: Iterable<string>): SqlValue {
  return { kind: "uuidList", value: Array.from(v, toValidUUID) };
}

// --- Date & time ---

/** A Date contributes only its UTC calendar date. */
function date(v: CalendarDate | Date): SqlValue {
  const d = v instanceof Date ? calendarDateOf(toValidDate(v, "DATE")) : v;
  return { kind: "date", value: calendarDate(d.year, d.month, d.day) };
}

function time(v: TimeOfDay): SqlValue {
  return { kind: "time", value: timeOfDay(v.hour, v.minute, v.second, v.microsecond) };
}

/** ±15:59:59, the widest offset TIMETZ stores. */
const TIMETZ_MAX_OFFSET = 16 * 3600 - 1;

/**
 * NOTE: DuckDB's TIMETZ stores a time of day with an offset, never a date.
 * Compare values read back by their UTC time of day (see `toUtcMicrosOfDay`).
 */
function timeTz(v: TimeWithOffset): SqlValue {
  if (!Number.isInteger(v.offsetSeconds) || Math.abs(v.offsetSeconds) > TIMETZ_MAX_OFFSET) {
    throw new RangeError(`TIMETZ offset out of range: ${v.offsetSeconds}s`);
  }
  const t = v.time;
  return { kind: "timeTz", value: { time: timeOfDay(t.hour, t.minute, t.second, t.microsecond), offsetSeconds: v.offsetSeconds } };
}

/** Naive timestamp: the wall-clock time is read from the Date's UTC fields. */
function timestamp(v: Date): SqlValue {
  return { kind: "timestamp", value: toValidDate(v, "TIMESTAMP") };
}

/**
 * UTC timestamp. A Date is already an instant; a string must be ISO-8601 and
 * carry its offset (or `Z`), and is converted to UTC.
 */
function timestampTz(v: Date | string): SqlValue {
  if (typeof v === "string") {
    if (!/(Z|[+-]\d{2}:?\d{2})$/i.test(v.trim())) {
      throw new TypeError(`TIMESTAMPTZ text must carry an offset: "${v}"`);
    }
    return { kind: "timestampTz", value: toValidDate(new Date(v), "TIMESTAMPTZ") };
  }
  return { kind: "timestampTz", value: toValidDate(v, "TIMESTAMPTZ") };
}

function interval(v: Interval): SqlValue {
  return { kind: "interval", value: makeInterval(v.months, v.days, v.micros) };
}

// --- Lists ---

/** Unlike `varChar`, null items stay null. */
function varCharList(v: Iterable<string | null>): SqlValue {
  return { kind: "varCharList", value: Array.from(v) };
}

function integerList(v: Iterable<number>): SqlValue {
  return { kind: "integerList", value: Array.from(v, toInteger) };
}

function smallIntList(v: Iterable<number>): SqlValue {
  return { kind: "smallIntList", value: Array.from(v, toSmallInt) };
}

function bigIntList(v: Iterable<bigint | number>): SqlValue {
  return { kind: "bigIntList", value: Array.from(v, toBigInt) };
}

function doubleList(v: Iterable<number>): SqlValue {
  return { kind: "doubleList", value: Array.from(v, toDouble) };
}

function decimalList(v: Iterable<string | number | bigint>): SqlValue {
  return { kind: "decimalList", value: Array.from(v, toValidDecimal) };
}

/** Constructors for every bindable value. */
export const Sql = {
  dbnull,
  parameter,

  tinyInt,
  tinyIntOrNone: orNone(tinyInt),
  tinyIntOrValueNone: orValueNone(tinyInt),
  smallInt,
  smallIntOrNone: orNone(smallInt),
  smallIntOrValueNone: orValueNone(smallInt),
  integer,
  integerOrNone: orNone(integer),
  integerOrValueNone: orValueNone(integer),
  bigInt,
  bigIntOrNone: orNone(bigInt),
  bigIntOrValueNone: orValueNone(bigInt),

  real,
  realOrNone: orNone(real),
  realOrValueNone: orValueNone(real),
  double,
  doubleOrNone: orNone(double),
  doubleOrValueNone: orValueNone(double),
  decimal,
  decimalOrNone: orNone(decimal),
  decimalOrValueNone: orValueNone(decimal),

  boolean,
  booleanOrNone: orNone(boolean),
  booleanOrValueNone: orValueNone(boolean),
  bit,
  bitOrNone: orNone(bit),
  bitOrValueNone: orValueNone(bit),

  varChar,
  varCharOrNone: orNone<string>(varChar),
  varCharOrValueNone: orValueNone<string>(varChar),
  json,
  jsonOrNone: orNone(json),
  jsonOrValueNone: orValueNone(json),

  blob,
  blobOrNone: orNone(blob),
  blobOrValueNone: orValueNone(blob),

  uuid,
  uuidOrNone: orNone(uuid),
  uuidOrValueNone: orValueNone(uuid),
  uuidList,
  uuidListOrNone: orNone(uuidList),
  uuidListOrValueNone: orValueNone(uuidList),

  date,
  dateOrNone: orNone(date),
  dateOrValueNone: orValueNone(date),
  time,
  timeOrNone: orNone(time),
  timeOrValueNone: orValueNone(time),
  timeTz,
  timeTzOrNone: orNone(timeTz),
  timeTzOrValueNone: orValueNone(timeTz),
  timestamp,
  timestampOrNone: orNone(timestamp),
  timestampOrValueNone: orValueNone(timestamp),
  timestampTz,
  timestampTzOrNone: orNone(timestampTz),
  timestampTzOrValueNone: orValueNone(timestampTz),
  interval,
  intervalOrNone: orNone(interval),
  intervalOrValueNone: orValueNone(interval),

  varCharList,
  varCharListOrNone: orNone(varCharList),
  varCharListOrValueNone: orValueNone(varCharList),
  integerList,
  integerListOrNone: orNone(integerList),
  integerListOrValueNone: orValueNone(integerList),
  smallIntList,
  smallIntListOrNone: orNone(smallIntList),
  smallIntListOrValueNone: orValueNone(smallIntList),
  bigIntList,
  bigIntListOrNone: orNone(bigIntList),
  bigIntListOrValueNone: orValueNone(bigIntList),
  doubleList,
  doubleListOrNone: orNone(doubleList),
  doubleListOrValueNone: orValueNone(doubleList),
  decimalList,
  decimalListOrNone: orNone(decimalList),
  decimalListOrValueNone: orValueNone(decimalList),
} as const;
