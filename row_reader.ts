import {
  DuckDBArrayValue,
  DuckDBBitValue,
  DuckDBBlobValue,
  DuckDBDateValue,
  DuckDBDecimalValue,
  DuckDBIntervalValue,
  DuckDBListValue,
  DuckDBTimeTZValue,
  DuckDBTimeValue,
  DuckDBTimestampTZValue,
  DuckDBTimestampValue,
  DuckDBUUIDValue,
  type DuckDBValue,
} from "@duckdb/node-api";
import type { Cursor } from "./engine/cursor.ts";
import { type ColumnInfo, UnknownColumnError } from "./errors.ts";
import { toBigInt, toInteger, toSmallInt, toTinyInt } from "./coercion.ts";
import { copyBytes, describeValue, formatScaledBigInt } from "./shared.ts";
import {
  type CalendarDate,
  type Interval,
  type TimeOfDay,
  type TimeWithOffset,
  MS_PER_DAY,
  fitsDate,
  fromEpochDays,
  fromEpochMicros,
  fromMicrosOfDay,
} from "./temporal.ts";

type NonNullValue = Exclude<DuckDBValue, null>;
type Decoder<T> = (value: NonNullValue, column: string) => T;

function mismatch(column: string, value: unknown, typeName: string): TypeError {
  return new TypeError(`Column '${column}' holds ${describeValue(value)}, which cannot be read as ${typeName}`);
}

// --- Scalar decoders ---

function integerDecoder(typeName: string, convert: (v: number | bigint) => number): Decoder<number> {
  return (value, column) => {
    if (typeof value === "number" || typeof value === "bigint") return convert(value);
    throw mismatch(column, value, typeName);
  };
}

const decodeTinyInt = integerDecoder("TINYINT", toTinyInt);
const decodeSmallInt = integerDecoder("SMALLINT", toSmallInt);
const decodeInteger = integerDecoder("INTEGER", toInteger);

const decodeBigInt: Decoder<bigint> = (value, column) => {
  if (typeof value === "bigint" || typeof value === "number") return toBigInt(value);
  throw mismatch(column, value, "BIGINT");
};

function floatDecoder(typeName: string): Decoder<number> {
  return (value, column) => {
    if (typeof value === "number") return value;
    throw mismatch(column, value, typeName);
  };
}

const decodeReal = floatDecoder("FLOAT");
const decodeDouble = floatDecoder("DOUBLE");

/** Exact text with the column's scale, e.g. DECIMAL(18,4) 123.45 reads "123.4500". */
const decodeDecimal: Decoder<string> = (value, column) => {
  if (value instanceof DuckDBDecimalValue) return formatScaledBigInt(value.value, value.scale);
  throw mismatch(column, value, "DECIMAL");
};

const decodeBoolean: Decoder<boolean> = (value, column) => {
  if (typeof value === "boolean") return value;
  throw mismatch(column, value, "BOOLEAN");
};

const decodeBit: Decoder<string> = (value, column) => {
  if (value instanceof DuckDBBitValue) return value.toString();
  throw mismatch(column, value, "BIT");
};

function textDecoder(typeName: string): Decoder<string> {
  return (value, column) => {
    if (typeof value === "string") return value;
    throw mismatch(column, value, typeName);
  };
}

const decodeVarChar = textDecoder("VARCHAR");
const decodeJson = textDecoder("JSON");

const decodeUuid: Decoder<string> = (value, column) => {
  if (value instanceof DuckDBUUIDValue) return value.toString();
  throw mismatch(column, value, "UUID");
};

// --- Temporal decoders ---

function outsideDateRange(column: string, value: { toString(): string }, typeName: string): RangeError {
  return new RangeError(
    `Column '${column}' holds ${typeName} ${value.toString()}, which is outside the range of a JavaScript Date`,
  );
}

const decodeDate: Decoder<CalendarDate> = (value, column) => {
  if (value instanceof DuckDBDateValue) {
    if (!fitsDate(value.days * MS_PER_DAY)) throw outsideDateRange(column, value, "DATE");
    return fromEpochDays(value.days);
  }
  throw mismatch(column, value, "DATE");
};

const decodeTime: Decoder<TimeOfDay> = (value, column) => {
  if (value instanceof DuckDBTimeValue) return fromMicrosOfDay(value.micros);
  throw mismatch(column, value, "TIME");
};

// Returned as stored: no normalization to UTC
const decodeTimeTz: Decoder<TimeWithOffset> = (value, column) => {
  if (value instanceof DuckDBTimeTZValue) {
    return { time: fromMicrosOfDay(value.micros), offsetSeconds: value.offset };
  }
  throw mismatch(column, value, "TIMETZ");
};

const decodeTimestamp: Decoder<Date> = (value, column) => {
  if (value instanceof DuckDBTimestampValue) {
    const date = fromEpochMicros(value.micros);
    if (Number.isNaN(date.getTime())) throw outsideDateRange(column, value, "TIMESTAMP");
    return date;
  }
  throw mismatch(column, value, "TIMESTAMP");
};

const decodeTimestampTz: Decoder<Date> = (value, column) => {
  if (value instanceof DuckDBTimestampTZValue) {
    const date = fromEpochMicros(value.micros);
    if (Number.isNaN(date.getTime())) throw outsideDateRange(column, value, "TIMESTAMP WITH TIME ZONE");
    return date;
  }
  throw mismatch(column, value, "TIMESTAMP WITH TIME ZONE");
};

const decodeInterval: Decoder<Interval> = (value, column) => {
  if (value instanceof DuckDBIntervalValue) {
    return { months: value.months, days: value.days, micros: value.micros };
  }
  throw mismatch(column, value, "INTERVAL");
};

// --- List decoders ---

function listItems(value: NonNullValue, column: string, typeName: string): readonly DuckDBValue[] {
  if (value instanceof DuckDBListValue || value instanceof DuckDBArrayValue) return value.items;
  throw mismatch(column, value, typeName);
}

/** Items must be non-null; a NULL item has no representation in a number[] or string[]. */
function listDecoder<T>(typeName: string, item: Decoder<T>): Decoder<T[]> {
  return (value, column) =>
    listItems(value, column, typeName).map((v, i) => {
      if (v === null) {
        throw new TypeError(`Column '${column}' holds a NULL item at index ${i}, which cannot be read as ${typeName}`);
      }
      return item(v, column);
    });
}

const decodeVarCharList: Decoder<(string | null)[]> = (value, column) =>
  listItems(value, column, "VARCHAR[]").map((v) => (v === null ? null : decodeVarChar(v, column)));
const decodeIntegerList = listDecoder("INTEGER[]", decodeInteger);
const decodeSmallIntList = listDecoder("SMALLINT[]", decodeSmallInt);
const decodeBigIntList = listDecoder("BIGINT[]", decodeBigInt);
const decodeDoubleList = listDecoder("DOUBLE[]", decodeDouble);
const decodeDecimalList = listDecoder("DECIMAL[]", decodeDecimal);
const decodeUuidList = listDecoder("UUID[]", decodeUuid);

/**
 * Typed, name-based access to the current row of a cursor.
 *
 * Column names and declared types are captured once at construction; every
 * accessor then reads the cursor's live row. For each type `x` there are
 * three accessors: `x` (NULL throws), `xOrNone` (NULL is `undefined`) and
 * `xOrValueNone` (NULL is `null`). A name the result does not have throws
 * {@link UnknownColumnError}.
 *
 * @example
 * const users = await db.query("SELECT id, name FROM users").execute((r) => ({
 *   id: r.integer("id"),
 *   name: r.varCharOrNone("name"),
 * }));
 */
export class RowReader {
  readonly cursor: Cursor;
  private readonly ordinals = new Map<string, number>();
  private readonly columns: ColumnInfo[] = [];

  constructor(cursor: Cursor) {
    this.cursor = cursor;
    for (let i = 0; i < cursor.fieldCount; i++) {
      const name = cursor.getName(i);
      this.columns.push({ name, type: cursor.getDataTypeName(i) });
      // First occurrence wins for repeated names
      if (!this.ordinals.has(name)) this.ordinals.set(name, i);
    }
  }

  get fieldCount(): number {
    return this.columns.length;
  }

  getName(ordinal: number): string {
    return this.cursor.getName(ordinal);
  }

  getDataTypeName(ordinal: number): string {
    return this.cursor.getDataTypeName(ordinal);
  }

  /** Every column of the result, in order. */
  get availableColumns(): readonly ColumnInfo[] {
    return this.columns;
  }

  // --- Integers ---

  tinyInt(column: string): number { return this.read(column, "TINYINT", decodeTinyInt); }
  tinyIntOrNone(column: string): number | undefined { return this.readOrNone(column, "TINYINT", decodeTinyInt); }
  tinyIntOrValueNone(column: string): number | null { return this.readOrValueNone(column, "TINYINT", decodeTinyInt); }

  smallInt(column: string): number { return this.read(column, "SMALLINT", decodeSmallInt); }
  smallIntOrNone(column: string): number | undefined { return this.readOrNone(column, "SMALLINT", decodeSmallInt); }
  smallIntOrValueNone(column: string): number | null { return this.readOrValueNone(column, "SMALLINT", decodeSmallInt); }

  integer(column: string): number { return this.read(column, "INTEGER", decodeInteger); }
  integerOrNone(column: string): number | undefined { return this.readOrNone(column, "INTEGER", decodeInteger); }
  integerOrValueNone(column: string): number | null { return this.readOrValueNone(column, "INTEGER", decodeInteger); }

  bigInt(column: string): bigint { return this.read(column, "BIGINT", decodeBigInt); }
  bigIntOrNone(column: string): bigint | undefined { return this.readOrNone(column, "BIGINT", decodeBigInt); }
  bigIntOrValueNone(column: string): bigint | null { return this.readOrValueNone(column, "BIGINT", decodeBigInt); }

  // --- Floating point & decimal ---

  real(column: string): number { return this.read(column, "FLOAT", decodeReal); }
  realOrNone(column: string): number | undefined { return this.readOrNone(column, "FLOAT", decodeReal); }
  realOrValueNone(column: string): number | null { return this.readOrValueNone(column, "FLOAT", decodeReal); }

  double(column: string): number { return this.read(column, "DOUBLE", decodeDouble); }
  doubleOrNone(column: string): number | undefined { return this.readOrNone(column, "DOUBLE", decodeDouble); }
  doubleOrValueNone(column: string): number | null { return this.readOrValueNone(column, "DOUBLE", decodeDouble); }

  decimal(column: string): string { return this.read(column, "DECIMAL", decodeDecimal); }
  decimalOrNone(column: string): string | undefined { return this.readOrNone(column, "DECIMAL", decodeDecimal); }
  decimalOrValueNone(column: string): string | null { return this.readOrValueNone(column, "DECIMAL", decodeDecimal); }

  // --- Boolean & bit string ---

  boolean(column: string): boolean { return this.read(column, "BOOLEAN", decodeBoolean); }
  booleanOrNone(column: string): boolean | undefined { return this.readOrNone(column, "BOOLEAN", decodeBoolean); }
  booleanOrValueNone(column: string): boolean | null { return this.readOrValueNone(column, "BOOLEAN", decodeBoolean); }

  bit(column: string): string { return this.read(column, "BIT", decodeBit); }
  bitOrNone(column: string): string | undefined { return this.readOrNone(column, "BIT", decodeBit); }
  bitOrValueNone(column: string): string | null { return this.readOrValueNone(column, "BIT", decodeBit); }

  // --- Text ---

  varChar(column: string): string { return this.read(column, "VARCHAR", decodeVarChar); }
  varCharOrNone(column: string): string | undefined { return this.readOrNone(column, "VARCHAR", decodeVarChar); }
  varCharOrValueNone(column: string): string | null { return this.readOrValueNone(column, "VARCHAR", decodeVarChar); }

  text(column: string): string { return this.varChar(column); }
  textOrNone(column: string): string | undefined { return this.varCharOrNone(column); }
  textOrValueNone(column: string): string | null { return this.varCharOrValueNone(column); }

  json(column: string): string { return this.read(column, "JSON", decodeJson); }
  jsonOrNone(column: string): string | undefined { return this.readOrNone(column, "JSON", decodeJson); }
  jsonOrValueNone(column: string): string | null { return this.readOrValueNone(column, "JSON", decodeJson); }

  // --- Binary & UUID ---

  blob(column: string): Uint8Array { return this.read(column, "BLOB", this.decodeBlob); }
  blobOrNone(column: string): Uint8Array | undefined { return this.readOrNone(column, "BLOB", this.decodeBlob); }
  blobOrValueNone(column: string): Uint8Array | null { return this.readOrValueNone(column, "BLOB", this.decodeBlob); }

  uuid(column: string): string { return this.read(column, "UUID", decodeUuid); }
  uuidOrNone(column: string): string | undefined { return this.readOrNone(column, "UUID", decodeUuid); }
  uuidOrValueNone(column: string): string | null { return this.readOrValueNone(column, "UUID", decodeUuid); }

  // --- Date & time ---

  date(column: string): CalendarDate { return this.read(column, "DATE", decodeDate); }
  dateOrNone(column: string): CalendarDate | undefined { return this.readOrNone(column, "DATE", decodeDate); }
  dateOrValueNone(column: string): CalendarDate | null { return this.readOrValueNone(column, "DATE", decodeDate); }

  time(column: string): TimeOfDay { return this.read(column, "TIME", decodeTime); }
  timeOrNone(column: string): TimeOfDay | undefined { return this.readOrNone(column, "TIME", decodeTime); }
  timeOrValueNone(column: string): TimeOfDay | null { return this.readOrValueNone(column, "TIME", decodeTime); }

  /**
   * TIMETZ carries no date. Compare values by their UTC time of day
   * (`toUtcMicrosOfDay`); the offset is returned as stored.
   */
  timeTz(column: string): TimeWithOffset { return this.read(column, "TIMETZ", decodeTimeTz); }
  timeTzOrNone(column: string): TimeWithOffset | undefined { return this.readOrNone(column, "TIMETZ", decodeTimeTz); }
  timeTzOrValueNone(column: string): TimeWithOffset | null { return this.readOrValueNone(column, "TIMETZ", decodeTimeTz); }

  timestamp(column: string): Date { return this.read(column, "TIMESTAMP", decodeTimestamp); }
  timestampOrNone(column: string): Date | undefined { return this.readOrNone(column, "TIMESTAMP", decodeTimestamp); }
  timestampOrValueNone(column: string): Date | null { return this.readOrValueNone(column, "TIMESTAMP", decodeTimestamp); }

  timestampTz(column: string): Date { return this.read(column, "TIMESTAMP WITH TIME ZONE", decodeTimestampTz); }
  timestampTzOrNone(column: string): Date | undefined { return this.readOrNone(column, "TIMESTAMP WITH TIME ZONE", decodeTimestampTz); }
  timestampTzOrValueNone(column: string): Date | null { return this.readOrValueNone(column, "TIMESTAMP WITH TIME ZONE", decodeTimestampTz); }

  interval(column: string): Interval { return this.read(column, "INTERVAL", decodeInterval); }
  intervalOrNone(column: string): Interval | undefined { return this.readOrNone(column, "INTERVAL", decodeInterval); }
  intervalOrValueNone(column: string): Interval | null { return this.readOrValueNone(column, "INTERVAL", decodeInterval); }

  // --- Lists ---

  /** NULL items come back as `null`, not `""`. */
  varCharList(column: string): (string | null)[] { return this.read(column, "VARCHAR[]", decodeVarCharList); }
  varCharListOrNone(column: string): (string | null)[] | undefined { return this.readOrNone(column, "VARCHAR[]", decodeVarCharList); }
  varCharListOrValueNone(column: string): (string | null)[] | null { return this.readOrValueNone(column, "VARCHAR[]", decodeVarCharList); }

  integerList(column: string): number[] { return this.read(column, "INTEGER[]", decodeIntegerList); }
  integerListOrNone(column: string): number[] | undefined { return this.readOrNone(column, "INTEGER[]", decodeIntegerList); }
  integerListOrValueNone(column: string): number[] | null { return this.readOrValueNone(column, "INTEGER[]", decodeIntegerList); }

  smallIntList(column: string): number[] { return this.read(column, "SMALLINT[]", decodeSmallIntList); }
  smallIntListOrNone(column: string): number[] | undefined { return this.readOrNone(column, "SMALLINT[]", decodeSmallIntList); }
  smallIntListOrValueNone(column: string): number[] | null { return this.readOrValueNone(column, "SMALLINT[]", decodeSmallIntList); }

  bigIntList(column: string): bigint[] { return this.read(column, "BIGINT[]", decodeBigIntList); }
  bigIntListOrNone(column: string): bigint[] | undefined { return this.readOrNone(column, "BIGINT[]", decodeBigIntList); }
  bigIntListOrValueNone(column: string): bigint[] | null { return this.readOrValueNone(column, "BIGINT[]", decodeBigIntList); }

  doubleList(column: string): number[] { return this.read(column, "DOUBLE[]", decodeDoubleList); }
  doubleListOrNone(column: string): number[] | undefined { return this.readOrNone(column, "DOUBLE[]", decodeDoubleList); }
  doubleListOrValueNone(column: string): number[] | null { return this.readOrValueNone(column, "DOUBLE[]", decodeDoubleList); }

  decimalList(column: string): string[] { return this.read(column, "DECIMAL[]", decodeDecimalList); }
  decimalListOrNone(column: string): string[] | undefined { return this.readOrNone(column, "DECIMAL[]", decodeDecimalList); }
  decimalListOrValueNone(column: string): string[] | null { return this.readOrValueNone(column, "DECIMAL[]", decodeDecimalList); }

  uuidList(column: string): string[] { return this.read(column, "UUID[]", decodeUuidList); }
  uuidListOrNone(column: string): string[] | undefined { return this.readOrNone(column, "UUID[]", decodeUuidList); }
  uuidListOrValueNone(column: string): string[] | null { return this.readOrValueNone(column, "UUID[]", decodeUuidList); }

  // --- Internals ---

  /** A blob column holding anything but bytes is reported like a missing column. */
  private readonly decodeBlob: Decoder<Uint8Array> = (value, column) => {
    if (value instanceof DuckDBBlobValue) return copyBytes(value.bytes);
    throw new UnknownColumnError(column, "BLOB", this.columns);
  };

  private ordinalOf(column: string, expectedType: string): number {
    const ordinal = this.ordinals.get(column);
    if (ordinal === undefined) {
      throw new UnknownColumnError(column, expectedType, this.columns);
    }
    return ordinal;
  }

  private read<T>(column: string, typeName: string, decode: Decoder<T>): T {
    const value = this.cursor.getValue(this.ordinalOf(column, typeName));
    if (value === null) {
      throw new TypeError(`Column '${column}' is NULL (expected ${typeName}); use a nullable accessor`);
    }
    return decode(value, column);
  }

  private readOrNone<T>(column: string, typeName: string, decode: Decoder<T>): T | undefined {
    const value = this.cursor.getValue(this.ordinalOf(column, `${typeName} | undefined`));
    return value === null ? undefined : decode(value, column);
  }

  private readOrValueNone<T>(column: string, typeName: string, decode: Decoder<T>): T | null {
    const value = this.cursor.getValue(this.ordinalOf(column, `${typeName} | null`));
    return value === null ? null : decode(value, column);
  }
}
