/**
 * Parameter binding: turns named SqlValues into driver parameters.
 *
 * Names are normalized (`$id`, `@id` and `id` all bind `$id` in the SQL) and
 * each value is converted to the DuckDB value and type its tag promises.
 * Nothing is validated against the statement here; unknown names and failed
 * casts surface from the engine at execution.
 */

import {
  BIGINT,
  BIT,
  BLOB,
  BOOLEAN,
  DATE,
  DECIMAL,
  DOUBLE,
  FLOAT,
  INTEGER,
  INTERVAL,
  LIST,
  SMALLINT,
  TIME,
  TIMESTAMP,
  TIMESTAMPTZ,
  TIMETZ,
  TINYINT,
  UUID,
  VARCHAR,
  bitValue,
  blobValue,
  dateValue,
  decimalValue,
  intervalValue,
  listValue,
  timeTZValue,
  timeValue,
  timestampTZValue,
  timestampValue,
  uuidValue,
} from "@duckdb/node-api";
import { commonDecimal, parseDecimal, uuidToUint128 } from "./coercion.ts";
import { DuckDBParameter } from "./engine/command.ts";
import type { SqlParameters, SqlValue } from "./values.ts";
import { toEpochDays, toEpochMicros, toMicrosOfDay } from "./temporal.ts";

/** Anything holding a parameter collection, usually a `Command`. */
export interface ParameterSink {
  readonly parameters: DuckDBParameter[];
}

/** Trims, then strips every leading `$` or `@`. */
export function normalizeParameterName(name: string): string {
  return name.trim().replace(/^[$@]+/, "");
}

/**
 * Converts one value into a parameter named `name`. The raw `parameter` kind
 * is returned as given, renamed.
 */
export function toDuckDBParameter(name: string, value: SqlValue): DuckDBParameter {
  switch (value.kind) {
    case "null":
      return new DuckDBParameter(name, null);
    case "parameter":
      value.value.name = name;
      return value.value;

    case "tinyInt":
      return new DuckDBParameter(name, value.value, TINYINT);
    case "smallInt":
      return new DuckDBParameter(name, value.value, SMALLINT);
    case "integer":
      return new DuckDBParameter(name, value.value, INTEGER);
    case "bigInt":
      return new DuckDBParameter(name, value.value, BIGINT);
    case "real":
      return new DuckDBParameter(name, value.value, FLOAT);
    case "double":
      return new DuckDBParameter(name, value.value, DOUBLE);
    case "boolean":
      return new DuckDBParameter(name, value.value, BOOLEAN);

    case "decimal": {
      const { unscaled, width, scale } = parseDecimal(value.value);
      return new DuckDBParameter(name, decimalValue(unscaled, width, scale), DECIMAL(width, scale));
    }
    case "bit":
      return new DuckDBParameter(name, bitValue(value.value), BIT);
    case "uuid":
      return new DuckDBParameter(name, uuidValue(uuidToUint128(value.value)), UUID);
    // JSON is an alias of VARCHAR in DuckDB
    case "json":
    case "varChar":
      return new DuckDBParameter(name, value.value, VARCHAR);
    case "timeTz": {
      const { time, offsetSeconds } = value.value;
      return new DuckDBParameter(name, timeTZValue(toMicrosOfDay(time), offsetSeconds), TIMETZ);
    }

    case "blob":
      return new DuckDBParameter(name, blobValue(value.value), BLOB);
    case "date":
      return new DuckDBParameter(name, dateValue(toEpochDays(value.value)), DATE);
    case "time":
      return new DuckDBParameter(name, timeValue(toMicrosOfDay(value.value)), TIME);
    case "timestamp":
      return new DuckDBParameter(name, timestampValue(toEpochMicros(value.value)), TIMESTAMP);
    case "timestampTz":
      return new DuckDBParameter(name, timestampTZValue(toEpochMicros(value.value)), TIMESTAMPTZ);
    case "interval": {
      const { months, days, micros } = value.value;
      return new DuckDBParameter(name, intervalValue(months, days, micros), INTERVAL);
    }

    case "varCharList":
      return new DuckDBParameter(name, listValue([...value.value]), LIST(VARCHAR));
    case "integerList":
      return new DuckDBParameter(name, listValue([...value.value]), LIST(INTEGER));
    case "smallIntList":
      return new DuckDBParameter(name, listValue([...value.value]), LIST(SMALLINT));
    case "bigIntList":
      return new DuckDBParameter(name, listValue([...value.value]), LIST(BIGINT));
    case "doubleList":
      return new DuckDBParameter(name, listValue([...value.value]), LIST(DOUBLE));
    case "decimalList": {
      const { unscaled, width, scale } = commonDecimal(value.value);
      const items = unscaled.map((u) => decimalValue(u, width, scale));
      return new DuckDBParameter(name, listValue(items), LIST(DECIMAL(width, scale)));
    }
    case "uuidList": {
      const items = value.value.map((u) => uuidValue(uuidToUint128(u)));
      return new DuckDBParameter(name, listValue(items), LIST(UUID));
    }

    default: {
      const unknown: never = value;
      throw new TypeError(`Unsupported SqlValue: ${String(unknown)}`);
    }
  }
}

/** Appends one parameter per pair, in order. Duplicate names are kept; the last one binds. */
export function populateRow(command: ParameterSink, row: SqlParameters): void {
  for (const [name, value] of row) {
    command.parameters.push(toDuckDBParameter(normalizeParameterName(name), value));
  }
}
