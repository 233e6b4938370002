export { Db, type DbConfig, type TransactionEntry } from "./client.ts";
export { Sql, type SqlValue, type SqlValueKind, type SqlParameters } from "./values.ts";
export { RowReader } from "./row_reader.ts";
export {
  MissingQueryError,
  NoResultsError,
  UnknownColumnError,
  type ColumnInfo,
} from "./errors.ts";
export { normalizeParameterName, populateRow, toDuckDBParameter, type ParameterSink } from "./params.ts";
export { Command, DuckDBParameter, type CommandType } from "./engine/command.ts";
export { ResultCursor, type Cursor } from "./engine/cursor.ts";
export {
  closeAllInstances,
  closeInMemory,
  connectionStringFor,
  connectionStringFromConfig,
  openConnection,
  parseConnectionString,
  type AccessMode,
  type ConnectionConfig,
  type ConnectionLease,
  type ExecutionTarget,
  type ParsedConnectionString,
} from "./engine/target.ts";
export {
  calendarDate,
  calendarDateOf,
  formatTimeWithOffset,
  interval,
  intervalFromMillis,
  timeOfDay,
  toUtcMicrosOfDay,
  type CalendarDate,
  type Interval,
  type TimeOfDay,
  type TimeWithOffset,
} from "./temporal.ts";
export { type CollectableAsyncIterable } from "./util.ts";
