import type {
  DuckDBConnection,
  DuckDBPreparedStatement,
  DuckDBType,
  DuckDBValue,
} from "@duckdb/node-api";
import { ResultCursor } from "./cursor.ts";

/**
 * A driver-level parameter: a DuckDB value, the type it is created as, and
 * the name it binds to. `type` may be omitted to let the binding infer it from
 * the value. A `null` value binds SQL NULL.
 */
export class DuckDBParameter {
  name: string;
  value: DuckDBValue;
  type?: DuckDBType;

  constructor(name: string, value: DuckDBValue, type?: DuckDBType) {
    this.name = name;
    this.value = value;
    this.type = type;
  }
}

/** `text` runs the command text as SQL; `storedRoutine` treats it as the name of a table macro. */
export type CommandType = "text" | "storedRoutine";

const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * One SQL statement against one connection, with its parameter collection.
 *
 * Statements with parameters, or that were explicitly prepared, go through a
 * DuckDB prepared statement; plain text runs directly so that multi-statement
 * scripts keep working.
 */
export class Command {
  readonly connection: DuckDBConnection;
  commandText: string;
  commandType: CommandType = "text";
  readonly parameters: DuckDBParameter[] = [];
  private prepared: DuckDBPreparedStatement | null = null;

  constructor(connection: DuckDBConnection, commandText: string) {
    this.connection = connection;
    this.commandText = commandText;
  }

  /** The SQL actually sent to the engine. */
  get effectiveText(): string {
    if (this.commandType === "text") return this.commandText;
    const name = this.commandText.trim();
    if (!IDENTIFIER_REGEX.test(name)) {
      throw new TypeError(`Stored routine name must be an identifier, got "${this.commandText}"`);
    }
    const args = uniqueNames(this.parameters).map((n) => `$${n}`).join(", ");
    return `SELECT * FROM ${name}(${args})`;
  }

  get isPrepared(): boolean {
    return this.prepared !== null;
  }

  /** Compile the statement now instead of at execution. */
  async prepare(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.prepared = await this.connection.prepare(this.effectiveText);
    signal?.throwIfAborted();
  }

  /** Releases the prepared statement, if one was made. Safe to call more than once. */
  close(): void {
    this.prepared?.destroySync();
    this.prepared = null;
  }

  /** Run the statement and walk its rows through a cursor. */
  async executeReader(signal?: AbortSignal): Promise<ResultCursor> {
    const prepared = await this.bindAll(signal);
    const result = prepared
      ? await prepared.stream()
      : await this.connection.stream(this.effectiveText);
    signal?.throwIfAborted();
    return new ResultCursor(result, signal);
  }

  /** Run the statement to completion and return the number of rows it changed. */
  async executeNonQuery(signal?: AbortSignal): Promise<number> {
    const prepared = await this.bindAll(signal);
    const result = prepared
      ? await prepared.run()
      : await this.connection.run(this.effectiveText);
    signal?.throwIfAborted();
    return result.rowsChanged;
  }

  private async bindAll(signal?: AbortSignal): Promise<DuckDBPreparedStatement | null> {
    signal?.throwIfAborted();
    if (!this.prepared && this.parameters.length > 0) {
      await this.prepare(signal);
    }
    const prepared = this.prepared;
    if (!prepared) return null;

    prepared.clearBindings();
    // Bound in order, so a repeated name ends up holding the last value
    for (const param of this.parameters) {
      const index = prepared.parameterIndex(param.name);
      if (param.value === null) {
        prepared.bindNull(index);
      } else {
        prepared.bindValue(index, param.value, param.type);
      }
    }
    return prepared;
  }
}

function uniqueNames(parameters: readonly DuckDBParameter[]): string[] {
  return [...new Set(parameters.map((p) => p.name))];
}
