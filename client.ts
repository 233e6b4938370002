import type { DuckDBConnection } from "@duckdb/node-api";
import { Command } from "./engine/command.ts";
import {
  type ConnectionConfig,
  type ConnectionLease,
  type ExecutionTarget,
  connectionStringFromConfig,
  openConnection,
} from "./engine/target.ts";
import { MissingQueryError, NoResultsError } from "./errors.ts";
import { populateRow } from "./params.ts";
import { RowReader } from "./row_reader.ts";
import { type CollectableAsyncIterable, restartable } from "./util.ts";
import type { SqlParameters } from "./values.ts";

/** One transaction entry: SQL plus the parameter sets to run it with. */
export type TransactionEntry = readonly [sql: string, parameterSets: readonly SqlParameters[]];

export interface DbConfig {
  readonly target: ExecutionTarget;
  readonly sql?: string;
  readonly parameters: SqlParameters;
  /** `sql` names a table macro rather than holding SQL text. */
  readonly isFunction: boolean;
  readonly needPrepare: boolean;
  readonly signal?: AbortSignal;
  /** Per-call deadline in ms, combined with `signal`. */
  readonly timeout?: number;
  readonly debug: boolean;
}

const DEFAULT_CONFIG: DbConfig = {
  target: { kind: "inMemory", name: "default", sharedCache: true },
  parameters: [],
  isFunction: false,
  needPrepare: false,
  debug: false,
};

// AbortSignal.any() added in Node 20.3
const AbortSignalAny = AbortSignal as typeof AbortSignal & {
  any(signals: AbortSignal[]): AbortSignal;
};

function createSignal(signal?: AbortSignal, timeout?: number): AbortSignal | undefined {
  if (!timeout) return signal;
  const deadline = AbortSignal.timeout(timeout);
  return signal ? AbortSignalAny.any([signal, deadline]) : deadline;
}

/**
 * Immutable execution builder. Each refinement returns a new `Db`; each
 * execution method opens a connection for its target, runs once and
 * releases the connection if it opened it.
 *
 * @example
 * const names = await Db.inMemory("app")
 *   .query("SELECT name FROM users WHERE age > $age")
 *   .parameters([["age", Sql.integer(21)]])
 *   .execute((r) => r.varChar("name"));
 */
export class Db {
  readonly config: DbConfig;

  private constructor(config: DbConfig) {
    this.config = config;
  }

  // --- Targets ---

  /** Shared in-memory database `default`. */
  static defaults(): Db {
    return new Db(DEFAULT_CONFIG);
  }

  static connect(connectionString: string): Db {
    return new Db({ ...DEFAULT_CONFIG, target: { kind: "connectionString", connectionString } });
  }

  static connectFromConfig(config: ConnectionConfig): Db {
    return Db.connect(connectionStringFromConfig(config));
  }

  static inMemory(name: string, sharedCache = true): Db {
    return Db.defaults().inMemory(name, sharedCache);
  }

  static fileDb(path: string, readOnly = false): Db {
    return Db.defaults().fileDb(path, readOnly);
  }

  /** Runs on a connection the caller owns. It is never closed here. */
  static existingConnection(connection: DuckDBConnection): Db {
    return new Db({ ...DEFAULT_CONFIG, target: { kind: "connection", connection } });
  }

  inMemory(name: string, sharedCache = true): Db {
    return this.with({ target: { kind: "inMemory", name, sharedCache } });
  }

  fileDb(path: string, readOnly = false): Db {
    return this.with({ target: { kind: "file", path, readOnly } });
  }

  // --- Refinements ---

  query(sql: string): Db {
    return this.with({ sql, isFunction: false });
  }

  /** Calls the table macro `name` with the configured parameters, in order. */
  func(name: string): Db {
    return this.with({ sql: name, isFunction: true });
  }

  parameters(parameters: SqlParameters): Db {
    return this.with({ parameters });
  }

  prepare(): Db {
    return this.with({ needPrepare: true });
  }

  signal(signal: AbortSignal): Db {
    return this.with({ signal });
  }

  timeout(ms: number): Db {
    return this.with({ timeout: ms });
  }

  debug(enabled = true): Db {
    return this.with({ debug: enabled });
  }

  // --- Execution ---

  /** Reads every row. */
  async execute<T>(read: (reader: RowReader) => T): Promise<T[]> {
    const sql = this.requireSql();
    return this.withCommand(sql, async (command, signal) => {
      const cursor = await command.executeReader(signal);
      const reader = new RowReader(cursor);
      const rows: T[] = [];
      while (await cursor.read()) rows.push(read(reader));
      this.log("read", rows.length, "rows");
      return rows;
    });
  }

  /** Reads the first row; throws {@link NoResultsError} when there is none. */
  async executeRow<T>(read: (reader: RowReader) => T): Promise<T> {
    const sql = this.requireSql();
    return this.withCommand(sql, async (command, signal) => {
      const cursor = await command.executeReader(signal);
      if (!(await cursor.read())) throw new NoResultsError();
      return read(new RowReader(cursor));
    });
  }

  /** Runs `perform` for each row, in order. */
  async iter(perform: (reader: RowReader) => void | Promise<void>): Promise<void> {
    const sql = this.requireSql();
    await this.withCommand(sql, async (command, signal) => {
      const cursor = await command.executeReader(signal);
      const reader = new RowReader(cursor);
      while (await cursor.read()) await perform(reader);
    });
  }

  /**
   * Lazy rows. Nothing runs until iterated; every traversal re-runs the query
   * on its own connection, so the sequence can be iterated any number of
   * times. Awaiting it collects one traversal.
   */
  toSeq<T>(read: (reader: RowReader) => T): CollectableAsyncIterable<T> {
    return restartable(() => this.traverse(read));
  }

  /** Returns the number of rows changed. */
  async executeNonQuery(): Promise<number> {
    const sql = this.requireSql();
    return this.withCommand(sql, async (command, signal) => {
      const changed = await command.executeNonQuery(signal);
      this.log("changed", changed, "rows");
      return changed;
    });
  }

  /**
   * Runs every entry inside one transaction and returns the rows changed per
   * entry. An entry with no parameter sets runs once, unbound; otherwise once
   * per set, with the counts summed. Any failure rolls the whole batch back.
   */
  async executeTransaction(queries: readonly TransactionEntry[]): Promise<number[]> {
    if (queries.length === 0) return [];
    return this.withConnection(async (connection, signal) => {
      await connection.run("BEGIN TRANSACTION");
      this.log("transaction started");
      try {
        const counts: number[] = [];
        for (const [sql, parameterSets] of queries) {
          counts.push(await this.runEntry(connection, sql, parameterSets, signal));
        }
        signal?.throwIfAborted();
        await connection.run("COMMIT");
        this.log("transaction committed", counts);
        return counts;
      } catch (err) {
        await this.rollback(connection);
        throw err;
      }
    });
  }

  // --- Internals ---

  private with(patch: Partial<DbConfig>): Db {
    return new Db({ ...this.config, ...patch });
  }

  private log(...args: unknown[]): void {
    if (this.config.debug) {
      console.log("[duckql]", ...args);
    }
  }

  private requireSql(): string {
    const sql = this.config.sql;
    if (sql === undefined || sql.trim() === "") throw new MissingQueryError();
    return sql;
  }

  private async createCommand(connection: DuckDBConnection, sql: string, signal?: AbortSignal): Promise<Command> {
    const command = new Command(connection, sql);
    if (this.config.isFunction) command.commandType = "storedRoutine";
    populateRow(command, this.config.parameters);
    // Stored routines take their argument list from the bound names, so compile after binding
    if (this.config.needPrepare) await command.prepare(signal);
    this.log("executing", command.effectiveText, `(${command.parameters.length} parameters)`);
    return command;
  }

  private async runEntry(
    connection: DuckDBConnection,
    sql: string,
    parameterSets: readonly SqlParameters[],
    signal?: AbortSignal,
  ): Promise<number> {
    const command = new Command(connection, sql);
    try {
      if (this.config.needPrepare) await command.prepare(signal);
      if (parameterSets.length === 0) {
        this.log("executing", sql);
        return await command.executeNonQuery(signal);
      }
      let total = 0;
      for (const parameters of parameterSets) {
        command.parameters.length = 0;
        populateRow(command, parameters);
        this.log("executing", sql, `(${command.parameters.length} parameters)`);
        total += await command.executeNonQuery(signal);
      }
      return total;
    } finally {
      command.close();
    }
  }

  private async rollback(connection: DuckDBConnection): Promise<void> {
    try {
      await connection.run("ROLLBACK");
      this.log("transaction rolled back");
    } catch (rollbackErr) {
      // The original failure is what the caller sees
      this.log("rollback failed:", rollbackErr);
    }
  }

  private async open(signal?: AbortSignal): Promise<ConnectionLease> {
    const lease = await openConnection(this.config.target, {
      signal,
      log: this.config.debug ? (...args) => this.log(...args) : undefined,
    });
    return lease;
  }

  private close(lease: ConnectionLease): void {
    if (!lease.owned) return;
    lease.release();
    this.log("connection released");
  }

  /**
   * Acquire, run, release. While `work` runs, an abort interrupts the
   * statement on the connection and surfaces as the signal's reason.
   */
  private async withConnection<T>(
    work: (connection: DuckDBConnection, signal?: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const signal = createSignal(this.config.signal, this.config.timeout);
    const lease = await this.open(signal);
    const stop = interruptOnAbort(lease.connection, signal);
    try {
      return await work(lease.connection, signal);
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      throw err;
    } finally {
      stop();
      this.close(lease);
    }
  }

  /** {@link withConnection} around a command built from the configuration, closed when `work` settles. */
  private async withCommand<T>(
    sql: string,
    work: (command: Command, signal?: AbortSignal) => Promise<T>,
  ): Promise<T> {
    return this.withConnection(async (connection, signal) => {
      const command = await this.createCommand(connection, sql, signal);
      try {
        return await work(command, signal);
      } finally {
        command.close();
      }
    });
  }

  private async *traverse<T>(read: (reader: RowReader) => T): AsyncGenerator<T, void, undefined> {
    const sql = this.requireSql();
    const signal = createSignal(this.config.signal, this.config.timeout);
    const lease = await this.open(signal);
    const stop = interruptOnAbort(lease.connection, signal);
    try {
      const command = await this.createCommand(lease.connection, sql, signal);
      try {
        const cursor = await command.executeReader(signal);
        const reader = new RowReader(cursor);
        while (await cursor.read()) yield read(reader);
      } finally {
        command.close();
      }
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      throw err;
    } finally {
      stop();
      this.close(lease);
    }
  }
}

function interruptOnAbort(connection: DuckDBConnection, signal?: AbortSignal): () => void {
  if (!signal) return () => {};
  const onAbort = () => connection.interrupt();
  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}
