import type { DuckDBResult, DuckDBValue } from "@duckdb/node-api";

/**
 * Forward-only view over a result set. Schema is fixed for the cursor's
 * lifetime; value access refers to the row the last `read()` moved to.
 */
export interface Cursor {
  readonly fieldCount: number;
  getName(ordinal: number): string;
  getDataTypeName(ordinal: number): string;
  isNull(ordinal: number): boolean;
  getValue(ordinal: number): DuckDBValue;
}

/**
 * Cursor over a DuckDB result, pulling one data chunk at a time.
 *
 * The signal is checked before every chunk fetch, so an abort between chunks
 * stops the walk with the signal's reason.
 */
export class ResultCursor implements Cursor {
  private rows: DuckDBValue[][] = [];
  private rowIndex = -1;
  private exhausted = false;
  private readonly names: string[];
  private readonly typeNames: string[];

  constructor(
    private readonly result: DuckDBResult,
    private readonly signal?: AbortSignal,
  ) {
    const count = result.columnCount;
    this.names = new Array(count);
    this.typeNames = new Array(count);
    for (let i = 0; i < count; i++) {
      this.names[i] = result.columnName(i);
      this.typeNames[i] = result.columnType(i).toString();
    }
  }

  get fieldCount(): number {
    return this.names.length;
  }

  getName(ordinal: number): string {
    this.checkOrdinal(ordinal);
    return this.names[ordinal];
  }

  getDataTypeName(ordinal: number): string {
    this.checkOrdinal(ordinal);
    return this.typeNames[ordinal];
  }

  isNull(ordinal: number): boolean {
    return this.getValue(ordinal) === null;
  }

  getValue(ordinal: number): DuckDBValue {
    this.checkOrdinal(ordinal);
    const row = this.rows[this.rowIndex];
    if (row === undefined) {
      throw new Error("No current row: call read() before accessing values");
    }
    return row[ordinal];
  }

  /** Advance to the next row. Resolves false once the result is exhausted. */
  async read(): Promise<boolean> {
    while (this.rowIndex + 1 >= this.rows.length) {
      if (this.exhausted) return false;
      this.signal?.throwIfAborted();
      const chunk = await this.result.fetchChunk();
      this.signal?.throwIfAborted();
      // Older bindings signal the end with an empty chunk, newer ones with null
      if (!chunk || chunk.rowCount === 0) {
        this.exhausted = true;
        this.rows = [];
        this.rowIndex = -1;
        return false;
      }
      this.rows = chunk.getRows();
      this.rowIndex = -1;
    }
    this.rowIndex++;
    return true;
  }

  private checkOrdinal(ordinal: number): void {
    if (!Number.isInteger(ordinal) || ordinal < 0 || ordinal >= this.names.length) {
      throw new RangeError(`Ordinal out of bounds: ${ordinal} (field count ${this.names.length})`);
    }
  }
}
