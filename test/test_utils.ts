import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { DuckDBValue } from "@duckdb/node-api";
import type { Cursor } from "../engine/cursor.ts";
import type { ColumnInfo } from "../errors.ts";

// Async iterable helpers
export async function collect<T>(gen: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of gen) results.push(item);
  return results;
}

/**
 * In-memory cursor over fixed rows, for exercising the row reader without an
 * engine.
 */
export class ArrayCursor implements Cursor {
  private index = -1;

  constructor(
    private readonly columns: readonly ColumnInfo[],
    private readonly rows: readonly DuckDBValue[][],
  ) {}

  get fieldCount(): number {
    return this.columns.length;
  }

  getName(ordinal: number): string {
    return this.columns[ordinal].name;
  }

  getDataTypeName(ordinal: number): string {
    return this.columns[ordinal].type;
  }

  isNull(ordinal: number): boolean {
    return this.getValue(ordinal) === null;
  }

  getValue(ordinal: number): DuckDBValue {
    const row = this.rows[this.index];
    if (row === undefined) throw new Error("No current row");
    return row[ordinal];
  }

  read(): boolean {
    if (this.index + 1 >= this.rows.length) return false;
    this.index++;
    return true;
  }
}

/** A cursor positioned on its only row. */
export function singleRow(columns: readonly ColumnInfo[], row: DuckDBValue[]): ArrayCursor {
  const cursor = new ArrayCursor(columns, [row]);
  cursor.read();
  return cursor;
}

// Temp directories for file-backed databases
export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "duckql-test-"));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
