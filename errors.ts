/** A column as the cursor reports it. */
export interface ColumnInfo {
  readonly name: string;
  readonly type: string;
}

/**
 * Thrown when an execution method runs before any SQL was configured.
 */
export class MissingQueryError extends Error {
  constructor() {
    super("No query provided to execute. Please use Db.query");
    this.name = "MissingQueryError";
  }
}

/**
 * Thrown by `executeRow` when the result set is empty.
 */
export class NoResultsError extends Error {
  constructor() {
    super("Expected at least one row to be returned from the result set. Instead it was empty");
    this.name = "NoResultsError";
  }
}

/**
 * A requested column is not in the result, or holds a value the accessor
 * cannot read as its type. Lists every column the result does have.
 */
export class UnknownColumnError extends Error {
  readonly column: string;
  readonly expectedType: string;
  readonly available: readonly ColumnInfo[];

  constructor(column: string, expectedType: string, available: readonly ColumnInfo[]) {
    const listing = available.map((c) => `[${c.name}: ${c.type}]`).join(", ");
    super(`Column '${column}' not found (expected ${expectedType}). Available: ${listing}`);
    this.name = "UnknownColumnError";
    this.column = column;
    this.expectedType = expectedType;
    this.available = available;
  }
}
