import { DuckDBInstance, type DuckDBConnection } from "@duckdb/node-api";

/**
 * Where a connection comes from. Every kind but `connection` is owned: the
 * caller that opened it closes it.
 */
export type ExecutionTarget =
  | { readonly kind: "connection"; readonly connection: DuckDBConnection }
  | { readonly kind: "connectionString"; readonly connectionString: string }
  | { readonly kind: "file"; readonly path: string; readonly readOnly: boolean }
  | { readonly kind: "inMemory"; readonly name: string; readonly sharedCache: boolean };

export type OwnedTarget = Exclude<ExecutionTarget, { kind: "connection" }>;

export type AccessMode = "READ_ONLY" | "READ_WRITE" | "AUTOMATIC";

export interface ConnectionConfig {
  /** File path, or `:memory:<name>` (append `?cache=shared` to share it). */
  dataSource: string;
  accessMode?: AccessMode;
  /** DuckDB configuration options, e.g. `{ threads: "4", memory_limit: "1GB" }`. */
  options?: Record<string, string | number | boolean>;
}

export interface ParsedConnectionString {
  /** A file path, or empty for an in-memory database. */
  readonly path: string;
  readonly inMemory: boolean;
  /** Name of the in-memory database; empty when anonymous. */
  readonly name: string;
  readonly sharedCache: boolean;
  /** DuckDB config options, keys lower-cased. */
  readonly options: Readonly<Record<string, string>>;
}

const MEMORY_PREFIX = ":memory:";
const SHARED_SUFFIX = "?cache=shared";

export function connectionStringFor(target: OwnedTarget): string {
  switch (target.kind) {
    case "connectionString":
      return target.connectionString;
    case "file":
      return target.readOnly
        ? `Data Source=${target.path};ACCESS_MODE=READ_ONLY`
        : `Data Source=${target.path}`;
    case "inMemory":
      return target.sharedCache
        ? `Data Source=${MEMORY_PREFIX}${target.name}${SHARED_SUFFIX}`
        : `Data Source=${MEMORY_PREFIX}${target.name}`;
  }
}

function checkSegment(value: string, what: string): string {
  if (value.includes(";")) {
    throw new TypeError(`Connection string ${what} cannot contain ';': "${value}"`);
  }
  return value;
}

export function connectionStringFromConfig(config: ConnectionConfig): string {
  const parts = [`Data Source=${checkSegment(config.dataSource, "data source")}`];
  if (config.accessMode) parts.push(`ACCESS_MODE=${config.accessMode}`);
  for (const [key, value] of Object.entries(config.options ?? {})) {
    parts.push(`${checkSegment(key, "key")}=${checkSegment(String(value), "value")}`);
  }
  return parts.join(";");
}

/**
 * Parses `key=value` pairs separated by `;`. Keys are case-insensitive;
 * `Data Source` (or `DataSource`) names the database and every other key is
 * passed to DuckDB as a config option.
 */
export function parseConnectionString(connectionString: string): ParsedConnectionString {
  let dataSource = "";
  const options: Record<string, string> = {};

  for (const segment of connectionString.split(";")) {
    if (segment.trim() === "") continue;
    const eq = segment.indexOf("=");
    if (eq === -1) {
      throw new TypeError(`Invalid connection string segment "${segment.trim()}": expected key=value`);
    }
    const key = segment.slice(0, eq).trim().toLowerCase();
    const value = segment.slice(eq + 1).trim();
    if (key === "data source" || key === "datasource") {
      dataSource = value;
    } else if (key === "") {
      throw new TypeError(`Invalid connection string segment "${segment.trim()}": empty key`);
    } else {
      options[key] = value;
    }
  }

  let sharedCache = false;
  if (dataSource.toLowerCase().endsWith(SHARED_SUFFIX)) {
    sharedCache = true;
    dataSource = dataSource.slice(0, -SHARED_SUFFIX.length);
  }
  if (dataSource === "" || dataSource.startsWith(MEMORY_PREFIX)) {
    return { path: "", inMemory: true, name: dataSource.slice(MEMORY_PREFIX.length), sharedCache, options };
  }
  return { path: dataSource, inMemory: false, name: "", sharedCache, options };
}

// --- Instance registry ---

/** A connection held for one call. `release()` runs once; later calls do nothing. */
export interface ConnectionLease {
  readonly connection: DuckDBConnection;
  readonly owned: boolean;
  release(): void;
}

export interface OpenOptions {
  signal?: AbortSignal;
  log?: (...args: unknown[]) => void;
}

class InstanceEntry {
  readonly instance: Promise<DuckDBInstance>;
  /** Set once the instance has opened. */
  resolved: DuckDBInstance | null = null;
  refs = 1;

  constructor(create: () => Promise<DuckDBInstance>) {
    this.instance = create().then((instance) => {
      this.resolved = instance;
      return instance;
    });
  }
}

// Shared in-memory databases live here until closed explicitly; without a
// strong reference their data would go with the last connection.
const sharedMemory = new Map<string, InstanceEntry>();
// File databases are closed with their last lease, releasing the file lock.
const files = new Map<string, InstanceEntry>();

function optionsKey(options: Readonly<Record<string, string>>): string {
  return Object.keys(options)
    .sort()
    .map((k) => `${k}=${options[k]}`)
    .join(";");
}

function acquireEntry(
  registry: Map<string, InstanceEntry>,
  key: string,
  create: () => Promise<DuckDBInstance>,
): InstanceEntry {
  const existing = registry.get(key);
  if (existing) {
    existing.refs++;
    return existing;
  }
  const entry = new InstanceEntry(create);
  registry.set(key, entry);
  // A failed open must not poison later attempts
  entry.instance.catch(() => {
    if (registry.get(key) === entry) registry.delete(key);
  });
  return entry;
}

function closeInstance(instance: DuckDBInstance, log?: OpenOptions["log"]): void {
  instance.closeSync();
  log?.("instance closed");
}

async function connectTo(
  instance: Promise<DuckDBInstance>,
  onFailure: () => void,
  signal?: AbortSignal,
): Promise<DuckDBConnection> {
  try {
    const connection = await (await instance).connect();
    if (signal?.aborted) {
      connection.closeSync();
      signal.throwIfAborted();
    }
    return connection;
  } catch (err) {
    onFailure();
    throw err;
  }
}

function lease(connection: DuckDBConnection, owned: boolean, onRelease: () => void): ConnectionLease {
  let released = false;
  return {
    connection,
    owned,
    release() {
      if (released) return;
      released = true;
      onRelease();
    },
  };
}

/**
 * Resolves a target to an open connection. External connections are handed
 * back as-is and never closed; owned connections are closed on release,
 * together with their instance when nothing else holds it.
 */
export async function openConnection(target: ExecutionTarget, opts: OpenOptions = {}): Promise<ConnectionLease> {
  const { signal, log } = opts;
  signal?.throwIfAborted();

  if (target.kind === "connection") {
    log?.("using external connection");
    return lease(target.connection, false, () => {});
  }

  const connectionString = connectionStringFor(target);
  const parsed = parseConnectionString(connectionString);
  log?.("opening", connectionString);

  if (parsed.inMemory && parsed.sharedCache) {
    const key = `${parsed.name}|${optionsKey(parsed.options)}`;
    const entry = acquireEntry(sharedMemory, key, () => DuckDBInstance.create(MEMORY_PREFIX, parsed.options));
    // Shared instances outlive their leases; only the ref count moves
    const connection = await connectTo(entry.instance, () => entry.refs--, signal);
    return lease(connection, true, () => {
      entry.refs--;
      connection.closeSync();
      log?.("connection closed", connectionString);
    });
  }

  if (parsed.inMemory) {
    const instance = await DuckDBInstance.create(MEMORY_PREFIX, parsed.options);
    const connection = await connectTo(Promise.resolve(instance), () => instance.closeSync(), signal);
    return lease(connection, true, () => {
      connection.closeSync();
      closeInstance(instance, log);
      log?.("connection closed", connectionString);
    });
  }

  const key = `${parsed.path}|${optionsKey(parsed.options)}`;
  const entry = acquireEntry(files, key, () => DuckDBInstance.create(parsed.path, parsed.options));
  const releaseRef = () => {
    entry.refs--;
    if (entry.refs > 0 || files.get(key) !== entry) return;
    files.delete(key);
    if (entry.resolved) closeInstance(entry.resolved, log);
  };
  const connection = await connectTo(entry.instance, releaseRef, signal);
  return lease(connection, true, () => {
    connection.closeSync();
    log?.("connection closed", connectionString);
    releaseRef();
  });
}

/** Closes a shared in-memory database, discarding its data. Returns false if none was open. */
export async function closeInMemory(name: string): Promise<boolean> {
  let closed = false;
  for (const [key, entry] of sharedMemory) {
    if (key.slice(0, key.indexOf("|")) !== name) continue;
    sharedMemory.delete(key);
    closeInstance(await entry.instance);
    closed = true;
  }
  return closed;
}

/** Closes every cached instance: shared in-memory databases and open files. */
export async function closeAllInstances(): Promise<void> {
  const entries = [...sharedMemory.values(), ...files.values()];
  sharedMemory.clear();
  files.clear();
  const results = await Promise.allSettled(entries.map((e) => e.instance));
  for (const result of results) {
    if (result.status === "fulfilled") closeInstance(result.value);
  }
}
