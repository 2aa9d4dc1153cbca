/**
 * SQLite store configuration
 */
export interface SQLiteStoreConfig {
  /**
   * Database file; `:memory:` when omitted. The file is read on open and
   * rewritten after every committed write.
   */
  path?: string;
  /** Use an already opened driver instead of opening `path` */
  driver?: SQLiteDriver;
}

/**
 * Value that can be bound to a statement parameter or read from a column
 */
export type SQLiteValue = string | number | Uint8Array | null;

/**
 * A result row keyed by column name
 */
export type SQLiteRow = Record<string, SQLiteValue>;

/**
 * Run result from statement execution
 */
export interface RunResult {
  changes: number;
}

/**
 * Statement prepared for execution
 */
export interface SQLiteStatement {
  run(...params: SQLiteValue[]): RunResult;
  get(...params: SQLiteValue[]): SQLiteRow | undefined;
  all(...params: SQLiteValue[]): SQLiteRow[];
}

/**
 * SQLite driver interface (abstraction over the WASM build)
 */
export interface SQLiteDriver {
  /** Execute one or more SQL statements */
  exec(sql: string): void;

  /** Prepare a statement */
  prepare(sql: string): SQLiteStatement;

  /** Close the database */
  close(): void;

  /** Check if database is open */
  isOpen(): boolean;

  /** Export the database file image */
  export?(): Uint8Array;
}
