import { existsSync, readFileSync } from 'node:fs';

import { StorageError } from '@custody/core';
import type { Database, SqlJsStatic } from 'sql.js';

import type { SQLiteDriver, SQLiteRow, SQLiteStoreConfig, SQLiteValue } from './types.js';

async function loadSqlJs(): Promise<SqlJsStatic> {
  try {
    // CommonJS package: the namespace default is module.exports
    const module = await import('sql.js');
    return await module.default.default();
  } catch (error) {
    throw new StorageError(
      'LEDGER_S302',
      'sql.js could not be loaded',
      {},
      error instanceof Error ? error : undefined,
    );
  }
}

function readDatabaseFile(path: string | undefined): Uint8Array | undefined {
  if (!path || path === ':memory:' || !existsSync(path)) {
    return undefined;
  }
  try {
    return readFileSync(path);
  } catch (error) {
    throw new StorageError(
      'LEDGER_S300',
      `Failed to read database file ${path}`,
      { path },
      error instanceof Error ? error : undefined,
    );
  }
}

function collect(db: Database, sql: string, params: SQLiteValue[]): SQLiteRow[] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: SQLiteRow[] = [];
    while (stmt.step()) {
      rows.push(stmt.getAsObject());
    }
    return rows;
  } finally {
    stmt.free();
  }
}

/**
 * Open a sql.js (WASM) database, seeded from `config.path` when the file exists
 */
export async function createSqlJsDriver(config: SQLiteStoreConfig): Promise<SQLiteDriver> {
  const SQL = await loadSqlJs();
  const db = new SQL.Database(readDatabaseFile(config.path));

  let isDbOpen = true;

  return {
    exec: (sql: string) => {
      db.exec(sql);
    },
    prepare: (sql: string) => ({
      run: (...params: SQLiteValue[]) => {
        db.run(sql, params);
        return { changes: db.getRowsModified() };
      },
      get: (...params: SQLiteValue[]) => collect(db, sql, params)[0],
      all: (...params: SQLiteValue[]) => collect(db, sql, params),
    }),
    close: () => {
      db.close();
      isDbOpen = false;
    },
    isOpen: () => isDbOpen,
    export: () => db.export(),
  };
}
