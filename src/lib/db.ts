import { readdir, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import BetterSqlite3 from 'better-sqlite3';

export type BindValue = string | number | bigint | null;

export type RunResult = {
  success: boolean;
  meta: { changes: number; lastRowId: number | bigint };
};

/**
 * Prepared-statement surface shared by the SQLite store and the test doubles.
 * Mirrors the bind/first/all/run shape used throughout the service.
 */
export interface PreparedStatement {
  bind(...values: BindValue[]): PreparedStatement;
  first<T>(): Promise<T | null>;
  all<T>(): Promise<{ results: T[] }>;
  run(): Promise<RunResult>;
}

export interface Database {
  prepare(sql: string): PreparedStatement;
  exec(sql: string): Promise<void>;
}

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url));

class SqliteStatement implements PreparedStatement {
  #db: BetterSqlite3.Database;
  #sql: string;
  #args: BindValue[] = [];

  constructor(db: BetterSqlite3.Database, sql: string) {
    this.#db = db;
    this.#sql = sql;
  }

  bind(...values: BindValue[]) {
    this.#args = values;
    return this;
  }

  async first<T>() {
    const row = this.#db.prepare<BindValue[], T>(this.#sql).get(...this.#args);
    return row ?? null;
  }

  async all<T>() {
    const results = this.#db.prepare<BindValue[], T>(this.#sql).all(...this.#args);
    return { results };
  }

  async run(): Promise<RunResult> {
    const info = this.#db.prepare<BindValue[]>(this.#sql).run(...this.#args);
    return { success: true, meta: { changes: info.changes, lastRowId: info.lastInsertRowid } };
  }
}

export class SqliteDatabase implements Database {
  readonly #db: BetterSqlite3.Database;

  constructor(filename: string) {
    this.#db = new BetterSqlite3(filename);
    if (filename !== ':memory:') {
      this.#db.pragma('journal_mode = WAL');
    }
  }

  prepare(sql: string): PreparedStatement {
    return new SqliteStatement(this.#db, sql);
  }

  async exec(sql: string): Promise<void> {
    this.#db.exec(sql);
  }

  close(): void {
    this.#db.close();
  }
}

export async function applyMigrations(db: Database, dir: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
  const files = (await readdir(dir)).filter((name) => name.endsWith('.sql')).sort();
  for (const file of files) {
    const sql = await readFile(path.join(dir, file), 'utf8');
    await db.exec(sql);
  }
  return files;
}

export async function openDatabase(filename: string): Promise<SqliteDatabase> {
  const db = new SqliteDatabase(filename);
  const applied = await applyMigrations(db);
  console.info('Database ready', { filename, migrations: applied.length });
  return db;
}
