import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { SCHEMA_SQL, type SqlValue, TABLE_COLUMNS, type TableColumns, type TableName } from './schema.js';

export type Fields<T extends TableName> = Partial<TableColumns[T]>;

type LooseFields = Partial<Record<string, SqlValue>>;

/**
 * Generic CRUD over the fixed casefile tables.
 *
 * Every write auto-commits unless it runs inside `transaction()`.
 * SQLite errors (constraint violations, bad SQL) are not caught here.
 */
export class Store {
  constructor(private readonly db: Database.Database) {}

  insert<T extends TableName>(table: T, fields: Fields<T>): number;
  insert(table: TableName, fields: LooseFields): number {
    const entries = this.entries(table, fields);
    const columns = entries.map(([column]) => column).join(', ');
    const placeholders = entries.map(() => '?').join(', ');

    const result = this.db
      .prepare(`INSERT INTO ${table} (${columns}) VALUES (${placeholders})`)
      .run(...entries.map(([, value]) => value));

    return Number(result.lastInsertRowid);
  }

  update<T extends TableName>(table: T, id: number, fields: Fields<T>): void;
  update(table: TableName, id: number, fields: LooseFields): void {
    const entries = this.entries(table, fields);
    if (entries.length === 0) return;

    const assignments = entries.map(([column]) => `${column} = ?`).join(', ');
    this.db
      .prepare(`UPDATE ${table} SET ${assignments} WHERE id = ?`)
      .run(...entries.map(([, value]) => value), id);
  }

  delete(table: TableName, id: number): void {
    this.db.prepare(`DELETE FROM ${table} WHERE id = ?`).run(id);
  }

  query<R>(sql: string, params: SqlValue[] = []): R[] {
    return this.db.prepare(sql).all(...params) as R[];
  }

  queryOne<R>(sql: string, params: SqlValue[] = []): R | null {
    const row = this.db.prepare(sql).get(...params) as R | undefined;
    return row ?? null;
  }

  count<T extends TableName>(table: T, where?: Fields<T>): number;
  count(table: TableName, where: LooseFields = {}): number {
    const entries = this.entries(table, where);
    const clause = entries.length
      ? ` WHERE ${entries.map(([column]) => `${column} = ?`).join(' AND ')}`
      : '';

    const row = this.queryOne<{ count: number }>(
      `SELECT COUNT(*) AS count FROM ${table}${clause}`,
      entries.map(([, value]) => value)
    );
    return row ? row.count : 0;
  }

  /**
   * Run `fn` under BEGIN IMMEDIATE so a check-then-write cannot interleave
   * with another writer on the same file.
   */
  transaction<R>(fn: () => R): R {
    return this.db.transaction(fn).immediate();
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  close(): void {
    this.db.close();
  }

  private entries(table: TableName, fields: LooseFields): Array<[string, SqlValue]> {
    const known = new Set<string>(TABLE_COLUMNS[table]);
    const entries: Array<[string, SqlValue]> = [];

    for (const [column, value] of Object.entries(fields)) {
      if (value === undefined) continue;
      if (!known.has(column)) {
        throw new Error(`Unknown column "${column}" for table ${table}`);
      }
      entries.push([column, value]);
    }
    return entries;
  }
}

/**
 * Open (or create) a store at `path`. Pass ':memory:' for a throwaway database.
 */
export function openStore(path: string): Store {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA_SQL);
  return new Store(db);
}

export function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'SQLITE_CONSTRAINT_UNIQUE' || err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}
