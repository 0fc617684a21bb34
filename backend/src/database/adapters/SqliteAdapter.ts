/**
 * SQLite database adapter
 *
 * Runs SQLite in-process through sql.js. File-backed databases are loaded into
 * memory on open and written back after each commit or autocommitted write,
 * and on close.
 */

import initSqlJs, { Database as SqlJsDatabase, SqlJsStatic } from 'sql.js';
import * as fs from 'fs/promises';
import {
  DatabaseConfig,
  DatabaseConnection,
  QueryResult,
  ExecuteResult,
  ConnectionError,
  QueryError,
  Row,
  SqlValue
} from '../types';

const MEMORY = ':memory:';

let sqlJs: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class SqliteConnection implements DatabaseConnection {
  private db: SqlJsDatabase;
  private filename: string;
  private inTransaction = false;
  private dirty = false;
  private closed = false;

  constructor(db: SqlJsDatabase, filename: string = MEMORY) {
    this.db = db;
    this.filename = filename;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<QueryResult> {
    this.assertOpen(sql);

    const rows: Row[] = [];
    try {
      const statement = this.db.prepare(sql);
      try {
        statement.bind(params);
        while (statement.step()) {
          rows.push(statement.getAsObject());
        }
      } finally {
        statement.free();
      }
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`SQLite query failed: ${cause.message}`, sql, cause);
    }

    return { rows, rowCount: rows.length };
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<ExecuteResult> {
    const result = this.run(sql, params);

    this.dirty = true;
    if (!this.inTransaction) {
      await this.flush();
    }
    return result;
  }

  async beginTransaction(): Promise<void> {
    if (this.inTransaction) {
      throw new Error('Transaction already in progress');
    }

    this.run('BEGIN TRANSACTION');
    this.inTransaction = true;
  }

  async commit(): Promise<void> {
    if (!this.inTransaction) {
      throw new Error('No transaction in progress');
    }

    this.run('COMMIT');
    this.inTransaction = false;
    await this.flush();
  }

  async rollback(): Promise<void> {
    if (!this.inTransaction) {
      throw new Error('No transaction in progress');
    }

    // Cleared first: a failed ROLLBACK leaves nothing we could retry.
    this.inTransaction = false;
    this.run('ROLLBACK');
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    try {
      await this.flush();
    } finally {
      this.db.close();
      this.closed = true;
    }
  }

  isConnected(): boolean {
    return !this.closed;
  }

  /**
   * Write the database file. sql.js reopens its handle on export, so this must
   * not run inside a transaction and per-connection pragmas are set again.
   */
  private async flush(): Promise<void> {
    if (this.filename === MEMORY || !this.dirty) {
      return;
    }

    try {
      const data = this.db.export();
      this.db.run('PRAGMA foreign_keys = ON');
      await fs.writeFile(this.filename, data);
      this.dirty = false;
    } catch (error) {
      const cause = toError(error);
      throw new ConnectionError(`Failed to save SQLite database ${this.filename}: ${cause.message}`, cause);
    }
  }

  private run(sql: string, params: SqlValue[] = []): ExecuteResult {
    this.assertOpen(sql);

    try {
      this.db.run(sql, params);
      return {
        affectedRows: this.db.getRowsModified(),
        insertId: this.lastInsertId()
      };
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`SQLite execute failed: ${cause.message}`, sql, cause);
    }
  }

  private lastInsertId(): number | undefined {
    const [result] = this.db.exec('SELECT last_insert_rowid()');
    const value = result?.values[0]?.[0];
    return typeof value === 'number' ? value : undefined;
  }

  private assertOpen(sql: string): void {
    if (this.closed) {
      throw new QueryError('SQLite connection is closed', sql);
    }
  }
}

async function readDatabaseFile(filename: string): Promise<Uint8Array | undefined> {
  try {
    return await fs.readFile(filename);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Open a connection with foreign keys enforced. A missing file starts an
 * empty database that is created on the first write.
 */
export async function openSqliteConnection(config: DatabaseConfig): Promise<SqliteConnection> {
  let db: SqlJsDatabase;
  try {
    const SQL = await loadSqlJs();
    const data = config.filename === MEMORY ? undefined : await readDatabaseFile(config.filename);
    db = new SQL.Database(data);
    db.run('PRAGMA foreign_keys = ON');
  } catch (error) {
    const cause = toError(error);
    throw new ConnectionError(`Failed to create SQLite connection: ${cause.message}`, cause);
  }

  return new SqliteConnection(db, config.filename);
}
