/**
 * Database configuration types and interfaces
 */

export type SqlValue = string | number | null | Uint8Array;

export type Row = Record<string, unknown>;

export interface DatabaseConfig {
  /** SQLite file name, or ':memory:' */
  filename: string;
}

export interface DatabaseConnection {
  query(sql: string, params?: SqlValue[]): Promise<QueryResult>;
  execute(sql: string, params?: SqlValue[]): Promise<ExecuteResult>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
  isConnected(): boolean;
}

export interface QueryResult {
  rows: Row[];
  rowCount: number;
}

export interface ExecuteResult {
  affectedRows: number;
  insertId?: number;
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public code?: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class ConnectionError extends DatabaseError {
  constructor(message: string, originalError?: Error) {
    super(message, 'CONNECTION_ERROR', originalError);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends DatabaseError {
  constructor(message: string, public query?: string, originalError?: Error) {
    super(message, 'QUERY_ERROR', originalError);
    this.name = 'QueryError';
  }
}

/**
 * Raised when a rollback fails after the work inside the transaction already
 * failed. `originalError` is the rollback failure, `cause` the work's error.
 */
export class TransactionError extends DatabaseError {
  constructor(message: string, public readonly cause: unknown, rollbackError?: Error) {
    super(message, 'TRANSACTION_ERROR', rollbackError);
    this.name = 'TransactionError';
  }
}
