/**
 * Shared fixtures for database and migration tests
 */

import { openSqliteConnection, SqliteConnection } from '../adapters/SqliteAdapter';
import { DatabaseConnection } from '../types';
import { Clock, MigrationUnit } from '../migrations/types';

export function openMemoryConnection(): Promise<SqliteConnection> {
  return openSqliteConnection({ filename: ':memory:' });
}

export async function tableNames(connection: DatabaseConnection): Promise<string[]> {
  const result = await connection.query(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
  );
  return result.rows.map(row => String(row.name));
}

export async function columnNames(connection: DatabaseConnection, table: string): Promise<string[]> {
  const result = await connection.query(`PRAGMA table_info(${table})`);
  return result.rows.map(row => String(row.name));
}

export async function ledgerIdentifiers(connection: DatabaseConnection, table = 'schema_migrations'): Promise<string[]> {
  const result = await connection.query(`SELECT identifier FROM ${table} ORDER BY identifier`);
  return result.rows.map(row => String(row.identifier));
}

/**
 * A unit that creates `table` and drops it again. `calls` receives the
 * identifier on every apply and revert, in order.
 */
export function createTableUnit(identifier: string, table: string, calls: string[] = []): MigrationUnit {
  return {
    identifier,
    fingerprint: { table },
    async apply(connection) {
      calls.push(`apply:${identifier}`);
      await connection.execute(`CREATE TABLE ${table} (id INTEGER PRIMARY KEY)`);
    },
    async revert(connection) {
      calls.push(`revert:${identifier}`);
      await connection.execute(`DROP TABLE ${table}`);
    }
  };
}

/** Starts at 2024-01-01T00:00:00Z and advances one second per call */
export function steppingClock(): Clock {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}
