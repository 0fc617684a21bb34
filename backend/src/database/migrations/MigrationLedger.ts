/**
 * Persisted record of applied migrations
 *
 * Every method runs on the connection the caller passes in, so a ledger write
 * commits or rolls back together with the schema change around it.
 */

import { DatabaseConnection, Row } from '../types';
import { errorMessage } from '../transaction';
import { LedgerError } from './errors';
import { LedgerEntry } from './types';

export const DEFAULT_LEDGER_TABLE = 'schema_migrations';

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class MigrationLedger {
  readonly tableName: string;

  constructor(tableName: string = DEFAULT_LEDGER_TABLE) {
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new LedgerError(`Invalid ledger table name: ${tableName}`);
    }
    this.tableName = tableName;
  }

  /**
   * Create the ledger table if it does not exist
   */
  async ensureSchema(connection: DatabaseConnection): Promise<void> {
    await this.run('create ledger table', () =>
      connection.execute(`
        CREATE TABLE IF NOT EXISTS ${this.tableName} (
          identifier TEXT PRIMARY KEY,
          applied_at TEXT NOT NULL,
          checksum TEXT NOT NULL
        )
      `)
    );
  }

  async exists(connection: DatabaseConnection): Promise<boolean> {
    const result = await this.run('inspect ledger table', () =>
      connection.query(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
        [this.tableName]
      )
    );
    return result.rowCount > 0;
  }

  async appliedIdentifiers(connection: DatabaseConnection): Promise<Set<string>> {
    const entries = await this.entries(connection);
    return new Set(entries.map(entry => entry.identifier));
  }

  /**
   * Entries in the order they were applied
   */
  async entries(connection: DatabaseConnection): Promise<LedgerEntry[]> {
    const result = await this.run('read ledger', () =>
      connection.query(
        `SELECT identifier, applied_at, checksum FROM ${this.tableName} ORDER BY applied_at ASC, identifier ASC`
      )
    );
    return result.rows.map(row => this.toEntry(row));
  }

  /**
   * The `count` most recently applied entries, newest first. Entries sharing
   * an applied_at value are ordered by identifier, highest first.
   */
  async latest(connection: DatabaseConnection, count: number): Promise<LedgerEntry[]> {
    const result = await this.run('read ledger', () =>
      connection.query(
        `SELECT identifier, applied_at, checksum FROM ${this.tableName} ORDER BY applied_at DESC, identifier DESC LIMIT ?`,
        [count]
      )
    );
    return result.rows.map(row => this.toEntry(row));
  }

  async recordApplied(
    connection: DatabaseConnection,
    identifier: string,
    appliedAt: Date,
    checksum: string
  ): Promise<void> {
    await this.run(`record ${identifier} as applied`, () =>
      connection.execute(
        `INSERT INTO ${this.tableName} (identifier, applied_at, checksum) VALUES (?, ?, ?)`,
        [identifier, appliedAt.toISOString(), checksum]
      )
    );
  }

  async recordReverted(connection: DatabaseConnection, identifier: string): Promise<void> {
    const result = await this.run(`record ${identifier} as reverted`, () =>
      connection.execute(`DELETE FROM ${this.tableName} WHERE identifier = ?`, [identifier])
    );

    if (result.affectedRows === 0) {
      throw new LedgerError(`Ledger has no entry for ${identifier}`);
    }
  }

  private async run<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new LedgerError(`Failed to ${action}: ${errorMessage(error)}`, error);
    }
  }

  private toEntry(row: Row): LedgerEntry {
    const { identifier, applied_at: appliedAt, checksum } = row;

    if (typeof identifier !== 'string' || typeof appliedAt !== 'string' || typeof checksum !== 'string') {
      throw new LedgerError(`Corrupt row in ${this.tableName}: ${JSON.stringify(row)}`);
    }

    const appliedAtDate = new Date(appliedAt);
    if (Number.isNaN(appliedAtDate.getTime())) {
      throw new LedgerError(`Corrupt applied_at for ${identifier}: ${appliedAt}`);
    }

    return { identifier, appliedAt: appliedAtDate, checksum };
  }
}
