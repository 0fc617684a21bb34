/**
 * Migration system types and interfaces
 */

import { DatabaseConnection } from '../types';
import { Logger } from '../../utils/logger';

export interface MigrationUnit {
  /** Timestamp-prefixed slug, e.g. '20241001_000001_create_initial_schema'. Sort order is apply order. */
  identifier: string;
  description?: string;
  apply: (connection: DatabaseConnection) => Promise<void>;
  /** Exact structural inverse of `apply` */
  revert: (connection: DatabaseConnection) => Promise<void>;
  /**
   * Values `apply` or `revert` read from outside their own bodies, such as
   * seed rows or a table name passed to a factory. Must be JSON-serializable;
   * it is part of the checksum alongside the function sources.
   */
  fingerprint?: unknown;
}

export interface LedgerEntry {
  identifier: string;
  appliedAt: Date;
  checksum: string;
}

export type MigrationState = 'applied' | 'pending';

export interface MigrationStatusEntry {
  identifier: string;
  state: MigrationState;
  description?: string;
  appliedAt?: Date;
  /** Applied unit whose source no longer matches the recorded checksum */
  modified: boolean;
  /** Ledger entry with no unit in the repository */
  missing: boolean;
}

export interface MigrateResult {
  applied: string[];
}

export interface RollbackResult {
  reverted: string[];
}

export type Clock = () => Date;

export interface MigrationConfig {
  tableName?: string;
  clock?: Clock;
  logger?: Logger;
}
