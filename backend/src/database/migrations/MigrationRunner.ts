/**
 * Database migration runner
 */

import { DatabaseConnection } from '../types';
import { withTransaction } from '../transaction';
import { createLogger, Logger } from '../../utils/logger';
import { calculateChecksum } from './checksum';
import {
  MigrationApplyError,
  MigrationIntegrityError,
  MigrationRevertError,
  UnresolvableRevertError
} from './errors';
import { MigrationLedger } from './MigrationLedger';
import { compareIdentifiers, MigrationRepository } from './MigrationRepository';
import {
  Clock,
  LedgerEntry,
  MigrateResult,
  MigrationConfig,
  MigrationStatusEntry,
  MigrationUnit,
  RollbackResult
} from './types';

export class MigrationRunner {
  private connection: DatabaseConnection;
  private repository: MigrationRepository;
  private ledger: MigrationLedger;
  private clock: Clock;
  private logger: Logger;

  constructor(connection: DatabaseConnection, repository: MigrationRepository, config: MigrationConfig = {}) {
    this.connection = connection;
    this.repository = repository;
    this.ledger = new MigrationLedger(config.tableName);
    this.clock = config.clock ?? (() => new Date());
    this.logger = config.logger ?? createLogger('info');
  }

  /**
   * Apply every pending migration in identifier order, one transaction per
   * migration. Stops at the first failure; migrations committed before it stay
   * applied.
   */
  async migrate(): Promise<MigrateResult> {
    await this.ledger.ensureSchema(this.connection);

    const entries = await this.ledger.entries(this.connection);
    this.verifyIntegrity(entries);

    const pending = this.pendingUnits(entries);
    if (pending.length === 0) {
      this.logger.info('No pending migrations');
      return { applied: [] };
    }

    this.logger.info(`Running ${pending.length} pending migrations...`);

    const applied: string[] = [];
    for (const unit of pending) {
      this.logger.info(`Running migration: ${unit.identifier}`);

      try {
        await withTransaction(this.connection, async (connection) => {
          await unit.apply(connection);
          await this.ledger.recordApplied(connection, unit.identifier, this.clock(), calculateChecksum(unit));
        });
      } catch (error) {
        const failure = new MigrationApplyError(unit.identifier, error, [...applied]);
        this.logger.error(failure.message);
        throw failure;
      }

      applied.push(unit.identifier);
      this.logger.info(`Migration ${unit.identifier} executed successfully`);
    }

    this.logger.info('All migrations completed successfully');
    return { applied };
  }

  /**
   * Revert the `count` most recently applied migrations, newest first.
   */
  async rollback(count: number = 1): Promise<RollbackResult> {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Rollback count must be a positive integer, got ${count}`);
    }

    await this.ledger.ensureSchema(this.connection);

    const targets = await this.ledger.latest(this.connection, count);
    if (targets.length === 0) {
      this.logger.info('No migrations to rollback');
      return { reverted: [] };
    }

    this.logger.info(`Rolling back ${targets.length} migrations`);

    const reverted: string[] = [];
    for (const entry of targets) {
      const unit = this.repository.get(entry.identifier);
      if (!unit) {
        const failure = new UnresolvableRevertError(entry.identifier, [...reverted]);
        this.logger.error(failure.message);
        throw failure;
      }
      if (calculateChecksum(unit) !== entry.checksum) {
        const failure = new MigrationIntegrityError(entry.identifier, [...reverted]);
        this.logger.error(failure.message);
        throw failure;
      }

      this.logger.info(`Rolling back migration: ${unit.identifier}`);

      try {
        await withTransaction(this.connection, async (connection) => {
          await unit.revert(connection);
          await this.ledger.recordReverted(connection, unit.identifier);
        });
      } catch (error) {
        const failure = new MigrationRevertError(unit.identifier, error, [...reverted]);
        this.logger.error(failure.message);
        throw failure;
      }

      reverted.push(unit.identifier);
      this.logger.info(`Migration ${unit.identifier} rolled back successfully`);
    }

    return { reverted };
  }

  /**
   * Applied and pending migrations in identifier order. Does not create the
   * ledger table.
   */
  async status(): Promise<MigrationStatusEntry[]> {
    const entries = (await this.ledger.exists(this.connection))
      ? await this.ledger.entries(this.connection)
      : [];
    const entriesById = new Map(entries.map(entry => [entry.identifier, entry]));

    const report = this.repository.list().map((unit): MigrationStatusEntry => {
      const entry = entriesById.get(unit.identifier);
      if (!entry) {
        return {
          identifier: unit.identifier,
          state: 'pending',
          description: unit.description,
          modified: false,
          missing: false
        };
      }

      return {
        identifier: unit.identifier,
        state: 'applied',
        description: unit.description,
        appliedAt: entry.appliedAt,
        modified: calculateChecksum(unit) !== entry.checksum,
        missing: false
      };
    });

    for (const entry of entries) {
      if (!this.repository.has(entry.identifier)) {
        report.push({
          identifier: entry.identifier,
          state: 'applied',
          appliedAt: entry.appliedAt,
          modified: false,
          missing: true
        });
      }
    }

    return report.sort((a, b) => compareIdentifiers(a.identifier, b.identifier));
  }

  private pendingUnits(entries: LedgerEntry[]): MigrationUnit[] {
    const applied = new Set(entries.map(entry => entry.identifier));
    const latestApplied = entries
      .map(entry => entry.identifier)
      .reduce<string | undefined>((max, id) => (max === undefined || compareIdentifiers(id, max) > 0 ? id : max), undefined);

    const pending = this.repository.list().filter(unit => !applied.has(unit.identifier));
    for (const unit of pending) {
      if (latestApplied !== undefined && compareIdentifiers(unit.identifier, latestApplied) < 0) {
        this.logger.warn(`Migration ${unit.identifier} is older than the latest applied migration ${latestApplied}`);
      }
    }
    return pending;
  }

  private verifyIntegrity(entries: LedgerEntry[]): void {
    for (const entry of entries) {
      const unit = this.repository.get(entry.identifier);
      if (!unit) {
        this.logger.warn(`Migration ${entry.identifier} is recorded as applied but not registered`);
        continue;
      }
      if (calculateChecksum(unit) !== entry.checksum) {
        const failure = new MigrationIntegrityError(entry.identifier);
        this.logger.error(failure.message);
        throw failure;
      }
    }
  }
}
