#!/usr/bin/env node

/**
 * Database migration CLI
 *
 * Usage:
 *   migrate migrate           Run all pending migrations
 *   migrate rollback [count]  Revert the last `count` migrations (default 1)
 *   migrate status            Show applied and pending migrations
 *   migrate create <name>     Create a new, empty migration unit
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs/promises';
import * as path from 'path';
import { getMigrationSettings, MigrationSettings, MigrationSettingsValidator } from '../config/database';
import { openSqliteConnection } from '../database/adapters/SqliteAdapter';
import { DatabaseConnection } from '../database/types';
import {
  allMigrations,
  Clock,
  MigrationRepository,
  MigrationRunner,
  MigrationScaffolder,
  MigrationStatusEntry
} from '../database/migrations';
import { createLogger, Logger } from '../utils/logger';

export const USAGE = [
  'Usage:',
  '  migrate migrate           Run all pending migrations',
  '  migrate rollback [count]  Revert the last `count` migrations (default 1)',
  '  migrate status            Show applied and pending migrations',
  '  migrate create <name>     Create a new, empty migration unit'
].join('\n');

export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

export interface CliContext {
  /** Opened on first use; `create` never touches the database */
  connect: () => Promise<DatabaseConnection>;
  repository: MigrationRepository;
  settings: MigrationSettings;
  logger: Logger;
  output: CliOutput;
  clock?: Clock;
}

/**
 * Run one CLI command and return the process exit code.
 */
export async function runCli(args: string[], context: CliContext): Promise<number> {
  const [command, argument] = args;
  const { output } = context;

  try {
    switch (command) {
      case 'migrate': {
        const runner = await createRunner(context);
        const { applied } = await runner.migrate();
        if (applied.length === 0) {
          output.log('Nothing to migrate');
        }
        applied.forEach(identifier => output.log(`Applied: ${identifier}`));
        return 0;
      }

      case 'rollback': {
        const count = argument === undefined ? 1 : parseCount(argument);
        if (count === undefined) {
          output.error(`Invalid rollback count: ${argument}`);
          output.error(USAGE);
          return 1;
        }

        const runner = await createRunner(context);
        const { reverted } = await runner.rollback(count);
        if (reverted.length === 0) {
          output.log('Nothing to rollback');
        }
        reverted.forEach(identifier => output.log(`Reverted: ${identifier}`));
        return 0;
      }

      case 'status': {
        const runner = await createRunner(context);
        printStatus(await runner.status(), output);
        return 0;
      }

      case 'create': {
        if (!argument) {
          output.error('Usage: migrate create <name>');
          return 1;
        }

        const scaffolder = new MigrationScaffolder({
          directory: context.settings.migrationsDir,
          databaseDir: context.settings.databaseSourceDir,
          repository: context.repository,
          clock: context.clock,
          logger: context.logger
        });
        const created = await scaffolder.create(argument);
        output.log(`Created migration: ${created.identifier}`);
        output.log(`File: ${created.filePath}`);
        output.log(`Register ${created.exportName} in ${path.join(context.settings.migrationsDir, 'index.ts')}`);
        return 0;
      }

      default:
        if (command !== undefined) {
          output.error(`Unknown command: ${command}`);
        }
        output.error(USAGE);
        return 1;
    }
  } catch (error) {
    output.error(formatError(error));
    return 1;
  }
}

async function createRunner(context: CliContext): Promise<MigrationRunner> {
  return new MigrationRunner(await context.connect(), context.repository, {
    tableName: context.settings.tableName,
    clock: context.clock,
    logger: context.logger
  });
}

function parseCount(value: string): number | undefined {
  if (!/^\d+$/.test(value)) {
    return undefined;
  }
  const count = parseInt(value, 10);
  return count > 0 ? count : undefined;
}

export function printStatus(entries: MigrationStatusEntry[], output: CliOutput): void {
  const applied = entries.filter(entry => entry.state === 'applied');
  const pending = entries.filter(entry => entry.state === 'pending');

  output.log('=== Migration Status ===');
  for (const entry of entries) {
    const columns: string[] = [entry.state.padEnd(7), entry.identifier];
    if (entry.appliedAt) {
      columns.push(entry.appliedAt.toISOString());
    }
    if (entry.modified) {
      columns.push('[modified]');
    }
    if (entry.missing) {
      columns.push('[missing]');
    }
    output.log(columns.join('  '));
  }

  output.log(`Total available: ${entries.filter(entry => !entry.missing).length}`);
  output.log(`Total applied: ${applied.length}`);
  output.log(`Total pending: ${pending.length}`);
}

export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return `Migration command failed: ${String(error)}`;
  }
  return `${error.name}: ${error.message}`;
}

async function main(): Promise<number> {
  dotenv.config();

  const settings = getMigrationSettings();
  const problems = MigrationSettingsValidator.validate(settings);
  if (problems.length > 0) {
    problems.forEach(problem => console.error(problem));
    return 1;
  }

  const logger = createLogger(settings.logLevel);
  const opened: { connection?: DatabaseConnection } = {};

  const context: CliContext = {
    connect: async () => {
      opened.connection ??= await openDatabase(settings);
      return opened.connection;
    },
    repository: new MigrationRepository(allMigrations),
    settings,
    logger,
    output: console
  };

  try {
    return await runCli(process.argv.slice(2), context);
  } finally {
    await opened.connection?.close();
  }
}

async function openDatabase(settings: MigrationSettings): Promise<DatabaseConnection> {
  if (settings.database.filename !== ':memory:') {
    await fs.mkdir(path.dirname(path.resolve(settings.database.filename)), { recursive: true });
  }
  return openSqliteConnection(settings.database);
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(formatError(error));
      process.exitCode = 1;
    });
}
