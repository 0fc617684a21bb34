/**
 * Database and migration configuration
 */

import * as path from 'path';
import { DatabaseConfig } from '../database/types';
import { isLogLevel, LogLevel } from '../utils/logger';

export interface MigrationSettings {
  database: DatabaseConfig;
  tableName: string;
  /** Where `migrate create` writes new units */
  migrationsDir: string;
  /** Source directory of the database module; scaffolded units import from it */
  databaseSourceDir: string;
  logLevel: LogLevel;
}

export const DEFAULT_DATABASE_PATH = './data/marketplace.db';
export const DATABASE_SOURCE_DIR = path.join('backend', 'src', 'database');
export const DEFAULT_MIGRATIONS_DIR = path.join('backend', 'src', 'database', 'migrations', 'units');

type Env = Record<string, string | undefined>;

/**
 * Read settings from the environment. Call dotenv.config() first to pick up .env.
 */
export function getMigrationSettings(env: Env = process.env): MigrationSettings {
  const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();

  return {
    database: {
      filename: env.DATABASE_PATH || DEFAULT_DATABASE_PATH
    },
    tableName: env.MIGRATIONS_TABLE || 'schema_migrations',
    migrationsDir: path.resolve(env.MIGRATIONS_DIR || DEFAULT_MIGRATIONS_DIR),
    databaseSourceDir: path.resolve(DATABASE_SOURCE_DIR),
    // Unknown values are reported by the validator, not guessed at
    logLevel: isLogLevel(logLevel) ? logLevel : 'info'
  };
}

export class MigrationSettingsValidator {
  static validate(settings: MigrationSettings, env: Env = process.env): string[] {
    const errors: string[] = [];

    if (!settings.database.filename.trim()) {
      errors.push('DATABASE_PATH must not be empty');
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(settings.tableName)) {
      errors.push(`MIGRATIONS_TABLE must be a plain SQL identifier, got "${settings.tableName}"`);
    }

    if (env.LOG_LEVEL && !isLogLevel(env.LOG_LEVEL.toLowerCase())) {
      errors.push(`LOG_LEVEL must be one of debug, info, warn, error, silent, got "${env.LOG_LEVEL}"`);
    }

    return errors;
  }
}
