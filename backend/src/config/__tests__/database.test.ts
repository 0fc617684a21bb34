/**
 * Unit tests for migration configuration
 */

import * as path from 'path';
import {
  DATABASE_SOURCE_DIR,
  DEFAULT_DATABASE_PATH,
  DEFAULT_MIGRATIONS_DIR,
  getMigrationSettings,
  MigrationSettingsValidator
} from '../database';

describe('getMigrationSettings', () => {
  it('should fall back to defaults', () => {
    const settings = getMigrationSettings({});

    expect(settings).toEqual({
      database: { filename: DEFAULT_DATABASE_PATH },
      tableName: 'schema_migrations',
      migrationsDir: path.resolve(DEFAULT_MIGRATIONS_DIR),
      databaseSourceDir: path.resolve(DATABASE_SOURCE_DIR),
      logLevel: 'info'
    });
  });

  it('should read overrides from the environment', () => {
    const settings = getMigrationSettings({
      DATABASE_PATH: '/var/lib/marketplace/bot.db',
      MIGRATIONS_TABLE: 'bot_migrations',
      MIGRATIONS_DIR: '/srv/migrations',
      LOG_LEVEL: 'DEBUG'
    });

    expect(settings).toEqual({
      database: { filename: '/var/lib/marketplace/bot.db' },
      tableName: 'bot_migrations',
      migrationsDir: '/srv/migrations',
      databaseSourceDir: path.resolve(DATABASE_SOURCE_DIR),
      logLevel: 'debug'
    });
  });
});

describe('MigrationSettingsValidator', () => {
  it('should accept the defaults', () => {
    expect(MigrationSettingsValidator.validate(getMigrationSettings({}), {})).toEqual([]);
  });

  it('should report every problem', () => {
    const env = { DATABASE_PATH: ' ', MIGRATIONS_TABLE: 'bad-name', LOG_LEVEL: 'verbose' };

    expect(MigrationSettingsValidator.validate(getMigrationSettings(env), env)).toEqual([
      'DATABASE_PATH must not be empty',
      'MIGRATIONS_TABLE must be a plain SQL identifier, got "bad-name"',
      'LOG_LEVEL must be one of debug, info, warn, error, silent, got "verbose"'
    ]);
  });
});
