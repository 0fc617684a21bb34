/**
 * Migration: Add first_name column to users table
 */

import { MigrationUnit } from '../types';
import { DatabaseConnection } from '../../types';

export const addFirstNameToUsersMigration: MigrationUnit = {
  identifier: '20241001_000002_add_first_name_to_users',

  async apply(connection: DatabaseConnection): Promise<void> {
    await connection.execute("ALTER TABLE users ADD COLUMN first_name TEXT DEFAULT 'Unknown'");
  },

  async revert(connection: DatabaseConnection): Promise<void> {
    await connection.execute('ALTER TABLE users DROP COLUMN first_name');
  }
};
