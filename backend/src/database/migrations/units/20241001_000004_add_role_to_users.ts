/**
 * Migration: Add role column to users table
 */

import { MigrationUnit } from '../types';
import { DatabaseConnection } from '../../types';

export const addRoleToUsersMigration: MigrationUnit = {
  identifier: '20241001_000004_add_role_to_users',
  description: "Moderator accounts; everyone else stays 'user'",

  async apply(connection: DatabaseConnection): Promise<void> {
    await connection.execute("ALTER TABLE users ADD COLUMN role TEXT DEFAULT 'user'");
  },

  async revert(connection: DatabaseConnection): Promise<void> {
    await connection.execute('ALTER TABLE users DROP COLUMN role');
  }
};
