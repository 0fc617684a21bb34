/**
 * Migration: Create payments table for paid listing placement
 */

import { MigrationUnit } from '../types';
import { DatabaseConnection } from '../../types';

export const createPaymentsTableMigration: MigrationUnit = {
  identifier: '20241001_000005_create_payments_table',
  description: 'Payment receipts submitted for advertisements',

  async apply(connection: DatabaseConnection): Promise<void> {
    await connection.execute(`
      CREATE TABLE payments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        advertisement_id INTEGER NOT NULL REFERENCES advertisements(id) ON DELETE CASCADE,
        amount INTEGER NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'submitted', 'approved', 'rejected')),
        receipt_path TEXT,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await connection.execute('CREATE INDEX idx_payments_advertisement_id ON payments(advertisement_id)');
  },

  async revert(connection: DatabaseConnection): Promise<void> {
    await connection.execute('DROP INDEX IF EXISTS idx_payments_advertisement_id');
    await connection.execute('DROP TABLE IF EXISTS payments');
  }
};
