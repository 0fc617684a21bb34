/**
 * Migration: Add city and contact_phone columns to advertisements table
 */

import { MigrationUnit } from '../types';
import { DatabaseConnection } from '../../types';

export const addCityAndContactPhoneToAdvertisementsMigration: MigrationUnit = {
  identifier: '20241001_000003_add_city_and_contact_phone_to_advertisements',
  description: 'Location and contact number shown on listings',

  async apply(connection: DatabaseConnection): Promise<void> {
    await connection.execute("ALTER TABLE advertisements ADD COLUMN city TEXT NOT NULL DEFAULT 'Unknown'");
    await connection.execute("ALTER TABLE advertisements ADD COLUMN contact_phone TEXT NOT NULL DEFAULT ''");
  },

  async revert(connection: DatabaseConnection): Promise<void> {
    await connection.execute('ALTER TABLE advertisements DROP COLUMN contact_phone');
    await connection.execute('ALTER TABLE advertisements DROP COLUMN city');
  }
};
