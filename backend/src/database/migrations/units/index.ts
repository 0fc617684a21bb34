/**
 * Registered migration units. New units created with `migrate create` must be
 * added here.
 */

import { MigrationUnit } from '../types';
import { createInitialSchemaMigration } from './20241001_000001_create_initial_schema';
import { addFirstNameToUsersMigration } from './20241001_000002_add_first_name_to_users';
import { addCityAndContactPhoneToAdvertisementsMigration } from './20241001_000003_add_city_and_contact_phone_to_advertisements';
import { addRoleToUsersMigration } from './20241001_000004_add_role_to_users';
import { createPaymentsTableMigration } from './20241001_000005_create_payments_table';

export const allMigrations: MigrationUnit[] = [
  createInitialSchemaMigration,
  addFirstNameToUsersMigration,
  addCityAndContactPhoneToAdvertisementsMigration,
  addRoleToUsersMigration,
  createPaymentsTableMigration
];
