/**
 * Migration: Create the marketplace baseline schema and seed catalogue
 */

import { MigrationUnit } from '../types';
import { DatabaseConnection } from '../../types';

const CATEGORIES: Array<[nameRu: string, nameUz: string, nameEn: string]> = [
  ['Смартфоны', 'Smartfonlar', 'smartphones'],
  ['Планшеты', 'Planshetlar', 'tablets'],
  ['Ноутбуки', 'Noutbuklar', 'laptops'],
  ['Наушники', 'Quloqchinlar', 'headphones'],
  ['Часы', 'Soatlar', 'watches']
];

// Keyed by position in CATEGORIES, 1-based to match the generated ids
const BRANDS: Array<[name: string, categoryId: number]> = [
  ['Apple', 1], ['Samsung', 1], ['Xiaomi', 1], ['Huawei', 1],
  ['Apple', 2], ['Samsung', 2], ['Lenovo', 2],
  ['Apple', 3], ['Dell', 3], ['HP', 3], ['Lenovo', 3],
  ['Apple', 4], ['Sony', 4], ['JBL', 4], ['Bose', 4],
  ['Apple', 5], ['Samsung', 5], ['Garmin', 5], ['Fitbit', 5]
];

export const createInitialSchemaMigration: MigrationUnit = {
  identifier: '20241001_000001_create_initial_schema',
  description: 'Create categories, brands, users, advertisements and favorites',
  fingerprint: { categories: CATEGORIES, brands: BRANDS },

  async apply(connection: DatabaseConnection): Promise<void> {
    await connection.execute(`
      CREATE TABLE categories (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name_ru TEXT NOT NULL,
        name_uz TEXT NOT NULL,
        name_en TEXT NOT NULL,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await connection.execute(`
      CREATE TABLE brands (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await connection.execute(`
      CREATE TABLE users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        telegram_id INTEGER NOT NULL UNIQUE,
        username TEXT,
        language TEXT DEFAULT 'ru',
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await connection.execute(`
      CREATE TABLE advertisements (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
        brand_id INTEGER NOT NULL REFERENCES brands(id) ON DELETE CASCADE,
        model TEXT NOT NULL,
        price INTEGER NOT NULL,
        description TEXT NOT NULL,
        phone TEXT NOT NULL,
        photo_path TEXT,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'approved', 'rejected')),
        rejection_reason TEXT,
        moderated_at DATETIME,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await connection.execute(`
      CREATE TABLE favorites (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        advertisement_id INTEGER NOT NULL REFERENCES advertisements(id) ON DELETE CASCADE,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (user_id, advertisement_id)
      )
    `);

    for (const [nameRu, nameUz, nameEn] of CATEGORIES) {
      await connection.execute(
        'INSERT INTO categories (name_ru, name_uz, name_en) VALUES (?, ?, ?)',
        [nameRu, nameUz, nameEn]
      );
    }

    for (const [name, categoryId] of BRANDS) {
      await connection.execute('INSERT INTO brands (name, category_id) VALUES (?, ?)', [name, categoryId]);
    }
  },

  async revert(connection: DatabaseConnection): Promise<void> {
    // Dependents first, foreign keys are enforced
    await connection.execute('DROP TABLE IF EXISTS favorites');
    await connection.execute('DROP TABLE IF EXISTS advertisements');
    await connection.execute('DROP TABLE IF EXISTS brands');
    await connection.execute('DROP TABLE IF EXISTS categories');
    await connection.execute('DROP TABLE IF EXISTS users');
  }
};
