/**
 * Tests for the migration unit registry
 */

import { DiscoveryError } from '../migrations/errors';
import { compareIdentifiers, MigrationRepository } from '../migrations/MigrationRepository';
import { allMigrations } from '../migrations/units';
import { createTableUnit } from './helpers';

describe('MigrationRepository', () => {
  it('should list units in identifier order regardless of registration order', () => {
    const repository = new MigrationRepository([
      createTableUnit('20240103_000000_create_gamma', 'gamma'),
      createTableUnit('20240101_000000_create_alpha', 'alpha'),
      createTableUnit('20240102_000000_create_beta', 'beta')
    ]);

    expect(repository.list().map(unit => unit.identifier)).toEqual([
      '20240101_000000_create_alpha',
      '20240102_000000_create_beta',
      '20240103_000000_create_gamma'
    ]);
    expect(repository.size).toBe(3);
  });

  it('should return a copy from list()', () => {
    const repository = new MigrationRepository([createTableUnit('20240101_create_users', 'users')]);

    repository.list().pop();

    expect(repository.list()).toHaveLength(1);
  });

  it('should look units up by identifier', () => {
    const unit = createTableUnit('20240101_create_users', 'users');
    const repository = new MigrationRepository([unit]);

    expect(repository.get('20240101_create_users')).toBe(unit);
    expect(repository.has('20240101_create_users')).toBe(true);
    expect(repository.get('20240102_add_first_name')).toBeUndefined();
    expect(repository.has('20240102_add_first_name')).toBe(false);
  });

  it('should reject duplicate identifiers', () => {
    expect(() => new MigrationRepository([
      createTableUnit('20240101_create_users', 'users'),
      createTableUnit('20240101_create_users', 'accounts')
    ])).toThrow(new DiscoveryError('Duplicate migration identifier: 20240101_create_users'));
  });

  it.each([
    'create_users',
    '2024_create_users',
    '20240101_CreateUsers',
    '20240101_create-users',
    '20240101_'
  ])('should reject malformed identifier %s', (identifier) => {
    expect(() => new MigrationRepository([createTableUnit(identifier, 'users')])).toThrow(DiscoveryError);
  });

  it('should reject a unit without a revert function', () => {
    const unit = createTableUnit('20240101_create_users', 'users');
    Reflect.deleteProperty(unit, 'revert');

    expect(() => new MigrationRepository([unit])).toThrow(
      'Migration 20240101_create_users has no revert function'
    );
  });

  it('should reject a unit without an apply function', () => {
    const unit = createTableUnit('20240101_create_users', 'users');
    Reflect.deleteProperty(unit, 'apply');

    expect(() => new MigrationRepository([unit])).toThrow(
      'Migration 20240101_create_users has no apply function'
    );
  });

  it('should accept the registered baseline units', () => {
    const repository = new MigrationRepository(allMigrations);

    expect(repository.list().map(unit => unit.identifier)).toEqual([
      '20241001_000001_create_initial_schema',
      '20241001_000002_add_first_name_to_users',
      '20241001_000003_add_city_and_contact_phone_to_advertisements',
      '20241001_000004_add_role_to_users',
      '20241001_000005_create_payments_table'
    ]);
  });

  describe('compareIdentifiers', () => {
    it('should compare by code unit, not locale', () => {
      expect(compareIdentifiers('20240101_000001_b', '20240101_000002_a')).toBe(-1);
      expect(compareIdentifiers('20240101_b', '20240101_a')).toBe(1);
      expect(compareIdentifiers('20240101_a', '20240101_a')).toBe(0);
    });
  });
});
