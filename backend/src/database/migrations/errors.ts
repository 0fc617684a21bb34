/**
 * Migration error taxonomy
 */

import { errorMessage } from '../transaction';

export class MigrationError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'MigrationError';
  }
}

/** Malformed or duplicate units, raised before any database access */
export class DiscoveryError extends MigrationError {
  constructor(message: string) {
    super(message);
    this.name = 'DiscoveryError';
  }
}

export class LedgerError extends MigrationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'LedgerError';
  }
}

export class MigrationIntegrityError extends MigrationError {
  constructor(public readonly identifier: string, public readonly completed: string[] = []) {
    super(`Migration ${identifier} was modified after it was applied`);
    this.name = 'MigrationIntegrityError';
  }
}

export class MigrationApplyError extends MigrationError {
  constructor(
    public readonly identifier: string,
    cause: unknown,
    public readonly completed: string[] = []
  ) {
    super(`Failed to apply migration ${identifier}: ${errorMessage(cause)}`, cause);
    this.name = 'MigrationApplyError';
  }
}

export class MigrationRevertError extends MigrationError {
  constructor(
    public readonly identifier: string,
    cause: unknown,
    public readonly completed: string[] = []
  ) {
    super(`Failed to revert migration ${identifier}: ${errorMessage(cause)}`, cause);
    this.name = 'MigrationRevertError';
  }
}

export class UnresolvableRevertError extends MigrationError {
  constructor(public readonly identifier: string, public readonly completed: string[] = []) {
    super(`Cannot revert migration ${identifier}: it is recorded as applied but not registered`);
    this.name = 'UnresolvableRevertError';
  }
}

export class DuplicateIdentifierError extends MigrationError {
  constructor(public readonly identifier: string) {
    super(`Migration ${identifier} already exists, retry in a second`);
    this.name = 'DuplicateIdentifierError';
  }
}

export class InvalidSlugError extends MigrationError {
  constructor(public readonly slug: string) {
    super(`Invalid migration name "${slug}": use letters, digits and underscores`);
    this.name = 'InvalidSlugError';
  }
}
