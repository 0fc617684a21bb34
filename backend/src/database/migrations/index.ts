/**
 * Database migrations index
 */

export * from './types';
export * from './errors';
export { calculateChecksum } from './checksum';
export { MigrationRepository, IDENTIFIER_PATTERN, compareIdentifiers } from './MigrationRepository';
export { MigrationLedger, DEFAULT_LEDGER_TABLE } from './MigrationLedger';
export { MigrationRunner } from './MigrationRunner';
export { MigrationScaffolder, sanitizeSlug, formatTimestamp } from './MigrationScaffolder';
export type { ScaffoldOptions, ScaffoldResult } from './MigrationScaffolder';
export { allMigrations } from './units';
