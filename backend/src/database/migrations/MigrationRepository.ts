/**
 * In-memory registry of migration units, validated once at construction
 */

import { DiscoveryError } from './errors';
import { MigrationUnit } from './types';

/** YYYYMMDD, optional _HHMMSS, then a lowercase snake_case slug */
export const IDENTIFIER_PATTERN = /^\d{8}(?:_\d{6})?_[a-z0-9]+(?:_[a-z0-9]+)*$/;

export class MigrationRepository {
  private readonly units: MigrationUnit[];
  private readonly byIdentifier: Map<string, MigrationUnit>;

  constructor(units: readonly MigrationUnit[]) {
    this.byIdentifier = new Map();

    for (const unit of units) {
      validateUnit(unit);
      if (this.byIdentifier.has(unit.identifier)) {
        throw new DiscoveryError(`Duplicate migration identifier: ${unit.identifier}`);
      }
      this.byIdentifier.set(unit.identifier, unit);
    }

    this.units = Array.from(this.byIdentifier.values()).sort((a, b) =>
      compareIdentifiers(a.identifier, b.identifier)
    );
  }

  /**
   * All units in apply order
   */
  list(): MigrationUnit[] {
    return [...this.units];
  }

  get(identifier: string): MigrationUnit | undefined {
    return this.byIdentifier.get(identifier);
  }

  has(identifier: string): boolean {
    return this.byIdentifier.has(identifier);
  }

  get size(): number {
    return this.units.length;
  }
}

/**
 * Plain code-unit comparison. localeCompare would let the runtime locale
 * decide where '_' sorts relative to digits.
 */
export function compareIdentifiers(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function validateUnit(unit: MigrationUnit): void {
  // Units may come from plain JS modules, so the shape is checked at runtime too.
  const candidate: Partial<Record<keyof MigrationUnit, unknown>> = unit;

  if (typeof candidate.identifier !== 'string' || !IDENTIFIER_PATTERN.test(candidate.identifier)) {
    throw new DiscoveryError(`Malformed migration identifier: ${String(candidate.identifier)}`);
  }
  if (typeof candidate.apply !== 'function') {
    throw new DiscoveryError(`Migration ${candidate.identifier} has no apply function`);
  }
  if (typeof candidate.revert !== 'function') {
    throw new DiscoveryError(`Migration ${candidate.identifier} has no revert function`);
  }
}
