import { createHash } from 'crypto';
import { MigrationUnit } from './types';

/**
 * Hash of a unit's apply and revert source plus its declared fingerprint.
 * Whitespace runs are collapsed so re-indenting a file does not count as a
 * change.
 */
export function calculateChecksum(unit: MigrationUnit): string {
  const parts = [unit.identifier, unit.apply.toString(), unit.revert.toString()];
  if (unit.fingerprint !== undefined) {
    parts.push(JSON.stringify(unit.fingerprint));
  }

  const content = parts
    .map(part => part.replace(/\s+/g, ' ').trim())
    .join('\n');
  return createHash('sha256').update(content).digest('hex');
}
