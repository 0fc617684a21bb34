/**
 * Generates empty, correctly named migration unit files
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger, Logger } from '../../utils/logger';
import { DuplicateIdentifierError, InvalidSlugError } from './errors';
import { MigrationRepository } from './MigrationRepository';
import { Clock } from './types';

export interface ScaffoldOptions {
  directory: string;
  /**
   * Directory holding `types.ts` and `migrations/types.ts`, used to write the
   * new unit's imports. Defaults to two levels above `directory`.
   */
  databaseDir?: string;
  /** Registered units; their identifiers count as taken */
  repository?: MigrationRepository;
  clock?: Clock;
  logger?: Logger;
}

export interface ScaffoldResult {
  identifier: string;
  filePath: string;
  exportName: string;
}

export class MigrationScaffolder {
  private directory: string;
  private databaseDir: string;
  private repository?: MigrationRepository;
  private clock: Clock;
  private logger: Logger;

  constructor(options: ScaffoldOptions) {
    this.directory = options.directory;
    this.databaseDir = options.databaseDir ?? path.resolve(options.directory, '..', '..');
    this.repository = options.repository;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('info');
  }

  async create(name: string): Promise<ScaffoldResult> {
    const slug = sanitizeSlug(name);
    if (!slug) {
      throw new InvalidSlugError(name);
    }

    const now = this.clock();
    const identifier = `${formatTimestamp(now)}_${slug}`;
    const filePath = path.join(this.directory, `${identifier}.ts`);

    if (this.repository?.has(identifier)) {
      throw new DuplicateIdentifierError(identifier);
    }

    const exportName = toExportName(slug);
    const imports: TemplateImports = {
      unitTypes: importPath(this.directory, path.join(this.databaseDir, 'migrations', 'types')),
      connectionTypes: importPath(this.directory, path.join(this.databaseDir, 'types'))
    };
    await fs.mkdir(this.directory, { recursive: true });

    try {
      // 'wx': never overwrite a unit created within the same second
      await fs.writeFile(filePath, renderTemplate(identifier, exportName, slug, now, imports), { flag: 'wx' });
    } catch (error) {
      if (isFileExistsError(error)) {
        throw new DuplicateIdentifierError(identifier);
      }
      throw error;
    }

    this.logger.info(`Migration created: ${filePath}`);
    return { identifier, filePath, exportName };
  }
}

export function sanitizeSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/** YYYYMMDD_HHMMSS in UTC */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function toExportName(slug: string): string {
  const camel = slug.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
  const name = `${camel}Migration`;
  // Identifiers cannot start with a digit
  return /^[0-9]/.test(name) ? `m${name}` : name;
}

interface TemplateImports {
  unitTypes: string;
  connectionTypes: string;
}

/** Relative module specifier from a directory to a module path, without extension */
export function importPath(fromDir: string, modulePath: string): string {
  const relative = path.relative(path.resolve(fromDir), path.resolve(modulePath)).split(path.sep).join('/');
  return relative.startsWith('../') ? relative : `./${relative}`;
}

function renderTemplate(
  identifier: string,
  exportName: string,
  slug: string,
  createdAt: Date,
  imports: TemplateImports
): string {
  return `/**
 * Migration: ${slug}
 * Created: ${createdAt.toISOString()}
 */

import { MigrationUnit } from '${imports.unitTypes}';
import { DatabaseConnection } from '${imports.connectionTypes}';

export const ${exportName}: MigrationUnit = {
  identifier: '${identifier}',

  async apply(connection: DatabaseConnection): Promise<void> {
    // await connection.execute('CREATE TABLE example (id INTEGER PRIMARY KEY)');
  },

  async revert(connection: DatabaseConnection): Promise<void> {
    // await connection.execute('DROP TABLE example');
  }
};
`;
}

function isFileExistsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
