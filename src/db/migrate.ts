import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { StoreError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';
import { storeErrorFrom } from './db.js';

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

export interface MigrationResult {
  from: number;
  to: number;
  applied: string[];
}

const MIGRATION_FILE = /^(\d+)_[\w-]+\.sql$/;

/**
 * Read `NNN_name.sql` files from the migrations directory, ordered by version.
 */
export function loadMigrations(dir = path.join(getPackageRoot(), 'src', 'db', 'migrations')): Migration[] {
  let files: string[];
  try {
    files = fs.readdirSync(dir);
  } catch (err) {
    throw new StoreError(`Cannot read store migrations in ${dir}: ${errorMessage(err)}`, 'unavailable', { dir });
  }

  return files
    .flatMap((name) => {
      const match = MIGRATION_FILE.exec(name);
      if (!match?.[1]) return [];
      return [{ version: Number(match[1]), name, sql: fs.readFileSync(path.join(dir, name), 'utf-8') }];
    })
    .sort((a, b) => a.version - b.version);
}

function schemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Bring the seen store schema up to the newest migration. The schema version
 * is SQLite's `user_version`, bumped in the same transaction as each
 * migration. A file from a newer release is refused as corrupt.
 */
export function migrateStore(db: Database.Database, migrations: Migration[] = loadMigrations()): MigrationResult {
  const latest = migrations.at(-1)?.version ?? 0;

  let from: number;
  try {
    from = schemaVersion(db);
  } catch (err) {
    throw storeErrorFrom('Cannot read seen store version', err);
  }
  if (from > latest) {
    throw new StoreError(`Seen store version ${from} is newer than this release supports (${latest})`, 'corrupt', {
      version: from,
      supported: latest,
    });
  }

  const applied: string[] = [];
  for (const migration of migrations) {
    if (migration.version <= from) continue;
    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.pragma(`user_version = ${migration.version}`);
    });
    try {
      apply();
    } catch (err) {
      throw storeErrorFrom(`Seen store migration ${migration.name} failed`, err, { migration: migration.name });
    }
    applied.push(migration.name);
    logger.info({ migration: migration.name }, 'Seen store migration applied');
  }

  return { from, to: Math.max(from, latest), applied };
}
