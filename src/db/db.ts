import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, StoreError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * SQLite error code (e.g. SQLITE_NOTADB) carried by a better-sqlite3 error.
 */
export function sqliteCode(err: unknown): string | undefined {
  if (err instanceof DbError) {
    const code = err.details?.['sqliteCode'];
    return typeof code === 'string' ? code : undefined;
  }
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

const CORRUPT_CODES = new Set(['SQLITE_NOTADB', 'SQLITE_CORRUPT']);

/**
 * Wrap a SQLite failure on the seen store file: `corrupt` when SQLite says the
 * file is not a sound database, `unavailable` otherwise.
 */
export function storeErrorFrom(message: string, err: unknown, details: Record<string, unknown> = {}): StoreError {
  const code = sqliteCode(err);
  return new StoreError(
    `${message}: ${errorMessage(err)}`,
    code !== undefined && CORRUPT_CODES.has(code) ? 'corrupt' : 'unavailable',
    { ...details, sqliteCode: code },
  );
}

/**
 * Open a database file with the pragmas the seen store relies on. Commits are
 * fsynced (synchronous = FULL) before better-sqlite3 returns from run().
 */
export function openDb(dbPath: string): Database.Database {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  let db: Database.Database | undefined;
  try {
    db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = FULL');
    db.pragma('busy_timeout = 5000');

    logger.debug({ path: resolved }, 'Database opened');
    return db;
  } catch (err) {
    db?.close();
    throw new DbError(`Failed to open database at ${resolved}`, {
      path: resolved,
      sqliteCode: sqliteCode(err),
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}
