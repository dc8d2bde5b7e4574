/**
 * Audit database connection and schema versioning.
 *
 * The schema version lives in SQLite's `user_version` header field. Each file
 * in the migrations directory is named `<version>_<label>.sql` and moves the
 * schema to that version inside its own transaction.
 */

import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { readdirSync, readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { persistenceLogger } from '../utils/logger.js';
import { PersistenceError, errorMessage } from '../errors.js';

const BUNDLED_MIGRATIONS = join(dirname(fileURLToPath(import.meta.url)), 'migrations');
const MIGRATION_FILE = /^(\d+)_[\w-]+\.sql$/;

export interface DatabaseManager {
  readonly db: BetterSqlite3.Database;

  /** Current `user_version` of the open database. */
  schemaVersion(): number;

  /**
   * Bring the schema up to the newest migration and return the resulting version.
   * @throws {PersistenceError} On an unreadable or misnamed migration, a failing
   *   statement, or a database written by a newer schema.
   */
  runMigrations(): number;

  close(): void;
}

interface Migration {
  version: number;
  file: string;
}

/**
 * Open the database at `dbPath` (or ':memory:') in WAL mode.
 * @throws {PersistenceError} When the file cannot be opened as a database
 */
export function createDatabase(dbPath: string, migrationsDir: string = BUNDLED_MIGRATIONS): DatabaseManager {
  let database: BetterSqlite3.Database;
  try {
    database = new Database(dbPath);
  } catch (error: unknown) {
    throw new PersistenceError(`Cannot open audit database "${dbPath}": ${errorMessage(error)}`);
  }
  try {
    // ':memory:' stays in 'memory' journal mode
    database.pragma('journal_mode = WAL');
  } catch (error: unknown) {
    database.close();
    throw new PersistenceError(`Cannot open audit database "${dbPath}": ${errorMessage(error)}`);
  }

  const readVersion = (): number => {
    const version: unknown = database.pragma('user_version', { simple: true });
    return typeof version === 'number' ? version : 0;
  };

  const apply = (migration: Migration): void => {
    const sql = readFileSync(join(migrationsDir, migration.file), 'utf-8');
    const step = database.transaction(() => {
      database.exec(sql);
      database.pragma(`user_version = ${migration.version}`);
    });
    try {
      step();
    } catch (error: unknown) {
      throw new PersistenceError(`Migration ${migration.file} failed: ${errorMessage(error)}`);
    }
  };

  return {
    db: database,

    schemaVersion: readVersion,

    runMigrations(): number {
      const migrations = listMigrations(migrationsDir);
      const latest = migrations.at(-1)?.version ?? 0;
      const current = readVersion();

      if (current > latest) {
        throw new PersistenceError(`Audit database schema ${current} is newer than the supported schema ${latest}`);
      }

      const pending = migrations.filter((migration) => migration.version > current);
      for (const migration of pending) {
        apply(migration);
      }
      if (pending.length > 0) {
        persistenceLogger.info({ from: current, to: latest, files: pending.map((m) => m.file) }, 'Audit schema upgraded');
      }
      return latest;
    },

    close(): void {
      database.close();
    },
  };
}

function listMigrations(migrationsDir: string): Migration[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir).filter((file) => file.endsWith('.sql'));
  } catch (error: unknown) {
    throw new PersistenceError(`Failed to read migration files from "${migrationsDir}": ${errorMessage(error)}`);
  }

  const migrations = files.map((file): Migration => {
    const match = MIGRATION_FILE.exec(file);
    const version = match ? Number.parseInt(match[1] ?? '', 10) : Number.NaN;
    if (!Number.isSafeInteger(version) || version < 1) {
      throw new PersistenceError(`Migration file "${file}" must be named <version>_<label>.sql`);
    }
    return { version, file };
  });

  migrations.sort((a, b) => a.version - b.version);
  migrations.forEach((migration, index) => {
    const previous = migrations[index - 1];
    if (previous && previous.version === migration.version) {
      throw new PersistenceError(`Migrations ${previous.file} and ${migration.file} share version ${migration.version}`);
    }
  });
  return migrations;
}
