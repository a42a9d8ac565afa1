import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

export interface SqliteInitOptions {
  enableWal?: boolean;
  busyTimeoutMs?: number;
}

export function isMemoryPath(dbPath: string): boolean {
  return dbPath === ':memory:' || dbPath.startsWith('file::memory:');
}

export function ensureDirectoryFor(filePath: string): string {
  const absolutePath = resolve(filePath);
  const directory = dirname(absolutePath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  return absolutePath;
}

export function openSqliteDatabase(dbPath: string, options: SqliteInitOptions = {}): Database.Database {
  const inMemory = isMemoryPath(dbPath);
  const db = new Database(inMemory ? dbPath : ensureDirectoryFor(dbPath));

  // WAL on an in-memory database would create files on disk.
  if (options.enableWal !== false && !inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);

  return db;
}
