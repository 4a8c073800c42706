import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export const MEMORY_DB = ':memory:';

function ensureDirExists(dirPath: string) {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

export function migrate(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS kv(
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);
}

export function openDb(filePath: string): Database.Database {
  if (filePath === MEMORY_DB) {
    const mem = new Database(MEMORY_DB);
    migrate(mem);
    return mem;
  }
  const file = path.resolve(filePath);
  ensureDirExists(path.dirname(file));
  const db = new Database(file, { fileMustExist: false });
  db.pragma('journal_mode = WAL');
  migrate(db);
  return db;
}
