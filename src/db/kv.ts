import type Database from 'better-sqlite3';

export function getKV(db: Database.Database, key: string): string | null {
  const row = db.prepare('SELECT value FROM kv WHERE key = ?').get(key) as { value?: string } | undefined;
  return row?.value ?? null;
}

export function setKV(db: Database.Database, key: string, value: string): void {
  db.prepare(`
    INSERT INTO kv(key, value, updated_at)
    VALUES (?, ?, strftime('%s','now'))
    ON CONFLICT(key) DO UPDATE SET value=excluded.value, updated_at=excluded.updated_at;
  `).run(key, value);
}

