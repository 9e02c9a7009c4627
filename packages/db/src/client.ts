import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
export { eq, asc } from 'drizzle-orm';

import * as schema from './schema';

export type Db = BetterSQLite3Database<typeof schema>;

export type DbHandle = {
  db: Db;
  close: () => void;
};

const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS failure_state (
    key                  TEXT PRIMARY KEY,
    consecutive_failures INTEGER NOT NULL DEFAULT 0,
    last_alert_at        INTEGER NOT NULL DEFAULT 0,
    updated_at           INTEGER NOT NULL
  );
`;

export function openDb(filename: string): DbHandle {
  const sqlite = new Database(filename);
  try {
    if (filename !== ':memory:') {
      // Origin and cn runs may be started by separate timers against the same file.
      sqlite.pragma('busy_timeout = 5000');
      sqlite.pragma('journal_mode = WAL');
    }
    sqlite.exec(CREATE_TABLES_SQL);
  } catch (err) {
    // A corrupt or foreign file only fails on first read.
    sqlite.close();
    throw err;
  }

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
