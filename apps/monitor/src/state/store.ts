import { existsSync, renameSync } from 'node:fs';

import { asc, eq, failureState, openDb, type Db, type DbHandle } from '@reachwatch/db';

import { errnoCode, toErrorMessage } from '../errors';
import type { FailureStreakState } from '../monitor/types';

export type StoredFailureState = FailureStreakState & {
  key: string;
  updatedAt: number;
};

/**
 * Per-target failure streak storage. One record per key; a missing record means
 * zero failures and no alert ever sent.
 */
export interface FailureStateStore {
  read(key: string): Promise<FailureStreakState | null>;
  saveFailures(key: string, consecutiveFailures: number, now: number): Promise<void>;
  saveAlert(key: string, alertedAt: number): Promise<void>;
  clear(key: string): Promise<void>;
  list(): Promise<StoredFailureState[]>;
}

export class SqliteFailureStateStore implements FailureStateStore {
  constructor(private readonly db: Db) {}

  async read(key: string): Promise<FailureStreakState | null> {
    try {
      const row = this.db.select().from(failureState).where(eq(failureState.key, key)).get();
      if (!row) return null;
      // A zero/negative counter is not a valid persisted failure; treat it as absent.
      if (!Number.isInteger(row.consecutiveFailures) || row.consecutiveFailures < 1) return null;
      return {
        consecutiveFailures: row.consecutiveFailures,
        lastAlertEpochSeconds: Number.isInteger(row.lastAlertAt) && row.lastAlertAt > 0 ? row.lastAlertAt : 0,
      };
    } catch (err) {
      console.error(`state: read failed key=${key} error=${toErrorMessage(err)}`);
      return null;
    }
  }

  async saveFailures(key: string, consecutiveFailures: number, now: number): Promise<void> {
    this.db
      .insert(failureState)
      .values({ key, consecutiveFailures, lastAlertAt: 0, updatedAt: now })
      .onConflictDoUpdate({
        target: failureState.key,
        set: { consecutiveFailures, updatedAt: now },
      })
      .run();
  }

  async saveAlert(key: string, alertedAt: number): Promise<void> {
    this.db
      .update(failureState)
      .set({ lastAlertAt: alertedAt, updatedAt: alertedAt })
      .where(eq(failureState.key, key))
      .run();
  }

  async clear(key: string): Promise<void> {
    this.db.delete(failureState).where(eq(failureState.key, key)).run();
  }

  async list(): Promise<StoredFailureState[]> {
    const rows = this.db.select().from(failureState).orderBy(asc(failureState.key)).all();
    return rows.map((row) => ({
      key: row.key,
      consecutiveFailures: row.consecutiveFailures,
      lastAlertEpochSeconds: row.lastAlertAt,
      updatedAt: row.updatedAt,
    }));
  }
}

/** Stand-in when the database cannot be opened: every key reads as absent, writes are dropped. */
export class UnavailableFailureStateStore implements FailureStateStore {
  async read(): Promise<FailureStreakState | null> {
    return null;
  }

  async saveFailures(key: string, consecutiveFailures: number): Promise<void> {
    console.error(`state: store unavailable, dropped key=${key} count=${consecutiveFailures}`);
  }

  async saveAlert(key: string): Promise<void> {
    console.error(`state: store unavailable, dropped alert time key=${key}`);
  }

  async clear(): Promise<void> {}

  async list(): Promise<StoredFailureState[]> {
    return [];
  }
}

export function openFailureStateStore(filename: string): {
  store: SqliteFailureStateStore;
  handle: DbHandle;
} {
  const handle = openDb(filename);
  return { store: new SqliteFailureStateStore(handle.db), handle };
}

function isCorruptFileError(err: unknown): boolean {
  const code = errnoCode(err) ?? '';
  return code === 'SQLITE_NOTADB' || code.startsWith('SQLITE_CORRUPT');
}

function moveAside(filename: string): void {
  for (const suffix of ['', '-wal', '-shm']) {
    const path = `${filename}${suffix}`;
    if (existsSync(path)) renameSync(path, `${path}.corrupt`);
  }
}

export type OpenedFailureStateStore = {
  store: FailureStateStore;
  close: () => void;
};

/**
 * Opens the store for a run without ever throwing. A corrupt file is renamed to
 * `<file>.corrupt` and recreated; any other failure yields {@link UnavailableFailureStateStore}.
 */
export function openFailureStateStoreForRun(filename: string): OpenedFailureStateStore {
  const attempt = (): OpenedFailureStateStore => {
    const { store, handle } = openFailureStateStore(filename);
    return { store, close: handle.close };
  };

  try {
    return attempt();
  } catch (err) {
    console.error(`state: open failed path=${filename} error=${toErrorMessage(err)}`);
    if (isCorruptFileError(err)) {
      try {
        moveAside(filename);
        console.error(`state: moved corrupt store to ${filename}.corrupt`);
        return attempt();
      } catch (retryErr) {
        console.error(`state: recreate failed path=${filename} error=${toErrorMessage(retryErr)}`);
      }
    }
  }
  return { store: new UnavailableFailureStateStore(), close: () => undefined };
}
