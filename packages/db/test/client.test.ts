import { mkdtempSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { eq, openDb } from '../src/client';
import { failureState } from '../src/schema';

describe('db/client', () => {
  it('creates the failure_state table on open', () => {
    const { db, close } = openDb(':memory:');
    try {
      db.insert(failureState).values({ key: 'edge1', consecutiveFailures: 2, updatedAt: 100 }).run();

      const row = db.select().from(failureState).where(eq(failureState.key, 'edge1')).get();

      expect(row).toEqual({ key: 'edge1', consecutiveFailures: 2, lastAlertAt: 0, updatedAt: 100 });
    } finally {
      close();
    }
  });

  it('can be opened twice on the same in-memory name without sharing data', () => {
    const a = openDb(':memory:');
    const b = openDb(':memory:');
    try {
      a.db.insert(failureState).values({ key: 'edge1', updatedAt: 1 }).run();

      expect(b.db.select().from(failureState).all()).toEqual([]);
    } finally {
      a.close();
      b.close();
    }
  });

  it('throws on a file that is not a database and releases it', () => {
    const dir = mkdtempSync(join(tmpdir(), 'reachwatch-db-'));
    const file = join(dir, 'state.sqlite');
    try {
      writeFileSync(file, 'not a database '.repeat(64));

      expect(() => openDb(file)).toThrow(/file is not a database/);

      unlinkSync(file);
      const reopened = openDb(file);
      expect(reopened.db.select().from(failureState).all()).toEqual([]);
      reopened.close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
