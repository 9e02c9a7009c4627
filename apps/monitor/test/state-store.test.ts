import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { failureState, type DbHandle } from '@reachwatch/db';

import {
  openFailureStateStore,
  openFailureStateStoreForRun,
  UnavailableFailureStateStore,
  type SqliteFailureStateStore,
} from '../src/state/store';

describe('state/store', () => {
  let store: SqliteFailureStateStore;
  let handle: DbHandle;

  beforeEach(() => {
    ({ store, handle } = openFailureStateStore(':memory:'));
  });

  afterEach(() => {
    handle.close();
  });

  it('reads a missing key as no state', async () => {
    expect(await store.read('edge1')).toBeNull();
  });

  it('creates a record on the first failure with no alert time', async () => {
    await store.saveFailures('edge1', 1, 1_000);

    expect(await store.read('edge1')).toEqual({ consecutiveFailures: 1, lastAlertEpochSeconds: 0 });
  });

  it('updates the counter without touching the alert time', async () => {
    await store.saveFailures('edge1', 1, 1_000);
    await store.saveAlert('edge1', 1_000);
    await store.saveFailures('edge1', 2, 1_060);

    expect(await store.read('edge1')).toEqual({ consecutiveFailures: 2, lastAlertEpochSeconds: 1_000 });
    expect(await store.list()).toEqual([
      { key: 'edge1', consecutiveFailures: 2, lastAlertEpochSeconds: 1_000, updatedAt: 1_060 },
    ]);
  });

  it('clears the record on recovery', async () => {
    await store.saveFailures('edge1', 3, 1_000);
    await store.clear('edge1');
    await store.clear('edge1');

    expect(await store.read('edge1')).toBeNull();
    expect(await store.list()).toEqual([]);
  });

  it('treats a zero counter as no state', async () => {
    handle.db.insert(failureState).values({ key: 'edge2', consecutiveFailures: 0, updatedAt: 1 }).run();

    expect(await store.read('edge2')).toBeNull();
  });

  it('lists records ordered by key', async () => {
    await store.saveFailures('zeta', 1, 10);
    await store.saveFailures('alpha', 4, 20);

    expect((await store.list()).map((r) => r.key)).toEqual(['alpha', 'zeta']);
  });
});

describe('state/store fallback', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to an unavailable store when the file cannot be opened', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'reachwatch-store-'));
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((line: string) => {
      errors.push(line);
    });
    try {
      const path = join(dir, 'missing', 'state.sqlite');
      const { store, close } = openFailureStateStoreForRun(path);

      expect(store).toBeInstanceOf(UnavailableFailureStateStore);
      expect(errors).toHaveLength(1);
      expect(errors[0]?.startsWith(`state: open failed path=${path} error=`)).toBe(true);

      await store.saveFailures('edge1', 3, 1_000);
      await store.saveAlert('edge1', 1_000);
      expect(await store.read('edge1')).toBeNull();
      expect(await store.list()).toEqual([]);
      expect(errors.slice(1)).toEqual([
        'state: store unavailable, dropped key=edge1 count=3',
        'state: store unavailable, dropped alert time key=edge1',
      ]);
      close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
