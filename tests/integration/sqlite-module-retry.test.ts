/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import initSqlJs from 'sql.js';
import { SqliteCatalogStore } from '../../src/tools/catalog-stores/sqlite-catalog-store.js';
import { createTempDir, type TempDirHarness } from '../helpers/temp-dir.js';

vi.mock('sql.js', async (importOriginal) => {
  const actual = await importOriginal<{ default: typeof initSqlJs }>();
  return { ...actual, default: vi.fn(actual.default) };
});

describe('Integration: SQLite module loading', () => {
  let temp: TempDirHarness;

  beforeEach(() => {
    temp = createTempDir();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('retries the module after a failed load', async () => {
    vi.mocked(initSqlJs).mockRejectedValueOnce(new Error('wasm unavailable'));
    const store = new SqliteCatalogStore(temp.path('catalog.sqlite'));
    const definition = { pattern: '{Host} {Msg}', description: 'host', fieldNames: ['Host', 'Msg'] };

    await expect(store.append(definition)).rejects.toThrow('wasm unavailable');
    await store.append(definition);

    await expect(store.load()).resolves.toEqual({
      source: store.location,
      entries: [definition],
      degraded: false,
    });
    expect(initSqlJs).toHaveBeenCalledTimes(2);
  });
});
