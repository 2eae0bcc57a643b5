/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { extname } from 'node:path';
import type { CatalogStore } from '../../core/types.js';
import { FileCatalogStore } from './file-catalog-store.js';
import { SqliteCatalogStore } from './sqlite-catalog-store.js';

const SQLITE_EXTENSIONS = new Set(['.sqlite', '.sqlite3', '.db']);

/**
 * Picks the catalog store for a path by its extension: SQLite databases for
 * .sqlite/.sqlite3/.db, JSON otherwise.
 */
export function openCatalogStore(filePath: string): CatalogStore {
  if (SQLITE_EXTENSIONS.has(extname(filePath).toLowerCase())) {
    return new SqliteCatalogStore(filePath);
  }
  return new FileCatalogStore(filePath);
}

export { FileCatalogStore } from './file-catalog-store.js';
export { SqliteCatalogStore } from './sqlite-catalog-store.js';
