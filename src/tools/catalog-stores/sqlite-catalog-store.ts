/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';
import { dirname } from 'node:path';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import type { TemplateDefinition } from '../../types/index.js';
import type { CatalogStore } from '../../core/types.js';
import {
  degradedCatalog,
  parseCatalogEntries,
  type CatalogLoadResult,
} from '../../core/catalog/catalog.js';
import { logConsole } from '../../core/logging.js';
import { ensureDirectory } from '../files.js';

let sqlModule: Promise<SqlJsStatic> | undefined;

// A failed load is not cached, so the next store call retries.
const loadSqlModule = (): Promise<SqlJsStatic> => {
  sqlModule ??= initSqlJs().catch((error: unknown) => {
    sqlModule = undefined;
    throw error;
  });
  return sqlModule;
};

/**
 * Catalog kept in a SQLite database file (sql.js, no native bindings).
 * Entries are ordered by their `position` column.
 */
export class SqliteCatalogStore implements CatalogStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = filePath;
  }

  async load(): Promise<CatalogLoadResult> {
    if (!existsSync(this.location)) {
      return this.degrade(`catalog not found at ${this.location}`);
    }

    let db: Database | undefined;
    try {
      const SQL = await loadSqlModule();
      db = new SQL.Database(readFileSync(this.location));
      setup(db);
      const entries = parseCatalogEntries(readRows(db));
      logConsole('debug', 'Catalog loaded', [
        ['source', this.location],
        ['templates', entries.length],
      ]);
      return { source: this.location, entries, degraded: false };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.degrade(reason);
    } finally {
      db?.close();
    }
  }

  async append(definition: TemplateDefinition): Promise<void> {
    const SQL = await loadSqlModule();
    const db = existsSync(this.location)
      ? new SQL.Database(readFileSync(this.location))
      : new SQL.Database();
    try {
      setup(db);
      const stmt = db.prepare(
        `INSERT INTO catalog_templates (position, pattern, description, field_names, syntax)
         VALUES ((SELECT COALESCE(MAX(position), 0) + 1 FROM catalog_templates), ?, ?, ?, ?)`,
      );
      stmt.bind([
        definition.pattern,
        definition.description,
        definition.fieldNames ? JSON.stringify(definition.fieldNames) : null,
        definition.syntax ?? null,
      ]);
      stmt.step();
      stmt.free();
      await ensureDirectory(dirname(this.location));
      writeFileSync(this.location, Buffer.from(db.export()));
    } finally {
      db.close();
    }
  }

  private degrade(reason: string): CatalogLoadResult {
    logConsole('warn', 'Catalog degraded to minimal template', [
      ['source', this.location],
      ['reason', reason],
    ]);
    return degradedCatalog(this.location, reason);
  }
}

function setup(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS catalog_templates (
      position INTEGER PRIMARY KEY,
      pattern TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      field_names TEXT,
      syntax TEXT
    );
  `);
}

/**
 * Reads the rows back into the same shape as a JSON catalog so both stores
 * share one validation path.
 */
function readRows(db: Database): Array<Record<string, unknown>> {
  const stmt = db.prepare(
    'SELECT pattern, description, field_names, syntax FROM catalog_templates ORDER BY position ASC',
  );
  const rows: Array<Record<string, unknown>> = [];
  try {
    while (stmt.step()) {
      const row = stmt.getAsObject();
      const entry: Record<string, unknown> = {
        pattern: row['pattern'],
        description: row['description'] ?? '',
      };
      const fieldNames = row['field_names'];
      if (typeof fieldNames === 'string') {
        entry['field_names'] = JSON.parse(fieldNames);
      }
      if (typeof row['syntax'] === 'string') {
        entry['syntax'] = row['syntax'];
      }
      rows.push(entry);
    }
  } finally {
    stmt.free();
  }
  return rows;
}
