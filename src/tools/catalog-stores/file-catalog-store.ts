/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TemplateDefinition } from '../../types/index.js';
import type { CatalogStore } from '../../core/types.js';
import {
  degradedCatalog,
  parseCatalogEntries,
  toTemplateDescriptor,
  type CatalogLoadResult,
} from '../../core/catalog/catalog.js';
import { logConsole } from '../../core/logging.js';
import { fileExists, readJsonFile, writeJsonFile } from '../files.js';

/**
 * Catalog kept as a JSON array of `{ pattern, description, field_names? }`
 * entries.
 */
export class FileCatalogStore implements CatalogStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = filePath;
  }

  async load(): Promise<CatalogLoadResult> {
    if (!(await fileExists(this.location))) {
      return this.degrade(`catalog not found at ${this.location}`);
    }

    let raw: unknown;
    try {
      raw = await readJsonFile(this.location);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.degrade(`catalog is not valid JSON (${reason})`);
    }

    try {
      const entries = parseCatalogEntries(raw);
      logConsole('debug', 'Catalog loaded', [
        ['source', this.location],
        ['templates', entries.length],
      ]);
      return { source: this.location, entries, degraded: false };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.degrade(reason);
    }
  }

  async append(definition: TemplateDefinition): Promise<void> {
    const existing = (await fileExists(this.location)) ? await readJsonFile(this.location) : [];
    if (!Array.isArray(existing)) {
      throw new Error(`Cannot append to ${this.location}: the file does not hold a list of templates.`);
    }
    await writeJsonFile(this.location, [...existing, toTemplateDescriptor(definition)]);
  }

  private degrade(reason: string): CatalogLoadResult {
    logConsole('warn', 'Catalog degraded to minimal template', [
      ['source', this.location],
      ['reason', reason],
    ]);
    return degradedCatalog(this.location, reason);
  }
}
