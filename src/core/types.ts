/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TemplateDefinition } from '../types/index.js';
import type { CatalogLoadResult } from './catalog/catalog.js';

/**
 * Persistent source of the template catalog. Loading never throws: a
 * missing or malformed catalog degrades to the minimal template.
 */
export interface CatalogStore {
  readonly location: string;
  load(): Promise<CatalogLoadResult>;
  append(definition: TemplateDefinition): Promise<void>;
}
