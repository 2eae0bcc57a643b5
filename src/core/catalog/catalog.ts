/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  TemplateDefinition,
  TemplateDescriptor,
  TemplateSyntax,
} from '../../types/index.js';
import { CatalogFormatError } from '../../types/errors.js';

/**
 * Guaranteed-valid template used whenever the catalog is missing, empty or
 * malformed.
 */
export const MINIMAL_TEMPLATE: Readonly<TemplateDefinition> = Object.freeze({
  pattern: '{Token1} {Message}',
  description: 'Minimal Default (Catalog Fallback)',
  fieldNames: ['Token1', 'Message'],
  syntax: 'placeholder',
});

export interface CatalogLoadResult {
  source: string;
  entries: readonly TemplateDefinition[];
  degraded: boolean;
  reason?: string;
}

export const degradedCatalog = (source: string, reason: string): CatalogLoadResult => ({
  source,
  entries: [MINIMAL_TEMPLATE],
  degraded: true,
  reason,
});

/**
 * Validates raw catalog data (the parsed JSON array, or rows read back from
 * SQLite) and converts it into template definitions.
 *
 * @throws CatalogFormatError if the data is not a non-empty list of entries
 *   each carrying a string `pattern`
 */
export function parseCatalogEntries(raw: unknown): TemplateDefinition[] {
  if (!Array.isArray(raw)) {
    throw new CatalogFormatError('expected a list of template entries.');
  }
  if (raw.length === 0) {
    throw new CatalogFormatError('catalog is empty.');
  }
  return raw.map((entry, index) => parseCatalogEntry(entry, index));
}

function parseCatalogEntry(entry: unknown, index: number): TemplateDefinition {
  if (!isRecord(entry)) {
    throw new CatalogFormatError(`entry ${index} is not an object.`);
  }
  const pattern = entry['pattern'];
  if (typeof pattern !== 'string' || pattern.length === 0) {
    throw new CatalogFormatError(`entry ${index} has no "pattern" string.`);
  }
  const description = entry['description'];
  if (description !== undefined && typeof description !== 'string') {
    throw new CatalogFormatError(`entry ${index} has a non-string "description".`);
  }
  const fieldNames = entry['field_names'] ?? entry['fieldNames'];
  if (fieldNames !== undefined && !isStringList(fieldNames)) {
    throw new CatalogFormatError(`entry ${index} has a "field_names" value that is not a list of strings.`);
  }
  const syntax = entry['syntax'];
  if (syntax !== undefined && !isTemplateSyntax(syntax)) {
    throw new CatalogFormatError(`entry ${index} has unknown syntax "${String(syntax)}".`);
  }

  const definition: TemplateDefinition = { pattern, description: description ?? '' };
  if (fieldNames !== undefined && fieldNames.length > 0) {
    definition.fieldNames = [...fieldNames];
  }
  if (syntax !== undefined) {
    definition.syntax = syntax;
  }
  return definition;
}

/**
 * Converts a definition into the on-disk / wire descriptor. Derived field
 * names are supplied by the caller when the definition has none.
 */
export function toTemplateDescriptor(
  definition: TemplateDefinition,
  derivedFieldNames: readonly string[] = [],
): TemplateDescriptor {
  const descriptor: TemplateDescriptor = {
    pattern: definition.pattern,
    description: definition.description,
    field_names: [...(definition.fieldNames ?? derivedFieldNames)],
  };
  if (definition.syntax === 'regex') {
    descriptor.syntax = 'regex';
  }
  return descriptor;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const isTemplateSyntax = (value: unknown): value is TemplateSyntax =>
  value === 'placeholder' || value === 'regex';
