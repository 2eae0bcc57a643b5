/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ExtractionRecord } from '../extraction/extraction-engine.js';
import { MISSING_VALUE } from '../extraction/extraction-engine.js';

export interface FieldValueCount {
  value: string;
  count: number;
}

/**
 * Counts distinct values of one field across records, most frequent first.
 * Equal counts keep the order in which values first appeared. Empty values
 * and the missing-value placeholder are not counted.
 */
export function summarizeField(
  records: readonly ExtractionRecord[],
  fieldName: string,
): FieldValueCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const value = record.fields[fieldName]?.trim();
    if (!value || value === MISSING_VALUE) {
      continue;
    }
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so insertion order breaks ties.
  return [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count);
}
