/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ExtractionRecord } from '../extraction/extraction-engine.js';

export interface RecordFilterOptions {
  query: string;
  invert?: boolean;
}

/**
 * Grep-like keyword filter. A record matches when every whitespace-separated
 * keyword occurs (case-insensitively) in at least one of its field values.
 * A blank query matches every record.
 */
export function filterRecords(
  records: readonly ExtractionRecord[],
  options: RecordFilterOptions,
): ExtractionRecord[] {
  const keywords = options.query
    .toLowerCase()
    .split(/\s+/)
    .filter((keyword) => keyword.length > 0);
  const invert = options.invert ?? false;

  return records.filter((record) => {
    const matched = keywords.length === 0 || matchesAllKeywords(record, keywords);
    return invert ? !matched : matched;
  });
}

function matchesAllKeywords(record: ExtractionRecord, keywords: string[]): boolean {
  const values = Object.values(record.fields).map((value) => value.toLowerCase());
  return keywords.every((keyword) => values.some((value) => value.includes(keyword)));
}
