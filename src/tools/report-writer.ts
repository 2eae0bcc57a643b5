/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ExtractionRecord } from '../core/extraction/extraction-engine.js';
import { createFieldMap } from '../core/template/matcher.js';
import { writeTextFile } from './files.js';

export type ReportFormat = 'csv' | 'txt' | 'json';

export const REPORT_FORMATS: readonly ReportFormat[] = ['csv', 'txt', 'json'];

export interface RecordsReportOptions {
  filePath: string;
  format: ReportFormat;
  // Defaults to the union of all record field orders, in first-seen order.
  columns?: string[];
  delimiter?: string;
}

/**
 * Wire form of a record, as consumed by the host application.
 */
export interface WireRecord {
  Fields: Record<string, string>;
  FieldOrder: string[];
}

export const toWireRecord = (record: ExtractionRecord): WireRecord => ({
  Fields: Object.assign(createFieldMap(), record.fields),
  FieldOrder: [...record.fieldOrder],
});

export const writeRecordsReport = async (
  records: readonly ExtractionRecord[],
  options: RecordsReportOptions,
): Promise<void> => {
  await writeTextFile(options.filePath, formatRecordsReport(records, options));
};

export const formatRecordsReport = (
  records: readonly ExtractionRecord[],
  options: Omit<RecordsReportOptions, 'filePath'>,
): string => {
  const columns = options.columns ?? collectColumns(records);
  if (options.format === 'json') {
    return JSON.stringify(records.map((record) => selectColumns(record, columns)), null, 2);
  }
  if (options.format === 'txt') {
    return records
      .map((record) => columns.map((column) => record.fields[column] ?? '').join(' | '))
      .join('\n');
  }

  const delimiter = options.delimiter ?? ',';
  const rows = [
    columns,
    ...records.map((record) => columns.map((column) => record.fields[column] ?? '')),
  ];
  return rows
    .map((columnsOfRow) => columnsOfRow.map((value) => formatCsvValue(value, delimiter)).join(delimiter))
    .join('\n');
};

export const collectColumns = (records: readonly ExtractionRecord[]): string[] => {
  const seen = new Set<string>();
  for (const record of records) {
    for (const name of record.fieldOrder) {
      seen.add(name);
    }
  }
  return [...seen];
};

const selectColumns = (record: ExtractionRecord, columns: string[]): WireRecord => {
  const order = record.fieldOrder.filter((name) => columns.includes(name));
  const fields = createFieldMap();
  for (const name of order) {
    fields[name] = record.fields[name] ?? '';
  }
  return { Fields: fields, FieldOrder: order };
};

const formatCsvValue = (value: string, delimiter: string): string => {
  const needsQuoting =
    value.includes(delimiter) || value.includes('\n') || value.includes('"') || value.includes("'");
  if (!needsQuoting) {
    return value;
  }
  const escaped = value.replace(/"/g, '""');
  return `"${escaped}"`;
};
