/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  ExtractionObserver,
  TemplateDefinition,
  TemplateDescriptor,
  TemplateSyntax,
} from '../types/index.js';
import type {
  Discipline,
  ExtractionRecord,
  ExtractionRun,
  FallbackShape,
} from '../core/extraction/extraction-engine.js';
import type { SuggestedTemplate } from '../core/suggestion/suggestion-engine.js';
import { filterRecords } from '../core/analysis/record-filter.js';
import { summarizeField, type FieldValueCount } from '../core/analysis/field-summary.js';
import { writeRecordsReport, type ReportFormat } from '../tools/index.js';
import { logConsole } from '../core/logging.js';
import { extractFile, suggestForFile } from './log-extractor.js';

export interface ExtractionJobOptions {
  inputPath: string;
  // Omitted: the best catalog template for the file is used.
  pattern?: string;
  fieldNames?: string[];
  syntax?: TemplateSyntax;
  discipline: Discipline;
  fallback?: FallbackShape;
  catalog?: readonly TemplateDefinition[];
  sampleLines?: number;
  filter?: { query: string; invert?: boolean };
  summaryField?: string;
  report?: { filePath: string; format: ReportFormat; columns?: string[] };
  observer?: ExtractionJobObserver;
}

export interface ExtractionJobObserver extends ExtractionObserver {
  onTemplate?(info: { template: TemplateDescriptor; suggestion?: SuggestedTemplate }): void;
}

export interface ExtractionJobResult {
  template: TemplateDescriptor;
  suggestion?: SuggestedTemplate;
  run: ExtractionRun;
  // Records after the keyword filter; empty when the run failed.
  records: ExtractionRecord[];
  summary?: FieldValueCount[];
  reportPath?: string;
  // Set when the run succeeded but the report could not be written.
  reportError?: string;
}

/**
 * Resolves the template (suggesting one when none was given), extracts the
 * file, then applies the optional filter, field summary and report.
 */
export async function runExtractionJob(options: ExtractionJobOptions): Promise<ExtractionJobResult> {
  let template: TemplateDescriptor;
  let suggestion: SuggestedTemplate | undefined;

  if (options.pattern !== undefined) {
    template = {
      pattern: options.pattern,
      description: 'Caller-supplied template',
      field_names: options.fieldNames ?? [],
      syntax: options.syntax,
    };
  } else {
    suggestion = await suggestForFile({
      inputPath: options.inputPath,
      catalog: options.catalog ?? [],
      sampleLines: options.sampleLines,
    });
    template = suggestion.template;
  }
  options.observer?.onTemplate?.({ template, suggestion });

  const run = await extractFile({
    inputPath: options.inputPath,
    pattern: template.pattern,
    fieldNames: template.field_names,
    syntax: template.syntax,
    discipline: options.discipline,
    fallback: options.fallback,
    observer: options.observer,
  });

  if (!run.ok) {
    return { template, suggestion, run, records: [] };
  }

  const records = options.filter ? filterRecords(run.records, options.filter) : run.records;
  const summary = options.summaryField ? summarizeField(records, options.summaryField) : undefined;

  let reportPath: string | undefined;
  let reportError: string | undefined;
  if (options.report) {
    try {
      await writeRecordsReport(records, options.report);
      reportPath = options.report.filePath;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      reportError = `Could not write the report to ${options.report.filePath}: ${reason}`;
      logConsole('error', 'Report write failed', [
        ['file', options.report.filePath],
        ['reason', reason],
      ]);
    }
  }

  return { template, suggestion, run, records, summary, reportPath, reportError };
}
