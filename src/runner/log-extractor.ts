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
import { compileTemplate } from '../core/template/compiler.js';
import {
  extractLineStream,
  type Discipline,
  type ExtractionRun,
  type FallbackShape,
} from '../core/extraction/extraction-engine.js';
import {
  SAMPLE_LINE_LIMIT,
  suggestTemplate,
  type SuggestedTemplate,
} from '../core/suggestion/suggestion-engine.js';
import { logConsole } from '../core/logging.js';
import { fileExists, readSampleLines, streamLogLines, toWireRecord, type WireRecord } from '../tools/index.js';

export type Envelope<T> =
  | { success: true; data: T; error: null }
  | { success: false; data: null; error: string };

export type SuggestEnvelope = Envelope<TemplateDescriptor>;
export type ExtractEnvelope = Envelope<WireRecord[]>;

export interface SuggestFileOptions {
  inputPath: string;
  catalog: readonly TemplateDefinition[];
  sampleLines?: number;
}

export interface ExtractFileOptions {
  inputPath: string;
  pattern: string;
  // Present and non-empty: fixed schema. Absent: derived from the pattern.
  fieldNames?: string[];
  syntax?: TemplateSyntax;
  discipline: Discipline;
  fallback?: FallbackShape;
  observer?: ExtractionObserver;
}

/**
 * Scores the catalog against the first lines of a file. A file that cannot
 * be read yields an empty sample, so the first catalog entry comes back.
 */
export async function suggestForFile(options: SuggestFileOptions): Promise<SuggestedTemplate> {
  const limit = options.sampleLines ?? SAMPLE_LINE_LIMIT;
  let sample: string[] = [];
  if (await fileExists(options.inputPath)) {
    try {
      sample = await readSampleLines(options.inputPath, limit);
    } catch (error) {
      logConsole('warn', 'Could not read sample lines', [
        ['file', options.inputPath],
        ['reason', error instanceof Error ? error.message : String(error)],
      ]);
    }
  } else {
    logConsole('warn', 'Suggestion input not found', [['file', options.inputPath]]);
  }

  const suggestion = suggestTemplate(options.catalog, sample);
  logConsole('debug', 'Suggestion complete', [
    ['file', options.inputPath],
    ['sample', sample.length],
    ['pattern', suggestion.template.pattern],
    ['score', suggestion.scored ? `${suggestion.score}/${suggestion.sampleSize}` : 'unscored'],
  ]);
  return suggestion;
}

/**
 * Extracts every line of a file. The template is compiled before the file
 * is opened; neither failure is ever thrown.
 */
export async function extractFile(options: ExtractFileOptions): Promise<ExtractionRun> {
  const fieldNames =
    options.fieldNames && options.fieldNames.length > 0 ? [...options.fieldNames] : undefined;
  const definition: TemplateDefinition = {
    pattern: options.pattern,
    description: '',
    fieldNames,
    syntax: options.syntax,
  };

  const compiled = compileTemplate(definition, { fuzzy: true });
  if (!compiled.ok) {
    return {
      ok: false,
      totalLines: 0,
      matchedLines: 0,
      error: { kind: 'invalid-template', message: `Invalid template: ${compiled.error.message}` },
    };
  }

  if (!(await fileExists(options.inputPath))) {
    return {
      ok: false,
      totalLines: 0,
      matchedLines: 0,
      error: { kind: 'not-found', message: `The file was not found at path: ${options.inputPath}` },
    };
  }

  try {
    const run = await extractLineStream(streamLogLines(options.inputPath), compiled.template, {
      discipline: options.discipline,
      fieldSource: fieldNames ? { kind: 'static', names: fieldNames } : { kind: 'derived' },
      fallback: options.fallback,
      observer: options.observer,
    });
    logConsole('debug', 'Extraction complete', [
      ['file', options.inputPath],
      ['discipline', options.discipline],
      ['lines', run.totalLines],
      ['matched', run.matchedLines],
      ['ok', run.ok],
    ]);
    return run;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      totalLines: 0,
      matchedLines: 0,
      error: {
        kind: 'read-error',
        message: `An unexpected error occurred while reading ${options.inputPath}: ${reason}`,
      },
    };
  }
}

/**
 * Suggest operation of the host-application contract.
 */
export async function runSuggest(options: SuggestFileOptions): Promise<SuggestEnvelope> {
  const suggestion = await suggestForFile(options);
  return { success: true, data: suggestion.template, error: null };
}

/**
 * Extract operation of the host-application contract. No data is returned
 * alongside a failure.
 */
export async function runExtract(options: ExtractFileOptions): Promise<ExtractEnvelope> {
  return toExtractEnvelope(await extractFile(options));
}

export const toExtractEnvelope = (run: ExtractionRun): ExtractEnvelope =>
  run.ok
    ? { success: true, data: run.records.map(toWireRecord), error: null }
    : { success: false, data: null, error: run.error.message };
