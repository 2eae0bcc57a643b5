/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  CompiledTemplate,
  ExtractionObserver,
  FieldBinding,
} from '../../types/index.js';
import { describeFieldCountMismatch } from '../template/compiler.js';
import {
  bindDerivedFields,
  bindStaticFields,
  createFieldMap,
  matchLine,
} from '../template/matcher.js';

export type Discipline = 'strict' | 'best-effort';

/**
 * Where the record field order comes from: the caller's fixed schema, or the
 * template's own declared fields.
 */
export type FieldSource =
  | { kind: 'static'; names: readonly string[] }
  | { kind: 'derived' };

/**
 * Shape of best-effort records for lines that do not fully match.
 * `catch-all`: placeholders in every field but the last, which holds the
 * marked line. `full-line`: a single `FullLine` field holding the line.
 */
export type FallbackShape = 'catch-all' | 'full-line';

export const MISSING_VALUE = '---';
export const UNPARSED_PREFIX = '[UNPARSED] ';
export const FULL_LINE_FIELD = 'FullLine';

const PROGRESS_INTERVAL = 1000;

export interface ExtractionOptions {
  discipline: Discipline;
  fieldSource?: FieldSource;
  fallback?: FallbackShape;
  observer?: ExtractionObserver;
}

export interface ExtractionRecord {
  fields: Record<string, string>;
  fieldOrder: string[];
  // 1-based position among the non-empty lines of the input.
  lineNumber: number;
  matched: boolean;
}

export type ExtractionFailureKind =
  | 'invalid-template'
  | 'not-found'
  | 'no-match-in-strict-mode'
  | 'read-error';

export interface ExtractionFailure {
  kind: ExtractionFailureKind;
  message: string;
}

export type ExtractionRun =
  | {
      ok: true;
      totalLines: number;
      matchedLines: number;
      fieldOrder: string[];
      records: ExtractionRecord[];
    }
  | {
      ok: false;
      totalLines: number;
      matchedLines: number;
      error: ExtractionFailure;
    };

/**
 * Runs a compiled template over every line and applies the discipline.
 * Blank lines are skipped and not counted. A static field list that does
 * not fit the template's captures fails before any line is read.
 */
export function extractLines(
  lines: Iterable<string>,
  template: CompiledTemplate,
  options: ExtractionOptions,
): ExtractionRun {
  const invalid = checkFieldSource(template, options);
  if (invalid) {
    return invalid;
  }
  const extraction = new LineExtraction(template, options);
  for (const line of lines) {
    extraction.accept(line);
  }
  return extraction.finish();
}

/**
 * Same as extractLines for a streamed source, e.g. a readline interface.
 * Errors raised by the source propagate to the caller.
 */
export async function extractLineStream(
  lines: AsyncIterable<string>,
  template: CompiledTemplate,
  options: ExtractionOptions,
): Promise<ExtractionRun> {
  const invalid = checkFieldSource(template, options);
  if (invalid) {
    return invalid;
  }
  const extraction = new LineExtraction(template, options);
  for await (const line of lines) {
    extraction.accept(line);
  }
  return extraction.finish();
}

export const strictNoMatchMessage = (totalLines: number): string =>
  `The template matched 0 of ${totalLines} lines. Please verify your template.`;

function checkFieldSource(
  template: CompiledTemplate,
  options: ExtractionOptions,
): ExtractionRun | undefined {
  if (options.fieldSource?.kind !== 'static') {
    return undefined;
  }
  const mismatch = describeFieldCountMismatch(options.fieldSource.names, template.captures.length);
  if (mismatch === undefined) {
    return undefined;
  }
  return {
    ok: false,
    totalLines: 0,
    matchedLines: 0,
    error: { kind: 'invalid-template', message: `Invalid template: ${mismatch}` },
  };
}

class LineExtraction {
  private readonly template: CompiledTemplate;
  private readonly options: ExtractionOptions;
  private readonly bindings: FieldBinding[];
  private readonly fieldOrder: string[];
  private readonly records: ExtractionRecord[] = [];
  private totalLines = 0;
  private matchedLines = 0;

  constructor(template: CompiledTemplate, options: ExtractionOptions) {
    this.template = template;
    this.options = options;
    const source: FieldSource = options.fieldSource ?? { kind: 'derived' };
    this.bindings =
      source.kind === 'static' && source.names.length > 0
        ? bindStaticFields(template, source.names)
        : bindDerivedFields(template);
    this.fieldOrder = this.bindings.map((binding) => binding.name);
  }

  accept(rawLine: string): void {
    const line = rawLine.trim();
    if (line.length === 0) {
      return;
    }
    this.totalLines += 1;

    const outcome = matchLine(this.template, this.bindings, line);
    if (outcome.kind === 'full') {
      this.matchedLines += 1;
      this.records.push({
        fields: outcome.fields,
        fieldOrder: [...this.fieldOrder],
        lineNumber: this.totalLines,
        matched: true,
      });
    } else if (this.options.discipline === 'best-effort') {
      this.records.push(this.buildFallbackRecord(line));
    }

    if (this.totalLines % PROGRESS_INTERVAL === 0) {
      this.reportProgress();
    }
  }

  finish(): ExtractionRun {
    this.reportProgress();
    if (this.options.discipline === 'strict' && this.records.length === 0 && this.totalLines > 0) {
      return {
        ok: false,
        totalLines: this.totalLines,
        matchedLines: this.matchedLines,
        error: { kind: 'no-match-in-strict-mode', message: strictNoMatchMessage(this.totalLines) },
      };
    }
    return {
      ok: true,
      totalLines: this.totalLines,
      matchedLines: this.matchedLines,
      fieldOrder: [...this.fieldOrder],
      records: this.records,
    };
  }

  private buildFallbackRecord(line: string): ExtractionRecord {
    if (this.options.fallback === 'full-line') {
      return {
        fields: Object.assign(createFieldMap(), { [FULL_LINE_FIELD]: line }),
        fieldOrder: [FULL_LINE_FIELD],
        lineNumber: this.totalLines,
        matched: false,
      };
    }

    const fields = createFieldMap();
    const catchAll = this.fieldOrder.length - 1;
    this.fieldOrder.forEach((name, index) => {
      fields[name] = index === catchAll ? `${UNPARSED_PREFIX}${line}` : MISSING_VALUE;
    });
    return {
      fields,
      fieldOrder: [...this.fieldOrder],
      lineNumber: this.totalLines,
      matched: false,
    };
  }

  private reportProgress(): void {
    this.options.observer?.onProgress?.({
      processed: this.totalLines,
      matched: this.matchedLines,
    });
  }
}
