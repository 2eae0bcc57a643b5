/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  CaptureSlot,
  CompiledTemplate,
  TemplateDefinition,
} from '../../types/index.js';
import { TemplateCompileError } from '../../types/errors.js';
import { parsePlaceholderTemplate } from '../../common/placeholder-parser.js';
import {
  SUPPORTED_FORMAT_SPECS,
  buildFieldFragment,
  buildLiteralFragment,
  countCaptureGroups,
  describeCaptureGroups,
} from '../../common/regex-builder.js';

export type CompileResult =
  | { ok: true; template: CompiledTemplate }
  | { ok: false; error: TemplateCompileError };

export interface CompileOptions {
  // Tolerate variable interior whitespace between literal tokens.
  fuzzy?: boolean;
}

export const UNNAMED_FIELD_PREFIX = 'unnamed_';

/**
 * Compiles a template definition into an anchored matcher.
 * Never throws: syntax problems, unknown format specs and arity mismatches
 * come back as a TemplateCompileError.
 */
export function compileTemplate(
  definition: TemplateDefinition,
  options: CompileOptions = {},
): CompileResult {
  const fuzzy = options.fuzzy ?? true;
  try {
    const template =
      (definition.syntax ?? 'placeholder') === 'regex'
        ? compileRegexTemplate(definition)
        : compilePlaceholderTemplate(definition, fuzzy);
    return { ok: true, template };
  } catch (error) {
    if (error instanceof TemplateCompileError) {
      return { ok: false, error };
    }
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new TemplateCompileError(reason) };
  }
}

/**
 * Derives the template's own field list: declared names in order of first
 * appearance, then `unnamed_1`, `unnamed_2`, ... for anonymous captures.
 */
export function deriveFieldNames(captures: CaptureSlot[]): string[] {
  const named = captures.flatMap((slot) => (slot.name ? [slot.name] : []));
  const anonymousCount = captures.length - named.length;
  const taken = new Set(named);
  const unnamed: string[] = [];
  let counter = 0;
  while (unnamed.length < anonymousCount) {
    counter += 1;
    const candidate = `${UNNAMED_FIELD_PREFIX}${counter}`;
    if (!taken.has(candidate)) {
      unnamed.push(candidate);
    }
  }
  return [...named, ...unnamed];
}

/**
 * Mismatch message for a caller field list that does not fit the captures,
 * or undefined when the counts agree. An empty list means "derive".
 */
export function describeFieldCountMismatch(
  fieldNames: readonly string[] | undefined,
  captureCount: number,
): string | undefined {
  if (fieldNames === undefined || fieldNames.length === 0 || fieldNames.length === captureCount) {
    return undefined;
  }
  return `Field count mismatch: ${fieldNames.length} field name(s) supplied for ${captureCount} capture group(s).`;
}

function assertFieldArity(definition: TemplateDefinition, captureCount: number): void {
  const mismatch = describeFieldCountMismatch(definition.fieldNames, captureCount);
  if (mismatch !== undefined) {
    throw new TemplateCompileError(mismatch);
  }
}

function compilePlaceholderTemplate(
  definition: TemplateDefinition,
  fuzzy: boolean,
): CompiledTemplate {
  const segments = parsePlaceholderTemplate(definition.pattern);
  const captures: CaptureSlot[] = [];
  const groupByName = new Map<string, number>();
  const parts: string[] = [];

  segments.forEach((segment, position) => {
    if (segment.kind === 'text') {
      parts.push(buildLiteralFragment(segment.value, fuzzy));
      return;
    }

    if (segment.name !== undefined) {
      const existing = groupByName.get(segment.name);
      if (existing !== undefined) {
        // A repeated name must capture the same text again.
        parts.push(`(?:\\${existing})`);
        return;
      }
    }

    const isLast = position === segments.length - 1;
    const fragment = buildFieldFragment(segment.spec, isLast);
    if (fragment === undefined) {
      throw new TemplateCompileError(
        `Unsupported format spec "${segment.spec}" at position ${segment.position}. ` +
          `Supported: ${SUPPORTED_FORMAT_SPECS.join(', ')}.`,
        segment.position,
      );
    }

    const index = captures.length + 1;
    captures.push({ index, name: segment.name });
    if (segment.name !== undefined) {
      groupByName.set(segment.name, index);
    }
    parts.push(`(${fragment})`);
  });

  if (captures.length === 0) {
    throw new TemplateCompileError('Template declares no fields.');
  }

  assertFieldArity(definition, captures.length);

  const source = `^${parts.join('')}`;
  return {
    definition,
    syntax: 'placeholder',
    source,
    regex: new RegExp(source),
    captures,
    fieldNames: deriveFieldNames(captures),
  };
}

function compileRegexTemplate(definition: TemplateDefinition): CompiledTemplate {
  let base: RegExp;
  try {
    base = new RegExp(definition.pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TemplateCompileError(
      reason.startsWith('Invalid regular expression') ? reason : `Invalid regular expression: ${reason}`,
    );
  }

  const described = describeCaptureGroups(definition.pattern);
  const counted = countCaptureGroups(base);
  if (described.length !== counted) {
    throw new TemplateCompileError(
      `Could not determine the capture groups of the regular expression (found ${described.length}, engine reports ${counted}).`,
    );
  }
  if (counted === 0) {
    throw new TemplateCompileError('Regular expression has no capture groups.');
  }
  assertFieldArity(definition, counted);

  const captures: CaptureSlot[] = described.map((group, offset) => ({
    index: offset + 1,
    name: group.name,
  }));
  const source = `^(?:${definition.pattern})`;
  return {
    definition,
    syntax: 'regex',
    source,
    regex: new RegExp(source),
    captures,
    fieldNames: deriveFieldNames(captures),
  };
}
