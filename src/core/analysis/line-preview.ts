/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TemplateDefinition } from '../../types/index.js';
import { compileTemplate } from '../template/compiler.js';
import { bindDerivedFields, bindStaticFields, matchLine } from '../template/matcher.js';

export type LinePreview =
  | { ok: true; fields: Record<string, string>; fieldOrder: string[] }
  | { ok: false; reason: string };

/**
 * Tries a template against a single line, typically the first line of a file,
 * so a template can be checked before a full extraction run.
 */
export function previewLine(definition: TemplateDefinition, line: string): LinePreview {
  const compiled = compileTemplate(definition);
  if (!compiled.ok) {
    return { ok: false, reason: `Invalid template: ${compiled.error.message}` };
  }

  const template = compiled.template;
  const bindings =
    definition.fieldNames && definition.fieldNames.length > 0
      ? bindStaticFields(template, definition.fieldNames)
      : bindDerivedFields(template);
  const outcome = matchLine(template, bindings, line.trim());
  if (outcome.kind !== 'full') {
    return { ok: false, reason: 'Pattern mismatch or capture group count is incorrect.' };
  }
  return {
    ok: true,
    fields: outcome.fields,
    fieldOrder: bindings.map((binding) => binding.name),
  };
}
