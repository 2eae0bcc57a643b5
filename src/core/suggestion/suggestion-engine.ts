/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TemplateDefinition, TemplateDescriptor } from '../../types/index.js';
import { compileTemplate } from '../template/compiler.js';
import { bindDerivedFields, bindStaticFields, matchLine } from '../template/matcher.js';
import { MINIMAL_TEMPLATE, toTemplateDescriptor } from '../catalog/catalog.js';

/**
 * Number of leading non-empty lines every candidate is scored against.
 */
export const SAMPLE_LINE_LIMIT = 5;

export interface CandidateScore {
  position: number;
  description: string;
  score?: number;
  fieldCount?: number;
  error?: string;
}

export interface SuggestedTemplate {
  template: TemplateDescriptor;
  score: number;
  // False when the result is a fallback that was never scored.
  scored: boolean;
  sampleSize: number;
  candidates: CandidateScore[];
}

interface BestCandidate {
  definition: TemplateDefinition;
  fieldNames: string[];
  score: number;
}

/**
 * Picks the catalog template that fully matches the most sample lines.
 *
 * Ties go to the template with more fields, then to the earlier catalog
 * entry. Uncompilable entries are skipped. Never fails: an empty catalog
 * yields the minimal template, an empty sample or a catalog with no usable
 * entry yields the first entry unscored.
 */
export function suggestTemplate(
  catalog: readonly TemplateDefinition[],
  sampleLines: readonly string[],
): SuggestedTemplate {
  const sample = sampleLines.map((line) => line.trim()).filter((line) => line.length > 0);
  const first = catalog[0];
  if (first === undefined) {
    return unscored(MINIMAL_TEMPLATE, sample.length, []);
  }
  if (sample.length === 0) {
    return unscored(first, 0, []);
  }

  const candidates: CandidateScore[] = [];
  let best: BestCandidate | undefined;

  for (const [position, definition] of catalog.entries()) {
    const compiled = compileTemplate(definition, { fuzzy: true });
    if (!compiled.ok) {
      candidates.push({ position, description: definition.description, error: compiled.error.message });
      continue;
    }

    const template = compiled.template;
    const bindings = definition.fieldNames
      ? bindStaticFields(template, definition.fieldNames)
      : bindDerivedFields(template);
    const fieldNames = bindings.map((binding) => binding.name);

    let score = 0;
    for (const line of sample) {
      if (matchLine(template, bindings, line).kind === 'full') {
        score += 1;
      }
    }
    candidates.push({ position, description: definition.description, score, fieldCount: fieldNames.length });

    if (
      best === undefined ||
      score > best.score ||
      (score === best.score && fieldNames.length > best.fieldNames.length)
    ) {
      best = { definition, fieldNames, score };
    }
  }

  if (best === undefined) {
    return unscored(first, sample.length, candidates);
  }
  return {
    template: toTemplateDescriptor(best.definition, best.fieldNames),
    score: best.score,
    scored: true,
    sampleSize: sample.length,
    candidates,
  };
}

function unscored(
  definition: TemplateDefinition,
  sampleSize: number,
  candidates: CandidateScore[],
): SuggestedTemplate {
  let derived: string[] = [];
  if (definition.fieldNames === undefined) {
    const compiled = compileTemplate(definition);
    derived = compiled.ok ? compiled.template.fieldNames : [];
  }
  return {
    template: toTemplateDescriptor(definition, derived),
    score: 0,
    scored: false,
    sampleSize,
    candidates,
  };
}
