/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CompiledTemplate, FieldBinding, MatchOutcome } from '../../types/index.js';

/**
 * Field map without a prototype, so names such as `__proto__` or
 * `constructor` are stored as ordinary keys.
 */
export const createFieldMap = (): Record<string, string> => Object.create(null);

/**
 * Binds the template's own field list to its captures.
 */
export function bindDerivedFields(template: CompiledTemplate): FieldBinding[] {
  const named = new Map<string, number>();
  const anonymous: number[] = [];
  for (const slot of template.captures) {
    if (slot.name !== undefined) {
      named.set(slot.name, slot.index);
    } else {
      anonymous.push(slot.index);
    }
  }
  let nextAnonymous = 0;
  return template.fieldNames.map((name) => {
    const index = named.get(name);
    if (index !== undefined) {
      return { name, captureIndex: index };
    }
    const captureIndex = anonymous[nextAnonymous];
    nextAnonymous += 1;
    return { name, captureIndex };
  });
}

/**
 * Binds caller-supplied names: a name from the template's own field list
 * binds to that capture, any other name to the capture at the same position.
 * Names with neither stay unbound and are never populated.
 */
export function bindStaticFields(
  template: CompiledTemplate,
  names: readonly string[],
): FieldBinding[] {
  const known = new Map<string, number | undefined>();
  for (const binding of bindDerivedFields(template)) {
    known.set(binding.name, binding.captureIndex);
  }
  return names.map((name, position) => ({
    name,
    captureIndex: known.has(name) ? known.get(name) : template.captures[position]?.index,
  }));
}

/**
 * Matches one line. `full` requires every bound field to receive a value;
 * a structural match that leaves any field empty-handed is `partial`.
 */
export function matchLine(
  template: CompiledTemplate,
  bindings: readonly FieldBinding[],
  line: string,
): MatchOutcome {
  const match = template.regex.exec(line);
  if (!match) {
    return { kind: 'none' };
  }

  const fields = createFieldMap();
  let populated = 0;
  for (const binding of bindings) {
    if (binding.captureIndex === undefined) {
      continue;
    }
    const value = match[binding.captureIndex];
    if (value === undefined) {
      continue;
    }
    fields[binding.name] = value.trim();
    populated += 1;
  }

  if (populated === bindings.length) {
    return { kind: 'full', fields };
  }
  return { kind: 'partial', fields, populated };
}
