/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { TemplateCompileError } from '../types/errors.js';

/**
 * Parsed segment of a placeholder template.
 */
export type PlaceholderSegment =
  | { kind: 'text'; value: string }
  | { kind: 'field'; name?: string; spec?: string; position: number };

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

/**
 * Splits a placeholder template into literal text and field segments.
 * `{Name}` and `{Name:spec}` are fields, `{}` and `{:spec}` anonymous fields,
 * and `{{` / `}}` literal braces.
 *
 * @example
 * parsePlaceholderTemplate('[{Time}] {Level:l} {}');
 * // text "[", field Time, text "] ", field Level (spec l), text " ", anonymous field
 *
 * @throws TemplateCompileError on an unclosed `{`, a stray `}` or an invalid field name
 */
export function parsePlaceholderTemplate(template: string): PlaceholderSegment[] {
  const segments: PlaceholderSegment[] = [];
  let text = '';
  let cursor = 0;

  const flushText = (): void => {
    if (text.length > 0) {
      segments.push({ kind: 'text', value: text });
      text = '';
    }
  };

  while (cursor < template.length) {
    const ch = template[cursor];

    if (ch === '{') {
      if (template[cursor + 1] === '{') {
        text += '{';
        cursor += 2;
        continue;
      }
      const close = template.indexOf('}', cursor + 1);
      const nested = template.indexOf('{', cursor + 1);
      if (close === -1 || (nested !== -1 && nested < close)) {
        throw new TemplateCompileError(`Unclosed placeholder starting at position ${cursor}.`, cursor);
      }
      flushText();
      segments.push(parseField(template.slice(cursor + 1, close), cursor));
      cursor = close + 1;
      continue;
    }

    if (ch === '}') {
      if (template[cursor + 1] === '}') {
        text += '}';
        cursor += 2;
        continue;
      }
      throw new TemplateCompileError(`Unmatched "}" at position ${cursor}.`, cursor);
    }

    text += ch;
    cursor += 1;
  }

  flushText();
  return segments;
}

function parseField(body: string, position: number): PlaceholderSegment {
  const colon = body.indexOf(':');
  const rawName = (colon === -1 ? body : body.slice(0, colon)).trim();
  const spec = colon === -1 ? undefined : body.slice(colon + 1).trim();

  if (rawName.length > 0 && !FIELD_NAME.test(rawName)) {
    throw new TemplateCompileError(`Invalid field name "${rawName}" at position ${position}.`, position);
  }

  return {
    kind: 'field',
    name: rawName.length > 0 ? rawName : undefined,
    spec: spec && spec.length > 0 ? spec : undefined,
    position,
  };
}
