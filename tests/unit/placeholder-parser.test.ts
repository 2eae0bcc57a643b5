/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { parsePlaceholderTemplate } from '../../src/common/placeholder-parser.js';
import { TemplateCompileError } from '../../src/types/errors.js';

describe('parsePlaceholderTemplate', () => {
  it('splits text and fields', () => {
    expect(parsePlaceholderTemplate('[{Time}] {Level:l} {}')).toEqual([
      { kind: 'text', value: '[' },
      { kind: 'field', name: 'Time', spec: undefined, position: 1 },
      { kind: 'text', value: '] ' },
      { kind: 'field', name: 'Level', spec: 'l', position: 9 },
      { kind: 'text', value: ' ' },
      { kind: 'field', name: undefined, spec: undefined, position: 19 },
    ]);
  });

  it('treats doubled braces as literal text', () => {
    expect(parsePlaceholderTemplate('{{{A}}}')).toEqual([
      { kind: 'text', value: '{' },
      { kind: 'field', name: 'A', spec: undefined, position: 2 },
      { kind: 'text', value: '}' },
    ]);
  });

  it('rejects an unclosed placeholder', () => {
    expect(() => parsePlaceholderTemplate('{A} {B')).toThrow(
      new TemplateCompileError('Unclosed placeholder starting at position 4.'),
    );
  });

  it('rejects a nested opening brace', () => {
    expect(() => parsePlaceholderTemplate('{A{B}')).toThrow('Unclosed placeholder starting at position 0.');
  });

  it('rejects a stray closing brace', () => {
    expect(parsePlaceholderTemplate('{A}}}')).toEqual([
      { kind: 'field', name: 'A', spec: undefined, position: 0 },
      { kind: 'text', value: '}' },
    ]);
    expect(() => parsePlaceholderTemplate('{A} }')).toThrow('Unmatched "}" at position 4.');
  });

  it('rejects invalid field names', () => {
    expect(() => parsePlaceholderTemplate('{1abc}')).toThrow('Invalid field name "1abc" at position 0.');
  });

  it('records the position on the error', () => {
    try {
      parsePlaceholderTemplate('ab {');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TemplateCompileError);
      expect(error instanceof TemplateCompileError ? error.position : undefined).toBe(3);
    }
  });
});
