/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { bindDerivedFields, bindStaticFields, matchLine } from '../../src/core/template/matcher.js';
import { compileOrThrow } from '../helpers/templates.js';

describe('bindDerivedFields', () => {
  it('binds anonymous captures in order after the named ones', () => {
    const template = compileOrThrow('{} - {Name} {}');
    expect(bindDerivedFields(template)).toEqual([
      { name: 'Name', captureIndex: 2 },
      { name: 'unnamed_1', captureIndex: 1 },
      { name: 'unnamed_2', captureIndex: 3 },
    ]);
    expect(matchLine(template, bindDerivedFields(template), 'a - bob rest of it')).toEqual({
      kind: 'full',
      fields: { Name: 'bob', unnamed_1: 'a', unnamed_2: 'rest of it' },
    });
  });
});

describe('bindStaticFields', () => {
  it('binds known names by name and others by position', () => {
    const template = compileOrThrow('{Timestamp} {Level} {Message}');
    expect(bindStaticFields(template, ['Time', 'Level', 'Msg'])).toEqual([
      { name: 'Time', captureIndex: 1 },
      { name: 'Level', captureIndex: 2 },
      { name: 'Msg', captureIndex: 3 },
    ]);
  });

  it('binds declared names to their own captures regardless of order', () => {
    const template = compileOrThrow('{Timestamp} {Level} {Message}');
    expect(bindStaticFields(template, ['Message', 'Timestamp', 'Level'])).toEqual([
      { name: 'Message', captureIndex: 3 },
      { name: 'Timestamp', captureIndex: 1 },
      { name: 'Level', captureIndex: 2 },
    ]);
  });
});

describe('matchLine', () => {
  it('trims values and lets the last field take the rest of the line', () => {
    const template = compileOrThrow('{Timestamp} {Level} {Message}');
    expect(matchLine(template, bindDerivedFields(template), '2024-01-01 12:00:00 INFO x')).toEqual({
      kind: 'full',
      fields: { Timestamp: '2024-01-01', Level: '12:00:00', Message: 'INFO x' },
    });
  });

  it('tolerates variable whitespace in fuzzy mode', () => {
    const template = compileOrThrow('{A} = {B}');
    expect(matchLine(template, bindDerivedFields(template), 'x\t=\ty')).toEqual({
      kind: 'full',
      fields: { A: 'x', B: 'y' },
    });
  });

  it('requires repeated names to capture the same text', () => {
    const template = compileOrThrow('{A}-{A}');
    const bindings = bindDerivedFields(template);
    expect(matchLine(template, bindings, 'ab-ab')).toEqual({ kind: 'full', fields: { A: 'ab' } });
    expect(matchLine(template, bindings, 'ab-cd')).toEqual({ kind: 'none' });
  });

  it('only matches at the start of the line', () => {
    const template = compileOrThrow('{Code:d} {Word:w}');
    const bindings = bindDerivedFields(template);
    expect(matchLine(template, bindings, '404 found extra')).toEqual({
      kind: 'full',
      fields: { Code: '404', Word: 'found' },
    });
    expect(matchLine(template, bindings, 'abc 404 found')).toEqual({ kind: 'none' });
  });

  it('reports a partial match when a group does not participate', () => {
    const template = compileOrThrow('(a)|(b)', { syntax: 'regex' });
    expect(matchLine(template, bindDerivedFields(template), 'a')).toEqual({
      kind: 'partial',
      fields: { unnamed_1: 'a' },
      populated: 1,
    });
  });

  it('stores reserved object keys as ordinary fields', () => {
    const template = compileOrThrow('{__proto__} {constructor}');
    const outcome = matchLine(template, bindDerivedFields(template), 'x y');
    expect(outcome.kind).toBe('full');
    const fields: Record<string, string> = outcome.kind === 'full' ? outcome.fields : {};
    expect(Object.keys(fields)).toEqual(['__proto__', 'constructor']);
    expect(fields['__proto__']).toBe('x');
    expect(fields['constructor']).toBe('y');
  });
});
