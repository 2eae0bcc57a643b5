/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it, vi } from 'vitest';
import {
  extractLineStream,
  extractLines,
  type ExtractionOptions,
} from '../../src/core/extraction/extraction-engine.js';
import { compileOrThrow } from '../helpers/templates.js';

const STRICT: ExtractionOptions = { discipline: 'strict' };
const BEST_EFFORT: ExtractionOptions = { discipline: 'best-effort' };

const MIXED_LINES = ['web1 started', 'nomatch', '', '   ', 'web2 stopped after restart'];

describe('extractLines', () => {
  it('fails a strict run in which no line matches', () => {
    const run = extractLines(['hello'], compileOrThrow('{A} {B}'), STRICT);
    expect(run).toEqual({
      ok: false,
      totalLines: 1,
      matchedLines: 0,
      error: {
        kind: 'no-match-in-strict-mode',
        message: 'The template matched 0 of 1 lines. Please verify your template.',
      },
    });
  });

  it('keeps an unmatched line in the catch-all field under best effort', () => {
    const run = extractLines(['hello'], compileOrThrow('{A} {B}'), BEST_EFFORT);
    expect(run.ok && run.records).toEqual([
      {
        fields: { A: '---', B: '[UNPARSED] hello' },
        fieldOrder: ['A', 'B'],
        lineNumber: 1,
        matched: false,
      },
    ]);
  });

  it('succeeds with no records on input without content', () => {
    for (const options of [STRICT, BEST_EFFORT]) {
      expect(extractLines([], compileOrThrow('{A} {B}'), options)).toEqual({
        ok: true,
        totalLines: 0,
        matchedLines: 0,
        fieldOrder: ['A', 'B'],
        records: [],
      });
      expect(extractLines(['', '  '], compileOrThrow('{A} {B}'), options)).toMatchObject({
        ok: true,
        totalLines: 0,
        records: [],
      });
    }
  });

  it('emits one record per non-empty line under best effort', () => {
    const run = extractLines(MIXED_LINES, compileOrThrow('{Host} {Message}'), BEST_EFFORT);
    expect(run.ok && run.records.map((record) => [record.lineNumber, record.matched])).toEqual([
      [1, true],
      [2, false],
      [3, true],
    ]);
    expect(run.totalLines).toBe(3);
    expect(run.matchedLines).toBe(2);
  });

  it('produces a subset of the best-effort records under strict', () => {
    const template = compileOrThrow('{Host} {Message}');
    const strict = extractLines(MIXED_LINES, template, STRICT);
    const bestEffort = extractLines(MIXED_LINES, template, BEST_EFFORT);
    if (!strict.ok || !bestEffort.ok) {
      throw new Error('both runs should succeed');
    }
    expect(strict.records.map((record) => record.lineNumber)).toEqual([1, 3]);
    for (const record of strict.records) {
      expect(bestEffort.records).toContainEqual(record);
    }
    expect(strict.records[1]).toEqual({
      fields: { Host: 'web2', Message: 'stopped after restart' },
      fieldOrder: ['Host', 'Message'],
      lineNumber: 3,
      matched: true,
    });
  });

  it('yields identical results on repeated runs', () => {
    const template = compileOrThrow('{Host} {Message}');
    expect(extractLines(MIXED_LINES, template, BEST_EFFORT)).toEqual(
      extractLines(MIXED_LINES, template, BEST_EFFORT),
    );
  });

  it('collapses fallback records to a single FullLine field', () => {
    const run = extractLines(['web1 ok', 'solo'], compileOrThrow('{Host} {Message}'), {
      discipline: 'best-effort',
      fallback: 'full-line',
    });
    expect(run.ok && run.records[1]).toEqual({
      fields: { FullLine: 'solo' },
      fieldOrder: ['FullLine'],
      lineNumber: 2,
      matched: false,
    });
    expect(run.ok && run.fieldOrder).toEqual(['Host', 'Message']);
  });

  it('uses caller-supplied field names in their order', () => {
    const run = extractLines(['2024 INFO hi there'], compileOrThrow('{Timestamp} {Level} {Message}'), {
      discipline: 'strict',
      fieldSource: { kind: 'static', names: ['Time', 'Level', 'Msg'] },
    });
    expect(run.ok && run.records[0]).toEqual({
      fields: { Time: '2024', Level: 'INFO', Msg: 'hi there' },
      fieldOrder: ['Time', 'Level', 'Msg'],
      lineNumber: 1,
      matched: true,
    });
  });

  it('falls back to the derived fields when the static list is empty', () => {
    const run = extractLines(['a b'], compileOrThrow('{A} {B}'), {
      discipline: 'strict',
      fieldSource: { kind: 'static', names: [] },
    });
    expect(run.ok && run.fieldOrder).toEqual(['A', 'B']);
  });

  it('treats a partial match as unmatched', () => {
    const template = compileOrThrow('(a)|(b)', { syntax: 'regex' });
    expect(extractLines(['a'], template, STRICT).ok).toBe(false);
    const run = extractLines(['a'], template, BEST_EFFORT);
    expect(run.ok && run.records[0]?.fields).toEqual({ unnamed_1: '---', unnamed_2: '[UNPARSED] a' });
  });

  it('rejects a static field list that does not fit the captures', () => {
    const onProgress = vi.fn();
    for (const discipline of ['strict', 'best-effort'] as const) {
      expect(
        extractLines(['one two'], compileOrThrow('{A} {B}'), {
          discipline,
          fieldSource: { kind: 'static', names: ['X', 'Y', 'Z'] },
          observer: { onProgress },
        }),
      ).toEqual({
        ok: false,
        totalLines: 0,
        matchedLines: 0,
        error: {
          kind: 'invalid-template',
          message: 'Invalid template: Field count mismatch: 3 field name(s) supplied for 2 capture group(s).',
        },
      });
    }
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('keeps reserved object keys in the record', () => {
    const run = extractLines(['x y', 'solo'], compileOrThrow('{__proto__} {B}'), BEST_EFFORT);
    if (!run.ok) {
      throw new Error('run should succeed');
    }
    const [matched, fallback] = run.records;
    expect(matched?.fieldOrder).toEqual(['__proto__', 'B']);
    expect(Object.keys(matched?.fields ?? {})).toEqual(['__proto__', 'B']);
    expect(matched?.fields['__proto__']).toBe('x');
    expect(fallback?.fields['__proto__']).toBe('---');
    expect(fallback?.fields['B']).toBe('[UNPARSED] solo');
  });

  it('reports progress every thousand lines and once at the end', () => {
    const onProgress = vi.fn();
    const lines = Array.from({ length: 2500 }, (_, i) => `host${i} message`);
    extractLines(lines, compileOrThrow('{Host} {Message}'), { discipline: 'strict', observer: { onProgress } });
    expect(onProgress.mock.calls).toEqual([
      [{ processed: 1000, matched: 1000 }],
      [{ processed: 2000, matched: 2000 }],
      [{ processed: 2500, matched: 2500 }],
    ]);
  });
});

describe('extractLineStream', () => {
  it('matches the synchronous result', async () => {
    async function* source(): AsyncGenerator<string> {
      yield* MIXED_LINES;
    }
    const template = compileOrThrow('{Host} {Message}');
    await expect(extractLineStream(source(), template, BEST_EFFORT)).resolves.toEqual(
      extractLines(MIXED_LINES, template, BEST_EFFORT),
    );
  });

  it('propagates errors raised by the source', async () => {
    async function* failing(): AsyncGenerator<string> {
      yield 'a b';
      throw new Error('disk gone');
    }
    await expect(extractLineStream(failing(), compileOrThrow('{A} {B}'), STRICT)).rejects.toThrow('disk gone');
  });
});
