/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import { main } from '../../src/cli/main.js';
import { createTempDir, type TempDirHarness } from '../helpers/temp-dir.js';

describe('Integration: CLI in JSON mode', () => {
  let temp: TempDirHarness;
  let written: string[];

  beforeEach(() => {
    temp = createTempDir();
    written = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    temp.cleanup();
  });

  it('previews a template against a single line', async () => {
    await main(['test', '--pattern', '{A} {B}', '--line', 'x y', '--json']);
    expect(written).toEqual(['{"success":true,"data":{"Fields":{"A":"x","B":"y"},"FieldOrder":["A","B"]},"error":null}\n']);
  });

  it('previews against the first non-empty line of the input', async () => {
    const inputPath = temp.write('app.log', '\n  \nfirst line\nsecond line\n');
    await main(['test', '--input', inputPath, '--pattern', '{A:d} {B}', '--json']);
    expect(written).toEqual([
      '{"success":false,"data":null,"error":"Pattern mismatch or capture group count is incorrect."}\n',
    ]);
  });

  it('prints the extraction envelope', async () => {
    const inputPath = temp.write('app.log', 'web1 started\nsolo\n');
    await main(['extract', '--input', inputPath, '--pattern', '{Host} {Message}', '--json']);
    expect(written).toEqual([
      '{"success":true,"data":[{"Fields":{"Host":"web1","Message":"started"},"FieldOrder":["Host","Message"]}],"error":null}\n',
    ]);
  });

  it('prints a failure envelope when the report cannot be written', async () => {
    const inputPath = temp.write('app.log', 'web1 started\n');
    temp.write('blocker', 'not a directory');
    const reportPath = temp.path('blocker/report.csv');
    await main(['extract', '--input', inputPath, '--pattern', '{Host} {Message}', '--output', reportPath, '--json']);

    expect(written).toHaveLength(1);
    const envelope: unknown = JSON.parse(written[0] ?? '');
    expect(envelope).toMatchObject({ success: false, data: null });
    const error = typeof envelope === 'object' && envelope !== null && 'error' in envelope ? envelope.error : undefined;
    expect(typeof error === 'string' && error.startsWith(`Could not write the report to ${reportPath}: `)).toBe(true);
  });

  it('prints the suggestion envelope', async () => {
    const catalogPath = temp.write(
      'catalog.json',
      JSON.stringify([{ pattern: '{Host}: {Message}', description: 'host', field_names: ['Host', 'Message'] }]),
    );
    const inputPath = temp.write('app.log', 'web1: started\n');
    await main(['suggest', '--input', inputPath, '--catalog', catalogPath, '--json']);
    expect(written).toEqual([
      '{"success":true,"data":{"pattern":"{Host}: {Message}","description":"host","field_names":["Host","Message"]},"error":null}\n',
    ]);
  });

  it('saves a valid template with its derived fields', async () => {
    const catalogPath = temp.path('saved.json');
    await main(['save-template', '--catalog', catalogPath, '--pattern', '[{Level}] {Message}']);
    expect(JSON.parse(readFileSync(catalogPath, 'utf8'))).toEqual([
      {
        pattern: '[{Level}] {Message}',
        description: 'Custom Template: [{Level}] {Message}',
        field_names: ['Level', 'Message'],
      },
    ]);
  });

  it('refuses to save an invalid template', async () => {
    await expect(
      main(['save-template', '--catalog', temp.path('saved.json'), '--pattern', '{A'])
    ).rejects.toThrow('Refusing to save an invalid template: Unclosed placeholder starting at position 0.');
  });

  it('requires a command', async () => {
    await expect(main(['--json'])).rejects.toThrow(
      'Missing command. Use one of: suggest, extract, test, save-template.',
    );
  });
});
