/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { extname } from 'node:path';
import React from 'react';
import { render } from 'ink';
import type { TemplateDefinition } from '../types/index.js';
import { ExtractorApp } from '../ui/extractor-app.js';
import { PreviewView, SuggestionView } from '../ui/result-views.js';
import { parseArgs, type RunnerOptions } from './args.js';
import { runInteractiveSetup } from './interactive.js';
import { resolveExtractorConfigFromEnv, type ExtractorEnvConfig } from '../config/extractor-config.js';
import { compileTemplate } from '../core/template/compiler.js';
import { previewLine } from '../core/analysis/line-preview.js';
import { logConsole } from '../core/logging.js';
import type { CatalogLoadResult } from '../core/catalog/catalog.js';
import {
  openCatalogStore,
  readSampleLines,
  REPORT_FORMATS,
  toWireRecord,
  type ReportFormat,
} from '../tools/index.js';
import {
  runExtractionJob,
  suggestForFile,
  toExtractEnvelope,
  type ExtractionJobOptions,
} from '../runner/index.js';

export const main = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const options = parseArgs(argv);

  if (options.interactive) {
    await runInteractiveSetup(options);
  }

  const config = resolveExtractorConfigFromEnv();

  switch (options.command) {
    case 'suggest':
      await runSuggestCommand(options, config);
      return;
    case 'extract':
      await runExtractCommand(options, config);
      return;
    case 'test':
      await runTestCommand(options);
      return;
    case 'save-template':
      await runSaveTemplateCommand(options);
      return;
    default:
      throw new Error('Missing command. Use one of: suggest, extract, test, save-template.');
  }
};

const loadCatalog = async (
  options: RunnerOptions,
  config: ExtractorEnvConfig,
): Promise<CatalogLoadResult> => openCatalogStore(options.catalogPath ?? config.catalogPath).load();

const requireInput = (options: RunnerOptions): string => {
  if (!options.inputPath) {
    throw new Error('Missing --input <path> argument.');
  }
  return options.inputPath;
};

const inferReportFormat = (filePath: string): ReportFormat => {
  const extension = extname(filePath).slice(1).toLowerCase();
  return REPORT_FORMATS.find((format) => format === extension) ?? 'csv';
};

const printJson = (value: unknown): void => {
  process.stdout.write(`${JSON.stringify(value)}\n`);
};

async function runSuggestCommand(options: RunnerOptions, config: ExtractorEnvConfig): Promise<void> {
  const inputPath = requireInput(options);
  const catalog = await loadCatalog(options, config);
  const suggestion = await suggestForFile({
    inputPath,
    catalog: catalog.entries,
    sampleLines: config.sampleLines,
  });

  if (options.json) {
    printJson({ success: true, data: suggestion.template, error: null });
    return;
  }
  const { waitUntilExit, unmount } = render(
    <SuggestionView suggestion={suggestion} catalogSource={catalog.source} />,
  );
  unmount();
  await waitUntilExit();
}

async function runExtractCommand(options: RunnerOptions, config: ExtractorEnvConfig): Promise<void> {
  const inputPath = requireInput(options);
  const catalog = options.pattern === undefined ? await loadCatalog(options, config) : undefined;

  const jobOptions: ExtractionJobOptions = {
    inputPath,
    pattern: options.pattern,
    fieldNames: options.fieldNames,
    syntax: options.regex ? 'regex' : undefined,
    discipline: options.bestEffort ? 'best-effort' : 'strict',
    fallback: options.fallback,
    catalog: catalog?.entries,
    sampleLines: config.sampleLines,
    filter: options.filter !== undefined ? { query: options.filter, invert: options.invert } : undefined,
    summaryField: options.summaryField,
    report: options.outputPath
      ? {
          filePath: options.outputPath,
          format: options.format ?? inferReportFormat(options.outputPath),
          columns: options.columns,
        }
      : undefined,
  };

  if (options.json) {
    const result = await runExtractionJob(jobOptions);
    const envelope = toExtractEnvelope(result.run);
    if (!envelope.success) {
      printJson(envelope);
    } else if (result.reportError !== undefined) {
      printJson({ success: false, data: null, error: result.reportError });
    } else {
      printJson({ ...envelope, data: result.records.map(toWireRecord) });
    }
    if (result.summary) {
      logConsole(
        'info',
        `Values of ${options.summaryField}`,
        result.summary.map((entry): [string, number] => [entry.value, entry.count]),
      );
    }
    return;
  }

  const { waitUntilExit } = render(<ExtractorApp options={jobOptions} />);
  await waitUntilExit();
}

async function runTestCommand(options: RunnerOptions): Promise<void> {
  if (!options.pattern) {
    throw new Error('Missing --pattern <template> argument.');
  }
  let line = options.line;
  if (line === undefined) {
    const [first] = await readSampleLines(requireInput(options), 1);
    line = first ?? '';
  }

  const preview = previewLine(
    {
      pattern: options.pattern,
      description: '',
      fieldNames: options.fieldNames,
      syntax: options.regex ? 'regex' : undefined,
    },
    line,
  );

  if (options.json) {
    printJson(
      preview.ok
        ? { success: true, data: { Fields: preview.fields, FieldOrder: preview.fieldOrder }, error: null }
        : { success: false, data: null, error: preview.reason },
    );
    return;
  }
  const { waitUntilExit, unmount } = render(<PreviewView line={line} preview={preview} />);
  unmount();
  await waitUntilExit();
}

async function runSaveTemplateCommand(options: RunnerOptions): Promise<void> {
  if (!options.catalogPath) {
    throw new Error('Missing --catalog <path> argument.');
  }
  if (!options.pattern) {
    throw new Error('Missing --pattern <template> argument.');
  }

  const definition: TemplateDefinition = {
    pattern: options.pattern,
    description: options.description ?? `Custom Template: ${options.pattern}`,
    fieldNames: options.fieldNames,
    syntax: options.regex ? 'regex' : undefined,
  };
  const compiled = compileTemplate(definition);
  if (!compiled.ok) {
    throw new Error(`Refusing to save an invalid template: ${compiled.error.message}`);
  }

  await openCatalogStore(options.catalogPath).append({
    ...definition,
    fieldNames: definition.fieldNames ?? compiled.template.fieldNames,
  });
  logConsole('info', 'Template saved', [
    ['catalog', options.catalogPath],
    ['pattern', definition.pattern],
    ['fields', (definition.fieldNames ?? compiled.template.fieldNames).join(', ')],
  ]);
}
