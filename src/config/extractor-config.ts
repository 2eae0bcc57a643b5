/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { fileURLToPath } from 'node:url';
import { SAMPLE_LINE_LIMIT } from '../core/suggestion/suggestion-engine.js';

export interface ExtractorEnvConfig {
  catalogPath: string;
  sampleLines: number;
}

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../catalog/patterns.json', import.meta.url),
);

export function resolveExtractorConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ExtractorEnvConfig {
  return {
    catalogPath: env['LOGSIFT_CATALOG'] || DEFAULT_CATALOG_PATH,
    sampleLines: parsePositiveInteger(env['LOGSIFT_SAMPLE_LINES']) ?? SAMPLE_LINE_LIMIT,
  };
}

const parsePositiveInteger = (value: string | undefined): number | undefined => {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
};
