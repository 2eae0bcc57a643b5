/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  extractFile,
  suggestForFile,
  runExtract,
  runSuggest,
  toExtractEnvelope,
  type Envelope,
  type ExtractEnvelope,
  type ExtractFileOptions,
  type SuggestEnvelope,
  type SuggestFileOptions,
} from './log-extractor.js';

export {
  runExtractionJob,
  type ExtractionJobObserver,
  type ExtractionJobOptions,
  type ExtractionJobResult,
} from './extraction-job.js';
