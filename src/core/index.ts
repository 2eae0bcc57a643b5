/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './logging.js';
export * from './template/compiler.js';
export * from './template/matcher.js';
export * from './catalog/catalog.js';
export * from './suggestion/suggestion-engine.js';
export * from './extraction/extraction-engine.js';
export * from './analysis/record-filter.js';
export * from './analysis/field-summary.js';
export * from './analysis/line-preview.js';
