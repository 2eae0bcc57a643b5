/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Raised by the placeholder parser and returned (never thrown) by the
 * template compiler.
 */
export class TemplateCompileError extends Error {
  readonly position?: number;

  constructor(message: string, position?: number) {
    super(message);
    this.name = 'TemplateCompileError';
    this.position = position;
  }
}

export class CatalogFormatError extends Error {
  constructor(message: string) {
    super(`Catalog format invalid: ${message}`);
    this.name = 'CatalogFormatError';
  }
}
