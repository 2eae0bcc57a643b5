/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Template type definitions shared by the compiler, the catalog stores and
 * the runner. Kept here to avoid circular imports between core and tools.
 */

export type TemplateSyntax = 'placeholder' | 'regex';

export interface TemplateDefinition {
  pattern: string;
  description: string;
  // Absent means the field list is derived from the pattern itself.
  fieldNames?: string[];
  syntax?: TemplateSyntax;
}

/**
 * Shape returned to callers of the suggest operation and stored on disk.
 */
export interface TemplateDescriptor {
  pattern: string;
  description: string;
  field_names: string[];
  syntax?: TemplateSyntax;
}

export interface CaptureSlot {
  // Index into the RegExp match array.
  index: number;
  name?: string;
}

export interface CompiledTemplate {
  definition: TemplateDefinition;
  syntax: TemplateSyntax;
  source: string;
  regex: RegExp;
  captures: CaptureSlot[];
  fieldNames: string[];
}

export interface FieldBinding {
  name: string;
  captureIndex?: number;
}

export type MatchOutcome =
  | { kind: 'full'; fields: Record<string, string> }
  | { kind: 'partial'; fields: Record<string, string>; populated: number }
  | { kind: 'none' };
