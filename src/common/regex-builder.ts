/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Regex builder utilities for turning template pieces into regex source and
 * for inspecting the capture groups of caller-supplied regexes.
 */

const REGEX_SPECIAL = /[\\^$.*+?()[\]{}|]/g;
const WHITESPACE_RUN = /\s+/;

/**
 * Regex fragments for placeholder format specs. Fragments never contain
 * capturing groups, so capture numbering stays under the compiler's control.
 */
const FORMAT_SPEC_FRAGMENTS: Record<string, string> = {
  d: '[-+]?\\d+',
  f: '[-+]?\\d*\\.\\d+',
  w: '\\w+',
  W: '\\W+',
  S: '\\S+',
  l: '[A-Za-z]+',
  x: '[0-9A-Fa-f]+',
};

export const SUPPORTED_FORMAT_SPECS = Object.keys(FORMAT_SPEC_FRAGMENTS);

/**
 * Escapes special regex characters in text.
 * Also escapes control characters as hex sequences.
 */
export const escapeRegex = (text: string): string => {
  let escaped = text.replace(REGEX_SPECIAL, '\\$&');
  escaped = escaped.replace(/[\u0000-\u001f\u007f-\u009f]/g, (ch) => {
    const hex = ch.charCodeAt(0).toString(16).padStart(2, '0');
    return `\\x${hex}`;
  });
  return escaped;
};

/**
 * Escapes literal template text. In fuzzy mode every whitespace run becomes
 * `\s+`, so `a  b` in a line matches a template written as `a b`.
 */
export const buildLiteralFragment = (text: string, fuzzy: boolean): string => {
  if (!fuzzy) {
    return escapeRegex(text);
  }
  return text
    .split(WHITESPACE_RUN)
    .map((part) => escapeRegex(part))
    .join('\\s+');
};

/**
 * Returns the regex fragment a field should capture, or undefined when the
 * format spec is not supported.
 *
 * @param spec - Optional format spec (`d`, `w`, ...)
 * @param greedy - Untyped fields that end the template take the rest of the line
 */
export const buildFieldFragment = (spec: string | undefined, greedy: boolean): string | undefined => {
  if (spec === undefined) {
    return greedy ? '.+' : '.+?';
  }
  return FORMAT_SPEC_FRAGMENTS[spec];
};

/**
 * Lists the capturing groups of a regex source in the order the engine
 * numbers them, with the group name when it has one.
 */
export const describeCaptureGroups = (source: string): Array<{ name?: string }> => {
  const groups: Array<{ name?: string }> = [];
  let inClass = false;

  for (let i = 0; i < source.length; i += 1) {
    const ch = source[i];
    if (ch === '\\') {
      i += 1;
      continue;
    }
    if (inClass) {
      if (ch === ']') {
        inClass = false;
      }
      continue;
    }
    if (ch === '[') {
      inClass = true;
      continue;
    }
    if (ch !== '(') {
      continue;
    }
    if (source[i + 1] !== '?') {
      groups.push({});
      continue;
    }
    // (?<name>...) captures; (?<=...) and (?<!...) are lookbehinds.
    if (source[i + 2] === '<' && source[i + 3] !== '=' && source[i + 3] !== '!') {
      const end = source.indexOf('>', i + 3);
      if (end !== -1) {
        groups.push({ name: source.slice(i + 3, end) });
      }
    }
  }

  return groups;
};

/**
 * Counts capturing groups the way the engine does, by matching the empty
 * string against an alternation that always succeeds.
 */
export const countCaptureGroups = (regex: RegExp): number => {
  const emptyMatcher = new RegExp(`(?:${regex.source})|`, regex.flags.replace(/[gy]/g, ''));
  const match = emptyMatcher.exec('');
  return match ? match.length - 1 : 0;
};
