/**
 * Tag Extraction Patterns
 *
 * Regular expressions and rule tables for pulling an equipment tag out of a
 * filename or out of document text.
 *
 * Filename forms handled, in priority order:
 * - "AHU-10 - Technical Data Sheet.docx"  -> explicit tag + document type, any alphabetic prefix
 * - "10_Item Summary.docx"                -> numeric prefix, resolved through the build context
 * - "CS_Filter.pdf"                       -> cut sheet
 *
 * Content forms:
 * - "Unit Tag: AHU-10" / "Equipment ID: MAU-5"  -> labeled tag
 * - bare "EF-3" tokens using a known unit-type prefix
 */

import path from 'path';
import { config } from '../config';
import type { FilenameRuleName, ContentRuleName } from '../types';

export const CUTSHEET_TAG = 'CUTSHEET';
export const CUTSHEET_DOCUMENT_TYPE = 'cutsheet';

/**
 * Filename rules, checked top to bottom. The first rule that yields a tag wins.
 */
export interface FilenameRule {
  kind: FilenameRuleName;
  confidence: number;
}

export const FILENAME_RULES: readonly FilenameRule[] = [
  { kind: 'explicit_tag', confidence: 1.0 },
  { kind: 'numeric_prefix', confidence: 0.8 },
  { kind: 'cutsheet_prefix', confidence: 1.0 },
];

export interface ContentRule {
  kind: ContentRuleName;
  confidence: number;
}

/** Labeled tags outrank bare tokens regardless of position. */
export const CONTENT_RULES: readonly ContentRule[] = [
  { kind: 'labeled_tag', confidence: 0.9 },
  { kind: 'bare_tag', confidence: 0.6 },
];

/** "10_Item Summary", "10 - Item Summary" */
export const NUMERIC_PREFIX_PATTERN = /^(\d+)(?:_|\s*-\s*)(.+)$/;

/**
 * PREFIX[-_ ]NUMBER + separator + document type, anchored to the whole stem.
 * A CS prefix is left to the cut-sheet rule.
 */
export const EXPLICIT_TAG_PATTERN =
  /^(?!CS[-_ ]?\d)([A-Za-z]+)[-_ ]?(\d+)(?:\s*-\s*|_-_|_|\s+)(.+)$/i;

/** Leading PREFIX[-_ ]NUMBER on a stem, used to find the document-type remainder */
export const LEADING_TAG_PATTERN = /^[A-Za-z]+[-_ ]?\d+\b/;

/** "CS_Filter", "CS-Damper", "CS Light Kit", "CS" */
export const CUTSHEET_PREFIX_PATTERN = /^CS(?:[\s_-]|$)/i;

/** "Unit Tag: AHU-10", "Equipment ID: mau_05" */
export const LABELED_TAG_PATTERN = /\b(?:Unit\s+Tag|Equipment\s+ID)\s*:\s*([A-Za-z]+)[-_ ]?(\d+)\b/gi;

/**
 * Unit-type vocabulary for bare tags in document text.
 */
export interface TagVocabulary {
  unitTypes: readonly string[];
  /** PREFIX-NUMBER tokens anywhere in text (global) */
  barePattern: RegExp;
}

/**
 * Compile a vocabulary. Longer prefixes are tried first so OAHU is not read as AHU.
 */
export function createVocabulary(
  unitTypes: readonly string[] = config.supportedUnitTypes
): TagVocabulary {
  const normalized = Array.from(
    new Set(unitTypes.map((t) => t.trim().toUpperCase()).filter((t) => /^[A-Z]+$/.test(t)))
  ).sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));

  if (normalized.length === 0) {
    throw new Error('Tag vocabulary needs at least one unit type');
  }

  return {
    unitTypes: normalized,
    barePattern: new RegExp(`\\b(${normalized.join('|')})[-_](\\d+)\\b`, 'g'),
  };
}

/**
 * Strip leading zeros from the numeric part of a tag or prefix.
 */
export function normalizeNumber(digits: string): string {
  return String(parseInt(digits, 10));
}

/**
 * Render a tag in canonical PREFIX-NUMBER form.
 */
export function formatTag(prefix: string, digits: string): string {
  return `${prefix.toUpperCase()}-${normalizeNumber(digits)}`;
}

/**
 * Normalize a free-form tag: "ahu-01", "AHU_1" and "AHU 1" all become "AHU-1".
 * Returns null when the input is not a PREFIX-NUMBER tag.
 */
export function normalizeTag(raw: string): string | null {
  const trimmed = raw.trim();
  if (trimmed.toUpperCase() === CUTSHEET_TAG) return CUTSHEET_TAG;

  const match = trimmed.match(/^([A-Za-z]+)[-_ ]?(\d+)$/);
  if (!match) return null;
  return formatTag(match[1], match[2]);
}

/**
 * Filename without its extension.
 */
export function fileStem(filename: string): string {
  return path.parse(filename).name.trim();
}

/**
 * Clean a document-type fragment: underscores to spaces, collapsed whitespace,
 * stray separators trimmed.
 */
export function cleanDocumentType(raw: string): string {
  return raw
    .replace(/_/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/^[\s-]+|[\s-]+$/g, '')
    .trim();
}

/**
 * Document type for a file whose tag did not come from its name:
 * the stem minus any leading numeric prefix or tag.
 */
export function documentTypeFromFilename(filename: string): string {
  let stem = fileStem(filename);
  const numeric = stem.match(NUMERIC_PREFIX_PATTERN);
  if (numeric) {
    stem = numeric[2];
  } else {
    stem = stem.replace(LEADING_TAG_PATTERN, '');
  }
  return cleanDocumentType(stem);
}
