/**
 * Ordering Rules
 *
 * Group order is two-tier: MAU equipment first, everything else after.
 * Inside a tier groups sort by numeric suffix, then prefix. Documents inside
 * a group sort by role precedence, then filename.
 */

import { ROLE_PRECEDENCE } from '../classification/roles';
import type { DocumentRole } from '../types';

export const PRIORITY_PREFIX = 'MAU';

export interface ParsedTag {
  prefix: string;
  number: number;
}

const TAG_PATTERN = /^([A-Z]+)-(\d+)$/;

export function parseTag(tag: string): ParsedTag | null {
  const match = TAG_PATTERN.exec(tag);
  if (!match) return null;
  return { prefix: match[1], number: parseInt(match[2], 10) };
}

/** Code-unit comparison, independent of locale */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function tagTier(tag: string): 0 | 1 {
  return parseTag(tag)?.prefix === PRIORITY_PREFIX ? 0 : 1;
}

export function compareTags(a: string, b: string): number {
  const tierDiff = tagTier(a) - tagTier(b);
  if (tierDiff !== 0) return tierDiff;

  const pa = parseTag(a);
  const pb = parseTag(b);
  if (pa && pb) {
    return pa.number - pb.number || compareStrings(pa.prefix, pb.prefix);
  }
  // Tags that are not PREFIX-NUMBER sort after well-formed ones
  if (pa) return -1;
  if (pb) return 1;
  return compareStrings(a, b);
}

export function compareDocuments(
  a: { role: DocumentRole; filename: string },
  b: { role: DocumentRole; filename: string }
): number {
  return ROLE_PRECEDENCE[a.role] - ROLE_PRECEDENCE[b.role] || compareStrings(a.filename, b.filename);
}
