/**
 * Document Classifier
 *
 * Maps a (tag, document type) pair to exactly one DocumentRole.
 */

import { CUTSHEET_TAG } from '../tagging/patterns';
import type { DocumentRole } from '../types';
import { ROLE_RULES } from './roles';

export interface Classification {
  role: DocumentRole;
  /** Every role whose keyword appeared, in table order */
  matchedRoles: DocumentRole[];
  ambiguous: boolean;
}

function normalizeTypeString(documentType: string): string {
  return documentType.toLowerCase().replace(/[_\s]+/g, ' ');
}

export function classifyDocument(tag: string, documentType: string): Classification {
  if (tag === CUTSHEET_TAG) {
    return { role: 'cutsheet', matchedRoles: ['cutsheet'], ambiguous: false };
  }

  const haystack = normalizeTypeString(documentType);
  const matchedRoles = ROLE_RULES.filter((rule) => haystack.includes(rule.keyword)).map(
    (rule) => rule.role
  );

  return {
    role: matchedRoles[0] ?? 'unknown',
    matchedRoles,
    ambiguous: matchedRoles.length > 1,
  };
}

export function classifyRole(tag: string, documentType: string): DocumentRole {
  return classifyDocument(tag, documentType).role;
}
