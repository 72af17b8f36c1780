/**
 * Document Role Table
 *
 * Ordered keyword table mapping a raw document-type string to a role.
 * Checked top to bottom; the first entry whose keyword appears wins, so a
 * type naming both "drawing" and "specification" is a drawing.
 */

import type { DocumentRole } from '../types';

export interface RoleRule {
  keyword: string;
  role: DocumentRole;
}

export const ROLE_RULES: readonly RoleRule[] = [
  { keyword: 'technical data', role: 'technical_data' },
  { keyword: 'fan curve', role: 'fan_curve' },
  { keyword: 'drawing', role: 'drawing' },
  { keyword: 'item summary', role: 'item_summary' },
  { keyword: 'specification', role: 'specification' },
];

/** Order of documents inside an equipment group */
export const ROLE_PRECEDENCE: Record<DocumentRole, number> = {
  technical_data: 0,
  fan_curve: 1,
  drawing: 2,
  item_summary: 3,
  specification: 4,
  unknown: 5,
  cutsheet: 6,
};

/** Bookmark labels */
export const ROLE_LABELS: Record<DocumentRole, string> = {
  technical_data: 'Technical Data',
  fan_curve: 'Fan Curve',
  drawing: 'Drawing',
  item_summary: 'Item Summary',
  specification: 'Specification',
  cutsheet: 'Cut Sheet',
  unknown: 'Other Document',
};
