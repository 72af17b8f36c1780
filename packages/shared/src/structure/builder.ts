/**
 * Structure Builder
 *
 * Turns the full batch of classified documents for one run into a Structure.
 * Needs the complete batch: tier and order decisions depend on every tag.
 */

import { CUTSHEET_TAG } from '../tagging/patterns';
import type {
  ClassifiedDocument,
  EquipmentGroup,
  ExtractionFailure,
  ExtractionMode,
  Structure,
  StructureDocument,
} from '../types';
import { compareDocuments, compareStrings, compareTags } from './ordering';

export const CUT_SHEETS_LABEL = 'Cut Sheets';

export interface BuildStructureOptions {
  mode: ExtractionMode;
  failures?: ExtractionFailure[];
  /** Display names carried over from an earlier structure, keyed by tag */
  displayNames?: ReadonlyMap<string, string>;
}

function toStructureDocument(doc: ClassifiedDocument, position: number): StructureDocument {
  return {
    filename: doc.file.filename,
    path: doc.file.path,
    size_bytes: doc.file.size_bytes,
    role: doc.role,
    document_type: doc.match.document_type,
    confidence: doc.match.confidence,
    source: doc.match.source,
    rule: doc.match.rule,
    position,
  };
}

/**
 * Recursively freeze a value so a built Structure cannot be patched in place.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

export function buildStructure(
  documents: readonly ClassifiedDocument[],
  options: BuildStructureOptions
): Structure {
  const byTag = new Map<string, ClassifiedDocument[]>();
  const cutSheets: ClassifiedDocument[] = [];

  for (const doc of documents) {
    if (doc.match.tag === CUTSHEET_TAG || doc.role === 'cutsheet') {
      cutSheets.push(doc);
      continue;
    }
    const bucket = byTag.get(doc.match.tag);
    if (bucket) {
      bucket.push(doc);
    } else {
      byTag.set(doc.match.tag, [doc]);
    }
  }

  const groups: EquipmentGroup[] = Array.from(byTag.keys())
    .sort(compareTags)
    .map((tag, index) => {
      const members = [...(byTag.get(tag) ?? [])].sort((a, b) =>
        compareDocuments(
          { role: a.role, filename: a.file.filename },
          { role: b.role, filename: b.file.filename }
        )
      );
      return {
        tag,
        display_name: options.displayNames?.get(tag) ?? tag,
        order: index + 1,
        documents: members.map((doc, i) => toStructureDocument(doc, i + 1)),
      };
    });

  const sortedCutSheets = [...cutSheets].sort((a, b) =>
    compareStrings(a.file.filename, b.file.filename)
  );

  const structure: Structure = {
    schema_version: '1.0',
    extraction_mode: options.mode,
    groups,
    cut_sheets:
      sortedCutSheets.length > 0
        ? {
            label: CUT_SHEETS_LABEL,
            documents: sortedCutSheets.map((doc, i) => toStructureDocument(doc, i + 1)),
          }
        : null,
    unclassified: [...(options.failures ?? [])]
      .sort((a, b) => compareStrings(a.filename, b.filename) || compareStrings(a.path, b.path))
      .map((f) => ({ ...f })),
  };

  return deepFreeze(structure);
}
