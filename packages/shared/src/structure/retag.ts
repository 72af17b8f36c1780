/**
 * Re-tagging
 *
 * Applies human tag edits (filename -> tag) and rebuilds a wholly new
 * Structure from the result. Unclassified files named in the edits are pulled
 * into the structure; display names of surviving groups are kept.
 */

import { classifyDocument } from '../classification/classifier';
import { StructureValidationError } from '../errors';
import {
  CUTSHEET_DOCUMENT_TYPE,
  CUTSHEET_TAG,
  documentTypeFromFilename,
  normalizeTag,
} from '../tagging/patterns';
import type { ClassifiedDocument, ExtractionFailure, Structure, StructureDocument } from '../types';
import { buildStructure } from './builder';

export type Retags = Readonly<Record<string, string>>;

function normalizeRetags(retags: Retags): Map<string, string> {
  const normalized = new Map<string, string>();
  const errors: string[] = [];

  for (const [filename, rawTag] of Object.entries(retags)) {
    const tag = normalizeTag(rawTag);
    if (tag === null) {
      errors.push(`${filename}: "${rawTag}" is not a PREFIX-NUMBER tag`);
    } else {
      normalized.set(filename, tag);
    }
  }

  if (errors.length > 0) {
    throw new StructureValidationError(errors);
  }
  return normalized;
}

function reclassify(
  doc: StructureDocument,
  currentTag: string,
  retags: Map<string, string>
): ClassifiedDocument {
  const newTag = retags.get(doc.filename);
  const tag = newTag ?? currentTag;
  const changed = newTag !== undefined && newTag !== currentTag;

  const documentType =
    changed && tag === CUTSHEET_TAG ? CUTSHEET_DOCUMENT_TYPE : doc.document_type;

  return {
    file: { filename: doc.filename, path: doc.path, size_bytes: doc.size_bytes },
    match: {
      tag,
      document_type: documentType,
      confidence: changed ? 1.0 : doc.confidence,
      source: doc.source,
      rule: changed ? 'manual' : doc.rule,
    },
    role: changed ? classifyDocument(tag, documentType).role : doc.role,
  };
}

export function retagStructure(
  structure: Structure,
  retags: Retags
): Structure {
  const normalized = normalizeRetags(retags);

  const documents: ClassifiedDocument[] = [
    ...structure.groups.flatMap((group) =>
      group.documents.map((doc) => reclassify(doc, group.tag, normalized))
    ),
    ...(structure.cut_sheets?.documents ?? []).map((doc) =>
      reclassify(doc, CUTSHEET_TAG, normalized)
    ),
  ];

  const stillUnclassified: ExtractionFailure[] = [];
  for (const failure of structure.unclassified) {
    const tag = normalized.get(failure.filename);
    if (tag === undefined) {
      stillUnclassified.push(failure);
      continue;
    }
    const documentType =
      tag === CUTSHEET_TAG
        ? CUTSHEET_DOCUMENT_TYPE
        : documentTypeFromFilename(failure.filename);
    documents.push({
      file: { filename: failure.filename, path: failure.path, size_bytes: failure.size_bytes },
      match: {
        tag,
        document_type: documentType,
        confidence: 1.0,
        source: 'filename',
        rule: 'manual',
      },
      role: classifyDocument(tag, documentType).role,
    });
  }

  const displayNames = new Map(
    structure.groups
      .filter((group) => group.display_name !== group.tag)
      .map((group) => [group.tag, group.display_name] as const)
  );

  return buildStructure(documents, {
    mode: structure.extraction_mode,
    failures: stillUnclassified,
    displayNames,
  });
}
