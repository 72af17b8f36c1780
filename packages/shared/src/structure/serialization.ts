/**
 * Structure Serialization
 *
 * Stable JSON for persisted structures. Parsing validates against the schema,
 * then honours the order a human may have edited: groups follow `order`,
 * documents follow `position`, and both are renumbered from 1.
 */

import { StructureValidationError } from '../errors';
import { isStructure, validateStructure } from '../schemas';
import { normalizeTag } from '../tagging/patterns';
import type { EquipmentGroup, Structure, StructureDocument } from '../types';
import { deepFreeze } from './builder';

export function serializeStructure(structure: Structure): string {
  return `${JSON.stringify(structure, null, 2)}\n`;
}

function renumberDocuments(documents: StructureDocument[]): StructureDocument[] {
  return documents
    .map((doc, index) => ({ doc, index }))
    .sort((a, b) => a.doc.position - b.doc.position || a.index - b.index)
    .map(({ doc }, i) => ({ ...doc, position: i + 1 }));
}

function renumberGroups(groups: EquipmentGroup[]): EquipmentGroup[] {
  return groups
    .map((group, index) => ({ group, index }))
    .sort((a, b) => a.group.order - b.group.order || a.index - b.index)
    .map(({ group }, i) => ({
      ...group,
      order: i + 1,
      documents: renumberDocuments(group.documents),
    }));
}

function semanticErrors(structure: Structure): string[] {
  const errors: string[] = [];

  const tags = new Set<string>();
  for (const group of structure.groups) {
    const tag = normalizeTag(group.tag) ?? group.tag;
    if (tag !== group.tag) {
      errors.push(`/groups: tag ${group.tag} is not normalized (use ${tag})`);
    }
    if (tags.has(tag)) {
      errors.push(`/groups: duplicate tag ${tag}`);
    }
    tags.add(tag);
  }

  const paths = new Set<string>();
  const allDocuments = [
    ...structure.groups.flatMap((g) => g.documents),
    ...(structure.cut_sheets?.documents ?? []),
  ];
  for (const doc of allDocuments) {
    if (paths.has(doc.path)) {
      errors.push(`document listed more than once: ${doc.path}`);
    }
    paths.add(doc.path);
  }

  for (const doc of structure.cut_sheets?.documents ?? []) {
    if (doc.role !== 'cutsheet') {
      errors.push(`/cut_sheets: ${doc.filename} has role ${doc.role}`);
    }
  }
  for (const group of structure.groups) {
    for (const doc of group.documents) {
      if (doc.role === 'cutsheet') {
        errors.push(`/groups/${group.tag}: ${doc.filename} has role cutsheet`);
      }
    }
  }

  return errors;
}

/**
 * Parse a persisted structure from JSON text or an already-parsed value.
 * Throws StructureValidationError when it does not match the contract.
 */
export function parseStructure(input: string | unknown): Structure {
  let data: unknown = input;
  if (typeof input === 'string') {
    try {
      data = JSON.parse(input);
    } catch (error) {
      throw new StructureValidationError([
        `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }
  }

  if (!isStructure(data)) {
    throw new StructureValidationError(validateStructure(data).errors ?? ['invalid structure']);
  }

  const errors = semanticErrors(data);
  if (errors.length > 0) {
    throw new StructureValidationError(errors);
  }

  return deepFreeze({
    schema_version: data.schema_version,
    extraction_mode: data.extraction_mode,
    groups: renumberGroups(data.groups),
    cut_sheets: data.cut_sheets
      ? { label: data.cut_sheets.label, documents: renumberDocuments(data.cut_sheets.documents) }
      : null,
    unclassified: data.unclassified.map((f) => ({ ...f })),
  });
}
