/**
 * Extract Structure
 *
 * Entry point for the structuring half of the pipeline:
 * raw files -> tags -> roles -> Structure.
 */

import { classifyDocument } from '../classification/classifier';
import { logger } from '../logger';
import { classificationAmbiguitiesCounter, filesExtractedCounter } from '../metrics';
import {
  createVocabulary,
  extractTag,
  memoizeTextExtractor,
  primeBuildContext,
  type TagExtractionOptions,
} from '../tagging';
import type {
  ClassificationAmbiguity,
  ClassifiedDocument,
  ExtractionFailure,
  ExtractionMode,
  ExtractStructureResult,
  RawFile,
  TagAmbiguity,
  TextExtractor,
} from '../types';
import { buildStructure } from './builder';

export interface ExtractStructureDeps {
  /** Needed for content mode; filename mode never reads file contents */
  textExtractor?: TextExtractor;
  unitTypes?: readonly string[];
}

function dedupeByPath(files: readonly RawFile[]): RawFile[] {
  const seen = new Set<string>();
  const unique: RawFile[] = [];
  for (const file of files) {
    if (seen.has(file.path)) {
      logger.warn('Duplicate input file ignored', { filename: file.filename, path: file.path });
      continue;
    }
    seen.add(file.path);
    unique.push(file);
  }
  return unique;
}

export async function extractStructure(
  files: readonly RawFile[],
  mode: ExtractionMode,
  deps: ExtractStructureDeps = {}
): Promise<ExtractStructureResult> {
  const unique = dedupeByPath(files);
  const vocabulary = createVocabulary(deps.unitTypes);
  const options: TagExtractionOptions = {
    mode,
    textExtractor: deps.textExtractor ? memoizeTextExtractor(deps.textExtractor) : undefined,
  };

  if (mode === 'content' && !deps.textExtractor) {
    logger.warn('Content mode requested without a text extractor; using filename rules only');
  }

  const context = await primeBuildContext(unique, vocabulary, options);
  const outcomes = await Promise.all(unique.map((file) => extractTag(file, context, options)));

  const classified: ClassifiedDocument[] = [];
  const failures: ExtractionFailure[] = [];
  const ambiguities: ClassificationAmbiguity[] = [];
  const tagAmbiguities: TagAmbiguity[] = [];

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failures.push(outcome.failure);
      filesExtractedCounter.inc({ source: 'none', status: 'failed' });
      logger.warn('Tag extraction failed', {
        filename: outcome.failure.filename,
        reason: outcome.failure.reason,
      });
      continue;
    }

    filesExtractedCounter.inc({ source: outcome.match.source, status: 'tagged' });
    if (outcome.match.candidates) {
      tagAmbiguities.push({
        filename: outcome.file.filename,
        path: outcome.file.path,
        chosen_tag: outcome.match.tag,
        candidates: outcome.match.candidates,
      });
    }
    const classification = classifyDocument(outcome.match.tag, outcome.match.document_type);

    if (classification.ambiguous) {
      const ambiguity: ClassificationAmbiguity = {
        filename: outcome.file.filename,
        document_type: outcome.match.document_type,
        matched_roles: classification.matchedRoles,
        resolved_role: classification.role,
      };
      ambiguities.push(ambiguity);
      classificationAmbiguitiesCounter.inc();
      logger.warn('Document type matched more than one role', { ...ambiguity });
    }

    classified.push({ file: outcome.file, match: outcome.match, role: classification.role });
  }

  const structure = buildStructure(classified, { mode, failures });

  logger.info('Structure extracted', {
    mode,
    files: unique.length,
    groups: structure.groups.length,
    cut_sheets: structure.cut_sheets?.documents.length ?? 0,
    failures: failures.length,
    ambiguities: ambiguities.length,
    tag_ambiguities: tagAmbiguities.length,
  });

  return { structure, failures, ambiguities, tag_ambiguities: tagAmbiguities };
}
