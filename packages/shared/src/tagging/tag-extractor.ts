/**
 * Tag Extractor
 *
 * Resolves each input file to an equipment tag plus a document-type string,
 * from the filename first and, in content mode, from the document text.
 * Extraction never throws for a single file: a file that cannot be tagged
 * comes back as an ExtractionFailure.
 */

import { logger } from '../logger';
import type {
  ExtractionFailure,
  ExtractionMode,
  RawFile,
  TagMatch,
  TextExtractor,
} from '../types';
import { TagBuildContext } from './build-context';
import {
  CONTENT_RULES,
  CUTSHEET_DOCUMENT_TYPE,
  CUTSHEET_PREFIX_PATTERN,
  CUTSHEET_TAG,
  EXPLICIT_TAG_PATTERN,
  FILENAME_RULES,
  LABELED_TAG_PATTERN,
  NUMERIC_PREFIX_PATTERN,
  cleanDocumentType,
  documentTypeFromFilename,
  fileStem,
  formatTag,
  normalizeNumber,
  type TagVocabulary,
} from './patterns';

export type FilenameOutcome =
  | { matched: true; match: TagMatch }
  | { matched: false; reason: string };

export type ExtractionOutcome =
  | { ok: true; file: RawFile; match: TagMatch }
  | { ok: false; failure: ExtractionFailure };

export interface TagExtractionOptions {
  mode: ExtractionMode;
  textExtractor?: TextExtractor;
}

/**
 * Apply the filename rules in order.
 */
export function matchFilename(filename: string, context: TagBuildContext): FilenameOutcome {
  const stem = fileStem(filename);
  let reason = 'no filename rule matched';

  for (const rule of FILENAME_RULES) {
    switch (rule.kind) {
      case 'explicit_tag': {
        const match = EXPLICIT_TAG_PATTERN.exec(stem);
        if (!match) break;
        const documentType = cleanDocumentType(match[3]);
        if (documentType === '') break;
        return {
          matched: true,
          match: {
            tag: formatTag(match[1], match[2]),
            document_type: documentType,
            confidence: rule.confidence,
            source: 'filename',
            rule: rule.kind,
          },
        };
      }

      case 'numeric_prefix': {
        const match = NUMERIC_PREFIX_PATTERN.exec(stem);
        if (!match) break;
        const number = normalizeNumber(match[1]);
        const tag = context.resolve(number);
        if (tag !== undefined) {
          return {
            matched: true,
            match: {
              tag,
              document_type: cleanDocumentType(match[2]),
              confidence: rule.confidence,
              source: 'filename',
              rule: rule.kind,
            },
          };
        }
        reason = context.isAmbiguous(number)
          ? `numeric prefix ${number} maps to more than one tag`
          : `numeric prefix ${number} has no known tag`;
        break;
      }

      case 'cutsheet_prefix': {
        if (!CUTSHEET_PREFIX_PATTERN.test(stem)) break;
        return {
          matched: true,
          match: {
            tag: CUTSHEET_TAG,
            document_type: CUTSHEET_DOCUMENT_TYPE,
            confidence: rule.confidence,
            source: 'filename',
            rule: rule.kind,
          },
        };
      }
    }
  }

  return { matched: false, reason };
}

interface ContentHit {
  tag: string;
  index: number;
}

function collectHits(text: string, pattern: RegExp): ContentHit[] {
  return Array.from(text.matchAll(pattern), (m) => ({
    tag: formatTag(m[1], m[2]),
    index: m.index ?? 0,
  }));
}

/**
 * Find a tag in document text. Labeled tags win over bare tokens; within a
 * rule the first occurrence wins. When several distinct tags appear, all of
 * them are reported as candidates.
 */
export function matchContent(
  text: string,
  vocabulary: TagVocabulary
): Omit<TagMatch, 'document_type'> | null {
  const hitsByRule = {
    labeled_tag: collectHits(text, LABELED_TAG_PATTERN),
    bare_tag: collectHits(text, vocabulary.barePattern),
  };

  const allHits = [...hitsByRule.labeled_tag, ...hitsByRule.bare_tag].sort(
    (a, b) => a.index - b.index
  );
  const candidates = Array.from(new Set(allHits.map((h) => h.tag)));

  for (const rule of CONTENT_RULES) {
    const first = hitsByRule[rule.kind][0];
    if (!first) continue;

    const result: Omit<TagMatch, 'document_type'> = {
      tag: first.tag,
      confidence: rule.confidence,
      source: 'content',
      rule: rule.kind,
    };
    if (candidates.length > 1) {
      result.candidates = candidates;
      logger.warn('Document content names more than one tag', {
        chosen: first.tag,
        candidates,
      });
    }
    return result;
  }

  return null;
}

/**
 * Sequential priming pass: sorted by filename, explicit-tag files register
 * their number; in content mode numeric-prefix files register the tag found
 * in their text. Returns the frozen context.
 */
export async function primeBuildContext(
  files: RawFile[],
  vocabulary: TagVocabulary,
  options: TagExtractionOptions
): Promise<TagBuildContext> {
  const context = new TagBuildContext(vocabulary);
  const ordered = [...files].sort((a, b) =>
    a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0
  );

  for (const file of ordered) {
    const stem = fileStem(file.filename);

    const explicit = EXPLICIT_TAG_PATTERN.exec(stem);
    if (explicit && cleanDocumentType(explicit[3]) !== '') {
      context.register(explicit[2], formatTag(explicit[1], explicit[2]), file.filename);
      continue;
    }

    const numeric = NUMERIC_PREFIX_PATTERN.exec(stem);
    if (!numeric || options.mode !== 'content' || !options.textExtractor) continue;

    try {
      const text = await options.textExtractor.extractText(file.path);
      const content = matchContent(text, vocabulary);
      if (content) {
        context.register(numeric[1], content.tag, file.filename);
      }
    } catch (error) {
      logger.warn('Text extraction failed while priming tag context', {
        filename: file.filename,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return context.freeze();
}

function failure(file: RawFile, reason: string): ExtractionOutcome {
  return {
    ok: false,
    failure: { filename: file.filename, path: file.path, size_bytes: file.size_bytes, reason },
  };
}

/**
 * Resolve a single file against a frozen build context.
 */
export async function extractTag(
  file: RawFile,
  context: TagBuildContext,
  options: TagExtractionOptions
): Promise<ExtractionOutcome> {
  const byName = matchFilename(file.filename, context);
  if (byName.matched) {
    logger.debug('Tag resolved from filename', {
      filename: file.filename,
      tag: byName.match.tag,
      rule: byName.match.rule,
    });
    return { ok: true, file, match: byName.match };
  }

  if (options.mode !== 'content' || !options.textExtractor) {
    return failure(file, byName.reason);
  }

  let text: string;
  try {
    text = await options.textExtractor.extractText(file.path);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return failure(file, `${byName.reason}; text extraction failed: ${message}`);
  }

  const byContent = matchContent(text, context.vocabulary);
  if (!byContent) {
    return failure(file, `${byName.reason}; no tag found in content`);
  }

  logger.debug('Tag resolved from content', {
    filename: file.filename,
    tag: byContent.tag,
    rule: byContent.rule,
  });

  return {
    ok: true,
    file,
    match: {
      ...byContent,
      document_type: documentTypeFromFilename(file.filename),
    },
  };
}

/**
 * Wrap a TextExtractor so each path is read once per run.
 */
export function memoizeTextExtractor(extractor: TextExtractor): TextExtractor {
  const cache = new Map<string, Promise<string>>();
  return {
    extractText(path: string): Promise<string> {
      let pending = cache.get(path);
      if (!pending) {
        pending = extractor.extractText(path);
        cache.set(path, pending);
      }
      return pending;
    },
  };
}
