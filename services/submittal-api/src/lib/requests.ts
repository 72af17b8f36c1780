/**
 * Request Body Parsing
 *
 * Narrow untyped JSON bodies into the API request types.
 */

import type {
  AssembleRequest,
  CreateStructureRequest,
  ExtractionMode,
  QualityMode,
} from '@submittal/shared';

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

const QUALITY_MODES: readonly QualityMode[] = ['fast', 'balanced', 'high', 'maximum'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isQualityMode(value: unknown): value is QualityMode {
  return QUALITY_MODES.some((mode) => mode === value);
}

function isExtractionMode(value: unknown): value is ExtractionMode {
  return value === 'filename' || value === 'content';
}

export function parseCreateStructureRequest(body: unknown): Parsed<CreateStructureRequest> {
  if (!isRecord(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const { source_dir, files, mode } = body;
  const request: CreateStructureRequest = {};

  if (source_dir !== undefined) {
    if (typeof source_dir !== 'string' || source_dir.trim() === '') {
      return { ok: false, message: 'source_dir must be a non-empty string' };
    }
    request.source_dir = source_dir;
  }

  if (files !== undefined) {
    if (!Array.isArray(files) || !files.every((f): f is string => typeof f === 'string')) {
      return { ok: false, message: 'files must be an array of paths' };
    }
    request.files = files;
  }

  if (request.source_dir === undefined && request.files === undefined) {
    return { ok: false, message: 'source_dir or files is required' };
  }

  if (mode !== undefined) {
    if (!isExtractionMode(mode)) {
      return { ok: false, message: 'mode must be "filename" or "content"' };
    }
    request.mode = mode;
  }

  return { ok: true, value: request };
}

export function parseRetagRequest(body: unknown): Parsed<Record<string, string>> {
  if (!isRecord(body) || !isRecord(body.retags)) {
    return { ok: false, message: 'retags must be an object of filename -> tag' };
  }

  const retags: Record<string, string> = {};
  for (const [filename, tag] of Object.entries(body.retags)) {
    if (typeof tag !== 'string') {
      return { ok: false, message: `retag for ${filename} must be a string` };
    }
    retags[filename] = tag;
  }
  return { ok: true, value: retags };
}

export function parseAssembleRequest(body: unknown): Parsed<AssembleRequest> {
  if (body === undefined || body === null) {
    return { ok: true, value: {} };
  }
  if (!isRecord(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const { filter_pricing, quality_mode, output_filename } = body;
  const request: AssembleRequest = {};

  if (filter_pricing !== undefined) {
    if (typeof filter_pricing !== 'boolean') {
      return { ok: false, message: 'filter_pricing must be a boolean' };
    }
    request.filter_pricing = filter_pricing;
  }

  if (quality_mode !== undefined) {
    if (!isQualityMode(quality_mode)) {
      return { ok: false, message: `quality_mode must be one of ${QUALITY_MODES.join(', ')}` };
    }
    request.quality_mode = quality_mode;
  }

  if (output_filename !== undefined) {
    if (typeof output_filename !== 'string' || !/^[\w.\- ]+$/.test(output_filename)) {
      return { ok: false, message: 'output_filename must be a plain file name' };
    }
    request.output_filename = output_filename;
  }

  return { ok: true, value: request };
}

/**
 * Default and normalize the output file name: always a bare name ending in .pdf.
 */
export function outputFilenameFor(structureId: string, requested?: string): string {
  const name = requested?.trim() || `Submittal_${structureId}.pdf`;
  return name.toLowerCase().endsWith('.pdf') ? name : `${name}.pdf`;
}
