/**
 * Object Store
 *
 * Filesystem-backed persistence shared by submittal-api and the assembler
 * worker (both mount OBJECT_STORE_PATH):
 *
 *   structures/<structure_id>.json   persisted, human-editable structures
 *   results/<job_id>.json            assembly job results
 *   renders/<job_id>/                PDFs rendered from the inputs
 *   titles/<job_id>/                 generated title pages
 *   outputs/                         final submittal PDFs and manifests
 */

import fs from 'fs';
import path from 'path';
import { config } from './config';
import { NotFoundError } from './errors';
import { logger } from './logger';
import { parseStructure, serializeStructure } from './structure/serialization';
import type { JobResult, Structure } from './types';

const ID_PATTERN = /^[0-9A-Za-z_-]+$/;

function assertSafeId(id: string): void {
  if (!ID_PATTERN.test(id)) {
    throw new NotFoundError(`Invalid identifier: ${id}`);
  }
}

/** fs errors may come from another realm; match on the errno code alone. */
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class StructureStore {
  readonly root: string;

  constructor(root: string = config.objectStorePath) {
    this.root = root;
  }

  structurePath(structureId: string): string {
    assertSafeId(structureId);
    return path.join(this.root, 'structures', `${structureId}.json`);
  }

  resultPath(jobId: string): string {
    assertSafeId(jobId);
    return path.join(this.root, 'results', `${jobId}.json`);
  }

  /** Scratch folders are per job */
  rendersDir(jobId: string): string {
    assertSafeId(jobId);
    return path.join(this.root, 'renders', jobId);
  }

  titlesDir(jobId: string): string {
    assertSafeId(jobId);
    return path.join(this.root, 'titles', jobId);
  }

  outputPath(filename: string): string {
    return path.join(this.root, 'outputs', path.basename(filename));
  }

  async saveStructure(structureId: string, structure: Structure): Promise<void> {
    const target = this.structurePath(structureId);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, serializeStructure(structure), 'utf-8');
    logger.debug('Structure saved', { structureId, path: target });
  }

  /**
   * Load and validate a persisted structure. Throws NotFoundError when absent.
   */
  async loadStructure(structureId: string): Promise<Structure> {
    const source = this.structurePath(structureId);
    let raw: string;
    try {
      raw = await fs.promises.readFile(source, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(`Structure ${structureId} not found`);
      }
      throw error;
    }
    return parseStructure(raw);
  }

  async saveJobResult(result: JobResult): Promise<void> {
    const target = this.resultPath(result.job_id);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
  }

  async loadJobResult(jobId: string): Promise<JobResult | null> {
    const source = this.resultPath(jobId);
    if (!fs.existsSync(source)) {
      return null;
    }
    const result: JobResult = JSON.parse(await fs.promises.readFile(source, 'utf-8'));
    return result;
  }
}
