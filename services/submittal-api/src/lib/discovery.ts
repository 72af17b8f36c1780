/**
 * Input Discovery
 *
 * Turns a source directory or an explicit file list into RawFile records.
 * Only document and image types the converter can render are kept.
 */

import fs from 'fs';
import path from 'path';
import { logger, type RawFile } from '@submittal/shared';

export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.pdf',
  '.doc',
  '.docx',
  '.jpg',
  '.jpeg',
  '.png',
];

export function isSupportedFile(filename: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(path.extname(filename).toLowerCase());
}

async function toRawFile(filePath: string): Promise<RawFile | null> {
  const resolved = path.resolve(filePath);
  const filename = path.basename(resolved);

  if (filename.startsWith('.') || filename.startsWith('~$')) {
    return null;
  }
  if (!isSupportedFile(filename)) {
    logger.debug('Skipping unsupported file', { filename });
    return null;
  }

  const stats = await fs.promises.stat(resolved);
  if (!stats.isFile()) return null;

  return { filename, path: resolved, size_bytes: stats.size };
}

/**
 * List supported files directly inside a directory, sorted by filename.
 */
export async function discoverDirectory(sourceDir: string): Promise<RawFile[]> {
  const entries = await fs.promises.readdir(sourceDir);
  return discoverFiles(entries.map((entry) => path.join(sourceDir, entry)));
}

/**
 * Resolve an explicit file list, dropping unsupported types. Missing files
 * are an error: the caller named them.
 */
export async function discoverFiles(filePaths: readonly string[]): Promise<RawFile[]> {
  const files: RawFile[] = [];
  for (const filePath of filePaths) {
    const file = await toRawFile(filePath);
    if (file) files.push(file);
  }

  files.sort((a, b) => (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0));

  logger.info('Input files discovered', {
    requested: filePaths.length,
    supported: files.length,
  });
  return files;
}
