/**
 * Test Helpers
 *
 * Temporary directories, generated PDFs and in-process fakes for the
 * capability interfaces.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import type { PageTextExtractor, RawFile, TextExtractor } from '@submittal/shared';

/**
 * Create a scratch directory under the OS temp dir.
 */
export function makeTempDir(prefix = 'submittal-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * RawFile records for bare filenames under a fake input directory.
 */
export function rawFiles(filenames: string[], dir = '/input'): RawFile[] {
  return filenames.map((filename) => ({
    filename,
    path: path.join(dir, filename),
    size_bytes: 1024,
  }));
}

/**
 * Write a PDF with one page per entry, each page carrying its text.
 */
export async function writePdf(filePath: string, pageTexts: string[]): Promise<string> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (const text of pageTexts) {
    const page = doc.addPage([612, 792]);
    page.drawText(text, { x: 72, y: 700, size: 12, font });
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, await doc.save());
  return filePath;
}

export async function pageCountOf(filePath: string): Promise<number> {
  const doc = await PDFDocument.load(fs.readFileSync(filePath));
  return doc.getPageCount();
}

/**
 * Page text keyed by PDF path. Paths listed in `failing` throw.
 */
export class FakePageTextExtractor implements PageTextExtractor {
  readonly texts = new Map<string, string[]>();
  readonly failing = new Set<string>();
  readonly calls: string[] = [];

  set(pdfPath: string, pageTexts: string[]): this {
    this.texts.set(pdfPath, pageTexts);
    return this;
  }

  async extractPageTexts(pdfPath: string): Promise<string[]> {
    this.calls.push(pdfPath);
    if (this.failing.has(pdfPath)) {
      throw new Error(`cannot read text from ${path.basename(pdfPath)}`);
    }
    return this.texts.get(pdfPath) ?? [];
  }
}

/**
 * Document text keyed by input path. Paths listed in `failing` throw.
 */
export class FakeTextExtractor implements TextExtractor {
  readonly texts = new Map<string, string>();
  readonly failing = new Set<string>();
  readonly calls: string[] = [];

  set(filePath: string, text: string): this {
    this.texts.set(filePath, text);
    return this;
  }

  async extractText(filePath: string): Promise<string> {
    this.calls.push(filePath);
    if (this.failing.has(filePath)) {
      throw new Error('boom');
    }
    return this.texts.get(filePath) ?? '';
  }
}

/** The four-file project used across suites */
export const SCENARIO_FILES = [
  'AHU-10 - Technical Data Sheet.docx',
  'AHU-10 - Fan Curve.jpg',
  'MAU-5 - Technical Data Sheet.docx',
  'CS_Filter.pdf',
];
