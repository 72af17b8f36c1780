/**
 * Document Text Extraction
 *
 * Plain text for content-mode tagging and per-page text for pricing
 * detection. PDFs go through pdfjs-dist, .docx through mammoth, legacy .doc
 * files through a printable-run scan. Anything else has no text.
 */

import fs from 'fs';
import path from 'path';
import * as mammoth from 'mammoth';
import { logger } from '../logger';
import type { PageTextExtractor, TextExtractor } from '../types';

/**
 * Extract the text of every page of a PDF, preserving line structure.
 *
 * Text items are grouped by Y position so each visual line becomes one line
 * of output; the pricing filter works line by line.
 */
export async function extractPdfPageTexts(filePath: string): Promise<string[]> {
  const pdfjsLib = await import('pdfjs-dist');

  const data = new Uint8Array(await fs.promises.readFile(filePath));
  const pdf = await pdfjsLib.getDocument({ data }).promise;

  try {
    const pages: string[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Round Y so items on the same visual line group together
      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);
        const line = itemsByY.get(y);
        if (line) {
          line.push({ x, str: item.str });
        } else {
          itemsByY.set(y, [{ x, str: item.str }]);
        }
      }

      // Top to bottom, then left to right
      const lines = Array.from(itemsByY.entries())
        .sort(([a], [b]) => b - a)
        .map(([, items]) =>
          items
            .sort((a, b) => a.x - b.x)
            .map((item) => item.str)
            .join(' ')
            .trim()
        )
        .filter((line) => line !== '');

      pages.push(lines.join('\n'));
    }

    logger.debug('PDF text extraction complete', { filePath, totalPages: pdf.numPages });
    return pages;
  } finally {
    await pdf.destroy();
  }
}

async function extractDocxText(filePath: string): Promise<string> {
  const result = await mammoth.extractRawText({ path: filePath });
  return result.value;
}

/**
 * Binary .doc files: keep runs of printable characters long enough to be words.
 */
async function extractLegacyDocText(filePath: string): Promise<string> {
  const buffer = await fs.promises.readFile(filePath);
  const runs = buffer.toString('latin1').match(/[\x20-\x7E\t\r\n]{4,}/g) ?? [];
  return runs.join('\n');
}

export const documentTextExtractor: TextExtractor = {
  async extractText(filePath: string): Promise<string> {
    const ext = path.extname(filePath).toLowerCase();
    switch (ext) {
      case '.pdf':
        return (await extractPdfPageTexts(filePath)).join('\n');
      case '.docx':
        return extractDocxText(filePath);
      case '.doc':
        return extractLegacyDocText(filePath);
      default:
        return '';
    }
  },
};

export const pdfPageTextExtractor: PageTextExtractor = {
  extractPageTexts: extractPdfPageTexts,
};
