/**
 * Image to PDF
 *
 * Places a JPEG or PNG on a single US Letter page, scaled to fit inside the
 * margins and centered. Wide images get a landscape page.
 */

import fs from 'fs';
import path from 'path';
import { PDFDocument, PageSizes, type PDFImage } from 'pdf-lib';

const MARGIN = 36;

export const IMAGE_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg', '.png'];

export function isImageFile(filePath: string): boolean {
  return IMAGE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

async function embedImage(doc: PDFDocument, filePath: string, bytes: Uint8Array): Promise<PDFImage> {
  const ext = path.extname(filePath).toLowerCase();
  try {
    return await (ext === '.png' ? doc.embedPng(bytes) : doc.embedJpg(bytes));
  } catch (error) {
    // pdf-lib rejects some decode failures with a bare string
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot decode ${path.basename(filePath)}: ${reason}`);
  }
}

export async function imageToPdf(inputPath: string, outputPath: string): Promise<string> {
  const bytes = await fs.promises.readFile(inputPath);
  const doc = await PDFDocument.create();
  const image = await embedImage(doc, inputPath, bytes);

  const [letterWidth, letterHeight] = PageSizes.Letter;
  const landscape = image.width > image.height;
  const pageWidth = landscape ? letterHeight : letterWidth;
  const pageHeight = landscape ? letterWidth : letterHeight;

  const scale = Math.min(
    (pageWidth - 2 * MARGIN) / image.width,
    (pageHeight - 2 * MARGIN) / image.height,
    1
  );
  const width = image.width * scale;
  const height = image.height * scale;

  const page = doc.addPage([pageWidth, pageHeight]);
  page.drawImage(image, {
    x: (pageWidth - width) / 2,
    y: (pageHeight - height) / 2,
    width,
    height,
  });

  await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.promises.writeFile(outputPath, await doc.save());
  return outputPath;
}
