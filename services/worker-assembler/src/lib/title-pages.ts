/**
 * Title Pages
 *
 * One US Letter page per section with the section name in large bold type,
 * centered on the page.
 */

import fs from 'fs';
import path from 'path';
import { PDFDocument, PageSizes, StandardFonts, rgb } from 'pdf-lib';
import type { TitlePageGenerator } from '@submittal/shared';

export const TITLE_FONT_SIZE = 48;
const MIN_FONT_SIZE = 18;
const MARGIN = 72;

/** Named by section key (tag or CUTSHEET), never by display name */
export function titlePageFilename(key: string): string {
  return `title_${key.replace(/[^A-Za-z0-9-]+/g, '_').replace(/^_+|_+$/g, '') || 'section'}.pdf`;
}

export class PdfLibTitlePageGenerator implements TitlePageGenerator {
  readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  async generateTitlePage(title: string, key: string): Promise<string> {
    const doc = await PDFDocument.create();
    doc.setTitle(title);
    const font = await doc.embedFont(StandardFonts.HelveticaBold);

    const [width, height] = PageSizes.Letter;
    const page = doc.addPage([width, height]);

    // Shrink long names until they fit between the margins
    let size = TITLE_FONT_SIZE;
    while (size > MIN_FONT_SIZE && font.widthOfTextAtSize(title, size) > width - 2 * MARGIN) {
      size -= 2;
    }

    const textWidth = font.widthOfTextAtSize(title, size);
    page.drawText(title, {
      x: (width - textWidth) / 2,
      y: height / 2 - font.heightAtSize(size) / 2,
      size,
      font,
      color: rgb(0, 0, 0),
    });

    const outputPath = path.join(this.outputDir, titlePageFilename(key));
    await fs.promises.mkdir(this.outputDir, { recursive: true });
    await fs.promises.writeFile(outputPath, await doc.save());
    return outputPath;
  }
}
