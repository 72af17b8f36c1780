/**
 * Document Converter
 *
 * Renders one input file to a single-document PDF:
 * PDFs pass through, images are placed on a page locally, everything else
 * goes to Gotenberg.
 */

import crypto from 'crypto';
import path from 'path';
import {
  ConversionError,
  conversionDurationHistogram,
  conversionsCounter,
  type DocumentConverter,
} from '@submittal/shared';
import { imageToPdf, isImageFile } from './image-to-pdf';

/**
 * The remote half of conversion; GotenbergClient in production.
 */
export interface OfficeRenderer {
  convertToFile(inputPath: string, outputPath: string): Promise<string>;
}

/**
 * "/in/AHU-10 - Fan Curve.jpg" -> "<dir>/AHU-10 - Fan Curve.jpg.<digest>.pdf".
 * The digest covers the full input path, so inputs that share a basename
 * render to different files.
 */
export function renderedPathFor(outputDir: string, inputPath: string): string {
  const digest = crypto.createHash('sha256').update(inputPath).digest('hex').slice(0, 12);
  return path.join(outputDir, `${path.basename(inputPath)}.${digest}.pdf`);
}

type ConversionKind = 'passthrough' | 'image' | 'office';

export class SubmittalConverter implements DocumentConverter {
  private readonly outputDir: string;
  private readonly office: OfficeRenderer;

  constructor(outputDir: string, office: OfficeRenderer) {
    this.outputDir = outputDir;
    this.office = office;
  }

  private async render(kind: ConversionKind, inputPath: string): Promise<string> {
    switch (kind) {
      case 'passthrough':
        return inputPath;
      case 'image':
        return imageToPdf(inputPath, renderedPathFor(this.outputDir, inputPath));
      case 'office':
        return this.office.convertToFile(inputPath, renderedPathFor(this.outputDir, inputPath));
    }
  }

  async convert(inputPath: string): Promise<string> {
    const ext = path.extname(inputPath).toLowerCase();
    const kind: ConversionKind =
      ext === '.pdf' ? 'passthrough' : isImageFile(inputPath) ? 'image' : 'office';
    const endTimer = conversionDurationHistogram.startTimer();

    try {
      const rendered = await this.render(kind, inputPath);
      conversionsCounter.inc({ status: 'success' });
      return rendered;
    } catch (error) {
      conversionsCounter.inc({ status: 'failed' });
      if (error instanceof ConversionError) throw error;
      throw new ConversionError(
        path.basename(inputPath),
        error instanceof Error ? error.message : String(error)
      );
    } finally {
      endTimer();
    }
  }
}
