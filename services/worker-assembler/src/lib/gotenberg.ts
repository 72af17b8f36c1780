/**
 * Gotenberg Client
 *
 * Renders office documents to PDF through Gotenberg's LibreOffice route.
 * Quality presets control image resolution and compression; drawings need
 * the higher presets to stay legible.
 */

import fs from 'fs';
import path from 'path';
import { ConversionError, logger, type QualityMode } from '@submittal/shared';

export interface QualityPreset {
  quality: string;
  /** Gotenberg accepts 75, 150, 300, 600 or 1200 */
  maxImageResolution: string;
  losslessImageCompression: string;
  reduceImageResolution: string;
}

export const QUALITY_PRESETS: Record<QualityMode, QualityPreset> = {
  fast: {
    quality: '80',
    maxImageResolution: '150',
    losslessImageCompression: 'false',
    reduceImageResolution: 'true',
  },
  balanced: {
    quality: '90',
    maxImageResolution: '300',
    losslessImageCompression: 'false',
    reduceImageResolution: 'false',
  },
  high: {
    quality: '100',
    maxImageResolution: '600',
    losslessImageCompression: 'true',
    reduceImageResolution: 'false',
  },
  maximum: {
    quality: '100',
    maxImageResolution: '1200',
    losslessImageCompression: 'true',
    reduceImageResolution: 'false',
  },
};

export const LIBREOFFICE_ROUTE = '/forms/libreoffice/convert';

export interface GotenbergOptions {
  baseUrl: string;
  timeoutMs: number;
  qualityMode: QualityMode;
}

export class GotenbergClient {
  private readonly options: GotenbergOptions;

  constructor(options: GotenbergOptions) {
    this.options = options;
  }

  /**
   * Build the multipart form for one file.
   */
  async buildForm(inputPath: string): Promise<FormData> {
    const bytes = await fs.promises.readFile(inputPath);
    const form = new FormData();
    form.append('files', new Blob([new Uint8Array(bytes)]), path.basename(inputPath));

    const preset = QUALITY_PRESETS[this.options.qualityMode];
    for (const [field, value] of Object.entries(preset)) {
      form.append(field, value);
    }
    form.append('pdfa', 'PDF/A-2b');
    return form;
  }

  /**
   * Convert one document and write the PDF to outputPath.
   * Throws ConversionError on any failure.
   */
  async convertToFile(inputPath: string, outputPath: string): Promise<string> {
    const filename = path.basename(inputPath);
    const url = `${this.options.baseUrl.replace(/\/$/, '')}${LIBREOFFICE_ROUTE}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        body: await this.buildForm(inputPath),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new ConversionError(
        filename,
        error instanceof Error ? error.message : String(error)
      );
    }

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 500);
      throw new ConversionError(
        filename,
        `Gotenberg returned ${response.status}${detail ? `: ${detail}` : ''}`,
        response.status
      );
    }

    const pdf = Buffer.from(await response.arrayBuffer());
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, pdf);

    logger.debug('Gotenberg conversion complete', {
      filename,
      quality_mode: this.options.qualityMode,
      bytes: pdf.length,
    });
    return outputPath;
  }

  async isHealthy(): Promise<boolean> {
    try {
      const response = await fetch(`${this.options.baseUrl.replace(/\/$/, '')}/health`, {
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch (error) {
      logger.warn('Gotenberg health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
