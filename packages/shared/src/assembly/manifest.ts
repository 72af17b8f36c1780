/**
 * Submittal Manifest
 *
 * Written next to every output PDF: what went in, what was skipped and why,
 * which pricing pages came out, and which files never got a tag.
 */

import fs from 'fs';
import path from 'path';
import type {
  AssemblyWarning,
  ExtractionFailure,
  ManifestSection,
  RemovedPage,
  SubmittalManifest,
} from '../types';

export interface ManifestInput {
  outputPath: string;
  totalPages: number;
  filterPricing: boolean;
  sections: ManifestSection[];
  extractionFailures: readonly ExtractionFailure[];
  removedPages: RemovedPage[];
  warnings: AssemblyWarning[];
}

export function buildManifest(input: ManifestInput): SubmittalManifest {
  const includedDocuments = input.sections.reduce((n, s) => n + s.included.length, 0);
  const skippedDocuments = input.sections.reduce((n, s) => n + s.skipped.length, 0);

  return {
    output_file: path.basename(input.outputPath),
    total_pages: input.totalPages,
    filter_pricing: input.filterPricing,
    sections: input.sections,
    omitted_groups: input.sections.filter((s) => s.start_page === null).map((s) => s.label),
    extraction_failures: [...input.extractionFailures],
    removed_pages: input.removedPages,
    warnings: input.warnings,
    summary: {
      total_sections: input.sections.filter((s) => s.start_page !== null).length,
      included_documents: includedDocuments,
      skipped_documents: skippedDocuments,
      removed_pages: input.removedPages.length,
    },
  };
}

/** "out/Submittal.pdf" -> "out/Submittal.manifest.json" */
export function manifestPathFor(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}.manifest.json`);
}

export async function writeManifest(manifest: SubmittalManifest, outputPath: string): Promise<string> {
  const manifestPath = manifestPathFor(outputPath);
  await fs.promises.writeFile(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`, 'utf-8');
  return manifestPath;
}
