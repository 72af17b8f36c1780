/**
 * Submittal Assembler
 *
 * Walks a structure in order and appends pages sequentially into one PDF:
 * per group a title page then each document's kept pages, then the cut
 * sheets. Bookmark targets are taken from the running page count, so
 * outline order always equals traversal order.
 *
 * Per-document problems become warnings. Only a run where no section
 * contributes a page is fatal.
 */

import fs from 'fs';
import path from 'path';
import { PDFDocument } from 'pdf-lib';
import { ROLE_LABELS } from '../classification/roles';
import { AssemblyFatalError } from '../errors';
import { logger } from '../logger';
import { assemblyDurationHistogram, pagesRemovedCounter } from '../metrics';
import { CUTSHEET_TAG, fileStem } from '../tagging/patterns';
import type {
  AssemblyPlan,
  AssemblyResult,
  AssemblyWarning,
  AssemblyWarningCode,
  ManifestSection,
  OutlineNode,
  PageTextExtractor,
  RemovedPage,
  Structure,
  StructureDocument,
} from '../types';
import { buildManifest, writeManifest } from './manifest';
import { writeOutline } from './outline';
import { selectPages } from './page-filter';

export interface AssemblerDeps {
  pageText: PageTextExtractor;
}

export interface AssembleOptions {
  outputPath: string;
  filterPricing: boolean;
}

interface Section {
  /** null for the cut-sheets section */
  tag: string | null;
  titleKey: string;
  label: string;
  documents: readonly StructureDocument[];
  childLabel: (doc: StructureDocument) => string;
}

interface PreparedDocument {
  doc: StructureDocument;
  source: PDFDocument;
  kept: number[];
}

interface RunLog {
  warnings: AssemblyWarning[];
  removedPages: RemovedPage[];
}

function sectionsOf(structure: Structure): Section[] {
  const sections: Section[] = structure.groups.map((group) => ({
    tag: group.tag,
    titleKey: group.tag,
    label: group.display_name,
    documents: group.documents,
    childLabel: (doc) => ROLE_LABELS[doc.role],
  }));

  if (structure.cut_sheets && structure.cut_sheets.documents.length > 0) {
    sections.push({
      tag: null,
      titleKey: CUTSHEET_TAG,
      label: structure.cut_sheets.label,
      documents: structure.cut_sheets.documents,
      childLabel: (doc) => fileStem(doc.filename),
    });
  }

  return sections;
}

function warn(
  log: RunLog,
  code: AssemblyWarningCode,
  message: string,
  detail: { tag?: string; filename?: string } = {}
): void {
  const warning: AssemblyWarning = { code, message, ...detail };
  log.warnings.push(warning);
  logger.warn(message, { code, ...detail });
}

async function loadPdf(pdfPath: string): Promise<PDFDocument> {
  const bytes = await fs.promises.readFile(pdfPath);
  return PDFDocument.load(bytes, { ignoreEncryption: true });
}

async function prepareDocument(
  doc: StructureDocument,
  section: Section,
  plan: AssemblyPlan,
  deps: AssemblerDeps,
  filterPricing: boolean,
  log: RunLog,
  skipped: ManifestSection['skipped']
): Promise<PreparedDocument | null> {
  const tag = section.tag ?? undefined;
  const renderedPath: string | undefined = plan.rendered[doc.path];

  if (renderedPath === undefined) {
    warn(log, 'conversion_failure', `No rendered PDF for ${doc.filename}; document skipped`, {
      tag,
      filename: doc.filename,
    });
    skipped.push({ filename: doc.filename, reason: 'conversion_failure' });
    return null;
  }

  let source: PDFDocument;
  try {
    source = await loadPdf(renderedPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    warn(log, 'unreadable_pdf', `Rendered PDF for ${doc.filename} could not be read: ${message}`, {
      tag,
      filename: doc.filename,
    });
    skipped.push({ filename: doc.filename, reason: 'unreadable_pdf' });
    return null;
  }

  let pageTexts: string[] | null = null;
  if (filterPricing) {
    try {
      pageTexts = await deps.pageText.extractPageTexts(renderedPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warn(
        log,
        'text_extraction_failure',
        `Text extraction failed for ${doc.filename}; pages kept unfiltered: ${message}`,
        { tag, filename: doc.filename }
      );
    }
  }

  const selection = selectPages(source.getPageCount(), pageTexts, filterPricing);
  for (const index of selection.removed) {
    log.removedPages.push({ filename: doc.filename, page_number: index + 1 });
  }
  if (selection.removed.length > 0) {
    pagesRemovedCounter.inc(selection.removed.length);
    logger.info('Pricing pages removed', {
      filename: doc.filename,
      pages: selection.removed.map((i) => i + 1),
    });
  }

  if (selection.kept.length === 0) {
    warn(log, 'empty_document', `${doc.filename} contributed no pages`, {
      tag,
      filename: doc.filename,
    });
    skipped.push({ filename: doc.filename, reason: 'empty_document' });
    return null;
  }

  return { doc, source, kept: selection.kept };
}

async function appendPages(output: PDFDocument, source: PDFDocument, indices: number[]): Promise<void> {
  const pages = await output.copyPages(source, indices);
  for (const page of pages) {
    output.addPage(page);
  }
}

async function appendTitlePage(
  output: PDFDocument,
  section: Section,
  plan: AssemblyPlan,
  log: RunLog
): Promise<void> {
  const tag = section.tag ?? undefined;
  const titlePath: string | undefined = plan.title_pages[section.titleKey];

  if (titlePath === undefined) {
    warn(log, 'missing_title_page', `No title page for ${section.label}`, { tag });
    return;
  }

  try {
    const title = await loadPdf(titlePath);
    await appendPages(output, title, title.getPageIndices());
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    warn(log, 'missing_title_page', `Title page for ${section.label} could not be read: ${message}`, {
      tag,
    });
  }
}

export async function assembleSubmittal(
  plan: AssemblyPlan,
  deps: AssemblerDeps,
  options: AssembleOptions
): Promise<AssemblyResult> {
  const startedAt = Date.now();
  const output = await PDFDocument.create();
  const log: RunLog = { warnings: [], removedPages: [] };
  const outline: OutlineNode[] = [];
  const manifestSections: ManifestSection[] = [];

  for (const section of sectionsOf(plan.structure)) {
    const skipped: ManifestSection['skipped'] = [];
    const prepared: PreparedDocument[] = [];

    for (const doc of section.documents) {
      const result = await prepareDocument(
        doc,
        section,
        plan,
        deps,
        options.filterPricing,
        log,
        skipped
      );
      if (result) prepared.push(result);
    }

    if (prepared.length === 0) {
      warn(log, 'empty_group', `${section.label} contributed no pages; omitted`, {
        tag: section.tag ?? undefined,
      });
      manifestSections.push({
        label: section.label,
        tag: section.tag,
        start_page: null,
        included: [],
        skipped,
      });
      continue;
    }

    const sectionStart = output.getPageCount();
    await appendTitlePage(output, section, plan, log);

    const children: OutlineNode[] = [];
    for (const item of prepared) {
      const pageIndex = output.getPageCount();
      await appendPages(output, item.source, item.kept);
      children.push({ label: section.childLabel(item.doc), page_index: pageIndex, children: [] });
    }

    outline.push({ label: section.label, page_index: sectionStart, children });
    manifestSections.push({
      label: section.label,
      tag: section.tag,
      start_page: sectionStart + 1,
      included: prepared.map((item) => item.doc.filename),
      skipped,
    });
  }

  const totalPages = output.getPageCount();
  if (totalPages === 0) {
    assemblyDurationHistogram.observe({ status: 'failed' }, (Date.now() - startedAt) / 1000);
    throw new AssemblyFatalError('No section of the submittal contributed any pages');
  }

  writeOutline(output, outline);
  const bytes = await output.save();

  await fs.promises.mkdir(path.dirname(options.outputPath), { recursive: true });
  await fs.promises.writeFile(options.outputPath, bytes);

  const manifest = buildManifest({
    outputPath: options.outputPath,
    totalPages,
    filterPricing: options.filterPricing,
    sections: manifestSections,
    extractionFailures: plan.structure.unclassified,
    removedPages: log.removedPages,
    warnings: log.warnings,
  });
  const manifestPath = await writeManifest(manifest, options.outputPath);

  assemblyDurationHistogram.observe({ status: 'success' }, (Date.now() - startedAt) / 1000);
  logger.info('Submittal assembled', {
    outputPath: options.outputPath,
    totalPages,
    sections: outline.length,
    warnings: log.warnings.length,
    removedPages: log.removedPages.length,
  });

  return {
    outputPath: options.outputPath,
    manifestPath,
    totalPages,
    outline,
    warnings: log.warnings,
    removedPages: log.removedPages,
    manifest,
  };
}
