/**
 * Assembly Job
 *
 * One assemble_submittal job end to end:
 * load structure -> render every document (bounded parallelism) ->
 * title pages -> assemble -> store the result.
 */

import path from 'path';
import {
  logger,
  assembleSubmittal,
  createAssemblyPlan,
  CUTSHEET_TAG,
  SubmittalError,
  StructureStore,
  type AssembleSubmittalJob,
  type DocumentConverter,
  type JobResult,
  type PageTextExtractor,
  type QualityMode,
  type Structure,
  type StructureDocument,
  type TitlePageGenerator,
} from '@submittal/shared';
import { mapSettled } from './concurrency';
import { SubmittalConverter, type OfficeRenderer } from './converter';
import { PdfLibTitlePageGenerator } from './title-pages';

export interface AssembleJobDeps {
  store: StructureStore;
  pageText: PageTextExtractor;
  conversionConcurrency: number;
  createOfficeRenderer: (qualityMode: QualityMode) => OfficeRenderer;
  createTitlePageGenerator?: (outputDir: string) => TitlePageGenerator;
}

export interface RenderFailure {
  filename: string;
  message: string;
}

export interface RenderOutcome {
  rendered: Map<string, string>;
  failures: RenderFailure[];
}

function documentsOf(structure: Structure): StructureDocument[] {
  return [
    ...structure.groups.flatMap((group) => group.documents),
    ...(structure.cut_sheets?.documents ?? []),
  ];
}

/**
 * Convert every document of a structure. A failed conversion leaves the
 * document out of the rendered map; the assembler reports it.
 */
export async function renderStructure(
  structure: Structure,
  converter: DocumentConverter,
  concurrency: number
): Promise<RenderOutcome> {
  const documents = documentsOf(structure);
  const results = await mapSettled(documents, concurrency, (doc) => converter.convert(doc.path));

  const rendered = new Map<string, string>();
  const failures: RenderFailure[] = [];

  results.forEach((result, index) => {
    const doc = documents[index];
    if (result.ok) {
      rendered.set(doc.path, result.value);
      return;
    }
    const message = result.error instanceof Error ? result.error.message : String(result.error);
    failures.push({ filename: doc.filename, message });
    logger.warn('Document conversion failed', { filename: doc.filename, error: message });
  });

  logger.info('Documents rendered', {
    total: documents.length,
    rendered: rendered.size,
    failed: failures.length,
  });
  return { rendered, failures };
}

/**
 * Title page per group (display name) and one for the cut sheets, keyed by
 * tag / CUTSHEET. A page that fails to generate is left out.
 */
export async function generateTitlePages(
  structure: Structure,
  generator: TitlePageGenerator
): Promise<Map<string, string>> {
  const sections: Array<{ key: string; title: string }> = structure.groups.map((group) => ({
    key: group.tag,
    title: group.display_name,
  }));
  if (structure.cut_sheets) {
    sections.push({ key: CUTSHEET_TAG, title: structure.cut_sheets.label });
  }

  const titlePages = new Map<string, string>();
  for (const section of sections) {
    try {
      titlePages.set(section.key, await generator.generateTitlePage(section.title, section.key));
    } catch (error) {
      logger.warn('Title page generation failed', {
        section: section.key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return titlePages;
}

export async function runAssembleJob(
  jobId: string,
  data: AssembleSubmittalJob,
  deps: AssembleJobDeps
): Promise<JobResult> {
  const { store } = deps;

  try {
    const structure = await store.loadStructure(data.structure_id);

    const converter = new SubmittalConverter(
      store.rendersDir(jobId),
      deps.createOfficeRenderer(data.quality_mode)
    );
    const { rendered } = await renderStructure(structure, converter, deps.conversionConcurrency);

    const titlesDir = store.titlesDir(jobId);
    const generator = deps.createTitlePageGenerator
      ? deps.createTitlePageGenerator(titlesDir)
      : new PdfLibTitlePageGenerator(titlesDir);
    const titlePages = await generateTitlePages(structure, generator);

    const plan = createAssemblyPlan(structure, rendered, titlePages);
    const result = await assembleSubmittal(
      plan,
      { pageText: deps.pageText },
      { outputPath: store.outputPath(data.output_filename), filterPricing: data.filter_pricing }
    );

    const jobResult: JobResult = {
      job_id: jobId,
      structure_id: data.structure_id,
      status: 'completed',
      output_path: result.outputPath,
      manifest_path: result.manifestPath,
      manifest: result.manifest,
      finished_at: new Date().toISOString(),
    };
    await store.saveJobResult(jobResult);

    logger.info('Submittal ready', {
      output: path.basename(result.outputPath),
      total_pages: result.totalPages,
      warnings: result.warnings.length,
    });
    return jobResult;
  } catch (error) {
    // Structural problems do not get better on retry
    if (error instanceof SubmittalError) {
      const failed: JobResult = {
        job_id: jobId,
        structure_id: data.structure_id,
        status: 'failed',
        error: { code: error.code, message: error.message },
        finished_at: new Date().toISOString(),
      };
      await store.saveJobResult(failed);
      logger.error('Assembly job failed', error, { structure_id: data.structure_id });
      return failed;
    }
    throw error;
  }
}
