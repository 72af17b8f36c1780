/**
 * Shared TypeScript Types
 *
 * Types for the submittal structuring pipeline, matching the JSON schema in
 * docs/contracts/submittal_structure.schema.json
 */

// ============================================================================
// Input Files
// ============================================================================

export interface RawFile {
  filename: string;
  path: string;
  size_bytes: number;
}

/** Conversion quality presets understood by the Gotenberg client. */
export type QualityMode = 'fast' | 'balanced' | 'high' | 'maximum';

/**
 * - 'filename': filename rules only
 * - 'content': filename rules, then the document text as a fallback
 */
export type ExtractionMode = 'filename' | 'content';

// ============================================================================
// Tag Extraction
// ============================================================================

export type TagSource = 'filename' | 'content';

export type FilenameRuleName = 'explicit_tag' | 'numeric_prefix' | 'cutsheet_prefix';

export type ContentRuleName = 'labeled_tag' | 'bare_tag';

/** 'manual' marks a tag set by a human through retagging */
export type TagRuleName = FilenameRuleName | ContentRuleName | 'manual';

export interface TagMatch {
  /** Normalized PREFIX-NUMBER tag, or CUTSHEET */
  tag: string;
  /** Raw document-type string the classifier works on */
  document_type: string;
  confidence: number;
  source: TagSource;
  rule: TagRuleName;
  /** Every distinct tag seen when the content held more than one */
  candidates?: string[];
}

export interface ExtractionFailure {
  filename: string;
  path: string;
  size_bytes: number;
  reason: string;
}

// ============================================================================
// Classification
// ============================================================================

export type DocumentRole =
  | 'technical_data'
  | 'fan_curve'
  | 'drawing'
  | 'item_summary'
  | 'specification'
  | 'cutsheet'
  | 'unknown';

export interface ClassificationAmbiguity {
  filename: string;
  document_type: string;
  matched_roles: DocumentRole[];
  resolved_role: DocumentRole;
}

/** A document whose text named more than one tag; the chosen tag was used. */
export interface TagAmbiguity {
  filename: string;
  path: string;
  chosen_tag: string;
  candidates: string[];
}

/** A file that made it through extraction and classification. */
export interface ClassifiedDocument {
  file: RawFile;
  match: TagMatch;
  role: DocumentRole;
}

// ============================================================================
// Structure
// ============================================================================

export interface StructureDocument {
  filename: string;
  path: string;
  size_bytes: number;
  role: DocumentRole;
  document_type: string;
  confidence: number;
  source: TagSource;
  rule: TagRuleName;
  /** 1-based position inside its group */
  position: number;
}

export interface EquipmentGroup {
  tag: string;
  /** Title-page text and bookmark label; defaults to the tag */
  display_name: string;
  /** 1-based group order */
  order: number;
  documents: StructureDocument[];
}

export interface CutSheetsSection {
  label: 'Cut Sheets';
  documents: StructureDocument[];
}

export interface Structure {
  schema_version: '1.0';
  extraction_mode: ExtractionMode;
  groups: EquipmentGroup[];
  cut_sheets: CutSheetsSection | null;
  unclassified: ExtractionFailure[];
}

export interface ExtractStructureResult {
  structure: Structure;
  failures: ExtractionFailure[];
  ambiguities: ClassificationAmbiguity[];
  tag_ambiguities: TagAmbiguity[];
}

// ============================================================================
// Capabilities (injected I/O)
// ============================================================================

export interface DocumentConverter {
  /** Render one input file to a single-document PDF and return its path */
  convert(path: string): Promise<string>;
}

export interface TextExtractor {
  extractText(path: string): Promise<string>;
}

export interface PageTextExtractor {
  /** Text of every page, in page order */
  extractPageTexts(pdfPath: string): Promise<string[]>;
}

export interface TitlePageGenerator {
  /** `key` is the section's tag (or CUTSHEET) and names the output file */
  generateTitlePage(title: string, key: string): Promise<string>;
}

// ============================================================================
// Assembly
// ============================================================================

export interface AssemblyPlan {
  readonly structure: Structure;
  /** Input file path -> rendered PDF path */
  readonly rendered: Readonly<Record<string, string>>;
  /** Tag (or CUTSHEET) -> title page PDF path */
  readonly title_pages: Readonly<Record<string, string>>;
}

export type AssemblyWarningCode =
  | 'conversion_failure'
  | 'unreadable_pdf'
  | 'text_extraction_failure'
  | 'empty_document'
  | 'empty_group'
  | 'missing_title_page';

export interface AssemblyWarning {
  code: AssemblyWarningCode;
  message: string;
  tag?: string;
  filename?: string;
}

export interface OutlineNode {
  label: string;
  /** 0-based index of the first page contributed by this node */
  page_index: number;
  children: OutlineNode[];
}

export interface RemovedPage {
  filename: string;
  /** 1-based page number inside the rendered document */
  page_number: number;
}

export interface ManifestSection {
  label: string;
  tag: string | null;
  start_page: number | null;
  included: string[];
  skipped: Array<{ filename: string; reason: AssemblyWarningCode }>;
}

export interface SubmittalManifest {
  output_file: string;
  total_pages: number;
  filter_pricing: boolean;
  sections: ManifestSection[];
  omitted_groups: string[];
  extraction_failures: ExtractionFailure[];
  removed_pages: RemovedPage[];
  warnings: AssemblyWarning[];
  summary: {
    total_sections: number;
    included_documents: number;
    skipped_documents: number;
    removed_pages: number;
  };
}

export interface AssemblyResult {
  outputPath: string;
  manifestPath: string;
  totalPages: number;
  outline: OutlineNode[];
  warnings: AssemblyWarning[];
  removedPages: RemovedPage[];
  manifest: SubmittalManifest;
}

// ============================================================================
// API Types
// ============================================================================

export interface CreateStructureRequest {
  source_dir?: string;
  files?: string[];
  mode?: ExtractionMode;
}

export interface AssembleRequest {
  filter_pricing?: boolean;
  quality_mode?: QualityMode;
  output_filename?: string;
}

export type JobStatus = 'pending' | 'completed' | 'failed';

export interface JobResult {
  job_id: string;
  structure_id: string;
  status: JobStatus;
  output_path?: string;
  manifest_path?: string;
  manifest?: SubmittalManifest;
  error?: { code: string; message: string };
  finished_at?: string;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
