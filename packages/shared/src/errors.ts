/**
 * Error Types
 *
 * Per-file and per-document problems are collected as data (ExtractionFailure,
 * AssemblyWarning). The classes here are the errors that do get thrown.
 */

export type SubmittalErrorCode =
  | 'conversion_failed'
  | 'invalid_structure'
  | 'assembly_fatal'
  | 'not_found';

export class SubmittalError extends Error {
  readonly code: SubmittalErrorCode;

  constructor(code: SubmittalErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A single document could not be rendered to PDF.
 */
export class ConversionError extends SubmittalError {
  readonly filename: string;
  readonly status?: number;

  constructor(filename: string, message: string, status?: number) {
    super('conversion_failed', `Conversion failed for ${filename}: ${message}`);
    this.filename = filename;
    this.status = status;
  }
}

/**
 * A persisted or human-edited structure does not match the contract.
 */
export class StructureValidationError extends SubmittalError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('invalid_structure', `Structure failed validation: ${errors.join('; ')}`);
    this.errors = errors;
  }
}

/**
 * No section of the structure produced a single page.
 */
export class AssemblyFatalError extends SubmittalError {
  constructor(message: string) {
    super('assembly_fatal', message);
  }
}

export class NotFoundError extends SubmittalError {
  constructor(message: string) {
    super('not_found', message);
  }
}
