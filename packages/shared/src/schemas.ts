/**
 * JSON Schema Validation
 *
 * Ajv validation for persisted and human-edited structures.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { Structure } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

export const STRUCTURE_SCHEMA_FILE = 'submittal_structure.schema.json';

let structureValidator: ValidateFunction<Structure> | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // From packages/shared/src in development and tests
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // From dist/packages/shared/src after a build
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
    `/app/docs/contracts/${schemaName}`,
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

function getStructureValidator(): ValidateFunction<Structure> {
  if (!structureValidator) {
    structureValidator = ajv.compile<Structure>(loadSchema(STRUCTURE_SCHEMA_FILE));
  }
  return structureValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Type guard over the structure contract
 */
export function isStructure(data: unknown): data is Structure {
  return getStructureValidator()(data);
}

/**
 * Validate a Structure against submittal_structure.schema.json
 */
export function validateStructure(data: unknown): ValidationResult {
  const validate = getStructureValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`) ?? [];
    logger.warn('Structure validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
