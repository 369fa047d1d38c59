/**
 * Ajv validation instance with schema validators
 * Run contexts and engine configuration must validate before a run starts
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { getFactorEngineConfigSchema, getRunContextSchema } from './schema_loader';
import type { RunContext } from '@/types/factors';
import type { RawFactorEngineConfig } from '@/core/config';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, email, uri, etc.)
addFormats(ajv);

// Lazy-loaded validators
let runContextValidator: ValidateFunction<RunContext> | null = null;
let engineConfigValidator: ValidateFunction<RawFactorEngineConfig> | null = null;

export function getRunContextValidator(): ValidateFunction<RunContext> {
  if (!runContextValidator) {
    runContextValidator = ajv.compile<RunContext>(getRunContextSchema());
  }
  return runContextValidator;
}

export function getEngineConfigValidator(): ValidateFunction<RawFactorEngineConfig> {
  if (!engineConfigValidator) {
    engineConfigValidator = ajv.compile<RawFactorEngineConfig>(getFactorEngineConfigSchema());
  }
  return engineConfigValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateRunContext(data: unknown): ValidationResult<RunContext> {
  return runValidator(getRunContextValidator(), data);
}

export function validateEngineConfig(data: unknown): ValidationResult<RawFactorEngineConfig> {
  return runValidator(getEngineConfigValidator(), data);
}
