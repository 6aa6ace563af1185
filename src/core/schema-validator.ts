import { readFileSync } from 'node:fs';
import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import { getSchemaPath } from '../utils/paths.js';
import type { PinConfigFile } from '../types/config.js';

export type ConfigValidationResult =
  | { valid: true; config: PinConfigFile }
  | { valid: false; errors: string[] };

let validateFn: ValidateFunction<PinConfigFile> | null = null;

function getValidator(): ValidateFunction<PinConfigFile> {
  if (validateFn) return validateFn;

  const ajv = new Ajv({ allErrors: true, strict: false });
  const schema = JSON.parse(readFileSync(getSchemaPath(), 'utf-8'));
  validateFn = ajv.compile<PinConfigFile>(schema);
  return validateFn;
}

function formatError(err: ErrorObject): string {
  if (err.keyword === 'additionalProperties' && typeof err.params.additionalProperty === 'string') {
    return `${err.instancePath || '/'} has unknown key "${err.params.additionalProperty}"`;
  }
  return `${err.instancePath || '/'} ${err.message ?? 'is invalid'}`;
}

export function validateConfigFile(data: unknown): ConfigValidationResult {
  const validate = getValidator();
  if (validate(data)) {
    return { valid: true, config: data };
  }
  return { valid: false, errors: (validate.errors ?? []).map(formatError) };
}
