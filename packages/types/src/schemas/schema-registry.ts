import AjvModule from 'ajv';
import type { ValidateFunction } from 'ajv';
import ajvFormatsModule from 'ajv-formats';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

// ajv and ajv-formats are CommonJS; under ESM the classes sit on `.default`.
const Ajv = AjvModule.default;
const addFormats = ajvFormatsModule.default;

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type SchemaVersion = 'v1';

export const AVAILABLE_SCHEMA_VERSIONS: readonly SchemaVersion[] = ['v1'] as const;
export const DEFAULT_SCHEMA_VERSION: SchemaVersion = 'v1';

const schemaCache = new Map<SchemaVersion, object>();

/**
 * Get the file path for a schema version
 */
export function getSchemaPath(version: SchemaVersion): string {
  const schemaDir = resolve(__dirname, '../../schemas');
  return resolve(schemaDir, `asset_record.${version}.schema.json`);
}

/**
 * Load and return the JSON schema for a given version
 */
export function getSchema(version: SchemaVersion): object {
  assertValidSchemaVersion(version);

  const cached = schemaCache.get(version);
  if (cached !== undefined) {
    return cached;
  }

  const schemaContent = readFileSync(getSchemaPath(version), 'utf-8');
  const parsed: unknown = JSON.parse(schemaContent);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Schema file for version "${version}" does not contain a JSON object`);
  }
  schemaCache.set(version, parsed);
  return parsed;
}

export function isValidSchemaVersion(version: string): version is SchemaVersion {
  return AVAILABLE_SCHEMA_VERSIONS.some((available) => available === version);
}

export function assertValidSchemaVersion(version: string): asserts version is SchemaVersion {
  if (!isValidSchemaVersion(version)) {
    throw new Error(
      `Invalid schema version: "${version}". Available versions: ${AVAILABLE_SCHEMA_VERSIONS.join(', ')}`
    );
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
}

const validatorCache = new Map<SchemaVersion, ValidateFunction>();

function getValidator(version: SchemaVersion): ValidateFunction {
  const cached = validatorCache.get(version);
  if (cached !== undefined) {
    return cached;
  }

  const ajv = new Ajv({
    allErrors: true,
    strict: false,
    validateFormats: true,
  });
  addFormats(ajv);

  const validate = ajv.compile(getSchema(version));
  validatorCache.set(version, validate);
  return validate;
}

/**
 * Validate an asset export payload against the specified schema version
 */
export function validateOutput(version: SchemaVersion, payload: unknown): ValidationResult {
  assertValidSchemaVersion(version);

  const validate = getValidator(version);
  if (validate(payload)) {
    return { valid: true, errors: [] };
  }

  const errors: ValidationError[] = (validate.errors ?? []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
  }));

  return { valid: false, errors };
}

export function validateOutputOrThrow(version: SchemaVersion, payload: unknown): void {
  const result = validateOutput(version, payload);
  if (!result.valid) {
    const errorMessages = result.errors
      .map((e) => `  ${e.path}: ${e.message} (${e.keyword})`)
      .join('\n');
    throw new Error(`Schema validation failed for version "${version}":\n${errorMessages}`);
  }
}

/**
 * Resolve schema version with precedence:
 * 1. CLI flag
 * 2. Environment variable ASSET_SCHEMA_VERSION
 * 3. Config setting
 * 4. Default: v1
 */
export function resolveSchemaVersion(options: {
  cliVersion?: string | undefined;
  configVersion?: string | undefined;
}): SchemaVersion {
  if (options.cliVersion !== undefined && options.cliVersion !== '') {
    assertValidSchemaVersion(options.cliVersion);
    return options.cliVersion;
  }

  const envVersion = process.env['ASSET_SCHEMA_VERSION'];
  if (envVersion !== undefined && envVersion !== '') {
    assertValidSchemaVersion(envVersion);
    return envVersion;
  }

  if (options.configVersion !== undefined && options.configVersion !== '') {
    assertValidSchemaVersion(options.configVersion);
    return options.configVersion;
  }

  return DEFAULT_SCHEMA_VERSION;
}
