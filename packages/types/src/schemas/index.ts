export {
  EraInterpretationSchema,
  InferenceMethodSchema,
  DateFormatHintSchema,
  YearResolverKindSchema,
  DocumentTypeSchema,
  BankCodeSchema,
  TransactionLineSchema,
  AssetRecordSchema,
  DateAlternativeSchema,
  DateInferenceResultSchema,
  DateInferenceContextSchema,
  ParserOptionsSchema,
} from './asset.js';

export type {
  EraInterpretation,
  InferenceMethod,
  DateFormatHint,
  YearResolverKind,
  DocumentType,
  TransactionLine,
  AssetRecord,
  DateAlternative,
  DateInferenceResult,
  DateInferenceContext,
  ParserOptions,
} from './asset.js';

export type { AssetExportPayload, TransactionExport } from './export.js';

export {
  getSchemaPath,
  getSchema,
  isValidSchemaVersion,
  assertValidSchemaVersion,
  validateOutput,
  validateOutputOrThrow,
  resolveSchemaVersion,
  AVAILABLE_SCHEMA_VERSIONS,
  DEFAULT_SCHEMA_VERSION,
} from './schema-registry.js';

export type { SchemaVersion, ValidationResult, ValidationError } from './schema-registry.js';
