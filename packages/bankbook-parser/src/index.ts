// Pipeline
export { parseBankbook, resolveParserOptions, DEFAULT_PARSER_OPTIONS } from './bankbook-parser.js';
export type {
  BankbookParseResult,
  BankbookParseOptions,
  BankbookParseDependencies,
  RowDiagnostics,
  RowDropReason,
} from './types.js';

// Line normalizer
export { normalizeLine, normalizeLines } from './normalizer.js';

// Row segmenter
export {
  segmentRows,
  segmentByRowCode,
  segmentByInlineDates,
  isRowCode,
  type Row,
  type SegmentationResult,
  type SegmentationStrategy,
} from './row-segmenter.js';

// Compact date parser
export { parseCompactDate, type CompactDateMatch } from './compact-date.js';

// Field builder
export {
  buildTransactionFields,
  isNumericToken,
  isDepositDescription,
  DEPOSIT_KEYWORDS,
  type TransactionFields,
} from './field-builder.js';

// Metadata extractors
export {
  extractMetadata,
  extractBranchName,
  extractAccountNumber,
  extractOwnerName,
  isPlaceholder,
  ACCOUNT_LABELS,
  type BankbookMetadata,
} from './metadata/index.js';

// Descriptions and document type
export { normalizeDescription, loadDescriptionReplacements } from './description.js';
export { detectDocumentType } from './document-type.js';

// Asset record
export {
  buildAssetRecord,
  appendAssetNotes,
  toExportPayload,
  BANK_DEPOSIT_TYPE,
  BANK_DEPOSIT_ASSET_NAME,
  BANK_DEPOSIT_VALUATION_BASIS,
  type AssetRecordInput,
} from './asset-record.js';

// Transaction merger
export {
  mergeTransactions,
  deduplicateTransactions,
  transactionsEquivalent,
  compareTransactions,
  getTransactionKey,
  type TransactionMergeResult,
} from './transaction-merger.js';

// Batch processing
export {
  processBatch,
  type ParseError,
  type DocumentResult,
  type BatchProcessResult,
  type BatchProcessOptions,
} from './batch-processor.js';

// Input files
export {
  scanDirectoryForLineFiles,
  validateDirectory,
  describeSkipReason,
  type LineFileInfo,
  type ScanResult,
  type SkippedFile,
  type SkipReason,
  type DirectoryCheck,
} from './directory-scanner.js';
export { readLineFile, parseLineFileContent, lineFileFormatOf, type LineFileFormat } from './line-file.js';
