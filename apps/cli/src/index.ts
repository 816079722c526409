#!/usr/bin/env -S node --import tsx
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { resolve, basename } from 'path';
import { ZodError } from 'zod';
import {
  PARSER_NAME,
  PARSER_VERSION,
  CONFIDENCE_THRESHOLDS,
  ParserOptionsSchema,
  EraInterpretationSchema,
  BankCodeSchema,
  AVAILABLE_SCHEMA_VERSIONS,
  resolveSchemaVersion,
  validateOutputOrThrow,
  toIsoDate,
  toWarekiDisplay,
  type AssetExportPayload,
  type ParserOptions,
  type SchemaVersion,
} from '@passbook/types';
import { DateInferenceEngine, LearnedFormatTable } from '@passbook/date-inference';
import {
  parseBankbook,
  processBatch,
  readLineFile,
  scanDirectoryForLineFiles,
  validateDirectory,
  describeSkipReason,
  toExportPayload,
  type BankbookParseResult,
  type ParseError,
} from '@passbook/bankbook-parser';

interface ParseCliOptions {
  inputDir?: string;
  out?: string;
  verbose: boolean;
  pretty: boolean;
  validate: boolean;
  schemaVersion?: string;
  bankCode?: string;
  bankName?: string;
  dateFormat: string;
  resolver: string;
  cleanDescriptions: boolean;
}

interface InferDateCliOptions {
  bankCode?: string;
  bankName?: string;
  context?: string[];
  learn: string[];
  verbose: boolean;
}

interface CliOutput {
  parser: string;
  parser_version: string;
  assets: AssetExportPayload[];
  parse_errors?: Array<{ file_name: string; error: string }>;
}

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

program
  .name('passbook')
  .description('Parse OCR lines of Japanese bank passbooks into structured asset records')
  .version(PARSER_VERSION);

program
  .command('parse')
  .description('Parse one OCR line file (.json or .txt) or a directory of them')
  .argument('[file]', 'Path to an OCR line file')
  .option('-d, --inputDir <directory>', 'Directory containing OCR line files', process.env['PASSBOOK_INPUT_DIR'])
  .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['PASSBOOK_OUTPUT_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('PASSBOOK_VERBOSE', false))
  .option('--bank-code <code>', '4-digit bank code', process.env['PASSBOOK_BANK_CODE'])
  .option('--bank-name <name>', 'Bank name, used when no bank code is given', process.env['PASSBOOK_BANK_NAME'])
  .option('--date-format <format>', 'Two-digit year hint: auto, western, wareki', process.env['PASSBOOK_DATE_FORMAT'] ?? 'auto')
  .option('--resolver <kind>', 'Year resolver: simple, contextual', process.env['PASSBOOK_YEAR_RESOLVER'] ?? 'simple')
  .option('--clean-descriptions', 'Normalize transaction descriptions', envBool('PASSBOOK_CLEAN_DESCRIPTIONS', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('PASSBOOK_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option('--validate', 'Validate output against the asset record schema', false)
  .option(
    '--schema-version <version>',
    `Output schema version (${AVAILABLE_SCHEMA_VERSIONS.join(', ')})`,
    process.env['ASSET_SCHEMA_VERSION']
  )
  .action(async (file: string | undefined, options: ParseCliOptions) => {
    try {
      if (options.inputDir !== undefined) {
        await processDirectory(options.inputDir, options);
      } else if (file !== undefined) {
        await processSingleFile(file, options);
      } else {
        console.error('[ERROR] Either an OCR line file or --inputDir must be specified');
        process.exit(1);
      }
    } catch (error) {
      reportFatal(error, options.verbose);
    }
  });

program
  .command('infer-date')
  .description('Resolve a two-digit passbook date such as 05-03-15')
  .argument('<date>', 'Date as yy-mm-dd (or yy/mm/dd)')
  .option('--bank-code <code>', '4-digit bank code', process.env['PASSBOOK_BANK_CODE'])
  .option('--bank-name <name>', 'Bank name, used when no bank code is given', process.env['PASSBOOK_BANK_NAME'])
  .option('--context <dates...>', 'Other dates of the same document, in order')
  .option('--learn <code=era>', 'Confirm a bank format before inferring (repeatable)', collect, [])
  .option('-v, --verbose', 'Enable verbose output', envBool('PASSBOOK_VERBOSE', false))
  .action((date: string, options: InferDateCliOptions) => {
    try {
      inferDate(date, options);
    } catch (error) {
      reportFatal(error, options.verbose);
    }
  });

function reportFatal(error: unknown, verbose: boolean): never {
  if (error instanceof ZodError) {
    for (const issue of error.issues) {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      console.error(`[ERROR] Invalid option ${path}${issue.message}`);
    }
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ERROR] ${message}`);
    if (verbose && error instanceof Error && error.stack !== undefined) {
      console.error(error.stack);
    }
  }
  process.exit(1);
}

function toParserOptions(options: ParseCliOptions, sourceName: string): ParserOptions {
  return ParserOptionsSchema.parse({
    sourceName,
    bankCode: options.bankCode,
    bankName: options.bankName,
    dateFormat: options.dateFormat,
    yearResolver: options.resolver,
    cleanDescriptions: options.cleanDescriptions,
  });
}

function logDocumentResult(name: string, result: BankbookParseResult, verbose: boolean): void {
  const { diagnostics } = result;
  console.error(
    `[INFO] ${name}: ${diagnostics.rowsAccepted}/${diagnostics.rowsSeen} rows accepted (strategy: ${diagnostics.strategy})`
  );
  if (verbose) {
    console.error(`[INFO] Document type: ${result.documentType}`);
    console.error(`[INFO] Account: ${result.asset.identifierPrimary ?? '-'}, branch: ${result.asset.identifierSecondary ?? '-'}`);
  }
  for (const warning of result.warnings) {
    console.error(`[WARN] ${warning}`);
  }

  const uncertain = result.asset.transactions.filter(
    (line) => line.confidence !== null && line.confidence < CONFIDENCE_THRESHOLDS.MEDIUM
  );
  if (uncertain.length > 0) {
    console.error(`[WARN] ${uncertain.length} transaction date(s) below ${CONFIDENCE_THRESHOLDS.MEDIUM} confidence`);
  }
}

async function processSingleFile(file: string, options: ParseCliOptions): Promise<void> {
  const filePath = resolve(file);
  const schemaVersion = resolveSchemaVersion({ cliVersion: options.schemaVersion });
  const parserOptions = toParserOptions(options, basename(filePath));

  if (options.verbose) {
    console.error(`[INFO] Parsing: ${filePath}`);
    console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
    console.error(`[INFO] Year resolver: ${parserOptions.yearResolver} (${parserOptions.dateFormat})`);
  }

  const lines = await readLineFile(filePath);
  const result = parseBankbook(lines, parserOptions);
  logDocumentResult(parserOptions.sourceName, result, options.verbose);

  const output: CliOutput = { parser: PARSER_NAME, parser_version: PARSER_VERSION, assets: [toExportPayload(result.asset)] };
  await emitOutput(output, schemaVersion, options);
}

async function processDirectory(inputDir: string, options: ParseCliOptions): Promise<void> {
  const dirPath = resolve(inputDir);
  const schemaVersion = resolveSchemaVersion({ cliVersion: options.schemaVersion });
  const parserOptions = toParserOptions(options, basename(dirPath));

  if (options.verbose) {
    console.error(`[INFO] Batch mode: scanning directory`);
    console.error(`[INFO] Directory: ${dirPath}`);
    console.error(`[INFO] Schema version: ${schemaVersion}`);
  }

  const validation = await validateDirectory(dirPath);
  if (!validation.valid) {
    console.error(`[ERROR] ${validation.error}`);
    process.exit(1);
  }

  const scanResult = await scanDirectoryForLineFiles(dirPath);
  if (scanResult.files.length === 0) {
    console.error('[ERROR] No OCR line files found in directory');
    for (const skip of scanResult.skipped) {
      console.error(`  - ${skip.fileName}: ${describeSkipReason(skip.reason)}`);
    }
    process.exit(1);
  }

  // One learned-format table for the whole run: every file belongs to the same caller.
  const result = await processBatch(scanResult.files, {
    parser: {
      bankCode: parserOptions.bankCode,
      bankName: parserOptions.bankName,
      dateFormat: parserOptions.dateFormat,
      yearResolver: parserOptions.yearResolver,
      cleanDescriptions: parserOptions.cleanDescriptions,
    },
    learnedFormats: new LearnedFormatTable(),
    onProgress: (current, total, fileName) => {
      console.error(`[INFO] Parsing ${current}/${total}: ${fileName}`);
    },
    onError: (error: ParseError) => {
      console.error(`[ERROR] Failed to parse ${error.fileName}: ${error.error}`);
    },
  });

  for (const document of result.documents) {
    logDocumentResult(document.fileName, document, options.verbose);
  }

  console.error('');
  console.error('=== Batch Processing Summary ===');
  console.error(`Files found:            ${result.summary.totalDocumentsFound}`);
  console.error(`Files succeeded:        ${result.summary.documentsSucceeded}`);
  console.error(`Files failed:           ${result.summary.documentsFailed}`);
  console.error(`Transactions:           ${result.summary.totalTransactions}`);
  console.error(`Rows dropped:           ${result.summary.rowsDropped}`);
  console.error('================================');

  const output: CliOutput = {
    parser: PARSER_NAME,
    parser_version: PARSER_VERSION,
    assets: result.documents.map((document) => toExportPayload(document.asset)),
    ...(result.parseErrors.length > 0
      ? { parse_errors: result.parseErrors.map((error) => ({ file_name: error.fileName, error: error.error })) }
      : {}),
  };
  await emitOutput(output, schemaVersion, options);
}

async function emitOutput(
  output: CliOutput,
  schemaVersion: SchemaVersion,
  options: ParseCliOptions
): Promise<void> {
  if (options.validate) {
    for (const asset of output.assets) {
      validateOutputOrThrow(schemaVersion, asset);
    }
    if (options.verbose) {
      console.error(`[INFO] Output valid against schema ${schemaVersion}`);
    }
  }

  const json = options.pretty ? JSON.stringify(output, null, 2) : JSON.stringify(output);
  if (options.out !== undefined) {
    const outPath = resolve(options.out);
    await writeFile(outPath, json, 'utf-8');
    console.error(`[SUCCESS] Output written to: ${outPath}`);
  } else {
    console.log(json);
  }
}

const DATE_ARGUMENT_PATTERN = /^(\d{1,4})[-/.](\d{1,2})[-/.](\d{1,2})$/;

function inferDate(date: string, options: InferDateCliOptions): void {
  const match = DATE_ARGUMENT_PATTERN.exec(date.trim());
  if (match === null) {
    throw new Error(`Date must look like yy-mm-dd: ${date}`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];

  const engine = new DateInferenceEngine();
  for (const entry of options.learn) {
    const [code = '', era = ''] = entry.split('=');
    const learned = engine.learn(BankCodeSchema.parse(code), EraInterpretationSchema.parse(era), { sampleDate: date });
    if (options.verbose) {
      console.error(`[INFO] Learned ${learned.bankCode} as ${learned.format}`);
    }
  }

  const surroundingDates = options.context ?? [];
  const result = engine.infer(year, month, day, {
    bankCode: options.bankCode !== undefined ? BankCodeSchema.parse(options.bankCode) : undefined,
    bankName: options.bankName,
    ...(surroundingDates.length > 0
      ? { surroundingDates, currentIndex: surroundingDates.length }
      : {}),
  });

  if (result.isAmbiguous) {
    console.error(`[WARN] Ambiguous year; ${result.alternatives.length} alternative(s) attached`);
  }

  console.log(
    JSON.stringify(
      {
        ...result,
        iso: toIsoDate(result),
        wareki: toWarekiDisplay(result),
      },
      null,
      2
    )
  );
}

await program.parseAsync(process.argv);
