import { DateInferenceEngine, LearnedFormatTable } from '@passbook/date-inference';
import { parseBankbook } from './bankbook-parser.js';
import type { LineFileInfo } from './directory-scanner.js';
import { readLineFile } from './line-file.js';
import type { BankbookParseOptions, BankbookParseResult } from './types.js';

export interface ParseError {
  fileName: string;
  filePath: string;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface DocumentResult extends BankbookParseResult {
  fileName: string;
  filePath: string;
}

export interface BatchProcessResult {
  documents: DocumentResult[];
  parseErrors: ParseError[];
  summary: {
    totalDocumentsFound: number;
    documentsSucceeded: number;
    documentsFailed: number;
    totalTransactions: number;
    rowsDropped: number;
  };
}

export interface BatchProcessOptions {
  /** Parser options applied to every document; `sourceName` defaults to the file name */
  parser?: Omit<BankbookParseOptions, 'sourceName'>;
  /**
   * Learned bank formats shared by every document of the batch. Without
   * one, each document starts from an empty table.
   */
  learnedFormats?: LearnedFormatTable;
  now?: () => Date;
  onProgress?: (current: number, total: number, fileName: string) => void;
  onError?: (error: ParseError) => void;
}

/**
 * Parses each OCR line file independently and sequentially. A file that
 * cannot be read is recorded as a ParseError and the batch continues.
 */
export async function processBatch(
  files: readonly LineFileInfo[],
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const documents: DocumentResult[] = [];
  const parseErrors: ParseError[] = [];

  for (const [index, file] of files.entries()) {
    options.onProgress?.(index + 1, files.length, file.fileName);

    try {
      const lines = await readLineFile(file.filePath, file.format);
      const engine = new DateInferenceEngine({
        learnedFormats: options.learnedFormats ?? new LearnedFormatTable(),
        now: options.now,
      });
      const result = parseBankbook(lines, { ...options.parser, sourceName: file.fileName }, { engine });
      documents.push({ ...result, fileName: file.fileName, filePath: file.filePath });
    } catch (error) {
      const parseError = createParseError(file, error);
      parseErrors.push(parseError);
      options.onError?.(parseError);
    }
  }

  return {
    documents,
    parseErrors,
    summary: {
      totalDocumentsFound: files.length,
      documentsSucceeded: documents.length,
      documentsFailed: parseErrors.length,
      totalTransactions: documents.reduce((sum, doc) => sum + doc.asset.transactions.length, 0),
      rowsDropped: documents.reduce((sum, doc) => sum + (doc.diagnostics.rowsSeen - doc.diagnostics.rowsAccepted), 0),
    },
  };
}

function createParseError(file: LineFileInfo, error: unknown): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    fileName: file.fileName,
    filePath: file.filePath,
    error: message,
    stack,
    timestamp: new Date().toISOString(),
  };
}
