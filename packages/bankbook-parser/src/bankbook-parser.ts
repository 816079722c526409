import { toIsoDate, type ParserOptions, type TransactionLine } from '@passbook/types';
import {
  ContextualYearResolver,
  DateInferenceEngine,
  SimpleYearResolver,
  formatTwoDigitDate,
  type YearResolver,
  type YearResolverScope,
} from '@passbook/date-inference';
import { buildAssetRecord } from './asset-record.js';
import { parseCompactDate } from './compact-date.js';
import { normalizeDescription } from './description.js';
import { detectDocumentType } from './document-type.js';
import { buildTransactionFields } from './field-builder.js';
import { extractMetadata } from './metadata/index.js';
import { normalizeLines } from './normalizer.js';
import { segmentRows, type Row } from './row-segmenter.js';
import type {
  BankbookParseDependencies,
  BankbookParseOptions,
  BankbookParseResult,
  RowDiagnostics,
  RowDropReason,
} from './types.js';

export const DEFAULT_PARSER_OPTIONS: ParserOptions = {
  sourceName: 'document',
  dateFormat: 'auto',
  yearResolver: 'simple',
  cleanDescriptions: false,
  notesLineLimit: 30,
};

export function resolveParserOptions(options: BankbookParseOptions = {}): ParserOptions {
  return {
    sourceName: options.sourceName ?? DEFAULT_PARSER_OPTIONS.sourceName,
    bankCode: options.bankCode,
    bankName: options.bankName,
    dateFormat: options.dateFormat ?? DEFAULT_PARSER_OPTIONS.dateFormat,
    yearResolver: options.yearResolver ?? DEFAULT_PARSER_OPTIONS.yearResolver,
    cleanDescriptions: options.cleanDescriptions ?? DEFAULT_PARSER_OPTIONS.cleanDescriptions,
    notesLineLimit: options.notesLineLimit ?? DEFAULT_PARSER_OPTIONS.notesLineLimit,
  };
}

function rowTokens(row: Row): string[] {
  return row.segments.flatMap((segment) => segment.split(' ')).filter((token) => token !== '');
}

/**
 * Each row's `yy-mm-dd` reading under the static table, in document order.
 * Entry `k` belongs to the k-th row that carries a date.
 */
function collectSurroundingDates(tokenRows: readonly string[][], dateFormat: ParserOptions['dateFormat']): {
  surroundingDates: string[];
  datedBefore: number[];
} {
  const resolver = new SimpleYearResolver(dateFormat);
  const surroundingDates: string[] = [];
  const datedBefore: number[] = [];

  for (const tokens of tokenRows) {
    datedBefore.push(surroundingDates.length);
    const match = parseCompactDate(tokens, resolver);
    if (match !== null) {
      surroundingDates.push(formatTwoDigitDate(match.yearToken.value, match.date.month, match.date.day));
    }
  }

  return { surroundingDates, datedBefore };
}

function describeDrops(diagnostics: RowDiagnostics): string {
  const { dropped } = diagnostics;
  const total = dropped['no-date'] + dropped.empty;
  return `Dropped ${total} of ${diagnostics.rowsSeen} rows (no date: ${dropped['no-date']}, empty: ${dropped.empty})`;
}

/**
 * Parse the OCR lines of one passbook into a bank-deposit asset record.
 *
 * Never throws on malformed input: rows without a readable date or without
 * any content are dropped and counted in `diagnostics`.
 */
export function parseBankbook(
  lines: readonly string[],
  options: BankbookParseOptions = {},
  dependencies: BankbookParseDependencies = {}
): BankbookParseResult {
  const resolved = resolveParserOptions(options);
  const normalized = normalizeLines(lines);
  const documentType = detectDocumentType(normalized);
  const segmentation = segmentRows(normalized);
  const tokenRows = segmentation.rows.map(rowTokens);

  let resolver: YearResolver;
  let scopes: YearResolverScope[] | null = null;
  if (resolved.yearResolver === 'contextual') {
    resolver = new ContextualYearResolver(dependencies.engine ?? new DateInferenceEngine(), {
      bankCode: resolved.bankCode,
      bankName: resolved.bankName,
    });
    const { surroundingDates, datedBefore } = collectSurroundingDates(tokenRows, resolved.dateFormat);
    scopes = datedBefore.map((currentIndex) => ({ surroundingDates, currentIndex }));
  } else {
    resolver = new SimpleYearResolver(resolved.dateFormat);
  }

  const dropped: Record<RowDropReason, number> = { 'no-date': 0, empty: 0 };
  const transactions: TransactionLine[] = [];

  for (const [index, row] of segmentation.rows.entries()) {
    const tokens = tokenRows[index] ?? [];
    if (tokens.length === 0) {
      dropped.empty += 1;
      continue;
    }

    const dateMatch = parseCompactDate(tokens, resolver, scopes?.[index]);
    if (dateMatch === null) {
      dropped['no-date'] += 1;
      continue;
    }

    const fields = buildTransactionFields(tokens.slice(dateMatch.consumed));
    if (fields === null) {
      dropped.empty += 1;
      continue;
    }

    transactions.push({
      transactionDate: toIsoDate(dateMatch.date),
      description: resolved.cleanDescriptions ? normalizeDescription(fields.description) : fields.description,
      withdrawalAmount: fields.withdrawalAmount,
      depositAmount: fields.depositAmount,
      balance: fields.balance,
      confidence: dateMatch.confidence,
    });
  }

  const diagnostics: RowDiagnostics = {
    strategy: segmentation.strategy,
    rowsSeen: segmentation.rows.length,
    rowsAccepted: transactions.length,
    dropped,
  };

  const warnings: string[] = [];
  if (segmentation.strategy === 'none' && normalized.some((line) => line !== '')) {
    warnings.push('No transaction rows found');
  }
  if (diagnostics.rowsAccepted < diagnostics.rowsSeen) {
    warnings.push(describeDrops(diagnostics));
  }
  if (documentType !== 'bank_deposit') {
    warnings.push(`Document type detected as ${documentType}; parsed as a bank deposit passbook`);
  }

  const asset = buildAssetRecord({
    sourceName: resolved.sourceName,
    metadata: extractMetadata(normalized),
    transactions,
    lines: normalized,
    notesLineLimit: resolved.notesLineLimit,
  });

  return { documentType, asset, diagnostics, warnings };
}
