import type { AssetRecord, DocumentType, ParserOptions } from '@passbook/types';
import type { DateInferenceEngine } from '@passbook/date-inference';
import type { SegmentationStrategy } from './row-segmenter.js';

/**
 * `no-date`: no calendar-valid date at the start of the row.
 * `empty`: a row marker without body, or a body with neither text nor amounts.
 */
export type RowDropReason = 'no-date' | 'empty';

/**
 * Row accounting for one document. Dropping rows is part of the parsing
 * contract; these counts make the loss visible.
 */
export interface RowDiagnostics {
  strategy: SegmentationStrategy | 'none';
  rowsSeen: number;
  rowsAccepted: number;
  dropped: Record<RowDropReason, number>;
}

export interface BankbookParseResult {
  documentType: DocumentType;
  asset: AssetRecord;
  diagnostics: RowDiagnostics;
  warnings: string[];
}

export type BankbookParseOptions = Partial<ParserOptions>;

export interface BankbookParseDependencies {
  /**
   * Engine used by the contextual resolver. Supply one to share a learned
   * format table across documents of the same session.
   */
  engine?: DateInferenceEngine;
}
