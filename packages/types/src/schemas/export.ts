import type { DocumentType } from './asset.js';

/**
 * Wire shape of an asset record, as emitted by the CLI and validated by
 * `asset_record.<version>.schema.json`.
 */
export interface TransactionExport {
  transaction_date: string | null;
  description: string | null;
  withdrawal_amount: number | null;
  deposit_amount: number | null;
  balance: number | null;
  line_confidence: number | null;
}

export interface AssetExportPayload {
  category: DocumentType;
  type: string | null;
  source_document: string;
  owner_name: string[];
  asset_name: string | null;
  identifiers: {
    primary: string | null;
    secondary: string | null;
  };
  valuation: {
    basis: string | null;
    currency: 'JPY';
    amount: number | null;
  };
  notes: string | null;
  transactions: TransactionExport[];
}
