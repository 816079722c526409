import { VALUATION_CURRENCY, type AssetExportPayload, type AssetRecord, type TransactionLine } from '@passbook/types';
import type { BankbookMetadata } from './metadata/index.js';

export const BANK_DEPOSIT_TYPE = 'ordinary_deposit';
export const BANK_DEPOSIT_ASSET_NAME = '普通預金';
export const BANK_DEPOSIT_VALUATION_BASIS = '通帳残高';

export interface AssetRecordInput {
  sourceName: string;
  metadata: BankbookMetadata;
  transactions: TransactionLine[];
  /** Normalized document lines; the first `notesLineLimit` become the notes */
  lines: readonly string[];
  notesLineLimit: number;
}

function lastBalance(transactions: readonly TransactionLine[]): number | null {
  for (let i = transactions.length - 1; i >= 0; i--) {
    const balance = transactions[i]?.balance;
    if (balance !== undefined && balance !== null) return balance;
  }
  return null;
}

/**
 * Assemble the bank-deposit asset record for one document.
 */
export function buildAssetRecord(input: AssetRecordInput): AssetRecord {
  const { metadata, transactions } = input;
  const noteLines = input.lines.slice(0, input.notesLineLimit).filter((line) => line !== '');

  return {
    category: 'bank_deposit',
    type: BANK_DEPOSIT_TYPE,
    sourceDocument: input.sourceName,
    ownerName: metadata.ownerName !== null ? [metadata.ownerName] : [],
    assetName: BANK_DEPOSIT_ASSET_NAME,
    identifierPrimary: metadata.accountNumber,
    identifierSecondary: metadata.branchName,
    valuationBasis: BANK_DEPOSIT_VALUATION_BASIS,
    valuationCurrency: VALUATION_CURRENCY,
    valuationAmount: lastBalance(transactions),
    notes: noteLines.length > 0 ? noteLines.join('\n') : null,
    transactions,
  };
}

/**
 * Notes are the only part of a record that changes after assembly; this
 * returns a new record rather than mutating the given one.
 */
export function appendAssetNotes(asset: AssetRecord, notes: readonly string[]): AssetRecord {
  const additions = notes.map((note) => note.trim()).filter((note) => note !== '');
  if (additions.length === 0) return asset;

  const parts = asset.notes !== null && asset.notes !== '' ? [asset.notes, ...additions] : additions;
  return { ...asset, notes: parts.join('; ') };
}

export function toExportPayload(asset: AssetRecord): AssetExportPayload {
  return {
    category: asset.category,
    type: asset.type,
    source_document: asset.sourceDocument,
    owner_name: [...asset.ownerName],
    asset_name: asset.assetName,
    identifiers: {
      primary: asset.identifierPrimary,
      secondary: asset.identifierSecondary,
    },
    valuation: {
      basis: asset.valuationBasis,
      currency: asset.valuationCurrency,
      amount: asset.valuationAmount,
    },
    notes: asset.notes,
    transactions: asset.transactions.map((line) => ({
      transaction_date: line.transactionDate,
      description: line.description !== '' ? line.description : null,
      withdrawal_amount: line.withdrawalAmount,
      deposit_amount: line.depositAmount,
      balance: line.balance,
      line_confidence: line.confidence,
    })),
  };
}
