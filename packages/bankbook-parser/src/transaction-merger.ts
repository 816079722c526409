import type { TransactionLine } from '@passbook/types';

const AMOUNT_TOLERANCE = 0.01;

export interface TransactionMergeResult {
  transactions: TransactionLine[];
  matched: number;
  appended: number;
}

function amountsEqual(a: number | null, b: number | null): boolean {
  if (a === null || b === null) return a === b;
  return Math.abs(a - b) <= AMOUNT_TOLERANCE;
}

/**
 * Two extractions of the same passbook entry: same date and the same
 * withdrawal, deposit and balance within a yen cent.
 */
export function transactionsEquivalent(a: TransactionLine, b: TransactionLine): boolean {
  return (
    (a.transactionDate ?? '') === (b.transactionDate ?? '') &&
    amountsEqual(a.withdrawalAmount, b.withdrawalAmount) &&
    amountsEqual(a.depositAmount, b.depositAmount) &&
    amountsEqual(a.balance, b.balance)
  );
}

function fillMissingFields(primary: TransactionLine, supplementary: TransactionLine): TransactionLine {
  return {
    ...primary,
    description: primary.description !== '' ? primary.description : supplementary.description,
    withdrawalAmount: primary.withdrawalAmount ?? supplementary.withdrawalAmount,
    depositAmount: primary.depositAmount ?? supplementary.depositAmount,
    balance: primary.balance ?? supplementary.balance,
    confidence: primary.confidence ?? supplementary.confidence,
  };
}

export function compareTransactions(a: TransactionLine, b: TransactionLine): number {
  const byDate = (a.transactionDate ?? '').localeCompare(b.transactionDate ?? '');
  if (byDate !== 0) return byDate;
  return (a.balance ?? 0) - (b.balance ?? 0);
}

/**
 * Merge a second extraction of the same document into the first. Matching
 * lines only fill fields the primary is missing; the rest are appended.
 * The result is ordered by date, then balance.
 */
export function mergeTransactions(
  primary: readonly TransactionLine[],
  supplementary: readonly TransactionLine[]
): TransactionMergeResult {
  const merged = [...primary];
  let matched = 0;
  let appended = 0;

  for (const candidate of supplementary) {
    const index = merged.findIndex((existing) => transactionsEquivalent(existing, candidate));
    const existing = index >= 0 ? merged[index] : undefined;
    if (existing !== undefined) {
      merged[index] = fillMissingFields(existing, candidate);
      matched++;
    } else {
      merged.push(candidate);
      appended++;
    }
  }

  merged.sort(compareTransactions);
  return { transactions: merged, matched, appended };
}

export function getTransactionKey(line: TransactionLine): string {
  return [
    line.transactionDate ?? '',
    line.description.replace(/\s+/g, ''),
    line.withdrawalAmount ?? '',
    line.depositAmount ?? '',
    line.balance ?? '',
  ].join('|');
}

/**
 * Drop exact duplicates (whitespace in descriptions ignored), keeping the
 * first occurrence.
 */
export function deduplicateTransactions(transactions: readonly TransactionLine[]): TransactionLine[] {
  const seen = new Set<string>();
  const result: TransactionLine[] = [];

  for (const line of transactions) {
    const key = getTransactionKey(line);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(line);
    }
  }

  return result;
}
