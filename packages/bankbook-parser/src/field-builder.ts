/**
 * Splits a row's remaining tokens into description text and amounts, and
 * assigns the withdrawal, deposit and balance roles.
 */
import { parseAmount } from '@passbook/types';

export interface TransactionFields {
  description: string;
  withdrawalAmount: number | null;
  depositAmount: number | null;
  balance: number | null;
}

export const DEPOSIT_KEYWORDS = ['振込', '入金', '預入', '配当', '振込入金', '定期積金'] as const;

const AMOUNT_PATTERN = /[+-]?\d[\d,]*/g;
/** Anything smaller is treated as a misread row or column index. */
const MIN_AMOUNT = 10;

export function isNumericToken(token: string): boolean {
  const stripped = token.replace(/,/g, '').replace(/^[+-]/, '');
  return /^\d+$/.test(stripped);
}

export function isDepositDescription(description: string): boolean {
  return DEPOSIT_KEYWORDS.some((keyword) => description.includes(keyword));
}

function extractAmounts(text: string): number[] {
  return [...text.matchAll(AMOUNT_PATTERN)]
    .map((match) => parseAmount(match[0]))
    .filter((value) => Math.abs(value) >= MIN_AMOUNT);
}

/**
 * Build the non-date fields of a transaction line. Returns null when the
 * tokens carry neither a description nor an amount.
 */
export function buildTransactionFields(tokens: readonly string[]): TransactionFields | null {
  const textTokens = tokens.filter((token) => !isNumericToken(token));
  const description = (textTokens.length > 0 ? textTokens : tokens).join(' ').trim();
  const amounts = extractAmounts(tokens.join(' '));

  if (amounts.length === 0 && description === '') return null;

  const fields: TransactionFields = {
    description,
    withdrawalAmount: null,
    depositAmount: null,
    balance: amounts.at(-1) ?? null,
  };

  // Any sign on the primary amount is ignored; the description decides its role.
  const primary = amounts.length >= 2 ? amounts[0] : undefined;
  if (primary !== undefined) {
    const magnitude = Math.abs(primary);
    if (isDepositDescription(description)) {
      fields.depositAmount = magnitude;
    } else {
      fields.withdrawalAmount = magnitude;
    }
  }

  return fields;
}
