import { extractAccountNumber } from './account.js';
import { extractBranchName } from './branch.js';
import { extractOwnerName } from './owner.js';

export interface BankbookMetadata {
  ownerName: string | null;
  accountNumber: string | null;
  branchName: string | null;
}

/** Run every extractor over the full normalized line set. */
export function extractMetadata(lines: readonly string[]): BankbookMetadata {
  return {
    ownerName: extractOwnerName(lines),
    accountNumber: extractAccountNumber(lines),
    branchName: extractBranchName(lines),
  };
}

export { extractAccountNumber, ACCOUNT_LABELS } from './account.js';
export { extractBranchName, isPlaceholder } from './branch.js';
export { extractOwnerName } from './owner.js';
