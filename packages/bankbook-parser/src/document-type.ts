import type { DocumentType } from '@passbook/types';

const DOCUMENT_KEYWORDS: ReadonlyArray<{ type: DocumentType; keywords: readonly string[] }> = [
  { type: 'bank_deposit', keywords: ['普通預金', '通帳', '預金', '入出金'] },
  { type: 'land', keywords: ['固定資産税', '地番', '家屋'] },
];

/**
 * Classify a document by keyword. Deposit keywords take precedence.
 */
export function detectDocumentType(lines: readonly string[]): DocumentType {
  const text = lines.join('\n');
  const match = DOCUMENT_KEYWORDS.find(({ keywords }) => keywords.some((keyword) => text.includes(keyword)));
  return match?.type ?? 'unknown';
}
