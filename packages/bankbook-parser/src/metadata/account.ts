export const ACCOUNT_LABELS = ['口座番号', '店番号', '座番号'] as const;

const ACCOUNT_NUMBER_PATTERN = /(?<!\d)\d{6,10}(?!\d)/g;
const LABEL_WINDOW_LINES = 5;

function pickPreferred(candidates: readonly string[]): string | null {
  const preferred = candidates.find((candidate) => candidate.length === 7 || candidate.length === 8);
  if (preferred !== undefined) return preferred;

  let longest: string | null = null;
  for (const candidate of candidates) {
    if (longest === null || candidate.length > longest.length) longest = candidate;
  }
  return longest;
}

/**
 * Account number near a label (the label line and the five lines after it),
 * preferring 7–8 digit runs. Falls back to the first 6–10 digit run in the
 * document.
 */
export function extractAccountNumber(lines: readonly string[]): string | null {
  for (const [index, line] of lines.entries()) {
    if (!ACCOUNT_LABELS.some((label) => line.includes(label))) continue;

    const window = lines.slice(index, index + LABEL_WINDOW_LINES + 1);
    const candidates = window.flatMap((windowLine) => [...windowLine.matchAll(ACCOUNT_NUMBER_PATTERN)].map((m) => m[0]));
    const picked = pickPreferred(candidates);
    if (picked !== null) return picked;
  }

  for (const line of lines) {
    const match = line.match(/(?<!\d)\d{6,10}(?!\d)/);
    if (match !== null) return match[0];
  }

  return null;
}
