/**
 * OCR line cleanup applied before any structural parsing.
 *
 * Width normalization is limited to punctuation: digits and
 * kana stay as the OCR engine emitted them.
 */

const CHARACTER_REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/[−―ー–—－]/g, '-'],
  [/／/g, '/'],
  [/[：；]/g, '-'],
  [/[・･]/g, ''],
  [/[*＊]/g, ''],
];

const SPACING_CLEANUP: ReadonlyArray<[RegExp, string]> = [
  [/\s*-\s*/g, '-'],
  [/-{2,}/g, '-'],
  [/\s+:/g, ':'],
  [/\s*,\s*/g, ','],
];

/**
 * Normalize one OCR line. Total and idempotent.
 */
export function normalizeLine(line: string): string {
  let text = line;
  for (const [pattern, replacement] of CHARACTER_REPLACEMENTS) {
    text = text.replace(pattern, replacement);
  }
  text = text.replace(/\s+/g, ' ');
  for (const [pattern, replacement] of SPACING_CLEANUP) {
    text = text.replace(pattern, replacement);
  }
  return text.trim();
}

export function normalizeLines(lines: readonly string[]): string[] {
  return lines.map(normalizeLine);
}
