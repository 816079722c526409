/**
 * Groups normalized OCR lines into logical transaction rows.
 *
 * Two strategies, tried in order. The first one that yields a row is used for
 * the whole document; rows from different strategies are never mixed.
 */

export type SegmentationStrategy = 'row-code' | 'inline-date';

/**
 * One logical transaction row.
 */
export interface Row {
  /** 3-digit row code for `row-code` rows, null for `inline-date` rows */
  code: string | null;
  /** Row body, one entry per line or line fragment */
  segments: string[];
}

export interface SegmentationResult {
  strategy: SegmentationStrategy | 'none';
  rows: Row[];
}

const ROW_CODE_PATTERN = /^\d{3}$/;
const INLINE_DATE_PATTERN = /(?<!\d)\d{1,4}[-/]\d{1,2}[-/]\d{1,2}/g;

export function isRowCode(token: string): boolean {
  return ROW_CODE_PATTERN.test(token.trim());
}

/**
 * Row-code grouping: a line of exactly three digits opens a row, which
 * absorbs every following line up to the next marker. Lines before the
 * first marker belong to no row. Markers with no body are kept as empty rows.
 */
export function segmentByRowCode(lines: readonly string[]): Row[] {
  const rows: Row[] = [];
  let current: Row | null = null;

  for (const line of lines) {
    const trimmed = line.trim();
    if (isRowCode(trimmed)) {
      if (current !== null) rows.push(current);
      current = { code: trimmed, segments: [] };
      continue;
    }
    if (current !== null && trimmed !== '') {
      current.segments.push(trimmed);
    }
  }

  if (current !== null) rows.push(current);
  return rows;
}

/**
 * Inline-date splitting: every date-like token starts a new row that runs
 * up to the next one, across line boundaries. Text before the first date
 * is preamble and dropped.
 */
export function segmentByInlineDates(lines: readonly string[]): Row[] {
  const rows: Row[] = [];
  let current: Row | null = null;

  const pushText = (text: string): void => {
    const trimmed = text.trim();
    if (current !== null && trimmed !== '') current.segments.push(trimmed);
  };

  for (const line of lines) {
    let cursor = 0;
    for (const match of line.matchAll(INLINE_DATE_PATTERN)) {
      const start = match.index ?? 0;
      pushText(line.slice(cursor, start));
      if (current !== null) rows.push(current);
      current = { code: null, segments: [match[0]] };
      cursor = start + match[0].length;
    }
    pushText(line.slice(cursor));
  }

  if (current !== null) rows.push(current);
  return rows;
}

export function segmentRows(lines: readonly string[]): SegmentationResult {
  const byRowCode = segmentByRowCode(lines);
  if (byRowCode.some((row) => row.segments.length > 0)) {
    return { strategy: 'row-code', rows: byRowCode };
  }

  const byInlineDate = segmentByInlineDates(lines);
  if (byInlineDate.length > 0) {
    return { strategy: 'inline-date', rows: byInlineDate };
  }

  return { strategy: 'none', rows: [] };
}
