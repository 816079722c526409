import { isValidCalendarDate, type CalendarDate } from '@passbook/types';
import type { YearResolver, YearResolverScope, YearToken } from '@passbook/date-inference';

export interface CompactDateMatch {
  date: CalendarDate;
  /** Year digits as printed */
  yearToken: YearToken;
  /** Number of leading tokens that made up the date */
  consumed: number;
  confidence: number | null;
}

interface DigitSplit {
  year: string;
  month: string;
  day: string;
}

const DATE_TOKEN_PATTERN = /^[\d\-/.]+$/;
const GROUP_SEPARATOR = /[-/.]+/;
const MIN_GROUPS = 3;
const MIN_DIGITS = 6;
const YEAR_LENGTHS = [4, 3, 2] as const;
const MONTH_LENGTHS = [2, 1] as const;

/**
 * Collect the leading date-like tokens of a row. Stops once three digit
 * groups or six digits are in hand, or at the first token that is not
 * digits and separators.
 */
function collectDateTokens(tokens: readonly string[]): { groups: string[]; consumed: number } {
  const groups: string[] = [];
  let consumed = 0;

  for (const token of tokens) {
    if (!DATE_TOKEN_PATTERN.test(token)) break;
    groups.push(...token.split(GROUP_SEPARATOR).filter((group) => group !== ''));
    consumed += 1;

    const digitCount = groups.reduce((sum, group) => sum + group.length, 0);
    if (groups.length >= MIN_GROUPS || digitCount >= MIN_DIGITS) break;
  }

  return { groups, consumed };
}

function* candidateSplits(groups: readonly string[]): Generator<DigitSplit> {
  const [year, month, day] = groups;
  if (
    year !== undefined &&
    month !== undefined &&
    day !== undefined &&
    year.length <= 4 &&
    month.length <= 2 &&
    day.length <= 2
  ) {
    yield { year, month, day };
  }

  const digits = groups.join('');
  for (const yearLength of YEAR_LENGTHS) {
    for (const monthLength of MONTH_LENGTHS) {
      const dayLength = digits.length - yearLength - monthLength;
      if (dayLength < 1 || dayLength > 2) continue;
      yield {
        year: digits.slice(0, yearLength),
        month: digits.slice(yearLength, yearLength + monthLength),
        day: digits.slice(yearLength + monthLength),
      };
    }
  }
}

/**
 * Parse the date at the start of a row's tokens. Digit-length splits are
 * tried in order and the first calendar-valid one wins; returns null when
 * none validates.
 */
export function parseCompactDate(
  tokens: readonly string[],
  resolver: YearResolver,
  scope?: YearResolverScope
): CompactDateMatch | null {
  const { groups, consumed } = collectDateTokens(tokens);
  if (consumed === 0) return null;

  for (const split of candidateSplits(groups)) {
    const month = Number(split.month);
    const day = Number(split.day);
    if (month < 1 || month > 12 || day < 1 || day > 31) continue;

    const yearToken: YearToken = { text: split.year, value: Number(split.year), digits: split.year.length };
    const resolution = resolver.resolve(yearToken, month, day, scope);
    if (resolution === null || !isValidCalendarDate(resolution.year, month, day)) continue;

    return {
      date: { year: resolution.year, month, day },
      yearToken,
      consumed,
      confidence: resolution.confidence,
    };
  }

  return null;
}
