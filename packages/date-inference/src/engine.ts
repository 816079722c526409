import {
  currentReiwaYear,
  eraYearToGregorian,
  isValidCalendarDate,
  type DateAlternative,
  type DateInferenceContext,
  type DateInferenceResult,
  type EraInterpretation,
  type InferenceMethod,
} from '@passbook/types';
import { findBankCodeByName, lookupBankFormat } from './bank-formats.js';
import { LearnedFormatTable, type LearnDetails, type LearnedBankFormat } from './learned-formats.js';

export interface DateInferenceEngineOptions {
  /** Per-session learned bank formats; a fresh table is created when omitted. */
  learnedFormats?: LearnedFormatTable;
  /** Clock used for the current Reiwa year. */
  now?: () => Date;
}

/** `[twoDigitYear, month, day]` */
export type TwoDigitDate = readonly [number, number, number];

/**
 * Resolves two-digit passbook years to Gregorian years.
 *
 * Cascade, first match wins:
 * 1. 32 and above is a Gregorian 20xx year.
 * 2. A confirmed format (context or learned) or a known bank convention.
 * 3. 8–31 is most likely Heisei.
 * 4. 1–7 is read against the confidently resolved years around it.
 * 5. Otherwise Reiwa while the year is not in the future, else Heisei.
 */
export class DateInferenceEngine {
  static readonly DEFINITE_GREGORIAN_THRESHOLD = 32;
  static readonly HIGH_PROBABILITY_HEISEI_MIN = 8;
  static readonly AMBIGUOUS_MAX = 7;
  static readonly CONTEXT_MARGIN_YEARS = 5;

  private readonly learnedFormats: LearnedFormatTable;
  private readonly now: () => Date;

  constructor(options: DateInferenceEngineOptions = {}) {
    this.learnedFormats = options.learnedFormats ?? new LearnedFormatTable();
    this.now = options.now ?? (() => new Date());
  }

  get currentReiwaYear(): number {
    return currentReiwaYear(this.now());
  }

  infer(year: number, month: number, day: number, context: DateInferenceContext = {}): DateInferenceResult {
    if (year >= 100) {
      return this.literalYearResult(year, month, day);
    }

    if (year >= DateInferenceEngine.DEFINITE_GREGORIAN_THRESHOLD || year === 0) {
      return this.definiteGregorianResult(year, month, day);
    }

    if (context.userConfirmedFormat !== undefined) {
      return this.resultFromInterpretation(year, month, day, context.userConfirmedFormat, 'user-confirmed', 0.95);
    }

    const bankCode = context.bankCode ?? (context.bankName !== undefined ? findBankCodeByName(context.bankName) : undefined);
    if (bankCode !== undefined) {
      const bankResult = this.inferFromBankCode(year, month, day, bankCode);
      if (bankResult !== null) {
        return bankResult;
      }
    }

    if (year >= DateInferenceEngine.HIGH_PROBABILITY_HEISEI_MIN) {
      return this.highProbabilityHeiseiResult(year, month, day);
    }

    const surroundingDates = context.surroundingDates ?? [];
    if (year >= 1 && year <= DateInferenceEngine.AMBIGUOUS_MAX && surroundingDates.length > 0) {
      const contextResult = this.inferFromContext(year, month, day, surroundingDates, context.currentIndex);
      if (contextResult !== null) {
        return contextResult;
      }
    }

    return this.defaultResult(year, month, day);
  }

  /**
   * Infer a document's dates together. Every call sees the whole list as its
   * surrounding dates, with its own position as the current index.
   */
  inferBatch(dates: readonly TwoDigitDate[], context: DateInferenceContext = {}): DateInferenceResult[] {
    const surroundingDates = dates.map(([year, month, day]) => formatTwoDigitDate(year, month, day));
    return dates.map(([year, month, day], index) =>
      this.infer(year, month, day, { ...context, surroundingDates, currentIndex: index })
    );
  }

  learn(bankCode: string, interpretation: EraInterpretation, details: LearnDetails = {}): LearnedBankFormat {
    return this.learnedFormats.learn(bankCode, interpretation, details);
  }

  getLearnedFormats(): Map<string, LearnedBankFormat> {
    return this.learnedFormats.snapshot();
  }

  private inferFromBankCode(year: number, month: number, day: number, bankCode: string): DateInferenceResult | null {
    const learned = this.learnedFormats.get(bankCode);
    if (learned !== undefined) {
      return this.resultFromInterpretation(year, month, day, learned.format, 'user-confirmed', 0.95);
    }

    const bankFormat = lookupBankFormat(bankCode);
    switch (bankFormat) {
      case 'gregorian': {
        const gregorianYear = eraYearToGregorian('gregorian', year);
        if (!isValidCalendarDate(gregorianYear, month, day)) return null;
        return buildResult(gregorianYear, month, day, 0.9, 'bank-lookup');
      }
      case 'wareki':
        return this.inferFromWarekiBank(year, month, day);
      case undefined:
        return null;
    }
  }

  private inferFromWarekiBank(year: number, month: number, day: number): DateInferenceResult | null {
    const reiwaYear = eraYearToGregorian('reiwa', year);
    const heiseiYear = eraYearToGregorian('heisei', year);
    const heiseiValid = isValidCalendarDate(heiseiYear, month, day);

    if (year <= this.currentReiwaYear) {
      const reiwaValid = isValidCalendarDate(reiwaYear, month, day);
      if (reiwaValid && heiseiValid) {
        // Recent entries are the common case, so Reiwa leads.
        return buildResult(reiwaYear, month, day, 0.7, 'bank-lookup', [
          { year: heiseiYear, interpretation: 'heisei' },
        ]);
      }
      if (reiwaValid) {
        return buildResult(reiwaYear, month, day, 0.85, 'bank-lookup');
      }
    }

    if (heiseiValid) {
      return buildResult(heiseiYear, month, day, 0.85, 'bank-lookup');
    }
    return null;
  }

  private inferFromContext(
    year: number,
    month: number,
    day: number,
    surroundingDates: readonly string[],
    currentIndex: number | undefined
  ): DateInferenceResult | null {
    const resolvedYears = surroundingDates.map(confidentYearOf);
    const confirmed = resolvedYears.filter((value): value is number => value !== null);
    if (confirmed.length === 0) return null;

    const margin = DateInferenceEngine.CONTEXT_MARGIN_YEARS;
    const lowest = confirmed.reduce((min, value) => Math.min(min, value)) - margin;
    const highest = confirmed.reduce((max, value) => Math.max(max, value)) + margin;

    const reiwaYear = eraYearToGregorian('reiwa', year);
    const heiseiYear = eraYearToGregorian('heisei', year);
    const reiwaFits = reiwaYear >= lowest && reiwaYear <= highest;
    const heiseiFits = heiseiYear >= lowest && heiseiYear <= highest;

    let interpretation: EraInterpretation | null = null;
    if (reiwaFits && !heiseiFits) {
      interpretation = 'reiwa';
    } else if (heiseiFits && !reiwaFits) {
      interpretation = 'heisei';
    } else if (reiwaFits && heiseiFits) {
      const previous = precedingResolvedYear(resolvedYears, currentIndex);
      if (previous !== null) {
        const reiwaDistance = Math.abs(reiwaYear - previous);
        const heiseiDistance = Math.abs(heiseiYear - previous);
        if (reiwaDistance < heiseiDistance) interpretation = 'reiwa';
        else if (heiseiDistance < reiwaDistance) interpretation = 'heisei';
      }
    }

    if (interpretation === null) return null;
    return this.resultFromInterpretation(year, month, day, interpretation, 'context-based', 0.8);
  }

  private highProbabilityHeiseiResult(year: number, month: number, day: number): DateInferenceResult {
    const alternatives: DateAlternative[] = [];
    const gregorianYear = eraYearToGregorian('gregorian', year);
    if (isValidCalendarDate(gregorianYear, month, day)) {
      alternatives.push({ year: gregorianYear, interpretation: 'gregorian' });
    }
    return buildResult(eraYearToGregorian('heisei', year), month, day, 0.85, 'high-probability-heisei', alternatives);
  }

  private defaultResult(year: number, month: number, day: number): DateInferenceResult {
    const heiseiYear = eraYearToGregorian('heisei', year);

    if (year <= this.currentReiwaYear) {
      const alternatives: DateAlternative[] = isValidCalendarDate(heiseiYear, month, day)
        ? [{ year: heiseiYear, interpretation: 'heisei' }]
        : [];
      return {
        ...buildResult(eraYearToGregorian('reiwa', year), month, day, 0.6, 'default-reiwa', alternatives),
        isAmbiguous: true,
      };
    }

    return buildResult(heiseiYear, month, day, 0.7, 'default-heisei');
  }

  private definiteGregorianResult(year: number, month: number, day: number): DateInferenceResult {
    return buildResult(eraYearToGregorian('gregorian', year), month, day, 1.0, 'definite-gregorian');
  }

  private literalYearResult(year: number, month: number, day: number): DateInferenceResult {
    return { ...buildResult(year, month, day, 1.0, 'definite-gregorian'), originalYearDigits: 4 };
  }

  private resultFromInterpretation(
    year: number,
    month: number,
    day: number,
    interpretation: EraInterpretation,
    method: InferenceMethod,
    confidence: number
  ): DateInferenceResult {
    return buildResult(eraYearToGregorian(interpretation, year), month, day, confidence, method);
  }
}

function buildResult(
  year: number,
  month: number,
  day: number,
  confidence: number,
  inferenceMethod: InferenceMethod,
  alternatives: DateAlternative[] = []
): DateInferenceResult {
  return {
    year,
    month,
    day,
    confidence,
    inferenceMethod,
    isAmbiguous: alternatives.length > 0,
    originalYearDigits: 2,
    alternatives,
  };
}

export function formatTwoDigitDate(year: number, month: number, day: number): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${pad(year)}-${pad(month)}-${pad(day)}`;
}

/**
 * Year of a `yy-mm-dd` token when it resolves without ambiguity
 * (definite Gregorian or the Heisei band); null otherwise.
 */
function confidentYearOf(dateStr: string): number | null {
  const head = dateStr.trim().split(/[-/.]/)[0] ?? '';
  if (!/^\d+$/.test(head)) return null;

  const value = Number(head);
  if (value >= 100) return value;
  if (value >= DateInferenceEngine.DEFINITE_GREGORIAN_THRESHOLD) return eraYearToGregorian('gregorian', value);
  if (value >= DateInferenceEngine.HIGH_PROBABILITY_HEISEI_MIN) return eraYearToGregorian('heisei', value);
  return null;
}

function precedingResolvedYear(resolvedYears: readonly (number | null)[], currentIndex: number | undefined): number | null {
  if (currentIndex === undefined) return null;
  for (let i = Math.min(currentIndex, resolvedYears.length) - 1; i >= 0; i--) {
    const value = resolvedYears[i];
    if (value !== undefined && value !== null) return value;
  }
  return null;
}
