import type { DateFormatHint, EraInterpretation, YearResolverKind } from '@passbook/types';
import { DateInferenceEngine } from './engine.js';

/** Year digits as printed in a date token. */
export interface YearToken {
  text: string;
  value: number;
  digits: number;
}

export interface YearResolution {
  year: number;
  /** Resolver confidence; null when the resolver does not score its guesses. */
  confidence: number | null;
}

/** Document-wide date context for resolvers that read neighbouring rows. */
export interface YearResolverScope {
  surroundingDates: readonly string[];
  currentIndex: number;
}

/**
 * Turns the year part of a date token into a Gregorian year. Calendar
 * validity of the full date is the caller's check.
 */
export interface YearResolver {
  readonly kind: YearResolverKind;
  resolve(token: YearToken, month: number, day: number, scope?: YearResolverScope): YearResolution | null;
}

const MIN_LITERAL_YEAR = 1900;

/** Upper bound (inclusive) of each era band of the static table, lowest band last. */
const ERA_BANDS: ReadonlyArray<{ max: number; offset: number }> = [
  { max: 5, offset: 2018 },
  { max: 31, offset: 1988 },
  { max: 64, offset: 1925 },
];

/**
 * Static two-digit year table. `western` reads a sliding century; `auto` and
 * `wareki` read 1–5 as Reiwa, 6–31 as Heisei and 32–64 as Showa.
 */
export function resolveTwoDigitYear(value: number, format: DateFormatHint): number {
  if (format === 'western') {
    return value < 50 ? 2000 + value : 1900 + value;
  }
  if (value >= 1) {
    const band = ERA_BANDS.find((candidate) => value <= candidate.max);
    if (band !== undefined) return band.offset + value;
  }
  return 2000 + value;
}

function resolveLiteralYear(token: YearToken): number | null {
  // 0 prefixed years are zero-padded two digit years, never literal.
  if (token.text.startsWith('0') || token.value < MIN_LITERAL_YEAR) return null;
  return token.value;
}

export class SimpleYearResolver implements YearResolver {
  readonly kind = 'simple' as const;

  constructor(private readonly dateFormat: DateFormatHint = 'auto') {}

  resolve(token: YearToken): YearResolution | null {
    if (token.digits >= 3) {
      const year = resolveLiteralYear(token);
      return year === null ? null : { year, confidence: null };
    }
    return { year: resolveTwoDigitYear(token.value, this.dateFormat), confidence: null };
  }
}

export interface ContextualYearResolverOptions {
  bankCode?: string;
  bankName?: string;
  userConfirmedFormat?: EraInterpretation;
}

/**
 * Resolves two-digit years through the inference engine, carrying bank
 * metadata and the document's other dates as context.
 */
export class ContextualYearResolver implements YearResolver {
  readonly kind = 'contextual' as const;

  constructor(
    private readonly engine: DateInferenceEngine,
    private readonly options: ContextualYearResolverOptions = {}
  ) {}

  resolve(token: YearToken, month: number, day: number, scope?: YearResolverScope): YearResolution | null {
    if (token.digits >= 3) {
      const year = resolveLiteralYear(token);
      return year === null ? null : { year, confidence: 1 };
    }

    const result = this.engine.infer(token.value, month, day, {
      ...this.options,
      ...(scope !== undefined
        ? { surroundingDates: [...scope.surroundingDates], currentIndex: scope.currentIndex }
        : {}),
    });
    return { year: result.year, confidence: result.confidence };
  }
}

export interface CreateYearResolverOptions extends ContextualYearResolverOptions {
  dateFormat?: DateFormatHint;
  engine?: DateInferenceEngine;
}

export function createYearResolver(kind: YearResolverKind, options: CreateYearResolverOptions = {}): YearResolver {
  switch (kind) {
    case 'simple':
      return new SimpleYearResolver(options.dateFormat);
    case 'contextual':
      return new ContextualYearResolver(options.engine ?? new DateInferenceEngine(), {
        bankCode: options.bankCode,
        bankName: options.bankName,
        userConfirmedFormat: options.userConfirmedFormat,
      });
  }
}
