import { describe, it, expect } from 'vitest';
import {
  DateInferenceEngine,
  SimpleYearResolver,
  ContextualYearResolver,
  createYearResolver,
  resolveTwoDigitYear,
  type YearToken,
} from '@passbook/date-inference';

const token = (text: string): YearToken => ({ text, value: Number(text), digits: text.length });

const engine = (): DateInferenceEngine => new DateInferenceEngine({ now: () => new Date(2026, 5, 1) });

describe('resolveTwoDigitYear', () => {
  it('should map era bands under auto', () => {
    expect(resolveTwoDigitYear(1, 'auto')).toBe(2019);
    expect(resolveTwoDigitYear(5, 'auto')).toBe(2023);
    expect(resolveTwoDigitYear(6, 'auto')).toBe(1994);
    expect(resolveTwoDigitYear(31, 'auto')).toBe(2019);
    expect(resolveTwoDigitYear(32, 'auto')).toBe(1957);
    expect(resolveTwoDigitYear(64, 'auto')).toBe(1989);
  });

  it('should fall back to 2000 outside the era bands', () => {
    expect(resolveTwoDigitYear(0, 'auto')).toBe(2000);
    expect(resolveTwoDigitYear(65, 'auto')).toBe(2065);
  });

  it('should read wareki like auto', () => {
    expect(resolveTwoDigitYear(17, 'wareki')).toBe(2005);
  });

  it('should use a sliding century under western', () => {
    expect(resolveTwoDigitYear(49, 'western')).toBe(2049);
    expect(resolveTwoDigitYear(50, 'western')).toBe(1950);
    expect(resolveTwoDigitYear(5, 'western')).toBe(2005);
  });
});

describe('SimpleYearResolver', () => {
  const resolver = new SimpleYearResolver();

  it('should resolve two-digit years without a confidence', () => {
    expect(resolver.resolve(token('01'))).toEqual({ year: 2019, confidence: null });
  });

  it('should keep four-digit years literal', () => {
    expect(resolver.resolve(token('2019'))).toEqual({ year: 2019, confidence: null });
  });

  it('should reject zero-padded and pre-1900 long years', () => {
    expect(resolver.resolve(token('0119'))).toBeNull();
    expect(resolver.resolve(token('011'))).toBeNull();
    expect(resolver.resolve(token('1899'))).toBeNull();
    expect(resolver.resolve(token('123'))).toBeNull();
  });

  it('should honour the date format hint', () => {
    expect(new SimpleYearResolver('western').resolve(token('17'))).toEqual({ year: 2017, confidence: null });
  });
});

describe('ContextualYearResolver', () => {
  it('should resolve through the engine cascade', () => {
    const resolver = new ContextualYearResolver(engine());
    expect(resolver.resolve(token('01'), 12, 6)).toEqual({ year: 2019, confidence: 0.6 });
  });

  it('should pass bank metadata to the engine', () => {
    const resolver = new ContextualYearResolver(engine(), { bankCode: '0001' });
    expect(resolver.resolve(token('17'), 11, 24)).toEqual({ year: 2017, confidence: 0.9 });
  });

  it('should pass the document scope to the engine', () => {
    const resolver = new ContextualYearResolver(engine());
    const resolution = resolver.resolve(token('05'), 2, 2, { surroundingDates: ['09-01-01', '05-02-02'], currentIndex: 1 });
    expect(resolution).toEqual({ year: 1993, confidence: 0.8 });
  });

  it('should score literal years as certain', () => {
    expect(new ContextualYearResolver(engine()).resolve(token('2019'), 12, 6)).toEqual({ year: 2019, confidence: 1 });
  });
});

describe('createYearResolver', () => {
  it('should build the requested strategy', () => {
    expect(createYearResolver('simple').kind).toBe('simple');
    expect(createYearResolver('contextual').kind).toBe('contextual');
  });

  it('should forward options', () => {
    const simple = createYearResolver('simple', { dateFormat: 'western' });
    expect(simple.resolve(token('49'), 1, 1)).toEqual({ year: 2049, confidence: null });

    const contextual = createYearResolver('contextual', { engine: engine(), bankName: 'みずほ銀行' });
    expect(contextual.resolve(token('17'), 11, 24)).toEqual({ year: 2017, confidence: 0.9 });
  });
});
