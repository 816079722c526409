import { describe, it, expect } from 'vitest';
import { parseCompactDate } from '@passbook/bankbook-parser';
import { ContextualYearResolver, DateInferenceEngine, SimpleYearResolver } from '@passbook/date-inference';

const simple = new SimpleYearResolver('auto');

describe('parseCompactDate', () => {
  it('should parse a hyphenated two-digit-year date', () => {
    const match = parseCompactDate(['01-12-06', '振込'], simple);

    expect(match).toEqual({
      date: { year: 2019, month: 12, day: 6 },
      yearToken: { text: '01', value: 1, digits: 2 },
      consumed: 1,
      confidence: null,
    });
  });

  it('should split an unseparated digit run', () => {
    const match = parseCompactDate(['011206', '入金'], simple);

    expect(match?.date).toEqual({ year: 2019, month: 12, day: 6 });
    expect(match?.consumed).toBe(1);
  });

  it('should collect date parts spread across tokens', () => {
    const match = parseCompactDate(['01', '12', '06', '振込'], simple);

    expect(match?.date).toEqual({ year: 2019, month: 12, day: 6 });
    expect(match?.consumed).toBe(3);
  });

  it('should keep a four-digit year literal', () => {
    const match = parseCompactDate(['2019/12/06'], simple);

    expect(match?.date).toEqual({ year: 2019, month: 12, day: 6 });
    expect(match?.yearToken.digits).toBe(4);
  });

  it('should read a single-digit year through the era table', () => {
    expect(parseCompactDate(['1-2-3'], simple)?.date).toEqual({ year: 2019, month: 2, day: 3 });
    expect(parseCompactDate(['17.11.24'], simple)?.date).toEqual({ year: 2005, month: 11, day: 24 });
  });

  it('should honour the western format hint', () => {
    const match = parseCompactDate(['99-01-15'], new SimpleYearResolver('western'));

    expect(match?.date).toEqual({ year: 1999, month: 1, day: 15 });
  });

  it('should return null for a date that is not on the calendar', () => {
    expect(parseCompactDate(['01-02-30'], simple)).toBeNull();
  });

  it('should return null when the row does not start with a date', () => {
    expect(parseCompactDate(['振込', '01-12-06'], simple)).toBeNull();
    expect(parseCompactDate(['10,000'], simple)).toBeNull();
    expect(parseCompactDate([], simple)).toBeNull();
  });

  it('should return null for too few digits', () => {
    expect(parseCompactDate(['12-06', '入金'], simple)).toBeNull();
  });

  it('should carry the contextual resolver confidence', () => {
    const engine = new DateInferenceEngine({ now: () => new Date(2026, 5, 1) });
    const resolver = new ContextualYearResolver(engine);
    const match = parseCompactDate(['05-02-02'], resolver, { surroundingDates: ['09-01-01', '05-02-02'], currentIndex: 1 });

    expect(match?.date).toEqual({ year: 1993, month: 2, day: 2 });
    expect(match?.confidence).toBe(0.8);
  });
});
