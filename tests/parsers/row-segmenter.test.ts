import { describe, it, expect } from 'vitest';
import { segmentRows, segmentByRowCode, segmentByInlineDates, isRowCode } from '@passbook/bankbook-parser';

describe('isRowCode', () => {
  it('should accept exactly three digits', () => {
    expect(isRowCode('123')).toBe(true);
    expect(isRowCode(' 001 ')).toBe(true);
    expect(isRowCode('12')).toBe(false);
    expect(isRowCode('1234')).toBe(false);
    expect(isRowCode('12a')).toBe(false);
  });
});

describe('segmentByRowCode', () => {
  it('should start a row at every marker and drop the preamble', () => {
    const rows = segmentByRowCode(['普通預金', '123', '01-12-06', '振込', '124', '01-12-07', 'カ-ド', '1,000']);

    expect(rows).toEqual([
      { code: '123', segments: ['01-12-06', '振込'] },
      { code: '124', segments: ['01-12-07', 'カ-ド', '1,000'] },
    ]);
  });

  it('should keep a marker without body as an empty row', () => {
    const rows = segmentByRowCode(['123', '', '124', '01-12-07']);

    expect(rows).toHaveLength(2);
    expect(rows[0]?.segments).toEqual([]);
    expect(rows[1]?.segments).toEqual(['01-12-07']);
  });
});

describe('segmentByInlineDates', () => {
  it('should split rows at every date token across lines', () => {
    const rows = segmentByInlineDates(['残高照会', '01-12-06 振込 10,000 500,000 01-12-07 カ-ド', '2,000 498,000']);

    expect(rows).toEqual([
      { code: null, segments: ['01-12-06', '振込 10,000 500,000'] },
      { code: null, segments: ['01-12-07', 'カ-ド', '2,000 498,000'] },
    ]);
  });

  it('should accept slash-separated and four-digit-year dates', () => {
    const rows = segmentByInlineDates(['2019/12/06 入金 5,000']);

    expect(rows).toEqual([{ code: null, segments: ['2019/12/06', '入金 5,000'] }]);
  });

  it('should return no rows when no date appears', () => {
    expect(segmentByInlineDates(['お取引明細', '10,000'])).toEqual([]);
  });
});

describe('segmentRows', () => {
  it('should use row codes when any coded row has content', () => {
    const result = segmentRows(['123', '01-12-06 振込']);

    expect(result.strategy).toBe('row-code');
    expect(result.rows).toHaveLength(1);
  });

  it('should fall back to inline dates when row codes yield nothing', () => {
    const inline = segmentRows(['明細', '01-12-06 振込 10,000', '01-12-07 カ-ド 2,000']);
    expect(inline.strategy).toBe('inline-date');
    expect(inline.rows).toHaveLength(2);
  });

  it('should not mix strategies within a document', () => {
    const result = segmentRows(['01-12-05 入金 1,000', '123', '01-12-06 振込']);

    expect(result.strategy).toBe('row-code');
    expect(result.rows).toEqual([{ code: '123', segments: ['01-12-06 振込'] }]);
  });

  it('should report no strategy when nothing segments', () => {
    expect(segmentRows(['123', '124'])).toEqual({ strategy: 'none', rows: [] });
    expect(segmentRows([])).toEqual({ strategy: 'none', rows: [] });
  });
});
