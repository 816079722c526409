import { describe, it, expect } from 'vitest';
import { loadDescriptionReplacements, normalizeDescription } from '@passbook/bankbook-parser';

describe('normalizeDescription', () => {
  it('should return an empty string for missing or blank input', () => {
    expect(normalizeDescription(null)).toBe('');
    expect(normalizeDescription(undefined)).toBe('');
    expect(normalizeDescription('   ')).toBe('');
  });

  it('should collapse PayPay transfers', () => {
    expect(normalizeDescription('RT 普通預金 ペイペイ')).toBe('RT (ペイペイ)');
  });

  it('should strip a branch number prefix', () => {
    expect(normalizeDescription('取扱店: 51317 カード')).toBe('カード');
    expect(normalizeDescription('店番 123 振込')).toBe('振込');
  });

  it('should collapse payment entries', () => {
    expect(normalizeDescription('取扱店: 51317 払込み')).toBe('払込み');
    expect(normalizeDescription('払込料 電気')).toBe('払込み');
  });

  it('should collapse card entries including the hyphenated spelling', () => {
    expect(normalizeDescription('カ-ド 1234')).toBe('カード');
  });

  it('should map katakana terms to kanji', () => {
    expect(normalizeDescription('フリコミ ミズホ')).toBe('振込 みずほ');
    expect(normalizeDescription('セイメイホケン')).toBe('生命保険');
    expect(normalizeDescription('SMBC ボーナス')).toBe('三井住友 賞与');
  });

  it('should widen half-width katakana before replacing', () => {
    expect(normalizeDescription('ﾌﾘｺﾐ')).toBe('振込');
  });

  it('should drop a post office number in front of an amount', () => {
    expect(normalizeDescription('12345 10,000')).toBe('10,000');
  });

  it('should remove numeric brackets and selection markers', () => {
    expect(normalizeDescription('デンキ (123)')).toBe('電気');
    expect(normalizeDescription('デンキ（１２３）')).toBe('電気');
    expect(normalizeDescription(':selected: 振込')).toBe('振込');
  });

  it('should turn ideographic spaces into single spaces', () => {
    expect(normalizeDescription('振込　　入金')).toBe('振込 入金');
  });
});

describe('loadDescriptionReplacements', () => {
  it('should list longer terms before the terms they contain', () => {
    const terms = loadDescriptionReplacements().map(([before]) => before);

    expect(terms.indexOf('セイメイホケン')).toBeLessThan(terms.indexOf('ホケン'));
    expect(terms.indexOf('セイメイホケン')).toBeGreaterThanOrEqual(0);
  });

  it('should return the cached table on repeat calls', () => {
    expect(loadDescriptionReplacements()).toBe(loadDescriptionReplacements());
  });
});
