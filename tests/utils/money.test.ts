import { describe, it, expect } from 'vitest';
import { parseAmount } from '@passbook/types';

describe('parseAmount', () => {
  it('should parse comma-grouped yen amounts', () => {
    expect(parseAmount('10,000')).toBe(10000);
    expect(parseAmount('¥1,200')).toBe(1200);
    expect(parseAmount('3,000円')).toBe(3000);
  });

  it('should parse negative markers', () => {
    expect(parseAmount('-500')).toBe(-500);
    expect(parseAmount('△500')).toBe(-500);
    expect(parseAmount('(500)')).toBe(-500);
  });

  it('should ignore a leading plus sign', () => {
    expect(parseAmount('+2,000')).toBe(2000);
  });

  it('should not produce negative zero', () => {
    expect(Object.is(parseAmount('-0'), 0)).toBe(true);
  });

  it('should throw on invalid input', () => {
    expect(() => parseAmount('残高')).toThrow('Unable to parse amount');
    expect(() => parseAmount('')).toThrow('Unable to parse amount');
  });
});
