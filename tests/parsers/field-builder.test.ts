import { describe, it, expect } from 'vitest';
import { buildTransactionFields, isDepositDescription, isNumericToken } from '@passbook/bankbook-parser';

describe('isNumericToken', () => {
  it('should accept grouped and signed digits', () => {
    expect(isNumericToken('1,000')).toBe(true);
    expect(isNumericToken('+500')).toBe(true);
    expect(isNumericToken('-12')).toBe(true);
  });

  it('should reject text and empty tokens', () => {
    expect(isNumericToken('振込')).toBe(false);
    expect(isNumericToken('カ-ド')).toBe(false);
    expect(isNumericToken('')).toBe(false);
  });
});

describe('isDepositDescription', () => {
  it('should match deposit keywords anywhere in the text', () => {
    expect(isDepositDescription('振込 入金')).toBe(true);
    expect(isDepositDescription('株式配当')).toBe(true);
    expect(isDepositDescription('カ-ド')).toBe(false);
  });
});

describe('buildTransactionFields', () => {
  it('should treat the first amount of a deposit row as a deposit', () => {
    expect(buildTransactionFields(['振込', '入金', '10,000', '500,000'])).toEqual({
      description: '振込 入金',
      withdrawalAmount: null,
      depositAmount: 10000,
      balance: 500000,
    });
  });

  it('should treat the first amount of any other row as a withdrawal', () => {
    expect(buildTransactionFields(['カ-ド', '2,000', '498,000'])).toEqual({
      description: 'カ-ド',
      withdrawalAmount: 2000,
      depositAmount: null,
      balance: 498000,
    });
  });

  it('should decide the role by keywords even when the primary amount is signed', () => {
    const minusDeposit = buildTransactionFields(['振込', '-3,000', '497,000']);
    expect(minusDeposit?.depositAmount).toBe(3000);
    expect(minusDeposit?.withdrawalAmount).toBeNull();

    const plusWithdrawal = buildTransactionFields(['引出', '+5,000', '495,000']);
    expect(plusWithdrawal?.withdrawalAmount).toBe(5000);
    expect(plusWithdrawal?.depositAmount).toBeNull();
  });

  it('should read an amount glued to a deposit keyword as a deposit', () => {
    expect(buildTransactionFields(['振込', '入金-10,000', '500,000'])).toEqual({
      description: '振込 入金-10,000',
      withdrawalAmount: null,
      depositAmount: 10000,
      balance: 500000,
    });
  });

  it('should keep a single amount as the balance only', () => {
    expect(buildTransactionFields(['繰越', '500,000'])).toEqual({
      description: '繰越',
      withdrawalAmount: null,
      depositAmount: null,
      balance: 500000,
    });
  });

  it('should keep a negative balance signed', () => {
    expect(buildTransactionFields(['カ-ド', '2,000', '-1,000'])?.balance).toBe(-1000);
  });

  it('should ignore amounts below ten', () => {
    const fields = buildTransactionFields(['1', '振込', '10,000', '500,000']);

    expect(fields?.depositAmount).toBe(10000);
    expect(fields?.balance).toBe(500000);
  });

  it('should fall back to the numeric tokens as description', () => {
    expect(buildTransactionFields(['10,000', '500,000'])).toEqual({
      description: '10,000 500,000',
      withdrawalAmount: 10000,
      depositAmount: null,
      balance: 500000,
    });
  });

  it('should keep a description without amounts', () => {
    expect(buildTransactionFields(['記帳済'])).toEqual({
      description: '記帳済',
      withdrawalAmount: null,
      depositAmount: null,
      balance: null,
    });
  });

  it('should return null for no tokens', () => {
    expect(buildTransactionFields([])).toBeNull();
  });
});
