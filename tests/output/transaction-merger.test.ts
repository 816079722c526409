import { describe, it, expect } from 'vitest';
import type { TransactionLine } from '@passbook/types';
import {
  compareTransactions,
  deduplicateTransactions,
  getTransactionKey,
  mergeTransactions,
  transactionsEquivalent,
} from '@passbook/bankbook-parser';

function createLine(overrides: Partial<TransactionLine> = {}): TransactionLine {
  return {
    transactionDate: '2019-12-06',
    description: '振込',
    withdrawalAmount: null,
    depositAmount: 10000,
    balance: 510000,
    confidence: null,
    ...overrides,
  };
}

describe('transactionsEquivalent', () => {
  it('should match the same date and amounts', () => {
    expect(transactionsEquivalent(createLine(), createLine({ description: 'フリコミ' }))).toBe(true);
  });

  it('should tolerate differences within one cent', () => {
    expect(transactionsEquivalent(createLine(), createLine({ balance: 510000.005 }))).toBe(true);
    expect(transactionsEquivalent(createLine(), createLine({ balance: 510001 }))).toBe(false);
  });

  it('should not match a different date', () => {
    expect(transactionsEquivalent(createLine(), createLine({ transactionDate: '2019-12-07' }))).toBe(false);
  });

  it('should only match a missing amount with another missing amount', () => {
    expect(transactionsEquivalent(createLine({ balance: null }), createLine({ balance: 0 }))).toBe(false);
    expect(transactionsEquivalent(createLine({ balance: null }), createLine({ balance: null }))).toBe(true);
  });
});

describe('compareTransactions', () => {
  it('should order by date and then balance', () => {
    const lines = [
      createLine({ transactionDate: '2019-12-07', balance: 100 }),
      createLine({ balance: 300 }),
      createLine({ balance: 200 }),
    ];

    expect([...lines].sort(compareTransactions).map((line) => line.balance)).toEqual([200, 300, 100]);
  });
});

describe('mergeTransactions', () => {
  it('should fill missing fields from a matching line and append the rest', () => {
    const card = createLine({
      transactionDate: '2019-12-07',
      description: '',
      withdrawalAmount: 2000,
      depositAmount: null,
      balance: 508000,
    });
    const result = mergeTransactions([card], [{ ...card, description: 'カード', confidence: 0.9 }, createLine()]);

    expect(result.matched).toBe(1);
    expect(result.appended).toBe(1);
    expect(result.transactions.map((line) => line.transactionDate)).toEqual(['2019-12-06', '2019-12-07']);
    expect(result.transactions[1]).toEqual({ ...card, description: 'カード', confidence: 0.9 });
  });

  it('should keep fields the primary already has', () => {
    const result = mergeTransactions([createLine({ confidence: 0.8 })], [createLine({ description: 'フリコミ', confidence: 0.6 })]);

    expect(result.transactions).toEqual([createLine({ confidence: 0.8 })]);
  });

  it('should return the primary lines when nothing is supplied', () => {
    const result = mergeTransactions([createLine()], []);

    expect(result).toEqual({ transactions: [createLine()], matched: 0, appended: 0 });
  });
});

describe('getTransactionKey', () => {
  it('should ignore whitespace in the description', () => {
    expect(getTransactionKey(createLine({ description: '振 込' }))).toBe('2019-12-06|振込||10000|510000');
  });
});

describe('deduplicateTransactions', () => {
  it('should keep the first of identical lines', () => {
    const first = createLine({ description: '振込 入金' });
    const lines = [first, createLine({ description: '振込入金' }), createLine({ balance: 520000 })];

    const result = deduplicateTransactions(lines);

    expect(result).toHaveLength(2);
    expect(result[0]).toBe(first);
  });
});
