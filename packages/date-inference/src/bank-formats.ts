/**
 * How institutions print two-digit years in passbooks. Heuristic data: a bank
 * listed here can still be overridden per session through a learned format.
 */
export type BankDateFormat = 'gregorian' | 'wareki';

export interface KnownBank {
  code: string;
  name: string;
  dateFormat: BankDateFormat;
}

export const KNOWN_BANKS: readonly KnownBank[] = [
  { code: '0001', name: 'みずほ銀行', dateFormat: 'gregorian' },
  { code: '0033', name: 'PayPay銀行', dateFormat: 'gregorian' },
  { code: '0034', name: 'セブン銀行', dateFormat: 'gregorian' },
  { code: '0035', name: 'ソニー銀行', dateFormat: 'gregorian' },
  { code: '0036', name: '楽天銀行', dateFormat: 'gregorian' },
  { code: '0038', name: '住信SBIネット銀行', dateFormat: 'gregorian' },
  { code: '0039', name: 'auじぶん銀行', dateFormat: 'gregorian' },
  { code: '0040', name: 'イオン銀行', dateFormat: 'gregorian' },
  { code: '2952', name: '中央労働金庫', dateFormat: 'gregorian' },
  { code: '0005', name: '三菱UFJ銀行', dateFormat: 'wareki' },
  { code: '0009', name: '三井住友銀行', dateFormat: 'wareki' },
  { code: '0010', name: 'りそな銀行', dateFormat: 'wareki' },
  { code: '0017', name: '埼玉りそな銀行', dateFormat: 'wareki' },
  { code: '9900', name: 'ゆうちょ銀行', dateFormat: 'wareki' },
];

const BANKS_BY_CODE = new Map(KNOWN_BANKS.map((bank) => [bank.code, bank]));

export function lookupBankFormat(bankCode: string): BankDateFormat | undefined {
  return BANKS_BY_CODE.get(bankCode)?.dateFormat;
}

/**
 * Find a known bank code from a free-form name such as `三井住友銀行 新宿支店`.
 */
export function findBankCodeByName(bankName: string): string | undefined {
  const compact = bankName.replace(/\s+/g, '');
  if (compact === '') return undefined;
  // Longest name first so 埼玉りそな銀行 wins over りそな銀行.
  const candidates = [...KNOWN_BANKS].sort((a, b) => b.name.length - a.name.length);
  return candidates.find((bank) => compact.includes(bank.name))?.code;
}
