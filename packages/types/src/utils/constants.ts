export const PARSER_VERSION = '1.0.0';

export const PARSER_NAME = 'passbook-ocr';

export const VALUATION_CURRENCY = 'JPY';

/** Offset added to an era year to get the Gregorian year (Reiwa 1 = 2019). */
export const ERA_OFFSETS = {
  reiwa: 2018,
  heisei: 1988,
  showa: 1925,
} as const;

export const ERA_PREFIXES = {
  reiwa: 'R',
  heisei: 'H',
  showa: 'S',
} as const;

export const CONFIDENCE_THRESHOLDS = {
  HIGH: 0.9,
  MEDIUM: 0.7,
  LOW: 0.5,
} as const;
