const NEGATIVE_MARKERS = /^[-−△▲]/;
const STRIP_PATTERN = /[¥￥円,，\s()+\-−△▲]/g;

/**
 * Parse a yen amount as printed in passbooks: `10,000`, `¥1,200`, `3,000円`,
 * `△500` (triangle marks a negative), `(500)`.
 */
export function parseAmount(amountStr: string): number {
  const trimmed = amountStr.trim();
  const isNegative = NEGATIVE_MARKERS.test(trimmed) || /^\(.*\)$/.test(trimmed);

  const cleaned = trimmed.replace(STRIP_PATTERN, '');
  if (!/^\d+(?:\.\d+)?$/.test(cleaned)) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const num = Number(cleaned);
  return isNegative && num !== 0 ? -num : num;
}
