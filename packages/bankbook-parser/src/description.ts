import { readFileSync } from 'fs';
import { z } from 'zod';

const ReplacementTableSchema = z.object({
  replacements: z.array(z.tuple([z.string().min(1), z.string()])),
});

type ReplacementTable = z.infer<typeof ReplacementTableSchema>['replacements'];

const REPLACEMENTS_URL = new URL('../data/description-replacements.json', import.meta.url);

let cachedReplacements: ReplacementTable | null = null;

/**
 * Katakana spellings of common passbook terms and their kanji forms, applied
 * in file order.
 */
export function loadDescriptionReplacements(): ReplacementTable {
  if (cachedReplacements === null) {
    const raw: unknown = JSON.parse(readFileSync(REPLACEMENTS_URL, 'utf-8'));
    cachedReplacements = ReplacementTableSchema.parse(raw).replacements;
  }
  return cachedReplacements;
}

const SELECTION_MARKERS = [':selected:'] as const;
const BRANCH_PREFIX_PATTERN = /^(?:取扱店番号|取扱店|店番|店舗番号|取扱局)[\s:-]*\d+\s*/;
// Post office passbooks print the handling office number ahead of the amount.
const POST_OFFICE_PREFIX_PATTERN = /^\d{4,5}\s+(?=[\d,]+)/;
const NUMERIC_BRACKETS_PATTERN = /[(]\s*\d+\s*[)]/g;
const PAYPAY_PATTERN = /RT.*ペイペイ/;
const PAYMENT_KEYWORDS = ['払込', '払込み', '払込金', '払込料'] as const;
const CARD_PATTERN = /^カ[-ー]ド(?:\s.*)?$/;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Canonical description for export: width-normalized, branch-number
 * prefixes dropped, katakana terms mapped to kanji, and a few recurring
 * entries collapsed to one spelling.
 */
export function normalizeDescription(value: string | null | undefined): string {
  if (value === null || value === undefined || value.trim() === '') return '';

  let text = value.normalize('NFKC').replace(/　/g, ' ');
  for (const marker of SELECTION_MARKERS) {
    text = text.split(marker).join('');
  }
  text = collapseWhitespace(text);
  text = text.replace(BRANCH_PREFIX_PATTERN, '').trim();
  text = text.replace(POST_OFFICE_PREFIX_PATTERN, '').trim();

  for (const [before, after] of loadDescriptionReplacements()) {
    text = text.split(before).join(after);
  }

  text = collapseWhitespace(text.replace(NUMERIC_BRACKETS_PATTERN, ''));

  if (PAYPAY_PATTERN.test(text)) return 'RT (ペイペイ)';
  if (PAYMENT_KEYWORDS.some((keyword) => text.includes(keyword))) return '払込み';
  if (CARD_PATTERN.test(text)) return 'カード';

  return text;
}
