const OWNER_SAMA_PATTERN = /(?:^|\s)(\S+(?:\s+\S+)?)サマ/;
const HONORIFIC_SUFFIX_PATTERN = /(様|サマ|さま)$/;
const OWNER_LABELS = ['非会員', '氏名', '名義人'] as const;
const SKIP_TOKENS = ['お客様', '皆様'] as const;
const NUMERIC_PATTERN = /^[\d\s,\-]+$/;
const LABEL_LOOKAHEAD_LINES = 5;

function isSkipped(text: string): boolean {
  return SKIP_TOKENS.some((token) => text.includes(token));
}

function longestHonorificLine(lines: readonly string[]): string | null {
  let longest: string | null = null;
  for (const line of lines) {
    const trimmed = line.trim();
    if (!HONORIFIC_SUFFIX_PATTERN.test(trimmed) || isSkipped(trimmed)) continue;

    const stripped = trimmed.replace(HONORIFIC_SUFFIX_PATTERN, '').trim();
    if (stripped !== '' && (longest === null || stripped.length > longest.length)) {
      longest = stripped;
    }
  }
  return longest;
}

function nameAfterLabel(lines: readonly string[]): string | null {
  for (const [index, line] of lines.entries()) {
    if (!OWNER_LABELS.some((label) => line.includes(label))) continue;

    for (const next of lines.slice(index + 1, index + 1 + LABEL_LOOKAHEAD_LINES)) {
      const candidate = next.trim();
      if (candidate === '' || NUMERIC_PATTERN.test(candidate) || isSkipped(candidate)) continue;
      return candidate;
    }
  }
  return null;
}

/**
 * Account holder name, honorific stripped. Tries `〜サマ`, then the longest
 * line ending in 様/サマ/さま, then the line after a name label.
 */
export function extractOwnerName(lines: readonly string[]): string | null {
  let fromPattern: string | null = null;
  for (const line of lines) {
    const match = OWNER_SAMA_PATTERN.exec(line);
    if (match?.[1] !== undefined) {
      fromPattern = match[1].trim();
      break;
    }
  }

  const fromSuffix = longestHonorificLine(lines);
  if (fromSuffix !== null && (fromPattern === null || fromSuffix.length >= fromPattern.length)) {
    return fromSuffix;
  }
  if (fromPattern !== null) return fromPattern;

  return nameAfterLabel(lines);
}
