const BRANCH_PATTERN = /([\w\u3040-\u30ff\u4e00-\u9faf]+)支店/u;
const BRANCH_SUFFIX = '支店';
const PLACEHOLDER_PATTERN = /^[〇○×xX\-・…\s]+$/;
const NUMERIC_ONLY_PATTERN = /^[\d\s,\-]+$/;
const MAX_LOOKBACK_LINES = 5;

export function isPlaceholder(text: string): boolean {
  return PLACEHOLDER_PATTERN.test(text);
}

function isBranchStem(text: string): boolean {
  return text !== '' && !isPlaceholder(text) && !NUMERIC_ONLY_PATTERN.test(text);
}

/**
 * Branch name without the 支店 suffix, or null.
 *
 * Passbooks sometimes print the branch name on the line above a bare
 * `支店` label, so an empty stem walks back over preceding lines.
 */
export function extractBranchName(lines: readonly string[]): string | null {
  for (const line of lines) {
    const match = BRANCH_PATTERN.exec(line);
    if (match?.[1] !== undefined) return match[1];
  }

  for (const [index, line] of lines.entries()) {
    if (!line.includes(BRANCH_SUFFIX)) continue;

    const stem = line.replace(BRANCH_SUFFIX, '').trim();
    if (isBranchStem(stem)) return stem;

    const earliest = Math.max(0, index - MAX_LOOKBACK_LINES);
    for (let i = index - 1; i >= earliest; i--) {
      const candidate = (lines[i] ?? '').trim();
      if (isBranchStem(candidate)) return candidate;
    }
  }

  return null;
}
