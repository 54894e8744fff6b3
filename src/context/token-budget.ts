/**
 * Token Budget Management
 *
 * Keeps the signature section of a bundle within a token limit.
 */

const CHARS_PER_TOKEN = 3.5;

/**
 * Estimate token count for text.
 * Uses simple approximation: ~3.5 characters per token for code.
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Truncate text to fit within token budget.
 *
 * @param text - Text to truncate
 * @param maxTokens - Maximum tokens allowed
 * @param suffix - Suffix to append if truncated
 * @returns Truncated text with suffix if truncated
 */
export function truncateToTokenBudget(
  text: string,
  maxTokens: number,
  suffix: string = '\n... (truncated)'
): string {
  const currentTokens = estimateTokens(text);

  if (currentTokens <= maxTokens) {
    return text;
  }

  const targetChars = Math.floor(maxTokens * CHARS_PER_TOKEN) - suffix.length;
  if (targetChars <= 0) {
    return suffix.trimStart();
  }

  // Try to truncate at a line boundary
  let truncated = text.substring(0, targetChars);
  const lastNewline = truncated.lastIndexOf('\n');
  if (lastNewline > targetChars * 0.5) {
    truncated = truncated.substring(0, lastNewline);
  }

  return truncated + suffix;
}

export interface BudgetedSection {
  /** Entries kept, in input order; the last may be truncated */
  kept: Array<{ key: string; text: string }>;
  /** Number of entries dropped once the budget ran out */
  omitted: number;
  tokenCount: number;
}

/**
 * Take entries in order while they fit the budget. The first entry that
 * does not fit is truncated to the remaining tokens and the rest dropped.
 * A budget of `undefined` keeps everything.
 */
export function fitToTokenBudget(
  entries: ReadonlyArray<{ key: string; text: string }>,
  maxTokens: number | undefined
): BudgetedSection {
  const kept: BudgetedSection['kept'] = [];
  let tokenCount = 0;

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const tokens = estimateTokens(entry.text);

    if (maxTokens === undefined || tokenCount + tokens <= maxTokens) {
      kept.push(entry);
      tokenCount += tokens;
      continue;
    }

    const remaining = maxTokens - tokenCount;
    if (remaining > 0) {
      kept.push({ key: entry.key, text: truncateToTokenBudget(entry.text, remaining) });
      tokenCount = maxTokens;
      return { kept, omitted: entries.length - i - 1, tokenCount };
    }
    return { kept, omitted: entries.length - i, tokenCount };
  }

  return { kept, omitted: 0, tokenCount };
}
