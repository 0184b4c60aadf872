const STOP_WORDS = new Set([
  "the", "and", "but", "for", "with", "are", "was", "were", "been", "have", "has", "had",
  "does", "did", "will", "would", "should", "could", "may", "might", "must", "can",
  "this", "that", "these", "those", "from", "into", "than", "then", "also", "not",
  "our", "their", "its", "all", "any", "each", "other", "such", "there", "which", "who"
]);

/**
 * Lowercased alphanumeric words, minus stop-words and words of two
 * characters or fewer, as a set.
 */
export function tokenize(text: string): Set<string> {
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return new Set(words.filter((w) => w.length > 2 && !STOP_WORDS.has(w)));
}

/**
 * Share of claim tokens found in the evidence. The denominator is the
 * claim's size only, so long evidence texts are not penalized.
 */
export function overlapScore(claimTokens: Set<string>, evidenceTokens: Set<string>): number {
  if (claimTokens.size === 0) return 0;

  let hit = 0;
  for (const t of claimTokens) if (evidenceTokens.has(t)) hit += 1;
  return hit / claimTokens.size;
}
