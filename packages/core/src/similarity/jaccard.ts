/**
 * Lexical similarity for comparing free-text answers when no embedding
 * model is available.
 */

/** Lowercased, whitespace-delimited unique tokens of `text`. */
export function tokenSet(text: string): Set<string> {
  const tokens = text.toLowerCase().split(/\s+/).filter(token => token.length > 0);
  return new Set(tokens);
}

/**
 * Jaccard index of the two texts' token sets: |A ∩ B| / |A ∪ B|.
 * Returns 0 when either text has no tokens, including when both are empty.
 */
export function textSimilarity(a: string, b: string): number {
  const tokensA = tokenSet(a);
  const tokensB = tokenSet(b);
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  let intersection = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) intersection++;
  }
  const union = tokensA.size + tokensB.size - intersection;
  return intersection / union;
}
