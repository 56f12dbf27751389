// src/services/providers/retrieval-vector-utils.ts — tokenization and lexical scoring helpers

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}

export function tokenSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

/**
 * Overlap between query and document vocabularies, normalized by the square root of the
 * document vocabulary size so short, focused documents outrank long ones with the same overlap.
 */
export function overlapScore(queryTokens: Set<string>, docTokens: Set<string>): number {
  if (queryTokens.size === 0 || docTokens.size === 0) return 0;
  let overlap = 0;
  for (const t of queryTokens) {
    if (docTokens.has(t)) overlap++;
  }
  if (overlap === 0) return 0;
  return overlap / Math.sqrt(docTokens.size);
}
