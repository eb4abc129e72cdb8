/**
 * Term overlap scoring used to re-rank vector hits. Exact keyword matches
 * (article numbers, names, codes) are where dense embeddings are weakest, so
 * a small lexical boost helps them surface.
 */

// Question words and glue that would otherwise match nearly every chunk.
const STOP_WORDS = new Set([
  "an", "as", "at", "be", "by", "in", "is", "it", "of", "on", "or", "to",
  "the", "and", "for", "are", "was", "were", "what", "which", "who",
  "when", "where", "why", "how", "does", "did", "can", "would",
  "with", "from", "that", "this", "into", "about", "there",
  "has", "have", "had", "not", "any", "all",
]);

/**
 * Tokenize text into lower-case search terms (letters/digits, Unicode aware),
 * dropping stop words and one-character tokens. Returns unique terms in
 * first-seen order.
 */
export function tokenize(text: string): string[] {
  const out = new Set<string>();
  for (const match of text.toLowerCase().matchAll(/[\p{L}\p{N}]+/gu)) {
    const term = match[0];
    if (term.length < 2 || STOP_WORDS.has(term)) continue;
    out.add(term);
  }
  return [...out];
}

/**
 * Fraction of query terms present in the text, in [0, 1]. A query with no
 * usable terms scores 0 against everything.
 */
export function termOverlap(queryTerms: readonly string[], text: string): number {
  if (queryTerms.length === 0) return 0;
  const docTerms = new Set(tokenize(text));
  let hits = 0;
  for (const t of queryTerms) if (docTerms.has(t)) hits++;
  return hits / queryTerms.length;
}
