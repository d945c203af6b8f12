/**
 * Text helpers: tokenization, set similarity, URL domains
 *
 * Similarity is token-set Jaccard over normalized words longer than two
 * characters, stop-words removed.
 */

const STOP_WORDS = new Set([
  "the", "and", "for", "are", "but", "not", "you", "all", "any", "can",
  "has", "have", "had", "was", "were", "been", "being", "its", "this",
  "that", "these", "those", "with", "from", "into", "onto", "than", "then",
  "there", "their", "they", "them", "what", "which", "who", "whom", "how",
  "why", "when", "where", "about", "over", "under", "also", "such", "does",
  "did", "our", "out", "very", "more", "most", "some", "will", "would",
]);

// Two-letter function words; other short terms (ai, 5g, go, ux) carry meaning
const SHORT_STOP_WORDS = new Set([
  "an", "as", "at", "be", "by", "do", "if", "in", "is", "it", "me", "my",
  "no", "of", "on", "or", "so", "to", "up", "us", "we",
]);

function words(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter(Boolean);
}

/**
 * Lowercased content words in order of appearance (duplicates kept)
 */
export function tokenize(text: string): string[] {
  return words(text).filter((word) => word.length > 2 && !STOP_WORDS.has(word));
}

/**
 * Like tokenize, but keeps short terms that are not function words.
 * Used where a query's own vocabulary matters, not for similarity.
 */
export function focusTerms(text: string): string[] {
  return words(text).filter(
    (word) => word.length > 1 && !STOP_WORDS.has(word) && !SHORT_STOP_WORDS.has(word)
  );
}

/**
 * Lowercased words joined by single spaces, punctuation dropped
 */
export function normalizeText(text: string): string {
  return words(text).join(" ");
}

export function termSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

/**
 * |A ∩ B| / |A ∪ B|, 0 when either side is empty
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const term of a) {
    if (b.has(term)) intersection++;
  }

  return intersection / (a.size + b.size - intersection);
}

/**
 * |A ∩ B| / min(|A|, |B|), 0 when either side is empty
 */
export function overlapCoefficient(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const term of a) {
    if (b.has(term)) intersection++;
  }

  return intersection / Math.min(a.size, b.size);
}

/**
 * Normalized 0-1 similarity between two pieces of text
 */
export function textSimilarity(a: string, b: string): number {
  return termSimilarity(termSet(a), termSet(b), normalizeText(a), normalizeText(b));
}

/**
 * Jaccard over term sets; when neither side has a content term the
 * normalized texts are compared instead (1 when equal, else 0)
 */
export function termSimilarity(
  a: ReadonlySet<string>,
  b: ReadonlySet<string>,
  normalizedA: string,
  normalizedB: string
): number {
  if (a.size === 0 && b.size === 0) {
    return normalizedA !== "" && normalizedA === normalizedB ? 1 : 0;
  }
  return jaccard(a, b);
}

// Second-level labels that sit under a country code (example.co.uk)
const COUNTRY_SECOND_LEVEL = new Set(["co", "com", "org", "net", "ac", "gov", "edu"]);

/**
 * Registrable domain of a URL: "https://www.aws.amazon.com/x" → "amazon.com".
 * Falls back to the lowercased input when it is not a URL.
 */
export function registrableDomain(url: string): string {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return url.trim().toLowerCase();
  }

  const labels = hostname.replace(/^www\./, "").split(".").filter(Boolean);
  if (labels.length <= 2) return labels.join(".");

  const tld = labels[labels.length - 1];
  const second = labels[labels.length - 2];
  const take = tld.length === 2 && COUNTRY_SECOND_LEVEL.has(second) ? 3 : 2;

  return labels.slice(-take).join(".");
}

export function uniqueStrings(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}
