/**
 * Confidence scoring
 * A claim's confidence is a pure function of its deduplicated citations.
 */

import type { ConfidenceLevel, Source } from "../types.js";

const STRONG_CREDIBILITY = 3;

function normalizeName(value: string | undefined): string | undefined {
  const normalized = value?.trim().toLowerCase().replace(/\s+/g, " ");
  return normalized || undefined;
}

function normalizeUrl(value: string | undefined): string | undefined {
  return value?.trim().replace(/\/+$/, "") || undefined;
}

/**
 * Whether one source republishes the other, or both republish one original
 */
export function isRepublication(a: Source, b: Source): boolean {
  const originA = normalizeUrl(a.republishedFrom);
  const originB = normalizeUrl(b.republishedFrom);

  return (
    originA === normalizeUrl(b.url) ||
    originB === normalizeUrl(a.url) ||
    (originA !== undefined && originA === originB)
  );
}

/**
 * Independent sources: different domains, different author or organization,
 * and not the same original reporting. An unknown organization falls back
 * to the domain; unknown authors never count as different.
 */
export function areIndependent(a: Source, b: Source): boolean {
  if (a.url === b.url || a.domain === b.domain) return false;

  const authorA = normalizeName(a.author);
  const authorB = normalizeName(b.author);
  const differentAuthors = authorA !== undefined && authorB !== undefined && authorA !== authorB;

  const orgA = normalizeName(a.organization) ?? a.domain;
  const orgB = normalizeName(b.organization) ?? b.domain;
  const differentOrgs = orgA !== orgB;

  if (!differentAuthors && !differentOrgs) return false;

  return !isRepublication(a, b);
}

/**
 * high:   >= 2 mutually independent sources with credibility >= 3
 * medium: any source with credibility >= 3, or >= 2 weaker sources
 * low:    a single source with credibility <= 2, or none
 */
export function scoreConfidence(citations: readonly Source[]): ConfidenceLevel {
  const strong = citations.filter((s) => s.credibility >= STRONG_CREDIBILITY);

  for (let i = 0; i < strong.length; i++) {
    for (let j = i + 1; j < strong.length; j++) {
      if (areIndependent(strong[i], strong[j])) return "high";
    }
  }

  if (strong.length >= 1 || citations.length >= 2) return "medium";

  return "low";
}

export const CONFIDENCE_RANK: Record<ConfidenceLevel, number> = {
  high: 2,
  medium: 1,
  low: 0,
};
