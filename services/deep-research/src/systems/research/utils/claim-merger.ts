/**
 * Claim Merger
 *
 * Single pass, in ingestion order. Each incoming claim is compared with the
 * current representative of every cluster; the most similar cluster scoring
 * strictly above the threshold absorbs it (earliest cluster wins ties).
 * Clusters are never re-compared with each other, so a late near-duplicate
 * of an earlier wording can stay separate.
 */

import { normalizeText, termSet, termSimilarity, uniqueStrings } from "./text.js";

export interface IncomingClaim {
  text: string;
  evidence: string;
  citations: string[];
  subtopicId: string;
}

export interface ClaimCluster {
  id: string;
  text: string;
  evidence: string;
  citations: string[];
  subtopicIds: string[];
  terms: Set<string>;
  normalized: string;
}

export class ClaimMerger {
  private readonly clusters: ClaimCluster[] = [];
  private added = 0;

  constructor(private readonly threshold: number) {}

  add(claim: IncomingClaim): ClaimCluster {
    this.added++;

    const text = claim.text.trim();
    const terms = termSet(text);
    const normalized = normalizeText(text);
    const target = this.findCluster(terms, normalized);

    if (!target) {
      const cluster: ClaimCluster = {
        id: `c${this.clusters.length + 1}`,
        text,
        evidence: claim.evidence.trim(),
        citations: uniqueStrings(claim.citations),
        subtopicIds: [claim.subtopicId],
        terms,
        normalized,
      };
      this.clusters.push(cluster);
      return cluster;
    }

    target.citations = uniqueStrings([...target.citations, ...claim.citations]);
    target.subtopicIds = uniqueStrings([...target.subtopicIds, claim.subtopicId]);

    // The more detailed wording becomes the representative
    if (text.length > target.text.length) {
      target.text = text;
      target.evidence = claim.evidence.trim();
      target.terms = terms;
      target.normalized = normalized;
    }

    return target;
  }

  /**
   * Clusters in creation order
   */
  list(): readonly ClaimCluster[] {
    return this.clusters;
  }

  /**
   * Claims added before deduplication
   */
  get rawCount(): number {
    return this.added;
  }

  /**
   * Ids of clusters similar to each cluster (at or above `threshold`),
   * in creation order
   */
  relatedIds(threshold: number): Map<string, string[]> {
    const related = new Map<string, string[]>(this.clusters.map((c) => [c.id, []]));

    for (let i = 0; i < this.clusters.length; i++) {
      for (let j = i + 1; j < this.clusters.length; j++) {
        const a = this.clusters[i];
        const b = this.clusters[j];
        if (termSimilarity(a.terms, b.terms, a.normalized, b.normalized) < threshold) continue;

        related.get(a.id)?.push(b.id);
        related.get(b.id)?.push(a.id);
      }
    }

    return related;
  }

  private findCluster(terms: Set<string>, normalized: string): ClaimCluster | undefined {
    let best: ClaimCluster | undefined;
    let bestScore = this.threshold;

    for (const cluster of this.clusters) {
      const score = termSimilarity(terms, cluster.terms, normalized, cluster.normalized);
      if (score > bestScore) {
        best = cluster;
        bestScore = score;
      }
    }

    return best;
  }
}
