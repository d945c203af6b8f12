/**
 * Source Registry
 * Deduplicates sources by exact URL. Merges keep the highest credibility
 * and the union of relevance notes, so re-adding a source is a no-op.
 */

import type { Source } from "../types.js";
import type { FindingsSource } from "../agents/researcher/schema.js";
import { registrableDomain, termSet, jaccard } from "./text.js";

export class SourceRegistry {
  private readonly sources = new Map<string, Source>();
  private added = 0;

  /**
   * Register a worker-reported source, merging on URL collision
   */
  add(input: FindingsSource): Source {
    this.added++;

    const url = input.url.trim();
    const note = input.relevance.trim();
    const existing = this.sources.get(url);

    if (!existing) {
      const source: Source = {
        url,
        title: input.title.trim(),
        credibility: input.credibility,
        relevanceNotes: note ? [note] : [],
        domain: registrableDomain(url),
        author: input.author?.trim() || undefined,
        organization: input.organization?.trim() || undefined,
        republishedFrom: input.republished_from?.trim() || undefined,
        relatedUrls: [],
      };
      this.sources.set(url, source);
      return source;
    }

    existing.credibility = Math.max(existing.credibility, input.credibility);
    if (note && !existing.relevanceNotes.includes(note)) {
      existing.relevanceNotes.push(note);
    }
    if (!existing.title) existing.title = input.title.trim();
    existing.author ??= input.author?.trim() || undefined;
    existing.organization ??= input.organization?.trim() || undefined;
    existing.republishedFrom ??= input.republished_from?.trim() || undefined;

    return existing;
  }

  get(url: string): Source | undefined {
    return this.sources.get(url);
  }

  get size(): number {
    return this.sources.size;
  }

  /**
   * Sources registered before deduplication
   */
  get rawCount(): number {
    return this.added;
  }

  /**
   * Cross-reference same-domain sources whose titles are similar.
   * They stay distinct: republication on one domain is not corroboration.
   */
  linkRelated(titleThreshold: number): void {
    const all = Array.from(this.sources.values());
    const titles = all.map((s) => termSet(s.title));

    for (const source of all) {
      source.relatedUrls = [];
    }

    for (let i = 0; i < all.length; i++) {
      for (let j = i + 1; j < all.length; j++) {
        if (all[i].domain !== all[j].domain) continue;
        if (jaccard(titles[i], titles[j]) < titleThreshold) continue;

        all[i].relatedUrls.push(all[j].url);
        all[j].relatedUrls.push(all[i].url);
      }
    }
  }

  /**
   * Registry contents in first-seen order
   */
  snapshot(): ReadonlyMap<string, Source> {
    return new Map(this.sources);
  }
}
