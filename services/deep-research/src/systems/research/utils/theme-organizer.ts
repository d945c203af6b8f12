/**
 * Theme Organizer
 * Regroups claims by shared vocabulary rather than by the subtopic that
 * produced them, then orders themes by evidentiary strength.
 */

import type { AggregateRegistry, Claim, Theme } from "../types.js";
import { overlapCoefficient, termSet, tokenize } from "./text.js";

export interface ThemeOptions {
  /** Minimum overlap coefficient for a claim to join an existing theme */
  themeThreshold: number;

  /** Query text; its terms appear everywhere and are ignored for grouping */
  query: string;
}

const TITLE_TERMS = 3;
const THEME_KEYWORDS = 5;
const GENERAL_TITLE = "General findings";

interface ThemeDraft {
  claims: Claim[];
  firstIndex: number;
  termCounts: Map<string, number>;
  termOrder: string[];
  profile: Set<string>;
}

function addTerms(draft: ThemeDraft, terms: Iterable<string>): void {
  for (const term of terms) {
    const count = draft.termCounts.get(term) ?? 0;
    if (count === 0) draft.termOrder.push(term);
    draft.termCounts.set(term, count + 1);
    draft.profile.add(term);
  }
}

function topTerms(draft: ThemeDraft, limit: number): string[] {
  return draft.termOrder
    .map((term, order) => ({ term, order, count: draft.termCounts.get(term) ?? 0 }))
    .sort((a, b) => b.count - a.count || a.order - b.order)
    .slice(0, limit)
    .map((t) => t.term);
}

function titleCase(term: string): string {
  return term.charAt(0).toUpperCase() + term.slice(1);
}

/**
 * Sort key: high count, medium count, distinct sources (all descending)
 */
export function themeStrength(claims: readonly Claim[]): [number, number, number] {
  const high = claims.filter((c) => c.confidence === "high").length;
  const medium = claims.filter((c) => c.confidence === "medium").length;
  const sources = new Set(claims.flatMap((c) => c.citations)).size;
  return [high, medium, sources];
}

export function organizeThemes(registry: AggregateRegistry, options: ThemeOptions): Theme[] {
  const ignored = termSet(options.query);
  const drafts: ThemeDraft[] = [];
  let general: ThemeDraft | undefined;

  for (const [index, claim] of registry.claims.entries()) {
    const terms = new Set(tokenize(claim.text).filter((t) => !ignored.has(t)));

    if (terms.size === 0) {
      general ??= {
        claims: [],
        firstIndex: index,
        termCounts: new Map(),
        termOrder: [],
        profile: new Set(),
      };
      general.claims.push(claim);
      continue;
    }

    let target: ThemeDraft | undefined;
    let bestScore = 0;
    for (const draft of drafts) {
      const score = overlapCoefficient(terms, draft.profile);
      if (score >= options.themeThreshold && score > bestScore) {
        target = draft;
        bestScore = score;
      }
    }

    if (!target) {
      target = {
        claims: [],
        firstIndex: index,
        termCounts: new Map(),
        termOrder: [],
        profile: new Set(),
      };
      drafts.push(target);
    }

    target.claims.push(claim);
    addTerms(target, terms);
  }

  const all = general ? [...drafts, general] : drafts;

  const ranked = all
    .map((draft) => ({ draft, strength: themeStrength(draft.claims) }))
    .sort((a, b) => {
      for (let i = 0; i < a.strength.length; i++) {
        const diff = b.strength[i] - a.strength[i];
        if (diff !== 0) return diff;
      }
      return a.draft.firstIndex - b.draft.firstIndex;
    });

  return ranked.map(({ draft }, index) => {
    const isGeneral = draft === general;
    const keywords = isGeneral ? [] : topTerms(draft, THEME_KEYWORDS);

    return {
      id: `t${index + 1}`,
      title: isGeneral
        ? GENERAL_TITLE
        : keywords.slice(0, TITLE_TERMS).map(titleCase).join(", "),
      keywords,
      claimIds: draft.claims.map((c) => c.id),
    };
  });
}
