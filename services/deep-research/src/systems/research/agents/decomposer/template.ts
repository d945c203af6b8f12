/**
 * Template Decomposer
 * Deterministic decomposition: the query focus crossed with a fixed
 * catalogue of research angles
 */

import { logger } from "@deepresearch/core";
import type { ResearchQuery, Subtopic } from "../../types.js";
import type { ResearchConfig } from "../../config.js";
import { InsufficientScopeError } from "../../errors.js";
import { focusTerms, uniqueStrings } from "../../utils/text.js";
import { ANGLE_CATALOGUE } from "./angles.js";
import { validateSubtopics } from "./validate.js";
import type { Decomposer } from "./types.js";

const MAX_FOCUS_TERMS = 6;
const MAX_KEYWORDS = 5;

/**
 * Search focus of a query: its content terms, in order, deduplicated
 */
export function extractFocus(text: string): string {
  return uniqueStrings(focusTerms(text)).slice(0, MAX_FOCUS_TERMS).join(" ");
}

function subjectOf(text: string): string {
  return text.trim().replace(/\s+/g, " ").replace(/[?.!]+$/, "");
}

export class TemplateDecomposer implements Decomposer {
  readonly name = "template-decomposer";

  private readonly log = logger.child({ component: "decomposer" });

  constructor(private readonly config: ResearchConfig) {}

  async decompose(query: ResearchQuery): Promise<Subtopic[]> {
    const count = this.config.depths[query.depth].subtopicCount;
    const focus = extractFocus(query.text);

    if (!focus) {
      throw new InsufficientScopeError(
        "Query has no searchable terms to decompose.",
        query.depth,
        { query: query.text }
      );
    }

    if (count > ANGLE_CATALOGUE.length) {
      throw new InsufficientScopeError(
        `Only ${ANGLE_CATALOGUE.length} distinct research angles are available, ${count} requested.`,
        query.depth,
        { requested: count }
      );
    }

    const subject = subjectOf(query.text);

    const subtopics: Subtopic[] = ANGLE_CATALOGUE.slice(0, count).map((angle, index) => ({
      id: `st-${index + 1}`,
      title: `${angle.label}: ${subject}`,
      keywords: uniqueStrings([focus, ...angle.terms]).slice(0, MAX_KEYWORDS),
      angle: angle.angle,
      rationale: angle.rationale,
    }));

    this.log.debug("Decomposed query", {
      depth: query.depth,
      focus,
      subtopics: subtopics.map((s) => s.id),
    });

    return validateSubtopics(subtopics, query.depth, {
      expectedCount: count,
      maxKeywordOverlap: this.config.maxKeywordOverlap,
    });
  }
}
