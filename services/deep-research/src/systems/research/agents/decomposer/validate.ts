/**
 * Subtopic set invariants
 * Any decomposition strategy goes through here before its subtopics are used.
 */

import type { ResearchDepth, Subtopic } from "../../types.js";
import { InsufficientScopeError } from "../../errors.js";
import { REQUIRED_ANGLES } from "./angles.js";

export interface SubtopicValidationOptions {
  expectedCount: number;
  maxKeywordOverlap: number;
}

const MIN_KEYWORDS = 3;
const MAX_KEYWORDS = 5;

function normalizeKeyword(keyword: string): string {
  return keyword.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Number of keywords two subtopics share (case and whitespace insensitive)
 */
export function keywordOverlap(a: Subtopic, b: Subtopic): number {
  const left = new Set(a.keywords.map(normalizeKeyword));
  const right = new Set(b.keywords.map(normalizeKeyword));

  let shared = 0;
  for (const keyword of left) {
    if (right.has(keyword)) shared++;
  }
  return shared;
}

/**
 * Throws InsufficientScopeError when the set is not a valid decomposition
 */
export function validateSubtopics(
  subtopics: Subtopic[],
  depth: ResearchDepth,
  options: SubtopicValidationOptions
): Subtopic[] {
  if (subtopics.length !== options.expectedCount) {
    throw new InsufficientScopeError(
      `Expected ${options.expectedCount} subtopics for depth "${depth}", got ${subtopics.length}.`,
      depth,
      { expected: options.expectedCount, actual: subtopics.length }
    );
  }

  const ids = new Set(subtopics.map((s) => s.id));
  const titles = new Set(subtopics.map((s) => s.title.trim().toLowerCase()));
  if (ids.size !== subtopics.length || titles.size !== subtopics.length) {
    throw new InsufficientScopeError("Subtopics must have distinct ids and titles.", depth);
  }

  for (const subtopic of subtopics) {
    const distinct = new Set(subtopic.keywords.map(normalizeKeyword));
    if (distinct.size < MIN_KEYWORDS || subtopic.keywords.length > MAX_KEYWORDS) {
      throw new InsufficientScopeError(
        `Subtopic "${subtopic.title}" needs ${MIN_KEYWORDS}-${MAX_KEYWORDS} distinct keywords.`,
        depth,
        { subtopicId: subtopic.id, keywords: subtopic.keywords }
      );
    }
  }

  const angles = new Set(subtopics.map((s) => s.angle));
  const missing = REQUIRED_ANGLES.filter((angle) => !angles.has(angle));
  if (missing.length > 0) {
    throw new InsufficientScopeError(
      `Decomposition does not cover required angles: ${missing.join(", ")}.`,
      depth,
      { missing }
    );
  }

  for (let i = 0; i < subtopics.length; i++) {
    for (let j = i + 1; j < subtopics.length; j++) {
      const shared = keywordOverlap(subtopics[i], subtopics[j]);
      if (shared > options.maxKeywordOverlap) {
        throw new InsufficientScopeError(
          `Subtopics "${subtopics[i].title}" and "${subtopics[j].title}" overlap on ${shared} keywords.`,
          depth,
          { left: subtopics[i].id, right: subtopics[j].id, shared, bound: options.maxKeywordOverlap }
        );
      }
    }
  }

  return subtopics;
}
