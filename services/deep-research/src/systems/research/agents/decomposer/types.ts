/**
 * Decomposer Types
 */

import type { ResearchQuery, Subtopic } from "../../types.js";

/**
 * Splits a query into non-overlapping, coverage-complete subtopics.
 * Implementations throw InsufficientScopeError rather than return an
 * overlapping set.
 */
export interface Decomposer {
  readonly name: string;
  decompose(query: ResearchQuery): Promise<Subtopic[]>;
}
