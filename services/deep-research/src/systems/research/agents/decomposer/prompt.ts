/**
 * Decomposer Agent Prompt
 */

import type { ResearchDepth } from "../../types.js";
import { ANGLE_CATALOGUE, REQUIRED_ANGLES } from "./angles.js";

export interface DecomposerPromptParams {
  query: string;
  depth: ResearchDepth;
  count: number;
  maxKeywordOverlap: number;
}

export function getDecomposerPrompt(params: DecomposerPromptParams): string {
  const { query, depth, count, maxKeywordOverlap } = params;

  const angles = ANGLE_CATALOGUE.map((a) => `- ${a.angle}: ${a.rationale}`).join("\n");

  return `You plan research for other agents. You never talk to end-users and you do not search.

Split the research query below into exactly ${count} subtopics (depth: ${depth}).

## Query

${query}

## Rules

- Subtopics must not overlap: two subtopics should not return the same search results.
- Together they must cover the whole query.
- Include at least one subtopic for each of these angles: ${REQUIRED_ANGLES.join(", ")}.
- Each subtopic has 3-5 search keywords, most important first.
- No two subtopics may share more than ${maxKeywordOverlap} keyword(s).
- Use each angle at most once.

## Angles

${angles}

## Output

Respond with JSON only, no markdown and no explanation:

{
  "subtopics": [
    {
      "title": "string",
      "keywords": ["string", "string", "string"],
      "angle": "one of the angles above",
      "rationale": "why this subtopic is needed"
    }
  ]
}`;
}
