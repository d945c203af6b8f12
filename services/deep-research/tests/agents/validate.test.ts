import { describe, it, expect } from "vitest";
import { keywordOverlap, validateSubtopics } from "../../src/systems/research/agents/decomposer/validate.js";
import { InsufficientScopeError } from "../../src/systems/research/errors.js";
import type { ResearchAngle, Subtopic } from "../../src/systems/research/types.js";

function subtopic(id: string, angle: ResearchAngle, keywords: string[]): Subtopic {
  return { id, title: `Title ${id}`, keywords, angle, rationale: "" };
}

const valid = [
  subtopic("st-1", "current-state", ["raft", "adoption", "trends"]),
  subtopic("st-2", "limitations", ["raft", "failure modes", "challenges"]),
  subtopic("st-3", "applications", ["raft", "use cases", "deployments"]),
];

const options = { expectedCount: 3, maxKeywordOverlap: 1 };

describe("keywordOverlap", () => {
  it("compares keywords case and whitespace insensitively", () => {
    expect(
      keywordOverlap(
        subtopic("a", "background", ["Use  Cases", "raft", "history"]),
        subtopic("b", "economics", ["use cases", "RAFT", "cost"])
      )
    ).toBe(2);
  });
});

describe("validateSubtopics", () => {
  it("accepts a valid set", () => {
    expect(validateSubtopics(valid, "quick", options)).toBe(valid);
  });

  it("rejects a wrong count", () => {
    expect(() => validateSubtopics(valid.slice(0, 2), "quick", options)).toThrow(
      'Expected 3 subtopics for depth "quick", got 2.'
    );
  });

  it("rejects too few keywords", () => {
    const broken = [...valid.slice(0, 2), subtopic("st-3", "applications", ["raft", "raft", "use cases"])];
    expect(() => validateSubtopics(broken, "quick", options)).toThrow(InsufficientScopeError);
  });

  it("rejects a set missing a required angle", () => {
    const broken = [...valid.slice(0, 2), subtopic("st-3", "economics", ["raft", "cost", "pricing"])];
    expect(() => validateSubtopics(broken, "quick", options)).toThrow(
      "Decomposition does not cover required angles: applications."
    );
  });

  it("rejects overlapping subtopics with a suggestion to lower the depth", () => {
    const broken = [
      valid[0],
      valid[1],
      subtopic("st-3", "applications", ["raft", "adoption", "deployments"]),
    ];

    try {
      validateSubtopics(broken, "medium", { ...options });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientScopeError);
      if (error instanceof InsufficientScopeError) {
        expect(error.code).toBe("INSUFFICIENT_SCOPE");
        expect(error.depth).toBe("medium");
        expect(error.message).toBe(
          'Subtopics "Title st-1" and "Title st-3" overlap on 2 keywords. ' +
            'Retry with a lower depth than "medium" or broaden the query.'
        );
      }
    }
  });
});
