import { describe, it, expect } from "vitest";
import { TemplateDecomposer, extractFocus } from "../../src/systems/research/agents/decomposer/template.js";
import { keywordOverlap } from "../../src/systems/research/agents/decomposer/validate.js";
import { DEFAULT_RESEARCH_CONFIG } from "../../src/systems/research/config.js";
import { InsufficientScopeError } from "../../src/systems/research/errors.js";

const QUERY = "How does Raft consensus work in distributed databases?";

describe("extractFocus", () => {
  it("keeps content terms in order", () => {
    expect(extractFocus(QUERY)).toBe("raft consensus work distributed databases");
  });

  it("keeps short domain terms", () => {
    expect(extractFocus("AI safety")).toBe("ai safety");
    expect(extractFocus("5G rollout")).toBe("5g rollout");
  });

  it("caps the focus at six terms", () => {
    expect(extractFocus("alpha bravo charlie delta echo foxtrot golf hotel")).toBe(
      "alpha bravo charlie delta echo foxtrot"
    );
  });
});

describe("TemplateDecomposer", () => {
  const decomposer = new TemplateDecomposer(DEFAULT_RESEARCH_CONFIG);

  it.each([
    ["quick", 3],
    ["medium", 5],
    ["deep", 10],
  ] as const)("returns %s depth as %i subtopics", async (depth, count) => {
    const subtopics = await decomposer.decompose({ text: QUERY, depth });
    expect(subtopics).toHaveLength(count);
    expect(new Set(subtopics.map((s) => s.id)).size).toBe(count);
  });

  it("builds titles and keywords from the angle catalogue", async () => {
    const [first] = await decomposer.decompose({ text: QUERY, depth: "quick" });

    expect(first).toEqual({
      id: "st-1",
      title: "Current state: How does Raft consensus work in distributed databases",
      keywords: [
        "raft consensus work distributed databases",
        "current state",
        "latest developments",
        "adoption trends",
      ],
      angle: "current-state",
      rationale: "Establishes where the subject stands today.",
    });
  });

  it("covers the required angles at every depth", async () => {
    const subtopics = await decomposer.decompose({ text: QUERY, depth: "quick" });
    expect(subtopics.map((s) => s.angle)).toEqual(["current-state", "limitations", "applications"]);
  });

  it("keeps pairwise keyword overlap within the bound", async () => {
    const subtopics = await decomposer.decompose({ text: QUERY, depth: "deep" });

    for (let i = 0; i < subtopics.length; i++) {
      for (let j = i + 1; j < subtopics.length; j++) {
        expect(keywordOverlap(subtopics[i], subtopics[j])).toBeLessThanOrEqual(1);
      }
    }
  });

  it("decomposes a query made of a single short term", async () => {
    const [first] = await decomposer.decompose({ text: "AI", depth: "quick" });

    expect(first.title).toBe("Current state: AI");
    expect(first.keywords).toEqual(["ai", "current state", "latest developments", "adoption trends"]);
  });

  it("rejects a query without searchable terms", async () => {
    const attempt = decomposer.decompose({ text: "What is it?", depth: "quick" });

    await expect(attempt).rejects.toBeInstanceOf(InsufficientScopeError);
    await expect(attempt).rejects.toThrow("Query has no searchable terms to decompose. Broaden the query.");
  });

  it("rejects depths beyond the angle catalogue", async () => {
    const wide = new TemplateDecomposer({
      ...DEFAULT_RESEARCH_CONFIG,
      depths: { ...DEFAULT_RESEARCH_CONFIG.depths, deep: { subtopicCount: 12, workerTimeoutMs: 1_000 } },
    });

    await expect(wide.decompose({ text: QUERY, depth: "deep" })).rejects.toThrow(
      'Only 10 distinct research angles are available, 12 requested. Retry with a lower depth than "deep" or broaden the query.'
    );
  });
});
