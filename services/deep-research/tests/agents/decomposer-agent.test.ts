import { describe, it, expect } from "vitest";
import { AgentError, ValidationError } from "@deepresearch/core";
import { DecomposerAgent } from "../../src/systems/research/agents/decomposer/agent.js";
import { DEFAULT_RESEARCH_CONFIG } from "../../src/systems/research/config.js";
import { InsufficientScopeError } from "../../src/systems/research/errors.js";
import { FakeExecutor, executorResponse } from "../fakes.js";

const PLAN = {
  subtopics: [
    {
      title: "Raft adoption today",
      keywords: ["raft", "adoption", "etcd"],
      angle: "current-state",
      rationale: "Where Raft is used",
    },
    {
      title: "Raft failure modes",
      keywords: ["raft", "split brain", "leader election bugs"],
      angle: "limitations",
      rationale: "What goes wrong",
    },
    {
      title: "Raft in databases",
      keywords: ["raft", "cockroachdb", "tikv"],
      angle: "applications",
      rationale: "Production systems",
    },
  ],
};

function agentReplying(output: string) {
  const executor = new FakeExecutor(() => executorResponse({ output }));
  return { executor, agent: new DecomposerAgent({ executor, config: DEFAULT_RESEARCH_CONFIG }) };
}

describe("DecomposerAgent", () => {
  it("turns the agent's JSON plan into validated subtopics", async () => {
    const { executor, agent } = agentReplying("```json\n" + JSON.stringify(PLAN) + "\n```");

    const subtopics = await agent.decompose({ text: "raft consensus", depth: "quick" });

    expect(subtopics.map((s) => [s.id, s.title, s.angle])).toEqual([
      ["st-1", "Raft adoption today", "current-state"],
      ["st-2", "Raft failure modes", "limitations"],
      ["st-3", "Raft in databases", "applications"],
    ]);
    expect(executor.requests).toHaveLength(1);
    expect(executor.requests[0].profile.model).toBe("haiku");
    expect(executor.requests[0].prompt).toContain("exactly 3 subtopics");
  });

  it("rejects a plan that breaks the overlap bound", async () => {
    const overlapping = structuredClone(PLAN);
    overlapping.subtopics[2].keywords = ["raft", "etcd", "tikv"];
    const { agent } = agentReplying(JSON.stringify(overlapping));

    await expect(agent.decompose({ text: "raft consensus", depth: "quick" })).rejects.toBeInstanceOf(
      InsufficientScopeError
    );
  });

  it("rejects a plan that does not match the schema", async () => {
    const { agent } = agentReplying('{"subtopics": [{"title": "Only a title"}]}');

    await expect(agent.decompose({ text: "raft consensus", depth: "quick" })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("surfaces executor failures as agent errors", async () => {
    const executor = new FakeExecutor(() =>
      executorResponse({
        success: false,
        error: { code: "EXECUTOR_ERROR", message: "rate limited" },
      })
    );
    const agent = new DecomposerAgent({ executor, config: DEFAULT_RESEARCH_CONFIG });

    const attempt = agent.decompose({ text: "raft consensus", depth: "quick" });
    await expect(attempt).rejects.toBeInstanceOf(AgentError);
    await expect(attempt).rejects.toThrow("rate limited");
  });
});
