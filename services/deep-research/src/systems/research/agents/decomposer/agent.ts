/**
 * Decomposer Agent
 * LLM-planned decomposition, held to the same invariants as the template
 */

import { AgentError, ValidationError, logger } from "@deepresearch/core";
import type { AgentProfile, IExecutor } from "../../../../shared/executor/types.js";
import type { ResearchQuery, Subtopic } from "../../types.js";
import type { ResearchConfig } from "../../config.js";
import { extractJsonObject } from "../../utils/json.js";
import { getDecomposerPrompt } from "./prompt.js";
import { DecompositionSchema } from "./schema.js";
import { validateSubtopics } from "./validate.js";
import type { Decomposer } from "./types.js";

const DECOMPOSER_PROFILE: AgentProfile = {
  model: "haiku",
  maxTurns: 3,
  maxBudgetUsd: 0.25,
  tools: [],
};

export interface DecomposerAgentDependencies {
  executor: IExecutor;
  config: ResearchConfig;
}

export class DecomposerAgent implements Decomposer {
  readonly name = "decomposer";

  private readonly profile: AgentProfile;
  private readonly log = logger.child({ component: "decomposer" });

  constructor(
    private readonly deps: DecomposerAgentDependencies,
    profile?: Partial<AgentProfile>
  ) {
    this.profile = { ...DECOMPOSER_PROFILE, ...profile };
  }

  async decompose(query: ResearchQuery): Promise<Subtopic[]> {
    const count = this.deps.config.depths[query.depth].subtopicCount;

    const prompt = getDecomposerPrompt({
      query: query.text,
      depth: query.depth,
      count,
      maxKeywordOverlap: this.deps.config.maxKeywordOverlap,
    });

    const execResult = await this.deps.executor.execute({
      prompt,
      profile: this.profile,
      context: { agentName: this.name, depth: query.depth },
    });

    if (!execResult.success) {
      throw new AgentError(execResult.error?.message ?? "Execution failed", this.name, {
        sessionId: execResult.sessionId,
      });
    }

    const parsed = DecompositionSchema.safeParse(extractJsonObject(execResult.output));
    if (!parsed.success) {
      throw new ValidationError("Decomposer returned an invalid subtopic list", {
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }

    const subtopics: Subtopic[] = parsed.data.subtopics.map((s, index) => ({
      id: `st-${index + 1}`,
      title: s.title.trim(),
      keywords: s.keywords.map((k) => k.trim()),
      angle: s.angle,
      rationale: s.rationale,
    }));

    this.log.info("Decomposed query", {
      depth: query.depth,
      subtopics: subtopics.length,
      costUsd: execResult.costUsd,
    });

    return validateSubtopics(subtopics, query.depth, {
      expectedCount: count,
      maxKeywordOverlap: this.deps.config.maxKeywordOverlap,
    });
  }
}
