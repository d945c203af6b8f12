/**
 * Researcher Agent
 * Research worker backed by the Claude Agent SDK with web tools
 */

import { logger } from "@deepresearch/core";
import type { AgentProfile, IExecutor } from "../../../../shared/executor/types.js";
import type { IStore } from "../../../../shared/store/types.js";
import type { ResearchAssignment } from "../../types.js";
import { WorkerFetchError } from "../../errors.js";
import { extractJsonObject } from "../../utils/json.js";
import { getResearcherPrompt } from "./prompt.js";
import { toWorkerInput, type ResearchWorker, type ResearchWorkerFactory } from "./types.js";

// ============================================
// AGENT CONFIGURATION
// ============================================

const RESEARCHER_PROFILE: AgentProfile = {
  model: "sonnet",
  maxTurns: 30,
  maxBudgetUsd: 2.0,
  tools: ["Read", "Write", "WebSearch", "WebFetch"],
};

// ============================================
// AGENT DEPENDENCIES
// ============================================

export interface ResearcherDependencies {
  store: IStore;
  executor: IExecutor;
}

export interface ResearcherOptions {
  /** Namespaces the worker output files of one run */
  runId: string;
  profile?: Partial<AgentProfile>;
}

// ============================================
// RESEARCHER AGENT
// ============================================

export class ResearcherAgent implements ResearchWorker {
  readonly name = "researcher";

  private readonly profile: AgentProfile;
  private readonly log = logger.child({ component: "researcher" });

  constructor(
    private readonly deps: ResearcherDependencies,
    private readonly options: ResearcherOptions
  ) {
    this.profile = { ...RESEARCHER_PROFILE, ...options.profile };
  }

  async research(assignment: ResearchAssignment, signal: AbortSignal): Promise<unknown> {
    const { subtopic } = assignment;
    const outputKey = `runs/${this.options.runId}/workers/${subtopic.id}`;

    const prompt = getResearcherPrompt({
      input: toWorkerInput(assignment),
      outputPath: this.deps.store.getPath(outputKey),
    });

    const execResult = await this.deps.executor.execute({
      prompt,
      profile: this.profile,
      signal,
      context: { agentName: this.name, subtopicId: subtopic.id },
    });

    if (!execResult.success) {
      throw new WorkerFetchError(subtopic.id, execResult.error?.message ?? "Execution failed");
    }

    this.log.debug("Worker finished", {
      subtopicId: subtopic.id,
      costUsd: execResult.costUsd,
      turns: execResult.turns,
      toolsUsed: execResult.toolsUsed,
    });

    const saved = await this.deps.store.read<unknown>(outputKey);
    if (saved !== null) {
      return saved;
    }

    // Agent skipped the Write tool: fall back to JSON in its reply
    try {
      return extractJsonObject(execResult.output);
    } catch (error) {
      this.log.warn("Worker output has no findings document", {
        subtopicId: subtopic.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return execResult.output;
    }
  }
}

/**
 * Factory handing the dispatcher one researcher per assignment
 */
export function createResearcherFactory(
  deps: ResearcherDependencies,
  options: ResearcherOptions
): ResearchWorkerFactory {
  return () => new ResearcherAgent(deps, options);
}
