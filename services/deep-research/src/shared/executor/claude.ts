/**
 * Claude Executor
 * Implementation using Claude Agent SDK
 */

import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import { logger } from "@deepresearch/core";
import type {
  IExecutor,
  ExecutorRequest,
  ExecutorResponse,
  ExecutorOptions,
  AgentProfile,
} from "./types.js";

/**
 * Map model names to actual model IDs
 */
function getModelId(model: AgentProfile["model"]): string {
  const models = {
    haiku: "claude-3-5-haiku-latest",
    sonnet: "claude-sonnet-4-20250514",
    opus: "claude-opus-4-20250514",
  };
  return models[model];
}

/**
 * Claude SDK Executor
 *
 * Runs once per request; callers decide what a failure means; nothing is
 * retried here.
 */
export class ClaudeExecutor implements IExecutor {
  private readonly options: Required<ExecutorOptions>;
  private readonly log = logger.child({ component: "executor" });

  constructor(options: ExecutorOptions = {}) {
    this.options = {
      cwd: options.cwd ?? process.cwd(),
      permissionMode: options.permissionMode ?? "bypassPermissions",
    };
  }

  /**
   * Check if executor is ready
   */
  isReady(): boolean {
    return !!process.env.ANTHROPIC_API_KEY;
  }

  /**
   * Execute a prompt
   */
  async execute(request: ExecutorRequest): Promise<ExecutorResponse> {
    const startTime = Date.now();

    try {
      return await this.executeOnce(request, startTime);
    } catch (error) {
      const aborted = request.signal?.aborted ?? false;

      return {
        success: false,
        output: "",
        costUsd: 0,
        durationMs: Date.now() - startTime,
        toolsUsed: [],
        turns: 0,
        error: {
          code: aborted ? "EXECUTOR_ABORTED" : "EXECUTOR_ERROR",
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  private async executeOnce(
    request: ExecutorRequest,
    startTime: number
  ): Promise<ExecutorResponse> {
    const { prompt, systemPrompt, profile, signal } = request;

    const abortController = new AbortController();
    if (signal) {
      if (signal.aborted) {
        abortController.abort();
      } else {
        signal.addEventListener("abort", () => abortController.abort(), { once: true });
      }
    }

    const options: Options = {
      systemPrompt,
      model: getModelId(profile.model),
      allowedTools: profile.tools,
      maxTurns: profile.maxTurns,
      permissionMode: this.options.permissionMode,
      cwd: this.options.cwd,
      abortController,
    };

    const result = query({ prompt, options });

    let output = "";
    let sessionId: string | undefined;
    let costUsd = 0;
    let durationMs = 0;
    let turns = 0;
    const toolsUsed = new Set<string>();

    for await (const message of result) {
      if (message.type === "assistant") {
        for (const block of message.message.content) {
          if (block.type === "text") {
            output += block.text;
          } else if (block.type === "tool_use") {
            toolsUsed.add(block.name);
          }
        }
        turns++;
      } else if (message.type === "result") {
        if (message.subtype === "success") {
          costUsd = message.total_cost_usd;
          durationMs = message.duration_ms;
          sessionId = message.session_id;

          if (!output && message.result) {
            output = message.result;
          }
        } else {
          throw new Error(`Agent run ended with ${message.subtype}`);
        }
      }
    }

    if (costUsd > profile.maxBudgetUsd) {
      this.log.warn("Agent run exceeded its budget", {
        costUsd,
        maxBudgetUsd: profile.maxBudgetUsd,
        ...request.context,
      });
    }

    return {
      success: true,
      output,
      sessionId,
      costUsd,
      durationMs: durationMs || Date.now() - startTime,
      toolsUsed: Array.from(toolsUsed),
      turns,
    };
  }
}

/**
 * Create a Claude executor with default options
 */
export function createClaudeExecutor(options?: ExecutorOptions): IExecutor {
  return new ClaudeExecutor(options);
}
