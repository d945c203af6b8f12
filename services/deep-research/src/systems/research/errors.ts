/**
 * Research pipeline errors
 *
 * Only InsufficientScopeError is fatal to a run. The worker errors are
 * converted into gaps at the dispatcher boundary.
 */

import { DeepResearchError } from "@deepresearch/core";
import type { ResearchDepth } from "./types.js";

/**
 * The query cannot be split into the requested number of
 * non-overlapping subtopics
 */
export class InsufficientScopeError extends DeepResearchError {
  public readonly depth: ResearchDepth;
  public readonly suggestion: string;

  constructor(
    message: string,
    depth: ResearchDepth,
    context?: Record<string, unknown>
  ) {
    const suggestion =
      depth === "quick"
        ? "Broaden the query."
        : `Retry with a lower depth than "${depth}" or broaden the query.`;

    super(`${message} ${suggestion}`, "INSUFFICIENT_SCOPE", { context, retryable: false });
    this.name = "InsufficientScopeError";
    this.depth = depth;
    this.suggestion = suggestion;
  }
}

/**
 * Worker exceeded its time budget
 */
export class WorkerTimeoutError extends DeepResearchError {
  public readonly subtopicId: string;
  public readonly timeoutMs: number;

  constructor(subtopicId: string, timeoutMs: number) {
    super(`Worker for ${subtopicId} timed out after ${timeoutMs}ms`, "WORKER_TIMEOUT", {
      context: { subtopicId, timeoutMs },
      retryable: false,
    });
    this.name = "WorkerTimeoutError";
    this.subtopicId = subtopicId;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Worker returned a document that does not match the findings contract
 */
export class WorkerMalformedOutputError extends DeepResearchError {
  public readonly subtopicId: string;
  public readonly issues: string[];

  constructor(subtopicId: string, issues: string[]) {
    super(
      `Worker for ${subtopicId} returned malformed data: ${issues.join("; ")}`,
      "WORKER_MALFORMED_OUTPUT",
      { context: { subtopicId, issues }, retryable: false }
    );
    this.name = "WorkerMalformedOutputError";
    this.subtopicId = subtopicId;
    this.issues = issues;
  }
}

/**
 * Worker's search/fetch layer failed
 */
export class WorkerFetchError extends DeepResearchError {
  public readonly subtopicId: string;

  constructor(subtopicId: string, message: string, cause?: Error) {
    super(`Worker for ${subtopicId} failed: ${message}`, "WORKER_FETCH_FAILURE", {
      cause,
      context: { subtopicId },
      retryable: false,
    });
    this.name = "WorkerFetchError";
    this.subtopicId = subtopicId;
  }
}
