/**
 * Dispatcher
 * Fans subtopics out to independent research workers and joins on all of
 * them. A worker that times out, fails, or returns malformed output becomes
 * an empty findings document plus a gap; siblings are never cancelled and
 * nothing is retried.
 */

import { logger } from "@deepresearch/core";
import type { Gap, ResearchAssignment, Subtopic, WorkerOutcome } from "../types.js";
import { WorkerFetchError, WorkerMalformedOutputError, WorkerTimeoutError } from "../errors.js";
import type { ResearchWorkerFactory } from "../agents/researcher/types.js";
import { createEmptyFindings, validateFindingsDocument } from "../agents/researcher/schema.js";
import { runPool, runWithBudget } from "./pool.js";

export interface DispatchOptions {
  /** Per-worker time budget */
  timeoutMs?: number;

  /** Workers in flight; defaults to one per subtopic */
  concurrency?: number;

  correlationId?: string;
}

export interface DispatcherOptions {
  defaultTimeoutMs: number;
}

/**
 * One assignment per subtopic, each listing the titles of all the others
 */
export function buildAssignments(subtopics: readonly Subtopic[]): ResearchAssignment[] {
  return subtopics.map((subtopic) => ({
    subtopic,
    coveredTopics: subtopics.filter((s) => s.id !== subtopic.id).map((s) => s.title),
  }));
}

export class Dispatcher {
  private readonly log = logger.child({ component: "dispatcher" });

  constructor(
    private readonly createWorker: ResearchWorkerFactory,
    private readonly options: DispatcherOptions
  ) {}

  async dispatch(
    subtopics: readonly Subtopic[],
    options: DispatchOptions = {}
  ): Promise<WorkerOutcome[]> {
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const concurrency = options.concurrency ?? subtopics.length;
    const log = this.log.child({ correlationId: options.correlationId });

    log.info("Dispatching workers", { workers: subtopics.length, concurrency, timeoutMs });

    const outcomes = await runPool(buildAssignments(subtopics), concurrency, (assignment) =>
      this.runWorker(assignment, timeoutMs)
    );

    for (const outcome of outcomes) {
      const context = {
        subtopicId: outcome.subtopic.id,
        status: outcome.status,
        durationMs: outcome.durationMs,
      };
      if (outcome.status === "completed") {
        log.info("Worker completed", context);
      } else {
        log.warn("Worker failed", { ...context, error: outcome.error });
      }
    }

    log.metric(
      "workers_failed",
      outcomes.filter((o) => o.status !== "completed").length
    );

    return outcomes;
  }

  private async runWorker(
    assignment: ResearchAssignment,
    timeoutMs: number
  ): Promise<WorkerOutcome> {
    const { subtopic } = assignment;
    const startTime = Date.now();

    try {
      const worker = this.createWorker(assignment);
      const result = await runWithBudget(
        (signal) => worker.research(assignment, signal),
        timeoutMs
      );

      if (result.timedOut) {
        return this.failed(subtopic, "timeout", new WorkerTimeoutError(subtopic.id, timeoutMs), startTime);
      }

      const validation = validateFindingsDocument(result.value);
      if (!validation.success) {
        return this.failed(
          subtopic,
          "malformed",
          new WorkerMalformedOutputError(subtopic.id, validation.issues),
          startTime
        );
      }

      return {
        subtopic,
        status: "completed",
        document: result.value,
        gaps: [],
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      if (error instanceof WorkerTimeoutError) {
        return this.failed(subtopic, "timeout", error, startTime);
      }

      const fetchError =
        error instanceof WorkerFetchError
          ? error
          : new WorkerFetchError(
              subtopic.id,
              error instanceof Error ? error.message : String(error),
              error instanceof Error ? error : undefined
            );

      return this.failed(subtopic, "failed", fetchError, startTime);
    }
  }

  private failed(
    subtopic: Subtopic,
    status: Exclude<WorkerOutcome["status"], "completed">,
    error: Error,
    startTime: number
  ): WorkerOutcome {
    return {
      subtopic,
      status,
      document: createEmptyFindings(subtopic.title),
      gaps: [gapFor(subtopic, status, error)],
      durationMs: Date.now() - startTime,
      error: error.message,
    };
  }
}

function gapFor(
  subtopic: Subtopic,
  status: Exclude<WorkerOutcome["status"], "completed">,
  error: Error
): Gap {
  const base = { subtopicId: subtopic.id, subtopic: subtopic.title };

  switch (status) {
    case "timeout":
      return {
        ...base,
        kind: "timeout",
        message: `Subtopic "${subtopic.title}" timed out before returning findings`,
      };
    case "malformed":
      return {
        ...base,
        kind: "malformed",
        message: `Subtopic "${subtopic.title}" returned malformed data`,
      };
    case "failed":
      return {
        ...base,
        kind: "fetch_failure",
        message: `Subtopic "${subtopic.title}" could not be researched: ${error.message}`,
      };
  }
}
