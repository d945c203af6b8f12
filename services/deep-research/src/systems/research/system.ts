/**
 * Research System
 * Orchestrates one research run:
 * DECOMPOSE → DISPATCH → AGGREGATE → THEMES → COMPOSE → PERSIST
 *
 * Once decomposition succeeds a report is always produced; worker failures
 * only surface as research gaps.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ValidationError, getBaseConfig, logger } from "@deepresearch/core";
import type { IStore } from "../../shared/store/types.js";
import type { IExecutor } from "../../shared/executor/types.js";
import { createFileStore } from "../../shared/store/file.js";
import { createClaudeExecutor } from "../../shared/executor/claude.js";
import type {
  AggregationStats,
  ResearchQuery,
  ResearchReport,
  Subtopic,
  WorkerStatus,
} from "./types.js";
import { loadResearchConfig, type ResearchConfig, type ResearchConfigOverrides } from "./config.js";
import type { Decomposer } from "./agents/decomposer/types.js";
import { TemplateDecomposer } from "./agents/decomposer/template.js";
import { DecomposerAgent } from "./agents/decomposer/agent.js";
import type { ResearchWorkerFactory } from "./agents/researcher/types.js";
import { createResearcherFactory } from "./agents/researcher/agent.js";
import { Dispatcher } from "./harness/dispatcher.js";
import { aggregateEvidence } from "./utils/evidence-aggregator.js";
import { organizeThemes } from "./utils/theme-organizer.js";
import { composeReport } from "./utils/report-composer.js";
import { renderReportMarkdown } from "./utils/report-markdown.js";

// ============================================
// TYPES
// ============================================

const ResearchQuerySchema = z.object({
  text: z.string().trim().min(1, "Query text is required"),
  depth: z.enum(["quick", "medium", "deep"]),
});

export interface ResearchSystemOptions {
  /** Threshold and depth overrides on top of defaults and RESEARCH_* env */
  config?: ResearchConfigOverrides;

  /** Where the default file store writes; defaults to DATA_DIR */
  dataDir?: string;

  /** "template" (default) or "agent" for LLM-planned subtopics */
  decomposer?: "template" | "agent";

  /** Workers in flight; defaults to one per subtopic */
  concurrency?: number;

  /** Write report.json and report.md after each run (default true) */
  persistReport?: boolean;
}

export interface ResearchDependencies {
  store: IStore;
  executor: IExecutor;
  decomposer: Decomposer;

  /** Builds the worker factory for one run */
  createWorkers: (runId: string) => ResearchWorkerFactory;
}

export interface WorkerSummary {
  subtopicId: string;
  status: WorkerStatus;
  durationMs: number;
  error?: string;
}

export interface ResearchRunResult {
  correlationId: string;
  report: ResearchReport;
  markdown: string;
  subtopics: Subtopic[];
  workers: WorkerSummary[];
  stats: AggregationStats;
  durationMs: number;

  /** Location of report.json when persisted */
  reportPath?: string;
}

// ============================================
// RESEARCH SYSTEM
// ============================================

export class ResearchSystem {
  readonly config: ResearchConfig;

  private readonly options: ResearchSystemOptions;
  private readonly deps: ResearchDependencies;
  private readonly log = logger.child({ component: "research-system" });

  constructor(options: ResearchSystemOptions = {}, deps: Partial<ResearchDependencies> = {}) {
    this.options = {
      ...options,
      persistReport: options.persistReport ?? true,
      decomposer: options.decomposer ?? "template",
    };
    this.config = loadResearchConfig(options.config);

    const store = deps.store ?? createFileStore(options.dataDir ?? getBaseConfig().env.dataDir);
    const executor = deps.executor ?? createClaudeExecutor();

    this.deps = {
      store,
      executor,
      decomposer:
        deps.decomposer ??
        (this.options.decomposer === "agent"
          ? new DecomposerAgent({ executor, config: this.config })
          : new TemplateDecomposer(this.config)),
      createWorkers:
        deps.createWorkers ?? ((runId) => createResearcherFactory({ store, executor }, { runId })),
    };
  }

  /**
   * Run the full pipeline for one query
   * Throws ValidationError for a malformed query and InsufficientScopeError
   * when the query cannot be decomposed.
   */
  async run(input: ResearchQuery): Promise<ResearchRunResult> {
    const parsed = ResearchQuerySchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Invalid research query", {
        issues: parsed.error.issues.map((i) => `${i.path.join(".") || "query"}: ${i.message}`),
      });
    }

    const query: ResearchQuery = parsed.data;
    const correlationId = randomUUID();
    const startTime = Date.now();
    const log = this.log.child({ correlationId });

    log.info("Starting research run", { query: query.text, depth: query.depth });

    try {
      // Phase 1: DECOMPOSE
      log.info("Phase 1: DECOMPOSE", { phase: "decompose", decomposer: this.deps.decomposer.name });
      const subtopics = await this.deps.decomposer.decompose(query);

      // Phase 2: DISPATCH
      const { workerTimeoutMs } = this.config.depths[query.depth];
      log.info("Phase 2: DISPATCH", { phase: "dispatch", workers: subtopics.length });

      const dispatcher = new Dispatcher(this.deps.createWorkers(correlationId), {
        defaultTimeoutMs: this.config.defaultWorkerTimeoutMs,
      });
      const outcomes = await dispatcher.dispatch(subtopics, {
        timeoutMs: workerTimeoutMs,
        concurrency: this.options.concurrency,
        correlationId,
      });

      // Phase 3: AGGREGATE
      log.info("Phase 3: AGGREGATE", { phase: "aggregate" });
      const registry = aggregateEvidence(outcomes, this.config);

      // Phase 4: THEMES
      const themes = organizeThemes(registry, {
        themeThreshold: this.config.themeThreshold,
        query: query.text,
      });
      log.info("Phase 4: THEMES complete", { phase: "themes", themes: themes.length });

      // Phase 5: COMPOSE
      const report = composeReport({
        query,
        registry,
        themes,
        maxKeyFindings: this.config.maxKeyFindings,
      });
      const markdown = renderReportMarkdown(report);

      // Phase 6: PERSIST (a storage failure leaves the report in memory only)
      let reportPath: string | undefined;
      if (this.options.persistReport) {
        try {
          reportPath = await this.persist(correlationId, report, markdown);
        } catch (error) {
          log.error("Failed to persist report", error, { phase: "persist" });
        }
      }

      const durationMs = Date.now() - startTime;
      log.info("Research run complete", {
        durationMs,
        degraded: report.degraded,
        claims: registry.claims.length,
        sources: registry.sources.size,
        gaps: registry.gaps.length,
      });
      log.metric("run_duration_ms", durationMs);

      return {
        correlationId,
        report,
        markdown,
        subtopics,
        workers: outcomes.map((o) => ({
          subtopicId: o.subtopic.id,
          status: o.status,
          durationMs: o.durationMs,
          error: o.error,
        })),
        stats: registry.stats,
        durationMs,
        reportPath,
      };
    } catch (error) {
      log.error("Research run failed", error, { durationMs: Date.now() - startTime });
      throw error;
    }
  }

  private async persist(
    correlationId: string,
    report: ResearchReport,
    markdown: string
  ): Promise<string> {
    const jsonKey = `reports/${correlationId}/report`;
    await this.deps.store.write(jsonKey, report);
    await this.deps.store.writeText(`reports/${correlationId}/report.md`, markdown);

    const reportPath = this.deps.store.getPath(jsonKey);
    this.log.info("Report saved", { correlationId, phase: "persist", path: reportPath });
    return reportPath;
  }

  getInfo(): { decomposer: string; depths: ResearchConfig["depths"] } {
    return { decomposer: this.deps.decomposer.name, depths: this.config.depths };
  }
}

/**
 * Create a Research system instance
 */
export function createResearchSystem(
  options?: ResearchSystemOptions,
  deps?: Partial<ResearchDependencies>
): ResearchSystem {
  return new ResearchSystem(options, deps);
}
