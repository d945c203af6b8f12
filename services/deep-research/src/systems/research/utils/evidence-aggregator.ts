/**
 * Evidence Aggregator
 * Merges the findings documents of all workers into one registry of
 * deduplicated sources and claims, each claim scored for confidence.
 *
 * The aggregator is the single owner of the registry while merging; callers
 * get a frozen, read-only view from finalize().
 */

import { DeepResearchError, logger } from "@deepresearch/core";
import type {
  AggregateRegistry,
  Claim,
  Gap,
  Source,
  Subtopic,
  WorkerOutcome,
} from "../types.js";
import type { ResearchConfig } from "../config.js";
import { validateFindingsDocument } from "../agents/researcher/schema.js";
import { SourceRegistry } from "./source-registry.js";
import { ClaimMerger } from "./claim-merger.js";
import { scoreConfidence } from "./confidence.js";

// ============================================
// TYPES
// ============================================

export type AggregationOptions = Pick<
  ResearchConfig,
  "claimMergeThreshold" | "relatedClaimThreshold" | "relatedTitleThreshold"
>;

// ============================================
// AGGREGATOR
// ============================================

export class EvidenceAggregator {
  private readonly sources = new SourceRegistry();
  private readonly claims: ClaimMerger;
  private readonly gaps: Gap[] = [];
  private ingested = 0;
  private rejected = 0;
  private finalized = false;

  private readonly log = logger.child({ component: "aggregator" });

  constructor(private readonly options: AggregationOptions) {
    this.claims = new ClaimMerger(options.claimMergeThreshold);
  }

  /**
   * Merge one worker document. A document that fails validation is
   * discarded with a gap; returns whether it was accepted.
   */
  ingest(document: unknown, subtopic: Subtopic): boolean {
    this.assertOpen();

    const validation = validateFindingsDocument(document);

    if (!validation.success) {
      this.rejected++;
      this.gaps.push({
        kind: "malformed",
        subtopicId: subtopic.id,
        subtopic: subtopic.title,
        message: `Subtopic "${subtopic.title}" returned malformed data`,
      });
      this.log.warn("Discarded malformed findings document", {
        subtopicId: subtopic.id,
        issues: validation.issues,
      });
      return false;
    }

    const findings = validation.document;
    this.ingested++;

    for (const claim of findings.claims) {
      const citations = claim.sources.map((source) => this.sources.add(source).url);

      this.claims.add({
        text: claim.claim,
        evidence: claim.evidence,
        citations,
        subtopicId: subtopic.id,
      });
    }

    for (const gap of findings.gaps) {
      const message = gap.trim();
      if (!message) continue;

      this.gaps.push({
        kind: "worker_reported",
        subtopicId: subtopic.id,
        subtopic: subtopic.title,
        message,
      });
    }

    return true;
  }

  /**
   * Record gaps produced outside the aggregator (dispatcher failures)
   */
  addGaps(gaps: readonly Gap[]): void {
    this.assertOpen();
    this.gaps.push(...gaps);
  }

  /**
   * Close the registry: cross-reference, score and freeze
   */
  finalize(): AggregateRegistry {
    this.assertOpen();
    this.finalized = true;

    this.sources.linkRelated(this.options.relatedTitleThreshold);
    const related = this.claims.relatedIds(this.options.relatedClaimThreshold);

    const claims: Claim[] = this.claims.list().map((cluster) =>
      Object.freeze({
        id: cluster.id,
        text: cluster.text,
        evidence: cluster.evidence,
        citations: [...cluster.citations],
        subtopicIds: [...cluster.subtopicIds],
        relatedClaimIds: related.get(cluster.id) ?? [],
        confidence: scoreConfidence(this.resolve(cluster.citations)),
      })
    );

    const degraded = claims.length === 0;
    if (degraded) {
      this.gaps.push({
        kind: "empty_aggregate",
        message: "No worker returned usable findings; the report has no claims",
      });
    }

    const registry: AggregateRegistry = {
      claims: Object.freeze(claims),
      sources: this.sources.snapshot(),
      gaps: Object.freeze([...this.gaps]),
      stats: {
        documentsIngested: this.ingested,
        documentsRejected: this.rejected,
        rawClaimsCount: this.claims.rawCount,
        dedupedClaimsCount: claims.length,
        rawSourcesCount: this.sources.rawCount,
        dedupedSourcesCount: this.sources.size,
      },
      degraded,
    };

    this.log.info("Aggregation complete", { ...registry.stats, degraded });

    return registry;
  }

  private resolve(urls: readonly string[]): Source[] {
    const resolved: Source[] = [];
    for (const url of urls) {
      const source = this.sources.get(url);
      if (source) resolved.push(source);
    }
    return resolved;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new DeepResearchError("Aggregator already finalized", "AGGREGATOR_FINALIZED");
    }
  }
}

// ============================================
// AGGREGATION FUNCTION
// ============================================

/**
 * Aggregate dispatcher outcomes in the order given (the dispatcher returns
 * them in subtopic order, independent of completion order)
 */
export function aggregateEvidence(
  outcomes: readonly WorkerOutcome[],
  options: AggregationOptions
): AggregateRegistry {
  const aggregator = new EvidenceAggregator(options);

  for (const outcome of outcomes) {
    aggregator.addGaps(outcome.gaps);

    if (outcome.status === "completed") {
      aggregator.ingest(outcome.document, outcome.subtopic);
    }
  }

  return aggregator.finalize();
}
