/**
 * Research System Types
 * Data model shared by every stage of the pipeline:
 * query → subtopics → worker outcomes → registry → themes → report
 */

// ============================================
// QUERY & DECOMPOSITION
// ============================================

export type ResearchDepth = "quick" | "medium" | "deep";

export interface ResearchQuery {
  /**
   * Raw free-text query
   */
  text: string;

  /**
   * Requested depth, drives subtopic count and worker budget
   */
  depth: ResearchDepth;
}

export type ResearchAngle =
  | "current-state"
  | "limitations"
  | "applications"
  | "background"
  | "future-outlook"
  | "mechanisms"
  | "alternatives"
  | "stakeholders"
  | "economics"
  | "governance";

export interface Subtopic {
  id: string;
  title: string;

  /**
   * 3-5 search keywords, in priority order
   */
  keywords: string[];

  angle: ResearchAngle;
  rationale: string;
}

/**
 * What a worker receives: its own subtopic plus what the others cover
 */
export interface ResearchAssignment {
  subtopic: Subtopic;
  coveredTopics: string[];
}

// ============================================
// EVIDENCE
// ============================================

export type ConfidenceLevel = "high" | "medium" | "low";

export interface Source {
  url: string;
  title: string;

  /**
   * 1 (unreliable) to 5 (authoritative)
   */
  credibility: number;

  relevanceNotes: string[];

  /**
   * Registrable domain derived from the URL
   */
  domain: string;

  author?: string;
  organization?: string;

  /**
   * URL of the original reporting when this source republishes it
   */
  republishedFrom?: string;

  /**
   * Same-domain sources with a similar title, cross-referenced but not merged
   */
  relatedUrls: string[];
}

export interface Claim {
  id: string;

  /**
   * Canonical wording (the most detailed variant seen)
   */
  text: string;

  evidence: string;

  /**
   * Source URLs, in first-cited order
   */
  citations: string[];

  /**
   * Subtopics whose workers reported this claim
   */
  subtopicIds: string[];

  /**
   * Claims that are similar but below the merge threshold
   */
  relatedClaimIds: string[];

  confidence: ConfidenceLevel;
}

// ============================================
// GAPS
// ============================================

export type GapKind =
  | "timeout"
  | "malformed"
  | "fetch_failure"
  | "worker_reported"
  | "empty_aggregate";

export interface Gap {
  kind: GapKind;
  message: string;
  subtopicId?: string;
  subtopic?: string;
}

// ============================================
// WORKER OUTCOMES
// ============================================

export type WorkerStatus = "completed" | "timeout" | "malformed" | "failed";

export interface WorkerOutcome {
  subtopic: Subtopic;
  status: WorkerStatus;

  /**
   * Raw findings document; an empty document when the worker failed
   */
  document: unknown;

  /**
   * Gaps recorded by the dispatcher for this worker
   */
  gaps: Gap[];

  durationMs: number;
  error?: string;
}

// ============================================
// AGGREGATION
// ============================================

export interface AggregationStats {
  documentsIngested: number;
  documentsRejected: number;
  rawClaimsCount: number;
  dedupedClaimsCount: number;
  rawSourcesCount: number;
  dedupedSourcesCount: number;
}

/**
 * Read-only view of the merged evidence handed to later stages
 */
export interface AggregateRegistry {
  /**
   * Claims in aggregation order
   */
  readonly claims: readonly Claim[];

  /**
   * Sources in first-seen order, keyed by URL
   */
  readonly sources: ReadonlyMap<string, Source>;

  readonly gaps: readonly Gap[];
  readonly stats: AggregationStats;

  /**
   * True when no worker contributed a single claim
   */
  readonly degraded: boolean;
}

// ============================================
// THEMES
// ============================================

export interface Theme {
  id: string;
  title: string;
  keywords: string[];

  /**
   * Member claim ids, in aggregation order
   */
  claimIds: string[];
}

// ============================================
// REPORT
// ============================================

export interface ExecutiveSummary {
  text: string;
  totalSources: number;
  totalClaims: number;
  themeCount: number;
}

export interface ReportClaim {
  claimId: string;
  text: string;
  evidence: string;
  confidence: ConfidenceLevel;
  marker: string;

  /**
   * Citation numbers into the tiered source list
   */
  citations: number[];
}

export interface KeyFinding extends ReportClaim {
  rank: number;
}

export interface ThemeSection {
  themeId: string;
  title: string;
  claims: ReportClaim[];
}

export interface ReportSource {
  citation: number;
  url: string;
  title: string;
  credibility: number;
  domain: string;
  relevanceNotes: string[];
  relatedUrls: string[];
}

export interface TieredSources {
  /** Credibility 5-4 */
  tier1: ReportSource[];
  /** Credibility 3 */
  tier2: ReportSource[];
  /** Credibility 2-1 */
  tier3: ReportSource[];
}

export interface ConfidenceStatistics {
  counts: Record<ConfidenceLevel, number>;
  percentages: Record<ConfidenceLevel, number>;
  averageCredibility: number;
  uniqueSources: number;
}

export interface ResearchReport {
  query: string;
  depth: ResearchDepth;
  generatedAt: string;
  degraded: boolean;
  executiveSummary: ExecutiveSummary;
  keyFindings: KeyFinding[];
  detailedAnalysis: ThemeSection[];
  sources: TieredSources;
  confidenceStatistics: ConfidenceStatistics;
  researchGaps: Gap[];
}
