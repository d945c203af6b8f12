/**
 * Report Composer
 * Renders the aggregate registry and themes into the final report.
 *
 * Citation numbers follow the tiered source list (tier, then credibility
 * descending, then first appearance) and are fixed once composed: the
 * returned report is deeply frozen.
 */

import type {
  AggregateRegistry,
  Claim,
  ConfidenceLevel,
  ConfidenceStatistics,
  ExecutiveSummary,
  KeyFinding,
  ReportClaim,
  ReportSource,
  ResearchQuery,
  ResearchReport,
  Source,
  Theme,
  ThemeSection,
  TieredSources,
} from "../types.js";
import { CONFIDENCE_RANK } from "./confidence.js";
import { deepFreeze } from "./freeze.js";

export interface ComposeInput {
  query: ResearchQuery;
  registry: AggregateRegistry;
  themes: readonly Theme[];
  maxKeyFindings: number;
  generatedAt?: string;
}

export const CONFIDENCE_MARKERS: Record<ConfidenceLevel, string> = {
  high: "[High confidence]",
  medium: "[Medium confidence]",
  low: "[Low confidence]",
};

// ============================================
// SOURCES
// ============================================

type Tier = keyof TieredSources;

export function tierOf(credibility: number): Tier {
  if (credibility >= 4) return "tier1";
  if (credibility === 3) return "tier2";
  return "tier3";
}

/**
 * Tiered source list with citation numbers assigned in list order
 */
export function buildTieredSources(
  sources: ReadonlyMap<string, Source>
): { tiers: TieredSources; citations: Map<string, number> } {
  const grouped: Record<Tier, { source: Source; order: number }[]> = {
    tier1: [],
    tier2: [],
    tier3: [],
  };

  let order = 0;
  for (const source of sources.values()) {
    grouped[tierOf(source.credibility)].push({ source, order: order++ });
  }

  const citations = new Map<string, number>();
  const tiers: TieredSources = { tier1: [], tier2: [], tier3: [] };
  let next = 1;

  for (const tier of ["tier1", "tier2", "tier3"] as const) {
    grouped[tier].sort(
      (a, b) => b.source.credibility - a.source.credibility || a.order - b.order
    );

    for (const { source } of grouped[tier]) {
      const citation = next++;
      citations.set(source.url, citation);
      tiers[tier].push(toReportSource(source, citation));
    }
  }

  return { tiers, citations };
}

function toReportSource(source: Source, citation: number): ReportSource {
  return {
    citation,
    url: source.url,
    title: source.title,
    credibility: source.credibility,
    domain: source.domain,
    relevanceNotes: [...source.relevanceNotes],
    relatedUrls: [...source.relatedUrls],
  };
}

// ============================================
// CLAIMS
// ============================================

function toReportClaim(claim: Claim, citations: ReadonlyMap<string, number>): ReportClaim {
  const numbers: number[] = [];
  for (const url of claim.citations) {
    const citation = citations.get(url);
    if (citation !== undefined) numbers.push(citation);
  }

  return {
    claimId: claim.id,
    text: claim.text,
    evidence: claim.evidence,
    confidence: claim.confidence,
    marker: CONFIDENCE_MARKERS[claim.confidence],
    citations: numbers.sort((a, b) => a - b),
  };
}

/**
 * Confidence, then number of citations, then aggregation order
 */
function rankKeyFindings(claims: ReportClaim[], limit: number): KeyFinding[] {
  return claims
    .map((claim, order) => ({ claim, order }))
    .sort(
      (a, b) =>
        CONFIDENCE_RANK[b.claim.confidence] - CONFIDENCE_RANK[a.claim.confidence] ||
        b.claim.citations.length - a.claim.citations.length ||
        a.order - b.order
    )
    .slice(0, limit)
    .map(({ claim }, index) => ({ rank: index + 1, ...claim }));
}

// ============================================
// STATISTICS & SUMMARY
// ============================================

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function computeStatistics(registry: AggregateRegistry): ConfidenceStatistics {
  const counts: Record<ConfidenceLevel, number> = { high: 0, medium: 0, low: 0 };
  for (const claim of registry.claims) {
    counts[claim.confidence]++;
  }

  const total = registry.claims.length;
  const percent = (count: number) => (total === 0 ? 0 : round((count / total) * 100, 1));

  const credibilities = Array.from(registry.sources.values(), (s) => s.credibility);
  const averageCredibility =
    credibilities.length === 0
      ? 0
      : round(credibilities.reduce((sum, c) => sum + c, 0) / credibilities.length, 2);

  return {
    counts,
    percentages: {
      high: percent(counts.high),
      medium: percent(counts.medium),
      low: percent(counts.low),
    },
    averageCredibility,
    uniqueSources: registry.sources.size,
  };
}

function summarize(
  input: ComposeInput,
  statistics: ConfidenceStatistics,
  sections: ThemeSection[]
): ExecutiveSummary {
  const { query, registry } = input;
  const totalClaims = registry.claims.length;
  const totalSources = registry.sources.size;
  const subject = `Research on "${query.text.trim()}" (${query.depth} depth)`;

  let text: string;
  if (registry.degraded) {
    text =
      `${subject} produced no findings: no research worker returned usable evidence. ` +
      `See Research Gaps for what failed.`;
  } else {
    const { high, medium, low } = statistics.counts;
    text =
      `${subject} produced ${totalClaims} findings from ${totalSources} unique sources, ` +
      `grouped into ${sections.length} themes. ` +
      `Confidence: ${high} high, ${medium} medium, ${low} low.`;

    if (sections.length > 0) {
      text += ` The strongest evidence concerns ${sections[0].title}.`;
    }
    if (registry.gaps.length > 0) {
      text += ` Research gaps recorded: ${registry.gaps.length}.`;
    }
  }

  return {
    text,
    totalSources,
    totalClaims,
    themeCount: sections.length,
  };
}

// ============================================
// COMPOSITION
// ============================================

export function composeReport(input: ComposeInput): ResearchReport {
  const { query, registry, themes } = input;

  const { tiers, citations } = buildTieredSources(registry.sources);

  const reportClaims = registry.claims.map((claim) => toReportClaim(claim, citations));
  const byId = new Map(reportClaims.map((c) => [c.claimId, c]));

  const detailedAnalysis: ThemeSection[] = themes.map((theme) => ({
    themeId: theme.id,
    title: theme.title,
    claims: theme.claimIds.flatMap((id) => {
      const claim = byId.get(id);
      return claim ? [{ ...claim, citations: [...claim.citations] }] : [];
    }),
  }));

  const confidenceStatistics = computeStatistics(registry);

  const report: ResearchReport = {
    query: query.text,
    depth: query.depth,
    generatedAt: input.generatedAt ?? new Date().toISOString(),
    degraded: registry.degraded,
    executiveSummary: summarize(input, confidenceStatistics, detailedAnalysis),
    keyFindings: rankKeyFindings(reportClaims, input.maxKeyFindings),
    detailedAnalysis,
    sources: tiers,
    confidenceStatistics,
    researchGaps: registry.gaps.map((gap) => ({ ...gap })),
  };

  return deepFreeze(report);
}
