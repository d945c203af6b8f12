/**
 * Test builders for subtopics, findings documents and sources
 */

import type { FindingsDocument, FindingsSource } from "../src/systems/research/agents/researcher/schema.js";
import type {
  AggregateRegistry,
  Claim,
  ConfidenceLevel,
  Gap,
  ResearchAngle,
  Source,
  Subtopic,
} from "../src/systems/research/types.js";

export function makeSubtopic(
  index: number,
  title = `Subtopic ${index}`,
  angle: ResearchAngle = "background"
): Subtopic {
  return {
    id: `st-${index}`,
    title,
    keywords: [`keyword ${index}a`, `keyword ${index}b`, `keyword ${index}c`],
    angle,
    rationale: "test",
  };
}

export function makeFindingsSource(
  url: string,
  credibility: number,
  extra: Partial<FindingsSource> = {}
): FindingsSource {
  return {
    url,
    title: extra.title ?? `Title for ${url}`,
    credibility,
    relevance: extra.relevance ?? "",
    author: extra.author,
    organization: extra.organization,
    republished_from: extra.republished_from,
  };
}

export function makeSource(
  url: string,
  domain: string,
  credibility: number,
  extra: Partial<Source> = {}
): Source {
  return {
    url,
    title: `Title for ${url}`,
    credibility,
    relevanceNotes: [],
    domain,
    relatedUrls: [],
    ...extra,
  };
}

export interface ClaimInput {
  claim: string;
  evidence?: string;
  sources: FindingsSource[];
}

export function makeDocument(
  subtopic: string,
  claims: ClaimInput[],
  gaps: string[] = []
): FindingsDocument {
  return {
    subtopic,
    claims: claims.map((c) => ({
      claim: c.claim,
      evidence: c.evidence ?? "",
      sources: c.sources,
    })),
    gaps,
    search_queries_used: [],
  };
}

export const AGGREGATION = {
  claimMergeThreshold: 0.8,
  relatedClaimThreshold: 0.4,
  relatedTitleThreshold: 0.5,
};

export function makeClaim(
  id: string,
  text: string,
  confidence: ConfidenceLevel,
  citations: string[] = []
): Claim {
  return {
    id,
    text,
    evidence: `Evidence for ${id}`,
    citations,
    subtopicIds: ["st-1"],
    relatedClaimIds: [],
    confidence,
  };
}

export function makeRegistry(
  claims: Claim[],
  sources: Source[] = [],
  gaps: Gap[] = []
): AggregateRegistry {
  return {
    claims,
    sources: new Map(sources.map((s) => [s.url, s])),
    gaps,
    stats: {
      documentsIngested: 1,
      documentsRejected: 0,
      rawClaimsCount: claims.length,
      dedupedClaimsCount: claims.length,
      rawSourcesCount: sources.length,
      dedupedSourcesCount: sources.length,
    },
    degraded: claims.length === 0,
  };
}
