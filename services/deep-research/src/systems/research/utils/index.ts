/**
 * Research System Utilities
 */

export {
  EvidenceAggregator,
  aggregateEvidence,
  type AggregationOptions,
} from "./evidence-aggregator.js";
export { SourceRegistry } from "./source-registry.js";
export { ClaimMerger, type ClaimCluster, type IncomingClaim } from "./claim-merger.js";
export { scoreConfidence, areIndependent, isRepublication, CONFIDENCE_RANK } from "./confidence.js";
export { organizeThemes, themeStrength, type ThemeOptions } from "./theme-organizer.js";
export {
  composeReport,
  buildTieredSources,
  computeStatistics,
  tierOf,
  CONFIDENCE_MARKERS,
  type ComposeInput,
} from "./report-composer.js";
export { renderReportMarkdown } from "./report-markdown.js";
export {
  tokenize,
  termSet,
  jaccard,
  overlapCoefficient,
  textSimilarity,
  termSimilarity,
  focusTerms,
  normalizeText,
  registrableDomain,
  uniqueStrings,
} from "./text.js";
export { extractJsonObject } from "./json.js";
