/**
 * Research Configuration
 * Depth profiles and aggregation thresholds, validated with zod.
 * Every value has a default and can be overridden by the caller or
 * through RESEARCH_* environment variables.
 */

import { z } from "zod";
import { ConfigError } from "@deepresearch/core";
import type { ResearchDepth } from "./types.js";

const MINUTE_MS = 60_000;

// Schema for environment overrides
const envSchema = z.object({
  RESEARCH_CLAIM_MERGE_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  RESEARCH_RELATED_CLAIM_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  RESEARCH_RELATED_TITLE_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  RESEARCH_THEME_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  RESEARCH_WORKER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  RESEARCH_MAX_KEY_FINDINGS: z.coerce.number().int().positive().optional(),
});

const DepthProfileSchema = z.object({
  subtopicCount: z.number().int().positive(),
  workerTimeoutMs: z.number().int().positive(),
});

export const ResearchConfigSchema = z.object({
  depths: z.object({
    quick: DepthProfileSchema,
    medium: DepthProfileSchema,
    deep: DepthProfileSchema,
  }),

  /** Budget used when a caller dispatches without a depth profile */
  defaultWorkerTimeoutMs: z.number().int().positive(),

  /** Upper bound on keywords any two subtopics may share */
  maxKeywordOverlap: z.number().int().min(0),

  /** Claims merge when similarity is strictly above this */
  claimMergeThreshold: z.number().min(0).max(1),

  /** Unmerged claims at or above this are cross-referenced */
  relatedClaimThreshold: z.number().min(0).max(1),

  /** Same-domain sources at or above this title similarity are cross-referenced */
  relatedTitleThreshold: z.number().min(0).max(1),

  /** Minimum overlap coefficient for a claim to join a theme */
  themeThreshold: z.number().min(0).max(1),

  maxKeyFindings: z.number().int().positive(),
});

export type DepthProfile = z.infer<typeof DepthProfileSchema>;
export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;

export const DEFAULT_RESEARCH_CONFIG: ResearchConfig = {
  depths: {
    quick: { subtopicCount: 3, workerTimeoutMs: 3 * MINUTE_MS },
    medium: { subtopicCount: 5, workerTimeoutMs: 5 * MINUTE_MS },
    deep: { subtopicCount: 10, workerTimeoutMs: 10 * MINUTE_MS },
  },
  defaultWorkerTimeoutMs: 5 * MINUTE_MS,
  maxKeywordOverlap: 1,
  claimMergeThreshold: 0.8,
  relatedClaimThreshold: 0.4,
  relatedTitleThreshold: 0.5,
  themeThreshold: 0.3,
  maxKeyFindings: 10,
};

/**
 * Partial override accepted by loadResearchConfig
 */
export type ResearchConfigOverrides = Partial<Omit<ResearchConfig, "depths">> & {
  depths?: Partial<Record<ResearchDepth, Partial<DepthProfile>>>;
};

/**
 * Build a validated research config from defaults, environment and overrides
 * (later sources win)
 */
export function loadResearchConfig(
  overrides: ResearchConfigOverrides = {},
  source: NodeJS.ProcessEnv = process.env
): ResearchConfig {
  const envResult = envSchema.safeParse(source);

  if (!envResult.success) {
    const errors = envResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Research configuration validation failed:\n${errors}`);
  }

  const env = envResult.data;
  const defaults = DEFAULT_RESEARCH_CONFIG;

  // RESEARCH_WORKER_TIMEOUT_MS replaces every depth's budget
  const depthProfile = (depth: ResearchDepth): DepthProfile => {
    const base = defaults.depths[depth];
    const override = overrides.depths?.[depth];
    return {
      subtopicCount: override?.subtopicCount ?? base.subtopicCount,
      workerTimeoutMs: override?.workerTimeoutMs ?? env.RESEARCH_WORKER_TIMEOUT_MS ?? base.workerTimeoutMs,
    };
  };

  const merged = {
    depths: {
      quick: depthProfile("quick"),
      medium: depthProfile("medium"),
      deep: depthProfile("deep"),
    },
    defaultWorkerTimeoutMs:
      overrides.defaultWorkerTimeoutMs ?? env.RESEARCH_WORKER_TIMEOUT_MS ?? defaults.defaultWorkerTimeoutMs,
    maxKeywordOverlap: overrides.maxKeywordOverlap ?? defaults.maxKeywordOverlap,
    claimMergeThreshold:
      overrides.claimMergeThreshold ?? env.RESEARCH_CLAIM_MERGE_THRESHOLD ?? defaults.claimMergeThreshold,
    relatedClaimThreshold:
      overrides.relatedClaimThreshold ?? env.RESEARCH_RELATED_CLAIM_THRESHOLD ?? defaults.relatedClaimThreshold,
    relatedTitleThreshold:
      overrides.relatedTitleThreshold ?? env.RESEARCH_RELATED_TITLE_THRESHOLD ?? defaults.relatedTitleThreshold,
    themeThreshold: overrides.themeThreshold ?? env.RESEARCH_THEME_THRESHOLD ?? defaults.themeThreshold,
    maxKeyFindings: overrides.maxKeyFindings ?? env.RESEARCH_MAX_KEY_FINDINGS ?? defaults.maxKeyFindings,
  };

  const result = ResearchConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Research configuration validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * Depth profile lookup
 */
export function getDepthProfile(config: ResearchConfig, depth: ResearchDepth): DepthProfile {
  return config.depths[depth];
}
