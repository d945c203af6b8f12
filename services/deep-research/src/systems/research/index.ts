/**
 * Research System Exports
 */

export {
  ResearchSystem,
  createResearchSystem,
  type ResearchSystemOptions,
  type ResearchDependencies,
  type ResearchRunResult,
  type WorkerSummary,
} from "./system.js";
export {
  loadResearchConfig,
  getDepthProfile,
  DEFAULT_RESEARCH_CONFIG,
  ResearchConfigSchema,
  type ResearchConfig,
  type ResearchConfigOverrides,
  type DepthProfile,
} from "./config.js";
export {
  InsufficientScopeError,
  WorkerTimeoutError,
  WorkerMalformedOutputError,
  WorkerFetchError,
} from "./errors.js";
export * from "./types.js";
export * from "./agents/decomposer/index.js";
export * from "./agents/researcher/index.js";
export * from "./harness/index.js";
export * from "./utils/index.js";
