/**
 * Researcher Exports
 */

export type { ResearchWorker, ResearchWorkerFactory } from "./types.js";
export { toWorkerInput } from "./types.js";
export {
  ResearcherAgent,
  createResearcherFactory,
  type ResearcherDependencies,
  type ResearcherOptions,
} from "./agent.js";
export {
  FindingsDocumentSchema,
  validateFindingsDocument,
  createEmptyFindings,
  type FindingsDocument,
  type FindingsClaim,
  type FindingsSource,
  type FindingsValidation,
  type WorkerInput,
} from "./schema.js";
