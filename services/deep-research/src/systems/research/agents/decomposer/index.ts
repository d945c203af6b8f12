/**
 * Decomposer Exports
 */

export type { Decomposer } from "./types.js";
export { TemplateDecomposer, extractFocus } from "./template.js";
export { DecomposerAgent, type DecomposerAgentDependencies } from "./agent.js";
export { validateSubtopics, keywordOverlap, type SubtopicValidationOptions } from "./validate.js";
export { ANGLE_CATALOGUE, REQUIRED_ANGLES, type AngleDefinition } from "./angles.js";
