/**
 * Research Worker Types
 */

import type { ResearchAssignment } from "../../types.js";
import type { WorkerInput } from "./schema.js";

/**
 * One research worker handles one assignment. The returned document is
 * untrusted: the dispatcher validates it against the findings contract.
 *
 * Implementations should stop work when `signal` aborts.
 */
export interface ResearchWorker {
  research(assignment: ResearchAssignment, signal: AbortSignal): Promise<unknown>;
}

/**
 * Builds one worker per assignment; workers share no mutable state
 */
export type ResearchWorkerFactory = (assignment: ResearchAssignment) => ResearchWorker;

/**
 * Worker contract input for an assignment
 */
export function toWorkerInput(assignment: ResearchAssignment): WorkerInput {
  return {
    subtopic: assignment.subtopic.title,
    keywords: [...assignment.subtopic.keywords],
    angle: assignment.subtopic.angle,
    covered_topics: [...assignment.coveredTopics],
  };
}
