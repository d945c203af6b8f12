/**
 * Decomposer Output Schema
 */

import { z } from "zod";

const AngleSchema = z.enum([
  "current-state",
  "limitations",
  "applications",
  "background",
  "future-outlook",
  "mechanisms",
  "alternatives",
  "stakeholders",
  "economics",
  "governance",
]);

export const DecompositionSchema = z.object({
  subtopics: z.array(
    z.object({
      title: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(3).max(5),
      angle: AngleSchema,
      rationale: z.string().default(""),
    })
  ),
});

export type Decomposition = z.infer<typeof DecompositionSchema>;
