/**
 * Researcher Output Schema
 * The findings document every research worker returns, validated with zod
 * before any of its claims reach the aggregator
 */

import { z } from "zod";

// ============================================
// SUB-SCHEMAS
// ============================================

const FindingsSourceSchema = z.object({
  url: z.string().trim().min(1),
  title: z.string(),
  credibility: z.number().int().min(1).max(5),
  relevance: z.string().default(""),
  author: z.string().optional(),
  organization: z.string().optional(),
  republished_from: z.string().optional(),
});

const FindingsClaimSchema = z.object({
  claim: z.string().min(1),
  evidence: z.string().default(""),
  sources: z.array(FindingsSourceSchema),
});

// ============================================
// MAIN SCHEMA
// ============================================

export const FindingsDocumentSchema = z.object({
  subtopic: z.string(),
  claims: z.array(FindingsClaimSchema),
  gaps: z.array(z.string()).default([]),
  search_queries_used: z.array(z.string()).default([]),
});

export type FindingsSource = z.infer<typeof FindingsSourceSchema>;
export type FindingsClaim = z.infer<typeof FindingsClaimSchema>;
export type FindingsDocument = z.infer<typeof FindingsDocumentSchema>;

/**
 * Worker contract input, in the field names workers are prompted with
 */
export interface WorkerInput {
  subtopic: string;
  keywords: string[];
  angle: string;
  covered_topics: string[];
}

export type FindingsValidation =
  | { success: true; document: FindingsDocument }
  | { success: false; issues: string[] };

/**
 * Validate a raw worker document
 */
export function validateFindingsDocument(raw: unknown): FindingsValidation {
  const result = FindingsDocumentSchema.safeParse(raw);

  if (result.success) {
    return { success: true, document: result.data };
  }

  return {
    success: false,
    issues: result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    ),
  };
}

/**
 * Empty document standing in for a worker that produced nothing usable
 */
export function createEmptyFindings(subtopic: string, gaps: string[] = []): FindingsDocument {
  return {
    subtopic,
    claims: [],
    gaps,
    search_queries_used: [],
  };
}
