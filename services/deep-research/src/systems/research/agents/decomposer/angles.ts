/**
 * Research angle catalogue
 *
 * Ordered: the first three are the angles every decomposition must cover,
 * so any prefix of length >= 3 satisfies the coverage rule. Angle terms are
 * disjoint across entries.
 */

import type { ResearchAngle } from "../../types.js";

export interface AngleDefinition {
  angle: ResearchAngle;
  label: string;
  terms: string[];
  rationale: string;
}

export const REQUIRED_ANGLES: readonly ResearchAngle[] = [
  "current-state",
  "limitations",
  "applications",
];

export const ANGLE_CATALOGUE: readonly AngleDefinition[] = [
  {
    angle: "current-state",
    label: "Current state",
    terms: ["current state", "latest developments", "adoption trends"],
    rationale: "Establishes where the subject stands today.",
  },
  {
    angle: "limitations",
    label: "Limitations and challenges",
    terms: ["limitations", "challenges", "failure modes"],
    rationale: "Surfaces known weaknesses, risks and open problems.",
  },
  {
    angle: "applications",
    label: "Practical applications",
    terms: ["practical applications", "use cases", "deployments"],
    rationale: "Shows where the subject is used in practice and with what results.",
  },
  {
    angle: "background",
    label: "Background and history",
    terms: ["history", "origins", "evolution"],
    rationale: "Explains how the subject reached its current form.",
  },
  {
    angle: "future-outlook",
    label: "Future outlook",
    terms: ["future outlook", "emerging research", "roadmap"],
    rationale: "Captures expected developments and active research directions.",
  },
  {
    angle: "mechanisms",
    label: "How it works",
    terms: ["technical design", "architecture", "mechanism"],
    rationale: "Covers the underlying technical or causal mechanisms.",
  },
  {
    angle: "alternatives",
    label: "Alternatives and comparisons",
    terms: ["alternatives", "comparison", "trade-offs"],
    rationale: "Positions the subject against competing approaches.",
  },
  {
    angle: "stakeholders",
    label: "Key players",
    terms: ["key players", "vendors", "community"],
    rationale: "Identifies the organizations and people driving the subject.",
  },
  {
    angle: "economics",
    label: "Costs and economics",
    terms: ["cost", "market size", "pricing"],
    rationale: "Quantifies cost, investment and market dynamics.",
  },
  {
    angle: "governance",
    label: "Regulation and standards",
    terms: ["regulation", "standards", "ethics"],
    rationale: "Covers the regulatory, standards and ethical landscape.",
  },
];
