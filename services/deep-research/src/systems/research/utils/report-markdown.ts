/**
 * Markdown rendering of a composed report
 * Pure over the report: rendering twice gives the same text, and citation
 * numbers are taken from the report as composed.
 */

import type { ReportClaim, ReportSource, ResearchReport } from "../types.js";

function citationMarks(citations: readonly number[]): string {
  return citations.map((n) => `[${n}]`).join("");
}

function claimLine(claim: ReportClaim): string {
  const marks = citationMarks(claim.citations);
  return marks ? `${claim.marker} ${claim.text} ${marks}` : `${claim.marker} ${claim.text}`;
}

function sourceLine(source: ReportSource): string {
  let line = `[${source.citation}] [${source.title}](${source.url}) (${source.domain}, credibility ${source.credibility}/5)`;
  if (source.relatedUrls.length > 0) {
    line += `; related: ${source.relatedUrls.join(", ")}`;
  }
  return line;
}

const TIER_HEADINGS = [
  ["tier1", "Tier 1: authoritative (credibility 4-5)"],
  ["tier2", "Tier 2: reputable (credibility 3)"],
  ["tier3", "Tier 3: supporting (credibility 1-2)"],
] as const;

export function renderReportMarkdown(report: ResearchReport): string {
  const lines: string[] = [];

  lines.push(`# Research Report: ${report.query}`);
  lines.push("");
  lines.push(`**Depth:** ${report.depth}  `);
  lines.push(`**Generated:** ${report.generatedAt}`);
  lines.push("");

  if (report.degraded) {
    lines.push("> **Degraded report:** no findings could be gathered for this query.");
    lines.push("");
  }

  lines.push("## Executive Summary");
  lines.push("");
  lines.push(report.executiveSummary.text);
  lines.push("");

  lines.push("## Key Findings");
  lines.push("");
  if (report.keyFindings.length === 0) {
    lines.push("_No findings._");
  }
  for (const finding of report.keyFindings) {
    lines.push(`${finding.rank}. ${claimLine(finding)}`);
  }
  lines.push("");

  lines.push("## Detailed Analysis");
  lines.push("");
  if (report.detailedAnalysis.length === 0) {
    lines.push("_No themes._");
    lines.push("");
  }
  for (const section of report.detailedAnalysis) {
    lines.push(`### ${section.title}`);
    lines.push("");
    for (const claim of section.claims) {
      lines.push(`- ${claimLine(claim)}`);
      if (claim.evidence) {
        lines.push(`  - Evidence: ${claim.evidence}`);
      }
    }
    lines.push("");
  }

  lines.push("## Sources");
  lines.push("");
  for (const [tier, heading] of TIER_HEADINGS) {
    const sources = report.sources[tier];
    if (sources.length === 0) continue;

    lines.push(`### ${heading}`);
    lines.push("");
    for (const source of sources) {
      lines.push(sourceLine(source));
    }
    lines.push("");
  }

  const stats = report.confidenceStatistics;
  lines.push("## Confidence Statistics");
  lines.push("");
  lines.push("| Confidence | Claims | Share |");
  lines.push("| --- | --- | --- |");
  for (const level of ["high", "medium", "low"] as const) {
    lines.push(`| ${level} | ${stats.counts[level]} | ${stats.percentages[level]}% |`);
  }
  lines.push("");
  lines.push(`- Unique sources: ${stats.uniqueSources}`);
  lines.push(`- Average source credibility: ${stats.averageCredibility}`);
  lines.push("");

  lines.push("## Research Gaps");
  lines.push("");
  if (report.researchGaps.length === 0) {
    lines.push("_None recorded._");
  }
  for (const gap of report.researchGaps) {
    lines.push(`- (${gap.kind}) ${gap.message}`);
  }

  return lines.join("\n") + "\n";
}
