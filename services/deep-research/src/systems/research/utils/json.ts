/**
 * Pull a JSON object out of free-form agent output
 */

import { ValidationError } from "@deepresearch/core";

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Parse the first JSON object in the text: a fenced ```json block when
 * present, otherwise the span from the first "{" to the last "}"
 */
export function extractJsonObject(text: string): unknown {
  const fenced = FENCED_BLOCK.exec(text);
  const candidate = fenced ? fenced[1] : sliceObject(text);

  if (candidate === null) {
    throw new ValidationError("Agent output contains no JSON object", {
      context: { preview: text.slice(0, 200) },
    });
  }

  try {
    return JSON.parse(candidate);
  } catch (error) {
    throw new ValidationError("Agent output contains invalid JSON", {
      issues: [error instanceof Error ? error.message : String(error)],
      context: { preview: candidate.slice(0, 200) },
    });
  }
}

function sliceObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}
