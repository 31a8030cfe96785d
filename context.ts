/**
 * Turn ranked episodes into a system directive for the next conversation.
 */

import type { RankedResult } from "./types.js";

export const NEUTRAL_DIRECTIVE = "You are a helpful AI Assistant.";

/** Summaries after the top result that make it into "Recent History". */
const HISTORY_SIZE = 3;

export function composeDirective(results: RankedResult[]): string {
  const [current, ...rest] = results;
  if (!current) return NEUTRAL_DIRECTIVE;

  const history = rest.slice(0, HISTORY_SIZE).map((r) => r.episode.conversationSummary);

  return [
    "You are a helpful AI Assistant with conversation memory:",
    "",
    `Current Context Tags: ${current.episode.contextTags.join(", ")}`,
    `Key Insight: ${current.episode.whatWorked}`,
    `Avoid: ${current.episode.whatToAvoid}`,
    `Recent History: ${history.join(" | ")}`,
  ].join("\n");
}
