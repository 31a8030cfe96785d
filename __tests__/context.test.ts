import { describe, test, expect } from "vitest";
import { composeDirective, NEUTRAL_DIRECTIVE } from "../context.js";
import type { EpisodeRecord, RankedResult } from "../types.js";

function ranked(id: string, overrides: Partial<EpisodeRecord> = {}): RankedResult {
  return {
    id,
    score: 0.5,
    episode: {
      id,
      conversation: "USER: hi",
      contextTags: ["tag"],
      conversationSummary: `Summary ${id}`,
      whatWorked: "N/A",
      whatToAvoid: "N/A",
      ...overrides,
    },
  };
}

describe("composeDirective", () => {
  test("falls back to a neutral directive without memories", () => {
    expect(composeDirective([])).toBe(NEUTRAL_DIRECTIVE);
    expect(NEUTRAL_DIRECTIVE).toBe("You are a helpful AI Assistant.");
  });

  test("uses the top result as current context and the rest as history", () => {
    const directive = composeDirective([
      ranked("a", {
        contextTags: ["experimental_design", "control_groups"],
        whatWorked: "Drawing the study layout as a table.",
        whatToAvoid: "Assuming statistics background.",
      }),
      ranked("b", { conversationSummary: "Reviewed a confounder list." }),
      ranked("c", { conversationSummary: "Clarified p-value meaning." }),
    ]);

    expect(directive).toBe(
      [
        "You are a helpful AI Assistant with conversation memory:",
        "",
        "Current Context Tags: experimental_design, control_groups",
        "Key Insight: Drawing the study layout as a table.",
        "Avoid: Assuming statistics background.",
        "Recent History: Reviewed a confounder list. | Clarified p-value meaning.",
      ].join("\n"),
    );
  });

  test("leaves history empty for a single result", () => {
    const directive = composeDirective([ranked("a")]);

    expect(directive.split("\n").at(-1)).toBe("Recent History: ");
  });

  test("includes at most three history summaries", () => {
    const directive = composeDirective(["a", "b", "c", "d", "e"].map((id) => ranked(id)));

    expect(directive.split("\n").at(-1)).toBe("Recent History: Summary b | Summary c | Summary d");
  });
});
