/**
 * Reflection: summarize a transcript into a structured episode draft.
 * One chat completion per conversation; the response is parsed leniently.
 */

import OpenAI from "openai";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { SummarizationError } from "./errors.js";
import { NOT_APPLICABLE, type ChatMessage, type EpisodeDraft } from "./types.js";

export const REFLECTION_PROMPT = `You are analyzing conversations to create memories that will help guide future interactions. Your task is to extract the elements that would be most useful when a similar conversation comes up again.

Review the conversation and create a memory reflection following these rules:

1. For any field where you don't have enough information or the field isn't relevant, use "N/A"
2. Be extremely concise - each string should be one clear, actionable sentence
3. Focus only on information that would be useful for handling similar future conversations
4. context_tags should be specific enough to match similar situations but general enough to be reusable

Output valid JSON in exactly this format:
{
  "context_tags": [string, ...],    // 2-4 keywords identifying similar future conversations
  "conversation_summary": string,   // One sentence describing what the conversation accomplished
  "what_worked": string,            // Most effective approach or strategy used
  "what_to_avoid": string           // Most important pitfall or ineffective approach to avoid
}

Examples:
- Good context_tags: ["transformer_architecture", "attention_mechanism", "methodology_comparison"]
- Bad context_tags: ["machine_learning", "paper_discussion", "questions"]

- Good conversation_summary: "Explained how attention in an encoder-only model differs from the original transformer design"
- Bad conversation_summary: "Discussed a machine learning paper"

- Good what_worked: "Using a small worked matrix example to explain how attention scores are computed"
- Bad what_worked: "Explained the technical concepts well"

- Good what_to_avoid: "Jumping into formulas before checking the user's familiarity with linear algebra"
- Bad what_to_avoid: "Used complicated language"

Do not include any text outside the JSON object in your response.

Here is the prior conversation:

{conversation}`;

/**
 * Render a transcript for reflection. A leading system turn is setup and is
 * left out; every later turn, system ones included, is kept.
 */
export function formatConversation(messages: ChatMessage[]): string {
  const turns = messages[0]?.role === "system" ? messages.slice(1) : messages;
  return turns.map((m) => `${m.role.toUpperCase()}: ${m.content}`).join("\n");
}

// ============================================================================
// Parsing
// ============================================================================

const ReflectionObject = Type.Record(Type.String(), Type.Unknown());

export type ReflectionResult =
  | { ok: true; draft: EpisodeDraft }
  | { ok: false; error: string; raw: string; draft: EpisodeDraft };

export function emptyDraft(): EpisodeDraft {
  return {
    contextTags: [NOT_APPLICABLE],
    conversationSummary: NOT_APPLICABLE,
    whatWorked: NOT_APPLICABLE,
    whatToAvoid: NOT_APPLICABLE,
  };
}

function orSentinel(value: unknown): string {
  const trimmed = typeof value === "string" ? value.trim() : "";
  return trimmed ? trimmed : NOT_APPLICABLE;
}

function tagsOf(value: unknown): string[] {
  const tags = Array.isArray(value)
    ? value
        .filter((t): t is string => typeof t === "string")
        .map((t) => t.trim())
        .filter((t) => t.length > 0)
    : [];
  return tags.length > 0 ? tags : [NOT_APPLICABLE];
}

function failed(error: string, raw: string): ReflectionResult {
  return { ok: false, error, raw, draft: emptyDraft() };
}

/**
 * Parse the summarizer's response. The JSON object is taken to span from the
 * first `{` to the last `}`, so prose or code fences around it are ignored.
 * Only a missing object or invalid JSON is a failure. Never throws.
 */
export function parseReflection(raw: string): ReflectionResult {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start === -1 || end < start) {
    return failed("no JSON object found in reflection output", raw);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.slice(start, end + 1));
  } catch (err) {
    return failed(`reflection output is not valid JSON: ${String(err)}`, raw);
  }

  if (!Value.Check(ReflectionObject, parsed)) {
    return failed("reflection output is not a JSON object", raw);
  }

  // Fields are judged one by one: a mistyped field falls back to the sentinel
  // without discarding the others.
  return {
    ok: true,
    draft: {
      contextTags: tagsOf(parsed.context_tags),
      conversationSummary: orSentinel(parsed.conversation_summary),
      whatWorked: orSentinel(parsed.what_worked),
      whatToAvoid: orSentinel(parsed.what_to_avoid),
    },
  };
}

// ============================================================================
// Reflector
// ============================================================================

export interface ReflectorOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
}

export class Reflector {
  private client: OpenAI;
  private model: string;
  private temperature: number;
  private maxTokens: number;

  constructor(options: ReflectorOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
    this.model = options.model ?? "gpt-4o-mini";
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 2000;
  }

  /**
   * Summarize a formatted transcript. Throws only when the completion call
   * itself fails; malformed output comes back as `{ ok: false }`.
   */
  async reflect(conversation: string): Promise<ReflectionResult> {
    const prompt = REFLECTION_PROMPT.replace("{conversation}", () => conversation);

    let raw: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        messages: [{ role: "user", content: prompt }],
      });
      raw = response.choices[0]?.message?.content ?? "";
    } catch (err) {
      throw new SummarizationError(`reflection request failed: ${String(err)}`, err);
    }

    return parseReflection(raw);
  }
}
