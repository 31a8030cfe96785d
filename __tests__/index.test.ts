/**
 * End-to-end tests for EpisodicMemory against an in-process Qdrant
 */

import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { EpisodicMemory } from "../index.js";
import { resolveConfig } from "../config.js";
import { NEUTRAL_DIRECTIVE } from "../context.js";
import { EmbeddingError } from "../errors.js";
import { parseReflection, type ReflectionResult } from "../reflection.js";
import type { ChatMessage } from "../types.js";
import { FakeEmbedder, FakeQdrant } from "./helpers/fake-qdrant.js";

function reflection(tags: string[], summary: string): ReflectionResult {
  return parseReflection(
    JSON.stringify({
      context_tags: tags,
      conversation_summary: summary,
      what_worked: `worked for ${summary}`,
      what_to_avoid: `avoid for ${summary}`,
    }),
  );
}

function conversation(question: string): ChatMessage[] {
  return [
    { role: "system", content: "You are a research assistant." },
    { role: "user", content: question },
    { role: "assistant", content: "Here is an explanation." },
  ];
}

describe("EpisodicMemory", () => {
  let fake: FakeQdrant;
  let embedder: FakeEmbedder;
  const reflect = vi.fn<(conversation: string) => Promise<ReflectionResult>>();
  const logger = { info: vi.fn(), warn: vi.fn(), debug: vi.fn() };
  let memory: EpisodicMemory;

  beforeEach(() => {
    fake = new FakeQdrant();
    vi.stubGlobal("fetch", fake.fetch);
    embedder = new FakeEmbedder(3, {
      s1: [1, 0, 0],
      s2: [0, 1, 0],
      s3: [0, 0, 1],
    });
    reflect.mockReset();
    logger.warn.mockReset();
    memory = new EpisodicMemory(
      resolveConfig({ reflection: { apiKey: "test-secret" }, qdrant: { vectorSize: 3 } }, {}),
      { reflector: { reflect }, embedder, logger },
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("stores a reflected episode in the user's collection", async () => {
    reflect.mockResolvedValueOnce(reflection(["x"], "s1"));

    const { episode, reflection: outcome } = await memory.addEpisode(
      conversation("What is dropout?"),
      "u1",
    );

    expect(outcome.ok).toBe(true);
    expect(reflect).toHaveBeenCalledWith("USER: What is dropout?\nASSISTANT: Here is an explanation.");
    expect(episode).toMatchObject({
      conversation: "USER: What is dropout?\nASSISTANT: Here is an explanation.",
      contextTags: ["x"],
      conversationSummary: "s1",
      embedding: [1, 0, 0],
    });
    expect([...fake.collections.keys()]).toEqual(["memory_orb_u1"]);
    expect(fake.collections.get("memory_orb_u1")?.points.has(episode.id)).toBe(true);
  });

  test("uses the default user when none is given", async () => {
    reflect.mockResolvedValueOnce(reflection(["x"], "s1"));

    await memory.addEpisode(conversation("hello"));

    expect([...fake.collections.keys()]).toEqual(["memory_orb_default_user"]);
  });

  test("ranks the episode matching the query first", async () => {
    reflect.mockResolvedValueOnce(reflection(["x"], "s1")).mockResolvedValueOnce(reflection(["y"], "s2"));
    const a = await memory.addEpisode(conversation("topic one"), "u1");
    const b = await memory.addEpisode(conversation("topic two"), "u1");

    const results = await memory.recall("s1", "u1");

    expect(results.map((r) => r.id)).toEqual([a.episode.id, b.episode.id]);
    expect(results[0].score).toBeCloseTo(0.5);
    expect(results[1].score).toBeCloseTo(0);
  });

  test("keyword matches drive ranking when alpha is 0", async () => {
    reflect
      .mockResolvedValueOnce(reflection(["x"], "s1"))
      .mockResolvedValueOnce(reflection(["y"], "s2"));
    await memory.addEpisode(conversation("explain batch norm"), "u1");
    const dropout = await memory.addEpisode(conversation("explain dropout"), "u1");

    const results = await memory.recall("dropout", "u1", 0);

    expect(results[0].id).toBe(dropout.episode.id);
    expect(results[0].score).toBe(1);
  });

  test("skips the keyword scan for a blank query", async () => {
    reflect.mockResolvedValueOnce(reflection(["x"], "s1"));
    await memory.addEpisode(conversation("topic one"), "u1");

    await memory.recall("   ", "u1");

    expect(fake.requests.some((r) => r.path.endsWith("/points/scroll"))).toBe(false);
  });

  test("never returns another user's episodes", async () => {
    reflect.mockResolvedValueOnce(reflection(["x"], "s1"));
    await memory.addEpisode(conversation("private topic"), "u1");

    expect(await memory.recall("s1", "u2")).toEqual([]);
    expect(await memory.composeDirective("private topic", "u2")).toBe(NEUTRAL_DIRECTIVE);
    expect(fake.collections.has("memory_orb_u2")).toBe(false);
  });

  test("composes a directive from recalled episodes", async () => {
    reflect
      .mockResolvedValueOnce(reflection(["x", "z"], "s1"))
      .mockResolvedValueOnce(reflection(["y"], "s2"));
    await memory.addEpisode(conversation("topic one"), "u1");
    await memory.addEpisode(conversation("topic two"), "u1");

    const directive = await memory.composeDirective("s1", "u1");

    expect(directive).toBe(
      [
        "You are a helpful AI Assistant with conversation memory:",
        "",
        "Current Context Tags: x, z",
        "Key Insight: worked for s1",
        "Avoid: avoid for s1",
        "Recent History: s2",
      ].join("\n"),
    );
  });

  test("stores a degraded episode when reflection output is unparseable", async () => {
    reflect.mockResolvedValueOnce(parseReflection("Sorry, I cannot help with that."));

    const { episode, reflection: outcome } = await memory.addEpisode(conversation("hello"), "u1");

    expect(outcome.ok).toBe(false);
    expect(episode).toMatchObject({
      contextTags: ["N/A"],
      conversationSummary: "N/A",
      whatWorked: "N/A",
      whatToAvoid: "N/A",
    });
    expect(embedder.calls).toEqual(["N/A"]);
    expect(logger.warn).toHaveBeenCalledWith(
      "episodic-memory: reflection degraded for u1: no JSON object found in reflection output",
    );
  });

  test("propagates embedding failures without writing", async () => {
    reflect.mockResolvedValueOnce(reflection(["x"], "s1"));
    const failing = new EpisodicMemory(
      resolveConfig({ reflection: { apiKey: "test-secret" }, qdrant: { vectorSize: 3 } }, {}),
      {
        reflector: { reflect },
        embedder: { model: "down", embed: () => Promise.reject(new EmbeddingError("unreachable")) },
        logger,
      },
    );

    await expect(failing.addEpisode(conversation("hello"), "u1")).rejects.toBeInstanceOf(EmbeddingError);
    expect(fake.collections.get("memory_orb_u1")?.points.size).toBe(0);
  });
});
