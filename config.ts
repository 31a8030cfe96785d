/**
 * Configuration schema and resolution.
 *
 * Raw config is validated against a TypeBox schema after defaults are applied.
 * Explicit values win over environment variables, which win over defaults.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";

export const ConfigSchema = Type.Object({
  qdrant: Type.Object(
    {
      url: Type.String({ minLength: 1, default: "http://localhost:6333" }),
      /** Collection name = `${collectionPrefix}_${userId}` */
      collectionPrefix: Type.String({ minLength: 1, default: "memory_orb" }),
      apiKey: Type.Optional(Type.String()),
      /** Must match the embedding model's output dimension */
      vectorSize: Type.Integer({ minimum: 1, default: 1024 }),
      scorePolarity: Type.Union([Type.Literal("similarity"), Type.Literal("distance")], {
        default: "similarity",
      }),
      /** Keep a full-text index on `conversation` in every user collection */
      textIndex: Type.Boolean({ default: true }),
    },
    { default: {} },
  ),
  embedding: Type.Object(
    {
      provider: Type.Union([Type.Literal("ollama"), Type.Literal("openai")], { default: "ollama" }),
      model: Type.String({ minLength: 1, default: "mxbai-embed-large" }),
      baseUrl: Type.Optional(Type.String()),
      apiKey: Type.Optional(Type.String()),
    },
    { default: {} },
  ),
  reflection: Type.Object(
    {
      apiKey: Type.String({ minLength: 1 }),
      model: Type.String({ minLength: 1, default: "gpt-4o-mini" }),
      baseUrl: Type.Optional(Type.String()),
      temperature: Type.Number({ minimum: 0, maximum: 2, default: 0.2 }),
      maxTokens: Type.Integer({ minimum: 1, default: 2000 }),
    },
    { default: {} },
  ),
  recall: Type.Object(
    {
      /** Blend between similarity (1) and keyword rank (0) */
      alpha: Type.Number({ minimum: 0, maximum: 1, default: 0.5 }),
      /** Per-path candidate count fed into fusion */
      candidateLimit: Type.Integer({ minimum: 1, default: 5 }),
    },
    { default: {} },
  ),
  defaultUserId: Type.String({ minLength: 1, default: "default_user" }),
});

export type EpisodicMemoryConfig = Static<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fillFromEnv(
  config: Record<string, unknown>,
  section: string,
  key: string,
  envValue: string | undefined,
): void {
  if (!envValue) return;
  const existing = config[section];
  let target: Record<string, unknown>;
  if (existing === undefined) target = {};
  else if (isRecord(existing)) target = existing;
  else return; // left for the schema to reject
  if (target[key] === undefined) target[key] = envValue;
  config[section] = target;
}

export function resolveConfig(raw: unknown = {}, env: Env = process.env): EpisodicMemoryConfig {
  const value = Value.Clone(raw);
  if (!isRecord(value)) {
    throw new ConfigError("", "expected an object");
  }

  fillFromEnv(value, "qdrant", "url", env.QDRANT_URL);
  fillFromEnv(value, "qdrant", "apiKey", env.QDRANT_API_KEY);
  fillFromEnv(value, "reflection", "apiKey", env.OPENAI_API_KEY);
  fillFromEnv(value, "embedding", "apiKey", env.OPENAI_API_KEY);

  const resolved = Value.Default(ConfigSchema, value);
  if (Value.Check(ConfigSchema, resolved)) return resolved;

  const first = Value.Errors(ConfigSchema, resolved).First();
  throw new ConfigError(first?.path ?? "", first?.message ?? "invalid value");
}
