/**
 * Text embedding providers.
 */

import OpenAI from "openai";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { EpisodicMemoryConfig } from "./config.js";
import { ConfigError, EmbeddingError } from "./errors.js";

export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

const OllamaEmbeddingResponse = Type.Object({
  embedding: Type.Array(Type.Number()),
});

// ============================================================================
// Ollama (HTTP)
// ============================================================================

export class OllamaEmbedder implements Embedder {
  readonly model: string;
  private readonly baseUrl: string;

  constructor(model: string, baseUrl = "http://localhost:11434") {
    this.model = model;
    this.baseUrl = baseUrl.replace(/\/$/, "");
  }

  async embed(text: string): Promise<number[]> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/embeddings`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.model, prompt: text }),
      });
    } catch (err) {
      throw new EmbeddingError(`Embedding service unreachable at ${this.baseUrl}: ${String(err)}`, {
        cause: err,
      });
    }

    const body = await res.text();
    if (!res.ok) {
      throw new EmbeddingError(`Embedding request failed (${res.status}): ${body}`, {
        status: res.status,
        body,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (err) {
      throw new EmbeddingError(`Embedding response is not JSON: ${body}`, {
        status: res.status,
        body,
        cause: err,
      });
    }

    if (!Value.Check(OllamaEmbeddingResponse, data) || data.embedding.length === 0) {
      throw new EmbeddingError(`Embedding response has no vector: ${body}`, {
        status: res.status,
        body,
      });
    }

    return data.embedding;
  }
}

// ============================================================================
// OpenAI
// ============================================================================

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private client: OpenAI;

  constructor(apiKey: string, model: string, baseUrl?: string) {
    this.client = new OpenAI({ apiKey, baseURL: baseUrl });
    this.model = model;
  }

  async embed(text: string): Promise<number[]> {
    let vector: number[] | undefined;
    try {
      const res = await this.client.embeddings.create({
        model: this.model,
        input: [text],
      });
      vector = res.data[0]?.embedding;
    } catch (err) {
      throw new EmbeddingError(`Embedding request failed: ${String(err)}`, { cause: err });
    }

    if (!vector || vector.length === 0) {
      throw new EmbeddingError("Embedding response has no vector");
    }
    return vector;
  }
}

export function createEmbedder(config: EpisodicMemoryConfig["embedding"]): Embedder {
  if (config.provider === "openai") {
    if (!config.apiKey) {
      throw new ConfigError("/embedding/apiKey", "required when provider is \"openai\" (or set OPENAI_API_KEY)");
    }
    return new OpenAIEmbedder(config.apiKey, config.model, config.baseUrl);
  }
  return new OllamaEmbedder(config.model, config.baseUrl);
}
