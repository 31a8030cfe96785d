/**
 * Episode store: one Qdrant collection per user.
 */

import { randomUUID } from "node:crypto";
import type { Embedder } from "./embeddings.js";
import { EmbeddingError } from "./errors.js";
import { collectionName, type QdrantClient } from "./qdrant.js";
import {
  NOT_APPLICABLE,
  consoleLogger,
  type Episode,
  type EpisodeHit,
  type EpisodeRecord,
  type Logger,
  type NewEpisode,
  type ScoredItem,
  type ScorePolarity,
} from "./types.js";

/** Payload field the keyword scan matches against. */
export const KEYWORD_FIELD = "conversation";

export interface EpisodeStoreOptions {
  collectionPrefix: string;
  vectorSize: number;
  /** Keep a full-text index on the keyword field, (re)applied by ensureCollection */
  textIndex: boolean;
  scorePolarity: ScorePolarity;
}

// ============================================================================
// Payload mapping (persisted keys are snake_case)
// ============================================================================

export function episodeToPayload(episode: NewEpisode): Record<string, unknown> {
  return {
    conversation: episode.conversation,
    context_tags: episode.contextTags,
    conversation_summary: episode.conversationSummary,
    what_worked: episode.whatWorked,
    what_to_avoid: episode.whatToAvoid,
  };
}

function text(value: unknown): string {
  return typeof value === "string" && value.length > 0 ? value : NOT_APPLICABLE;
}

export function episodeFromPayload(id: string, payload: Record<string, unknown>): EpisodeRecord {
  const tags = Array.isArray(payload.context_tags)
    ? payload.context_tags.filter((t): t is string => typeof t === "string")
    : [];

  return {
    id,
    conversation: text(payload.conversation),
    contextTags: tags.length > 0 ? tags : [NOT_APPLICABLE],
    conversationSummary: text(payload.conversation_summary),
    whatWorked: text(payload.what_worked),
    whatToAvoid: text(payload.what_to_avoid),
  };
}

// ============================================================================
// Store
// ============================================================================

export class EpisodeStore {
  private readonly qdrant: QdrantClient;
  private readonly embedder: Embedder;
  private readonly options: EpisodeStoreOptions;
  private readonly logger: Logger;

  constructor(
    qdrant: QdrantClient,
    embedder: Embedder,
    options: EpisodeStoreOptions,
    logger: Logger = consoleLogger,
  ) {
    this.qdrant = qdrant;
    this.embedder = embedder;
    this.options = options;
    this.logger = logger;
  }

  get scorePolarity(): ScorePolarity {
    return this.options.scorePolarity;
  }

  collectionFor(userId: string): string {
    return collectionName(this.options.collectionPrefix, userId);
  }

  hasCollection(userId: string): Promise<boolean> {
    return this.qdrant.collectionExists(this.collectionFor(userId));
  }

  /**
   * Create the user's collection if it does not exist yet, and (re)apply the
   * text index. Safe to call before every write; an index that failed to
   * build on an earlier call is retried here.
   */
  async ensureCollection(userId: string): Promise<void> {
    const collection = this.collectionFor(userId);
    if (!(await this.qdrant.collectionExists(collection))) {
      await this.qdrant.createCollection(collection, this.options.vectorSize);
      this.logger.info(
        `episodic-memory: created collection ${collection} (dim ${this.options.vectorSize})`,
      );
    }

    if (this.options.textIndex) {
      await this.qdrant.createTextIndex(collection, KEYWORD_FIELD);
    }
  }

  /**
   * Embed the episode summary and upsert one point. Nothing is written unless
   * a vector of the configured dimension was obtained.
   */
  async write(userId: string, episode: NewEpisode): Promise<Episode> {
    const embedding = await this.embedder.embed(episode.conversationSummary);
    if (embedding.length !== this.options.vectorSize) {
      throw new EmbeddingError(
        `Embedding model ${this.embedder.model} returned ${embedding.length} dimensions, ` +
          `collection expects ${this.options.vectorSize}`,
      );
    }

    const stored: Episode = { ...episode, id: randomUUID(), embedding };
    await this.qdrant.upsert(this.collectionFor(userId), [
      { id: stored.id, vector: embedding, payload: episodeToPayload(episode) },
    ]);
    return stored;
  }

  async searchBySimilarity(userId: string, vector: number[], limit: number): Promise<ScoredItem[]> {
    const hits = await this.qdrant.search(this.collectionFor(userId), vector, limit);
    return hits.map((hit) => ({
      id: hit.id,
      nativeScore: hit.score,
      episode: episodeFromPayload(hit.id, hit.payload),
    }));
  }

  /** Episodes whose transcript matches `query`, in the store's scan order. */
  async scanByKeyword(userId: string, query: string, limit: number): Promise<EpisodeHit[]> {
    const records = await this.qdrant.scroll(
      this.collectionFor(userId),
      { key: KEYWORD_FIELD, text: query },
      limit,
    );
    return records.map((record) => ({
      id: record.id,
      episode: episodeFromPayload(record.id, record.payload),
    }));
  }
}
