/**
 * episodic-memory
 *
 * Per-user episodic memory for conversational agents:
 * - LLM reflection turns each finished conversation into a structured episode
 * - Qdrant storage, one collection per user
 * - Hybrid recall (vector similarity + keyword scan) with weighted score fusion
 * - A system directive built from the best matches to prime the next conversation
 */

import { resolveConfig, type EpisodicMemoryConfig } from "./config.js";
import { composeDirective } from "./context.js";
import { createEmbedder, type Embedder } from "./embeddings.js";
import { QdrantClient } from "./qdrant.js";
import { formatConversation, Reflector, type ReflectionResult } from "./reflection.js";
import { fuseResults } from "./scoring.js";
import { EpisodeStore } from "./store.js";
import {
  consoleLogger,
  type ChatMessage,
  type Episode,
  type EpisodeHit,
  type Logger,
  type RankedResult,
} from "./types.js";

export interface EpisodicMemoryDeps {
  reflector?: Pick<Reflector, "reflect">;
  embedder?: Embedder;
  store?: EpisodeStore;
  logger?: Logger;
}

export interface AddEpisodeResult {
  episode: Episode;
  /** Reflection outcome; `ok: false` means the episode was stored with sentinel fields */
  reflection: ReflectionResult;
}

export class EpisodicMemory {
  private readonly config: EpisodicMemoryConfig;
  private readonly reflector: Pick<Reflector, "reflect">;
  private readonly embedder: Embedder;
  private readonly store: EpisodeStore;
  private readonly logger: Logger;

  constructor(config: EpisodicMemoryConfig, deps: EpisodicMemoryDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? consoleLogger;
    this.reflector =
      deps.reflector ??
      new Reflector({
        apiKey: config.reflection.apiKey,
        model: config.reflection.model,
        baseUrl: config.reflection.baseUrl,
        temperature: config.reflection.temperature,
        maxTokens: config.reflection.maxTokens,
      });
    this.embedder = deps.embedder ?? createEmbedder(config.embedding);
    this.store =
      deps.store ??
      new EpisodeStore(
        new QdrantClient(config.qdrant.url, config.qdrant.apiKey),
        this.embedder,
        {
          collectionPrefix: config.qdrant.collectionPrefix,
          vectorSize: config.qdrant.vectorSize,
          textIndex: config.qdrant.textIndex,
          scorePolarity: config.qdrant.scorePolarity,
        },
        this.logger,
      );
  }

  /**
   * Reflect on a finished conversation and store it as one episode.
   * A malformed reflection still stores an episode (with "N/A" fields); embedding
   * and store failures are thrown and nothing is written.
   */
  async addEpisode(
    messages: ChatMessage[],
    userId: string = this.config.defaultUserId,
  ): Promise<AddEpisodeResult> {
    await this.store.ensureCollection(userId);

    const conversation = formatConversation(messages);
    const reflection = await this.reflector.reflect(conversation);
    if (!reflection.ok) {
      this.logger.warn(`episodic-memory: reflection degraded for ${userId}: ${reflection.error}`);
    }

    const episode = await this.store.write(userId, { conversation, ...reflection.draft });
    this.logger.info(
      `episodic-memory: stored episode ${episode.id} for ${userId} ` +
        `[${episode.contextTags.join(", ")}]`,
    );
    return { episode, reflection };
  }

  /** Top episodes for `query`, best first. Empty when the user has no memory yet. */
  async recall(
    query: string,
    userId: string = this.config.defaultUserId,
    alpha: number = this.config.recall.alpha,
  ): Promise<RankedResult[]> {
    if (!(await this.store.hasCollection(userId))) {
      this.logger.debug?.(`episodic-memory: no collection for ${userId}, nothing to recall`);
      return [];
    }

    const limit = this.config.recall.candidateLimit;
    const vector = await this.embedder.embed(query);
    const keywordScan: Promise<EpisodeHit[]> = query.trim()
      ? this.store.scanByKeyword(userId, query, limit)
      : Promise.resolve([]);

    const [similar, keyword] = await Promise.all([
      this.store.searchBySimilarity(userId, vector, limit),
      keywordScan,
    ]);

    const ranked = fuseResults(similar, keyword, alpha, this.store.scorePolarity);
    this.logger.debug?.(
      `episodic-memory: recalled ${ranked.length} episodes for ${userId} ` +
        `(${similar.length} similar, ${keyword.length} keyword)`,
    );
    return ranked;
  }

  /** System directive for the next conversation, primed with recalled episodes. */
  async composeDirective(query: string, userId: string = this.config.defaultUserId): Promise<string> {
    return composeDirective(await this.recall(query, userId));
  }
}

export function createEpisodicMemory(rawConfig: unknown, logger?: Logger): EpisodicMemory {
  return new EpisodicMemory(resolveConfig(rawConfig), { logger });
}

export { resolveConfig, ConfigSchema, type EpisodicMemoryConfig } from "./config.js";
export { composeDirective, NEUTRAL_DIRECTIVE } from "./context.js";
export { createEmbedder, OllamaEmbedder, OpenAIEmbedder, type Embedder } from "./embeddings.js";
export { ConfigError, EmbeddingError, StoreError, SummarizationError } from "./errors.js";
export { collectionName, QdrantClient } from "./qdrant.js";
export {
  emptyDraft,
  formatConversation,
  parseReflection,
  REFLECTION_PROMPT,
  Reflector,
  type ReflectionResult,
} from "./reflection.js";
export { FUSED_RESULT_LIMIT, fuseResults } from "./scoring.js";
export { EpisodeStore, episodeFromPayload, episodeToPayload } from "./store.js";
export * from "./types.js";
