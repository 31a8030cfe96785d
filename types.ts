/**
 * episodic-memory type definitions
 */

/** Sentinel stored in place of any field the reflection could not fill. */
export const NOT_APPLICABLE = "N/A";

// ============================================================================
// Conversation input
// ============================================================================

export type ChatRole = "system" | "user" | "assistant" | "tool";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

// ============================================================================
// Episodes
// ============================================================================

/** Structured reflection over one conversation, as produced by the summarizer. */
export interface EpisodeDraft {
  /** 2-4 short keywords by convention (not enforced) */
  contextTags: string[];
  /** One sentence describing what the conversation accomplished */
  conversationSummary: string;
  /** Most effective approach used */
  whatWorked: string;
  /** Most important pitfall to avoid */
  whatToAvoid: string;
}

/** An episode ready to be written: the draft plus its transcript. */
export interface NewEpisode extends EpisodeDraft {
  /** Formatted transcript, one `ROLE: content` line per turn */
  conversation: string;
}

/** An episode as read back from the store (payload only, no vector). */
export interface EpisodeRecord extends NewEpisode {
  /** Unique ID (UUID), assigned at write time */
  id: string;
}

export interface Episode extends EpisodeRecord {
  /** Embedding of `conversationSummary` */
  embedding: number[];
}

// ============================================================================
// Retrieval
// ============================================================================

/** Similarity search hit, independent of the store client's own result shape. */
export interface ScoredItem {
  id: string;
  /** Score as reported by the store; see {@link ScorePolarity} */
  nativeScore: number;
  episode: EpisodeRecord;
}

/** Keyword scan hit. Scan order is the only ranking signal. */
export interface EpisodeHit {
  id: string;
  episode: EpisodeRecord;
}

/**
 * Whether a store's native score grows with similarity (`similarity`, e.g. Qdrant
 * Cosine) or with dissimilarity (`distance`).
 */
export type ScorePolarity = "similarity" | "distance";

export interface RankedResult {
  id: string;
  /** Fused relevance score */
  score: number;
  episode: EpisodeRecord;
}

// ============================================================================
// Logging
// ============================================================================

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug?(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
  debug: (message) => console.debug(message),
};
