/**
 * Hybrid ranking: fuse similarity-search and keyword-scan results.
 */

import type { EpisodeHit, EpisodeRecord, RankedResult, ScoredItem, ScorePolarity } from "./types.js";

/** Number of fused results kept. */
export const FUSED_RESULT_LIMIT = 3;

/**
 * Cosine distance in [0, 1] for a native score of the given polarity.
 */
function toDistance(nativeScore: number, polarity: ScorePolarity): number {
  return polarity === "distance" ? nativeScore : 1 - nativeScore;
}

/**
 * Fuse both result sets with blend weight `alpha` (1 = similarity only,
 * 0 = keyword only).
 *
 * - Similarity hits contribute `alpha * (1 - distance)`.
 * - Keyword hits contribute `(1 - alpha) * (i + 1) / n` for the i-th of n hits.
 *   Scan order is the only signal available here, so this is positional, not a
 *   term-frequency score.
 *
 * Items found by both paths appear once with both contributions summed. Ties
 * keep first-encounter order (similarity hits first).
 */
export function fuseResults(
  similar: ScoredItem[],
  keyword: EpisodeHit[],
  alpha: number,
  polarity: ScorePolarity = "similarity",
): RankedResult[] {
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new RangeError(`alpha must be within [0, 1], got ${alpha}`);
  }

  const fused = new Map<string, { score: number; episode: EpisodeRecord }>();
  const add = (id: string, episode: EpisodeRecord, contribution: number) => {
    const entry = fused.get(id);
    if (entry) {
      entry.score += contribution;
    } else {
      fused.set(id, { score: contribution, episode });
    }
  };

  for (const item of similar) {
    add(item.id, item.episode, alpha * (1 - toDistance(item.nativeScore, polarity)));
  }

  const n = keyword.length;
  keyword.forEach((item, i) => {
    add(item.id, item.episode, (1 - alpha) * ((i + 1) / n));
  });

  return [...fused.entries()]
    .map(([id, { score, episode }]) => ({ id, score, episode }))
    .sort((a, b) => b.score - a.score)
    .slice(0, FUSED_RESULT_LIMIT);
}
