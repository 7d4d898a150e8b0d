import { errorMessage, type Logger } from "../config/logger";
import type { CatalogStore, InteractionLog, PreferenceStore } from "../stores/interfaces";
import type { Book, RecommendationResult, UserInteraction, UserPreference } from "../types/core";
import { COLLABORATIVE_REASON, collaborativeScores, contentReason, contentScore, seenBooks } from "./scoring";

export class RecommenderDataError extends Error {
  readonly code = "recommender_data_error";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecommenderDataError";
  }
}

export type RecommenderDeps = {
  catalog: CatalogStore;
  interactions: InteractionLog;
  preferences: PreferenceStore;
  logger: Logger;
  alpha?: number;
};

export type RecommendationInputs = {
  userId: string;
  books: Book[];
  preference: UserPreference | null;
  history: UserInteraction[];
  neighbourhood: UserInteraction[];
  popularity: Map<string, number>;
  alpha: number;
};

type Scored = RecommendationResult & { rawScore: number };

function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function byPopularity(candidates: Book[], popularity: Map<string, number>): Book[] {
  return [...candidates].sort((a, b) => {
    const byCount = (popularity.get(b.id) ?? 0) - (popularity.get(a.id) ?? 0);
    if (byCount !== 0) return byCount;
    const byRecency = Date.parse(b.createdAt) - Date.parse(a.createdAt);
    if (byRecency !== 0 && !Number.isNaN(byRecency)) return byRecency;
    return compareIds(a.id, b.id);
  });
}

function popularityReason(count: number): string {
  return count > 0 ? "popular with other readers" : "recently added to the catalog";
}

function popularityFallback(candidates: Book[], popularity: Map<string, number>, limit: number): RecommendationResult[] {
  const maxCount = Math.max(0, ...candidates.map((book) => popularity.get(book.id) ?? 0));
  return byPopularity(candidates, popularity)
    .slice(0, limit)
    .map((book) => {
      const count = popularity.get(book.id) ?? 0;
      return {
        bookId: book.id,
        score: maxCount > 0 ? roundScore(count / maxCount) : 0,
        reason: popularityReason(count),
      };
    });
}

/** Pure ranking step; identical inputs give identical output. */
export function rankRecommendations(inputs: RecommendationInputs, limit: number): RecommendationResult[] {
  if (limit <= 0) return [];
  const seen = seenBooks(inputs.history);
  const candidates = inputs.books.filter((book) => !seen.has(book.id));
  if (candidates.length === 0) return [];

  const collaborative =
    inputs.history.length > 0
      ? collaborativeScores(inputs.userId, inputs.history, inputs.neighbourhood)
      : new Map<string, number>();
  const alpha = inputs.alpha;

  const scored: Scored[] = [];
  for (const book of candidates) {
    const content = contentScore(book, inputs.preference);
    const collaborativeTerm = alpha * (collaborative.get(book.id) ?? 0);
    const contentTerm = (1 - alpha) * content.score;
    const rawScore = collaborativeTerm + contentTerm;
    if (rawScore <= 0) continue;
    scored.push({
      bookId: book.id,
      rawScore,
      score: roundScore(rawScore),
      reason: collaborativeTerm >= contentTerm ? COLLABORATIVE_REASON : contentReason(content),
    });
  }

  if (scored.length === 0) {
    return popularityFallback(candidates, inputs.popularity, limit);
  }

  const ranked: RecommendationResult[] = scored
    .sort((a, b) => b.rawScore - a.rawScore || compareIds(a.bookId, b.bookId))
    .slice(0, limit)
    .map(({ bookId, score, reason }) => ({ bookId, score, reason }));

  // Unscored books still fill open slots, after every scored one.
  if (ranked.length < limit) {
    const rankedIds = new Set(ranked.map((entry) => entry.bookId));
    const rest = byPopularity(
      candidates.filter((book) => !rankedIds.has(book.id)),
      inputs.popularity
    ).slice(0, limit - ranked.length);
    for (const book of rest) {
      ranked.push({ bookId: book.id, score: 0, reason: popularityReason(inputs.popularity.get(book.id) ?? 0) });
    }
  }
  return ranked;
}

/** Blends neighbour activity with preference matching over the unseen catalog. */
export class HybridRecommender {
  readonly alpha: number;

  constructor(private readonly deps: RecommenderDeps) {
    const alpha = deps.alpha ?? 0.6;
    if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
      throw new RangeError(`alpha must be within [0, 1], got ${alpha}`);
    }
    this.alpha = alpha;
  }

  async recommend(userId: string, limit = 10): Promise<RecommendationResult[]> {
    const inputs = await this.loadInputs(userId);
    const results = rankRecommendations(inputs, Math.max(0, Math.floor(limit)));
    this.deps.logger.debug("recommendations_ranked", {
      userId,
      candidates: inputs.books.length,
      historySize: inputs.history.length,
      returned: results.length,
    });
    return results;
  }

  private async loadInputs(userId: string): Promise<RecommendationInputs> {
    const { catalog, interactions, preferences } = this.deps;
    try {
      const [books, preference, history, popularity] = await Promise.all([
        catalog.listBooks(),
        preferences.getPreferences(userId),
        interactions.listByUser(userId),
        interactions.countByBook(),
      ]);

      const neighbourIds = new Set<string>();
      const byBook = await Promise.all([...seenBooks(history)].map((bookId) => interactions.listByBook(bookId)));
      for (const entries of byBook) {
        for (const entry of entries) {
          if (entry.userId !== userId) neighbourIds.add(entry.userId);
        }
      }
      const neighbourhood = (
        await Promise.all([...neighbourIds].sort().map((neighbourId) => interactions.listByUser(neighbourId)))
      ).flat();

      return { userId, books, preference, history, neighbourhood, popularity, alpha: this.alpha };
    } catch (error) {
      this.deps.logger.error("recommender_data_failed", { userId, message: errorMessage(error) });
      throw new RecommenderDataError(`Failed to load recommendation data for ${userId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
