import type { Book, UserInteraction, UserPreference } from "../types/core";

export const GENRE_WEIGHT = 0.7;
export const AUTHOR_BONUS = 0.3;
export const UNRATED_SIGNAL = 0.5;

function normalizeTag(value: string): string {
  return value.trim().toLowerCase();
}

function clampUnit(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export type ContentMatch = {
  score: number;
  genreMatches: number;
  authorMatch: boolean;
};

/** Share of the book's genres among the favorites, plus a flat bonus for a favorite author. */
export function contentScore(book: Book, preference: UserPreference | null): ContentMatch {
  if (!preference) return { score: 0, genreMatches: 0, authorMatch: false };

  const favoriteGenres = new Set(preference.favoriteGenres.map(normalizeTag));
  const bookGenres = [...new Set(book.genres.map(normalizeTag).filter(Boolean))];
  const genreMatches = bookGenres.filter((genre) => favoriteGenres.has(genre)).length;
  const genreShare = bookGenres.length > 0 ? genreMatches / bookGenres.length : 0;

  const author = normalizeTag(book.author);
  const authorMatch = author.length > 0 && preference.favoriteAuthors.some((entry) => normalizeTag(entry) === author);

  return {
    score: clampUnit(genreShare * GENRE_WEIGHT + (authorMatch ? AUTHOR_BONUS : 0)),
    genreMatches,
    authorMatch,
  };
}

export function interactionSignal(interaction: UserInteraction): number {
  if (interaction.type === "review" && interaction.rating !== null) {
    return clampUnit(interaction.rating / 5);
  }
  return UNRATED_SIGNAL;
}

/** Book ids the user has borrowed, returned or reviewed. */
export function seenBooks(history: UserInteraction[]): Set<string> {
  return new Set(history.map((entry) => entry.bookId));
}

/**
 * User-user overlap. Every other reader who touched one of the target's books
 * is weighted by how many books they share with the target, then votes
 * weight × signal for each unseen book they touched. Scores are scaled so the
 * best candidate is 1.
 */
export function collaborativeScores(
  userId: string,
  history: UserInteraction[],
  neighbourhood: UserInteraction[]
): Map<string, number> {
  const seen = seenBooks(history);
  const booksByNeighbour = new Map<string, Set<string>>();
  for (const entry of neighbourhood) {
    if (entry.userId === userId) continue;
    const books = booksByNeighbour.get(entry.userId) ?? new Set<string>();
    books.add(entry.bookId);
    booksByNeighbour.set(entry.userId, books);
  }

  const weights = new Map<string, number>();
  for (const [neighbour, books] of booksByNeighbour) {
    let shared = 0;
    for (const bookId of books) {
      if (seen.has(bookId)) shared += 1;
    }
    if (shared > 0) weights.set(neighbour, shared);
  }

  const raw = new Map<string, number>();
  for (const entry of neighbourhood) {
    const weight = weights.get(entry.userId);
    if (weight === undefined || seen.has(entry.bookId)) continue;
    raw.set(entry.bookId, (raw.get(entry.bookId) ?? 0) + weight * interactionSignal(entry));
  }

  const max = Math.max(0, ...raw.values());
  const scores = new Map<string, number>();
  if (max <= 0) return scores;
  for (const [bookId, value] of raw) {
    scores.set(bookId, clampUnit(value / max));
  }
  return scores;
}

export function contentReason(match: ContentMatch): string {
  if (match.genreMatches > 0 && match.authorMatch) return "matches your favorite genres and author";
  if (match.authorMatch) return "by one of your favorite authors";
  return "matches your favorite genres";
}

export const COLLABORATIVE_REASON = "similar readers also enjoyed this";
