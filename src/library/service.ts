import type { Logger } from "../config/logger";
import type { LibraryStores } from "../stores/interfaces";
import type {
  Book,
  Borrow,
  IntelligenceKind,
  IntelligenceState,
  NewBook,
  Review,
  ReviewPolicy,
  UserPreference,
} from "../types/core";
import { LibraryError } from "./errors";

/** The slice of the intelligence coordinator the library flows drive. */
export interface IntelligenceTriggers {
  triggerSummary(bookId: string): void;
  triggerConsensus(bookId: string): void;
  getState(bookId: string, kind: IntelligenceKind): IntelligenceState;
}

export interface Recommender {
  recommend(userId: string, limit: number): Promise<Array<{ bookId: string; score: number; reason: string }>>;
}

export type LibraryServiceDeps = {
  stores: LibraryStores;
  intelligence: IntelligenceTriggers;
  recommender: Recommender;
  logger: Logger;
  reviewPolicy?: ReviewPolicy;
};

export type ReviewInput = {
  rating: number;
  text: string;
};

export type PreferenceInput = {
  favoriteGenres: string[];
  favoriteAuthors: string[];
};

export type BookAnalysis = {
  bookId: string;
  summary: string | null;
  reviewConsensus: string | null;
  consensusVersion: number;
  totalReviews: number;
  averageRating: number | null;
  intelligence: Record<IntelligenceKind, IntelligenceState>;
};

export type RecommendationItem = {
  bookId: string;
  title: string;
  author: string;
  score: number;
  reason: string;
};

function cleanList(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    out.push(trimmed);
  }
  return out;
}

export class LibraryService {
  private readonly reviewPolicy: ReviewPolicy;

  constructor(private readonly deps: LibraryServiceDeps) {
    this.reviewPolicy = deps.reviewPolicy ?? "allow_repeat";
  }

  async ingestBook(input: NewBook): Promise<Book> {
    const title = input.title.trim();
    const author = input.author.trim();
    if (!title || !author) {
      throw new LibraryError("validation", "title and author are required");
    }
    const book = await this.deps.stores.catalog.createBook({
      ...input,
      title,
      author,
      genres: cleanList(input.genres ?? []),
    });
    this.deps.logger.info("book_ingested", { bookId: book.id, hasText: book.filePath !== null });
    this.deps.intelligence.triggerSummary(book.id);
    return book;
  }

  async borrowBook(userId: string, bookId: string): Promise<Borrow> {
    const { borrows, interactions } = this.deps.stores;
    const book = await this.requireBook(bookId);
    if (await borrows.findActiveBorrow(userId, bookId)) {
      throw new LibraryError("conflict", "Book is already borrowed by this user");
    }
    const borrow = await borrows.createBorrow(userId, bookId);
    await interactions.record({ userId, bookId, type: "borrow", rating: null });
    this.deps.logger.info("book_borrowed", { userId, bookId, title: book.title });
    return borrow;
  }

  async returnBook(userId: string, bookId: string): Promise<Borrow> {
    const { borrows, interactions } = this.deps.stores;
    const active = await borrows.findActiveBorrow(userId, bookId);
    if (!active) {
      throw new LibraryError("not_found", "No active borrow found for this book");
    }
    const closed = await borrows.closeBorrow(active.id);
    if (!closed) {
      throw new LibraryError("conflict", "Borrow was already returned");
    }
    await interactions.record({ userId, bookId, type: "return", rating: null });
    this.deps.logger.info("book_returned", { userId, bookId });
    return closed;
  }

  async submitReview(userId: string, bookId: string, input: ReviewInput): Promise<Review> {
    const { borrows, reviews, interactions } = this.deps.stores;
    if (!Number.isInteger(input.rating) || input.rating < 1 || input.rating > 5) {
      throw new LibraryError("validation", "rating must be an integer between 1 and 5");
    }
    const text = input.text.trim();
    if (!text) {
      throw new LibraryError("validation", "review text must not be empty");
    }
    await this.requireBook(bookId);
    if (!(await borrows.hasBorrowed(userId, bookId))) {
      throw new LibraryError("forbidden", "You must borrow a book before reviewing it");
    }

    const draft = { userId, bookId, rating: input.rating, text };
    const review =
      this.reviewPolicy === "single_per_user" ? await reviews.createReviewOnce(draft) : await reviews.createReview(draft);
    if (!review) {
      throw new LibraryError("conflict", "You have already reviewed this book");
    }
    await interactions.record({ userId, bookId, type: "review", rating: input.rating });
    this.deps.logger.info("review_submitted", { userId, bookId, rating: input.rating });
    this.deps.intelligence.triggerConsensus(bookId);
    return review;
  }

  async updatePreferences(userId: string, input: PreferenceInput): Promise<UserPreference> {
    return this.deps.stores.preferences.upsertPreferences({
      userId,
      favoriteGenres: cleanList(input.favoriteGenres),
      favoriteAuthors: cleanList(input.favoriteAuthors),
    });
  }

  async getBookAnalysis(bookId: string): Promise<BookAnalysis> {
    const book = await this.requireBook(bookId);
    const bookReviews = await this.deps.stores.reviews.listReviews(bookId);
    const total = bookReviews.reduce((sum, review) => sum + review.rating, 0);
    return {
      bookId: book.id,
      summary: book.summary,
      reviewConsensus: book.reviewConsensus,
      consensusVersion: book.consensusVersion,
      totalReviews: bookReviews.length,
      averageRating: bookReviews.length > 0 ? Math.round((total / bookReviews.length) * 100) / 100 : null,
      intelligence: {
        summary: this.deps.intelligence.getState(bookId, "summary"),
        consensus: this.deps.intelligence.getState(bookId, "consensus"),
      },
    };
  }

  async getRecommendations(userId: string, limit: number): Promise<RecommendationItem[]> {
    const results = await this.deps.recommender.recommend(userId, limit);
    const items: RecommendationItem[] = [];
    for (const result of results) {
      const book = await this.deps.stores.catalog.getBook(result.bookId);
      if (!book) continue;
      items.push({ ...result, title: book.title, author: book.author });
    }
    return items;
  }

  private async requireBook(bookId: string): Promise<Book> {
    const book = await this.deps.stores.catalog.getBook(bookId);
    if (!book) {
      throw new LibraryError("not_found", "Book not found");
    }
    return book;
  }
}
