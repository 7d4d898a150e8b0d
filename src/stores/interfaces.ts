import type { Book, Borrow, NewBook, Review, UserInteraction, UserPreference } from "../types/core";

export interface CatalogStore {
  getBook(id: string): Promise<Book | null>;
  listBooks(): Promise<Book[]>;
  createBook(input: NewBook): Promise<Book>;
  /** Writes the summary only while it is still absent; returns whether it wrote. */
  updateBookSummary(id: string, text: string): Promise<boolean>;
  /**
   * Atomically stores `text` and bumps consensusVersion by one, provided the
   * stored version still equals `expectedVersion`.
   */
  compareAndSwapConsensus(id: string, expectedVersion: number, text: string): Promise<boolean>;
}

export interface ReviewStore {
  /** Oldest first. */
  listReviews(bookId: string): Promise<Review[]>;
  createReview(review: Omit<Review, "id" | "createdAt">): Promise<Review>;
  /**
   * Inserts only while the user has no review of the book yet, serialised per
   * (user, book); resolves null when one already exists.
   */
  createReviewOnce(review: Omit<Review, "id" | "createdAt">): Promise<Review | null>;
}

export interface BorrowStore {
  findActiveBorrow(userId: string, bookId: string): Promise<Borrow | null>;
  hasBorrowed(userId: string, bookId: string): Promise<boolean>;
  /** Rejects with a conflict when an active borrow already exists for the pair. */
  createBorrow(userId: string, bookId: string): Promise<Borrow>;
  closeBorrow(id: string): Promise<Borrow | null>;
}

export interface InteractionLog {
  record(interaction: Omit<UserInteraction, "id" | "createdAt">): Promise<UserInteraction>;
  listByUser(userId: string): Promise<UserInteraction[]>;
  listByBook(bookId: string): Promise<UserInteraction[]>;
  countByBook(): Promise<Map<string, number>>;
}

export interface PreferenceStore {
  getPreferences(userId: string): Promise<UserPreference | null>;
  upsertPreferences(preference: UserPreference): Promise<UserPreference>;
}

/** Plain text of an uploaded book, as provided by the storage layer. */
export interface BookTextSource {
  loadText(book: Book): Promise<string | null>;
}

export type LibraryStores = {
  catalog: CatalogStore;
  reviews: ReviewStore;
  borrows: BorrowStore;
  interactions: InteractionLog;
  preferences: PreferenceStore;
};
