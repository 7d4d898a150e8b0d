import crypto from "node:crypto";
import { LibraryError } from "../library/errors";
import type { Book, Borrow, NewBook, Review, UserInteraction, UserPreference } from "../types/core";
import type {
  BookTextSource,
  BorrowStore,
  CatalogStore,
  InteractionLog,
  LibraryStores,
  PreferenceStore,
  ReviewStore,
} from "./interfaces";

export class MemoryCatalogStore implements CatalogStore {
  private books = new Map<string, Book>();

  async getBook(id: string): Promise<Book | null> {
    const book = this.books.get(id);
    return book ? { ...book, genres: [...book.genres] } : null;
  }

  async listBooks(): Promise<Book[]> {
    return [...this.books.values()]
      .sort((a, b) => a.id.localeCompare(b.id))
      .map((book) => ({ ...book, genres: [...book.genres] }));
  }

  async createBook(input: NewBook & { id?: string; createdAt?: string }): Promise<Book> {
    const book: Book = {
      id: input.id ?? crypto.randomUUID(),
      title: input.title,
      author: input.author,
      isbn: input.isbn ?? null,
      genres: [...(input.genres ?? [])],
      filePath: input.filePath ?? null,
      summary: null,
      reviewConsensus: null,
      consensusVersion: 0,
      createdAt: input.createdAt ?? new Date().toISOString(),
    };
    if (this.books.has(book.id)) {
      throw new LibraryError("conflict", `Book ${book.id} already exists`);
    }
    this.books.set(book.id, book);
    return { ...book, genres: [...book.genres] };
  }

  async updateBookSummary(id: string, text: string): Promise<boolean> {
    const current = this.books.get(id);
    if (!current || current.summary !== null) return false;
    this.books.set(id, { ...current, summary: text });
    return true;
  }

  async compareAndSwapConsensus(id: string, expectedVersion: number, text: string): Promise<boolean> {
    const current = this.books.get(id);
    if (!current || current.consensusVersion !== expectedVersion) return false;
    this.books.set(id, { ...current, reviewConsensus: text, consensusVersion: expectedVersion + 1 });
    return true;
  }
}

export class MemoryReviewStore implements ReviewStore {
  private reviews: Review[] = [];

  async listReviews(bookId: string): Promise<Review[]> {
    return this.reviews.filter((review) => review.bookId === bookId);
  }

  async createReview(input: Omit<Review, "id" | "createdAt">): Promise<Review> {
    const review: Review = { ...input, id: crypto.randomUUID(), createdAt: new Date().toISOString() };
    this.reviews.push(review);
    return review;
  }

  async createReviewOnce(input: Omit<Review, "id" | "createdAt">): Promise<Review | null> {
    if (this.reviews.some((review) => review.userId === input.userId && review.bookId === input.bookId)) {
      return null;
    }
    return this.createReview(input);
  }
}

export class MemoryBorrowStore implements BorrowStore {
  private borrows = new Map<string, Borrow>();

  async findActiveBorrow(userId: string, bookId: string): Promise<Borrow | null> {
    for (const borrow of this.borrows.values()) {
      if (borrow.userId === userId && borrow.bookId === bookId && borrow.returnedAt === null) return borrow;
    }
    return null;
  }

  async hasBorrowed(userId: string, bookId: string): Promise<boolean> {
    return [...this.borrows.values()].some((borrow) => borrow.userId === userId && borrow.bookId === bookId);
  }

  async createBorrow(userId: string, bookId: string): Promise<Borrow> {
    if (await this.findActiveBorrow(userId, bookId)) {
      throw new LibraryError("conflict", "Book is already borrowed by this user");
    }
    const borrow: Borrow = {
      id: crypto.randomUUID(),
      userId,
      bookId,
      borrowedAt: new Date().toISOString(),
      returnedAt: null,
    };
    this.borrows.set(borrow.id, borrow);
    return borrow;
  }

  async closeBorrow(id: string): Promise<Borrow | null> {
    const current = this.borrows.get(id);
    if (!current || current.returnedAt !== null) return null;
    const closed = { ...current, returnedAt: new Date().toISOString() };
    this.borrows.set(id, closed);
    return closed;
  }
}

export class MemoryInteractionLog implements InteractionLog {
  private entries: UserInteraction[] = [];

  async record(interaction: Omit<UserInteraction, "id" | "createdAt">): Promise<UserInteraction> {
    const entry: UserInteraction = Object.freeze({
      ...interaction,
      id: crypto.randomUUID(),
      createdAt: new Date().toISOString(),
    });
    this.entries.push(entry);
    return entry;
  }

  async listByUser(userId: string): Promise<UserInteraction[]> {
    return this.entries.filter((entry) => entry.userId === userId);
  }

  async listByBook(bookId: string): Promise<UserInteraction[]> {
    return this.entries.filter((entry) => entry.bookId === bookId);
  }

  async countByBook(): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    for (const entry of this.entries) {
      counts.set(entry.bookId, (counts.get(entry.bookId) ?? 0) + 1);
    }
    return counts;
  }
}

export class MemoryPreferenceStore implements PreferenceStore {
  private preferences = new Map<string, UserPreference>();

  async getPreferences(userId: string): Promise<UserPreference | null> {
    return this.preferences.get(userId) ?? null;
  }

  async upsertPreferences(preference: UserPreference): Promise<UserPreference> {
    const stored: UserPreference = {
      userId: preference.userId,
      favoriteGenres: [...preference.favoriteGenres],
      favoriteAuthors: [...preference.favoriteAuthors],
    };
    this.preferences.set(preference.userId, stored);
    return stored;
  }
}

export function createMemoryStores(): LibraryStores & { catalog: MemoryCatalogStore } {
  return {
    catalog: new MemoryCatalogStore(),
    reviews: new MemoryReviewStore(),
    borrows: new MemoryBorrowStore(),
    interactions: new MemoryInteractionLog(),
    preferences: new MemoryPreferenceStore(),
  };
}

/** Texts keyed by book id, for tests and local runs. */
export class MemoryBookTextSource implements BookTextSource {
  constructor(private readonly texts = new Map<string, string>()) {}

  set(bookId: string, text: string): void {
    this.texts.set(bookId, text);
  }

  async loadText(book: Book): Promise<string | null> {
    return this.texts.get(book.id) ?? null;
  }
}
