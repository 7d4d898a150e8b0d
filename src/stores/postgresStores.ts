import crypto from "node:crypto";
import type { Pool, QueryResultRow } from "pg";
import { withQueryTimeout } from "../db/postgres";
import { LibraryError } from "../library/errors";
import type { Book, Borrow, InteractionType, NewBook, Review, UserInteraction, UserPreference } from "../types/core";
import type {
  BorrowStore,
  CatalogStore,
  InteractionLog,
  LibraryStores,
  PreferenceStore,
  ReviewStore,
} from "./interfaces";

type BookRow = {
  id: string;
  title: string;
  author: string;
  isbn: string | null;
  genres: string[] | null;
  file_path: string | null;
  summary: string | null;
  review_consensus: string | null;
  consensus_version: number;
  created_at: Date | string;
};

type ReviewRow = {
  id: string;
  user_id: string;
  book_id: string;
  rating: number;
  text: string;
  created_at: Date | string;
};

type BorrowRow = {
  id: string;
  user_id: string;
  book_id: string;
  borrowed_at: Date | string;
  returned_at: Date | string | null;
};

type InteractionRow = {
  id: string;
  user_id: string;
  book_id: string;
  interaction_type: InteractionType;
  rating: number | null;
  created_at: Date | string;
};

type PreferenceRow = {
  user_id: string;
  favorite_genres: string[] | null;
  favorite_authors: string[] | null;
};

const BOOK_COLUMNS =
  "id, title, author, isbn, genres, file_path, summary, review_consensus, consensus_version, created_at";

function toIso(value: Date | string): string {
  if (value instanceof Date) return value.toISOString();
  return new Date(value).toISOString();
}

function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    isbn: row.isbn,
    genres: row.genres ?? [],
    filePath: row.file_path,
    summary: row.summary,
    reviewConsensus: row.review_consensus,
    consensusVersion: Number(row.consensus_version),
    createdAt: toIso(row.created_at),
  };
}

function toReview(row: ReviewRow): Review {
  return {
    id: row.id,
    userId: row.user_id,
    bookId: row.book_id,
    rating: Number(row.rating),
    text: row.text,
    createdAt: toIso(row.created_at),
  };
}

function toBorrow(row: BorrowRow): Borrow {
  return {
    id: row.id,
    userId: row.user_id,
    bookId: row.book_id,
    borrowedAt: toIso(row.borrowed_at),
    returnedAt: row.returned_at === null ? null : toIso(row.returned_at),
  };
}

function toInteraction(row: InteractionRow): UserInteraction {
  return {
    id: row.id,
    userId: row.user_id,
    bookId: row.book_id,
    type: row.interaction_type,
    rating: row.rating === null ? null : Number(row.rating),
    createdAt: toIso(row.created_at),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "23505";
}

export type TransactionQuery = <R extends QueryResultRow>(text: string, values?: unknown[]) => Promise<R[]>;

/** Runs every statement under the configured query timeout. */
export class PgRunner {
  constructor(
    private readonly pool: Pool,
    private readonly timeoutMs: number
  ) {}

  async rows<R extends QueryResultRow>(label: string, text: string, values: unknown[] = []): Promise<R[]> {
    const result = await withQueryTimeout(this.timeoutMs, label, () => this.pool.query<R>(text, values));
    return result.rows;
  }

  async count(label: string, text: string, values: unknown[] = []): Promise<number> {
    const result = await withQueryTimeout(this.timeoutMs, label, () => this.pool.query(text, values));
    return result.rowCount ?? 0;
  }

  async transaction<T>(label: string, work: (query: TransactionQuery) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const query: TransactionQuery = async <R extends QueryResultRow>(text: string, values: unknown[] = []) => {
      const result = await withQueryTimeout(this.timeoutMs, label, () => client.query<R>(text, values));
      return result.rows;
    };
    try {
      await withQueryTimeout(this.timeoutMs, `${label} begin`, () => client.query("BEGIN"));
      try {
        const result = await work(query);
        await withQueryTimeout(this.timeoutMs, `${label} commit`, () => client.query("COMMIT"));
        return result;
      } catch (error) {
        await withQueryTimeout(this.timeoutMs, `${label} rollback`, () => client.query("ROLLBACK"));
        throw error;
      }
    } finally {
      client.release();
    }
  }
}

export class PostgresCatalogStore implements CatalogStore {
  constructor(private readonly db: PgRunner) {}

  async getBook(id: string): Promise<Book | null> {
    const rows = await this.db.rows<BookRow>("book get", `SELECT ${BOOK_COLUMNS} FROM books WHERE id = $1`, [id]);
    return rows[0] ? toBook(rows[0]) : null;
  }

  async listBooks(): Promise<Book[]> {
    const rows = await this.db.rows<BookRow>("book list", `SELECT ${BOOK_COLUMNS} FROM books ORDER BY id`);
    return rows.map(toBook);
  }

  async createBook(input: NewBook): Promise<Book> {
    try {
      const rows = await this.db.rows<BookRow>(
        "book insert",
        `INSERT INTO books (id, title, author, isbn, genres, file_path)
         VALUES ($1, $2, $3, $4, $5::text[], $6)
         RETURNING ${BOOK_COLUMNS}`,
        [crypto.randomUUID(), input.title, input.author, input.isbn ?? null, input.genres ?? [], input.filePath ?? null]
      );
      if (!rows[0]) throw new Error("book insert returned no row");
      return toBook(rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new LibraryError("conflict", "A book with this ISBN already exists");
      }
      throw error;
    }
  }

  async updateBookSummary(id: string, text: string): Promise<boolean> {
    const updated = await this.db.count(
      "book summary",
      "UPDATE books SET summary = $2, updated_at = now() WHERE id = $1 AND summary IS NULL",
      [id, text]
    );
    return updated === 1;
  }

  async compareAndSwapConsensus(id: string, expectedVersion: number, text: string): Promise<boolean> {
    const updated = await this.db.count(
      "book consensus",
      `UPDATE books
       SET review_consensus = $3, consensus_version = consensus_version + 1, updated_at = now()
       WHERE id = $1 AND consensus_version = $2`,
      [id, expectedVersion, text]
    );
    return updated === 1;
  }
}

export class PostgresReviewStore implements ReviewStore {
  constructor(private readonly db: PgRunner) {}

  async listReviews(bookId: string): Promise<Review[]> {
    const rows = await this.db.rows<ReviewRow>(
      "review list",
      "SELECT id, user_id, book_id, rating, text, created_at FROM reviews WHERE book_id = $1 ORDER BY created_at, id",
      [bookId]
    );
    return rows.map(toReview);
  }

  async createReview(input: Omit<Review, "id" | "createdAt">): Promise<Review> {
    const rows = await this.db.rows<ReviewRow>(
      "review insert",
      `INSERT INTO reviews (id, user_id, book_id, rating, text) VALUES ($1, $2, $3, $4, $5)
       RETURNING id, user_id, book_id, rating, text, created_at`,
      [crypto.randomUUID(), input.userId, input.bookId, input.rating, input.text]
    );
    if (!rows[0]) throw new Error("review insert returned no row");
    return toReview(rows[0]);
  }

  async createReviewOnce(input: Omit<Review, "id" | "createdAt">): Promise<Review | null> {
    return this.db.transaction("review insert once", async (query) => {
      // Transaction-scoped lock; concurrent submissions for the pair queue here.
      await query("SELECT pg_advisory_xact_lock(hashtext($1))", [`review:${input.userId}:${input.bookId}`]);
      const existing = await query<{ found: number }>(
        "SELECT 1 AS found FROM reviews WHERE user_id = $1 AND book_id = $2 LIMIT 1",
        [input.userId, input.bookId]
      );
      if (existing.length > 0) return null;
      const rows = await query<ReviewRow>(
        `INSERT INTO reviews (id, user_id, book_id, rating, text) VALUES ($1, $2, $3, $4, $5)
         RETURNING id, user_id, book_id, rating, text, created_at`,
        [crypto.randomUUID(), input.userId, input.bookId, input.rating, input.text]
      );
      if (!rows[0]) throw new Error("review insert returned no row");
      return toReview(rows[0]);
    });
  }
}

export class PostgresBorrowStore implements BorrowStore {
  constructor(private readonly db: PgRunner) {}

  async findActiveBorrow(userId: string, bookId: string): Promise<Borrow | null> {
    const rows = await this.db.rows<BorrowRow>(
      "borrow active",
      `SELECT id, user_id, book_id, borrowed_at, returned_at FROM borrows
       WHERE user_id = $1 AND book_id = $2 AND returned_at IS NULL LIMIT 1`,
      [userId, bookId]
    );
    return rows[0] ? toBorrow(rows[0]) : null;
  }

  async hasBorrowed(userId: string, bookId: string): Promise<boolean> {
    const rows = await this.db.rows<{ found: number }>(
      "borrow exists",
      "SELECT 1 AS found FROM borrows WHERE user_id = $1 AND book_id = $2 LIMIT 1",
      [userId, bookId]
    );
    return rows.length > 0;
  }

  async createBorrow(userId: string, bookId: string): Promise<Borrow> {
    try {
      const rows = await this.db.rows<BorrowRow>(
        "borrow insert",
        `INSERT INTO borrows (id, user_id, book_id) VALUES ($1, $2, $3)
         RETURNING id, user_id, book_id, borrowed_at, returned_at`,
        [crypto.randomUUID(), userId, bookId]
      );
      if (!rows[0]) throw new Error("borrow insert returned no row");
      return toBorrow(rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new LibraryError("conflict", "Book is already borrowed by this user");
      }
      throw error;
    }
  }

  async closeBorrow(id: string): Promise<Borrow | null> {
    const rows = await this.db.rows<BorrowRow>(
      "borrow close",
      `UPDATE borrows SET returned_at = now() WHERE id = $1 AND returned_at IS NULL
       RETURNING id, user_id, book_id, borrowed_at, returned_at`,
      [id]
    );
    return rows[0] ? toBorrow(rows[0]) : null;
  }
}

export class PostgresInteractionLog implements InteractionLog {
  constructor(private readonly db: PgRunner) {}

  async record(interaction: Omit<UserInteraction, "id" | "createdAt">): Promise<UserInteraction> {
    const rows = await this.db.rows<InteractionRow>(
      "interaction insert",
      `INSERT INTO user_interactions (id, user_id, book_id, interaction_type, rating) VALUES ($1, $2, $3, $4, $5)
       RETURNING id, user_id, book_id, interaction_type, rating, created_at`,
      [crypto.randomUUID(), interaction.userId, interaction.bookId, interaction.type, interaction.rating]
    );
    if (!rows[0]) throw new Error("interaction insert returned no row");
    return toInteraction(rows[0]);
  }

  async listByUser(userId: string): Promise<UserInteraction[]> {
    const rows = await this.db.rows<InteractionRow>(
      "interaction by user",
      `SELECT id, user_id, book_id, interaction_type, rating, created_at FROM user_interactions
       WHERE user_id = $1 ORDER BY created_at, id`,
      [userId]
    );
    return rows.map(toInteraction);
  }

  async listByBook(bookId: string): Promise<UserInteraction[]> {
    const rows = await this.db.rows<InteractionRow>(
      "interaction by book",
      `SELECT id, user_id, book_id, interaction_type, rating, created_at FROM user_interactions
       WHERE book_id = $1 ORDER BY created_at, id`,
      [bookId]
    );
    return rows.map(toInteraction);
  }

  async countByBook(): Promise<Map<string, number>> {
    const rows = await this.db.rows<{ book_id: string; count: number }>(
      "interaction counts",
      "SELECT book_id, count(*)::int AS count FROM user_interactions GROUP BY book_id"
    );
    return new Map(rows.map((row) => [row.book_id, Number(row.count)]));
  }
}

export class PostgresPreferenceStore implements PreferenceStore {
  constructor(private readonly db: PgRunner) {}

  async getPreferences(userId: string): Promise<UserPreference | null> {
    const rows = await this.db.rows<PreferenceRow>(
      "preference get",
      "SELECT user_id, favorite_genres, favorite_authors FROM user_preferences WHERE user_id = $1",
      [userId]
    );
    const row = rows[0];
    if (!row) return null;
    return { userId: row.user_id, favoriteGenres: row.favorite_genres ?? [], favoriteAuthors: row.favorite_authors ?? [] };
  }

  async upsertPreferences(preference: UserPreference): Promise<UserPreference> {
    await this.db.count(
      "preference upsert",
      `INSERT INTO user_preferences (user_id, favorite_genres, favorite_authors)
       VALUES ($1, $2::text[], $3::text[])
       ON CONFLICT (user_id) DO UPDATE SET
         favorite_genres = EXCLUDED.favorite_genres,
         favorite_authors = EXCLUDED.favorite_authors,
         updated_at = now()`,
      [preference.userId, preference.favoriteGenres, preference.favoriteAuthors]
    );
    return { ...preference };
  }
}

export function createPostgresStores(pool: Pool, queryTimeoutMs: number): LibraryStores {
  const db = new PgRunner(pool, queryTimeoutMs);
  return {
    catalog: new PostgresCatalogStore(db),
    reviews: new PostgresReviewStore(db),
    borrows: new PostgresBorrowStore(db),
    interactions: new PostgresInteractionLog(db),
    preferences: new PostgresPreferenceStore(db),
  };
}
