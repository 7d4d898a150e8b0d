export type IsoDateString = string;

export type Book = {
  id: string;
  title: string;
  author: string;
  isbn: string | null;
  genres: string[];
  filePath: string | null;
  summary: string | null;
  reviewConsensus: string | null;
  consensusVersion: number;
  createdAt: IsoDateString;
};

export type NewBook = {
  title: string;
  author: string;
  isbn?: string | null;
  genres?: string[];
  filePath?: string | null;
};

export type Review = {
  id: string;
  userId: string;
  bookId: string;
  rating: number;
  text: string;
  createdAt: IsoDateString;
};

export type Borrow = {
  id: string;
  userId: string;
  bookId: string;
  borrowedAt: IsoDateString;
  returnedAt: IsoDateString | null;
};

export type UserPreference = {
  userId: string;
  favoriteGenres: string[];
  favoriteAuthors: string[];
};

export type InteractionType = "borrow" | "review" | "return";

export type UserInteraction = {
  id: string;
  userId: string;
  bookId: string;
  type: InteractionType;
  rating: number | null;
  createdAt: IsoDateString;
};

export type RecommendationResult = {
  bookId: string;
  score: number;
  reason: string;
};

export type IntelligenceKind = "summary" | "consensus";

export type IntelligenceStatus = "idle" | "in_flight" | "ready" | "failed";

export type IntelligenceState = {
  status: IntelligenceStatus;
  attempts: number;
  commits: number;
  conflicts: number;
  coalesced: number;
  lastError: string | null;
  updatedAt: IsoDateString | null;
};

export type ReviewPolicy = "allow_repeat" | "single_per_user";
