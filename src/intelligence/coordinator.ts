import { errorMessage, type Logger } from "../config/logger";
import { withRetry, type RetryOptions } from "../connectivity/retry";
import { generateWithTimeout } from "../generation/timeout";
import { GenerationFailedError, isRetryableGenerationError, type GenerationProvider } from "../generation/types";
import { renderBookSummaryPrompt, renderReviewConsensusPrompt, type RenderedPrompt } from "../prompts/templates";
import type { BookTextSource, CatalogStore, ReviewStore } from "../stores/interfaces";
import type { IntelligenceKind, IntelligenceState } from "../types/core";
import type { FlightLease } from "./flightLease";

export type CoordinatorDeps = {
  catalog: CatalogStore;
  reviews: ReviewStore;
  textSource: BookTextSource;
  provider: GenerationProvider;
  logger: Logger;
  lease?: FlightLease;
  /** How long a trigger keeps waiting for a lease held by another process. */
  leaseWaitMs?: number;
  /** First poll interval while waiting; doubles up to a few seconds. */
  leasePollMs?: number;
  generationTimeoutMs?: number;
  retry?: RetryOptions;
};

type RunOutcome = "committed" | "skipped" | "conflict" | "failed" | "leased_elsewhere";

type Flight = {
  rerunRequested: boolean;
  conflictReruns: number;
  done: Promise<void>;
};

export type CoordinatorStats = {
  inFlight: string[];
  providerCalls: number;
  states: Record<string, IntelligenceState>;
};

const MAX_CONFLICT_RERUNS = 1;
const MAX_LEASE_POLL_MS = 5_000;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function flightKey(kind: IntelligenceKind, bookId: string): string {
  return `${kind}:${bookId}`;
}

function idleState(): IntelligenceState {
  return {
    status: "idle",
    attempts: 0,
    commits: 0,
    conflicts: 0,
    coalesced: 0,
    lastError: null,
    updatedAt: null,
  };
}

/**
 * Keeps the derived text fields of a book (summary, review consensus) fresh.
 *
 * Triggers return immediately. Each (kind, book) pair has at most one run in
 * flight; triggers that arrive meanwhile collapse into a single follow-up run.
 * Consensus writes go through the catalog's version compare-and-swap, so a run
 * that lost a race discards its text instead of overwriting a newer one.
 */
export class BookIntelligenceCoordinator {
  private readonly flights = new Map<string, Flight>();
  private readonly states = new Map<string, IntelligenceState>();
  private readonly generationTimeoutMs: number;
  private readonly leaseWaitMs: number;
  private readonly leasePollMs: number;
  private readonly retry: RetryOptions;
  private providerCalls = 0;

  constructor(private readonly deps: CoordinatorDeps) {
    this.generationTimeoutMs = Math.max(1, deps.generationTimeoutMs ?? 180_000);
    this.leaseWaitMs = Math.max(0, deps.leaseWaitMs ?? 600_000);
    this.leasePollMs = Math.max(1, deps.leasePollMs ?? 250);
    this.retry = { attempts: 3, baseDelayMs: 500, maxDelayMs: 8_000, jitterMs: 100, ...deps.retry };
  }

  triggerSummary(bookId: string): void {
    this.launch("summary", bookId);
  }

  triggerConsensus(bookId: string): void {
    this.launch("consensus", bookId);
  }

  getState(bookId: string, kind: IntelligenceKind): IntelligenceState {
    const state = this.states.get(flightKey(kind, bookId));
    return state ? { ...state } : idleState();
  }

  getStats(): CoordinatorStats {
    const states: Record<string, IntelligenceState> = {};
    for (const [key, state] of this.states.entries()) {
      states[key] = { ...state };
    }
    return { inFlight: [...this.flights.keys()], providerCalls: this.providerCalls, states };
  }

  /** Resolves once no run is in flight, including follow-ups scheduled meanwhile. */
  async whenIdle(): Promise<void> {
    while (this.flights.size > 0) {
      await Promise.all([...this.flights.values()].map((flight) => flight.done));
    }
  }

  private ensureState(key: string): IntelligenceState {
    const existing = this.states.get(key);
    if (existing) return existing;
    const created = idleState();
    this.states.set(key, created);
    return created;
  }

  private launch(kind: IntelligenceKind, bookId: string): void {
    const key = flightKey(kind, bookId);
    const state = this.ensureState(key);
    const existing = this.flights.get(key);
    if (existing) {
      state.coalesced += 1;
      // A summary is written once, so a repeat trigger has nothing left to do.
      if (kind === "consensus") existing.rerunRequested = true;
      this.deps.logger.debug("intelligence_trigger_coalesced", { kind, bookId });
      return;
    }

    const flight: Flight = { rerunRequested: false, conflictReruns: 0, done: Promise.resolve() };
    this.flights.set(key, flight);
    flight.done = this.fly(kind, bookId, flight)
      .catch((error: unknown) => {
        this.deps.logger.error("intelligence_flight_crashed", { kind, bookId, message: errorMessage(error) });
      })
      .finally(() => {
        this.flights.delete(key);
      });
  }

  private async fly(kind: IntelligenceKind, bookId: string, flight: Flight): Promise<void> {
    const key = flightKey(kind, bookId);
    let leaseWaitedMs = 0;
    let leasePolls = 0;
    do {
      flight.rerunRequested = false;
      const outcome = await this.runLeased(kind, bookId);
      if (outcome === "leased_elsewhere") {
        // Busy elsewhere: keep the trigger and poll until the holder lets go.
        if (leaseWaitedMs >= this.leaseWaitMs) {
          this.markFailed(key, new Error(`Lease for ${key} still held elsewhere after ${leaseWaitedMs}ms`));
          this.deps.logger.warn("intelligence_lease_wait_exhausted", { key, waitedMs: leaseWaitedMs });
          break;
        }
        const delayMs = Math.min(this.leasePollMs * 2 ** leasePolls, MAX_LEASE_POLL_MS);
        leasePolls += 1;
        leaseWaitedMs += delayMs;
        await sleep(delayMs);
        flight.rerunRequested = true;
        continue;
      }
      leaseWaitedMs = 0;
      leasePolls = 0;
      if (outcome === "conflict" && flight.conflictReruns < MAX_CONFLICT_RERUNS) {
        flight.conflictReruns += 1;
        flight.rerunRequested = true;
      }
      if (flight.rerunRequested) {
        this.deps.logger.debug("intelligence_follow_up_run", { key });
      }
    } while (flight.rerunRequested);
  }

  private async runLeased(kind: IntelligenceKind, bookId: string): Promise<RunOutcome> {
    const key = flightKey(kind, bookId);
    const { lease, logger } = this.deps;
    let token: string | null = null;
    try {
      if (lease) {
        token = await lease.acquire(key);
        if (token === null) {
          logger.info("intelligence_leased_elsewhere", { kind, bookId });
          return "leased_elsewhere";
        }
      }
      return kind === "summary" ? await this.runSummary(bookId) : await this.runConsensus(bookId);
    } catch (error) {
      this.markFailed(key, error);
      logger.error(`${kind}_generation_failed`, {
        bookId,
        retryable: isRetryableGenerationError(error),
        message: errorMessage(error),
      });
      return "failed";
    } finally {
      if (lease && token !== null) {
        await lease.release(key, token).catch((error: unknown) => {
          logger.warn("flight_lease_release_failed", { key, message: errorMessage(error) });
        });
      }
    }
  }

  private async runSummary(bookId: string): Promise<RunOutcome> {
    const { catalog, textSource, logger } = this.deps;
    const key = flightKey("summary", bookId);

    const book = await catalog.getBook(bookId);
    if (!book) throw new Error(`Book ${bookId} not found`);
    if (book.summary !== null) {
      logger.debug("summary_already_present", { bookId });
      return "skipped";
    }

    this.markInFlight(key);
    const content = await textSource.loadText(book);
    if (!content || !content.trim()) {
      throw new Error(`No readable text available for book ${bookId}`);
    }

    const summary = await this.generate(key, renderBookSummaryPrompt(content));
    const written = await catalog.updateBookSummary(bookId, summary);
    const state = this.ensureState(key);
    state.status = "ready";
    state.lastError = null;
    state.updatedAt = new Date().toISOString();
    if (!written) {
      logger.info("summary_write_skipped_existing", { bookId });
      return "skipped";
    }
    state.commits += 1;
    logger.info("summary_committed", { bookId, chars: summary.length });
    return "committed";
  }

  private async runConsensus(bookId: string): Promise<RunOutcome> {
    const { catalog, reviews, logger } = this.deps;
    const key = flightKey("consensus", bookId);

    const book = await catalog.getBook(bookId);
    if (!book) throw new Error(`Book ${bookId} not found`);
    const expectedVersion = book.consensusVersion;
    const bookReviews = await reviews.listReviews(bookId);
    if (bookReviews.length === 0) {
      logger.debug("consensus_skipped_no_reviews", { bookId });
      return "skipped";
    }

    this.markInFlight(key);
    const prompt = renderReviewConsensusPrompt(
      bookReviews.map(({ rating, text }) => ({ rating, text })),
      book.reviewConsensus
    );
    const consensus = await this.generate(key, prompt);

    // Only the write is guarded; the provider call above holds no lock.
    const committed = await catalog.compareAndSwapConsensus(bookId, expectedVersion, consensus);
    const state = this.ensureState(key);
    state.updatedAt = new Date().toISOString();
    state.lastError = null;
    state.status = "ready";
    if (!committed) {
      state.conflicts += 1;
      logger.info("consensus_version_conflict", { bookId, expectedVersion });
      return "conflict";
    }
    state.commits += 1;
    logger.info("consensus_committed", {
      bookId,
      version: expectedVersion + 1,
      reviewCount: bookReviews.length,
      prompt: `${prompt.name}@${prompt.version}`,
    });
    return "committed";
  }

  private async generate(key: string, prompt: RenderedPrompt): Promise<string> {
    const { provider, logger } = this.deps;
    const state = this.ensureState(key);
    const text = await withRetry(
      `generate_${key}`,
      async () => {
        state.attempts += 1;
        this.providerCalls += 1;
        return generateWithTimeout(provider, prompt, this.generationTimeoutMs);
      },
      logger,
      { ...this.retry, shouldRetry: isRetryableGenerationError }
    );
    if (!text.trim()) {
      throw new GenerationFailedError(`${provider.name} returned empty text for ${prompt.name}`, false);
    }
    return text.trim();
  }

  private markInFlight(key: string): void {
    const state = this.ensureState(key);
    state.status = "in_flight";
    state.attempts = 0;
    state.updatedAt = new Date().toISOString();
  }

  private markFailed(key: string, error: unknown): void {
    const state = this.ensureState(key);
    state.status = "failed";
    state.lastError = errorMessage(error);
    state.updatedAt = new Date().toISOString();
  }
}
