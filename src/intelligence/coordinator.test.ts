import test from "node:test";
import assert from "node:assert/strict";
import { silentLogger } from "../config/logger";
import { MockGenerationProvider } from "../generation/mockProvider";
import { GenerationFailedError, type GenerationProvider } from "../generation/types";
import type { CatalogStore } from "../stores/interfaces";
import { MemoryBookTextSource, MemoryCatalogStore, MemoryReviewStore } from "../stores/memoryStores";
import { BookIntelligenceCoordinator, type CoordinatorDeps } from "./coordinator";
import { MemoryFlightLease, type FlightLease } from "./flightLease";

type Step = (system: string, user: string) => Promise<string>;

const pause = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

class ScriptedProvider implements GenerationProvider {
  readonly name = "scripted";
  calls = 0;
  readonly users: string[] = [];

  constructor(private readonly steps: Step[], private readonly fallback: Step = async () => "Readers agree.") {}

  async generate(system: string, user: string): Promise<string> {
    const step = this.steps[this.calls] ?? this.fallback;
    this.calls += 1;
    this.users.push(user);
    return step(system, user);
  }
}

class CountingProvider implements GenerationProvider {
  readonly name = "counting";
  calls = 0;
  private readonly inner = new MockGenerationProvider({ latencyMs: 5 });

  async generate(system: string, user: string, maxOutputTokens: number): Promise<string> {
    this.calls += 1;
    return this.inner.generate(system, user, maxOutputTokens);
  }
}

async function setup(provider: GenerationProvider, overrides: Partial<CoordinatorDeps> = {}) {
  const catalog = new MemoryCatalogStore();
  const reviews = new MemoryReviewStore();
  const textSource = new MemoryBookTextSource();
  await catalog.createBook({ id: "book-1", title: "Dune", author: "Frank Herbert", genres: ["sci-fi"] });
  const coordinator = new BookIntelligenceCoordinator({
    catalog,
    reviews,
    textSource,
    provider,
    logger: silentLogger,
    generationTimeoutMs: 1_000,
    retry: { attempts: 3, sleep: async () => {} },
    ...overrides,
  });
  return { catalog, reviews, textSource, coordinator };
}

test("consensus regeneration from two reviews commits version 1", async () => {
  const provider = new CountingProvider();
  const { catalog, reviews, coordinator } = await setup(provider);
  await reviews.createReview({ userId: "user-u", bookId: "book-1", rating: 5, text: "great" });
  await reviews.createReview({ userId: "user-u", bookId: "book-1", rating: 2, text: "too long" });

  const returned = coordinator.triggerConsensus("book-1");
  assert.equal(returned, undefined);
  await coordinator.whenIdle();

  const book = await catalog.getBook("book-1");
  assert.equal(book?.consensusVersion, 1);
  assert.ok(book?.reviewConsensus?.startsWith("Based on 2 reader reviews with an average rating of 3.5/5"));
  assert.equal(provider.calls, 1);
  assert.equal(coordinator.getState("book-1", "consensus").status, "ready");
  assert.equal(coordinator.getState("book-1", "consensus").commits, 1);
});

test("a later regeneration passes the previous consensus as an update", async () => {
  const provider = new ScriptedProvider([async () => "First take.", async () => "Second take."]);
  const { catalog, reviews, coordinator } = await setup(provider);
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 4, text: "good" });
  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();
  await reviews.createReview({ userId: "u2", bookId: "book-1", rating: 3, text: "ok" });
  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();

  assert.ok(provider.users[1].includes("--- PREVIOUS CONSENSUS (START) ---\nFirst take.\n"));
  const book = await catalog.getBook("book-1");
  assert.equal(book?.reviewConsensus, "Second take.");
  assert.equal(book?.consensusVersion, 2);
});

test("N concurrent consensus triggers cause at most two provider calls", async () => {
  const provider = new CountingProvider();
  const { catalog, reviews, coordinator } = await setup(provider);
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 4, text: "good" });

  for (let i = 0; i < 25; i += 1) {
    coordinator.triggerConsensus("book-1");
  }
  await coordinator.whenIdle();

  assert.equal(provider.calls, 2);
  assert.equal((await catalog.getBook("book-1"))?.consensusVersion, 2);
  assert.equal(coordinator.getState("book-1", "consensus").coalesced, 24);
});

test("no consensus run happens for a book without reviews", async () => {
  const provider = new CountingProvider();
  const { catalog, coordinator } = await setup(provider);
  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();
  assert.equal(provider.calls, 0);
  assert.equal((await catalog.getBook("book-1"))?.consensusVersion, 0);
  assert.equal(coordinator.getState("book-1", "consensus").status, "idle");
});

test("retryable failures are retried before committing", async () => {
  const transient: Step = async () => {
    throw new GenerationFailedError("upstream 503", true, 503);
  };
  const provider = new ScriptedProvider([transient, transient, async () => "Recovered consensus."]);
  const { catalog, reviews, coordinator } = await setup(provider);
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 4, text: "good" });

  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();

  assert.equal(provider.calls, 3);
  const book = await catalog.getBook("book-1");
  assert.equal(book?.reviewConsensus, "Recovered consensus.");
  assert.equal(book?.consensusVersion, 1);
  assert.equal(coordinator.getState("book-1", "consensus").attempts, 3);
});

test("a non-retryable failure keeps the last good consensus", async () => {
  const provider = new ScriptedProvider([
    async () => "Good consensus.",
    async () => {
      throw new GenerationFailedError("invalid api key", false, 401);
    },
  ]);
  const { catalog, reviews, coordinator } = await setup(provider);
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 4, text: "good" });
  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();
  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();

  assert.equal(provider.calls, 2);
  const book = await catalog.getBook("book-1");
  assert.equal(book?.reviewConsensus, "Good consensus.");
  assert.equal(book?.consensusVersion, 1);
  const state = coordinator.getState("book-1", "consensus");
  assert.equal(state.status, "failed");
  assert.equal(state.lastError, "invalid api key");
});

test("exhausting retries marks the consensus failed without writing", async () => {
  const provider = new ScriptedProvider([], async () => {
    throw new GenerationFailedError("connection reset", true);
  });
  const { catalog, reviews, coordinator } = await setup(provider);
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 1, text: "bad" });
  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();

  assert.equal(provider.calls, 3);
  assert.equal((await catalog.getBook("book-1"))?.consensusVersion, 0);
  assert.equal(coordinator.getState("book-1", "consensus").status, "failed");
});

test("a provider call past the timeout counts as a retryable failure", async () => {
  const provider = new MockGenerationProvider({ latencyMs: 10_000 });
  const { catalog, reviews, coordinator } = await setup(provider, {
    generationTimeoutMs: 20,
    retry: { attempts: 2, sleep: async () => {} },
  });
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 3, text: "fine" });
  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();

  const state = coordinator.getState("book-1", "consensus");
  assert.equal(state.status, "failed");
  assert.equal(state.attempts, 2);
  assert.match(state.lastError ?? "", /timed out after 20ms/);
  assert.equal((await catalog.getBook("book-1"))?.reviewConsensus, null);
});

test("a stale version discards the result and reruns once against the latest", async () => {
  let catalogRef: MemoryCatalogStore | null = null;
  const provider = new ScriptedProvider([
    async () => {
      // another writer commits while this generation is running
      assert.equal(await catalogRef?.compareAndSwapConsensus("book-1", 0, "External consensus."), true);
      return "Stale consensus.";
    },
    async () => "Fresh consensus.",
  ]);
  const { catalog, reviews, coordinator } = await setup(provider);
  catalogRef = catalog;
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 5, text: "loved it" });

  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();

  const book = await catalog.getBook("book-1");
  assert.equal(book?.reviewConsensus, "Fresh consensus.");
  assert.equal(book?.consensusVersion, 2);
  assert.ok(provider.users[1].includes("External consensus."));
  const state = coordinator.getState("book-1", "consensus");
  assert.equal(state.conflicts, 1);
  assert.equal(state.commits, 1);
});

test("concurrent coordinators over one catalog commit strictly increasing versions", async () => {
  const catalog = new MemoryCatalogStore();
  const reviews = new MemoryReviewStore();
  await catalog.createBook({ id: "book-1", title: "Dune", author: "Frank Herbert" });
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 4, text: "good" });

  const preImages: number[] = [];
  const observed: CatalogStore = {
    getBook: (id) => catalog.getBook(id),
    listBooks: () => catalog.listBooks(),
    createBook: (input) => catalog.createBook(input),
    updateBookSummary: (id, text) => catalog.updateBookSummary(id, text),
    compareAndSwapConsensus: async (id, expectedVersion, text) => {
      const ok = await catalog.compareAndSwapConsensus(id, expectedVersion, text);
      if (ok) preImages.push(expectedVersion);
      return ok;
    },
  };

  const coordinators = Array.from(
    { length: 4 },
    () =>
      new BookIntelligenceCoordinator({
        catalog: observed,
        reviews,
        textSource: new MemoryBookTextSource(),
        provider: new MockGenerationProvider({ latencyMs: 5 }),
        logger: silentLogger,
        retry: { attempts: 1 },
      })
  );
  for (const coordinator of coordinators) {
    coordinator.triggerConsensus("book-1");
    coordinator.triggerConsensus("book-1");
  }
  await Promise.all(coordinators.map((coordinator) => coordinator.whenIdle()));

  const commits = coordinators.reduce((sum, c) => sum + c.getState("book-1", "consensus").commits, 0);
  const book = await catalog.getBook("book-1");
  assert.equal(book?.consensusVersion, commits);
  assert.deepEqual(preImages, Array.from({ length: commits }, (_, i) => i));
});

test("summarization writes once and later triggers are no-ops", async () => {
  const provider = new CountingProvider();
  const { catalog, textSource, coordinator } = await setup(provider);
  textSource.set("book-1", "A desert planet. A noble family. A spice that everyone wants.");

  coordinator.triggerSummary("book-1");
  coordinator.triggerSummary("book-1");
  await coordinator.whenIdle();
  const first = (await catalog.getBook("book-1"))?.summary;
  assert.ok(first?.startsWith("This book contains approximately"));
  assert.equal(provider.calls, 1);

  coordinator.triggerSummary("book-1");
  await coordinator.whenIdle();
  assert.equal((await catalog.getBook("book-1"))?.summary, first);
  assert.equal(provider.calls, 1);
  assert.equal(coordinator.getState("book-1", "summary").commits, 1);
});

test("summarization without readable text fails visibly", async () => {
  const provider = new CountingProvider();
  const { catalog, coordinator } = await setup(provider);
  coordinator.triggerSummary("book-1");
  await coordinator.whenIdle();

  assert.equal(provider.calls, 0);
  assert.equal((await catalog.getBook("book-1"))?.summary, null);
  const state = coordinator.getState("book-1", "summary");
  assert.equal(state.status, "failed");
  assert.equal(state.lastError, "No readable text available for book book-1");
});

test("a trigger waits for a lease held elsewhere and runs once it is released", async () => {
  const provider = new CountingProvider();
  const lease = new MemoryFlightLease();
  const { reviews, coordinator } = await setup(provider, { lease, leasePollMs: 5 });
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 4, text: "good" });

  const token = await lease.acquire("consensus:book-1");
  assert.ok(token);
  coordinator.triggerConsensus("book-1");
  await pause(30);
  assert.equal(provider.calls, 0);
  assert.deepEqual(coordinator.getStats().inFlight, ["consensus:book-1"]);

  await lease.release("consensus:book-1", token);
  await coordinator.whenIdle();
  assert.equal(provider.calls, 1);
  assert.equal(coordinator.getState("book-1", "consensus").status, "ready");
  assert.notEqual(await lease.acquire("consensus:book-1"), null);
});

test("a review landing during another coordinator's flight reaches the next consensus", async () => {
  let openGate: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    openGate = resolve;
  });
  let markStarted: () => void = () => {};
  const started = new Promise<void>((resolve) => {
    markStarted = resolve;
  });
  const early = new ScriptedProvider([
    async () => {
      markStarted();
      await gate;
      return "Early take.";
    },
  ]);
  const lease = new MemoryFlightLease();
  const { catalog, reviews, coordinator: first } = await setup(early, { lease, leasePollMs: 5 });
  const laterProvider = new CountingProvider();
  const second = new BookIntelligenceCoordinator({
    catalog,
    reviews,
    textSource: new MemoryBookTextSource(),
    provider: laterProvider,
    logger: silentLogger,
    lease,
    leasePollMs: 5,
    generationTimeoutMs: 1_000,
    retry: { attempts: 1 },
  });

  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 5, text: "great" });
  first.triggerConsensus("book-1");
  await started;
  await reviews.createReview({ userId: "u2", bookId: "book-1", rating: 2, text: "too long" });
  second.triggerConsensus("book-1");
  await pause(20);
  assert.equal(laterProvider.calls, 0);

  openGate();
  await Promise.all([first.whenIdle(), second.whenIdle()]);

  const book = await catalog.getBook("book-1");
  assert.equal(book?.consensusVersion, 2);
  assert.ok(book?.reviewConsensus?.startsWith("Based on 2 reader reviews with an average rating of 3.5/5"));
  assert.equal(first.getState("book-1", "consensus").commits, 1);
  assert.equal(second.getState("book-1", "consensus").commits, 1);
  assert.equal(second.getState("book-1", "consensus").status, "ready");
});

test("a lease held past the wait budget marks the run failed", async () => {
  const provider = new CountingProvider();
  const lease = new MemoryFlightLease();
  const { reviews, coordinator } = await setup(provider, { lease, leasePollMs: 5, leaseWaitMs: 20 });
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 4, text: "good" });
  assert.ok(await lease.acquire("consensus:book-1"));

  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();

  assert.equal(provider.calls, 0);
  const state = coordinator.getState("book-1", "consensus");
  assert.equal(state.status, "failed");
  assert.equal(state.lastError, "Lease for consensus:book-1 still held elsewhere after 35ms");
});

test("a lease backend failure marks the run failed", async () => {
  const provider = new CountingProvider();
  const lease: FlightLease = {
    acquire: async () => {
      throw new Error("redis down");
    },
    release: async () => {},
  };
  const { reviews, coordinator } = await setup(provider, { lease });
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 4, text: "good" });

  coordinator.triggerConsensus("book-1");
  await coordinator.whenIdle();

  assert.equal(provider.calls, 0);
  const state = coordinator.getState("book-1", "consensus");
  assert.equal(state.status, "failed");
  assert.equal(state.lastError, "redis down");
});

test("getStats lists in-flight keys and provider calls", async () => {
  const provider = new CountingProvider();
  const { reviews, coordinator } = await setup(provider);
  await reviews.createReview({ userId: "u1", bookId: "book-1", rating: 4, text: "good" });
  coordinator.triggerConsensus("book-1");
  assert.deepEqual(coordinator.getStats().inFlight, ["consensus:book-1"]);
  await coordinator.whenIdle();
  const stats = coordinator.getStats();
  assert.deepEqual(stats.inFlight, []);
  assert.equal(stats.providerCalls, 1);
  assert.equal(stats.states["consensus:book-1"]?.status, "ready");
});
