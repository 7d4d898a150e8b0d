import type { Logger } from "../config/logger";
import { estimateTokens } from "../prompts/tokenBudget";
import { GenerationFailedError, type GenerateOptions, type GenerationProvider } from "./types";

const RATING_MARKER = /\[Rating: (\d+(?:\.\d+)?)\/5\]/g;

export type MockProviderOptions = {
  latencyMs?: number;
  logger?: Logger;
};

function describeSentiment(average: number): string {
  if (average >= 4.0) return "overwhelmingly positive";
  if (average >= 3.0) return "generally positive with some reservations";
  if (average >= 2.0) return "mixed, with both praise and criticism";
  return "predominantly critical";
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new GenerationFailedError("mock generation aborted", true));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new GenerationFailedError("mock generation aborted", true));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function extractRatings(userMessage: string): number[] {
  return [...userMessage.matchAll(RATING_MARKER)].map((match) => Number(match[1]));
}

/** Deterministic stand-in for a real model; output depends only on the user message. */
export class MockGenerationProvider implements GenerationProvider {
  readonly name = "mock";
  private readonly latencyMs: number;

  constructor(private readonly options: MockProviderOptions = {}) {
    this.latencyMs = Math.max(0, options.latencyMs ?? 300);
  }

  async generate(
    _systemMessage: string,
    userMessage: string,
    maxOutputTokens: number,
    options: GenerateOptions = {}
  ): Promise<string> {
    await wait(this.latencyMs, options.signal);

    const ratings = extractRatings(userMessage);
    this.options.logger?.debug("mock_generation", {
      estimatedTokens: estimateTokens(userMessage),
      ratingCount: ratings.length,
      maxOutputTokens,
    });

    if (ratings.length > 0) {
      const average = ratings.reduce((sum, rating) => sum + rating, 0) / ratings.length;
      return [
        `Based on ${ratings.length} reader reviews with an average rating of ${average.toFixed(1)}/5, ` +
          `the overall sentiment is ${describeSentiment(average)}.`,
        "Reviewers commonly praise the depth of content and quality of writing. " +
          "Some readers note that certain sections require careful attention, while others appreciate the thoroughness of the coverage.",
        "This book is recommended for readers with a genuine interest in the subject matter.",
      ].join("\n\n");
    }

    const wordCount = userMessage.split(/\s+/).filter(Boolean).length;
    return [
      `This book contains approximately ${wordCount} words across its content ` +
        `(estimated ${estimateTokens(userMessage)} tokens). ` +
        "It explores its themes through well-structured prose, building from foundational concepts to broader conclusions.",
      "The author weaves narrative elements together with analytical insight, " +
        "and the practical implications of the ideas are drawn out for the reader.",
      "Recommended for casual readers seeking an accessible introduction and for readers wanting a thorough reference.",
    ].join("\n\n");
  }
}
