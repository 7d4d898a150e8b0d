import type { LibraryEnv } from "../config/env";
import type { Logger } from "../config/logger";
import { MockGenerationProvider } from "./mockProvider";
import { OllamaGenerationProvider } from "./ollamaProvider";
import { OpenAIGenerationProvider } from "./openaiProvider";
import type { GenerationProvider } from "./types";

export type ProviderEnv = Pick<
  LibraryEnv,
  | "GENERATION_PROVIDER"
  | "GENERATION_MODEL"
  | "GENERATION_TIMEOUT_MS"
  | "MOCK_GENERATION_LATENCY_MS"
  | "OLLAMA_BASE_URL"
  | "OPENAI_API_KEY"
>;

export function createGenerationProvider(env: ProviderEnv, logger: Logger): GenerationProvider {
  switch (env.GENERATION_PROVIDER) {
    case "mock":
      return new MockGenerationProvider({ latencyMs: env.MOCK_GENERATION_LATENCY_MS, logger });
    case "local":
      return new OllamaGenerationProvider({ baseUrl: env.OLLAMA_BASE_URL, model: env.GENERATION_MODEL, logger });
    case "hosted":
      return new OpenAIGenerationProvider({
        apiKey: env.OPENAI_API_KEY,
        model: env.GENERATION_MODEL,
        timeoutMs: env.GENERATION_TIMEOUT_MS,
        logger,
      });
  }
}

export { GenerationFailedError, isRetryableGenerationError, type GenerationProvider } from "./types";
export { generateWithTimeout } from "./timeout";
