import type { Logger } from "../config/logger";
import { GenerationFailedError, isRetryableStatus, type GenerateOptions, type GenerationProvider } from "./types";

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

type OllamaProviderOptions = {
  baseUrl: string;
  model: string;
  logger: Logger;
  fetchImpl?: FetchLike;
};

type OllamaChatResponse = {
  message?: { content?: unknown };
  error?: unknown;
};

/** Local inference through an Ollama server's chat endpoint. */
export class OllamaGenerationProvider implements GenerationProvider {
  readonly name = "local";
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: OllamaProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async generate(
    systemMessage: string,
    userMessage: string,
    maxOutputTokens: number,
    options: GenerateOptions = {}
  ): Promise<string> {
    const { model, logger } = this.options;
    logger.info("ollama_request", { model, maxOutputTokens });

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          model,
          messages: [
            { role: "system", content: systemMessage },
            { role: "user", content: userMessage },
          ],
          stream: false,
          options: { num_predict: maxOutputTokens },
        }),
        signal: options.signal,
      });
    } catch (error) {
      throw new GenerationFailedError(
        `ollama request failed: ${error instanceof Error ? error.message : String(error)}`,
        true,
        null,
        { cause: error }
      );
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new GenerationFailedError(
        `ollama responded ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ""}`,
        isRetryableStatus(response.status),
        response.status
      );
    }

    let payload: OllamaChatResponse;
    try {
      payload = (await response.json()) as OllamaChatResponse;
    } catch (error) {
      throw new GenerationFailedError("ollama returned a non-JSON body", false, response.status, { cause: error });
    }
    const content = payload.message?.content;
    if (typeof content !== "string") {
      throw new GenerationFailedError("ollama response is missing message.content", false, response.status);
    }
    logger.info("ollama_response", { model, chars: content.length });
    return content;
  }
}
