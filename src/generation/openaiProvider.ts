import OpenAI from "openai";
import type { Logger } from "../config/logger";
import { GenerationFailedError, isRetryableStatus, type GenerateOptions, type GenerationProvider } from "./types";

type ChatCompletionsClient = {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
};

type OpenAIProviderOptions = {
  model: string;
  logger: Logger;
  apiKey?: string;
  timeoutMs?: number;
  client?: ChatCompletionsClient;
};

export function toGenerationFailure(error: unknown): GenerationFailedError {
  if (error instanceof GenerationFailedError) return error;
  if (error instanceof OpenAI.APIError) {
    // Connection errors and timeouts carry no status.
    const status = typeof error.status === "number" ? error.status : null;
    const retryable = status === null || isRetryableStatus(status);
    return new GenerationFailedError(`openai request failed: ${error.message}`, retryable, status, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GenerationFailedError(`openai request failed: ${message}`, true, null, { cause: error });
}

/** Hosted chat completions. SDK-level retries are off; retry policy belongs to the caller. */
export class OpenAIGenerationProvider implements GenerationProvider {
  readonly name = "hosted";
  private readonly client: ChatCompletionsClient;

  constructor(private readonly options: OpenAIProviderOptions) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        maxRetries: 0,
        timeout: options.timeoutMs,
      });
  }

  async generate(
    systemMessage: string,
    userMessage: string,
    maxOutputTokens: number,
    options: GenerateOptions = {}
  ): Promise<string> {
    const { model, logger } = this.options;
    logger.info("openai_request", { model, maxOutputTokens });

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model,
          messages: [
            { role: "system", content: systemMessage },
            { role: "user", content: userMessage },
          ],
          max_tokens: maxOutputTokens,
          temperature: 0.7,
        },
        { signal: options.signal }
      );
    } catch (error) {
      throw toGenerationFailure(error);
    }

    const content = completion.choices[0]?.message.content ?? "";
    logger.info("openai_response", { model, chars: content.length });
    return content;
  }
}
