export type GenerateOptions = {
  signal?: AbortSignal;
};

/**
 * A text generation backend. Implementations differ only in transport; they
 * never retry, and every upstream failure surfaces as GenerationFailedError.
 */
export interface GenerationProvider {
  readonly name: string;
  generate(systemMessage: string, userMessage: string, maxOutputTokens: number, options?: GenerateOptions): Promise<string>;
}

export class GenerationFailedError extends Error {
  readonly code = "generation_failed";

  constructor(
    message: string,
    readonly retryable: boolean,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GenerationFailedError";
  }
}

export function isRetryableGenerationError(error: unknown): boolean {
  return error instanceof GenerationFailedError && error.retryable;
}

/** 429 and 5xx are transient; every other 4xx is a caller or credential problem. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
