import { GenerationFailedError, type GenerationProvider } from "./types";

export type TimedGeneration = {
  system: string;
  user: string;
  maxOutputTokens: number;
};

export async function generateWithTimeout(
  provider: GenerationProvider,
  request: TimedGeneration,
  timeoutMs: number
): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | null = null;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new GenerationFailedError(`${provider.name} generation timed out after ${timeoutMs}ms`, true));
      controller.abort();
    }, timeoutMs);
  });
  return Promise.race([
    provider.generate(request.system, request.user, request.maxOutputTokens, { signal: controller.signal }),
    deadline,
  ]).finally(() => {
    if (timer) {
      clearTimeout(timer);
    }
  });
}
