import crypto from "node:crypto";
import { truncateToTokens } from "./tokenBudget";

/**
 * A named, versioned prompt. Prompts are provider-agnostic: rendering yields a
 * (system, user) pair that any generation provider accepts.
 */
export type PromptTemplate = {
  readonly name: string;
  readonly version: string;
  readonly system: string;
  /** User message with `{placeholder}` slots. */
  readonly userTemplate: string;
  readonly maxOutputTokens: number;
  readonly inputTokenLimit: number;
  readonly tags: readonly string[];
};

export type RenderedPrompt = {
  name: string;
  version: string;
  system: string;
  user: string;
  maxOutputTokens: number;
  tags: readonly string[];
  fingerprint: string;
};

export type RenderOptions = {
  /** Input field cut down to the prompt's inputTokenLimit before substitution. */
  truncate?: string;
};

export class MissingPlaceholderError extends Error {
  readonly code = "missing_placeholder";

  constructor(
    readonly promptName: string,
    readonly missing: string[]
  ) {
    super(`Prompt ${promptName} is missing template variables: ${missing.join(", ")}`);
    this.name = "MissingPlaceholderError";
  }
}

const PLACEHOLDER_PATTERN = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g;

export function templatePlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}

export function renderPrompt(
  prompt: PromptTemplate,
  inputs: Record<string, string>,
  options: RenderOptions = {}
): RenderedPrompt {
  const missing = templatePlaceholders(prompt.userTemplate).filter((name) => !(name in inputs));
  if (missing.length > 0) {
    throw new MissingPlaceholderError(prompt.name, missing);
  }

  const values: Record<string, string> = { ...inputs };
  if (options.truncate && options.truncate in values) {
    values[options.truncate] = truncateToTokens(values[options.truncate], prompt.inputTokenLimit);
  }

  // Single pass: substituted values are never re-scanned for placeholders.
  const user = prompt.userTemplate.replace(PLACEHOLDER_PATTERN, (_, name: string) => values[name]);
  const fingerprint = crypto
    .createHash("sha256")
    .update(`${prompt.name}@${prompt.version}\n${prompt.system}\n${user}`)
    .digest("hex");

  return {
    name: prompt.name,
    version: prompt.version,
    system: prompt.system,
    user,
    maxOutputTokens: prompt.maxOutputTokens,
    tags: prompt.tags,
    fingerprint,
  };
}

export const SUMMARIZE_BOOK: PromptTemplate = {
  name: "summarize_book",
  version: "1.2.0",
  system: [
    "You are a skilled literary analyst working for a digital library system. " +
      "Your role is to produce clear, informative book summaries suitable for a library catalog.",
    "",
    "Guidelines:",
    "- Write 3-5 concise paragraphs.",
    "- Cover main themes, structure, and key arguments or plot points.",
    "- Do NOT include spoilers for fiction.",
    "- Use a neutral, professional tone.",
    "- Mention who would benefit most from reading this book.",
    "- If the content appears to be partial or corrupted, note this clearly.",
  ].join("\n"),
  userTemplate: [
    "Please summarize the following book content.",
    "",
    "--- BOOK CONTENT (START) ---",
    "{content}",
    "--- BOOK CONTENT (END) ---",
    "",
    "Provide a comprehensive summary in 3-5 paragraphs:",
  ].join("\n"),
  maxOutputTokens: 1024,
  inputTokenLimit: 4000,
  tags: ["summarization", "book", "ingestion"],
};

export const ANALYZE_REVIEWS: PromptTemplate = {
  name: "analyze_reviews",
  version: "1.1.0",
  system: [
    "You are a sentiment analysis expert specializing in literary reviews. " +
      "Your task is to synthesize multiple reader opinions into a balanced, nuanced consensus.",
    "",
    "Guidelines:",
    "- Produce 2-3 paragraphs.",
    "- Identify areas of agreement and disagreement among reviewers.",
    "- Note the overall sentiment (positive, mixed, negative) with nuance.",
    "- Highlight commonly praised strengths and commonly cited weaknesses.",
    "- Conclude with who would likely enjoy this book.",
    "- If a previous consensus exists, update it. Do not start from scratch.",
  ].join("\n"),
  userTemplate: [
    "{previous_consensus_section}Below are reader reviews for this book:",
    "",
    "--- REVIEWS (START) ---",
    "{reviews_text}",
    "--- REVIEWS (END) ---",
    "",
    "Synthesize these into an updated consensus summary:",
  ].join("\n"),
  maxOutputTokens: 512,
  inputTokenLimit: 3000,
  tags: ["sentiment", "reviews", "consensus"],
};

const PROMPT_REGISTRY: ReadonlyMap<string, PromptTemplate> = new Map(
  [SUMMARIZE_BOOK, ANALYZE_REVIEWS].map((prompt) => [prompt.name, prompt])
);

export function getPrompt(name: string): PromptTemplate {
  const prompt = PROMPT_REGISTRY.get(name);
  if (!prompt) {
    throw new Error(`Prompt '${name}' not found. Available: ${[...PROMPT_REGISTRY.keys()].join(", ")}`);
  }
  return prompt;
}

export function listPrompts(): Array<Pick<PromptTemplate, "name" | "version" | "tags">> {
  return [...PROMPT_REGISTRY.values()].map(({ name, version, tags }) => ({ name, version, tags }));
}

export function renderBookSummaryPrompt(content: string): RenderedPrompt {
  return renderPrompt(SUMMARIZE_BOOK, { content }, { truncate: "content" });
}

export type ReviewForPrompt = {
  rating: number;
  text: string;
};

export function formatReviews(reviews: ReviewForPrompt[]): string {
  return reviews.map((review) => `[Rating: ${review.rating}/5]\n${review.text}`).join("\n\n");
}

export function renderReviewConsensusPrompt(
  reviews: ReviewForPrompt[],
  previousConsensus: string | null
): RenderedPrompt {
  const previousSection = previousConsensus
    ? [
        "--- PREVIOUS CONSENSUS (START) ---",
        previousConsensus,
        "--- PREVIOUS CONSENSUS (END) ---",
        "",
        "Update the above consensus with the new reviews below.",
        "",
        "",
      ].join("\n")
    : "";

  return renderPrompt(
    ANALYZE_REVIEWS,
    {
      previous_consensus_section: previousSection,
      reviews_text: formatReviews(reviews),
    },
    { truncate: "reviews_text" }
  );
}
