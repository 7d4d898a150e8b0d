import dotenv from "dotenv";
import { z } from "zod";
import { backoffDelayMs, normalizeRetryOptions, type RetryOptions } from "../connectivity/retry";

dotenv.config();

const PLACEHOLDER_MATCHERS = [
  /change-?me/i,
  /todo/i,
  /placeholder/i,
  /replace[_-]?with/i,
  /^\s*<.*>\s*$/,
  /\$\{[^}]+\}/,
];

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const EnvSchema = z.object({
  LIBRARY_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LIBRARY_HOST: requiredString("LIBRARY_HOST").default("127.0.0.1"),
  LIBRARY_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LIBRARY_STORE: z.enum(["memory", "postgres"]).default("postgres"),
  BOOK_TEXT_ROOT: requiredString("BOOK_TEXT_ROOT").default("./uploads"),
  LIBRARY_ALLOWED_ORIGINS: z.string().default(""),

  GENERATION_PROVIDER: z.enum(["mock", "local", "hosted"]).default("mock"),
  GENERATION_MODEL: requiredString("GENERATION_MODEL").default("llama3"),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().min(100).max(600_000).default(180_000),
  GENERATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  GENERATION_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(20).max(60_000).default(500),
  GENERATION_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(20).max(300_000).default(8_000),
  MOCK_GENERATION_LATENCY_MS: z.coerce.number().int().min(0).max(60_000).default(300),
  OLLAMA_BASE_URL: requiredString("OLLAMA_BASE_URL").default("http://127.0.0.1:11434"),
  OPENAI_API_KEY: z.string().optional(),

  RECOMMENDATION_ALPHA: z.coerce.number().min(0).max(1).default(0.6),
  REVIEW_POLICY: z.enum(["allow_repeat", "single_per_user"]).default("allow_repeat"),

  SINGLE_FLIGHT_BACKEND: z.enum(["memory", "redis"]).default("memory"),
  SINGLE_FLIGHT_LEASE_MS: z.coerce.number().int().min(1_000).max(3_600_000).default(600_000),

  PGHOST: requiredString("PGHOST").default("127.0.0.1"),
  PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PGDATABASE: requiredString("PGDATABASE").default("library"),
  PGUSER: requiredString("PGUSER").default("postgres"),
  PGPASSWORD: requiredString("PGPASSWORD").default("postgres"),
  PGSSLMODE: z.enum(["disable", "prefer", "require"]).default("disable"),
  LIBRARY_PG_POOL_MAX: z.coerce.number().int().min(1).max(50).default(10),
  LIBRARY_PG_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(300_000).default(30_000),
  LIBRARY_PG_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(10_000),
  LIBRARY_PG_QUERY_TIMEOUT_MS: z.coerce.number().int().min(500).max(120_000).default(5_000),

  REDIS_HOST: requiredString("REDIS_HOST").default("127.0.0.1"),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(500).max(120_000).default(5_000),
  REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().min(500).max(120_000).default(5_000),
});

export type LibraryEnv = z.infer<typeof EnvSchema>;

function hasPlaceholderValue(value: string): boolean {
  return PLACEHOLDER_MATCHERS.some((pattern) => pattern.test(value));
}

function validateProviderConfig(env: LibraryEnv): string[] {
  const errors: string[] = [];

  const assertUrl = (value: string | undefined, variableName: string): void => {
    if (!value) return;
    try {
      new URL(value);
    } catch {
      errors.push(`${variableName} must be a valid URL`);
    }
  };

  if (env.GENERATION_PROVIDER === "hosted" && !env.OPENAI_API_KEY?.trim()) {
    errors.push("OPENAI_API_KEY is required when GENERATION_PROVIDER=hosted");
  }
  if (env.GENERATION_PROVIDER === "local") {
    assertUrl(env.OLLAMA_BASE_URL, "OLLAMA_BASE_URL");
  }

  return errors;
}

const GENERATION_RETRY_JITTER_MS = 100;

export function generationRetryOptions(env: LibraryEnv): RetryOptions {
  return {
    attempts: env.GENERATION_MAX_ATTEMPTS,
    baseDelayMs: env.GENERATION_RETRY_BASE_DELAY_MS,
    maxDelayMs: env.GENERATION_RETRY_MAX_DELAY_MS,
    jitterMs: GENERATION_RETRY_JITTER_MS,
  };
}

/** Longest a single generation run can take: every attempt timing out plus the largest backoffs. */
export function worstCaseFlightMs(env: LibraryEnv): number {
  const policy = normalizeRetryOptions(generationRetryOptions(env));
  let total = env.GENERATION_TIMEOUT_MS * policy.attempts;
  for (let attempt = 1; attempt < policy.attempts; attempt += 1) {
    total += backoffDelayMs(policy, attempt, () => 0) + policy.jitterMs;
  }
  return total;
}

function validateFlightLease(env: LibraryEnv): string[] {
  const worstCase = worstCaseFlightMs(env);
  if (env.SINGLE_FLIGHT_LEASE_MS < worstCase) {
    return [
      `SINGLE_FLIGHT_LEASE_MS (${env.SINGLE_FLIGHT_LEASE_MS}) must cover the longest generation run (${worstCase}ms); raise it or lower GENERATION_TIMEOUT_MS / GENERATION_MAX_ATTEMPTS`,
    ];
  }
  return [];
}

function validateRuntimeSecretValues(env: LibraryEnv): string[] {
  const issues: string[] = [];

  const candidates: Array<[string, string | undefined]> = [
    ["OPENAI_API_KEY", env.OPENAI_API_KEY],
    ["PGPASSWORD", env.PGPASSWORD],
    ["REDIS_PASSWORD", env.REDIS_PASSWORD],
  ];
  for (const [name, value] of candidates) {
    if (typeof value !== "string") continue;
    if (!hasPlaceholderValue(value)) continue;

    issues.push(`${name} is configured with a placeholder value; set a concrete secret before runtime startup.`);
  }

  return issues;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): LibraryEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid library env: ${message}`);
  }
  const env = parsed.data;
  const providerIssues = validateProviderConfig(env);
  if (providerIssues.length > 0) {
    throw new Error(`Invalid library env provider config: ${providerIssues.join("; ")}`);
  }
  const leaseIssues = validateFlightLease(env);
  if (leaseIssues.length > 0) {
    throw new Error(`Invalid library env lease config: ${leaseIssues.join("; ")}`);
  }
  const runtimeSecretIssues = validateRuntimeSecretValues(env);
  if (runtimeSecretIssues.length > 0) {
    throw new Error(`Invalid library env values: ${runtimeSecretIssues.join("; ")}`);
  }
  return env;
}

export function redactEnvForLogs(env: LibraryEnv): Record<string, string | number | boolean | null> {
  return {
    LIBRARY_HOST: env.LIBRARY_HOST,
    LIBRARY_PORT: env.LIBRARY_PORT,
    LIBRARY_LOG_LEVEL: env.LIBRARY_LOG_LEVEL,
    LIBRARY_STORE: env.LIBRARY_STORE,
    BOOK_TEXT_ROOT: env.BOOK_TEXT_ROOT,
    LIBRARY_ALLOWED_ORIGINS: env.LIBRARY_ALLOWED_ORIGINS,
    GENERATION_PROVIDER: env.GENERATION_PROVIDER,
    GENERATION_MODEL: env.GENERATION_MODEL,
    GENERATION_TIMEOUT_MS: env.GENERATION_TIMEOUT_MS,
    GENERATION_MAX_ATTEMPTS: env.GENERATION_MAX_ATTEMPTS,
    GENERATION_RETRY_BASE_DELAY_MS: env.GENERATION_RETRY_BASE_DELAY_MS,
    GENERATION_RETRY_MAX_DELAY_MS: env.GENERATION_RETRY_MAX_DELAY_MS,
    MOCK_GENERATION_LATENCY_MS: env.MOCK_GENERATION_LATENCY_MS,
    OLLAMA_BASE_URL: env.OLLAMA_BASE_URL,
    OPENAI_API_KEY: env.OPENAI_API_KEY ? "[set]" : null,
    RECOMMENDATION_ALPHA: env.RECOMMENDATION_ALPHA,
    REVIEW_POLICY: env.REVIEW_POLICY,
    SINGLE_FLIGHT_BACKEND: env.SINGLE_FLIGHT_BACKEND,
    SINGLE_FLIGHT_LEASE_MS: env.SINGLE_FLIGHT_LEASE_MS,
    PGHOST: env.PGHOST,
    PGPORT: env.PGPORT,
    PGDATABASE: env.PGDATABASE,
    PGUSER: env.PGUSER,
    PGSSLMODE: env.PGSSLMODE,
    PGPASSWORD: "[redacted]",
    LIBRARY_PG_POOL_MAX: env.LIBRARY_PG_POOL_MAX,
    LIBRARY_PG_IDLE_TIMEOUT_MS: env.LIBRARY_PG_IDLE_TIMEOUT_MS,
    LIBRARY_PG_CONNECTION_TIMEOUT_MS: env.LIBRARY_PG_CONNECTION_TIMEOUT_MS,
    LIBRARY_PG_QUERY_TIMEOUT_MS: env.LIBRARY_PG_QUERY_TIMEOUT_MS,
    REDIS_HOST: env.REDIS_HOST,
    REDIS_PORT: env.REDIS_PORT,
    REDIS_USERNAME: env.REDIS_USERNAME ?? null,
    REDIS_PASSWORD: env.REDIS_PASSWORD ? "[set]" : null,
    REDIS_CONNECT_TIMEOUT_MS: env.REDIS_CONNECT_TIMEOUT_MS,
    REDIS_COMMAND_TIMEOUT_MS: env.REDIS_COMMAND_TIMEOUT_MS,
  };
}
