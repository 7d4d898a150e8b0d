import test from "node:test";
import assert from "node:assert/strict";
import { readEnv, redactEnvForLogs, worstCaseFlightMs } from "./env";

function withPatchedEnv(patch: Record<string, string | undefined>, run: () => void): void {
  const original: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(patch)) {
    original[key] = process.env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  try {
    run();
  } finally {
    for (const [key, value] of Object.entries(original)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

test("readEnv validates strict log level enum", () => {
  withPatchedEnv(
    {
      LIBRARY_LOG_LEVEL: "trace",
    },
    () => {
      assert.throws(() => readEnv(), /LIBRARY_LOG_LEVEL/);
    }
  );
});

test("readEnv applies defaults", () => {
  const env = readEnv({});
  assert.equal(env.GENERATION_PROVIDER, "mock");
  assert.equal(env.GENERATION_MAX_ATTEMPTS, 3);
  assert.equal(env.GENERATION_RETRY_BASE_DELAY_MS, 500);
  assert.equal(env.MOCK_GENERATION_LATENCY_MS, 300);
  assert.equal(env.RECOMMENDATION_ALPHA, 0.6);
  assert.equal(env.REVIEW_POLICY, "allow_repeat");
  assert.equal(env.SINGLE_FLIGHT_BACKEND, "memory");
  assert.equal(env.LIBRARY_STORE, "postgres");
});

test("readEnv coerces numeric values", () => {
  const env = readEnv({ LIBRARY_PORT: "9090", RECOMMENDATION_ALPHA: "0.25" });
  assert.equal(env.LIBRARY_PORT, 9090);
  assert.equal(env.RECOMMENDATION_ALPHA, 0.25);
});

test("readEnv rejects alpha outside [0, 1]", () => {
  assert.throws(() => readEnv({ RECOMMENDATION_ALPHA: "1.5" }), /RECOMMENDATION_ALPHA/);
});

test("readEnv requires an api key for the hosted provider", () => {
  assert.throws(
    () => readEnv({ GENERATION_PROVIDER: "hosted" }),
    /OPENAI_API_KEY is required when GENERATION_PROVIDER=hosted/
  );
  assert.equal(readEnv({ GENERATION_PROVIDER: "hosted", OPENAI_API_KEY: "test-key" }).OPENAI_API_KEY, "test-key");
});

test("readEnv validates the local provider url", () => {
  assert.throws(
    () => readEnv({ GENERATION_PROVIDER: "local", OLLAMA_BASE_URL: "not a url" }),
    /OLLAMA_BASE_URL must be a valid URL/
  );
});

test("readEnv rejects a flight lease shorter than the longest generation run", () => {
  assert.throws(
    () => readEnv({ GENERATION_TIMEOUT_MS: "600000", GENERATION_MAX_ATTEMPTS: "10", SINGLE_FLIGHT_LEASE_MS: "1000" }),
    /SINGLE_FLIGHT_LEASE_MS \(1000\) must cover the longest generation run/
  );
});

test("worstCaseFlightMs adds every timeout and capped backoff", () => {
  const env = readEnv({
    GENERATION_TIMEOUT_MS: "1000",
    GENERATION_MAX_ATTEMPTS: "3",
    GENERATION_RETRY_BASE_DELAY_MS: "500",
    GENERATION_RETRY_MAX_DELAY_MS: "800",
    SINGLE_FLIGHT_LEASE_MS: "5000",
  });
  // 3 x 1000 + (500 + 100) + (800 + 100)
  assert.equal(worstCaseFlightMs(env), 4500);
  assert.throws(
    () =>
      readEnv({
        GENERATION_TIMEOUT_MS: "1000",
        GENERATION_MAX_ATTEMPTS: "3",
        GENERATION_RETRY_BASE_DELAY_MS: "500",
        GENERATION_RETRY_MAX_DELAY_MS: "800",
        SINGLE_FLIGHT_LEASE_MS: "4000",
      }),
    /SINGLE_FLIGHT_LEASE_MS \(4000\) must cover the longest generation run \(4500ms\)/
  );
});

test("readEnv rejects placeholder secrets", () => {
  assert.throws(() => readEnv({ PGPASSWORD: "change-me" }), /PGPASSWORD is configured with a placeholder value/);
});

test("redactEnvForLogs masks sensitive fields", () => {
  const env = readEnv({
    GENERATION_PROVIDER: "hosted",
    OPENAI_API_KEY: "test-key",
    PGPASSWORD: "test-secret",
    REDIS_PASSWORD: "test-secret",
  });
  const safe = redactEnvForLogs(env);
  assert.equal(safe.OPENAI_API_KEY, "[set]");
  assert.equal(safe.PGPASSWORD, "[redacted]");
  assert.equal(safe.REDIS_PASSWORD, "[set]");
  assert.equal(safe.GENERATION_PROVIDER, "hosted");
});
