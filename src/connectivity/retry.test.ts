import test from "node:test";
import assert from "node:assert/strict";
import { backoffDelayMs, normalizeRetryOptions, withRetry } from "./retry";
import { silentLogger } from "../config/logger";

test("withRetry returns the first successful result", async () => {
  let calls = 0;
  const result = await withRetry(
    "flaky",
    async () => {
      calls += 1;
      if (calls < 3) throw new Error("transient");
      return "ok";
    },
    silentLogger,
    { attempts: 3, sleep: async () => {} }
  );
  assert.equal(result, "ok");
  assert.equal(calls, 3);
});

test("withRetry stops early when shouldRetry rejects the error", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      "fatal",
      async () => {
        calls += 1;
        throw new Error("bad request");
      },
      silentLogger,
      { attempts: 5, shouldRetry: () => false, sleep: async () => {} }
    ),
    /bad request/
  );
  assert.equal(calls, 1);
});

test("withRetry sleeps with exponential backoff between attempts", async () => {
  const delays: number[] = [];
  await assert.rejects(
    withRetry(
      "always-failing",
      async () => {
        throw new Error("down");
      },
      silentLogger,
      {
        attempts: 3,
        baseDelayMs: 100,
        maxDelayMs: 1_000,
        jitterMs: 0,
        sleep: async (ms) => {
          delays.push(ms);
        },
      }
    ),
    /down/
  );
  assert.deepEqual(delays, [100, 200]);
});

test("backoffDelayMs caps at maxDelayMs and adds jitter", () => {
  const policy = normalizeRetryOptions({ baseDelayMs: 100, maxDelayMs: 250, jitterMs: 10 });
  assert.equal(backoffDelayMs(policy, 1, () => 0), 100);
  assert.equal(backoffDelayMs(policy, 3, () => 0), 250);
  assert.equal(backoffDelayMs(policy, 1, () => 0.999), 110);
});

test("normalizeRetryOptions clamps attempts", () => {
  assert.equal(normalizeRetryOptions({ attempts: 0 }).attempts, 1);
  assert.equal(normalizeRetryOptions({ attempts: 100 }).attempts, 25);
  assert.equal(normalizeRetryOptions(undefined).attempts, 6);
});
