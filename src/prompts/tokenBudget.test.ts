import test from "node:test";
import assert from "node:assert/strict";
import { TRUNCATION_MARKER, estimateTokens, truncateToTokens } from "./tokenBudget";

test("estimateTokens divides character count by four", () => {
  assert.equal(estimateTokens(""), 0);
  assert.equal(estimateTokens("abcd"), 1);
  assert.equal(estimateTokens("abcdefg"), 1);
  assert.equal(estimateTokens("x".repeat(40)), 10);
});

test("truncateToTokens leaves short text untouched", () => {
  assert.equal(truncateToTokens("Short text.", 10), "Short text.");
});

test("truncateToTokens hard-cuts when no terminator is near the end", () => {
  const text = "a".repeat(100);
  assert.equal(truncateToTokens(text, 5), `${"a".repeat(20)}${TRUNCATION_MARKER}`);
});

test("truncateToTokens cuts at a sentence boundary inside the last fifth of the window", () => {
  // window is 20 chars; the period sits at index 17 (> 16)
  const text = "Seventeen chars!x. Trailing sentence goes here.";
  const result = truncateToTokens(text, 5);
  assert.equal(result, `Seventeen chars!x.${TRUNCATION_MARKER}`);
});

test("truncateToTokens ignores a terminator too early in the window", () => {
  const text = "Hi. abcdefghijklmnopqrstuvwxyz";
  assert.equal(truncateToTokens(text, 5), `Hi. abcdefghijklmnop${TRUNCATION_MARKER}`);
});

test("truncated output never exceeds cap*4 plus the marker", () => {
  const text = "One sentence here. Another one follows! And a question? ".repeat(50);
  for (const cap of [1, 7, 25, 100]) {
    const result = truncateToTokens(text, cap);
    assert.ok(result.length <= cap * 4 + TRUNCATION_MARKER.length);
    assert.ok(result.endsWith(TRUNCATION_MARKER));
  }
});
