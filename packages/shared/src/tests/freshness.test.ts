import assert from "node:assert/strict";
import test from "node:test";
import { ProtocolError } from "../errors.js";
import { currentRound, isWithinTtl, roundTimeMs } from "../beacon/freshness.js";

const ROUND = 2;
const T = 1595431080000; // genesis + one period, in ms

function isInvalidRound(error: unknown): boolean {
  return error instanceof ProtocolError && error.code === "INVALID_ROUND";
}

test("round 1 is published at genesis and each round adds one period", () => {
  assert.equal(roundTimeMs(1), 1595431050000n);
  assert.equal(roundTimeMs(ROUND), BigInt(T));
  assert.equal(roundTimeMs(1000), 1595461020000n);
});

test("a round stays fresh for exactly TTL milliseconds after its nominal time", () => {
  assert.equal(isWithinTtl(ROUND, T), true);
  assert.equal(isWithinTtl(ROUND, T + 60000), true);
  assert.equal(isWithinTtl(ROUND, T + 60001), false);
  assert.equal(isWithinTtl(ROUND, T + 3600000), false);
});

test("rounds ahead of the local clock are accepted", () => {
  assert.equal(isWithinTtl(ROUND, T - 1), true);
  assert.equal(isWithinTtl(ROUND, 0), true);
});

test("a custom TTL narrows the window", () => {
  assert.equal(isWithinTtl(ROUND, T + 1000, 1000), true);
  assert.equal(isWithinTtl(ROUND, T + 1001, 1000), false);
});

test("round 0 and non-integral rounds are rejected instead of wrapping", () => {
  assert.throws(() => isWithinTtl(0, T), isInvalidRound);
  assert.throws(() => roundTimeMs(-3), isInvalidRound);
  assert.throws(() => roundTimeMs(1.5), isInvalidRound);
  assert.throws(() => roundTimeMs(Number.MAX_SAFE_INTEGER + 1), isInvalidRound);
});

test("currentRound maps wall-clock time back to the latest published round", () => {
  assert.equal(currentRound(1595431050000), 1);
  assert.equal(currentRound(T - 1), 1);
  assert.equal(currentRound(T), 2);
  assert.equal(currentRound(1595431049999), 0);
});
