import { ProtocolError } from "../errors.js";
import { GENESIS_SECONDS, PERIOD_SECONDS, TTL_MS } from "./constants.js";

export interface BeaconSchedule {
  genesisSeconds: number;
  periodSeconds: number;
}

export const DRAND_MAINNET_SCHEDULE: BeaconSchedule = {
  genesisSeconds: GENESIS_SECONDS,
  periodSeconds: PERIOD_SECONDS,
};

export function isValidRound(round: unknown): round is number {
  return typeof round === "number" && Number.isSafeInteger(round) && round >= 1;
}

export function assertValidRound(round: number): void {
  if (!isValidRound(round)) {
    throw new ProtocolError("INVALID_ROUND", `Beacon round must be a positive integer, got ${String(round)}`);
  }
}

/** Nominal publication time of `round` in unix milliseconds. Round 1 is genesis. */
export function roundTimeMs(round: number, schedule: BeaconSchedule = DRAND_MAINNET_SCHEDULE): bigint {
  assertValidRound(round);
  const seconds =
    BigInt(schedule.genesisSeconds) + BigInt(schedule.periodSeconds) * (BigInt(round) - 1n);
  return seconds * 1000n;
}

/**
 * True when `round` is no older than `ttlMs` relative to `nowMs`.
 * Rounds whose nominal time is still ahead of the local clock are accepted.
 */
export function isWithinTtl(
  round: number,
  nowMs: number,
  ttlMs: number = TTL_MS,
  schedule: BeaconSchedule = DRAND_MAINNET_SCHEDULE,
): boolean {
  const roundMs = roundTimeMs(round, schedule);
  const now = BigInt(Math.floor(nowMs));
  if (now < roundMs) return true;
  return now - roundMs <= BigInt(ttlMs);
}

/** Latest round whose nominal time is at or before `nowMs`; 0 before genesis. */
export function currentRound(nowMs: number, schedule: BeaconSchedule = DRAND_MAINNET_SCHEDULE): number {
  const elapsedMs = Math.floor(nowMs) - schedule.genesisSeconds * 1000;
  if (elapsedMs < 0) return 0;
  return Math.floor(elapsedMs / (schedule.periodSeconds * 1000)) + 1;
}
