import { canonicalize } from "json-canonicalize";
import { sha256Hex } from "./hash.js";

/**
 * Canonical JSON per RFC 8785 (JCS).
 * Token snapshots are canonicalized before hashing so the attestation is stable
 * across key order and whitespace.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function canonicalHashHex(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}
