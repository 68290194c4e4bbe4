import { bls12_381 } from "@noble/curves/bls12-381";
import { hexToBytes } from "@noble/hashes/utils";
import {
  BEACON_PUBLIC_KEY_BYTES,
  BEACON_SIGNATURE_BYTES,
  DRAND_MAINNET_PUBLIC_KEY_HEX,
} from "../beacon/constants.js";
import { assertValidRound } from "../beacon/freshness.js";
import { sha256Bytes } from "./hash.js";

export const DRAND_MAINNET_PUBLIC_KEY = hexToBytes(DRAND_MAINNET_PUBLIC_KEY_HEX);

export function roundToBytes(round: number): Uint8Array {
  assertValidRound(round);
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, BigInt(round), false);
  return bytes;
}

/** Message signed by a chained beacon: sha256(previous_signature || u64be(round)). */
export function beaconDigest(previousSignature: Uint8Array, round: number): Uint8Array {
  return sha256Bytes(previousSignature, roundToBytes(round));
}

/**
 * Verifies a chained drand round: G1 public key, G2 signature,
 * DST BLS_SIG_BLS12381G2_XMD:SHA-256_SSWU_RO_NUL_.
 */
export function verifyBeaconSignature(
  signature: Uint8Array,
  previousSignature: Uint8Array,
  round: number,
  publicKey: Uint8Array = DRAND_MAINNET_PUBLIC_KEY,
): boolean {
  const digest = beaconDigest(previousSignature, round);
  if (signature.length !== BEACON_SIGNATURE_BYTES) return false;
  if (publicKey.length !== BEACON_PUBLIC_KEY_BYTES) return false;
  try {
    return bls12_381.verify(signature, digest, publicKey);
  } catch {
    // point decoding failed
    return false;
  }
}
