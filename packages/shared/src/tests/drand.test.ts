import assert from "node:assert/strict";
import test from "node:test";
import { bls12_381 } from "@noble/curves/bls12-381";
import { bytesToHex } from "@noble/hashes/utils";
import { beaconDigest, roundToBytes, verifyBeaconSignature } from "../crypto/drand.js";
import { sha256Bytes } from "../crypto/hash.js";

const BEACON_PRIVATE_KEY_HEX = "3a3b3c3d3e3f404142434445464748494a4b4c4d4e4f50515253545556575859";
const publicKey = bls12_381.getPublicKey(BEACON_PRIVATE_KEY_HEX);
const previous = new Uint8Array(96).fill(0x42);

function sign(round: number, prev: Uint8Array = previous): Uint8Array {
  return bls12_381.sign(beaconDigest(prev, round), BEACON_PRIVATE_KEY_HEX);
}

test("rounds encode as 8-byte big-endian integers", () => {
  assert.equal(bytesToHex(roundToBytes(1)), "0000000000000001");
  assert.equal(bytesToHex(roundToBytes(0x01020304)), "0000000001020304");
});

test("the digest chains the previous signature before the round", () => {
  const expected = sha256Bytes(previous, roundToBytes(7));
  assert.equal(bytesToHex(beaconDigest(previous, 7)), bytesToHex(expected));
});

test("a signature over the chained digest verifies", () => {
  const signature = sign(7);
  assert.equal(signature.length, 96);
  assert.equal(verifyBeaconSignature(signature, previous, 7, publicKey), true);
});

test("a signature does not verify for another round or another previous signature", () => {
  const signature = sign(7);
  assert.equal(verifyBeaconSignature(signature, previous, 8, publicKey), false);
  assert.equal(verifyBeaconSignature(signature, new Uint8Array(96), 7, publicKey), false);
});

test("the default mainnet key rejects a locally produced round", () => {
  assert.equal(verifyBeaconSignature(sign(7), previous, 7), false);
});

test("malformed signatures and keys verify false", () => {
  assert.equal(verifyBeaconSignature(new Uint8Array(96), previous, 7, publicKey), false);
  assert.equal(verifyBeaconSignature(new Uint8Array(10), previous, 7, publicKey), false);
  assert.equal(verifyBeaconSignature(sign(7), previous, 7, new Uint8Array(48).fill(1)), false);
});
