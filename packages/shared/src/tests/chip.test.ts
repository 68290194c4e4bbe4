import assert from "node:assert/strict";
import test from "node:test";
import { secp256k1 } from "@noble/curves/secp256k1";
import { hexToBytes } from "@noble/hashes/utils";
import { chipMessage, verifyChipSignature } from "../crypto/chip.js";
import { sha256Bytes } from "../crypto/hash.js";

const CHIP_PRIVATE_KEY_HEX = "0707070707070707070707070707070707070707070707070707070707070707";
const chipPublicKey = secp256k1.getPublicKey(CHIP_PRIVATE_KEY_HEX, true);
const sender = hexToBytes("a1".repeat(32));
const otherSender = hexToBytes("b2".repeat(32));
const beaconSignature = new Uint8Array(96).fill(9);

function chipSign(from: Uint8Array, beacon: Uint8Array = beaconSignature) {
  return secp256k1.sign(sha256Bytes(chipMessage(from, beacon)), CHIP_PRIVATE_KEY_HEX);
}

test("the chip message is the sender address followed by the beacon signature", () => {
  const message = chipMessage(sender, beaconSignature);
  assert.equal(message.length, 32 + 96);
  assert.deepEqual(message.slice(0, 32), sender);
  assert.deepEqual(message.slice(32), beaconSignature);
});

test("compact and DER signatures from the chip verify", () => {
  const signature = chipSign(sender);
  assert.equal(verifyChipSignature(signature.toCompactRawBytes(), chipPublicKey, beaconSignature, sender), true);
  assert.equal(verifyChipSignature(signature.toDERRawBytes(), chipPublicKey, beaconSignature, sender), true);
});

test("the signature is bound to both the sender and the beacon round", () => {
  const signature = chipSign(sender).toCompactRawBytes();
  assert.equal(verifyChipSignature(signature, chipPublicKey, beaconSignature, otherSender), false);
  assert.equal(verifyChipSignature(signature, chipPublicKey, new Uint8Array(96).fill(8), sender), false);
});

test("another chip's key does not verify and malformed input is rejected", () => {
  const signature = chipSign(sender).toCompactRawBytes();
  const otherKey = secp256k1.getPublicKey("0808080808080808080808080808080808080808080808080808080808080808", true);
  assert.equal(verifyChipSignature(signature, otherKey, beaconSignature, sender), false);
  assert.equal(verifyChipSignature(signature, new Uint8Array(33), beaconSignature, sender), false);
  assert.equal(verifyChipSignature(new Uint8Array(5), chipPublicKey, beaconSignature, sender), false);
});
